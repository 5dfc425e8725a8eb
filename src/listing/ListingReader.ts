/*
 *   typein - Converts magazine BASIC type-in listings to Commodore PRG files
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { ListingLine } from "./SourceLine.js";

/**
 * Splits the content of a listing file into its non-blank rows.
 * Rows are right-trimmed and lower-cased, the row index refers to the file.
 */
export function readListing(inputName: string, content: string): ListingLine[] {
    const res: ListingLine[] = [];

    content.split(/\r\n|\r|\n/).forEach((row, rowIdx) => {
        if (row.trim().length == 0) {
            return;
        }
        res.push({
            text: row.trimEnd().toLowerCase(),
            cursor: { inputName, rowIdx },
        });
    });

    return res;
}
