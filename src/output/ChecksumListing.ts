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

import { ChecksumRecord } from "../checksums/Checksums.js";

export const GridCellWidth = 12;

// contents of the .chk file
export function formatChecksumFile(records: readonly ChecksumRecord[]): string {
    const lines = records.map(r => `${r.number} ${r.code}\n`);
    return lines.join("") + `\nLines: ${records.length}\n`;
}

/**
 * Lays out the checksums column by column, like the tables printed next to
 * the listings, using as many columns as fit into the given width.
 */
export function formatChecksumGrid(records: readonly ChecksumRecord[], width: number): string[] {
    const columns = Math.max(1, Math.floor(width / GridCellWidth));
    const rows = Math.ceil(records.length / columns);
    const res: string[] = [];

    for (let row = 0; row < rows; row++) {
        let line = "";
        for (let col = 0; col < columns; col++) {
            const record = records[row + col * rows];
            if (record) {
                line += formatGridCell(record);
            }
        }
        res.push(line);
    }

    res.push("", `Lines: ${records.length}`, "");
    return res;
}

function formatGridCell(record: ChecksumRecord): string {
    const num = record.number.toString();
    const pad = Math.max(0, 7 - num.length - record.code.length);
    return `${" ".repeat(pad)} ${num} ${record.code}   `;
}
