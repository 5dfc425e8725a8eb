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

import { ListingCursor } from "../listing/SourceLine.js";
import { CodeError } from "../utils/CodeError.js";

export class EncodingError extends CodeError {
    public lineNumber: number;

    public constructor(chr: string, lineNumber: number, cursor: ListingCursor) {
        super(`Character '${chr}' in line ${lineNumber} has no PETSCII equivalent`, cursor);
        this.name = EncodingError.name;
        this.lineNumber = lineNumber;
    }
}
