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

import { CodeError } from "../utils/CodeError.js";
import { ListingCursor } from "./SourceLine.js";

export class MissingLineNumberError extends CodeError {
    public previousLineNumber: number;

    public constructor(previousLineNumber: number, cursor: ListingCursor) {
        super(`Entry error after line ${previousLineNumber} - each line should start with a line number`, cursor);
        this.name = MissingLineNumberError.name;
        this.previousLineNumber = previousLineNumber;
    }
}

export class SequenceError extends CodeError {
    public lineNumber: number;
    public previousLineNumber: number;

    public constructor(lineNumber: number, previousLineNumber: number, cursor: ListingCursor) {
        super(
            `Entry error after line ${previousLineNumber} - lines should be in sequential order (found ${lineNumber})`,
            cursor,
        );
        this.name = SequenceError.name;
        this.lineNumber = lineNumber;
        this.previousLineNumber = previousLineNumber;
    }
}

export class LineNumberRangeError extends CodeError {
    public lineNumber: number;

    public constructor(lineNumber: number, cursor: ListingCursor) {
        super(`Line number ${lineNumber} out of range`, cursor);
        this.name = LineNumberRangeError.name;
        this.lineNumber = lineNumber;
    }
}
