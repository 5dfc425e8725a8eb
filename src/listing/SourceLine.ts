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

// position of a line inside the listing file, used for error reports
export interface ListingCursor {
    inputName: string;
    rowIdx: number;
}

export interface SourceLine {
    readonly number: number;
    readonly text: string;
    readonly cursor: ListingCursor;
}

// same shape, but escapes are rewritten to canonical tokens
export interface CanonicalLine {
    readonly number: number;
    readonly text: string;
    readonly cursor: ListingCursor;
}

export interface EncodedLine {
    readonly number: number;
    readonly bytes: readonly number[];
}

// one non-blank, lower-cased row of the listing file
export interface ListingLine {
    readonly text: string;
    readonly cursor: ListingCursor;
}
