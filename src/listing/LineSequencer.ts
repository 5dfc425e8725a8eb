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

import { LineNumberRangeError, MissingLineNumberError, SequenceError } from "./ListingErrors.js";
import { ListingLine, SourceLine } from "./SourceLine.js";

export class LineSequencer {
    public static MaxLineNumber = 0xFFFF;
    private static LineNumberRegex = /^\s*(\d+)/;

    private lines: readonly ListingLine[];

    public constructor(lines: readonly ListingLine[]) {
        this.lines = lines;
    }

    /**
     * Splits a row into its leading line number and the remaining text.
     * Returns undefined if the row doesn't start with a number.
     */
    public static splitLineNumber(text: string): [number, string] | undefined {
        const match = text.match(LineSequencer.LineNumberRegex);
        if (!match) {
            return undefined;
        }

        const num = Number.parseInt(match[1], 10);
        return [num, text.substring(match[0].length).trim()];
    }

    /**
     * Validates all lines and returns them in program order.
     * Throws on the first line that has no number or breaks the ascending order.
     */
    public sequence(): SourceLine[] {
        const res: SourceLine[] = [];
        let prev: number | undefined;

        for (const line of this.lines) {
            const split = LineSequencer.splitLineNumber(line.text);
            if (!split) {
                throw new MissingLineNumberError(prev ?? 0, line.cursor);
            }

            const [num, text] = split;
            if (num > LineSequencer.MaxLineNumber) {
                throw new LineNumberRangeError(num, line.cursor);
            }

            if (prev !== undefined && num <= prev) {
                throw new SequenceError(num, prev, line.cursor);
            }

            res.push({ number: num, text, cursor: line.cursor });
            prev = num;
        }

        return res;
    }
}
