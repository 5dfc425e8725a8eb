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

import { BasicV2Tokens, PetcatTokens, ShiftCommodoreTokens, TokenTable } from "../charmaps/CharMaps.js";
import { CanonicalLine, EncodedLine } from "../listing/SourceLine.js";
import { EncodingError } from "./EncodingError.js";

export const QuoteByte = 0x22;
export const RemByte = 0x8F;
export const SpaceByte = 0x20;
export const EndOfLine = 0x00;

export interface ScanState {
    readonly inQuotes: boolean;
    readonly inRemark: boolean;
}

export interface ScanStep {
    byte: number;
    rest: string;
    state: ScanState;
}

export interface Matcher {
    table: TokenTable;
    active(state: ScanState): boolean;
}

export const InitialState: ScanState = { inQuotes: false, inRemark: false };

// longest text first so that no shorter entry shadows a longer one, e.g. PRINT vs. PRINT#
export function byLength(table: TokenTable): TokenTable {
    return [...table].sort((a, b) => b[0].length - a[0].length);
}

// tried in this order, the first hit wins
export const DefaultMatchers: readonly Matcher[] = [
    { table: byLength(PetcatTokens), active: () => true },
    { table: byLength(ShiftCommodoreTokens), active: () => true },
    { table: byLength(BasicV2Tokens), active: s => !s.inQuotes && !s.inRemark },
];

export function nextState(state: ScanState, byte: number): ScanState {
    return {
        inQuotes: byte == QuoteByte ? !state.inQuotes : state.inQuotes,
        inRemark: state.inRemark || byte == RemByte,
    };
}

/**
 * Consumes one unit from the start of text and returns its byte.
 * Characters without a token map to their character code, with lowercase
 * ASCII letters moved to the unshifted PETSCII letters.
 * The returned byte can exceed 0xFF for characters outside of Latin-1.
 */
export function scanUnit(text: string, state: ScanState, matchers: readonly Matcher[] = DefaultMatchers): ScanStep {
    for (const matcher of matchers) {
        if (!matcher.active(state)) {
            continue;
        }
        for (const [token, value] of matcher.table) {
            if (text.startsWith(token)) {
                return { byte: value, rest: text.substring(token.length), state: nextState(state, value) };
            }
        }
    }

    const chr = String.fromCodePoint(text.codePointAt(0) ?? 0);
    let code = chr.codePointAt(0) ?? 0;
    if (code >= 0x61 && code <= 0x7A) {
        code -= 0x20;
    }
    return { byte: code, rest: text.substring(chr.length), state: nextState(state, code) };
}

export class TokenScanner {
    private matchers: readonly Matcher[];

    public constructor(matchers: readonly Matcher[] = DefaultMatchers) {
        this.matchers = matchers;
    }

    public encode(line: CanonicalLine): EncodedLine {
        const bytes: number[] = [];
        let rest = line.text;
        let state = InitialState;

        while (rest.length > 0) {
            const step = scanUnit(rest, state, this.matchers);
            if (step.byte > 0xFF) {
                throw new EncodingError(String.fromCodePoint(step.byte), line.number, line.cursor);
            }
            bytes.push(step.byte);
            rest = step.rest;
            state = step.state;
        }
        bytes.push(EndOfLine);

        return { number: line.number, bytes };
    }
}
