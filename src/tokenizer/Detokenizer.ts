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
import { numToHex } from "../utils/Strings.js";
import { EndOfLine, InitialState, nextState, ScanState, SpaceByte } from "./TokenScanner.js";

function reverseTable(table: TokenTable): Map<number, string> {
    const res = new Map<number, string>();
    for (const [text, value] of table) {
        if (!res.has(value)) {
            res.set(value, text);
        }
    }
    return res;
}

const KeywordTexts = reverseTable(BasicV2Tokens);
const SpecialTexts = reverseTable([...PetcatTokens, ...ShiftCommodoreTokens]);

/**
 * Renders the tokens of an encoded line as canonical text,
 * e.g. [0x99, 0x22, 0x05, 0x48, 0x22, 0x00] -> print"{wht}h"
 */
export function detokenizeLine(bytes: readonly number[]): string {
    let state = InitialState;
    let res = "";

    for (const byte of bytes) {
        if (byte == EndOfLine) {
            break;
        }
        res += renderByte(byte, state);
        state = nextState(state, byte);
    }

    return res;
}

function renderByte(byte: number, state: ScanState): string {
    if (byte == SpaceByte) {
        return " ";
    }

    if (!state.inQuotes && !state.inRemark) {
        const keyword = KeywordTexts.get(byte);
        if (keyword !== undefined) {
            return keyword;
        }
    }

    const special = SpecialTexts.get(byte);
    if (special !== undefined) {
        return special;
    }

    if (byte >= 0x41 && byte <= 0x5A) {
        return String.fromCharCode(byte + 0x20);
    }

    // lowercase ASCII would be read back as uppercase PETSCII
    if (byte > SpaceByte && byte < 0x7F && !(byte >= 0x61 && byte <= 0x7A)) {
        return String.fromCharCode(byte);
    }

    return `{$${numToHex(byte, 2).toLowerCase()}}`;
}
