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

import { readFileSync } from "fs";

// ordered [text, byte] pairs as stored in the JSON tables
export type TokenTable = ReadonlyArray<readonly [string, number]>;

export function loadTokenTable(name: string): TokenTable {
    const raw = readCharMap(name);
    if (!Array.isArray(raw)) {
        throw Error(`Char map ${name} must be an array of [text, byte] pairs`);
    }

    return raw.map((entry: unknown, idx: number) => {
        if (!Array.isArray(entry) || entry.length != 2) {
            throw Error(`Char map ${name}: entry ${idx} is not a pair`);
        }
        const [text, value]: unknown[] = entry;
        if (typeof text !== "string" || text.length == 0) {
            throw Error(`Char map ${name}: entry ${idx} has no text`);
        }
        if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 0xFF) {
            throw Error(`Char map ${name}: entry ${idx} is not a byte`);
        }
        return [text, value] as const;
    });
}

export function loadCodeMap(name: string): ReadonlyMap<string, string> {
    const raw = readCharMap(name);
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw Error(`Char map ${name} must be an object`);
    }

    const res = new Map<string, string>();
    for (const [code, replacement] of Object.entries(raw)) {
        if (typeof replacement !== "string") {
            throw Error(`Char map ${name}: ${code} has no replacement text`);
        }
        res.set(code.toUpperCase(), replacement);
    }
    return res;
}

function readCharMap(name: string): unknown {
    const url = new URL(`../../charmaps/${name}.json`, import.meta.url);
    return JSON.parse(readFileSync(url, "utf-8"));
}

// Commodore BASIC V2 keywords, in ROM order (END = 0x80 ... GO = 0xCB)
export const BasicV2Tokens = loadTokenTable("basic-v2");

// petcat-style control and color codes, e.g. {wht} or {down}
export const PetcatTokens = loadTokenTable("petcat");

// keys typed with Shift or the Commodore key, e.g. {s a} or {c g}
export const ShiftCommodoreTokens = loadTokenTable("shift-commodore");

// magazine notation (upper-cased) to petcat notation, e.g. {WH} -> {wht}
export const AhoyCodes = loadCodeMap("ahoy");
