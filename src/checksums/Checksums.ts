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

import { EncodedLine } from "../listing/SourceLine.js";
import { QuoteByte, SpaceByte } from "../tokenizer/TokenScanner.js";

export type ChecksumFunction = (lineNumber: number, bytes: readonly number[]) => number;

export interface ChecksumRecord {
    readonly number: number;
    readonly code: string;
}

// two letters A..P, one per nibble
export function checksumToCode(value: number): string {
    const high = (value & 0xF0) >> 4;
    const low = value & 0x0F;
    return String.fromCharCode(0x41 + high, 0x41 + low);
}

/**
 * Bug Repellent as printed in Ahoy! from March to May 1984.
 * Spaces are ignored everywhere, even inside strings.
 */
export function ahoy1Checksum(_lineNumber: number, bytes: readonly number[]): number {
    let value = 0;
    for (const byte of bytes) {
        if (byte == SpaceByte) {
            continue;
        }
        value = ((value + byte) << 1) & 0xFF;
    }
    return value;
}

/**
 * Bug Repellent from June 1984 to April 1987.
 * The 6502 version compares each byte against the quote character and
 * adds the resulting carry, so bytes >= 0x22 count one more.
 */
export function ahoy2Checksum(_lineNumber: number, bytes: readonly number[]): number {
    let xor = 0;
    let position = 1;
    let inQuotes = false;

    for (const byte of bytes) {
        const carry = byte < QuoteByte ? 0 : 1;
        if (byte == QuoteByte) {
            inQuotes = !inQuotes;
        }
        if (byte == SpaceByte && !inQuotes) {
            continue;
        }

        const next = byte + xor + carry;
        xor = (next ^ position) & 0xFF;
        position++;
    }
    return xor;
}

/**
 * Bug Repellent from May 1987 on, which also covers the line number.
 */
export function ahoy3Checksum(lineNumber: number, bytes: readonly number[]): number {
    let xor = 0;
    let position = 0;
    let inQuotes = false;

    const line = [lineNumber % 256, Math.floor(lineNumber / 256), ...bytes];
    for (const byte of line) {
        if (byte == QuoteByte) {
            inQuotes = !inQuotes;
        }
        if (byte == SpaceByte && !inQuotes) {
            continue;
        }

        xor = ((byte + xor) ^ position) & 0xFF;
        position++;
    }
    return xor;
}

export function computeChecksum(fn: ChecksumFunction, line: EncodedLine): ChecksumRecord {
    return { number: line.number, code: checksumToCode(fn(line.number, line.bytes)) };
}
