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

import { numToHex } from "../utils/Strings.js";

export const DefaultLoadAddress = 0x0801;

// start of BASIC memory on the supported machines
export const LoadAddresses = {
    c64: 0x0801,
    vic20: 0x1001,
    vic20Plus3K: 0x0401,
    vic20Plus8K: 0x1201,
} as const;

export class LoadAddressError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = LoadAddressError.name;
    }
}

export function checkLoadAddress(addr: number): number {
    if (!Number.isInteger(addr) || addr < 0 || addr > 0xFFFF) {
        throw new LoadAddressError(`Load address ${addr} is not a 16 bit address`);
    }
    return addr;
}

// accepts 0x0801, $0801 or just 0801
export function parseLoadAddress(str: string): number {
    const digits = str.trim().replace(/^(0x|\$)/i, "");
    if (!digits.match(/^[0-9A-Fa-f]+$/)) {
        throw new LoadAddressError(`Invalid load address '${str}'`);
    }
    return checkLoadAddress(Number.parseInt(digits, 16));
}

export function formatAddress(addr: number): string {
    return "$" + numToHex(addr, 4);
}
