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

import { formatAddress } from "./LoadAddress.js";
import { PrgWriter } from "./PrgWriter.js";

export interface PrgLine {
    address: number;
    nextAddress: number;
    number: number;

    // tokens including the terminating 0
    bytes: number[];
}

export interface PrgImage {
    loadAddress: number;
    lines: PrgLine[];
}

export class PrgReader {
    private input: Uint8Array;
    private offset = 0;

    public constructor(input: Uint8Array) {
        this.input = input;
    }

    public read(): PrgImage {
        this.offset = 0;
        const loadAddress = this.readWord();
        const lines: PrgLine[] = [];

        let address = loadAddress;
        while (true) {
            const link = this.readWord();
            if (link == 0) {
                break;
            }

            const number = this.readWord();
            const bytes: number[] = [];
            while (true) {
                const byte = this.readByte();
                bytes.push(byte);
                if (byte == 0) {
                    break;
                }
            }

            const expected = address + PrgWriter.LineHeaderSize + bytes.length;
            if (link != expected) {
                throw Error(`Line ${number} at ${formatAddress(address)} links to ${formatAddress(link)}, expected ${formatAddress(expected)}`);
            }

            lines.push({ address, nextAddress: link, number, bytes });
            address = link;
        }

        return { loadAddress, lines };
    }

    private readWord(): number {
        const low = this.readByte();
        const high = this.readByte();
        return (high << 8) | low;
    }

    private readByte(): number {
        if (this.offset >= this.input.length) {
            throw Error("Unexpected end of program");
        }
        return this.input[this.offset++];
    }
}
