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
import { highByte, lowByte } from "../utils/Strings.js";
import { checkLoadAddress, DefaultLoadAddress, formatAddress } from "./LoadAddress.js";

export class ProgramSizeError extends Error {
    public lineNumber: number;

    public constructor(lineNumber: number, end: number) {
        super(`Program exceeds memory at line ${lineNumber} (ends at ${formatAddress(end)})`);
        this.name = ProgramSizeError.name;
        this.lineNumber = lineNumber;
    }
}

/**
 * Builds a PRG image: load address, then one record per line
 * (link to next line, line number, tokens, 0) and a 0 link as end marker.
 */
export class PrgWriter {
    public static LineHeaderSize = 4;

    private data: number[] = [];
    private address: number;
    private lastLine?: number;

    public constructor(loadAddress = DefaultLoadAddress) {
        this.address = checkLoadAddress(loadAddress);
        this.writeWord(loadAddress);
    }

    public getAddress(): number {
        return this.address;
    }

    public writeLine(line: EncodedLine): void {
        if (this.lastLine !== undefined && line.number <= this.lastLine) {
            throw Error(`Line ${line.number} written after line ${this.lastLine}`);
        }

        const next = this.address + PrgWriter.LineHeaderSize + line.bytes.length;

        // the end marker must fit behind the last line
        if (next + 2 > 0x10000) {
            throw new ProgramSizeError(line.number, next + 2);
        }

        this.writeWord(next);
        this.writeWord(line.number);
        line.bytes.forEach(b => this.writeByte(b));

        this.address = next;
        this.lastLine = line.number;
    }

    private writeWord(word: number) {
        this.writeByte(lowByte(word));
        this.writeByte(highByte(word));
    }

    private writeByte(byte: number): void {
        this.data.push(byte & 0xFF);
    }

    public finish(): Uint8Array {
        this.writeWord(0);
        return new Uint8Array(this.data);
    }
}
