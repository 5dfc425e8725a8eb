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

import { detokenizeLine } from "../tokenizer/Detokenizer.js";
import { formatAddress } from "./LoadAddress.js";
import { PrgLine, PrgReader } from "./PrgReader.js";

function sameBytes(a: PrgLine, b: PrgLine): boolean {
    return a.bytes.length == b.bytes.length && a.bytes.every((byte, i) => byte == b.bytes[i]);
}

export function comparePrg(name: string, ours: Uint8Array, other: Uint8Array): boolean {
    const ourImage = new PrgReader(ours).read();
    const otherImage = new PrgReader(other).read();
    let good = true;

    if (ourImage.loadAddress != otherImage.loadAddress) {
        good = false;
        const ourStr = formatAddress(ourImage.loadAddress);
        const otherStr = formatAddress(otherImage.loadAddress);
        console.log(`load address: our ${ourStr} != other ${otherStr} in ${name}`);
    }

    const otherLines = new Map(otherImage.lines.map(l => [l.number, l]));
    for (const line of ourImage.lines) {
        const otherLine = otherLines.get(line.number);
        otherLines.delete(line.number);
        if (!otherLine) {
            good = false;
            console.log(`${line.number}: missing in ${name}`);
        } else if (!sameBytes(line, otherLine)) {
            good = false;
            console.log(`${line.number}: our "${detokenizeLine(line.bytes)}" != other "${detokenizeLine(otherLine.bytes)}" in ${name}`);
        }
    }

    for (const line of otherLines.values()) {
        good = false;
        console.log(`${line.number}: only in ${name}`);
    }

    return good;
}
