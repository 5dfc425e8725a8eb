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

import { AhoyCodes } from "../charmaps/CharMaps.js";
import { ahoy1Checksum, ahoy2Checksum, ahoy3Checksum, ChecksumFunction } from "./Checksums.js";

export const SourceFormatNames = ["ahoy1", "ahoy2", "ahoy3"] as const;
export type SourceFormatName = typeof SourceFormatNames[number];

export const DefaultSourceFormat: SourceFormatName = "ahoy2";

export interface SourceFormat {
    name: SourceFormatName;
    description: string;

    // magazine escape codes to canonical tokens
    codes: ReadonlyMap<string, string>;
    checksum: ChecksumFunction;
}

export const SourceFormats: Readonly<Record<SourceFormatName, SourceFormat>> = {
    ahoy1: {
        name: "ahoy1",
        description: "Ahoy! magazine (Mar-May 1984)",
        codes: AhoyCodes,
        checksum: ahoy1Checksum,
    },
    ahoy2: {
        name: "ahoy2",
        description: "Ahoy! magazine (Jun 1984-Apr 1987)",
        codes: AhoyCodes,
        checksum: ahoy2Checksum,
    },
    ahoy3: {
        name: "ahoy3",
        description: "Ahoy! magazine (May 1987-)",
        codes: AhoyCodes,
        checksum: ahoy3Checksum,
    },
};

export class UnsupportedFormatError extends Error {
    public format: string;

    public constructor(format: string) {
        super(`Magazine format '${format}' not supported - choose from ${SourceFormatNames.map(n => `'${n}'`).join(", ")}`);
        this.name = UnsupportedFormatError.name;
        this.format = format;
    }
}

export function isSourceFormatName(name: string): name is SourceFormatName {
    return SourceFormatNames.some(n => n == name);
}

export function getSourceFormat(name: string): SourceFormat {
    if (!isSourceFormatName(name)) {
        throw new UnsupportedFormatError(name);
    }
    return SourceFormats[name];
}
