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

import { extendType, string } from "cmd-ts";
import { getSourceFormat, SourceFormatName, SourceFormats } from "./checksums/SourceFormats.js";
import { parseLoadAddress } from "./prg/LoadAddress.js";

// option types for the command line
export const SourceFormatType = extendType(string, {
    displayName: "source_format",
    description: Object.values(SourceFormats).map(f => `${f.name} - ${f.description}`).join("\n"),
    async from(str: string): Promise<SourceFormatName> {
        return getSourceFormat(str).name;
    },
});

export const LoadAddressType = extendType(string, {
    displayName: "load_address",
    description: "0x0801 - C64, 0x1001 - VIC-20, 0x0401 - VIC-20 +3K, 0x1201 - VIC-20 +8K and more",
    async from(str: string): Promise<number> {
        return parseLoadAddress(str);
    },
});
