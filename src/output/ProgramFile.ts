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

import { writeFile } from "fs/promises";
import { ChecksumRecord } from "../checksums/Checksums.js";
import { formatChecksumFile } from "./ChecksumListing.js";

export type ConfirmOverwrite = (path: string) => Promise<boolean>;

function isFileExistsError(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "EEXIST";
}

/**
 * Writes the program image without replacing an existing file unless confirmed.
 * Returns false if the user declined to overwrite.
 */
export async function writeProgramFile(path: string, binary: Uint8Array, confirm: ConfirmOverwrite): Promise<boolean> {
    try {
        await writeFile(path, binary, { flag: "wx" });
        return true;
    } catch (e) {
        if (!isFileExistsError(e)) {
            throw e;
        }
    }

    if (!await confirm(path)) {
        return false;
    }

    await writeFile(path, binary);
    return true;
}

export async function writeChecksumFile(path: string, records: readonly ChecksumRecord[]): Promise<void> {
    await writeFile(path, formatChecksumFile(records), "utf-8");
}
