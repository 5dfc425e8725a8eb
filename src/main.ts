#!/usr/bin/env node
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

import { command, option, optional, positional, run, string } from "cmd-ts";
import { readFileSync } from "fs";
import path, { basename } from "path";
import { createInterface } from "readline/promises";
import { TypeIn, TypeInOutput } from "./TypeIn.js";
import { LoadAddressType, SourceFormatType } from "./ArgTypes.js";
import { DefaultSourceFormat } from "./checksums/SourceFormats.js";
import { formatChecksumGrid } from "./output/ChecksumListing.js";
import { writeChecksumFile, writeProgramFile } from "./output/ProgramFile.js";
import { DefaultLoadAddress, formatAddress } from "./prg/LoadAddress.js";
import { ProgramSizeError } from "./prg/PrgWriter.js";
import { comparePrg } from "./prg/comparePrg.js";
import { formatCodeError } from "./utils/CodeError.js";

const ShorthandHelp = `
Ahoy! issues prior to November 1984 underlined characters to be typed with
the Shift key and overlined those typed with the Commodore key. Type them as
{s a}, {s *} or {c a}, {c *}. Keys missing on modern keyboards:
{EP} pound, {UP_ARROW}, {LEFT_ARROW}, {PI}, {s RETURN}, {s SPACE}, {c EP}.`;

function withExtension(file: string, ext: string): string {
    return path.format({ ...path.parse(file), base: "", ext });
}

async function confirmOverwrite(file: string): Promise<boolean> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const answer = await rl.question(`Output file "${file}" already exists. Overwrite? (Y = yes) `);
        return answer.trim().toLowerCase() == "y";
    } finally {
        rl.close();
    }
}

const cmd = command({
    name: "typein",
    description: "Converts Commodore BASIC type-in listings from magazines to PRG files" + ShorthandHelp,
    args: {
        source: option({
            long: "source",
            short: "s",
            description: "Magazine format for special characters and checksums",
            type: SourceFormatType,
            defaultValue: () => DefaultSourceFormat,
            defaultValueIsSerializable: true,
        }),
        loadAddress: option({
            long: "loadaddr",
            short: "l",
            description: "Start of BASIC memory on the target machine",
            type: LoadAddressType,
            defaultValue: () => DefaultLoadAddress,
        }),
        compareWith: option({
            long: "compare",
            short: "c",
            description: "Compare output with given prg file",
            type: optional(string),
        }),
        file: positional({
            description: "Listing to convert, outputs are written next to it",
            displayName: "input_file",
            type: string,
        }),
    },

    handler: async (args) => {
        let src: string;
        try {
            src = readFileSync(args.file, "utf-8");
        } catch (e) {
            console.error(`File read failed - please check source file name and path (${e instanceof Error ? e.message : String(e)})`);
            process.exit(1);
        }

        const typein = new TypeIn({ source: args.source, loadAddress: args.loadAddress });
        typein.addInput(basename(args.file), src);

        let output: TypeInOutput;
        try {
            output = typein.run();
        } catch (e) {
            if (!(e instanceof ProgramSizeError)) {
                throw e;
            }
            console.error(e.message);
            process.exit(-1);
        }

        if (output.errors.length > 0) {
            output.errors.forEach(e => console.error(formatCodeError(e)));
            process.exit(-1);
        }

        const prgPath = withExtension(args.file, ".prg");
        console.log(`Writing ${output.binary.length} bytes for ${formatAddress(args.loadAddress)} to "${prgPath}"`);
        if (!await writeProgramFile(prgPath, output.binary, confirmOverwrite)) {
            console.log(`File "${prgPath}" not overwritten`);
        }

        await writeChecksumFile(withExtension(args.file, ".chk"), output.checksums);

        console.log("Line Checksums:\n");
        formatChecksumGrid(output.checksums, process.stdout.columns ?? 80).forEach(line => console.log(line));

        if (args.compareWith) {
            const otherPrg = readFileSync(args.compareWith);
            if (comparePrg(basename(args.compareWith), output.binary, otherPrg)) {
                console.log("No differences");
            } else {
                process.exit(-1);
            }
        }
    },
});

void run(cmd, process.argv.slice(2));
