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

import { ChecksumRecord, computeChecksum } from "./checksums/Checksums.js";
import { DefaultSourceFormat, getSourceFormat, SourceFormat, SourceFormatName } from "./checksums/SourceFormats.js";
import { EscapeNormalizer } from "./escapes/EscapeNormalizer.js";
import { LineSequencer } from "./listing/LineSequencer.js";
import { readListing } from "./listing/ListingReader.js";
import { EncodedLine, ListingLine } from "./listing/SourceLine.js";
import { checkLoadAddress, DefaultLoadAddress } from "./prg/LoadAddress.js";
import { PrgWriter } from "./prg/PrgWriter.js";
import { TokenScanner } from "./tokenizer/TokenScanner.js";
import { CodeError } from "./utils/CodeError.js";

export interface TypeInOptions {
    source?: SourceFormatName;
    loadAddress?: number;
}

export interface TypeInOutput {
    binary: Uint8Array;
    lines: readonly EncodedLine[];
    checksums: readonly ChecksumRecord[];
    errors: readonly CodeError[];
}

export class TypeIn {
    private format: SourceFormat;
    private loadAddress: number;
    private normalizer: EscapeNormalizer;
    private scanner = new TokenScanner();
    private listing: ListingLine[] = [];

    public constructor(opts: TypeInOptions) {
        this.format = getSourceFormat(opts.source ?? DefaultSourceFormat);
        this.loadAddress = checkLoadAddress(opts.loadAddress ?? DefaultLoadAddress);
        this.normalizer = new EscapeNormalizer(this.format.codes);
    }

    public getFormat(): SourceFormat {
        return this.format;
    }

    // several inputs are treated as one listing, e.g. a program printed in parts
    public addInput(name: string, content: string): ListingLine[] {
        const lines = readListing(name, content);
        this.listing.push(...lines);
        return lines;
    }

    public run(): TypeInOutput {
        try {
            return this.convert();
        } catch (e) {
            if (e instanceof CodeError) {
                return { binary: new Uint8Array(), lines: [], checksums: [], errors: [e] };
            }
            throw e;
        }
    }

    private convert(): TypeInOutput {
        // each stage covers the whole listing before the next one starts
        const lines = new LineSequencer(this.listing).sequence()
            .map(line => this.normalizer.normalize(line))
            .map(line => this.scanner.encode(line));

        const checksums = lines.map(line => computeChecksum(this.format.checksum, line));

        const writer = new PrgWriter(this.loadAddress);
        lines.forEach(line => writer.writeLine(line));
        const binary = writer.finish();

        return { binary, lines, checksums, errors: [] };
    }
}
