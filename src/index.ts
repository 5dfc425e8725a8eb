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

export * from "./TypeIn.js";
export * from "./charmaps/CharMaps.js";
export * from "./checksums/Checksums.js";
export * from "./checksums/SourceFormats.js";
export * from "./escapes/BraceError.js";
export * from "./escapes/EscapeNormalizer.js";
export * from "./listing/LineSequencer.js";
export * from "./listing/ListingErrors.js";
export * from "./listing/ListingReader.js";
export * from "./listing/SourceLine.js";
export * from "./output/ChecksumListing.js";
export * from "./output/ProgramFile.js";
export * from "./prg/LoadAddress.js";
export * from "./prg/PrgReader.js";
export * from "./prg/PrgWriter.js";
export * from "./prg/comparePrg.js";
export * from "./tokenizer/Detokenizer.js";
export * from "./tokenizer/EncodingError.js";
export * from "./tokenizer/TokenScanner.js";
export * from "./utils/CodeError.js";
