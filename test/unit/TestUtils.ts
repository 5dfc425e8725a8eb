import { ListingLine, SourceLine } from "../../src/listing/SourceLine.js";

export function sourceLine(number: number, text: string, rowIdx = 0): SourceLine {
    return { number, text, cursor: { inputName: "test.bas", rowIdx } };
}

export function listingFromLines(inputName: string, lines: string[]): ListingLine[] {
    return lines.map((text, rowIdx) => ({ text, cursor: { inputName, rowIdx } }));
}
