import { LineSequencer } from "../../src/listing/LineSequencer.js";
import { LineNumberRangeError, MissingLineNumberError, SequenceError } from "../../src/listing/ListingErrors.js";
import { readListing } from "../../src/listing/ListingReader.js";
import { listingFromLines } from "./TestUtils.js";

function sequence(lines: string[]) {
    return new LineSequencer(listingFromLines("test.bas", lines)).sequence();
}

function sequenceError(lines: string[]): unknown {
    try {
        sequence(lines);
    } catch (e) {
        return e;
    }
    return undefined;
}

describe("GIVEN a listing file", () => {
    const content = "10 PRINT\"Hello!\"  \r\n\r\n   \n20 GOTO10\n";

    describe("WHEN it is read", () => {
        const lines = readListing("hello.bas", content);

        test("THEN blank rows should be dropped and the rest lower-cased and right-trimmed", () => {
            expect(lines.map(l => l.text)).toEqual(["10 print\"hello!\"", "20 goto10"]);
        });

        test("THEN each line should remember its row in the file", () => {
            expect(lines.map(l => l.cursor.rowIdx)).toEqual([0, 3]);
            expect(lines[1].cursor.inputName).toEqual("hello.bas");
        });
    });
});

describe("GIVEN rows starting with line numbers", () => {
    const expectations: [string, number, string][] = [
        ["10 print\"hello!\"", 10, "print\"hello!\""],
        ["20   goto10", 20, "goto10"],
        ["30{wh}val = 3.2*num", 30, "{wh}val = 3.2*num"],
        ["  40 rem", 40, "rem"],
    ];

    for (const [row, num, text] of expectations) {
        describe(`WHEN splitting '${row}'`, () => {
            test("THEN number and remaining text should be separated", () => {
                expect(LineSequencer.splitLineNumber(row)).toEqual([num, text]);
            });
        });
    }

    describe("WHEN splitting a row without a number", () => {
        test("THEN there should be no result", () => {
            expect(LineSequencer.splitLineNumber("print 10")).toBeUndefined();
        });
    });
});

describe("GIVEN a listing in ascending order", () => {
    for (const lines of [["10 OK", "20 OK", "30 OK", "40 OK"], ["10 OK", "20 OK"], ["10 OK"], ["0 OK", "1 OK"]]) {
        describe(`WHEN sequencing ${lines.length} lines`, () => {
            test("THEN all lines should be accepted in order", () => {
                expect(sequence(lines).map(l => l.number)).toEqual(lines.map(l => Number.parseInt(l)));
            });
        });
    }
});

describe("GIVEN a listing with lines out of order", () => {
    const expectations: [string[], number, number][] = [
        [["10 OK", "20 OK", "5 OFF", "40 OK"], 20, 5],
        [["10 OK", "200 OFF", "30 OK", "40 OK"], 200, 30],
        [["10 OK", "200 OFF", "3 OFF", "40 OK"], 200, 3],
        [["100 OFF", "20 OK", "30 OK", "40 OK"], 100, 20],
        [["20 OK", "10 ON"], 20, 10],
        [["20 OK", "20 ON"], 20, 20],
    ];

    for (const [lines, previous, offending] of expectations) {
        describe(`WHEN sequencing ${lines.join(" / ")}`, () => {
            const err = sequenceError(lines);

            test("THEN the first violation should be reported after the last valid line", () => {
                expect(err).toBeInstanceOf(SequenceError);
                if (err instanceof SequenceError) {
                    expect(err.previousLineNumber).toEqual(previous);
                    expect(err.lineNumber).toEqual(offending);
                    expect(err.message).toContain(`after line ${previous}`);
                }
            });
        });
    }
});

describe("GIVEN a listing with a line lacking its number", () => {
    const expectations: [string[], number, number][] = [
        [["10 OK", "OFF", "30 OK", "40 OK"], 10, 2],
        [["OFF", "20OK", "30 ON", "40 OK"], 0, 1],
        [["20OK", "ON"], 20, 2],
    ];

    for (const [lines, previous, row] of expectations) {
        describe(`WHEN sequencing ${lines.join(" / ")}`, () => {
            const err = sequenceError(lines);

            test("THEN the error should name the last valid line and the row", () => {
                expect(err).toBeInstanceOf(MissingLineNumberError);
                if (err instanceof MissingLineNumberError) {
                    expect(err.previousLineNumber).toEqual(previous);
                    expect(err.row).toEqual(row);
                }
            });
        });
    }
});

describe("GIVEN a line number beyond 16 bits", () => {
    describe("WHEN sequencing it", () => {
        test("THEN it should be rejected", () => {
            expect(sequenceError(["10 OK", "65536 OFF"])).toBeInstanceOf(LineNumberRangeError);
        });
    });
});
