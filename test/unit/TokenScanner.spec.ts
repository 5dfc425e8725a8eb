import { EncodingError } from "../../src/tokenizer/EncodingError.js";
import { InitialState, scanUnit, TokenScanner } from "../../src/tokenizer/TokenScanner.js";
import { sourceLine } from "./TestUtils.js";

function encode(text: string): readonly number[] {
    return new TokenScanner().encode(sourceLine(10, text)).bytes;
}

describe("GIVEN canonical BASIC lines", () => {
    const expectations: [string, number[]][] = [
        ["", [0]],
        ["print\"hello\"", [153, 34, 72, 69, 76, 76, 79, 34, 0]],
        ["goto10", [137, 49, 48, 0]],
        ["goto110", [137, 49, 49, 48, 0]],
        ["gosub100", [141, 49, 48, 48, 0]],
        ["fori=xtoz", [129, 73, 178, 88, 164, 90, 0]],
        ["print#1,a", [152, 49, 44, 65, 0]],
        ["x=pi", [88, 178, 80, 73, 0]],
        ["printtab(10);sc$", [153, 163, 49, 48, 41, 59, 83, 67, 36, 0]],
        ["data15,103,255,169", [131, 49, 53, 44, 49, 48, 51, 44, 50, 53, 53, 44, 49, 54, 57, 0]],
    ];

    for (const [text, bytes] of expectations) {
        describe(`WHEN encoding '${text}'`, () => {
            test("THEN keywords should become tokens and letters PETSCII", () => {
                expect(encode(text)).toEqual(bytes);
            });
        });
    }
});

describe("GIVEN keywords inside strings and remarks", () => {
    const expectations: [string, number[]][] = [
        ["rem lawn", [143, 32, 76, 65, 87, 78, 0]],
        ["rem\"goto", [143, 34, 71, 79, 84, 79, 0]],
        ["print\"a:rem b\"c", [153, 34, 65, 58, 82, 69, 77, 32, 66, 34, 67, 0]],
        ["{wht}\"tab(32)", [5, 34, 84, 65, 66, 40, 51, 50, 41, 0]],
    ];

    for (const [text, bytes] of expectations) {
        describe(`WHEN encoding '${text}'`, () => {
            test("THEN the keywords should stay literal text", () => {
                expect(encode(text)).toEqual(bytes);
            });
        });
    }
});

describe("GIVEN lines with control and graphics tokens", () => {
    const expectations: [string, number[]][] = [
        ["{wht}{cyn}", [5, 159, 0]],
        ["x={pi}", [88, 178, 255, 0]],
        ["a$=\"{c g}{s a}\"", [65, 36, 178, 34, 165, 193, 34, 0]],
        ["{c g} t", [165, 32, 84, 0]],
        ["{s ep}s", [169, 83, 0]],
        ["printtab(16)\"{lgrn}{down}l", [153, 163, 49, 54, 41, 34, 153, 17, 76, 0]],
    ];

    for (const [text, bytes] of expectations) {
        describe(`WHEN encoding '${text}'`, () => {
            test("THEN each token should become a single byte", () => {
                expect(encode(text)).toEqual(bytes);
            });
        });
    }
});

describe("GIVEN a character outside of PETSCII", () => {
    describe("WHEN encoding it", () => {
        test("THEN an encoding error should name the line", () => {
            expect(() => encode("print\"€\"")).toThrow(EncodingError);
            expect(() => encode("print\"€\"")).toThrow("in line 10");
        });
    });
});

describe("GIVEN the scanner state", () => {
    describe("WHEN scanning a quote", () => {
        const step = scanUnit("\"print", InitialState);

        test("THEN the string state should be entered", () => {
            expect(step.byte).toEqual(34);
            expect(step.rest).toEqual("print");
            expect(step.state).toEqual({ inQuotes: true, inRemark: false });
        });

        test("THEN keywords should not be matched afterwards", () => {
            expect(scanUnit(step.rest, step.state).byte).toEqual(80);
        });
    });

    describe("WHEN scanning a remark", () => {
        const step = scanUnit("rem\"x", InitialState);

        test("THEN a following quote should not leave the remark", () => {
            const quote = scanUnit(step.rest, step.state);
            expect(quote.state).toEqual({ inQuotes: true, inRemark: true });
        });
    });
});

describe("GIVEN a scanner with its own matchers", () => {
    const scanner = new TokenScanner([{ table: [["zz", 0xFF]], active: s => !s.inQuotes }]);

    describe("WHEN encoding a line", () => {
        test("THEN only its table should be applied", () => {
            expect(scanner.encode(sourceLine(10, "zz{pi}\"zz")).bytes).toEqual([255, 123, 80, 73, 125, 34, 90, 90, 0]);
        });
    });
});
