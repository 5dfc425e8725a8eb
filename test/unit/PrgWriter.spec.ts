import { PrgReader } from "../../src/prg/PrgReader.js";
import { PrgWriter, ProgramSizeError } from "../../src/prg/PrgWriter.js";

const hello = { number: 10, bytes: [153, 34, 72, 69, 76, 76, 79, 34, 0] };
const loop = { number: 20, bytes: [137, 49, 48, 0] };

describe("GIVEN two encoded lines", () => {
    describe("WHEN written to a PRG image at the default address", () => {
        const writer = new PrgWriter();
        writer.writeLine(hello);
        writer.writeLine(loop);
        const binary = writer.finish();

        test("THEN load address, links, line numbers and end marker should be present", () => {
            expect(Array.from(binary)).toEqual([
                0x01, 0x08,
                0x0E, 0x08, 10, 0, 153, 34, 72, 69, 76, 76, 79, 34, 0,
                0x16, 0x08, 20, 0, 137, 49, 48, 0,
                0, 0,
            ]);
        });

        test("THEN the image should be 2 + sum of (4 + line length) + 2 bytes long", () => {
            expect(binary.length).toEqual(2 + (4 + 9) + (4 + 4) + 2);
        });

        test("THEN reading it back should give the same lines", () => {
            const image = new PrgReader(binary).read();
            expect(image.loadAddress).toEqual(0x0801);
            expect(image.lines).toEqual([
                { address: 0x0801, nextAddress: 0x080E, number: 10, bytes: hello.bytes },
                { address: 0x080E, nextAddress: 0x0816, number: 20, bytes: loop.bytes },
            ]);
        });
    });

    describe("WHEN written at a VIC-20 address", () => {
        const writer = new PrgWriter(0x1001);
        writer.writeLine(hello);
        writer.writeLine(loop);

        test("THEN all links should be relative to it", () => {
            expect(writer.getAddress()).toEqual(0x1016);
            expect(Array.from(writer.finish().slice(0, 4))).toEqual([0x01, 0x10, 0x0E, 0x10]);
        });
    });

    describe("WHEN written in the wrong order", () => {
        test("THEN the writer should refuse", () => {
            const writer = new PrgWriter();
            writer.writeLine(loop);
            expect(() => writer.writeLine(hello)).toThrow("Line 10 written after line 20");
        });
    });
});

describe("GIVEN a line number above 255", () => {
    describe("WHEN written", () => {
        test("THEN it should be stored little endian", () => {
            const writer = new PrgWriter();
            writer.writeLine({ number: 0x1234, bytes: [142, 0] });
            expect(Array.from(writer.finish())).toEqual([0x01, 0x08, 0x07, 0x08, 0x34, 0x12, 142, 0, 0, 0]);
        });
    });
});

describe("GIVEN a program close to the end of memory", () => {
    describe("WHEN the end marker still fits", () => {
        test("THEN the line should be accepted", () => {
            const writer = new PrgWriter(0xFFF0);
            writer.writeLine({ number: 1, bytes: [65, 65, 65, 65, 65, 65, 65, 65, 65, 0] });
            expect(writer.getAddress()).toEqual(0xFFFE);
        });
    });

    describe("WHEN the end marker doesn't fit", () => {
        test("THEN a size error should be raised", () => {
            const writer = new PrgWriter(0xFFF0);
            expect(() => writer.writeLine({ number: 1, bytes: [65, 65, 65, 65, 65, 65, 65, 65, 65, 65, 0] }))
                .toThrow(ProgramSizeError);
        });
    });
});

describe("GIVEN a damaged PRG image", () => {
    describe("WHEN it is cut short", () => {
        test("THEN reading should fail", () => {
            expect(() => new PrgReader(new Uint8Array([0x01, 0x08, 0x0E, 0x08, 10])).read())
                .toThrow("Unexpected end of program");
        });
    });

    describe("WHEN a link points to the wrong place", () => {
        test("THEN reading should fail", () => {
            const image = new Uint8Array([0x01, 0x08, 0x10, 0x08, 20, 0, 137, 49, 48, 0, 0, 0]);
            expect(() => new PrgReader(image).read()).toThrow("Line 20 at $0801 links to $0810, expected $0809");
        });
    });
});
