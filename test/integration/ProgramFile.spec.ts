import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { writeChecksumFile, writeProgramFile } from "../../src/output/ProgramFile.js";

describe("GIVEN an output directory", () => {
    let dir = "";
    const binary = new Uint8Array([0x01, 0x08, 0x00, 0x00]);

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "typein-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe("WHEN writing a new program file", () => {
        test("THEN it should be written without asking", async () => {
            const confirm = vi.fn(async (_path: string) => true);
            const file = join(dir, "new.prg");

            expect(await writeProgramFile(file, binary, confirm)).toBe(true);
            expect(confirm).not.toHaveBeenCalled();
            expect(Array.from(await readFile(file))).toEqual([0x01, 0x08, 0x00, 0x00]);
        });
    });

    describe("WHEN the program file exists and overwriting is declined", () => {
        test("THEN the old file should be kept", async () => {
            const confirm = vi.fn(async (_path: string) => false);
            const file = join(dir, "old.prg");
            await writeFile(file, "keep");

            expect(await writeProgramFile(file, binary, confirm)).toBe(false);
            expect(confirm).toHaveBeenCalledWith(file);
            expect(await readFile(file, "utf-8")).toEqual("keep");
        });
    });

    describe("WHEN the program file exists and overwriting is confirmed", () => {
        test("THEN it should be replaced", async () => {
            const file = join(dir, "old.prg");
            await writeFile(file, "replace me");

            expect(await writeProgramFile(file, binary, async () => true)).toBe(true);
            expect(Array.from(await readFile(file))).toEqual([0x01, 0x08, 0x00, 0x00]);
        });
    });

    describe("WHEN writing checksums", () => {
        test("THEN the checksum file should list them", async () => {
            const file = join(dir, "new.chk");
            await writeChecksumFile(file, [{ number: 10, code: "EO" }]);
            expect(await readFile(file, "utf-8")).toEqual("10 EO\n\nLines: 1\n");
        });
    });
});
