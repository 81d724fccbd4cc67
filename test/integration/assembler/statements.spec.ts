import { imageToRecords, recordsToImage } from "../../../src/assembler/MemoryImage.js";
import { assemble, assembleError } from "./TestUtils.js";

describe("GIVEN single statements", () => {
    const expectations: [string, number][] = [
        ["HLT", 0], ["COB", 0],
        ["INP", 901], ["OUT", 902],
        ["ADD 42", 142], ["SUB 9", 209], ["STA 99", 399], ["LDA 0", 500], ["LDA 00", 500],
        ["BRA 5", 605], ["BRZ 5", 705], ["BRP 5", 805],
        ["DAT", 0], ["DAT 0", 0], ["DAT 999", 999], ["DAT +12", 12],
        ["DAT -1", 999], ["DAT -13", 987], ["DAT -999", 1],
    ];

    for (const [input, word] of expectations) {
        test(`THEN '${input}' should assemble to ${word}`, () => {
            expect(assemble(input).memory).toEqual([word]);
        });
    }
});

describe("GIVEN data values out of range", () => {
    test("THEN they should be rejected at the value", () => {
        const high = assembleError("DAT 1000");
        expect(high.message).toEqual("Value 1000 out of range [-999 ... +999]");
        expect(high.line).toEqual(1);
        expect(high.col).toEqual(5);

        const low = assembleError("x DAT -1000");
        expect(low.message).toEqual("Value -1000 out of range [-999 ... +999]");
        expect(low.col).toEqual(7);
    });
});

describe("GIVEN a program with origins", () => {
    describe("WHEN placing code at different addresses", () => {
        const data = assemble(`
                  LDA 10
                  ORG 20
            x     DAT 7
                  ORG 1
                  HLT
        `);
        test("THEN the image should keep the emission order", () => {
            expect(data.image).toEqual([
                { addr: 0, value: 510 },
                { addr: 20, value: 7 },
                { addr: 1, value: 0 },
            ]);
            expect(data.symbols).toEqual({ x: 20 });
        });
    });

    describe("WHEN the program does not fit into memory", () => {
        const err = assembleError("ORG 99\nHLT\nHLT");
        test("THEN the first word beyond the memory should be rejected", () => {
            expect(err.message).toEqual("Program exceeds memory at address 100");
            expect(err.line).toEqual(3);
            expect(err.col).toEqual(1);
        });
    });

    describe("WHEN the program fills the memory exactly", () => {
        const data = assemble("DAT 1\n".repeat(100));
        test("THEN all addresses should be used", () => {
            expect(data.image.length).toEqual(100);
            expect(data.image[99]).toEqual({ addr: 99, value: 1 });
        });
    });
});

describe("GIVEN an assembled image", () => {
    const data = assemble(`
              LDA x
              ORG 40
        x     DAT -2
    `);
    test("THEN it should convert to address and value records", () => {
        expect(imageToRecords(data.image)).toEqual([[0, 540], [40, 998]]);
    });

    test("THEN converting the records back should give the same image", () => {
        expect(recordsToImage(imageToRecords(data.image))).toEqual(data.image);
    });
});
