import { AssemblerError } from "../../../src/assembler/AssemblerError.js";
import { ParserError } from "../../../src/parser/ParserError.js";
import { assemble, assembleError } from "./TestUtils.js";

describe("GIVEN a program with labels", () => {
    describe("WHEN referencing labels before and after their definition", () => {
        const data = assemble(`
                  BRA end
            loop  BRZ end
                  BRA loop
            end   HLT
                  BRA loop
        `);
        test("THEN both should resolve to the label address", () => {
            expect(data.symbols).toEqual({ loop: 1, end: 3 });
            expect(data.memory).toEqual([603, 703, 601, 0, 601]);
        });
    });

    describe("WHEN using different cases for the same label", () => {
        const data = assemble(`
            Count DAT 3
                  LDA COUNT
                  ADD count
        `);
        test("THEN they should refer to the same symbol", () => {
            expect(data.symbols).toEqual({ count: 0 });
            expect(data.memory).toEqual([3, 500, 100]);
        });
    });

    describe("WHEN labeling an origin statement", () => {
        const data = assemble(`
                  HLT
            start ORG 10
                  BRA start
        `);
        test("THEN the label should get the address before the origin", () => {
            expect(data.symbols).toEqual({ start: 1 });
            expect(data.memory[10]).toEqual(601);
        });
    });

    describe("WHEN defining a label twice", () => {
        const err = assembleError("a HLT\na DAT");
        test("THEN the second definition should be rejected", () => {
            expect(err).toBeInstanceOf(AssemblerError);
            expect(err.message).toEqual("Redefining label a, first defined in line 1");
            expect(err.line).toEqual(2);
            expect(err.col).toEqual(1);
        });
    });

    describe("WHEN defining a label twice with different case", () => {
        const err = assembleError("X HLT\n\nx HLT");
        test("THEN the second definition should be rejected", () => {
            expect(err.message).toEqual("Redefining label x, first defined in line 1");
            expect(err.line).toEqual(3);
        });
    });

    describe("WHEN defining a label after the last address", () => {
        const err = assembleError("ORG 99\nHLT\nend ORG 0\nLDA end\n");
        test("THEN the definition should be rejected", () => {
            expect(err).toBeInstanceOf(AssemblerError);
            expect(err.message).toEqual("Label end is outside memory at address 100");
            expect(err.line).toEqual(3);
            expect(err.col).toEqual(1);
        });
    });

    describe("WHEN referencing an undefined label", () => {
        const err = assembleError("HLT\nBRA nowhere");
        test("THEN the reference should be reported", () => {
            expect(err).toBeInstanceOf(AssemblerError);
            expect(err.message).toEqual("Undefined label nowhere");
            expect(err.line).toEqual(2);
            expect(err.col).toEqual(5);
        });
    });

    describe("WHEN the input has syntax errors", () => {
        const err = assembleError("INP OUT\nBRA nowhere");
        test("THEN the syntax error should be reported first", () => {
            expect(err).toBeInstanceOf(ParserError);
            expect(err.message).toEqual("Expected instruction with single operation");
        });
    });
});
