import { Parser } from "../../src/parser/Parser.js";
import * as Nodes from "../../src/parser/nodes/Node.js";
import { NodeType } from "../../src/parser/nodes/Node.js";

function parse(input: string): Nodes.Program {
    return new Parser("test.lmc", input).parseProgram();
}

function parseSingle(input: string): Nodes.Instruction {
    const prog = parse(input);
    expect(prog.errors).toEqual([]);
    expect(prog.instructions.length).toEqual(1);
    return prog.instructions[0];
}

describe("GIVEN a parser", () => {
    describe("WHEN parsing a labeled memory reference", () => {
        const inst = parseSingle("loop LDA count");
        test("THEN label, mnemonic and operand should be separated", () => {
            expect(inst.label?.sym.name).toEqual("loop");
            expect(inst.statement).toMatchObject({
                type: NodeType.MemoryRef,
                mnemonic: "LDA",
                operand: { type: NodeType.Symbol, name: "count" },
            });
        });
    });

    describe("WHEN parsing mnemonics in lower case", () => {
        test("THEN they should be normalized", () => {
            expect(parseSingle("lda 5").statement).toMatchObject({
                type: NodeType.MemoryRef,
                mnemonic: "LDA",
                operand: { type: NodeType.Address, addr: 5 },
            });
            expect(parseSingle("cob").statement).toMatchObject({ type: NodeType.Halt, mnemonic: "COB" });
            expect(parseSingle("Hlt").statement).toMatchObject({ type: NodeType.Halt, mnemonic: "HLT" });
        });
    });

    describe("WHEN parsing data and origin statements", () => {
        test("THEN the value should be optional and keep its sign", () => {
            const empty = parseSingle("DAT").statement;
            expect(empty.type).toEqual(NodeType.Data);
            expect(empty.type == NodeType.Data && empty.value).toBeFalsy();
            expect(parseSingle("x DAT -5").statement).toMatchObject({ value: { sign: "-", value: "5" } });
            expect(parseSingle("DAT +7").statement).toMatchObject({ value: { sign: "+", value: "7" } });
            expect(parseSingle("DAT 42").statement).toMatchObject({ value: { value: "42" } });
        });

        test("THEN the origin should be an address", () => {
            expect(parseSingle("ORG 50").statement).toMatchObject({
                type: NodeType.Origin,
                addr: { addr: 50 },
            });
        });
    });

    describe("WHEN parsing blank lines and comments", () => {
        const prog = parse("\n# header\n\n  INP // read\n\tOUT\n");
        test("THEN only lines with operations should become instructions", () => {
            expect(prog.errors).toEqual([]);
            expect(prog.instructions.map(i => i.statement.type)).toEqual([NodeType.Input, NodeType.Output]);
            expect(prog.instructions[0].comment?.comment).toEqual(" read");
            expect(prog.instructions[0].end.separator).toEqual("\n");
            expect(prog.instructions[1].comment).toBeUndefined();
        });
    });

    describe("WHEN parsing invalid lines", () => {
        const expectations: [string, string, number, number][] = [
            ["INP OUT", "Expected instruction with single operation", 1, 5],
            ["ADD 100", "Address 100 out of range (0..99)", 1, 5],
            ["ADD 005", "Address 005 has more than two digits", 1, 5],
            ["ORG 0000050", "Address 0000050 has more than two digits", 1, 5],
            ["loop", "Operation expected after label loop, got EOF()", 1, 5],
            ["a b", "Unknown operation b", 1, 3],
            ["BRA add", "Reserved word add can't be used as label", 1, 5],
            ["HLT 5", "End of statement expected, got Integer(5)", 1, 5],
            ["DAT x", "End of statement expected, got Symbol(x)", 1, 5],
            ["5 HLT", "Label or operation expected, got Integer(5)", 1, 1],
            ["DAT - 5", "Number expected after '-', got Blank(' ')", 1, 6],
            ["ORG loop", "Address expected after ORG, got Symbol(loop)", 1, 5],
            ["HLT\nSTA\n", "Address or label expected after STA, got EOL('<LF>')", 2, 4],
        ];

        for (const [input, msg, line, col] of expectations) {
            test(`THEN '${input.replaceAll("\n", " ")}' should fail with '${msg}'`, () => {
                const prog = parse(input);
                expect(prog.errors.length).toEqual(1);
                expect(prog.errors[0].message).toEqual(msg);
                expect(prog.errors[0].line).toEqual(line);
                expect(prog.errors[0].col).toEqual(col);
            });
        }
    });

    describe("WHEN a line has an error", () => {
        const prog = parse("ADD\nHLT\nBRZ 123 x\nOUT");
        test("THEN parsing should continue with the next line", () => {
            expect(prog.errors.map(e => e.line)).toEqual([1, 3]);
            expect(prog.instructions.map(i => i.statement.type)).toEqual([NodeType.Halt, NodeType.Output]);
        });
    });
});
