import { AssemblerError } from "../../../src/assembler/AssemblerError.js";
import { assemble, runProgram } from "../../../src/Lmc.js";
import { RunState } from "../../../src/machine/Machine.js";
import { formatCodeError } from "../../../src/utils/CodeError.js";

const AddProgram = `
        INP
        STA a
        INP
        ADD a
        OUT
        HLT
a       DAT
`;

const SubtractProgram = `
        INP
        STA a
        INP
        STA b
        LDA a
        SUB b
        OUT
        HLT
a       DAT
b       DAT
`;

const CountdownProgram = `
        INP
loop    OUT         // print and decrement until negative
        SUB one
        BRP loop
        HLT
one     DAT 1
`;

describe("GIVEN the addition program", () => {
    test("THEN it should assemble to the expected words", () => {
        expect(assemble(AddProgram)).toEqual([
            { addr: 0, value: 901 },
            { addr: 1, value: 306 },
            { addr: 2, value: 901 },
            { addr: 3, value: 106 },
            { addr: 4, value: 902 },
            { addr: 5, value: 0 },
            { addr: 6, value: 0 },
        ]);
    });

    const expectations: [number, number, number][] = [
        [17, 4, 21],
        [0, 0, 0],
        [1, 998, 999],
        [999, 1, 0],
        [499, 499, 998],
        [-1, 1, 0],
    ];

    for (const [x, y, sum] of expectations) {
        test(`THEN ${x} + ${y} should output ${sum}`, () => {
            const result = runProgram(AddProgram, [x, y]);
            expect(result.state).toEqual(RunState.Halted);
            expect(result.error).toBeUndefined();
            expect(result.output).toEqual([sum]);
        });
    }

    test("THEN the first input should stay in memory", () => {
        const result = runProgram(AddProgram, [-2, 1]);
        expect(result.output).toEqual([999]);
        expect(result.machine.readMemory(6)).toEqual(998);
    });
});

describe("GIVEN the subtraction program", () => {
    const expectations: [number, number, number][] = [
        [4, 17, -13],
        [17, 4, 13],
        [0, 1, -1],
        [1, 498, -497],
        [999, 1, -2],
        [5, 5, 0],
    ];

    for (const [x, y, diff] of expectations) {
        test(`THEN ${x} - ${y} should output ${diff} when signed`, () => {
            const result = runProgram(SubtractProgram, [x, y], { signed: true });
            expect(result.state).toEqual(RunState.Halted);
            expect(result.output).toEqual([diff]);
        });
    }

    test("THEN the output should be a word when unsigned", () => {
        expect(runProgram(SubtractProgram, [4, 17]).output).toEqual([987]);
    });
});

describe("GIVEN a loop", () => {
    test("THEN it should run until the branch is not taken", () => {
        const result = runProgram(CountdownProgram, [3]);
        expect(result.state).toEqual(RunState.Halted);
        expect(result.output).toEqual([3, 2, 1, 0]);
        expect(result.machine.acc).toEqual(999);
    });
});

describe("GIVEN a program reading more inputs than provided", () => {
    const result = runProgram(AddProgram, [5]);
    test("THEN the run should abort without throwing", () => {
        expect(result.state).toEqual(RunState.Aborted);
        expect(result.error).toEqual("End of input");
        expect(result.output).toEqual([]);
        expect(result.machine.pc).toEqual(3);
    });
});

describe("GIVEN a program that does not assemble", () => {
    test("THEN running it should throw the position of the error", () => {
        expect(() => runProgram("DAT 1000", [])).toThrowError(AssemblerError);
        try {
            runProgram("HLT\n  BRA end", [], { inputName: "broken.lmc" });
        } catch (e) {
            expect(e).toBeInstanceOf(AssemblerError);
            expect(e instanceof AssemblerError && formatCodeError(e)).toEqual("broken.lmc:2:7: Undefined label end");
            return;
        }
        throw Error("Expected assembler error");
    });
});
