import { Assembler } from "../../../src/assembler/Assembler.js";
import { MemoryImage } from "../../../src/assembler/MemoryImage.js";
import { CodeError } from "../../../src/utils/CodeError.js";

export interface TestData {
    asm: Assembler;
    image: MemoryImage;
    symbols: Record<string, number>;
    memory: number[];
}

export function assemble(input: string): TestData {
    const asm = new Assembler();
    asm.parseInput("test.lmc", input);
    const image = asm.assemble();

    const memory: number[] = [];
    for (const word of image) {
        memory[word.addr] = word.value;
    }

    const symbols: Record<string, number> = {};
    for (const sym of asm.getSymbols().values()) {
        symbols[sym.name] = sym.value;
    }

    return { asm, image, symbols, memory };
}

export function assembleError(input: string): CodeError {
    try {
        assemble(input);
    } catch (e) {
        if (e instanceof CodeError) {
            return e;
        }
        throw e;
    }
    throw Error("Expected assembler error");
}
