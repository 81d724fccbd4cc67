/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { Assembler } from "./assembler/Assembler.js";
import { MemoryImage } from "./assembler/MemoryImage.js";
import { IntReader, IntWriter } from "./machine/IOAdapters.js";
import { Machine, RunState } from "./machine/Machine.js";

export const DefaultInputName = "input.lmc";

/**
 * Assembles a single source text.
 * @throws CodeError on the first syntax or assembly error
 */
export function assemble(source: string, inputName = DefaultInputName): MemoryImage {
    const asm = new Assembler();
    asm.parseInput(inputName, source);
    return asm.assemble();
}

export interface RunOptions {
    // report outputs as tens-complement numbers
    signed?: boolean;
    inputName?: string;
}

export interface RunResult {
    state: RunState;
    output: number[];
    error?: string;
    machine: Machine;
}

/**
 * Assembles a program and runs it until it halts or aborts.
 * @throws CodeError if the program doesn't assemble
 */
export function runProgram(source: string, inputs: readonly number[], opts: RunOptions = {}): RunResult {
    const image = assemble(source, opts.inputName);
    const writer = new IntWriter({ signed: opts.signed });
    const machine = new Machine({
        input: new IntReader(inputs),
        output: writer,
    });
    machine.load(image);
    machine.run();

    return {
        state: machine.runState,
        output: writer.data,
        error: machine.error,
        machine,
    };
}
