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

import { padNum } from "../utils/Strings.js";
import { Machine, MemorySize } from "./Machine.js";
import { DecodedInstruction, Operation, toOperation } from "./Opcode.js";

const ColumnCount = 10;

export function disassemble(inst: DecodedInstruction): string {
    const { opcode, addr } = inst;
    const op = toOperation(inst);
    switch (op) {
        case Operation.Halt:                return "HLT";
        case Operation.Add:                 return `ADD ${addr}`;
        case Operation.Subtract:            return `SUB ${addr}`;
        case Operation.Store:               return `STA ${addr}`;
        case Operation.Load:                return `LDA ${addr}`;
        case Operation.Branch:              return `BRA ${addr}`;
        case Operation.BranchIfZero:        return `BRZ ${addr}`;
        case Operation.BranchIfPositive:    return `BRP ${addr}`;
        case Operation.Input:               return "INP";
        case Operation.Output:              return "OUT";
        case Operation.Invalid:             return `undefined (${opcode}, ${addr})`;
    }
}

/**
 * Renders the memory as 10x10 grid, followed by the current instruction.
 */
export function formatMemory(machine: Machine, write: (line: string) => void) {
    const mem = machine.dumpMemory();
    const separator = "-".repeat(5 + 6 * ColumnCount);

    let header = "MEMORY";
    for (let col = 0; col < ColumnCount; col++) {
        header += col == 0 ? "   0" : `${col}`.padStart(6);
    }
    write(header);
    write(separator);
    for (let row = 0; row < MemorySize; row += ColumnCount) {
        let line = `${row}`.padStart(3) + ": ";
        for (let col = 0; col < ColumnCount; col++) {
            line += " " + `${mem[row + col]}`.padStart(5);
        }
        write(line);
    }
    write(separator);
    write(`        Current instruction: ${disassemble(machine.cir)}`);
}

export function formatStatus(machine: Machine): string {
    const cir = machine.cir;
    const flag = (set: boolean) => set ? "1" : "0";

    let status = [
        `PC=${padNum(machine.pc, 2)}`,
        `ACC=${padNum(machine.acc, 3)}`,
        `MAR=${padNum(machine.mar, 2)}`,
        `MDR=${padNum(machine.mdr, 3)}`,
        `CIR=${cir.opcode}${padNum(cir.addr, 2)} (${disassemble(cir)})`,
        `Z=${flag(machine.isZero)}`,
        `P=${flag(machine.isNonNegative)}`,
        machine.runState.toUpperCase(),
    ].join(" ");

    if (machine.error) {
        status += `: ${machine.error}`;
    }
    return status;
}
