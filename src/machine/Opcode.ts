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

// The opcode is the hundreds digit of a word, the remaining two digits are the address.
export enum OpCode {
    HLT = 0,
    ADD = 1,
    SUB = 2,
    STA = 3,
    LDA = 5,
    BRA = 6,
    BRZ = 7,
    BRP = 8,
    IO = 9,
}

// the address digits select the function of an IO instruction
export enum IOFunction {
    INP = 1,
    OUT = 2,
}

export enum Operation {
    Halt,
    Add,
    Subtract,
    Store,
    Load,
    Branch,
    BranchIfZero,
    BranchIfPositive,
    Input,
    Output,
    Invalid,
}

export interface DecodedInstruction {
    readonly opcode: number;
    readonly addr: number;
}

export function encodeInstruction(opcode: OpCode, addr: number): number {
    return opcode * 100 + addr;
}

export function decodeInstruction(word: number): DecodedInstruction {
    return { opcode: Math.floor(word / 100), addr: word % 100 };
}

export function toOperation(inst: DecodedInstruction): Operation {
    switch (inst.opcode) {
        case OpCode.HLT:    return Operation.Halt;
        case OpCode.ADD:    return Operation.Add;
        case OpCode.SUB:    return Operation.Subtract;
        case OpCode.STA:    return Operation.Store;
        case OpCode.LDA:    return Operation.Load;
        case OpCode.BRA:    return Operation.Branch;
        case OpCode.BRZ:    return Operation.BranchIfZero;
        case OpCode.BRP:    return Operation.BranchIfPositive;
        case OpCode.IO:
            switch (inst.addr) {
                case IOFunction.INP:    return Operation.Input;
                case IOFunction.OUT:    return Operation.Output;
            }
            return Operation.Invalid;
    }
    return Operation.Invalid;
}
