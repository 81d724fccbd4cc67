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

import { MemoryImage } from "../assembler/MemoryImage.js";
import { WordBase } from "./Complement.js";
import { InputSource, OutputSink, toInputWord } from "./IOAdapters.js";
import { MachineError } from "./MachineError.js";
import { DecodedInstruction, Operation, decodeInstruction, toOperation } from "./Opcode.js";

export const MemorySize = 100;

export enum RunState {
    Running = "run",
    Halted = "halt",
    Aborted = "abort",
}

export interface MachineOptions {
    input?: InputSource;
    output?: OutputSink;
}

/**
 * A decimal accumulator machine with 100 words of three digits each.
 *
 * Every call to singleStep() runs one complete fetch, decode and execute cycle.
 * Runtime errors don't throw: they are stored in error and abort the machine.
 */
export class Machine {
    private mem = new Array<number>(MemorySize).fill(0);
    private input?: InputSource;
    private output?: OutputSink;
    private providedInput: number[] = [];

    private pc_ = 0;
    private acc_ = 0;
    private mar_ = 0;
    private mdr_ = 0;
    private cir_: DecodedInstruction = { opcode: 0, addr: 0 };
    private carry_ = 0;
    private isZero_ = true;
    private isNonNegative_ = true;
    private runState_ = RunState.Running;
    private error_?: string;

    public constructor(opts: MachineOptions = {}) {
        this.input = opts.input;
        this.output = opts.output;
        this.reset();
    }

    public get pc() {
        return this.pc_;
    }

    public get acc() {
        return this.acc_;
    }

    public get mar() {
        return this.mar_;
    }

    public get mdr() {
        return this.mdr_;
    }

    public get cir(): DecodedInstruction {
        return this.cir_;
    }

    // ACC div 1000 before the last truncation
    public get carry() {
        return this.carry_;
    }

    public get isZero() {
        return this.isZero_;
    }

    public get isNonNegative() {
        return this.isNonNegative_;
    }

    public get runState() {
        return this.runState_;
    }

    public get error(): string | undefined {
        return this.error_;
    }

    public setInput(input: InputSource | undefined) {
        this.input = input;
    }

    public setOutput(output: OutputSink | undefined) {
        this.output = output;
    }

    /**
     * Queues a signed number for the next INP instructions, ahead of the input source.
     */
    public provideInput(value: number) {
        this.providedInput.push(toInputWord(value));
    }

    public readMemory(addr: number): number {
        if (!this.isValidAddress(addr)) {
            throw new MachineError(`Invalid address ${addr}`);
        }
        return this.mem[addr];
    }

    public dumpMemory(): number[] {
        return [...this.mem];
    }

    /**
     * Resets registers and flags to their power-on state. Memory is kept.
     */
    public reset() {
        this.pc_ = 0;
        this.acc_ = 0;
        this.mar_ = 0;
        this.mdr_ = 0;
        this.cir_ = { opcode: 0, addr: 0 };
        this.carry_ = 0;
        this.setFlags();
        this.runState_ = RunState.Running;
        this.error_ = undefined;
        this.providedInput = [];
    }

    public clear() {
        this.mem.fill(0);
        this.reset();
    }

    /**
     * Writes an image into memory and resets the machine.
     * @throws MachineError if the image contains invalid addresses or values
     */
    public load(image: MemoryImage) {
        for (const { addr, value } of image) {
            if (!this.isValidAddress(addr)) {
                throw new MachineError(`Can't load to address ${addr}, memory is 0..${MemorySize - 1}`);
            }
            if (!Number.isInteger(value) || value < 0 || value >= WordBase) {
                throw new MachineError(`Can't load value ${value} to address ${addr}, words are 0..${WordBase - 1}`);
            }
            this.mar_ = addr;
            this.mdr_ = value;
            this.writeMem();
        }
        this.reset();
    }

    public singleStep() {
        if (this.runState_ != RunState.Running) {
            return;
        }

        this.fetch();
        this.decode();
        this.execute();
    }

    public run() {
        while (this.runState_ == RunState.Running) {
            this.singleStep();
        }
    }

    private fetch() {
        this.mar_ = this.pc_;
        this.readMem();
        this.pc_ = (this.pc_ + 1) % MemorySize;
    }

    private decode() {
        this.cir_ = decodeInstruction(this.mdr_);
        this.mar_ = this.cir_.addr;
        this.readMem();
    }

    private execute() {
        const op = toOperation(this.cir_);
        switch (op) {
            case Operation.Halt:
                this.runState_ = RunState.Halted;
                break;
            case Operation.Add:
                this.acc_ += this.mdr_;
                break;
            case Operation.Subtract:
                this.acc_ += WordBase - this.mdr_;
                break;
            case Operation.Store:
                this.mdr_ = this.acc_;
                this.writeMem();
                break;
            case Operation.Load:
                this.acc_ = this.mdr_;
                break;
            case Operation.Branch:
                this.pc_ = this.mar_;
                break;
            case Operation.BranchIfZero:
                if (this.isZero_) {
                    this.pc_ = this.mar_;
                }
                break;
            case Operation.BranchIfPositive:
                if (this.isNonNegative_) {
                    this.pc_ = this.mar_;
                }
                break;
            case Operation.Input: {
                const value = this.readInput();
                if (value === undefined) {
                    this.abort("End of input");
                    return;
                }
                if (!Number.isInteger(value) || value < 0 || value >= WordBase) {
                    this.abort(`Input out of range (0..${WordBase - 1}): ${value}`);
                    return;
                }
                this.acc_ = value;
                break;
            }
            case Operation.Output:
                this.output?.emit(this.acc_);
                break;
            case Operation.Invalid:
                this.abort(`Bad instruction ${this.cir_.opcode} ${this.cir_.addr}`);
                break;
            default: {
                const unhandled: never = op;
                throw Error(`Unhandled operation ${String(unhandled)}`);
            }
        }

        this.carry_ = Math.floor(this.acc_ / WordBase);
        this.acc_ %= WordBase;
        this.setFlags();
    }

    private readInput(): number | undefined {
        const provided = this.providedInput.shift();
        if (provided !== undefined) {
            return provided;
        }
        return this.input?.next();
    }

    private abort(msg: string) {
        this.error_ = msg;
        this.runState_ = RunState.Aborted;
    }

    private setFlags() {
        this.isZero_ = this.acc_ == 0;
        this.isNonNegative_ = this.acc_ < WordBase / 2;
    }

    private readMem() {
        this.mdr_ = this.mem[this.mar_];
    }

    private writeMem() {
        this.mem[this.mar_] = this.mdr_;
    }

    private isValidAddress(addr: number) {
        return Number.isInteger(addr) && addr >= 0 && addr < MemorySize;
    }
}
