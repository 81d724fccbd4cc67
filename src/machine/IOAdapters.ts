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

import { WordBase, toSigned, toUnsigned } from "./Complement.js";

export interface InputSource {
    // undefined signals the end of the input
    next(): number | undefined;
}

export interface OutputSink {
    emit(value: number): void;
}

/**
 * Converts a signed input number to a word. Numbers that have no word are passed through
 * unchanged so that the machine can reject them.
 */
export function toInputWord(value: number): number {
    if (value < 0 && value > -WordBase) {
        return toUnsigned(value);
    }
    return value;
}

/**
 * Feeds a fixed list of signed numbers to the machine.
 */
export class IntReader implements InputSource {
    private pos = 0;

    public constructor(private values: readonly number[]) {
    }

    public next(): number | undefined {
        if (this.pos >= this.values.length) {
            return undefined;
        }
        return toInputWord(this.values[this.pos++]);
    }

    public rewind() {
        this.pos = 0;
    }
}

export interface IntWriterOptions {
    // interpret the output words as tens-complement numbers
    signed?: boolean;

    // separator for toString(), ", " if not set
    separator?: string;
}

/**
 * Collects the output of the machine.
 */
export class IntWriter implements OutputSink {
    private values: number[] = [];
    private opts: IntWriterOptions;

    public constructor(opts: IntWriterOptions = {}) {
        this.opts = opts;
    }

    public emit(value: number) {
        this.values.push(this.opts.signed ? toSigned(value) : value);
    }

    public reset() {
        this.values = [];
    }

    public get data(): number[] {
        return [...this.values];
    }

    public toString(): string {
        return this.values.join(this.opts.separator ?? ", ");
    }
}
