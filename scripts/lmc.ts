#!/usr/bin/env node
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

import { command, extendType, flag, number, positional, restPositionals, run, string, subcommands } from "cmd-ts";
import { readFileSync } from "fs";
import { assemble, runProgram } from "../src/Lmc.js";
import { IntReader, IntWriter } from "../src/machine/IOAdapters.js";
import { Machine, RunState } from "../src/machine/Machine.js";
import { formatMemory, formatStatus } from "../src/machine/formatMachine.js";
import { CodeError, formatCodeError } from "../src/utils/CodeError.js";

const InputNumber = extendType(number, {
    displayName: "number",
    description: "Input number in -999..999",
    async from(n) {
        if (!Number.isInteger(n) || n < -999 || n > 999) {
            throw new Error(`Input ${n} is not an integer in -999..999`);
        }
        return n;
    },
});

const programArg = positional({
    type: string,
    displayName: "program",
    description: "Source file of the program",
});

const inputsArg = restPositionals({
    type: InputNumber,
    displayName: "inputs",
    description: "Numbers to feed to INP, put negative numbers after --",
});

function readSource(file: string): string {
    try {
        return readFileSync(file, "utf-8");
    } catch (e) {
        console.error(`Can't read ${file}: ${e instanceof Error ? e.message : String(e)}`);
        process.exit(-1);
    }
}

function exitOnCodeError<T>(action: () => T): T {
    try {
        return action();
    } catch (e) {
        if (e instanceof CodeError) {
            console.error(formatCodeError(e));
            process.exit(-1);
        }
        throw e;
    }
}

const runCmd = command({
    name: "run",
    description: "Assemble, load and run a program",
    args: {
        signed: flag({
            long: "signed",
            short: "s",
            description: "Print outputs as signed numbers",
        }),
        file: programArg,
        inputs: inputsArg,
    },

    handler: (args) => {
        const source = readSource(args.file);

        const result = exitOnCodeError(() => runProgram(source, args.inputs, {
            signed: args.signed,
            inputName: args.file,
        }));

        if (result.state == RunState.Aborted) {
            console.error(`Error: ${result.error}`);
            process.exit(-1);
        }
        console.log(`OK ${result.output.join(", ")}`);
    }
});

const traceCmd = command({
    name: "trace",
    description: "Assemble and load a program, then list the registers after each step",
    args: {
        dumpOnly: flag({
            long: "dump-only",
            short: "d",
            description: "Only print the final memory dump",
        }),
        file: programArg,
        inputs: inputsArg,
    },

    handler: (args) => {
        const source = readSource(args.file);

        const image = exitOnCodeError(() => assemble(source, args.file));

        const writer = new IntWriter();
        const machine = new Machine({
            input: new IntReader(args.inputs),
            output: writer,
        });
        machine.load(image);

        if (!args.dumpOnly) {
            console.log(formatStatus(machine));
        }
        while (machine.runState == RunState.Running) {
            machine.singleStep();
            if (!args.dumpOnly) {
                console.log(formatStatus(machine));
            }
        }

        formatMemory(machine, line => console.log(line));
        console.log(`Output: ${writer.toString()}`);
        process.exit(machine.runState == RunState.Halted ? 0 : -1);
    }
});

const cmd = subcommands({
    name: "lmc",
    description: "Assembler and emulator for a decimal teaching computer",
    cmds: {
        run: runCmd,
        trace: traceCmd,
    },
});

void run(cmd, process.argv.slice(2));
