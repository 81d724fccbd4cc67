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

import { HasExtent } from "../lexer/Cursor.js";
import { MemorySize } from "../machine/Machine.js";
import { Parser } from "../parser/Parser.js";
import * as Nodes from "../parser/nodes/Node.js";
import { NodeType } from "../parser/nodes/Node.js";
import { CodeError } from "../utils/CodeError.js";
import { AssemblerError } from "./AssemblerError.js";
import { Context } from "./Context.js";
import { EmitType, Emission, Emitted, MemoryImage, MemoryWord } from "./MemoryImage.js";
import { LabelSymbol } from "./SymbolData.js";
import { SymbolTable } from "./SymbolTable.js";
import { DataAssembler } from "./assemblers/DataAssembler.js";
import { MemoryRefAssembler } from "./assemblers/MemoryRefAssembler.js";
import { OriginAssembler } from "./assemblers/OriginAssembler.js";
import { RegisterFunction, StatementHandler } from "./util/StatementEffect.js";

export class Assembler {
    private syms = new SymbolTable();

    private programs: Nodes.Program[] = [];
    private stmtHandlers: StatementHandler<Nodes.Statement>[] = [];

    public constructor() {
        this.registerStatements(this.registerStatement.bind(this));
    }

    private registerStatements(register: RegisterFunction) {
        for (const cons of [DataAssembler, MemoryRefAssembler, OriginAssembler]) {
            const sub = new cons();
            sub.registerStatements(register);
        }
    }

    private registerStatement<T extends Nodes.Statement>(type: T["type"], handler: StatementHandler<T>) {
        if (this.stmtHandlers[type]) {
            throw Error(`Multiple handlers for ${NodeType[type]}`);
        }

        // storing as if it was a generic handler for any handler, so promise:
        // only calling [x] with matching type index
        this.stmtHandlers[type] = handler as StatementHandler<Nodes.Statement>;
    }

    public parseInput(name: string, input: string): Nodes.Program {
        const parser = new Parser(name, input);
        const prog = parser.parseProgram();
        this.programs.push(prog);
        return prog;
    }

    public getSymbols(): ReadonlyMap<string, LabelSymbol> {
        return this.syms.getSymbols();
    }

    /**
     * Assembles all inputs in the order they were added.
     * Assembly stops at the first error, so there is never a partial image.
     * @throws CodeError
     */
    public assemble(): MemoryImage {
        const parseErrors = this.programs.map(p => p.errors).flat();
        if (parseErrors.length > 0) {
            throw parseErrors[0];
        }

        // pass 1: assign all labels and emit words, leaving memory references pending
        this.syms.clear();
        const emitted: Emitted[] = [];
        let ctx = new Context();
        for (const prog of this.programs) {
            ctx = this.assembleProgram(ctx, prog, emitted);
        }

        // pass 2: all labels are known now, so the pending references can be resolved
        return emitted.map(e => this.resolve(e));
    }

    private assembleProgram(ctx: Context, prog: Nodes.Program, emitted: Emitted[]): Context {
        for (const inst of prog.instructions) {
            if (inst.label) {
                const label = inst.label;
                this.guarded(label, () => this.defineLabel(label, ctx));
            }
            ctx = this.guarded(inst.statement, () => this.handleStatement(ctx, inst.statement, emitted));
        }
        return ctx;
    }

    private defineLabel(label: Nodes.LabelDef, ctx: Context) {
        const clc = ctx.getClc();
        if (clc >= MemorySize) {
            throw Error(`Label ${label.sym.name} is outside memory at address ${clc}`);
        }
        this.syms.defineLabel(label.sym.name, clc, label);
    }

    private handleStatement(ctx: Context, stmt: Nodes.Statement, emitted: Emitted[]): Context {
        const handler = this.stmtHandlers[stmt.type];
        if (!handler) {
            throw Error(`No handler for ${NodeType[stmt.type]}`);
        }

        const effect = handler(ctx, stmt);

        if (effect.output !== undefined) {
            ctx = this.doOutput(ctx, effect.output, emitted);
        }

        if (effect.setOrigin !== undefined) {
            ctx = ctx.withCLC(effect.setOrigin);
        }

        return ctx;
    }

    private doOutput(ctx: Context, output: Emission[], emitted: Emitted[]): Context {
        let addr = ctx.getClc();
        for (const word of output) {
            if (addr >= MemorySize) {
                throw Error(`Program exceeds memory at address ${addr}`);
            }
            emitted.push({ ...word, addr: addr++ });
        }
        return ctx.withCLC(addr);
    }

    private resolve(word: Emitted): MemoryWord {
        switch (word.type) {
            case EmitType.Literal:
                return { addr: word.addr, value: word.value };
            case EmitType.PendingRef: {
                const operand = word.operand;
                const target = this.guarded(operand, () => {
                    if (operand.type == NodeType.Address) {
                        return operand.addr;
                    }
                    return this.syms.lookup(operand.name).value;
                });
                return { addr: word.addr, value: word.opcodeBase + target };
            }
        }
    }

    // attaches the position of a node to plain errors
    private guarded<T>(node: HasExtent, action: () => T): T {
        try {
            return action();
        } catch (e) {
            if (e instanceof CodeError) {
                throw e;
            } else if (e instanceof Error) {
                throw new AssemblerError(e.message, node);
            }
            throw e;
        }
    }
}
