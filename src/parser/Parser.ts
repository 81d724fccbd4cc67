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

import { calcExtent } from "../lexer/Cursor.js";
import { Lexer } from "../lexer/Lexer.js";
import { CodeError } from "../utils/CodeError.js";
import { ParserError } from "./ParserError.js";
import * as Nodes from "./nodes/Node.js";
import { NodeType } from "./nodes/Node.js";
import { StatementParser } from "./parsers/StatementParser.js";

export class Parser {
    private lexer: Lexer;
    private stmtParser: StatementParser;

    public constructor(inputName: string, input: string) {
        this.lexer = new Lexer(inputName, input);
        this.stmtParser = new StatementParser(this.lexer);
    }

    public parseProgram(): Nodes.Program {
        const prog: Nodes.Program = {
            type: NodeType.Program,
            inputName: this.lexer.getInputName(),
            instructions: [],
            errors: [],
            extent: {
                cursor: this.lexer.getCursor(),
                width: 0, // will be corrected below
            },
        };

        while (true) {
            try {
                const inst = this.stmtParser.parseInstruction();
                if (!inst) {
                    break;
                }

                prog.instructions.push(inst);
            } catch (e) {
                if (e instanceof CodeError) {
                    prog.errors.push(e);
                } else if (e instanceof Error) {
                    prog.errors.push(new ParserError(e.message, { extent: { cursor: this.lexer.getCursor(), width: 0 } }));
                } else {
                    throw e;
                }
                this.lexer.ignoreCurrentLine();
            }
        }

        if (prog.instructions.length > 0) {
            prog.extent.width = calcExtent(prog, prog.instructions[prog.instructions.length - 1]).width;
        }

        return prog;
    }
}
