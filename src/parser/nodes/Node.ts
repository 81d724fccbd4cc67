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

import { CursorExtent } from "../../lexer/Cursor.js";
import { CodeError } from "../../utils/CodeError.js";
import { AddressNode, Comment, IntegerNode, LabelDef, StatementSeparator, SymbolNode } from "./Element.js";
import { Statement } from "./Statement.js";

export * from "./Element.js";
export * from "./Statement.js";

export enum NodeType {
    // Program
    Program, Instruction,

    // Statement
    Halt, Input, Output,
    MemoryRef, Data, Origin,

    // Elements
    Label, Symbol, Address, Integer,
    Separator, Comment,
}

export type Node =
    Program | Instruction | Statement |
    LabelDef | SymbolNode | AddressNode | IntegerNode |
    StatementSeparator | Comment;

export interface BaseNode {
    type: NodeType;
    extent: CursorExtent;
}

export interface Program extends BaseNode {
    type: NodeType.Program;
    inputName: string;
    instructions: Instruction[];
    errors: CodeError[];
}

// [label] statement [comment]
export interface Instruction extends BaseNode {
    type: NodeType.Instruction;
    label?: LabelDef;
    statement: Statement;
    comment?: Comment;
    end: StatementSeparator;
}
