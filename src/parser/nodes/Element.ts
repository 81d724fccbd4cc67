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

import { CommentMarker, SignChr } from "../../lexer/Token.js";
import { BaseNode, NodeType } from "./Node.js";

// LOOP at the start of a line
export interface LabelDef extends BaseNode {
    type: NodeType.Label;
    sym: SymbolNode;
}

// label reference as operand
export interface SymbolNode extends BaseNode {
    type: NodeType.Symbol;
    name: string;
}

// 0..99 as operand
export interface AddressNode extends BaseNode {
    type: NodeType.Address;
    addr: number;
}

// -13 as data value
export interface IntegerNode extends BaseNode {
    // unparsed, range checking happens in the assembler
    type: NodeType.Integer;
    sign?: SignChr;
    value: string;
}

export type Operand = AddressNode | SymbolNode;

export interface StatementSeparator extends BaseNode {
    type: NodeType.Separator;
    separator: "\n" | "EOF";
}

export interface Comment extends BaseNode {
    type: NodeType.Comment;
    marker: CommentMarker;
    comment: string;
}
