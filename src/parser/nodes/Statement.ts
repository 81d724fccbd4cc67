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

import { AddressNode, IntegerNode, Operand } from "./Element.js";
import { BaseNode, NodeType } from "./Node.js";

export type HaltMnemonic = "HLT" | "COB";
export type MemoryRefMnemonic = "ADD" | "SUB" | "STA" | "LDA" | "BRA" | "BRZ" | "BRP";
export type Mnemonic = HaltMnemonic | MemoryRefMnemonic | "INP" | "OUT" | "DAT" | "ORG";

export type Statement =
    HaltStatement | InputStatement | OutputStatement |
    MemoryRefStatement | DataStatement | OriginStatement;

// HLT, COB
export interface HaltStatement extends BaseNode {
    type: NodeType.Halt;
    mnemonic: HaltMnemonic;
}

// INP
export interface InputStatement extends BaseNode {
    type: NodeType.Input;
}

// OUT
export interface OutputStatement extends BaseNode {
    type: NodeType.Output;
}

// ADD 12, BRZ LOOP
export interface MemoryRefStatement extends BaseNode {
    type: NodeType.MemoryRef;
    mnemonic: MemoryRefMnemonic;
    operand: Operand;
}

// DAT, DAT -5
export interface DataStatement extends BaseNode {
    type: NodeType.Data;
    value?: IntegerNode;
}

// ORG 50
export interface OriginStatement extends BaseNode {
    type: NodeType.Origin;
    addr: AddressNode;
}
