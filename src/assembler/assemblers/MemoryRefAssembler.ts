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

import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { OpCode, encodeInstruction } from "../../machine/Opcode.js";
import { Context } from "../Context.js";
import { EmitType } from "../MemoryImage.js";
import { RegisterFunction, StatementEffect } from "../util/StatementEffect.js";

const MemoryRefOpCodes: Record<Nodes.MemoryRefMnemonic, OpCode> = {
    ADD: OpCode.ADD,
    SUB: OpCode.SUB,
    STA: OpCode.STA,
    LDA: OpCode.LDA,
    BRA: OpCode.BRA,
    BRZ: OpCode.BRZ,
    BRP: OpCode.BRP,
};

/**
 * Assembler for instructions with an address operand.
 * Operands are left pending even if they are literal addresses, the fix-up pass resolves all of them.
 */
export class MemoryRefAssembler {
    public registerStatements(register: RegisterFunction) {
        register(NodeType.MemoryRef, this.handleMemoryRef.bind(this));
    }

    private handleMemoryRef(_ctx: Context, stmt: Nodes.MemoryRefStatement): StatementEffect {
        const opcodeBase = encodeInstruction(MemoryRefOpCodes[stmt.mnemonic], 0);
        return {
            output: [{ type: EmitType.PendingRef, opcodeBase, operand: stmt.operand }],
        };
    }
}
