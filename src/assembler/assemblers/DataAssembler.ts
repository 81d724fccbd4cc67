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
import { toUnsigned } from "../../machine/Complement.js";
import { IOFunction, OpCode, encodeInstruction } from "../../machine/Opcode.js";
import { parseIntSafe } from "../../utils/Strings.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { EmitType, Emission } from "../MemoryImage.js";
import { RegisterFunction, StatementEffect } from "../util/StatementEffect.js";

export const MaxDataValue = 999;

/**
 * Assembler for statements that produce a final word right away.
 */
export class DataAssembler {
    public registerStatements(register: RegisterFunction) {
        register(NodeType.Halt, this.handleHalt.bind(this));
        register(NodeType.Input, this.handleInput.bind(this));
        register(NodeType.Output, this.handleOutput.bind(this));
        register(NodeType.Data, this.handleData.bind(this));
    }

    private handleHalt(_ctx: Context, _stmt: Nodes.HaltStatement): StatementEffect {
        return { output: [literal(encodeInstruction(OpCode.HLT, 0))] };
    }

    private handleInput(_ctx: Context, _stmt: Nodes.InputStatement): StatementEffect {
        return { output: [literal(encodeInstruction(OpCode.IO, IOFunction.INP))] };
    }

    private handleOutput(_ctx: Context, _stmt: Nodes.OutputStatement): StatementEffect {
        return { output: [literal(encodeInstruction(OpCode.IO, IOFunction.OUT))] };
    }

    private handleData(_ctx: Context, stmt: Nodes.DataStatement): StatementEffect {
        if (!stmt.value) {
            return { output: [literal(0)] };
        }

        let value = parseIntSafe(stmt.value.value);
        if (stmt.value.sign == "-") {
            value = -value;
        }

        if (value < -MaxDataValue || value > MaxDataValue) {
            throw new AssemblerError(`Value ${value} out of range [-${MaxDataValue} ... +${MaxDataValue}]`, stmt.value);
        }
        return { output: [literal(toUnsigned(value))] };
    }
}

function literal(value: number): Emission {
    return { type: EmitType.Literal, value };
}
