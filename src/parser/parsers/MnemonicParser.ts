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

import { calcExtent } from "../../lexer/Cursor.js";
import { tokenToString } from "../../lexer/formatToken.js";
import { Lexer } from "../../lexer/Lexer.js";
import * as Tokens from "../../lexer/Token.js";
import { TokenType } from "../../lexer/Token.js";
import { normalizeSymbolName } from "../../utils/Strings.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";
import { CommonParser } from "./CommonParser.js";

type MnemonicHandler = (symbol: Tokens.SymbolToken) => Nodes.Statement;

export class MnemonicParser {
    public static readonly SupportedMnemonics: readonly Nodes.Mnemonic[] = [
        "HLT",  "COB",
        "ADD",  "SUB",  "STA",  "LDA",
        "BRA",  "BRZ",  "BRP",
        "INP",  "OUT",
        "DAT",  "ORG",
    ];
    private mnemonicActions = new Map<string, MnemonicHandler>();

    public constructor(private lexer: Lexer, private commonParser: CommonParser) {
        this.registerMnemonics((mnemonic, action) => {
            this.mnemonicActions.set(normalizeSymbolName(mnemonic), action);
        });
    }

    public static isMnemonic(name: string): boolean {
        const normName = normalizeSymbolName(name);
        return MnemonicParser.SupportedMnemonics.some(m => normalizeSymbolName(m) == normName);
    }

    private registerMnemonics(mkMnemonic: (mnemonic: Nodes.Mnemonic, action: MnemonicHandler) => void) {
        mkMnemonic("HLT", token => this.parseHalt("HLT", token));
        mkMnemonic("COB", token => this.parseHalt("COB", token));

        for (const ref of ["ADD", "SUB", "STA", "LDA", "BRA", "BRZ", "BRP"] as const) {
            mkMnemonic(ref, token => this.parseMemoryRef(ref, token));
        }

        mkMnemonic("INP", token => this.parseWithoutParam<Nodes.InputStatement>(NodeType.Input, token));
        mkMnemonic("OUT", token => this.parseWithoutParam<Nodes.OutputStatement>(NodeType.Output, token));
        mkMnemonic("DAT", token => this.parseData(token));
        mkMnemonic("ORG", token => this.parseOrigin(token));
    }

    public tryHandleMnemonic(startSym: Tokens.SymbolToken): Nodes.Statement | undefined {
        const handler = this.mnemonicActions.get(normalizeSymbolName(startSym.name));
        if (!handler) {
            return undefined;
        }
        return handler(startSym);
    }

    private parseWithoutParam<T extends Nodes.InputStatement | Nodes.OutputStatement>(
        type: T["type"],
        token: Tokens.SymbolToken
    ) {
        return {
            type: type,
            extent: token.extent,
        };
    }

    private parseHalt(mnemonic: Nodes.HaltMnemonic, token: Tokens.SymbolToken): Nodes.HaltStatement {
        return {
            type: NodeType.Halt,
            mnemonic: mnemonic,
            extent: token.extent,
        };
    }

    private parseMemoryRef(mnemonic: Nodes.MemoryRefMnemonic, token: Tokens.SymbolToken): Nodes.MemoryRefStatement {
        const operand = this.parseOperand(token);
        return {
            type: NodeType.MemoryRef,
            mnemonic: mnemonic,
            operand: operand,
            extent: calcExtent(token, operand),
        };
    }

    private parseData(token: Tokens.SymbolToken): Nodes.DataStatement {
        const value = this.commonParser.tryParseInteger();
        return {
            type: NodeType.Data,
            value: value,
            extent: calcExtent(token, value),
        };
    }

    private parseOrigin(token: Tokens.SymbolToken): Nodes.OriginStatement {
        const next = this.lexer.nextNonBlank();
        if (next.type != TokenType.Integer) {
            throw this.commonParser.errorAt(`Address expected after ${token.name}, got ${tokenToString(next)}`, next);
        }
        const addr = this.commonParser.parseAddress(next);
        return {
            type: NodeType.Origin,
            addr: addr,
            extent: calcExtent(token, addr),
        };
    }

    private parseOperand(token: Tokens.SymbolToken): Nodes.Operand {
        const next = this.lexer.nextNonBlank();
        switch (next.type) {
            case TokenType.Integer:
                return this.commonParser.parseAddress(next);
            case TokenType.Symbol:
                if (MnemonicParser.isMnemonic(next.name)) {
                    throw this.commonParser.errorAt(`Reserved word ${next.name} can't be used as label`, next);
                }
                return this.commonParser.parseSymbol(next);
        }
        throw this.commonParser.errorAt(`Address or label expected after ${token.name}, got ${tokenToString(next)}`, next);
    }
}
