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
import { Lexer } from "../../lexer/Lexer.js";
import * as Tokens from "../../lexer/Token.js";
import { TokenType } from "../../lexer/Token.js";
import { tokenToString } from "../../lexer/formatToken.js";
import { ParserError } from "../ParserError.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";
import { CommonParser } from "./CommonParser.js";
import { MnemonicParser } from "./MnemonicParser.js";

export class StatementParser {
    private commonParser: CommonParser;
    private mnemonicParser: MnemonicParser;

    public constructor(private lexer: Lexer) {
        this.commonParser = new CommonParser(this.lexer);
        this.mnemonicParser = new MnemonicParser(this.lexer, this.commonParser);
    }

    /**
     * Parses the next non-empty line.
     * @returns the instruction or undefined at the end of the input
     */
    public parseInstruction(): Nodes.Instruction | undefined {
        let tok = this.skipEmptyLines();
        if (tok.type == TokenType.EOF) {
            return undefined;
        }

        let label: Nodes.LabelDef | undefined;
        let statement = this.parseStatementOrLabel(tok);
        if (statement.type == NodeType.Label) {
            label = statement;
            tok = this.lexer.nextNonBlank();
            if (tok.type != TokenType.Symbol) {
                throw this.commonParser.errorAt(
                    `Operation expected after label ${label.sym.name}, got ${tokenToString(tok)}`, tok
                );
            }
            statement = this.parseStatementOrLabel(tok);
            if (statement.type == NodeType.Label) {
                throw new ParserError(`Unknown operation ${statement.sym.name}`, statement);
            }
        }

        let comment: Nodes.Comment | undefined;
        tok = this.lexer.nextNonBlank();
        if (tok.type == TokenType.Comment) {
            comment = this.commonParser.parseComment(tok);
            tok = this.lexer.nextNonBlank();
        } else if (tok.type == TokenType.Symbol && MnemonicParser.isMnemonic(tok.name)) {
            throw new ParserError("Expected instruction with single operation", tok);
        }
        const end = this.commonParser.parseStatementEnd(tok);

        return {
            type: NodeType.Instruction, label, statement, comment, end,
            extent: calcExtent(label ?? statement, comment ?? statement),
        };
    }

    // blank lines and lines with only a comment carry no instruction
    private skipEmptyLines(): Tokens.Token {
        while (true) {
            const tok = this.lexer.nextNonBlank();
            if (tok.type == TokenType.Comment) {
                this.commonParser.parseStatementEnd();
            } else if (tok.type != TokenType.EOL) {
                return tok;
            }
        }
    }

    private parseStatementOrLabel(tok: Tokens.Token): Nodes.Statement | Nodes.LabelDef {
        if (tok.type != TokenType.Symbol) {
            throw new ParserError(`Label or operation expected, got ${tokenToString(tok)}`, tok);
        }

        const statement = this.mnemonicParser.tryHandleMnemonic(tok);
        if (statement) {
            return statement;
        }
        return this.commonParser.parseLabelDef(tok);
    }
}
