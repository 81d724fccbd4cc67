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
import { parseIntSafe } from "../../utils/Strings.js";
import { ParserError } from "../ParserError.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";

export const MaxAddress = 99;

export class CommonParser {
    public constructor(private lexer: Lexer) {
    }

    public parseSymbol(tok: Tokens.SymbolToken): Nodes.SymbolNode {
        return { type: NodeType.Symbol, name: tok.name, extent: tok.extent };
    }

    public parseLabelDef(tok: Tokens.SymbolToken): Nodes.LabelDef {
        return { type: NodeType.Label, sym: this.parseSymbol(tok), extent: tok.extent };
    }

    public parseAddress(tok: Tokens.IntegerToken): Nodes.AddressNode {
        const addr = parseIntSafe(tok.value);
        if (addr > MaxAddress) {
            throw new ParserError(`Address ${tok.value} out of range (0..${MaxAddress})`, tok);
        } else if (tok.value.length > 2) {
            throw new ParserError(`Address ${tok.value} has more than two digits`, tok);
        }
        return { type: NodeType.Address, addr, extent: tok.extent };
    }

    // DAT values are optional, so this returns undefined if there is none
    public tryParseInteger(): Nodes.IntegerNode | undefined {
        const tok = this.lexer.nextNonBlank();
        switch (tok.type) {
            case TokenType.Integer:
                return { type: NodeType.Integer, value: tok.value, extent: tok.extent };
            case TokenType.Char: {
                const digits = this.lexer.next();
                if (digits.type != TokenType.Integer) {
                    throw this.errorAt(`Number expected after '${tok.char}', got ${tokenToString(digits)}`, digits);
                }
                return {
                    type: NodeType.Integer,
                    sign: tok.char,
                    value: digits.value,
                    extent: calcExtent(tok, digits),
                };
            }
            default:
                this.lexer.unget(tok);
                return undefined;
        }
    }

    public parseSeparator(tok: Tokens.EOLToken | Tokens.EOFToken): Nodes.StatementSeparator {
        if (tok.type == TokenType.EOL) {
            return { type: NodeType.Separator, separator: "\n", extent: tok.extent };
        } else {
            return { type: NodeType.Separator, separator: "EOF", extent: tok.extent };
        }
    }

    public parseComment(tok: Tokens.CommentToken): Nodes.Comment {
        return { type: NodeType.Comment, marker: tok.marker, comment: tok.comment, extent: tok.extent };
    }

    public isStatementEnd(tok: Tokens.Token): tok is Tokens.EOLToken | Tokens.EOFToken {
        return tok.type == TokenType.EOL || tok.type == TokenType.EOF;
    }

    public parseStatementEnd(gotTok?: Tokens.Token): Nodes.StatementSeparator {
        const tok = this.lexer.nextNonBlank(gotTok);
        if (this.isStatementEnd(tok)) {
            return this.parseSeparator(tok);
        }
        throw new ParserError(`End of statement expected, got ${tokenToString(tok)}`, tok);
    }

    /**
     * Creates a ParserError at the given token. A line end is handed back to the lexer first
     * so that error recovery does not swallow the following line.
     */
    public errorAt(msg: string, tok: Tokens.Token): ParserError {
        if (this.isStatementEnd(tok)) {
            this.lexer.unget(tok);
        }
        return new ParserError(msg, tok);
    }
}
