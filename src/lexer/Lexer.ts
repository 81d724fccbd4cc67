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

import { LexerError } from "./LexerError.js";
import { replaceNonPrints } from "../utils/Strings.js";
import { Cursor, CursorExtent } from "./Cursor.js";
import * as Tokens from "./Token.js";
import { TokenType } from "./Token.js";

export class Lexer {
    private static SymbolRegex = /^([A-Z_][A-Z0-9_]*)/i;
    private static IntRegex = /^([0-9]+)/;
    private static CommentRegEx = /^(#|\/\/)([^\n]*)/;
    private inputName: string;
    private inputData: string;
    private cursor: Cursor;
    private scanTable: Record<number, (data: string) => Tokens.Token> = [];

    private ungetCache?: Tokens.Token;
    private ungetCursor?: Cursor;

    public constructor(inputName: string, input: string) {
        this.inputName = inputName;
        this.inputData = input;

        this.cursor = {
            inputName: inputName,
            dataIdx: 0,
            colIdx: 0,
            lineIdx: 0,
        };

        this.fillScanTable();
    }

    public getInputName(): string {
        return this.inputName;
    }

    public getCursor(): Cursor {
        return this.cursor;
    }

    public next(): Tokens.Token {
        if (this.ungetCache && this.ungetCursor && this.ungetCache.extent.cursor.dataIdx == this.cursor.dataIdx) {
            const res = this.ungetCache;
            this.cursor = this.ungetCursor;
            this.ungetCache = undefined;
            this.ungetCursor = undefined;
            return res;
        }

        const data = this.inputData;
        if (this.cursor.dataIdx >= data.length) {
            return {
                type: TokenType.EOF,
                extent: {
                    cursor: this.cursor,
                    width: 0,
                }
            };
        }
        return this.scanFromData(data);
    }

    public ignoreCurrentLine() {
        this.ungetCache = undefined;
        this.ungetCursor = undefined;
        this.skipToLineBreak(this.inputData);
    }

    public nextNonBlank(gotTok?: Tokens.Token): Tokens.Token {
        if (gotTok && gotTok.type != TokenType.Blank) {
            return gotTok;
        }

        while (true) {
            const next = this.next();
            if (next.type != TokenType.Blank) {
                return next;
            }
        }
    }

    public unget(tok: Tokens.Token) {
        this.ungetCache = tok;
        this.ungetCursor = { ...this.cursor };
        this.cursor = tok.extent.cursor;
    }

    private fillScanTable() {
        for (let c = 0; c < 128; c++) {
            const chr = String.fromCharCode(c);
            if (this.isLineBreak(chr)) {
                this.scanTable[c] = () => this.toNewLine(chr);
            } else if (this.isBlank(chr)) {
                this.scanTable[c] = () => this.toBlank(chr);
            } else if ((chr >= "A" && chr <= "Z") || (chr >= "a" && chr <= "z") || chr == "_") {
                this.scanTable[c] = this.scanSymbol.bind(this);
            } else if (chr >= "0" && chr <= "9") {
                this.scanTable[c] = this.scanInt.bind(this);
            } else if (chr == "#" || chr == "/") {
                this.scanTable[c] = this.scanComment.bind(this);
            }
        }
    }

    private scanFromData(data: string): Tokens.Token {
        const first = data[this.cursor.dataIdx];
        const handler = this.scanTable[first.charCodeAt(0)];

        if (handler) {
            return handler(data);
        } else {
            return this.scanChar(data);
        }
    }

    private toNewLine(first: Tokens.LineBreakChr): Tokens.EOLToken {
        const startCursor = this.cursor;
        this.advanceCursor(1);
        return {
            type: TokenType.EOL,
            char: first,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private toBlank(first: Tokens.BlankChr): Tokens.BlankToken {
        const startCursor = this.cursor;
        this.advanceCursor(1);
        return {
            type: TokenType.Blank,
            char: first,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanSymbol(data: string): Tokens.SymbolToken {
        const startCursor = this.cursor;
        const match = data.substring(startCursor.dataIdx).match(Lexer.SymbolRegex);
        if (!match) {
            throw new LexerError("Expected symbol", startCursor);
        }
        const symbol = match[1];
        this.advanceCursor(symbol.length, true);

        return {
            type: TokenType.Symbol,
            name: symbol,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanInt(data: string): Tokens.IntegerToken {
        const startCursor = this.cursor;
        const match = data.substring(startCursor.dataIdx).match(Lexer.IntRegex);
        if (!match) {
            throw new LexerError("Expected integer", startCursor);
        }
        const int = match[1];
        this.advanceCursor(int.length, true);
        return {
            type: TokenType.Integer,
            value: int,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanComment(data: string): Tokens.CommentToken {
        const startCursor = this.cursor;
        const match = data.substring(startCursor.dataIdx).match(Lexer.CommentRegEx);
        if (!match) {
            // a single slash does not start a comment
            throw new LexerError(`Unexpected character '${data[startCursor.dataIdx]}'`, startCursor);
        }
        const marker = match[1] == "#" ? "#" : "//";
        this.advanceCursor(match[0].length, true);

        return {
            type: TokenType.Comment,
            marker: marker,
            comment: match[2],
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private skipToLineBreak(data: string) {
        while (this.cursor.dataIdx < data.length) {
            if (this.isLineBreak(data[this.cursor.dataIdx])) {
                break;
            }
            this.advanceCursor(1);
        }
    }

    private scanChar(data: string): Tokens.CharToken {
        const startCursor = this.cursor;
        const chr = data[startCursor.dataIdx];
        this.advanceCursor(1);
        if (this.isSign(chr)) {
            return {
                type: TokenType.Char,
                char: chr,
                extent: this.calcExtentFrom(startCursor),
            };
        }

        throw new LexerError(`Unexpected character '${replaceNonPrints(chr)}'`, startCursor);
    }

    private advanceCursor(step: number, noNewline?: boolean) {
        const data = this.inputData;
        // make sure to create a new object so that the references in next() keep their state
        const newCursor = { ...this.cursor };

        if (noNewline) {
            newCursor.colIdx += step;
            newCursor.dataIdx += step;
        } else {
            for (let i = 0; i < step; i++) {
                if (data[newCursor.dataIdx] == "\n") {
                    newCursor.lineIdx++;
                    newCursor.colIdx = 0;
                } else {
                    newCursor.colIdx++;
                }
                newCursor.dataIdx++;
            }
        }

        this.cursor = newCursor;
    }

    private isSign(chr: string): chr is Tokens.SignChr {
        return Tokens.SignChars.includes(chr);
    }

    private isLineBreak(chr: string): chr is Tokens.LineBreakChr {
        return chr == "\n";
    }

    private isBlank(chr: string): chr is Tokens.BlankChr {
        return chr == " " || chr == "\r" || chr == "\t" || chr == "\f";
    }

    private calcExtentFrom(start: Cursor): CursorExtent {
        const end = this.cursor;

        return {
            cursor: start,
            width: end.dataIdx - start.dataIdx,
        };
    }
}
