import { CodeError } from "../utils/CodeError.js";
import { Lexer } from "./Lexer.js";
import { LexerError } from "./LexerError.js";
import { TokenType } from "./Token.js";
import { tokenToString } from "./formatToken.js";

function lexAll(input: string): string[] {
    const lexer = new Lexer("test.lmc", input);
    const tokens: string[] = [];
    while (true) {
        const tok = lexer.next();
        tokens.push(tokenToString(tok));
        if (tok.type == TokenType.EOF) {
            break;
        }
    }
    return tokens;
}

function lexError(input: string): CodeError {
    try {
        lexAll(input);
    } catch (e) {
        if (e instanceof CodeError) {
            return e;
        }
        throw e;
    }
    throw Error("Expected lexer error");
}

describe("GIVEN a lexer", () => {
    describe("WHEN scanning an instruction with label and comment", () => {
        const tokens = lexAll("loop ADD a_1 // next\n");
        test("THEN it should produce all tokens including blanks", () => {
            expect(tokens).toEqual([
                "Symbol(loop)", "Blank(' ')", "Symbol(ADD)", "Blank(' ')", "Symbol(a_1)", "Blank(' ')",
                "Comment(\" next\")", "EOL('<LF>')", "EOF()",
            ]);
        });
    });

    describe("WHEN scanning signed numbers and hash comments", () => {
        test("THEN the sign should be a separate token", () => {
            expect(lexAll("DAT -13")).toEqual(["Symbol(DAT)", "Blank(' ')", "Char('-')", "Integer(13)", "EOF()"]);
            expect(lexAll("DAT +7")).toEqual(["Symbol(DAT)", "Blank(' ')", "Char('+')", "Integer(7)", "EOF()"]);
        });

        test("THEN a hash should start a comment", () => {
            expect(lexAll("#HLT\n_x")).toEqual(["Comment(\"HLT\")", "EOL('<LF>')", "Symbol(_x)", "EOF()"]);
        });

        test("THEN carriage returns should be blanks", () => {
            expect(lexAll("HLT\r\n")).toEqual(["Symbol(HLT)", "Blank('<CR>')", "EOL('<LF>')", "EOF()"]);
        });
    });

    describe("WHEN scanning multiple lines", () => {
        const lexer = new Lexer("test.lmc", "INP\n  out");
        lexer.next();
        lexer.next();
        test("THEN the cursor should track lines and columns", () => {
            const tok = lexer.nextNonBlank();
            expect(tok.type).toEqual(TokenType.Symbol);
            expect(tok.extent.cursor.lineIdx).toEqual(1);
            expect(tok.extent.cursor.colIdx).toEqual(2);
            expect(tok.extent.width).toEqual(3);
        });
    });

    describe("WHEN ungetting a token", () => {
        const lexer = new Lexer("test.lmc", "BRA end");
        const first = lexer.next();
        lexer.unget(first);
        test("THEN the same token should be returned again", () => {
            expect(lexer.next()).toBe(first);
            expect(tokenToString(lexer.nextNonBlank())).toEqual("Symbol(end)");
        });
    });

    describe("WHEN scanning invalid characters", () => {
        test("THEN a single slash should be rejected with its position", () => {
            const err = lexError("HLT\na / b");
            expect(err).toBeInstanceOf(LexerError);
            expect(err.message).toEqual("Unexpected character '/'");
            expect(err.line).toEqual(2);
            expect(err.col).toEqual(3);
        });

        test("THEN other punctuation and non-ASCII should be rejected", () => {
            expect(lexError("a ; b").message).toEqual("Unexpected character ';'");
            expect(lexError("ADD é").message).toEqual("Unexpected character 'é'");
        });
    });
});
