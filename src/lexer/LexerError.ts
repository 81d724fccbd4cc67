import { CodeError } from "../utils/CodeError.js";
import { Cursor } from "./Cursor.js";

export class LexerError extends CodeError {
    public constructor(msg: string, cursor: Cursor) {
        super(msg, cursor);
        this.name = LexerError.name;
    }
}
