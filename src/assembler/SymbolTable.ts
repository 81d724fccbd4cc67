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

import { HasExtent } from "../lexer/Cursor.js";
import { normalizeSymbolName } from "../utils/Strings.js";
import { LabelSymbol } from "./SymbolData.js";

export class SymbolTable {
    private symbols = new Map<string, LabelSymbol>();

    public defineLabel(label: string, clc: number, def: HasExtent) {
        const normName = normalizeSymbolName(label);
        const existing = this.symbols.get(normName);

        // no dialect allows redefinitions, not even to the same address
        if (existing) {
            const line = existing.extent.cursor.lineIdx + 1;
            throw Error(`Redefining label ${normName}, first defined in line ${line}`);
        }
        this.symbols.set(normName, { name: normName, value: clc, extent: def.extent });
    }

    public tryLookup(name: string): LabelSymbol | undefined {
        const normName = normalizeSymbolName(name);
        return this.symbols.get(normName);
    }

    public lookup(name: string): LabelSymbol {
        const sym = this.tryLookup(name);
        if (sym === undefined) {
            throw Error(`Undefined label ${name}`);
        }
        return sym;
    }

    public clear() {
        this.symbols.clear();
    }

    public getSymbols(): ReadonlyMap<string, LabelSymbol> {
        return this.symbols;
    }
}
