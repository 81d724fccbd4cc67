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

export function replaceNonPrints(s: string): string {
    return s
        .replaceAll("\t", "<TAB>")
        .replaceAll("\r", "<CR>")
        .replaceAll("\n", "<LF>")
        .replaceAll("\v", "<VT>")
        .replaceAll("\b", "<BS>")
        .replaceAll("\x00", "<NUL>")
        .replaceAll("\x07", "<BEL>")
        .replaceAll("\f", "<FF>");
}

export function parseIntSafe(str: string): number {
    if (!str.match(/^[0-9]+$/)) {
        throw Error(`Invalid symbols in decimal number ${str}`);
    }

    return Number.parseInt(str, 10);
}

// labels and mnemonics are case-insensitive
export function normalizeSymbolName(name: string) {
    return name.toLowerCase();
}

export function padNum(num: number, width: number): string {
    return num.toString().padStart(width, "0");
}
