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

export const WordBase = 1000;

/**
 * Maps a signed number to its tens-complement word, e.g. -1 becomes 999.
 * Defined for -999..999, but only -500..499 survives the trip back through {@link toSigned}.
 */
export function toUnsigned(signed: number, base = WordBase): number {
    return signed < 0 ? base + signed : signed;
}

/**
 * Interprets a word as tens-complement number, i.e. words from 500 on are negative.
 */
export function toSigned(word: number, base = WordBase): number {
    return word >= base / 2 ? word - base : word;
}
