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

export * from "./Lmc.js";
export * from "./lexer/Lexer.js";
export * from "./lexer/Token.js";
export * from "./parser/nodes/Node.js";
export * from "./parser/Parser.js";
export * from "./parser/ParserError.js";
export * from "./assembler/Assembler.js";
export * from "./assembler/AssemblerError.js";
export * from "./assembler/MemoryImage.js";
export * from "./assembler/SymbolData.js";
export * from "./machine/Complement.js";
export * from "./machine/IOAdapters.js";
export * from "./machine/Machine.js";
export * from "./machine/MachineError.js";
export * from "./machine/Opcode.js";
export * from "./machine/formatMachine.js";
export * from "./utils/CodeError.js";
