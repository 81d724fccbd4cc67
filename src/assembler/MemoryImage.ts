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

import * as Nodes from "../parser/nodes/Node.js";

/**
 * A single word of a memory image.
 * Images are ordered by emission, so an ORG can make addresses jump back and forth.
 */
export interface MemoryWord {
    readonly addr: number;
    readonly value: number;
}

export type MemoryImage = readonly MemoryWord[];

export enum EmitType {
    Literal,
    PendingRef,
}

export type Emission = LiteralEmission | PendingRefEmission;

// a word that is final as soon as it is emitted
export interface LiteralEmission {
    type: EmitType.Literal;
    value: number;
}

// a memory reference that can only be resolved when all labels are known
export interface PendingRefEmission {
    type: EmitType.PendingRef;
    opcodeBase: number;
    operand: Nodes.Operand;
}

export type Emitted = Emission & { addr: number };

/**
 * Converts an image to plain [address, value] records, e.g. to store it as JSON.
 */
export function imageToRecords(image: MemoryImage): [number, number][] {
    return image.map(w => [w.addr, w.value]);
}

export function recordsToImage(records: readonly (readonly [number, number])[]): MemoryImage {
    return records.map(([addr, value]) => ({ addr, value }));
}
