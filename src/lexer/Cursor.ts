export interface Cursor {
    inputName: string;
    dataIdx: number;
    colIdx: number;
    lineIdx: number;
}

export interface CursorExtent {
    cursor: Cursor;
    width: number;
}

export interface HasExtent {
    extent: CursorExtent;
}

export function calcExtent(from: HasExtent, to?: HasExtent): CursorExtent {
    if (!to) {
        return from.extent;
    }

    return {
        cursor: from.extent.cursor,
        width: to.extent.cursor.dataIdx + to.extent.width - from.extent.cursor.dataIdx,
    };
}
