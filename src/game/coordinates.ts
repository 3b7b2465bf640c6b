/**
 * Core coordinate types used throughout the world.
 * This is a base module with no dependencies to avoid circular imports.
 */

export interface Position {
    readonly x: number;
    readonly y: number;
}

export function createPosition(x: number, y: number): Position {
    return { x, y };
}

/** Convert a position to a string key for Map lookups */
export function positionKey(position: Position): string {
    return position.x + ',' + position.y;
}

export function positionsEqual(a: Position, b: Position): boolean {
    return a.x === b.x && a.y === b.y;
}

/** Total order: by x, then by y */
export function comparePositions(a: Position, b: Position): number {
    if (a.x !== b.x) {
        return a.x < b.x ? -1 : 1;
    }
    if (a.y !== b.y) {
        return a.y < b.y ? -1 : 1;
    }
    return 0;
}

export function formatPosition(position: Position): string {
    return `(${position.x}, ${position.y})`;
}
