/**
 * Block type definitions and configuration.
 * The set of block kinds is closed; every attribute lives in BLOCK_TYPE_CONFIG.
 */

/** Block kinds. The enum value is the tag used in world files and messages. */
export enum BlockType {
    Grass = 'grass',
    Soil = 'soil',
    Stone = 'stone',
    Wood = 'wood',
}

/**
 * Fixed attributes of a block kind.
 */
export interface BlockTypeConfig {
    /** Can be removed from a tile by digging */
    diggable: boolean;
    /** Can be pushed onto a neighbouring tile */
    moveable: boolean;
    /** Ends up in the builder's inventory when dug */
    carryable: boolean;
    colour: string;
    /** Ground blocks must stay in the bottom slots of a tile */
    ground: boolean;
}

export const BLOCK_TYPE_CONFIG: Readonly<Record<BlockType, Readonly<BlockTypeConfig>>> = {
    [BlockType.Grass]: { diggable: true, moveable: false, carryable: false, colour: 'green', ground: true },
    [BlockType.Soil]: { diggable: true, moveable: false, carryable: true, colour: 'black', ground: true },
    [BlockType.Stone]: { diggable: false, moveable: false, carryable: false, colour: 'gray', ground: false },
    [BlockType.Wood]: { diggable: true, moveable: true, carryable: true, colour: 'brown', ground: false },
};

const BLOCK_TYPES: ReadonlySet<string> = new Set(Object.values(BlockType));

/** Check whether a string is one of the block tags (case-sensitive). */
export function isBlockType(value: string): value is BlockType {
    return BLOCK_TYPES.has(value);
}

export function isGroundBlock(block: BlockType): boolean {
    return BLOCK_TYPE_CONFIG[block].ground;
}

export function isDiggable(block: BlockType): boolean {
    return BLOCK_TYPE_CONFIG[block].diggable;
}

export function isMoveable(block: BlockType): boolean {
    return BLOCK_TYPE_CONFIG[block].moveable;
}

export function isCarryable(block: BlockType): boolean {
    return BLOCK_TYPE_CONFIG[block].carryable;
}

export function getBlockColour(block: BlockType): string {
    return BLOCK_TYPE_CONFIG[block].colour;
}
