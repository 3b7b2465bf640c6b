import { BlockType, isDiggable, isGroundBlock, isMoveable } from '../blocks/block-type';
import {
    WORLD_OK,
    WorldErrorKind,
    type WorldResult,
    worldFailedWith,
    worldSuccess,
} from '../world-error';
import { type ExitName, isExitName } from './exit-directions';
import type { TileGraph } from './tile-graph';

/** Maximum number of blocks on one tile */
export const MAX_BLOCKS = 8;

/** Ground blocks may only occupy the slots below this index */
export const MAX_GROUND_BLOCKS = 3;

/** Blocks of a freshly created tile, bottom to top */
export const DEFAULT_TILE_BLOCKS: readonly BlockType[] = [BlockType.Soil, BlockType.Soil, BlockType.Grass];

/**
 * Check a bottom-to-top block list against the tile capacity rules.
 */
export function validateTileBlocks(blocks: readonly BlockType[]): WorldResult<void> {
    if (blocks.length > MAX_BLOCKS) {
        return worldFailedWith(WorldErrorKind.TooHigh);
    }
    for (let i = MAX_GROUND_BLOCKS; i < blocks.length; i++) {
        if (isGroundBlock(blocks[i])) {
            return worldFailedWith(WorldErrorKind.TooHigh);
        }
    }
    return WORLD_OK;
}

/**
 * A stack of blocks plus named exits to other tiles of the same graph.
 *
 * Tiles are only created through {@link TileGraph.createTile}, which assigns the id.
 * Exits store target ids; the owning graph resolves them.
 */
export class Tile {
    private readonly blocks: BlockType[];
    private readonly exits = new Map<ExitName, number>();

    private constructor(
        private readonly graph: TileGraph,
        public readonly id: number,
        blocks: readonly BlockType[]
    ) {
        this.blocks = [...blocks];
    }

    /** @internal used by TileGraph */
    public static create(graph: TileGraph, id: number, blocks: readonly BlockType[]): WorldResult<Tile> {
        const valid = validateTileBlocks(blocks);
        if (!valid.success) {
            return valid;
        }
        return worldSuccess(new Tile(graph, id, blocks));
    }

    public get blockCount(): number {
        return this.blocks.length;
    }

    /** Copy of the blocks, bottom to top */
    public getBlocks(): BlockType[] {
        return [...this.blocks];
    }

    /** Copy of the exits, resolved to tiles */
    public getExits(): Map<ExitName, Tile> {
        const result = new Map<ExitName, Tile>();
        for (const [name, targetId] of this.exits) {
            const target = this.graph.getTile(targetId);
            if (target) {
                result.set(name, target);
            }
        }
        return result;
    }

    public getExit(name: string): Tile | undefined {
        const targetId = isExitName(name) ? this.exits.get(name) : undefined;
        return targetId === undefined ? undefined : this.graph.getTile(targetId);
    }

    public hasExitTo(tile: Tile): boolean {
        for (const targetId of this.exits.values()) {
            if (targetId === tile.id) {
                return true;
            }
        }
        return false;
    }

    public belongsTo(graph: TileGraph): boolean {
        return this.graph === graph;
    }

    /** Add or replace an exit. Fails with NoExit when the target is absent or from another graph. */
    public addExit(name: ExitName, target: Tile | null | undefined): WorldResult<void> {
        if (!target || !target.belongsTo(this.graph)) {
            return worldFailedWith(WorldErrorKind.NoExit);
        }
        this.exits.set(name, target.id);
        return WORLD_OK;
    }

    public removeExit(name: ExitName): WorldResult<void> {
        if (!this.exits.delete(name)) {
            return worldFailedWith(WorldErrorKind.NoExit);
        }
        return WORLD_OK;
    }

    public topBlock(): WorldResult<BlockType> {
        if (this.blocks.length === 0) {
            return worldFailedWith(WorldErrorKind.TooLow);
        }
        return worldSuccess(this.blocks[this.blocks.length - 1]);
    }

    public removeTopBlock(): WorldResult<void> {
        if (this.blocks.length === 0) {
            return worldFailedWith(WorldErrorKind.TooLow);
        }
        this.blocks.pop();
        return WORLD_OK;
    }

    /**
     * Remove and return the top block. A non-diggable top block stays in place.
     */
    public dig(): WorldResult<BlockType> {
        const top = this.topBlock();
        if (!top.success) {
            return top;
        }
        if (!isDiggable(top.value)) {
            return worldFailedWith(WorldErrorKind.InvalidBlock);
        }
        this.blocks.pop();
        return top;
    }

    public placeBlock(block: BlockType | null | undefined): WorldResult<void> {
        if (block === null || block === undefined) {
            return worldFailedWith(WorldErrorKind.InvalidBlock);
        }
        if (this.blocks.length >= MAX_BLOCKS
            || (isGroundBlock(block) && this.blocks.length >= MAX_GROUND_BLOCKS)) {
            return worldFailedWith(WorldErrorKind.TooHigh);
        }
        this.blocks.push(block);
        return WORLD_OK;
    }

    /**
     * Push the top block onto the neighbour behind `exitName`.
     * The neighbour must be strictly lower than this tile.
     */
    public moveBlock(exitName: ExitName): WorldResult<void> {
        const destination = this.getExit(exitName);
        if (!destination) {
            return worldFailedWith(WorldErrorKind.NoExit);
        }
        if (destination.blockCount >= this.blocks.length) {
            return worldFailedWith(WorldErrorKind.TooHigh);
        }

        // height check above guarantees at least one block here
        const top = this.topBlock();
        if (!top.success) {
            return top;
        }
        if (!isMoveable(top.value)) {
            return worldFailedWith(WorldErrorKind.InvalidBlock);
        }

        const placed = destination.placeBlock(top.value);
        if (!placed.success) {
            return placed;
        }
        this.blocks.pop();
        return WORLD_OK;
    }
}
