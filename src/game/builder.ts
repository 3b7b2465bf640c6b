import { BlockType, isCarryable } from './blocks/block-type';
import type { Tile } from './tiles/tile';
import {
    WORLD_OK,
    WorldErrorKind,
    type WorldResult,
    worldFailedWith,
    worldSuccess,
} from './world-error';

/**
 * The single agent of a world. Stands on exactly one tile and carries
 * an ordered inventory of carryable blocks.
 */
export class Builder {
    private readonly inventory: BlockType[];
    private currentTile: Tile;

    private constructor(
        public readonly name: string,
        startingTile: Tile,
        inventory: readonly BlockType[]
    ) {
        this.currentTile = startingTile;
        this.inventory = [...inventory];
    }

    /**
     * Create a builder on `startingTile`. Every inventory block must be carryable,
     * otherwise the result is an InvalidBlock failure.
     */
    public static create(name: string, startingTile: Tile, inventory: readonly BlockType[] = []): WorldResult<Builder> {
        if (!inventory.every(isCarryable)) {
            return worldFailedWith(WorldErrorKind.InvalidBlock);
        }
        return worldSuccess(new Builder(name, startingTile, inventory));
    }

    public getCurrentTile(): Tile {
        return this.currentTile;
    }

    /** Copy of the inventory in insertion order */
    public getInventory(): BlockType[] {
        return [...this.inventory];
    }

    /**
     * Place inventory[index] on the current tile. The block only leaves the
     * inventory when the tile accepts it.
     */
    public dropFromInventory(index: number): WorldResult<void> {
        if (!Number.isInteger(index) || index < 0 || index >= this.inventory.length) {
            return worldFailedWith(WorldErrorKind.InvalidBlock);
        }

        const placed = this.currentTile.placeBlock(this.inventory[index]);
        if (!placed.success) {
            return placed;
        }

        this.inventory.splice(index, 1);
        return WORLD_OK;
    }

    /** Dig the current tile; carryable blocks go to the inventory, others are discarded. */
    public digOnCurrentTile(): WorldResult<BlockType> {
        const dug = this.currentTile.dig();
        if (dug.success && isCarryable(dug.value)) {
            this.inventory.push(dug.value);
        }
        return dug;
    }

    /**
     * A tile can be entered when the current tile has an exit to it and the
     * heights differ by at most one block.
     */
    public canEnter(tile: Tile | null | undefined): boolean {
        if (!tile) {
            return false;
        }
        return this.currentTile.hasExitTo(tile)
            && Math.abs(tile.blockCount - this.currentTile.blockCount) <= 1;
    }

    public moveTo(tile: Tile | null | undefined): WorldResult<void> {
        if (!tile || !this.canEnter(tile)) {
            return worldFailedWith(WorldErrorKind.NoExit);
        }
        this.currentTile = tile;
        return WORLD_OK;
    }
}
