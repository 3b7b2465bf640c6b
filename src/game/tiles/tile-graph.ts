import type { BlockType } from '../blocks/block-type';
import type { WorldResult } from '../world-error';
import { DEFAULT_TILE_BLOCKS, Tile } from './tile';

/**
 * Owns every tile of a world. Tile ids are allocation slots and never reused,
 * so two tiles with identical blocks and exits stay distinct.
 */
export class TileGraph {
    private readonly tiles: Tile[] = [];

    /**
     * Create a tile. Without a block list it starts as soil, soil, grass.
     * An over-full list or a misplaced ground block fails with TooHigh.
     */
    public createTile(blocks: readonly BlockType[] = DEFAULT_TILE_BLOCKS): WorldResult<Tile> {
        const result = Tile.create(this, this.tiles.length, blocks);
        if (result.success) {
            this.tiles.push(result.value);
        }
        return result;
    }

    public getTile(id: number): Tile | undefined {
        return this.tiles[id];
    }

    public get size(): number {
        return this.tiles.length;
    }

    /** Copy of all tiles in creation order, reachable or not */
    public getAllTiles(): Tile[] {
        return [...this.tiles];
    }
}
