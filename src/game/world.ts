import { Builder } from './builder';
import { type Position, comparePositions, createPosition, formatPosition } from './coordinates';
import { SparseTileArray } from './sparse-tile-array';
import type { Tile } from './tiles/tile';
import type { TileGraph } from './tiles/tile-graph';
import {
    WorldErrorKind,
    type WorldResult,
    worldFailed,
    worldSuccess,
} from './world-error';

/**
 * A laid-out block world: the tile graph, its positions, the builder and the
 * position the layout was started from.
 *
 * Invariants:
 * - tile ids used in saved worlds are the breadth-first order of `tileArray`
 * - the builder always stands on a tile of `tileArray`
 */
export class World {
    private constructor(
        public readonly graph: TileGraph,
        private readonly tileArray: SparseTileArray,
        public readonly builder: Builder,
        public readonly startPosition: Position
    ) {}

    /**
     * Lay out the tiles reachable from `startTile` at `startPosition`.
     * Fails with Inconsistent when the exits cannot be placed on a grid,
     * or when the builder stands on a tile that is not reachable.
     */
    public static create(
        graph: TileGraph,
        startTile: Tile,
        startPosition: Position,
        builder: Builder
    ): WorldResult<World> {
        const tileArray = new SparseTileArray();
        const laidOut = tileArray.addLinkedTiles(startTile, startPosition.x, startPosition.y);
        if (!laidOut.success) {
            return laidOut;
        }
        if (!tileArray.contains(builder.getCurrentTile())) {
            return worldFailed(
                WorldErrorKind.Inconsistent,
                `Builder ${builder.name} is not on a tile reachable from ${formatPosition(startPosition)}`
            );
        }
        return worldSuccess(new World(graph, tileArray, builder, startPosition));
    }

    public getTile(position: Position): Tile | undefined {
        return this.tileArray.getTile(position);
    }

    /** Reachable tiles in breadth-first order; the index of a tile is its id in saved worlds */
    public getTiles(): Tile[] {
        return this.tileArray.getTiles();
    }

    public getTileId(tile: Tile): number {
        return this.tileArray.indexOf(tile);
    }

    public getTilePosition(tile: Tile): Position | undefined {
        return this.tileArray.getPosition(tile);
    }

    /** Position of the tile the builder stands on */
    public getBuilderPosition(): Position {
        return this.tileArray.getPosition(this.builder.getCurrentTile()) ?? this.startPosition;
    }

    /**
     * Tiles within `radius` steps on both axes of `center`, ordered by position.
     */
    public getTilesAround(center: Position, radius: number): Array<{ position: Position; tile: Tile }> {
        const result: Array<{ position: Position; tile: Tile }> = [];
        for (const tile of this.tileArray.getTiles()) {
            const position = this.tileArray.getPosition(tile);
            if (position
                && Math.abs(position.x - center.x) <= radius
                && Math.abs(position.y - center.y) <= radius) {
                result.push({ position: createPosition(position.x, position.y), tile });
            }
        }
        return result.sort((a, b) => comparePositions(a.position, b.position));
    }
}
