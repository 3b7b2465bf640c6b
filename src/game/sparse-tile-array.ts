import { LogHandler } from '@/utilities/log-handler';
import { type Position, createPosition, formatPosition, positionKey, positionsEqual } from './coordinates';
import { EXIT_NAMES, EXIT_OFFSETS } from './tiles/exit-directions';
import type { Tile } from './tiles/tile';
import {
    WORLD_OK,
    WorldErrorKind,
    type WorldResult,
    worldFailed,
} from './world-error';

const log = new LogHandler('SparseTileArray');

/**
 * Assigns grid positions to a connected set of tiles.
 *
 * `addLinkedTiles` walks the exit graph breadth-first from a start tile, placing
 * each neighbour one step away in the exit's direction. Exits are visited in
 * the order north, east, south, west, which fixes the tile order returned by
 * `getTiles()` and therefore the tile ids of saved worlds.
 *
 * A layout where one tile would sit at two positions, or two tiles at one
 * position, is rejected and leaves the array empty.
 */
export class SparseTileArray {
    /** position key -> tile */
    private tileMap = new Map<string, Tile>();
    /** tile id -> position */
    private positions = new Map<number, Position>();
    /** tile id -> index in orderedTiles */
    private indices = new Map<number, number>();
    private orderedTiles: Tile[] = [];

    public getTile(position: Position): Tile | undefined {
        return this.tileMap.get(positionKey(position));
    }

    public getPosition(tile: Tile): Position | undefined {
        return this.positions.get(tile.id);
    }

    /** Index of the tile in breadth-first order, or -1 when it was not reached */
    public indexOf(tile: Tile): number {
        return this.indices.get(tile.id) ?? -1;
    }

    public contains(tile: Tile): boolean {
        return this.positions.has(tile.id);
    }

    /** Copy of the tiles in breadth-first order */
    public getTiles(): Tile[] {
        return [...this.orderedTiles];
    }

    public get size(): number {
        return this.orderedTiles.length;
    }

    /**
     * Rebuild the array from `startingTile` placed at (startingX, startingY).
     * Previous contents are discarded first.
     */
    public addLinkedTiles(startingTile: Tile, startingX: number, startingY: number): WorldResult<void> {
        this.reset();

        const queue: Tile[] = [startingTile];
        let head = 0;
        this.record(startingTile, createPosition(startingX, startingY));

        while (head < queue.length) {
            const tile = queue[head++];
            this.indices.set(tile.id, this.orderedTiles.length);
            this.orderedTiles.push(tile);

            const position = this.positions.get(tile.id);
            if (!position) {
                continue;
            }

            for (const exitName of EXIT_NAMES) {
                const neighbour = tile.getExit(exitName);
                if (!neighbour) {
                    continue;
                }

                const [dx, dy] = EXIT_OFFSETS[exitName];
                const expected = createPosition(position.x + dx, position.y + dy);

                const placedAt = this.positions.get(neighbour.id);
                if (placedAt && !positionsEqual(placedAt, expected)) {
                    return this.fail(`Tile that should be at ${formatPosition(expected)}`
                        + ` is already assigned a different position at ${formatPosition(placedAt)}`);
                }

                const occupant = this.tileMap.get(positionKey(expected));
                if (occupant && occupant !== neighbour) {
                    return this.fail(`Position ${formatPosition(expected)} is already occupied by a different tile.`);
                }

                if (!occupant) {
                    this.record(neighbour, expected);
                    queue.push(neighbour);
                }
            }
        }

        log.debug(`Laid out ${this.orderedTiles.length} tiles from ${formatPosition(createPosition(startingX, startingY))}`);
        return WORLD_OK;
    }

    private record(tile: Tile, position: Position): void {
        this.tileMap.set(positionKey(position), tile);
        this.positions.set(tile.id, position);
    }

    private fail(message: string): WorldResult<void> {
        this.reset();
        return worldFailed(WorldErrorKind.Inconsistent, message);
    }

    private reset(): void {
        this.tileMap = new Map();
        this.positions = new Map();
        this.indices = new Map();
        this.orderedTiles = [];
    }
}
