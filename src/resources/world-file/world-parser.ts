/**
 * Parser for the block world text format.
 *
 * ```
 * <startX>
 * <startY>
 * <builderName>
 * <inventory blocks, comma separated>
 *
 * total:<N>
 * <id> <blocks, comma separated>      (N lines)
 *
 * exits
 * <id> <name>:<id>,<name>:<id>,...     (N lines)
 * ```
 *
 * Tile 0 is the builder's start tile and is placed at (startX, startY).
 */

import { BlockType, isBlockType, isCarryable } from '@/game/blocks/block-type';
import { Builder } from '@/game/builder';
import { createPosition } from '@/game/coordinates';
import { type ExitName, type Tile, TileGraph, isExitName } from '@/game/tiles';
import { World } from '@/game/world';
import { WorldErrorKind, type WorldResult, worldFailed } from '@/game/world-error';
import { LogHandler } from '@/utilities/log-handler';
import { parseInteger } from '@/utilities/parse-integer';
import { LineReader, WorldFormatError } from './line-reader';

const log = new LogHandler('WorldParser');

function readInteger(reader: LineReader, text: string, what: string): number {
    const value = parseInteger(text);
    if (value === undefined) {
        reader.fail(`Invalid integer for ${what}`);
    }
    return value;
}

/** Parse a tile id and check it lies in [0, count) */
function readTileId(reader: LineReader, text: string, count: number, what: string): number {
    const id = readInteger(reader, text, what);
    if (id < 0) {
        reader.fail(`${what} is negative`);
    }
    if (id >= count) {
        reader.fail(`${what} ${id} does not refer to a valid tile`);
    }
    return id;
}

/** Split `text` on the first `separator`, requiring exactly two parts */
function splitInTwo(reader: LineReader, text: string, separator: string, what: string): [string, string] {
    const parts = text.split(separator);
    if (parts.length === 1) {
        reader.fail(`Missing '${separator}' in ${what}`);
    }
    if (parts.length > 2) {
        reader.fail(`Too many '${separator}' in ${what}`);
    }
    return [parts[0], parts[1]];
}

function readBlocks(reader: LineReader, text: string): BlockType[] {
    if (text === '') {
        return [];
    }
    return text.split(',').map(name => {
        if (!isBlockType(name)) {
            reader.fail(`Invalid block name '${name}'`);
        }
        return name;
    });
}

function readInventory(reader: LineReader): BlockType[] {
    const inventory = readBlocks(reader, reader.readLine());
    for (const block of inventory) {
        if (!isCarryable(block)) {
            reader.fail(`Inventory block '${block}' cannot be carried`);
        }
    }
    return inventory;
}

function readTileCount(reader: LineReader): number {
    const [label, countText] = splitInTwo(reader, reader.readLine(), ':', 'total:N line');
    if (label !== 'total') {
        reader.fail("Missing token 'total' on total:N line");
    }
    const count = parseInteger(countText);
    if (count === undefined) {
        reader.fail('In total:N, N is not a valid integer');
    }
    if (count < 0) {
        reader.fail('In total:N, N is negative');
    }
    if (count === 0) {
        reader.fail('In total:N, N must be at least 1');
    }
    return count;
}

function readTiles(reader: LineReader, graph: TileGraph, count: number): Tile[] {
    // each tile needs a line of its own
    if (count > reader.remaining) {
        reader.fail("Missing tile under 'total:N'");
    }
    const tiles = new Map<number, Tile>();

    for (let i = 0; i < count; i++) {
        const line = reader.readLine("Missing tile under 'total:N'");
        const [idText, blockText] = splitInTwo(reader, line, ' ', 'tile entry');
        const id = readTileId(reader, idText, count, 'Tile ID');
        if (tiles.has(id)) {
            reader.fail(`Duplicate entry for tile ID ${id}`);
        }

        const created = graph.createTile(readBlocks(reader, blockText));
        if (!created.success) {
            reader.fail(`Tile ${id} has more than 8 blocks or a ground block above the third slot`);
        }
        tiles.set(id, created.value);
    }

    // N distinct ids in [0, N) cover every slot
    const ordered: Tile[] = [];
    for (let id = 0; id < count; id++) {
        const tile = tiles.get(id);
        if (!tile) {
            reader.fail(`Missing entry for tile with ID ${id}`);
        }
        ordered.push(tile);
    }
    return ordered;
}

function readExits(reader: LineReader, tiles: readonly Tile[]): void {
    const seen = new Set<number>();

    for (let i = 0; i < tiles.length; i++) {
        const line = reader.readLine("Missing tile under 'exits'");
        const [idText, exitText] = splitInTwo(reader, line, ' ', 'exit line');
        const id = readTileId(reader, idText, tiles.length, 'Tile ID in exit line');
        if (seen.has(id)) {
            reader.fail(`Duplicate exit entry for tile ID ${id}`);
        }
        seen.add(id);

        if (exitText === '') {
            continue;
        }

        const names = new Set<ExitName>();
        for (const exit of exitText.split(',')) {
            const [name, targetText] = splitInTwo(reader, exit, ':', 'exit');
            if (!isExitName(name)) {
                reader.fail(`Invalid exit name '${name}'`);
            }
            if (names.has(name)) {
                reader.fail(`Duplicate exit '${name}'`);
            }
            names.add(name);

            const targetId = readTileId(reader, targetText, tiles.length, 'Exit target tile ID');
            const added = tiles[id].addExit(name, tiles[targetId]);
            if (!added.success) {
                reader.fail(`Cannot add exit '${name}' to tile ${id}`);
            }
        }
    }
}

/**
 * Parse a world document. Format problems give a Format failure with the
 * line number; a graph that cannot be laid out gives an Inconsistent failure.
 */
export function parseWorld(text: string): WorldResult<World> {
    const reader = new LineReader(text);
    const graph = new TileGraph();

    try {
        const x = readInteger(reader, reader.readLine(), 'starting position x');
        const y = readInteger(reader, reader.readLine(), 'starting position y');
        const builderName = reader.readLine();
        const inventory = readInventory(reader);

        reader.readBlankLine('File ended abruptly after inventory', 'No blank line following inventory');

        const count = readTileCount(reader);
        const tiles = readTiles(reader, graph, count);

        reader.readBlankLine(
            'File ended abruptly after tile entries',
            'Missing blank line after tile entries (or too many entries)'
        );
        if (reader.readLine('File ended abruptly after tile entries') !== 'exits') {
            reader.fail("Missing 'exits' token");
        }

        readExits(reader, tiles);
        reader.expectEnd('Extra content in file');

        const builder = Builder.create(builderName, tiles[0], inventory);
        if (!builder.success) {
            return worldFailed(WorldErrorKind.Format, `Invalid builder inventory: ${builder.error.message}`);
        }

        const world = World.create(graph, tiles[0], createPosition(x, y), builder.value);
        if (world.success) {
            log.debug(`Parsed world with ${count} tiles, ${world.value.getTiles().length} reachable`);
        }
        return world;
    } catch (e) {
        if (e instanceof WorldFormatError) {
            return worldFailed(WorldErrorKind.Format, e.message);
        }
        throw e;
    }
}
