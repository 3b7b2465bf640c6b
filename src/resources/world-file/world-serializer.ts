import type { BlockType } from '@/game/blocks/block-type';
import type { Tile } from '@/game/tiles/tile';
import type { World } from '@/game/world';
import { worldSettings } from '@/game/world-settings';

function encodeBlocks(blocks: readonly BlockType[]): string {
    return blocks.join(',');
}

/** `<id> name:id,...` with exit names in alphabetical order */
function encodeExits(world: World, tile: Tile, id: number): string {
    const exits = [...tile.getExits()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([name, target]) => `${name}:${world.getTileId(target)}`);
    return `${id} ${exits.join(',')}`;
}

/**
 * Write a world in the text format read by parseWorld.
 * Tile ids are the breadth-first order from the start tile, so parsing the
 * output and serializing again gives the same text.
 */
export function serializeWorld(world: World, lineSeparator: string = worldSettings.getLineSeparator()): string {
    const tiles = world.getTiles();

    const lines: string[] = [
        String(world.startPosition.x),
        String(world.startPosition.y),
        world.builder.name,
        encodeBlocks(world.builder.getInventory()),
        '',
        `total:${tiles.length}`,
        ...tiles.map((tile, id) => `${id} ${encodeBlocks(tile.getBlocks())}`),
        '',
        'exits',
        ...tiles.map((tile, id) => encodeExits(world, tile, id)),
    ];

    return lines.join(lineSeparator) + lineSeparator;
}
