/**
 * Tiles module public API
 */

export { Tile, MAX_BLOCKS, MAX_GROUND_BLOCKS, DEFAULT_TILE_BLOCKS, validateTileBlocks } from './tile';
export { TileGraph } from './tile-graph';
export type { ExitName } from './exit-directions';
export { EXIT_NAMES, EXIT_OFFSETS, isExitName } from './exit-directions';
