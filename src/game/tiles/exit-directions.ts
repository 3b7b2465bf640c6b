/**
 * Exit names and their grid offsets.
 * North is -y, matching the layout used by the sparse tile array and world files.
 */

export type ExitName = 'north' | 'east' | 'south' | 'west';

/** Fixed traversal order; tile ids in saved worlds depend on it */
export const EXIT_NAMES: readonly ExitName[] = ['north', 'east', 'south', 'west'];

export const EXIT_OFFSETS: Readonly<Record<ExitName, readonly [number, number]>> = {
    north: [0, -1],
    east: [1, 0],
    south: [0, 1],
    west: [-1, 0],
};

const EXIT_NAME_SET: ReadonlySet<string> = new Set(EXIT_NAMES);

export function isExitName(value: string): value is ExitName {
    return EXIT_NAME_SET.has(value);
}
