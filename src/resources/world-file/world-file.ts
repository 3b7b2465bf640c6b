import { readFile, writeFile } from 'fs/promises';
import type { World } from '@/game/world';
import { WORLD_OK, WorldErrorKind, type WorldResult, worldFailed } from '@/game/world-error';
import { LogHandler } from '@/utilities/log-handler';
import { parseWorld } from './world-parser';
import { serializeWorld } from './world-serializer';

const log = new LogHandler('WorldFile');

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Read and parse a world file. A missing file is a FileNotFound failure,
 * distinct from a file that exists but does not parse.
 */
export async function loadWorldFile(path: string): Promise<WorldResult<World>> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (e) {
        if (isErrnoException(e) && e.code === 'ENOENT') {
            return worldFailed(WorldErrorKind.FileNotFound, `File not found: ${path}`);
        }
        return worldFailed(WorldErrorKind.Io, `Failed to read ${path}: ${describe(e)}`);
    }

    const result = parseWorld(text);
    if (result.success) {
        log.info(`Loaded ${path}: ${result.value.getTiles().length} tiles`);
    }
    return result;
}

/** Serialize the world and write it in one piece */
export async function saveWorldFile(world: World, path: string, lineSeparator?: string): Promise<WorldResult<void>> {
    const text = serializeWorld(world, lineSeparator);
    try {
        await writeFile(path, text, 'utf-8');
    } catch (e) {
        return worldFailed(WorldErrorKind.Io, `Failed to write ${path}: ${describe(e)}`);
    }
    log.info(`Saved ${path}: ${world.getTiles().length} tiles`);
    return WORLD_OK;
}
