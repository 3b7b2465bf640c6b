/**
 * Command-line driver: load a world, apply an action stream, save the result.
 *
 * Usage:
 *   npm start -- <inputMap> <actions> <outputMap>
 *
 * `<actions>` is a file path, or the stdin sentinel (`-` unless configured
 * otherwise) to read actions from standard input.
 */

import { open } from 'fs/promises';
import type { Readable } from 'stream';
import { processActions, readActionLines } from '@/game/commands';
import type { WorldResult } from '@/game/world-error';
import { worldSettings } from '@/game/world-settings';
import { loadWorldFile, saveWorldFile } from '@/resources/world-file';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('Cli');

export enum ExitCode {
    Success = 0,
    Usage = 1,
    MapLoad = 2,
    ActionSource = 3,
    ActionParse = 4,
    Save = 5,
}

export interface CliIo {
    /** Receives one outcome line per processed action */
    output: (line: string) => void;
    /** Stream read when the action argument is the stdin sentinel */
    stdin: Readable;
}

export const USAGE = 'Usage: block-world <inputMap> <actions> <outputMap>';

/** Outcome line writer ending each line with the configured line separator */
export function lineWriter(write: (text: string) => void): (line: string) => void {
    return (line) => write(line + worldSettings.getLineSeparator());
}

/** Open the action source named on the command line */
async function openActionSource(source: string, stdin: Readable): Promise<Readable> {
    if (source === worldSettings.state.stdinSentinel) {
        return stdin;
    }
    const handle = await open(source, 'r');
    return handle.createReadStream({ encoding: 'utf-8' });
}

/**
 * Run the driver with the given arguments (without the node/script prefix)
 * and return the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<ExitCode> {
    if (args.length !== 3) {
        log.error(USAGE);
        return ExitCode.Usage;
    }
    const [inputMap, actionSource, outputMap] = args;

    const loaded = await loadWorldFile(inputMap);
    if (!loaded.success) {
        log.error(loaded.error.message);
        return ExitCode.MapLoad;
    }
    const world = loaded.value;

    let input: Readable;
    try {
        input = await openActionSource(actionSource, io.stdin);
    } catch (e) {
        log.error(`Cannot open action source ${actionSource}`, e instanceof Error ? e : undefined);
        return ExitCode.ActionSource;
    }

    let processed: WorldResult<number>;
    try {
        processed = await processActions(readActionLines(input), world, io.output);
    } catch (e) {
        log.error(`Cannot read action source ${actionSource}`, e instanceof Error ? e : undefined);
        return ExitCode.ActionSource;
    } finally {
        if (input !== io.stdin) {
            input.destroy();
        }
    }
    if (!processed.success) {
        log.error(processed.error.message);
        return ExitCode.ActionParse;
    }

    const saved = await saveWorldFile(world, outputMap);
    if (!saved.success) {
        log.error(saved.error.message);
        return ExitCode.Save;
    }

    return ExitCode.Success;
}
