import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { LogHandler } from '@/utilities/log-handler';
import type { World } from '../world';
import { type WorldResult, worldFailed, worldSuccess } from '../world-error';
import { parseAction } from './action-parser';
import { processAction } from './command';

const log = new LogHandler('ActionStream');

/** Lines of a readable stream, any of `\n`, `\r\n` terminated */
export function readActionLines(input: Readable): AsyncIterable<string> {
    return createInterface({ input, crlfDelay: Infinity });
}

/**
 * Parse and apply actions one line at a time, reporting each outcome line
 * through `output`. Stops at the first line that does not parse and returns
 * a Format failure naming it; otherwise returns the number of actions applied.
 */
export async function processActions(
    lines: AsyncIterable<string> | Iterable<string>,
    world: World,
    output: (line: string) => void
): Promise<WorldResult<number>> {
    let lineNumber = 0;

    for await (const line of lines) {
        lineNumber++;
        const parsed = parseAction(line);
        if (!parsed.success) {
            log.debug(`Action stream aborted at line ${lineNumber}`);
            return worldFailed(parsed.error.kind, `Error on line ${lineNumber}: ${parsed.error.message}`);
        }
        if (parsed.value === null) {
            break;
        }
        output(processAction(world, parsed.value).message);
    }

    log.debug(`Applied ${lineNumber} actions`);
    return worldSuccess(lineNumber);
}
