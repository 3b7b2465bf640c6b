import { WorldErrorKind, type WorldResult, worldFailed, worldSuccess } from '../world-error';
import type { Action } from './command-types';

/**
 * Parse one line of an action stream.
 * `null`/`undefined` marks end of input and yields a null action.
 */
export function parseAction(line: string | null | undefined): WorldResult<Action | null> {
    if (line === null || line === undefined) {
        return worldSuccess<Action | null>(null);
    }

    const tokens = line.split(' ');
    if (tokens.length > 2) {
        return worldFailed(WorldErrorKind.Format, 'Too many tokens on line');
    }

    const [primary, secondary] = tokens;
    if (tokens.length === 1) {
        if (primary === 'DIG') {
            return worldSuccess<Action>({ type: 'DIG' });
        }
    } else {
        switch (primary) {
        case 'MOVE_BUILDER':
        case 'MOVE_BLOCK':
            return worldSuccess<Action>({ type: primary, direction: secondary });
        case 'DROP':
            return worldSuccess<Action>({ type: 'DROP', index: secondary });
        }
    }

    return worldFailed(WorldErrorKind.Format, 'Unrecognised action given');
}
