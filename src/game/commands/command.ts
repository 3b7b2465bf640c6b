import { LogHandler } from '@/utilities/log-handler';
import { parseInteger } from '@/utilities/parse-integer';
import { isExitName } from '../tiles/exit-directions';
import type { World } from '../world';
import { WorldErrorKind, type WorldResult } from '../world-error';
import {
    type Action,
    type ActionResult,
    type DropAction,
    type MoveBlockAction,
    type MoveBuilderAction,
    actionFailed,
    actionSuccess,
    formatAction,
} from './command-types';

const log = new LogHandler('Command');

/** Turn a domain result into the action's outcome line */
function toActionResult(result: WorldResult<unknown>, successMessage: string): ActionResult {
    return result.success ? actionSuccess(successMessage) : actionFailed(result.error.kind);
}

function executeDig(world: World): ActionResult {
    return toActionResult(world.builder.digOnCurrentTile(), 'Top block on current tile removed');
}

function executeDrop(world: World, action: DropAction): ActionResult {
    const index = parseInteger(action.index);
    if (index === undefined) {
        return actionFailed(WorldErrorKind.InvalidAction);
    }
    return toActionResult(world.builder.dropFromInventory(index), 'Dropped a block from inventory');
}

function executeMoveBlock(world: World, action: MoveBlockAction): ActionResult {
    if (!isExitName(action.direction)) {
        return actionFailed(WorldErrorKind.InvalidAction);
    }
    const tile = world.builder.getCurrentTile();
    return toActionResult(tile.moveBlock(action.direction), `Moved block ${action.direction}`);
}

function executeMoveBuilder(world: World, action: MoveBuilderAction): ActionResult {
    if (!isExitName(action.direction)) {
        return actionFailed(WorldErrorKind.InvalidAction);
    }
    const target = world.builder.getCurrentTile().getExit(action.direction);
    return toActionResult(world.builder.moveTo(target), `Moved builder ${action.direction}`);
}

/**
 * Apply one action to the world.
 * Domain failures (no exit, too high, too low, unusable block) and bad payloads
 * come back as a failed ActionResult; they never abort a stream of actions.
 */
export function processAction(world: World, action: Action): ActionResult {
    let result: ActionResult;

    switch (action.type) {
    case 'DIG':
        result = executeDig(world);
        break;
    case 'DROP':
        result = executeDrop(world, action);
        break;
    case 'MOVE_BLOCK':
        result = executeMoveBlock(world, action);
        break;
    case 'MOVE_BUILDER':
        result = executeMoveBuilder(world, action);
        break;
    default:
        result = actionFailed(WorldErrorKind.InvalidAction);
    }

    if (log.isDebugEnabled()) {
        log.debug(`${formatAction(action)} -> ${result.message}`);
    }
    return result;
}
