/**
 * Commands module public API
 *
 * All external code should import from this barrel file.
 */

// Action types and helpers
export type {
    Action,
    MoveBuilderAction,
    MoveBlockAction,
    DigAction,
    DropAction,
    ActionResult,
} from './command-types';

export {
    actionSuccess,
    actionFailed,
    isMovementAction,
    formatAction,
} from './command-types';

// Parsing and execution
export { parseAction } from './action-parser';
export { processAction } from './command';
export { processActions, readActionLines } from './action-stream';
