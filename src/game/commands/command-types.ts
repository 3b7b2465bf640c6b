import { DEFAULT_ERROR_MESSAGES, WorldErrorKind } from '../world-error';

// === Movement Actions ===

export interface MoveBuilderAction {
    type: 'MOVE_BUILDER';
    /** Exit name, checked when the action is processed */
    direction: string;
}

export interface MoveBlockAction {
    type: 'MOVE_BLOCK';
    direction: string;
}

// === Block Actions ===

export interface DigAction {
    type: 'DIG';
}

export interface DropAction {
    type: 'DROP';
    /** Inventory index as written in the stream, e.g. "0" or "-1" */
    index: string;
}

/**
 * Union type of all builder actions.
 */
export type Action =
    | MoveBuilderAction
    | MoveBlockAction
    | DigAction
    | DropAction;

// === Action Result Types ===

/**
 * Result of processing one action. `message` is the single line reported
 * for the action, whether it succeeded or not.
 */
export interface ActionResult {
    success: boolean;
    message: string;
    /** Failure kind when success is false */
    error?: WorldErrorKind;
}

export function actionSuccess(message: string): ActionResult {
    return { success: true, message };
}

/** Failed result carrying the standard message for the error kind */
export function actionFailed(error: WorldErrorKind): ActionResult {
    return { success: false, message: DEFAULT_ERROR_MESSAGES[error], error };
}

/**
 * Type guard for actions that take a direction.
 */
export function isMovementAction(action: Action): action is MoveBuilderAction | MoveBlockAction {
    return action.type === 'MOVE_BUILDER' || action.type === 'MOVE_BLOCK';
}

/** Render an action the way it is written in an action stream */
export function formatAction(action: Action): string {
    if (isMovementAction(action)) {
        return `${action.type} ${action.direction}`;
    }
    return action.type === 'DROP' ? `DROP ${action.index}` : action.type;
}
