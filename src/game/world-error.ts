/**
 * Error kinds and the tagged result type returned by every world operation.
 * World operations never throw; callers switch on `error.kind`.
 */

export enum WorldErrorKind {
    /** No exit in the requested direction, or the builder cannot enter the tile */
    NoExit = 'no_exit',
    /** A block would end up above the allowed height */
    TooHigh = 'too_high',
    /** No block to take */
    TooLow = 'too_low',
    /** The block cannot be used for this operation */
    InvalidBlock = 'invalid_block',
    /** An action payload that makes no sense (bad direction, non-numeric index) */
    InvalidAction = 'invalid_action',
    /** Malformed world file or action line */
    Format = 'format',
    /** Tile layout with two tiles on one position, or one tile on two positions */
    Inconsistent = 'inconsistent',
    /** World file does not exist */
    FileNotFound = 'file_not_found',
    /** Any other read/write failure */
    Io = 'io',
}

export interface WorldError {
    kind: WorldErrorKind;
    message: string;
}

export interface WorldSuccess<T> {
    success: true;
    value: T;
}

export interface WorldFailure {
    success: false;
    error: WorldError;
}

export type WorldResult<T> = WorldSuccess<T> | WorldFailure;

/** Successful result with no value */
export const WORLD_OK: WorldSuccess<void> = { success: true, value: undefined };

export function worldSuccess<T>(value: T): WorldSuccess<T> {
    return { success: true, value };
}

export function worldFailed(kind: WorldErrorKind, message: string): WorldFailure {
    return { success: false, error: { kind, message } };
}

/** Default human-readable description per kind, used when no detail is needed */
export const DEFAULT_ERROR_MESSAGES: Record<WorldErrorKind, string> = {
    [WorldErrorKind.NoExit]: 'No exit this way',
    [WorldErrorKind.TooHigh]: 'Too high',
    [WorldErrorKind.TooLow]: 'Too low',
    [WorldErrorKind.InvalidBlock]: 'Cannot use that block',
    [WorldErrorKind.InvalidAction]: 'Error: Invalid action',
    [WorldErrorKind.Format]: 'Invalid format',
    [WorldErrorKind.Inconsistent]: 'Inconsistent tile layout',
    [WorldErrorKind.FileNotFound]: 'File not found',
    [WorldErrorKind.Io]: 'I/O error',
};

/** Shorthand for a failure carrying the default message of its kind */
export function worldFailedWith(kind: WorldErrorKind): WorldFailure {
    return worldFailed(kind, DEFAULT_ERROR_MESSAGES[kind]);
}
