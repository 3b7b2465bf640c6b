import { describe, it, expect } from 'vitest';
import { formatAction, isMovementAction, parseAction } from '@/game/commands';
import { WorldErrorKind } from '@/game/world-error';
import { unwrap } from '../helpers/test-world';

function expectParseError(line: string, message: string): void {
    const result = parseAction(line);
    expect(result.success).toBe(false);
    if (result.success) { return }
    expect(result.error.kind).toBe(WorldErrorKind.Format);
    expect(result.error.message).toBe(message);
}

describe('parseAction', () => {
    it('should parse every primary action', () => {
        expect(unwrap(parseAction('DIG'))).toEqual({ type: 'DIG' });
        expect(unwrap(parseAction('DROP 2'))).toEqual({ type: 'DROP', index: '2' });
        expect(unwrap(parseAction('MOVE_BLOCK east'))).toEqual({ type: 'MOVE_BLOCK', direction: 'east' });
        expect(unwrap(parseAction('MOVE_BUILDER north'))).toEqual({ type: 'MOVE_BUILDER', direction: 'north' });
    });

    it('should keep the secondary token verbatim', () => {
        expect(unwrap(parseAction('MOVE_BUILDER upwards'))).toEqual({ type: 'MOVE_BUILDER', direction: 'upwards' });
        expect(unwrap(parseAction('DROP x'))).toEqual({ type: 'DROP', index: 'x' });
        expect(unwrap(parseAction('DROP '))).toEqual({ type: 'DROP', index: '' });
    });

    it('should return null at end of input', () => {
        expect(unwrap(parseAction(null))).toBeNull();
        expect(unwrap(parseAction(undefined))).toBeNull();
    });

    it('should reject more than two tokens', () => {
        expectParseError('MOVE_BUILDER north now', 'Too many tokens on line');
        expectParseError('DIG  ', 'Too many tokens on line');
    });

    it('should reject unknown or misused actions', () => {
        expectParseError('FROBNICATE', 'Unrecognised action given');
        expectParseError('', 'Unrecognised action given');
        expectParseError('dig', 'Unrecognised action given');
        expectParseError('DIG now', 'Unrecognised action given');
        expectParseError('DIG ', 'Unrecognised action given');
        expectParseError('DROP', 'Unrecognised action given');
        expectParseError('MOVE_BUILDER', 'Unrecognised action given');
    });
});

describe('formatAction', () => {
    it('should write actions the way they are parsed', () => {
        for (const line of ['DIG', 'DROP 0', 'MOVE_BLOCK west', 'MOVE_BUILDER south']) {
            const action = unwrap(parseAction(line));
            expect(action).not.toBeNull();
            if (!action) { return }
            expect(formatAction(action)).toBe(line);
        }
    });

    it('should tell movement actions apart', () => {
        expect(isMovementAction({ type: 'MOVE_BLOCK', direction: 'north' })).toBe(true);
        expect(isMovementAction({ type: 'DROP', index: '0' })).toBe(false);
    });
});
