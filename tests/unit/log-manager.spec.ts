import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { type ILogMessage, LogManager, LogType, isLogLevel } from '@/utilities/log-manager';

describe('LogManager', () => {
    let manager: LogManager;
    let written: string[];

    beforeEach(() => {
        manager = new LogManager();
        written = [];
        manager.setSink((_type, line) => written.push(line));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should write tab-separated lines with the level label', () => {
        manager.push({ type: LogType.Warn, source: 'Parser', msg: 'odd input' });
        expect(written).toEqual(['WARN\tParser\todd input']);
    });

    it('should append the exception message after the line', () => {
        const error = new Error('disk full');
        error.stack = undefined;
        manager.push({ type: LogType.Error, source: 'Save', msg: 'write failed', exception: error });
        expect(written).toEqual(['ERROR\tSave\twrite failed\ndisk full']);
    });

    it('should filter by the minimum level', () => {
        manager.setLevel('warn');
        manager.push({ type: LogType.Info, source: 'A', msg: 'info' });
        manager.push({ type: LogType.Debug, source: 'A', msg: 'debug' });
        manager.push({ type: LogType.Error, source: 'A', msg: 'error' });
        expect(written).toEqual(['ERROR\tA\terror']);

        manager.setLevel('silent');
        manager.push({ type: LogType.Error, source: 'A', msg: 'hidden' });
        expect(written).toHaveLength(1);
    });

    it('should pass every message to the listener regardless of level', () => {
        const received: ILogMessage[] = [];
        manager.setLevel('error');
        manager.onLogMessage(msg => received.push(msg));
        manager.push({ type: LogType.Debug, source: 'A', msg: 'quiet' });

        expect(received.map(msg => msg.msg)).toEqual(['quiet']);
        expect(received[0].index).toBe(0);
        expect(written).toEqual([]);
    });

    it('should replay history to a new listener', () => {
        manager.push({ type: LogType.Info, source: 'A', msg: 'first' });
        manager.push({ type: LogType.Info, source: 'A', msg: 'second' });

        const received: string[] = [];
        manager.onLogMessage(msg => received.push(msg.msg));
        expect(received).toEqual(['first', 'second']);
    });

    it('should keep the last 100 messages', () => {
        for (let i = 0; i < 120; i++) {
            manager.push({ type: LogType.Debug, source: 'A', msg: `m${i}` });
        }
        expect(manager.log).toHaveLength(100);
        expect(manager.log[0].msg).toBe('m20');
    });

    it('should throttle identical messages within one second', () => {
        const now = vi.spyOn(performance, 'now');
        now.mockReturnValueOnce(0).mockReturnValueOnce(500).mockReturnValueOnce(1500);

        manager.push({ type: LogType.Info, source: 'A', msg: 'again' });
        manager.push({ type: LogType.Info, source: 'A', msg: 'again' });
        manager.push({ type: LogType.Info, source: 'A', msg: 'again' });

        expect(written).toEqual([
            'INFO\tA\tagain',
            'INFO\tA\tagain (1 similar suppressed)',
        ]);
    });

    it('should forget throttle state and history on clear', () => {
        manager.push({ type: LogType.Info, source: 'A', msg: 'once' });
        manager.clear();
        manager.push({ type: LogType.Info, source: 'A', msg: 'once' });

        expect(written).toEqual(['INFO\tA\tonce', 'INFO\tA\tonce']);
        expect(manager.log).toHaveLength(1);
    });

    it('should recognise level names', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('silent')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});

describe('LogHandler', () => {
    afterEach(() => {
        LogHandler.getLogManager().onLogMessage(null);
    });

    it('should tag messages with the module name', () => {
        const received: ILogMessage[] = [];
        LogHandler.getLogManager().onLogMessage(msg => received.push(msg));
        received.length = 0;

        new LogHandler('Builder').debug({ inventory: ['wood'] });

        expect(received).toHaveLength(1);
        expect(received[0].source).toBe('Builder');
        expect(received[0].type).toBe(LogType.Debug);
        expect(received[0].msg).toBe('{"inventory":["wood"]}');
    });

    it('should report whether debug output is enabled', () => {
        const manager = LogHandler.getLogManager();
        const handler = new LogHandler('Test');
        const previous = manager.getLevel();

        manager.setLevel('debug');
        expect(handler.isDebugEnabled()).toBe(true);
        manager.setLevel('info');
        expect(handler.isDebugEnabled()).toBe(false);

        manager.setLevel(previous);
    });
});
