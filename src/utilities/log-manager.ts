export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

/** Minimum level names accepted by the settings file */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Where formatted lines end up. Defaults to stderr so stdout stays free for action output. */
export type LogSink = (type: LogType, line: string) => void;

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept in memory */
const LOG_HISTORY_SIZE = 100;

/** Severity rank per type; a message is written when its rank <= the level's rank */
const TYPE_RANK: Record<LogType, number> = {
    [LogType.Error]: 0,
    [LogType.Warn]: 1,
    [LogType.Info]: 2,
    [LogType.Debug]: 3,
};

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: -1,
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

const TYPE_LABEL: Record<LogType, string> = {
    [LogType.Error]: 'ERROR',
    [LogType.Warn]: 'WARN',
    [LogType.Info]: 'INFO',
    [LogType.Debug]: 'DEBUG',
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Drop node-internal frames from a stack trace; they never point at world code.
 */
function cleanStackTrace(stack: string): string {
    return stack
        .split('\n')
        .filter(line => !line.includes('node:internal'))
        .join('\n');
}

const stderrSink: LogSink = (_type, line) => {
    process.stderr.write(line + '\n');
};

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private level: LogLevel = 'info';
    private sink: LogSink = stderrSink;

    /** Throttle state: source+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    /** Whether a message of this type passes the level filter */
    public isEnabled(type: LogType): boolean {
        return TYPE_RANK[type] <= LEVEL_RANK[this.level];
    }

    /** Replace the output sink; passing null restores stderr */
    public setSink(sink: LogSink | null): void {
        this.sink = sink ?? stderrSink;
    }

    /** Forget history and throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        // save message to log
        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        // publish to listener
        if (this.listener) {
            this.listener(msg);
        }

        if (!this.isEnabled(msg.type)) {
            return;
        }

        const throttleKey = `${msg.source}:${msg.type}:${msg.msg}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        let formatted = `${TYPE_LABEL[msg.type]}\t${msg.source}\t${msg.msg}${suppressedNote}`;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        this.sink(msg.type, formatted);
    }
}
