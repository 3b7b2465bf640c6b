import { LogManager, LogType } from './log-manager';

/**
 * Module logger. Every handler writes through the one static LogManager,
 * tagged with the name given here.
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(public readonly moduleName: string) {}

    public error(msg: string, exception?: Error): void {
        this.write(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.write(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.write(LogType.Info, msg);
    }

    /** Objects are written as JSON */
    public debug(msg: string | object): void {
        this.write(LogType.Debug, typeof msg === 'string' ? msg : JSON.stringify(msg));
    }

    /** True when debug messages pass the level filter */
    public isDebugEnabled(): boolean {
        return LogHandler.manager.isEnabled(LogType.Debug);
    }

    private write(type: LogType, msg: string, exception?: Error): void {
        LogHandler.manager.push({ type, source: this.moduleName, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
