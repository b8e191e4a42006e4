/**
 * Copyright (c) 2024 Discover Financial Services
*/
export type LogLevelName = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "verbose";

/**
 * Where log lines are written.  Defaults to the console; tests and hosts may
 * substitute their own sink.
 */
export interface LogSink {
    log(msg: string, ...elements: unknown[]): void;
}

export class Log {

    private static readonly levels: LogLevelName[] = ["fatal", "error", "warn", "info", "debug", "trace", "verbose"];
    private static readonly levelsLog = ["fat", "err", "wrn", "inf", "dbg", "trc", "vrb"];
    public static level = 3;

    public static new(name: string, levelName?: string): Log {
        return new Log(name, levelName);
    }

    public static getLevelNames(): LogLevelName[] {
        return [...this.levels];
    }

    public static isLevelName(name: string): name is LogLevelName {
        return this.levels.some((level) => level === name);
    }

    /**
     * Set the process-wide default level used by logs created without one.
     * @throws if the name is not one of {@link Log.getLevelNames}
     */
    public static setLogLevel(levelName: string): boolean {
        const level = this.logLevelNameToNumber(levelName);
        if (level === undefined) throw new Error(`'${levelName}' is an invalid log level name; expecting one of ${JSON.stringify(this.levels)}`);
        this.level = level;
        return true;
    }

    public static logLevelNameToNumber(name?: string): number | undefined {
        if (!name) return Log.level;
        const level = this.levels.findIndex((l) => l === name);
        if (level < 0) return undefined;
        return level;
    }

    public readonly id: string;
    public level: number;
    public bufferLevel?: number;
    public readonly buffer: string[] = [];
    public sink: LogSink = console;

    constructor(id: string, levelName?: string) {
        this.id = id;
        const levelNumber = Log.logLevelNameToNumber(levelName);
        this.level = levelNumber !== undefined ? levelNumber : Log.level;
    }

    public setLogLevel(levelName: string): boolean {
        const levelNumber = Log.logLevelNameToNumber(levelName);
        if (levelNumber === undefined) return false;
        this.level = levelNumber;
        return true;
    }

    public setBufferLogLevel(levelName?: string): boolean {
        if (!levelName) {
            this.bufferLevel = undefined;
            return true;
        }
        const levelNumber = Log.logLevelNameToNumber(levelName);
        if (levelNumber === undefined) return false;
        this.bufferLevel = levelNumber;
        return true;
    }

    public setSink(sink: LogSink) {
        this.sink = sink;
    }

    public isEnabled(level: number): boolean {
        return this.isNormalEnabled(level) || this.isBufferEnabled(level);
    }

    private isNormalEnabled(level: number): boolean {
        return level <= this.level;
    }

    private isBufferEnabled(level: number): boolean {
        return this.bufferLevel !== undefined && level <= this.bufferLevel;
    }

    public isWarnEnabled(): boolean {
        return this.isEnabled(2);
    }

    public isInfoEnabled(): boolean {
        return this.isEnabled(3);
    }

    public isDebugEnabled(): boolean {
        return this.isEnabled(4);
    }

    public isTraceEnabled(): boolean {
        return this.isEnabled(5);
    }

    public isVerboseEnabled(): boolean {
        return this.isEnabled(6);
    }

    public fatal(s: string, ...elements: unknown[]) { this.log(0, s, ...elements) }
    public error(s: string, ...elements: unknown[]) { this.log(1, s, ...elements) }
    public warn(s: string, ...elements: unknown[]) { this.log(2, s, ...elements) }
    public info(s: string, ...elements: unknown[]) { this.log(3, s, ...elements) }
    public debug(s: string, ...elements: unknown[]) { this.log(4, s, ...elements) }
    public trace(s: string, ...elements: unknown[]) { this.log(5, s, ...elements) }
    public verbose(s: string, ...elements: unknown[]) { this.log(6, s, ...elements) }

    public log(level: number, s: string, ...elements: unknown[]) {
        if (!this.isEnabled(level)) return;
        const msg = `${new Date().toISOString()} ${Log.levelsLog[level] ?? "???"} ${this.id} ${s}`;
        if (this.isNormalEnabled(level)) {
            if (elements.length === 0) {
                this.sink.log(msg);
            } else {
                this.sink.log(msg, elements);
            }
        }
        if (this.isBufferEnabled(level)) {
            this.buffer.push(msg);
        }
    }

    public flushBuffer(msg: string) {
        const sep = "\n    ";
        this.warn(`${msg}:${sep}${this.buffer.join(sep)}`);
        this.buffer.length = 0;
    }

}
