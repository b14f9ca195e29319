/**
 * Internal logging utility for objgraph.
 * Structured logging with levels and tags, so library noise can be
 * silenced or turned into JSON lines by the host application.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export class Logger {
    private level?: LogLevel;
    private useJson?: boolean;
    private readonly tag: string;
    private readonly parent?: Logger;

    constructor(tag: string = 'objgraph', debug: boolean = false, parent?: Logger) {
        this.tag = tag;
        this.parent = parent;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    /**
     * The explicit level of this logger, else its parent's, else INFO.
     */
    public getLogLevel(): LogLevel {
        return this.level ?? this.parent?.getLogLevel() ?? LogLevel.INFO;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    public isJson(): boolean {
        return this.useJson ?? this.parent?.isJson() ?? false;
    }

    private log(method: 'debug' | 'info' | 'warn' | 'error', levelName: string, message: string, ...args: unknown[]): void {
        if (this.isJson()) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args : undefined
            };
            console[method](JSON.stringify(entry, jsonSafe));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.getLogLevel() <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, ...args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.getLogLevel() <= LogLevel.INFO) {
            this.log('info', 'INFO', message, ...args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.getLogLevel() <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, ...args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.getLogLevel() <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, ...args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     * Until configured directly, the child follows its parent's level and output mode.
     */
    public child(subTag: string): Logger {
        return new Logger(`${this.tag}:${subTag}`, false, this);
    }
}

// JSON.stringify chokes on bigint (uint64 fields, root seq numbers).
function jsonSafe(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() + 'n' : value;
}

// Global default logger
export const logger = new Logger('objgraph');
