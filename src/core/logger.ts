/**
 * Tagged console logging shared by every component of the node.
 *
 * Output looks like `[DISCOVERY] Broadcasting...` with the tag coloured,
 * so the interleaved output of the listeners stays readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const COLORS = {
    cyan: '\x1b[36m',
    green: '\x1b[32m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    magenta: '\x1b[35m',
} as const;

export type LogColor = keyof typeof COLORS;

const RESET = '\x1b[0m';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

let minLogLevel: LogLevel = 'info';

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LOG_LEVEL_PRIORITY, value);

export const setLogLevel = (level: LogLevel): void => {
    minLogLevel = level;
};

export const getLogLevel = (): LogLevel => minLogLevel;

export class Logger {
    constructor(private readonly tag: string, private readonly color: LogColor = 'cyan') { }

    public debug(message: string, ...args: unknown[]): void {
        if (this.enabled('debug')) console.log(this.prefix(), message, ...args);
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.log(this.prefix(), message, ...args);
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(this.prefix('yellow'), message, ...args);
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(this.prefix('red'), message, ...args);
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLogLevel];
    }

    private prefix(color: LogColor = this.color): string {
        return `${COLORS[color]}[${this.tag}]${RESET}`;
    }
}

export const createLogger = (tag: string, color?: LogColor): Logger => new Logger(tag, color);
