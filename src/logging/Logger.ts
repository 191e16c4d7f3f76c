/**
 * @file Logger
 *
 * Leveled console logger. Every line carries a timestamp, the level and the
 * emitting component; levels are colored through chalk when color is on.
 *
 * @module
 */

import chalk from 'chalk';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    trace(component: string, message: string, data?: object): void;
    debug(component: string, message: string, data?: object): void;
    info(component: string, message: string, data?: object): void;
    warn(component: string, message: string, data?: object): void;
    error(component: string, message: string, error?: unknown): void;
    level_get(): LogLevel;
}

export interface LoggerOptions {
    level: LogLevel;
    /** Receives one formatted line (without trailing newline). Defaults to stderr. */
    sink?: (line: string) => void;
    color?: boolean;
    clock?: () => Date;
}

/** Numeric rank per level; a message is written when its rank >= the logger's. */
export const LOG_LEVELS: Record<LogLevel, number> = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
    silent: 100
};

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_COLORS: Record<MessageLevel, (text: string) => string> = {
    trace: (text: string): string => chalk.gray(text),
    debug: (text: string): string => chalk.cyan(text),
    info: (text: string): string => chalk.white(text),
    warn: (text: string): string => chalk.yellow(text),
    error: (text: string): string => chalk.red(text)
};

/**
 * Format one log entry.
 *
 * @example
 * `[2026-01-01T00:00:00.000Z - INFO] [handler] - Saving archive as out.vdf...`
 */
export function logEntry_format(
    level: MessageLevel,
    component: string,
    message: string,
    timestamp: Date,
    extra?: unknown
): string {
    let entry: string = `[${timestamp.toISOString()} - ${level.toUpperCase()}] [${component}] - ${message}`;
    if (extra instanceof Error) {
        entry += `\n  Error: ${extra.message}`;
    } else if (extra !== undefined) {
        entry += `\n  ${JSON.stringify(extra)}`;
    }
    return entry;
}

/**
 * Create a logger writing to `sink` (stderr by default).
 */
export function logger_create(options: LoggerOptions): Logger {
    const threshold: number = LOG_LEVELS[options.level];
    const sink: (line: string) => void = options.sink ?? ((line: string): void => {
        process.stderr.write(line + '\n');
    });
    const color: boolean = options.color ?? false;
    const clock: () => Date = options.clock ?? ((): Date => new Date());

    function write(level: MessageLevel, component: string, message: string, extra?: unknown): void {
        if (LOG_LEVELS[level] < threshold) return;
        const entry: string = logEntry_format(level, component, message, clock(), extra);
        sink(color ? LEVEL_COLORS[level](entry) : entry);
    }

    return {
        trace: (component: string, message: string, data?: object): void => write('trace', component, message, data),
        debug: (component: string, message: string, data?: object): void => write('debug', component, message, data),
        info: (component: string, message: string, data?: object): void => write('info', component, message, data),
        warn: (component: string, message: string, data?: object): void => write('warn', component, message, data),
        error: (component: string, message: string, error?: unknown): void => write('error', component, message, error),
        level_get: (): LogLevel => options.level
    };
}

/**
 * Logger that drops everything; the default for library use and tests.
 */
export function logger_null(): Logger {
    return logger_create({ level: 'silent', sink: (): void => {} });
}
