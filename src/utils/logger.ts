/**
 * Logging
 *
 * Structured pino logger for the shell host. Logs go to stderr so they never
 * mix with command output on stdout. The shell core does not log.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
    /** Minimum level (default: LOG_LEVEL or 'warn') */
    level?: string;
    name?: string;
    /** File descriptor or path to write to (default: stderr) */
    destination?: number | string;
}

/**
 * Creates a logger writing JSON lines
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    return pino(
        {
            name: options.name ?? 'treeshell',
            level: options.level ?? process.env.LOG_LEVEL ?? 'warn',
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label }),
            },
        },
        pino.destination(options.destination ?? 2)
    );
}
