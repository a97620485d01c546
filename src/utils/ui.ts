/**
 * Console UI helpers
 *
 * Colors and status lines for the host. Only the CLI and the REPL print;
 * commands write to their output sink.
 */

import chalk from 'chalk';
import type { OutputLevel } from '../core/output.js';

export const colors = {
    dim: chalk.dim,
    red: chalk.red,
    yellow: chalk.yellow,
};

/**
 * Prints an error and exits
 */
export function error(message: string): never {
    console.error(colors.red(`✗ ${message}`));
    process.exit(1);
}

/**
 * Writes one flushed output line, colored by level
 */
export function writeOutput(text: string, level: OutputLevel): void {
    switch (level) {
        case 'warning':
            console.log(colors.yellow(text));
            break;
        case 'error':
            console.log(colors.red(text));
            break;
        default:
            console.log(text);
    }
}
