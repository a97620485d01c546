/**
 * Command Output
 *
 * Commands and help rendering write lines to a LineSink handed to them; they
 * never print. OutputBuffer collects lines, warnings and errors for one input
 * line and hands them to the host on flush, applying the `| pattern` filter.
 */

import { InvalidFilterError, errorMessage } from './errors.js';

/**
 * Append-only, line-oriented output destination
 */
export interface LineSink {
    appendLine(line: string): void;
}

export type OutputLevel = 'info' | 'warning' | 'error';

/** Receives flushed lines */
export type OutputWriter = (text: string, level: OutputLevel) => void;

/**
 * Appends every line of a multi-line text
 */
export function appendLines(sink: LineSink, text: string): void {
    for (const line of text.split('\n')) {
        sink.appendLine(line);
    }
}

/**
 * Appends a value as pretty-printed JSON
 */
export function appendJson(sink: LineSink, value: unknown): void {
    appendLines(sink, JSON.stringify(value, null, 2));
}

/**
 * Appends a "key: value" line with the key padded to a fixed width
 */
export function appendKeyValue(sink: LineSink, key: string, value: unknown, padding: number): void {
    sink.appendLine(`${key.padEnd(padding)}: ${String(value)}`);
}

/**
 * Buffers output until the host flushes it
 */
export class OutputBuffer implements LineSink {
    private lines: string[] = [];
    private warnings: string[] = [];
    private errors: string[] = [];
    private filter: { regex: RegExp; invert: boolean } | null = null;

    appendLine(line: string): void {
        this.lines.push(line);
    }

    /** Warnings are always shown, regardless of the filter */
    addWarning(message: string): void {
        this.warnings.push(message);
    }

    /** Errors are always shown, regardless of the filter */
    addError(message: string): void {
        this.errors.push(message);
    }

    /**
     * Keeps only lines matching the pattern (or not matching, when inverted)
     *
     * @throws InvalidFilterError when the pattern is not a valid regex
     */
    setFilter(pattern: string, invert: boolean): void {
        let regex: RegExp;
        try {
            regex = new RegExp(pattern);
        } catch (err) {
            throw new InvalidFilterError(pattern, errorMessage(err));
        }
        this.filter = { regex, invert };
    }

    clearFilter(): void {
        this.filter = null;
    }

    /**
     * Writes warnings, errors, then the (filtered) lines, and empties the buffer
     */
    flush(write: OutputWriter): void {
        for (const warning of this.warnings) {
            write(`Warning: ${warning}`, 'warning');
        }
        for (const error of this.errors) {
            write(`Error: ${error}`, 'error');
        }

        const filter = this.filter;
        for (const line of this.lines) {
            if (filter && filter.regex.test(line) === filter.invert) {
                continue;
            }
            write(line, 'info');
        }

        this.lines = [];
        this.warnings = [];
        this.errors = [];
    }
}
