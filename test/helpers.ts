import { BaseCommand } from '../src/core/command.js';
import type { LineSink, OutputBuffer, OutputLevel } from '../src/core/output.js';
import type { OptionTable } from '../src/core/options.js';
import type { ParsedTokens } from '../src/core/tokenizer.js';

export const CLASS_NAMES = ['acme', 'acme2', 'beta'];

const CLASS_INFO_FIELDS = {
    name: {
        short: 'n',
        long: 'name',
        help: 'Name of the class',
        type: 'string',
        autocomplete: (_tree, prefix) => CLASS_NAMES.filter((name) => name.startsWith(prefix)),
    },
    json: { short: 'j', long: 'json', help: 'Output in JSON format', type: 'bool', flag: true },
} satisfies OptionTable;

/**
 * Writes the parsed option values to the sink it is given as its client
 */
export class ClassInfo extends BaseCommand<LineSink> {
    protected readonly fields = CLASS_INFO_FIELDS;
    protected readonly info = {
        about: 'Show a class',
        longAbout: 'Shows one class by name.',
        examples: '--name acme\n-n acme --json',
    };

    execute(sink: LineSink, tokens: ParsedTokens): void {
        const options = this.parse(tokens);
        sink.appendLine(`name: ${options.requireString('name')}`);
        sink.appendLine(`json: ${String(options.flag('json'))}`);
    }
}

/**
 * A command without options or text
 */
export class Noop extends BaseCommand<LineSink> {
    protected readonly fields = {};

    execute(sink: LineSink): void {
        sink.appendLine('noop');
    }
}

/**
 * Collects lines appended to it
 */
export class LineCollector implements LineSink {
    readonly lines: string[] = [];

    appendLine(line: string): void {
        this.lines.push(line);
    }
}

/**
 * Flushes a buffer and returns what it wrote
 */
export function flushed(buffer: OutputBuffer): Array<[string, OutputLevel]> {
    const written: Array<[string, OutputLevel]> = [];
    buffer.flush((text, level) => written.push([text, level]));
    return written;
}

/**
 * Flushes a buffer and returns the text of every line
 */
export function flushedLines(buffer: OutputBuffer): string[] {
    return flushed(buffer).map(([text]) => text);
}

/**
 * Returns whatever the function throws
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected the call to throw');
}
