import { describe, it, expect, beforeEach } from 'vitest';
import { dispatch, applyFilter, resolveCommand } from '../../src/core/dispatch.js';
import { BaseCommand } from '../../src/core/command.js';
import { CommandTree } from '../../src/core/tree.js';
import type { OptionTable } from '../../src/core/options.js';
import type { ParsedTokens } from '../../src/core/tokenizer.js';
import { OutputBuffer, type LineSink } from '../../src/core/output.js';
import { CommandNotFoundError, InvalidFilterError, MissingOptionsError } from '../../src/core/errors.js';
import { ClassInfo, Noop, captureError, flushedLines } from '../helpers.js';

const CONNECT_FIELDS = {
    host: { short: 'h', long: 'host', help: 'Host to connect to', type: 'string' },
} satisfies OptionTable;

class Connect extends BaseCommand<LineSink> {
    protected readonly fields = CONNECT_FIELDS;

    execute(sink: LineSink, tokens: ParsedTokens): void {
        sink.appendLine(`host: ${this.parse(tokens).requireString('host')}`);
    }
}

/**
 * Writes the scope path and positionals it was given
 */
class Where extends BaseCommand<LineSink> {
    protected readonly fields = {};

    execute(sink: LineSink, tokens: ParsedTokens): void {
        sink.appendLine(`scopes: ${JSON.stringify(tokens.getScopes())}`);
        sink.appendLine(`positionals: ${JSON.stringify(tokens.getPositionals())}`);
    }
}

describe('Dispatch', () => {
    let tree: CommandTree<LineSink>;
    let buffer: OutputBuffer;

    const run = (line: string) => dispatch(tree, line, { client: buffer, output: buffer });

    beforeEach(() => {
        tree = new CommandTree<LineSink>();
        tree.addCommand('help', new Noop());
        tree.addCommand('connect', new Connect());
        tree.addScope('class').addCommand('info', new ClassInfo());
        tree.addScope('where').addCommand('where', new Where());
        buffer = new OutputBuffer();
    });

    describe('applyFilter', () => {
        it('should strip the filter from the line', () => {
            expect(applyFilter('history list | foo', buffer)).toBe('history list');
        });

        it('should leave lines without a pipe unchanged', () => {
            expect(applyFilter('history list ', buffer)).toBe('history list ');
        });
    });

    describe('resolveCommand', () => {
        it('should walk scopes to the command', () => {
            const resolved = resolveCommand(tree, ['class', 'info', '--name', 'acme']);

            expect(resolved.name).toBe('info');
            expect(resolved.context).toEqual(['class']);
            expect(resolved.command).toBe(tree.getScope('class')?.getCommand('info'));
        });

        it('should report unknown words', () => {
            const err = captureError(() => resolveCommand(tree, ['class', 'bogus']));
            expect(err).toBeInstanceOf(CommandNotFoundError);
            expect(err).toHaveProperty('command', 'bogus');
        });

        it('should report a path that ends in a scope', () => {
            const err = captureError(() => resolveCommand(tree, ['class']));
            expect(err).toBeInstanceOf(CommandNotFoundError);
            expect(err).toHaveProperty('message', 'Command not found: class');
        });
    });

    describe('dispatch', () => {
        it('should execute the resolved command', async () => {
            await run('class info --name acme');
            expect(flushedLines(buffer)).toEqual(['name: acme', 'json: false']);
        });

        it('should ignore blank lines', async () => {
            await run('   ');
            expect(flushedLines(buffer)).toEqual([]);
        });

        it('should render help without validating', async () => {
            await run('class info --help');
            const lines = flushedLines(buffer);

            expect(lines[0]).toBe('class info - Show a class');
            expect(lines).toHaveLength(12);
        });

        it('should resolve a command named like its scope', async () => {
            await run('where where extra');
            expect(flushedLines(buffer)).toEqual(['scopes: ["where"]', 'positionals: ["extra"]']);
        });

        it('should run a command whose field uses -h', async () => {
            await run('connect -h example.test');
            expect(flushedLines(buffer)).toEqual(['host: example.test']);
        });

        it('should render help through --help when -h is taken', async () => {
            await run('connect --help');
            expect(flushedLines(buffer)).toEqual([
                'connect',
                '',
                'Options:',
                '  -h, --host <string> Host to connect to',
                '      --help <bool>   Prints help information (flag)',
                '',
            ]);
        });

        it('should validate before executing', async () => {
            await expect(run('class info --json')).rejects.toBeInstanceOf(MissingOptionsError);
            expect(flushedLines(buffer)).toEqual([]);
        });

        it('should filter the output', async () => {
            await run('class info --name acme | json');
            expect(flushedLines(buffer)).toEqual(['json: false']);

            await run('class info --name acme | !json');
            expect(flushedLines(buffer)).toEqual(['name: acme']);
        });

        it('should clear the filter on the next line', async () => {
            await run('class info --name acme | json');
            flushedLines(buffer);

            await run('class info --name acme');
            expect(flushedLines(buffer)).toEqual(['name: acme', 'json: false']);
        });

        it('should reject an invalid filter', async () => {
            await expect(run('class info --name acme | (')).rejects.toBeInstanceOf(InvalidFilterError);
        });

        it('should reject unknown commands', async () => {
            await expect(run('bogus')).rejects.toBeInstanceOf(CommandNotFoundError);
        });
    });
});
