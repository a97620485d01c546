import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { tokenize, substituteValue, type ValueResolver } from '../../src/core/tokenizer.js';
import { HttpError, InvalidInputError, InvalidOptionError, IoError } from '../../src/core/errors.js';

const stubResolver: ValueResolver = {
    async fetchText(url) {
        if (url.endsWith('/missing')) {
            throw new Error('status 404');
        }
        return `body of ${url}\n\n`;
    },
    async readText(path) {
        return `contents of ${path}\n`;
    },
};

describe('Tokenizer', () => {
    describe('tokenize', () => {
        it('should split scopes, command and options', async () => {
            const tokens = await tokenize('class info --name acme', 'info');

            expect(tokens.getScopes()).toEqual(['class']);
            expect(tokens.getCommand()).toBe('info');
            expect(tokens.getOptions()).toEqual(new Map([['name', 'acme']]));
            expect(tokens.getPositionals()).toEqual([]);
        });

        it('should store flags with an empty value', async () => {
            const tokens = await tokenize('class info --json -n acme extra', 'info');

            expect(tokens.getOptions()).toEqual(
                new Map([
                    ['json', ''],
                    ['n', 'acme'],
                ])
            );
            expect(tokens.getPositionals()).toEqual(['extra']);
        });

        it('should treat a trailing key as a flag', async () => {
            const tokens = await tokenize('info --verbose', 'info');
            expect(tokens.getOptions().get('verbose')).toBe('');
            expect(tokens.getScopes()).toEqual([]);
        });

        it('should collect positionals', async () => {
            const tokens = await tokenize('config get server.port', 'get');
            expect(tokens.getScopes()).toEqual(['config']);
            expect(tokens.getPositionals()).toEqual(['server.port']);
        });

        it('should keep quoted values whole', async () => {
            const tokens = await tokenize(`class info --name "acme corp"`, 'info');
            expect(tokens.getOption('name')).toBe('acme corp');
        });

        it('should look up options by any of their keys', async () => {
            const tokens = await tokenize('class info -n acme -h', 'info');

            expect(tokens.hasOption('help', 'h')).toBe(true);
            expect(tokens.hasOption('json', 'j')).toBe(false);
            expect(tokens.getOption('name', 'n')).toBe('acme');
            expect(tokens.getOption('json', 'j')).toBeUndefined();
        });

        it('should take the scope path length from the caller', async () => {
            const tokens = await tokenize('info info --name x', 'info', { scopeDepth: 1 });

            expect(tokens.getScopes()).toEqual(['info']);
            expect(tokens.getCommand()).toBe('info');
            expect(tokens.getOptions()).toEqual(new Map([['name', 'x']]));
            expect(tokens.getPositionals()).toEqual([]);
        });

        it('should accept quoted values that start with a dash', async () => {
            const tokens = await tokenize(`calc add --by '-5' --label "-"`, 'add');
            expect(tokens.getOptions()).toEqual(
                new Map([
                    ['by', '-5'],
                    ['label', '-'],
                ])
            );
        });

        it('should read an unquoted dash word as a key', async () => {
            const tokens = await tokenize('calc add --by -5', 'add');
            expect(tokens.getOptions()).toEqual(
                new Map([
                    ['by', ''],
                    ['5', ''],
                ])
            );
        });

        it('should keep quoted dash words as positionals', async () => {
            const tokens = await tokenize(`grep find '-x'`, 'find');
            expect(tokens.getPositionals()).toEqual(['-x']);
            expect(tokens.getOptions().size).toBe(0);
        });

        it('should reject keys without a name', async () => {
            await expect(tokenize('class info -- x', 'info')).rejects.toBeInstanceOf(InvalidOptionError);
        });

        it('should reject unterminated quotes', async () => {
            await expect(tokenize('class info --name "acme', 'info')).rejects.toBeInstanceOf(InvalidInputError);
        });

        it('should substitute URL option values', async () => {
            const tokens = await tokenize('class create --data https://example.test/a.json', 'create', { resolver: stubResolver });
            expect(tokens.getOption('data')).toBe('body of https://example.test/a.json');
        });

        it('should not substitute positionals', async () => {
            const tokens = await tokenize('class create https://example.test/a.json', 'create', { resolver: stubResolver });
            expect(tokens.getPositionals()).toEqual(['https://example.test/a.json']);
        });
    });

    describe('substituteValue', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'treeshell-tokenizer-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should return plain values unchanged', async () => {
            expect(await substituteValue('acme', stubResolver)).toBe('acme');
        });

        it('should read file values and trim trailing whitespace', async () => {
            const file = join(dir, 'body.txt');
            await writeFile(file, 'hello world\n\n');

            expect(await substituteValue(`file://${file}`)).toBe('hello world');
        });

        it('should read file values through the tokenizer', async () => {
            const file = join(dir, 'payload.json');
            await writeFile(file, '{"name":"acme"}\n');

            const tokens = await tokenize(`class create --data 'file://${file}'`, 'create');
            expect(tokens.getOption('data')).toBe('{"name":"acme"}');
        });

        it('should report unreadable files', async () => {
            const file = join(dir, 'missing.txt');
            const result = substituteValue(`file://${file}`);

            await expect(result).rejects.toBeInstanceOf(IoError);
            await expect(result).rejects.toHaveProperty('path', file);
        });

        it('should report failed fetches', async () => {
            const result = substituteValue('https://example.test/missing', stubResolver);

            await expect(result).rejects.toBeInstanceOf(HttpError);
            await expect(result).rejects.toHaveProperty(
                'message',
                'HTTP error fetching https://example.test/missing: status 404'
            );
        });
    });
});
