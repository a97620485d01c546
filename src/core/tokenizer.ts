/**
 * Command Tokenizer
 *
 * Turns a submitted line plus the name of the command the dispatcher resolved
 * into structured tokens:
 *
 *   class info --name acme extra
 *   └────┘ └──┘ └─────────┘ └───┘
 *   scopes  cmd   options    positionals
 *
 * Option values starting with http://, https:// or file:// are replaced by the
 * fetched body or the file contents before they are stored.
 */

import { readFile } from 'node:fs/promises';
import { splitShellWordSpans, type ShellWordSpan } from './shell-words.js';
import { stripDashes } from './options.js';
import { HttpError, IoError, InvalidOptionError, errorMessage } from './errors.js';

/**
 * Sources for remote option values
 */
export interface ValueResolver {
    /** GET a URL and return its body */
    fetchText(url: string): Promise<string>;
    /** Read a local file */
    readText(path: string): Promise<string>;
}

/**
 * Resolver backed by global fetch and the local filesystem
 */
export const defaultValueResolver: ValueResolver = {
    async fetchText(url: string): Promise<string> {
        const response = await fetch(url);
        if (!response.ok) {
            throw new Error(`status ${response.status}`);
        }
        return response.text();
    },

    async readText(path: string): Promise<string> {
        return readFile(path, 'utf8');
    },
};

/**
 * Tokens of one submitted line
 */
export class ParsedTokens {
    constructor(
        private readonly scopes: readonly string[],
        private readonly command: string,
        private readonly options: ReadonlyMap<string, string>,
        private readonly positionals: readonly string[]
    ) {}

    getScopes(): readonly string[] {
        return this.scopes;
    }

    getCommand(): string {
        return this.command;
    }

    /** Dash-stripped option keys mapped to their values ("" for flags) */
    getOptions(): ReadonlyMap<string, string> {
        return this.options;
    }

    getPositionals(): readonly string[] {
        return this.positionals;
    }

    /** True when any of the given stripped keys is present */
    hasOption(...keys: string[]): boolean {
        return keys.some((key) => this.options.has(key));
    }

    /** Value of the first given stripped key that is present */
    getOption(...keys: string[]): string | undefined {
        for (const key of keys) {
            const value = this.options.get(key);
            if (value !== undefined) {
                return value;
            }
        }
        return undefined;
    }
}

/**
 * Options for tokenize()
 */
export interface TokenizeOptions {
    /** Source for http(s):// and file:// values */
    resolver?: ValueResolver;
    /**
     * Number of scope words before the command, as found by walking the tree.
     * Without it the scope path ends at the first word equal to the command name.
     */
    scopeDepth?: number;
}

/** A quoted or escaped leading dash is part of a value, not a key */
function isOptionKey(span: ShellWordSpan): boolean {
    return !span.quoted && span.word.startsWith('-');
}

/**
 * Replaces http(s):// and file:// values with the text they point at
 *
 * @throws HttpError when the URL cannot be fetched
 * @throws IoError when the file cannot be read
 */
export async function substituteValue(
    value: string,
    resolver: ValueResolver = defaultValueResolver
): Promise<string> {
    if (value.startsWith('http://') || value.startsWith('https://')) {
        let body: string;
        try {
            body = await resolver.fetchText(value);
        } catch (err) {
            throw new HttpError(value, errorMessage(err));
        }
        return body.trimEnd();
    }

    if (value.startsWith('file://')) {
        const path = value.slice('file://'.length);
        let content: string;
        try {
            content = await resolver.readText(path);
        } catch (err) {
            throw new IoError(path, errorMessage(err));
        }
        return content.trimEnd();
    }

    return value;
}

/**
 * Tokenizes a line for an already-resolved command
 *
 * Words before the command name form the scope path. A word starting with "-"
 * is an option key; it takes the next word as its value unless that word is
 * missing or is itself a key, in which case the value is "" (a flag). Quoting
 * a word ('-5') makes it a value even when it starts with "-".
 *
 * @param line - The raw input line
 * @param resolvedCommand - Name of the command the line resolved to
 * @throws InvalidInputError when the line cannot be split
 * @throws InvalidOptionError for a key without a name ("-" or "--")
 */
export async function tokenize(
    line: string,
    resolvedCommand: string,
    options: TokenizeOptions = {}
): Promise<ParsedTokens> {
    const { resolver = defaultValueResolver, scopeDepth } = options;
    const spans = splitShellWordSpans(line);
    const scopes: string[] = [];
    let index = 0;

    if (scopeDepth !== undefined) {
        scopes.push(...spans.slice(0, scopeDepth).map((span) => span.word));
        index = Math.min(scopeDepth, spans.length);
        if (spans[index]?.word === resolvedCommand) {
            index++;
        }
    } else {
        while (index < spans.length) {
            const span = spans[index];
            if (isOptionKey(span)) {
                break;
            }
            index++;
            if (span.word === resolvedCommand) {
                break;
            }
            scopes.push(span.word);
        }
    }

    const values = new Map<string, string>();
    const positionals: string[] = [];

    while (index < spans.length) {
        const span = spans[index++];

        if (!isOptionKey(span)) {
            positionals.push(span.word);
            continue;
        }

        const key = stripDashes(span.word);
        if (key === '') {
            throw new InvalidOptionError(span.word, 'option name is empty');
        }

        let value = '';
        const next = spans[index];
        if (next !== undefined && !isOptionKey(next)) {
            value = next.word;
            index++;
        }

        values.set(key, await substituteValue(value, resolver));
    }

    return new ParsedTokens(scopes, resolvedCommand, values, positionals);
}
