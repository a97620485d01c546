/**
 * Shell Word Splitting
 *
 * POSIX-style word splitting shared by the tokenizer and the completion engine.
 *
 * Supports:
 * - Whitespace-separated words
 * - Single quotes (no escape processing)
 * - Double quotes (backslash escapes $ ` " \ and newline)
 * - Backslash escapes outside quotes, with backslash-newline as a continuation
 * - Empty quoted words ('' or "")
 *
 * Quoting for the way back is done by shell-quote.
 */

import { quote } from 'shell-quote';
import { InvalidInputError } from './errors.js';

/** Characters a backslash escapes inside double quotes */
const DOUBLE_QUOTE_ESCAPABLE = new Set(['$', '`', '"', '\\', '\n']);

/**
 * One word and where it sits in the line
 */
export interface ShellWordSpan {
    word: string;
    /** Offset of the word's first character, quote or escape included */
    start: number;
    /** Offset just past the word's last character */
    end: number;
    /** The word starts with a quote or an escape, so a leading "-" is literal */
    quoted: boolean;
}

function isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Splits a line into words with their offsets
 *
 * @throws InvalidInputError on an unterminated quote or a trailing backslash
 */
export function splitShellWordSpans(line: string): ShellWordSpan[] {
    const spans: ShellWordSpan[] = [];
    let current = '';
    let inWord = false;
    let wordStart = 0;
    let quoted = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const at = i;
        const char = line[i];

        if (quote === "'") {
            if (char === "'") {
                quote = null;
            } else {
                current += char;
            }
            continue;
        }

        if (quote === '"') {
            if (char === '"') {
                quote = null;
            } else if (char === '\\') {
                const next = line[i + 1];
                if (next === undefined) {
                    throw new InvalidInputError(line);
                }
                if (DOUBLE_QUOTE_ESCAPABLE.has(next)) {
                    if (next !== '\n') {
                        current += next;
                    }
                    i++;
                } else {
                    current += char;
                }
            } else {
                current += char;
            }
            continue;
        }

        if (isWhitespace(char)) {
            if (inWord) {
                spans.push({ word: current, start: wordStart, end: at, quoted });
                current = '';
                inWord = false;
            }
        } else if (char === '\\') {
            const next = line[i + 1];
            if (next === undefined) {
                throw new InvalidInputError(line);
            }
            i++;
            if (next !== '\n') {
                if (!inWord) {
                    inWord = true;
                    wordStart = at;
                    quoted = true;
                }
                current += next;
            }
        } else if (char === '"' || char === "'") {
            if (!inWord) {
                inWord = true;
                wordStart = at;
                quoted = true;
            }
            quote = char;
        } else {
            if (!inWord) {
                inWord = true;
                wordStart = at;
                quoted = false;
            }
            current += char;
        }
    }

    if (quote !== null) {
        throw new InvalidInputError(line);
    }
    if (inWord) {
        spans.push({ word: current, start: wordStart, end: line.length, quoted });
    }

    return spans;
}

/**
 * Splits a line into words
 *
 * @throws InvalidInputError on an unterminated quote or a trailing backslash
 */
export function splitShellWords(line: string): string[] {
    return splitShellWordSpans(line).map((span) => span.word);
}

/**
 * Returns the word as is when it splits back to itself, quoted otherwise
 */
export function quoteIfNeeded(word: string): string {
    try {
        const words = splitShellWords(word);
        if (words.length === 1 && words[0] === word) {
            return word;
        }
    } catch (err) {
        if (!(err instanceof InvalidInputError)) {
            throw err;
        }
    }
    return quote([word]);
}

/**
 * Joins words into a line, quoting where needed
 */
export function joinShellWords(words: string[]): string {
    return quote(words);
}
