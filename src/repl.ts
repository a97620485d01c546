/**
 * Interactive Shell Loop
 *
 * Reads lines with node:readline, completes with the completion engine,
 * dispatches each submitted line and flushes its buffered output.
 */

import { createInterface, type AsyncCompleter, type CompleterResult } from 'node:readline';
import { complete } from './core/completion.js';
import { dispatch } from './core/dispatch.js';
import { OutputBuffer, type OutputWriter } from './core/output.js';
import { ShellError, errorMessage } from './core/errors.js';
import type { CommandTree } from './core/tree.js';
import type { ValueResolver } from './core/tokenizer.js';
import { HISTORY_LIMIT, type History } from './history.js';
import type { ShellConfig } from './config.js';
import type { ShellSession } from './session.js';
import type { Logger } from './utils/logger.js';
import { writeOutput } from './utils/ui.js';

export interface ReplOptions {
    tree: CommandTree<ShellSession>;
    config: ShellConfig;
    history: History;
    logger: Logger;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** Receives flushed command output (default: colored console output) */
    write?: OutputWriter;
    resolver?: ValueResolver;
}

/**
 * Prompt in the form "username@hostname:port > "
 */
export function prompt(config: ShellConfig): string {
    return `${config.server.username}@${config.server.hostname}:${config.server.port} > `;
}

/**
 * Adapts the completion engine to readline's callback completer.
 * Readline inserts a single hit in place of the word it was given, so only
 * replacements that extend that word are passed on.
 */
export function createCompleter<TClient>(tree: CommandTree<TClient>): AsyncCompleter {
    return (line: string, callback: (err?: null | Error, result?: CompleterResult) => void): void => {
        void complete(tree, line, line.length).then(
            ({ start, candidates }) => {
                const word = line.slice(start);
                const hits = candidates
                    .map((candidate) => candidate.replacement)
                    .filter((replacement) => replacement.startsWith(word));
                callback(null, [hits, word]);
            },
            (err: unknown) => callback(err instanceof Error ? err : new Error(errorMessage(err)))
        );
    };
}

/**
 * Dispatches one line and records any failure in the buffer
 */
export async function runLine(
    tree: CommandTree<ShellSession>,
    line: string,
    session: ShellSession,
    buffer: OutputBuffer,
    logger: Logger,
    resolver?: ValueResolver
): Promise<void> {
    try {
        await dispatch(tree, line, { client: session, output: buffer, resolver });
    } catch (err) {
        if (err instanceof ShellError) {
            logger.debug({ kind: err.kind, line }, 'command failed');
        } else {
            logger.error({ err, line }, 'unexpected error while running command');
        }
        buffer.addError(errorMessage(err));
    }
}

/**
 * Runs the shell until the input ends (Ctrl-D)
 */
export async function runRepl(options: ReplOptions): Promise<void> {
    const { tree, config, history, logger } = options;
    const write = options.write ?? writeOutput;
    const buffer = new OutputBuffer();
    const session: ShellSession = { config, history, tree, output: buffer };

    const rl = createInterface({
        input: options.input ?? process.stdin,
        output: options.output ?? process.stdout,
        completer: createCompleter(tree),
        history: [...history.list()].reverse(),
        historySize: HISTORY_LIMIT,
    });

    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    // Ctrl-C drops the current line instead of leaving the shell
    rl.on('SIGINT', () => {
        rl.write(null, { ctrl: true, name: 'u' });
        rl.prompt();
    });

    rl.setPrompt(prompt(config));
    rl.prompt();

    for await (const line of rl) {
        await history.add(line);
        logger.debug({ line }, 'dispatching');
        await runLine(tree, line, session, buffer, logger, options.resolver);
        buffer.flush(write);
        if (!closed) {
            rl.prompt();
        }
    }
}
