/**
 * Line Dispatch
 *
 * Runs one submitted line: resolve the scope path to a command, tokenize,
 * then either render the command's help or validate and execute it.
 * Failures propagate to the caller; nothing is printed.
 */

import { splitShellWords } from './shell-words.js';
import { tokenize, type ValueResolver } from './tokenizer.js';
import { requestsHelp } from './options.js';
import { CommandNotFoundError } from './errors.js';
import type { OutputBuffer } from './output.js';
import type { CliCommand } from './command.js';
import type { CommandTree } from './tree.js';

/**
 * A command found by walking the tree
 */
export interface ResolvedCommand<TClient> {
    command: CliCommand<TClient>;
    /** Name the command was registered under */
    name: string;
    /** Scope path leading to the command */
    context: string[];
}

export interface DispatchOptions<TClient> {
    /** Collaborator handed to the command's execute body */
    client: TClient;
    output: OutputBuffer;
    resolver?: ValueResolver;
}

/**
 * Strips a trailing `| pattern` (or `| !pattern`) from the line and installs
 * it as the output filter; clears the filter when there is none
 *
 * @returns The line without the filter part
 */
export function applyFilter(line: string, output: OutputBuffer): string {
    const pipe = line.indexOf('|');
    if (pipe === -1) {
        output.clearFilter();
        return line;
    }

    const filter = line.slice(pipe + 1).trim();
    if (filter.startsWith('!')) {
        output.setFilter(filter.slice(1).trim(), true);
    } else {
        output.setFilter(filter, false);
    }
    return line.slice(0, pipe).trim();
}

/**
 * Walks words through the tree until a command is found
 *
 * @throws CommandNotFoundError for an unknown word, or when the words end inside a scope
 */
export function resolveCommand<TClient>(tree: CommandTree<TClient>, words: string[]): ResolvedCommand<TClient> {
    let scope = tree;
    const context: string[] = [];

    for (const word of words) {
        const child = scope.getScope(word);
        if (child) {
            context.push(word);
            scope = child;
            continue;
        }

        const command = scope.getCommand(word);
        if (!command) {
            throw new CommandNotFoundError(word);
        }
        return { command, name: word, context };
    }

    throw new CommandNotFoundError(context.join(' '));
}

/**
 * Dispatches one input line
 */
export async function dispatch<TClient>(
    tree: CommandTree<TClient>,
    line: string,
    options: DispatchOptions<TClient>
): Promise<void> {
    const input = applyFilter(line, options.output);
    const words = splitShellWords(input);
    if (words.length === 0) {
        return;
    }

    const { command, name, context } = resolveCommand(tree, words);
    const tokens = await tokenize(input, name, { resolver: options.resolver, scopeDepth: context.length });

    if (requestsHelp(command.options(), tokens)) {
        command.help(name, context, options.output);
        return;
    }

    command.validate(tokens);
    await command.execute(options.client, tokens);
}
