/**
 * Completion Engine
 *
 * Turns a line buffer and a cursor offset into the candidates for the word
 * under the cursor. Completion never fails: unsplittable input, unknown words
 * and failing providers all narrow the result, down to an empty list.
 *
 * What gets suggested:
 * - No command resolved yet: commands and scopes of the deepest scope reached
 * - Word starting with "-": the command's options not typed yet
 * - Word after a value option with a provider: the provider's values, quoted
 *   where they would not split back into one word
 * - Anywhere else after a command: the options not typed yet
 */

import { splitShellWordSpans, quoteIfNeeded, type ShellWordSpan } from './shell-words.js';
import { InvalidInputError } from './errors.js';
import { formatOptionColumns, matchesAlias, type OptionDescriptor } from './options.js';
import type { CliCommand } from './command.js';
import type { CommandTree, Candidate } from './tree.js';

export interface CompletionResult {
    /** Offset in the line where the replacement starts */
    start: number;
    candidates: Candidate[];
}

/**
 * Option candidates, displayed in aligned columns
 *
 * @param keep - Typed text kept in front of each replacement
 */
function optionCandidates(descriptors: readonly OptionDescriptor[], keep?: string): Candidate[] {
    const named = descriptors.filter((d) => d.long !== undefined || d.short !== undefined);
    const rows = formatOptionColumns(named);

    return named.map((d, i) => {
        const alias = d.long ?? d.short ?? '';
        return {
            display: rows[i],
            replacement: keep ? `${keep} ${alias}` : alias,
        };
    });
}

async function providerValues(
    descriptor: OptionDescriptor,
    tree: CommandTree,
    prefix: string,
    tokens: string[]
): Promise<string[]> {
    if (!descriptor.autocomplete) {
        return [];
    }
    try {
        return await descriptor.autocomplete(tree, prefix, tokens);
    } catch {
        // Providers own their error handling; a throwing one yields nothing.
        return [];
    }
}

/**
 * Completes the word under the cursor
 *
 * @param tree - Root of the command tree
 * @param line - The whole line buffer
 * @param cursor - Cursor offset in the line
 */
export async function complete<TClient>(
    tree: CommandTree<TClient>,
    line: string,
    cursor: number
): Promise<CompletionResult> {
    const head = line.slice(0, cursor);

    let spans: ShellWordSpan[];
    try {
        spans = splitShellWordSpans(head);
    } catch (err) {
        if (err instanceof InvalidInputError) {
            return { start: cursor, candidates: [] };
        }
        throw err;
    }

    // A word that reaches the cursor is still being typed; only the words before it count
    const last = spans[spans.length - 1];
    const current = last !== undefined && last.end === head.length ? last : undefined;
    const start = current ? current.start : cursor;
    const prefix = current ? current.word : '';
    const parts = spans.map((span) => span.word);
    const typed = current ? parts.slice(0, -1) : parts;

    let scope: CommandTree<TClient> = tree;
    let command: CliCommand<TClient> | undefined;
    let commandIndex = -1;

    for (const [i, part] of typed.entries()) {
        const child = scope.getScope(part);
        if (child) {
            scope = child;
            continue;
        }
        command = scope.getCommand(part);
        commandIndex = i;
        break;
    }

    if (!command) {
        return { start, candidates: scope.getCompletions(prefix) };
    }

    const args = typed.slice(commandIndex + 1);
    const descriptors = command.options();
    const remaining = descriptors.filter((d) => !args.some((arg) => matchesAlias(d, arg)));

    if (prefix.startsWith('-')) {
        const matching = remaining.filter(
            (d) => (d.short?.startsWith(prefix) ?? false) || (d.long?.startsWith(prefix) ?? false)
        );
        return { start, candidates: optionCandidates(matching) };
    }

    const preceding = args[args.length - 1];
    const option = preceding === undefined ? undefined : descriptors.find((d) => matchesAlias(d, preceding));

    if (!option || option.flag) {
        return { start, candidates: optionCandidates(remaining) };
    }

    const values = await providerValues(option, tree, prefix, parts);
    if (prefix !== '' && values.includes(prefix)) {
        // The value is complete; offer the next option after it
        return { start, candidates: optionCandidates(remaining, head.slice(start)) };
    }

    return {
        start,
        candidates: values.map((value) => ({ display: value, replacement: quoteIfNeeded(value) })),
    };
}
