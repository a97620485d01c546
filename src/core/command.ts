/**
 * Command Capability
 *
 * The contract every leaf command in the tree satisfies. Concrete commands
 * usually extend BaseCommand, which derives the descriptors from a static
 * field table and supplies validation and help rendering.
 */

import {
    buildDescriptors,
    formatOptionColumns,
    populateOptions,
    stripDashes,
    type OptionDescriptor,
    type OptionTable,
    type OptionValues,
} from './options.js';
import type { ParsedTokens } from './tokenizer.js';
import type { LineSink } from './output.js';
import { MissingOptionsError, DuplicateOptionsError, PopulatedFlagOptionsError } from './errors.js';

/**
 * A command as stored in the tree
 */
export interface CliCommand<TClient = unknown> {
    options(): readonly OptionDescriptor[];
    name(): string;
    about(): string | null;
    longAbout(): string | null;
    /** Example argument lines, one per line, without the command name */
    examples(): string | null;
    execute(client: TClient, tokens: ParsedTokens): void | Promise<void>;
    /** @throws ShellError when the tokens do not satisfy the descriptors */
    validate(tokens: ParsedTokens): void;
    help(name: string, context: readonly string[], sink: LineSink): void;
}

/**
 * Static text describing a command
 */
export interface CommandInfo {
    about?: string;
    longAbout?: string;
    examples?: string;
}

function isPresent(options: ReadonlyMap<string, string>, alias: string | undefined): boolean {
    return alias !== undefined && options.has(stripDashes(alias));
}

/**
 * Fails with every required descriptor that has neither alias among the options
 */
export function validateMissingOptions(descriptors: readonly OptionDescriptor[], tokens: ParsedTokens): void {
    const options = tokens.getOptions();
    const missing = descriptors
        .filter((d) => d.required)
        .filter((d) => !isPresent(options, d.short) && !isPresent(options, d.long))
        .map((d) => d.name);

    if (missing.length > 0) {
        throw new MissingOptionsError(missing);
    }
}

/**
 * Fails with every descriptor given through both its short and long alias
 */
export function validateDuplicateOptions(descriptors: readonly OptionDescriptor[], tokens: ParsedTokens): void {
    const options = tokens.getOptions();
    const duplicates = descriptors
        .filter((d) => isPresent(options, d.short) && isPresent(options, d.long))
        .map((d) => d.name);

    if (duplicates.length > 0) {
        throw new DuplicateOptionsError(duplicates);
    }
}

/**
 * Flags are stored with an empty value; fails with every flag alias given a value
 */
export function validateFlagOptions(descriptors: readonly OptionDescriptor[], tokens: ParsedTokens): void {
    const options = tokens.getOptions();
    const populated: string[] = [];

    for (const descriptor of descriptors.filter((d) => d.flag)) {
        for (const alias of [descriptor.short, descriptor.long]) {
            if (alias === undefined) continue;
            const value = options.get(stripDashes(alias));
            if (value !== undefined && value !== '') {
                populated.push(stripDashes(alias));
            }
        }
    }

    if (populated.length > 0) {
        throw new PopulatedFlagOptionsError(populated);
    }
}

/** Descriptors are built once per field table */
const descriptorCache = new WeakMap<OptionTable, OptionDescriptor[]>();

function descriptorsFor(table: OptionTable): OptionDescriptor[] {
    let descriptors = descriptorCache.get(table);
    if (!descriptors) {
        descriptors = buildDescriptors(table);
        descriptorCache.set(table, descriptors);
    }
    return descriptors;
}

/**
 * Base class for commands declared through an option field table
 */
export abstract class BaseCommand<TClient = unknown> implements CliCommand<TClient> {
    /** Option fields of this command type */
    protected abstract readonly fields: OptionTable;
    protected readonly info: CommandInfo = {};

    abstract execute(client: TClient, tokens: ParsedTokens): void | Promise<void>;

    options(): readonly OptionDescriptor[] {
        return descriptorsFor(this.fields);
    }

    name(): string {
        return this.constructor.name;
    }

    about(): string | null {
        return this.info.about ?? null;
    }

    longAbout(): string | null {
        return this.info.longAbout ?? null;
    }

    examples(): string | null {
        return this.info.examples ?? null;
    }

    /**
     * Runs the missing, duplicate and flag checks in that order; the first
     * failing check is thrown with its full list
     */
    validate(tokens: ParsedTokens): void {
        const descriptors = this.options();
        validateMissingOptions(descriptors, tokens);
        validateDuplicateOptions(descriptors, tokens);
        validateFlagOptions(descriptors, tokens);
    }

    /**
     * Validates the tokens and coerces the option values into their field types
     */
    protected parse(tokens: ParsedTokens): OptionValues {
        this.validate(tokens);
        return populateOptions(this.fields, tokens);
    }

    help(name: string, context: readonly string[], sink: LineSink): void {
        const qualifiedName = [...context, name].join(' ');
        const about = this.about();

        sink.appendLine(about ? `${qualifiedName} - ${about}` : qualifiedName);
        sink.appendLine('');

        const longAbout = this.longAbout();
        if (longAbout) {
            sink.appendLine(longAbout);
            sink.appendLine('');
        }

        const descriptors = this.options();
        if (descriptors.length > 0) {
            sink.appendLine('Options:');
            for (const row of formatOptionColumns(descriptors)) {
                sink.appendLine(`  ${row}`);
            }
            sink.appendLine('');
        }

        const examples = this.examples();
        if (examples) {
            sink.appendLine('Examples:');
            for (const line of examples.split('\n')) {
                sink.appendLine(`  ${qualifiedName} ${line}`);
            }
        }
    }
}
