/**
 * Option Descriptors
 *
 * Static metadata for the options a command accepts, built once per command
 * type from a declarative field table:
 *
 *   static readonly fields = {
 *       name: { short: 'n', long: 'name', help: 'Name of the class', type: 'string' },
 *       json: { short: 'j', long: 'json', help: 'Output JSON', type: 'bool', flag: true },
 *   } satisfies OptionTable;
 *
 * Rules carried by buildDescriptors():
 * - Fields are required unless marked `optional` or `required: false`
 * - Flags take no value and are never required by default
 * - Every command gains an implicit `help` flag (-h / --help); a field that
 *   already uses -h keeps it and help is reachable through --help only
 */

import type { CommandTree } from './tree.js';
import type { ParsedTokens } from './tokenizer.js';
import { ParseError, MissingOptionsError } from './errors.js';

/** Semantic type of an option value */
export type OptionType = 'string' | 'int' | 'bool' | 'json';

/**
 * Supplies completion values for an option.
 * Providers that do I/O must turn their own failures into an empty list.
 */
export type AutocompleteProvider = (
    tree: CommandTree,
    prefix: string,
    tokens: string[]
) => string[] | Promise<string[]>;

/**
 * Metadata for one option of a command
 */
export interface OptionDescriptor {
    /** Field name, unique within a command */
    readonly name: string;
    /** Short alias including its dash, e.g. "-n" */
    readonly short?: string;
    /** Long alias including its dashes, e.g. "--name" */
    readonly long?: string;
    readonly help: string;
    readonly required: boolean;
    /** Flags are present or absent and never carry a value */
    readonly flag: boolean;
    /** Display name of the value type */
    readonly typeHint: string;
    readonly autocomplete?: AutocompleteProvider;
}

/**
 * Declaration of one option field
 */
export interface OptionFieldSpec {
    /** Short alias without its dash */
    short?: string;
    /** Long alias without its dashes */
    long?: string;
    help?: string;
    type: OptionType;
    /** Optional fields are never required */
    optional?: boolean;
    required?: boolean;
    flag?: boolean;
    autocomplete?: AutocompleteProvider;
}

export type OptionTable = Record<string, OptionFieldSpec>;

/** The descriptor every command carries */
export const HELP_DESCRIPTOR: OptionDescriptor = Object.freeze({
    name: 'help',
    short: '-h',
    long: '--help',
    help: 'Prints help information',
    required: false,
    flag: true,
    typeHint: 'bool',
});

/**
 * Removes the leading dashes from an alias
 */
export function stripDashes(alias: string): string {
    return alias.replace(/^-{1,2}/, '');
}

/**
 * Checks whether a typed token ("-n", "--name") is one of the descriptor's aliases
 */
export function matchesAlias(descriptor: OptionDescriptor, token: string): boolean {
    return token === descriptor.short || token === descriptor.long;
}

/**
 * Builds the descriptor list for a field table, with the implicit help flag appended
 */
export function buildDescriptors(table: OptionTable): OptionDescriptor[] {
    const descriptors = Object.entries(table).map(([name, declaration]): OptionDescriptor => {
        const flag = declaration.flag ?? false;
        const required = declaration.optional ? false : declaration.required ?? !flag;

        return Object.freeze({
            name,
            short: declaration.short !== undefined ? `-${declaration.short}` : undefined,
            long: declaration.long !== undefined ? `--${declaration.long}` : undefined,
            help: declaration.help ?? '',
            required,
            flag,
            typeHint: declaration.type,
            autocomplete: declaration.autocomplete,
        });
    });

    if (!(HELP_DESCRIPTOR.name in table)) {
        const shortTaken = descriptors.some((d) => d.short === HELP_DESCRIPTOR.short);
        descriptors.push(shortTaken ? Object.freeze({ ...HELP_DESCRIPTOR, short: undefined }) : HELP_DESCRIPTOR);
    }

    return descriptors;
}

/**
 * Checks whether the tokens ask for the command's help text, through an
 * alias of its help flag
 */
export function requestsHelp(descriptors: readonly OptionDescriptor[], tokens: ParsedTokens): boolean {
    const help = descriptors.find((d) => d.name === HELP_DESCRIPTOR.name && d.flag);
    if (!help) {
        return false;
    }
    return [help.short, help.long].some((alias) => alias !== undefined && tokens.hasOption(stripDashes(alias)));
}

/**
 * Coerces a raw option value into its declared type
 *
 * @throws ParseError naming the key, the value and the expected type
 */
export function coerceValue(key: string, value: string, type: OptionType): unknown {
    switch (type) {
        case 'string':
            return value;
        case 'int':
            if (!/^[+-]?\d+$/.test(value)) {
                throw new ParseError(key, value, type);
            }
            return Number.parseInt(value, 10);
        case 'bool':
            if (value === 'true') return true;
            if (value === 'false') return false;
            throw new ParseError(key, value, type);
        case 'json':
            try {
                return JSON.parse(value);
            } catch {
                throw new ParseError(key, value, type);
            }
    }
}

/**
 * Typed option values for one invocation
 */
export class OptionValues {
    constructor(private readonly values: ReadonlyMap<string, unknown>) {}

    has(field: string): boolean {
        return this.values.has(field);
    }

    string(field: string): string | undefined {
        const value = this.values.get(field);
        return typeof value === 'string' ? value : undefined;
    }

    int(field: string): number | undefined {
        const value = this.values.get(field);
        return typeof value === 'number' ? value : undefined;
    }

    bool(field: string): boolean | undefined {
        const value = this.values.get(field);
        return typeof value === 'boolean' ? value : undefined;
    }

    /** Flags read as false when absent */
    flag(field: string): boolean {
        return this.values.get(field) === true;
    }

    json(field: string): unknown {
        return this.values.get(field);
    }

    /**
     * Returns a string field that must be present
     *
     * @throws MissingOptionsError when the field was not supplied
     */
    requireString(field: string): string {
        const value = this.string(field);
        if (value === undefined) {
            throw new MissingOptionsError([field]);
        }
        return value;
    }
}

/**
 * Maps parsed option keys onto the fields of a table, coercing each value.
 * Keys that match no field are ignored.
 */
export function populateOptions(table: OptionTable, tokens: ParsedTokens): OptionValues {
    const values = new Map<string, unknown>();

    for (const [key, value] of tokens.getOptions()) {
        for (const [field, declaration] of Object.entries(table)) {
            if (key !== declaration.short && key !== declaration.long) {
                continue;
            }
            values.set(field, declaration.flag ? true : coerceValue(key, value, declaration.type));
        }
    }

    return new OptionValues(values);
}

/**
 * Renders descriptors as aligned columns: "-n, --name <string> Name of the class"
 */
export function formatOptionColumns(descriptors: readonly OptionDescriptor[]): string[] {
    const shorts = descriptors.map((d) => (d.short ? `${d.short},` : ''));
    const longs = descriptors.map((d) => d.long ?? '');
    const types = descriptors.map((d) => `<${d.typeHint}>`);

    const shortWidth = Math.max(0, ...shorts.map((s) => s.length));
    const longWidth = Math.max(0, ...longs.map((l) => l.length));
    const typeWidth = Math.max(0, ...types.map((t) => t.length));

    return descriptors.map((d, i) => {
        const columns: string[] = [];
        if (shortWidth > 0) columns.push(shorts[i].padEnd(shortWidth));
        if (longWidth > 0) columns.push(longs[i].padEnd(longWidth));
        columns.push(types[i].padEnd(typeWidth));
        columns.push(d.flag ? `${d.help} (flag)` : d.help);
        return columns.join(' ').trimEnd();
    });
}
