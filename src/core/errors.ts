/**
 * Shell Errors
 *
 * Every failure the shell core can report. Errors are plain data: a `kind`
 * discriminant plus the context needed to render them. The core never prints
 * them; the host decides how they are shown.
 */

export type ShellErrorKind =
    | 'InvalidInput'
    | 'InvalidOption'
    | 'MissingOptions'
    | 'DuplicateOptions'
    | 'PopulatedFlagOptions'
    | 'ParseError'
    | 'HttpError'
    | 'IoError'
    | 'CommandNotFound'
    | 'NameCollision'
    | 'InvalidFilter'
    | 'ConfigError';

/**
 * Base class for all shell errors
 */
export class ShellError extends Error {
    constructor(public readonly kind: ShellErrorKind, message: string) {
        super(message);
        this.name = 'ShellError';
    }
}

/**
 * Line could not be split (unterminated quote or trailing escape)
 */
export class InvalidInputError extends ShellError {
    constructor(public readonly input: string) {
        super('InvalidInput', 'Invalid input');
        this.name = 'InvalidInputError';
    }
}

export class InvalidOptionError extends ShellError {
    constructor(public readonly option: string, reason: string) {
        super('InvalidOption', `Invalid option: ${option} (${reason})`);
        this.name = 'InvalidOptionError';
    }
}

export class MissingOptionsError extends ShellError {
    constructor(public readonly options: string[]) {
        super('MissingOptions', `Missing required options: ${options.join(', ')}`);
        this.name = 'MissingOptionsError';
    }
}

export class DuplicateOptionsError extends ShellError {
    constructor(public readonly options: string[]) {
        super('DuplicateOptions', `Duplicate options: ${options.join(', ')}`);
        this.name = 'DuplicateOptionsError';
    }
}

/**
 * Flag options were given a value
 */
export class PopulatedFlagOptionsError extends ShellError {
    constructor(public readonly options: string[]) {
        super('PopulatedFlagOptions', `Flag options with value: ${options.join(', ')}`);
        this.name = 'PopulatedFlagOptionsError';
    }
}

/**
 * An option value could not be coerced into its declared type
 */
export class ParseError extends ShellError {
    constructor(
        public readonly key: string,
        public readonly value: string,
        public readonly expectedType: string
    ) {
        super('ParseError', `Option '${key}' has value '${value}' (expected type: ${expectedType})`);
        this.name = 'ParseError';
    }
}

export class HttpError extends ShellError {
    constructor(public readonly url: string, reason: string) {
        super('HttpError', `HTTP error fetching ${url}: ${reason}`);
        this.name = 'HttpError';
    }
}

export class IoError extends ShellError {
    constructor(public readonly path: string, reason: string) {
        super('IoError', `IO error reading ${path}: ${reason}`);
        this.name = 'IoError';
    }
}

export class CommandNotFoundError extends ShellError {
    constructor(public readonly command: string) {
        super('CommandNotFound', `Command not found: ${command}`);
        this.name = 'CommandNotFoundError';
    }
}

/**
 * A command and a scope were registered under the same name at one level
 */
export class NameCollisionError extends ShellError {
    constructor(public readonly entry: string, public readonly existing: 'command' | 'scope') {
        super('NameCollision', `Cannot register "${entry}": a ${existing} with that name already exists`);
        this.name = 'NameCollisionError';
    }
}

export class InvalidFilterError extends ShellError {
    constructor(public readonly pattern: string, reason: string) {
        super('InvalidFilter', `Invalid filter "${pattern}": ${reason}`);
        this.name = 'InvalidFilterError';
    }
}

export class ConfigError extends ShellError {
    constructor(public readonly path: string, reason: string) {
        super('ConfigError', `Failed to load ${path}: ${reason}`);
        this.name = 'ConfigError';
    }
}

/**
 * Extracts a message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
