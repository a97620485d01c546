import { BaseCommand } from '../core/command.js';
import { appendJson, appendKeyValue } from '../core/output.js';
import { MissingOptionsError } from '../core/errors.js';
import type { OptionTable } from '../core/options.js';
import type { ParsedTokens } from '../core/tokenizer.js';
import { configKeys, getConfigValue, type ShellConfig } from '../config.js';
import { configKeysOf } from './autocomplete.js';
import type { ShellSession } from '../session.js';

const SHOW_FIELDS = {
    json: { short: 'j', long: 'json', help: 'Output in JSON format', type: 'bool', flag: true },
} satisfies OptionTable;

/**
 * Config Show Command
 * Prints the effective configuration
 */
export class ConfigShow extends BaseCommand<ShellSession> {
    protected readonly fields = SHOW_FIELDS;
    protected readonly info = {
        about: 'Show the effective configuration',
        longAbout: 'Show the configuration after defaults, the config file, environment and flags are applied.',
        examples: '--json',
    };

    execute(session: ShellSession, tokens: ParsedTokens): void {
        const options = this.parse(tokens);
        const { config, output } = session;

        if (options.flag('json')) {
            appendJson(output, config);
            return;
        }

        for (const key of configKeys(config)) {
            appendKeyValue(output, key, getConfigValue(config, key), config.output.padding);
        }
    }
}

/**
 * Config Get Command
 * Prints a single configuration value by its dotted key
 */
export class ConfigGet extends BaseCommand<ShellSession> {
    protected readonly fields: OptionTable;
    protected readonly info = {
        about: 'Get a configuration value',
        examples: '--key server.hostname\nserver.port',
    };

    constructor(config: ShellConfig) {
        super();
        this.fields = {
            key: {
                short: 'k',
                long: 'key',
                help: 'Dotted configuration key',
                type: 'string',
                optional: true,
                autocomplete: configKeysOf(config),
            },
        };
    }

    execute(session: ShellSession, tokens: ParsedTokens): void {
        const options = this.parse(tokens);
        const key = options.string('key') ?? tokens.getPositionals()[0];
        if (key === undefined) {
            throw new MissingOptionsError(['key']);
        }

        const value = getConfigValue(session.config, key);
        if (value === undefined) {
            session.output.appendLine(`Unknown configuration key: ${key}`);
            return;
        }
        session.output.appendLine(String(value));
    }
}
