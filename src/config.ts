/**
 * Shell Configuration
 *
 * Loads ~/.treeshell/config.yaml (or the file passed with --config) and
 * layers overrides on top of it:
 *
 *   defaults < config file < environment < command-line flags
 *
 * Environment variables: TREESHELL_HOSTNAME, TREESHELL_PORT,
 * TREESHELL_PROTOCOL, TREESHELL_USERNAME, LOG_LEVEL.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './core/errors.js';

/** Directory for the shell's own files */
export const CONFIG_DIR = join(homedir(), '.treeshell');

/** Default config file */
export const CONFIG_FILE = join(CONFIG_DIR, 'config.yaml');

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ConfigSchema = z.object({
    server: z
        .object({
            hostname: z.string().min(1).default('localhost'),
            port: z.coerce.number().int().min(1).max(65535).default(8080),
            protocol: z.enum(['http', 'https']).default('https'),
            username: z.string().min(1).default('default_user'),
        })
        .default({}),
    output: z
        .object({
            /** Width of the key column in key/value output */
            padding: z.number().int().min(0).default(15),
        })
        .default({}),
    log_level: z.enum(LOG_LEVELS).default('warn'),
});

export type ShellConfig = z.infer<typeof ConfigSchema>;

/**
 * Values that override the config file
 */
export interface ConfigOverrides {
    hostname?: string;
    port?: string | number;
    protocol?: string;
    username?: string;
    logLevel?: string;
}

export interface LoadConfigOptions {
    /** Config file path (default: ~/.treeshell/config.yaml) */
    path?: string;
    /** Environment to read overrides from (default: process.env) */
    env?: NodeJS.ProcessEnv;
    /** Overrides from command-line flags */
    overrides?: ConfigOverrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drops undefined entries so they don't shadow lower layers
 */
function defined(values: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
    return {
        hostname: env.TREESHELL_HOSTNAME,
        port: env.TREESHELL_PORT,
        protocol: env.TREESHELL_PROTOCOL,
        username: env.TREESHELL_USERNAME,
        logLevel: env.LOG_LEVEL,
    };
}

function applyOverrides(raw: Record<string, unknown>, overrides: ConfigOverrides): Record<string, unknown> {
    const server = isRecord(raw.server) ? raw.server : {};
    return {
        ...raw,
        server: {
            ...server,
            ...defined({
                hostname: overrides.hostname,
                port: overrides.port,
                protocol: overrides.protocol,
                username: overrides.username,
            }),
        },
        ...defined({ log_level: overrides.logLevel }),
    };
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return {};
        }
        throw new ConfigError(path, errorMessage(error));
    }

    let parsed: unknown;
    try {
        parsed = yaml.parse(content);
    } catch (error) {
        throw new ConfigError(path, errorMessage(error));
    }

    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (!isRecord(parsed)) {
        throw new ConfigError(path, 'expected a mapping at the top level');
    }
    return parsed;
}

/**
 * Loads the configuration
 *
 * @returns The validated configuration; defaults when no file exists
 * @throws ConfigError when the file cannot be read, is not valid YAML, or fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ShellConfig> {
    const path = options.path ?? CONFIG_FILE;
    const fromFile = await readConfigFile(path);
    const fromEnv = applyOverrides(fromFile, overridesFromEnv(options.env ?? process.env));
    const merged = applyOverrides(fromEnv, options.overrides ?? {});

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(path, issues.join('; '));
    }
    return result.data;
}

/**
 * Dotted keys of every leaf value, e.g. "server.port"
 */
export function configKeys(config: ShellConfig): string[] {
    const keys: string[] = [];

    const walk = (value: unknown, path: string[]): void => {
        if (isRecord(value)) {
            for (const [key, child] of Object.entries(value)) {
                walk(child, [...path, key]);
            }
        } else {
            keys.push(path.join('.'));
        }
    };

    walk(config, []);
    return keys;
}

/**
 * Looks up a leaf value by its dotted key
 */
export function getConfigValue(config: ShellConfig, key: string): unknown {
    let value: unknown = config;
    for (const segment of key.split('.')) {
        if (!isRecord(value) || !(segment in value)) {
            return undefined;
        }
        value = value[segment];
    }
    return isRecord(value) ? undefined : value;
}
