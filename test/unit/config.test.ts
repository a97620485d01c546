import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, configKeys, getConfigValue } from '../../src/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('Config Module', () => {
    let dir: string;
    let path: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'treeshell-config-'));
        path = join(dir, 'config.yaml');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('loadConfig', () => {
        it('should use defaults when the file is missing', async () => {
            const config = await loadConfig({ path, env: {} });

            expect(config).toEqual({
                server: { hostname: 'localhost', port: 8080, protocol: 'https', username: 'default_user' },
                output: { padding: 15 },
                log_level: 'warn',
            });
        });

        it('should use defaults for an empty file', async () => {
            await writeFile(path, '');
            const config = await loadConfig({ path, env: {} });
            expect(config.server.hostname).toBe('localhost');
        });

        it('should merge the file over the defaults', async () => {
            await writeFile(path, 'server:\n  hostname: api.example.test\n  port: 9000\noutput:\n  padding: 10\n');
            const config = await loadConfig({ path, env: {} });

            expect(config.server).toEqual({
                hostname: 'api.example.test',
                port: 9000,
                protocol: 'https',
                username: 'default_user',
            });
            expect(config.output.padding).toBe(10);
        });

        it('should let the environment override the file', async () => {
            await writeFile(path, 'server:\n  port: 9000\n');
            const config = await loadConfig({
                path,
                env: { TREESHELL_PORT: '7000', TREESHELL_USERNAME: 'tester', LOG_LEVEL: 'debug' },
            });

            expect(config.server.port).toBe(7000);
            expect(config.server.username).toBe('tester');
            expect(config.log_level).toBe('debug');
        });

        it('should let flags override the environment', async () => {
            const config = await loadConfig({
                path,
                env: { TREESHELL_PORT: '7000', TREESHELL_PROTOCOL: 'https' },
                overrides: { port: '6000', protocol: 'http', hostname: undefined },
            });

            expect(config.server.port).toBe(6000);
            expect(config.server.protocol).toBe('http');
            expect(config.server.hostname).toBe('localhost');
        });

        it('should reject invalid values', async () => {
            await writeFile(path, 'server:\n  protocol: ftp\n');
            const result = loadConfig({ path, env: {} });

            await expect(result).rejects.toBeInstanceOf(ConfigError);
            await expect(result).rejects.toHaveProperty('path', path);
        });

        it('should reject malformed YAML', async () => {
            await writeFile(path, 'server: [unclosed\n');
            await expect(loadConfig({ path, env: {} })).rejects.toBeInstanceOf(ConfigError);
        });

        it('should reject a file that is not a mapping', async () => {
            await writeFile(path, '- a\n- b\n');
            await expect(loadConfig({ path, env: {} })).rejects.toHaveProperty(
                'message',
                `Failed to load ${path}: expected a mapping at the top level`
            );
        });
    });

    describe('configKeys', () => {
        it('should list every leaf in order', async () => {
            const config = await loadConfig({ path, env: {} });

            expect(configKeys(config)).toEqual([
                'server.hostname',
                'server.port',
                'server.protocol',
                'server.username',
                'output.padding',
                'log_level',
            ]);
        });
    });

    describe('getConfigValue', () => {
        it('should look up leaves by dotted key', async () => {
            const config = await loadConfig({ path, env: {} });

            expect(getConfigValue(config, 'server.port')).toBe(8080);
            expect(getConfigValue(config, 'log_level')).toBe('warn');
        });

        it('should return undefined for unknown keys and sections', async () => {
            const config = await loadConfig({ path, env: {} });

            expect(getConfigValue(config, 'server')).toBeUndefined();
            expect(getConfigValue(config, 'server.port.number')).toBeUndefined();
            expect(getConfigValue(config, 'nope')).toBeUndefined();
        });
    });
});
