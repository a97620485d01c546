#!/usr/bin/env node
/**
 * treeshell CLI
 *
 * Starts the interactive shell, or prints the command tree with `treeshell tree`.
 */

import { Command } from 'commander';
import { loadConfig, type ConfigOverrides, type ShellConfig } from './config.js';
import { buildCommandTree } from './commands/index.js';
import { History } from './history.js';
import { runRepl } from './repl.js';
import { errorMessage } from './core/errors.js';
import { createLogger } from './utils/logger.js';
import { colors, error } from './utils/ui.js';

interface GlobalOptions extends ConfigOverrides {
    config?: string;
}

const program = new Command();

program
    .name('treeshell')
    .description('Interactive shell with scoped commands and tab completion')
    .version('0.1.0')
    .option('-c, --config <file>', 'Use a custom configuration file')
    .option('--hostname <host>', 'Set the server hostname')
    .option('--port <port>', 'Set the server port')
    .option('--protocol <protocol>', 'Set the server protocol (http or https)')
    .option('--username <name>', 'Set the username')
    .option('--log-level <level>', 'Set the log level (fatal, error, warn, info, debug, trace, silent)');

async function loadFromFlags(): Promise<ShellConfig> {
    const { config, ...overrides } = program.opts<GlobalOptions>();
    return loadConfig({ path: config, overrides });
}

/**
 * Tree Command
 * Prints every registered scope and command
 */
program
    .command('tree')
    .description('Print the command tree')
    .action(async () => {
        try {
            const config = await loadFromFlags();
            console.log(buildCommandTree(config).showTree());
        } catch (err) {
            error(errorMessage(err));
        }
    });

/**
 * Default action
 * Starts the interactive shell
 */
program.action(async () => {
    try {
        const config = await loadFromFlags();
        const logger = createLogger({ level: config.log_level });
        const history = await History.load();
        const tree = buildCommandTree(config);

        logger.debug({ server: config.server }, 'starting shell');
        console.log(colors.dim("Type 'help' for commands, Tab to complete, Ctrl-D to exit."));

        await runRepl({ tree, config, history, logger });
    } catch (err) {
        error(errorMessage(err));
    }
});

await program.parseAsync();
