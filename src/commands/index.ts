/**
 * Built-in command registration
 */

import { CommandTree } from '../core/tree.js';
import type { ShellConfig } from '../config.js';
import type { ShellSession } from '../session.js';
import { Help } from './help.js';
import { ConfigShow, ConfigGet } from './config.js';
import { HistoryList, HistoryClear } from './history.js';

/**
 * Builds the command tree the REPL dispatches against
 */
export function buildCommandTree(config: ShellConfig): CommandTree<ShellSession> {
    const tree = new CommandTree<ShellSession>();

    tree.addCommand('help', new Help());

    tree.addScope('config')
        .addCommand('show', new ConfigShow())
        .addCommand('get', new ConfigGet(config));

    tree.addScope('history')
        .addCommand('list', new HistoryList())
        .addCommand('clear', new HistoryClear());

    return tree;
}
