/**
 * Shell Session
 *
 * The collaborator handed to every built-in command's execute body.
 */

import type { CommandTree } from './core/tree.js';
import type { LineSink } from './core/output.js';
import type { ShellConfig } from './config.js';
import type { History } from './history.js';

export interface ShellSession {
    config: ShellConfig;
    history: History;
    /** Root of the registered commands */
    tree: CommandTree<ShellSession>;
    /** Where commands write their output */
    output: LineSink;
}
