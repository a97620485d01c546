/**
 * treeshell
 *
 * Core of an interactive command shell: a scoped command tree, a line
 * tokenizer and a tab-completion engine.
 *
 * @example Registering and completing
 * ```typescript
 * import { CommandTree, complete } from 'treeshell';
 *
 * const tree = new CommandTree<Client>();
 * tree.addScope('class').addCommand('info', new ClassInfo());
 *
 * const { start, candidates } = await complete(tree, 'class info --na', 15);
 * ```
 *
 * @packageDocumentation
 */

export * from './core/errors.js';
export * from './core/shell-words.js';
export * from './core/options.js';
export * from './core/command.js';
export * from './core/tree.js';
export * from './core/tokenizer.js';
export * from './core/completion.js';
export * from './core/output.js';
export * from './core/dispatch.js';

export { loadConfig, configKeys, getConfigValue, CONFIG_DIR, CONFIG_FILE } from './config.js';
export type { ShellConfig, ConfigOverrides, LoadConfigOptions } from './config.js';
export { History, HISTORY_FILE, HISTORY_LIMIT } from './history.js';
export { buildCommandTree } from './commands/index.js';
export { runRepl, runLine, createCompleter, prompt } from './repl.js';
export type { ReplOptions } from './repl.js';
export type { ShellSession } from './session.js';
