/**
 * Autocomplete providers shared by the built-in commands
 */

import type { AutocompleteProvider } from '../core/options.js';
import { configKeys, type ShellConfig } from '../config.js';

export const booleans: AutocompleteProvider = (_tree, prefix) =>
    ['true', 'false'].filter((value) => value.startsWith(prefix));

/**
 * Completes dotted configuration keys
 */
export function configKeysOf(config: ShellConfig): AutocompleteProvider {
    return (_tree, prefix) => configKeys(config).filter((key) => key.startsWith(prefix));
}
