import { BaseCommand } from '../core/command.js';
import { appendLines } from '../core/output.js';
import type { OptionTable } from '../core/options.js';
import type { ParsedTokens } from '../core/tokenizer.js';
import type { ShellSession } from '../session.js';

const HELP_FIELDS = {
    tree: { short: 't', long: 'tree', help: 'Show the full command tree', type: 'bool', flag: true },
} satisfies OptionTable;

/**
 * Help Command
 * Lists the top-level commands and scopes, or the whole tree with --tree
 */
export class Help extends BaseCommand<ShellSession> {
    protected readonly fields = HELP_FIELDS;
    protected readonly info = {
        about: 'Show available commands',
        examples: '--tree',
    };

    execute(session: ShellSession, tokens: ParsedTokens): void {
        const options = this.parse(tokens);
        const { tree, output } = session;

        if (options.flag('tree')) {
            appendLines(output, tree.showTree());
            return;
        }

        output.appendLine(`Commands: ${tree.commandNames().join(', ')}`);
        output.appendLine(`Scopes: ${tree.scopeNames().join(', ')}`);
        output.appendLine('');
        output.appendLine("Use '<command> --help' for details, or 'help --tree' for every command.");
    }
}
