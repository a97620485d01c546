import { BaseCommand } from '../core/command.js';
import type { OptionTable } from '../core/options.js';
import type { ParsedTokens } from '../core/tokenizer.js';
import { booleans } from './autocomplete.js';
import type { ShellSession } from '../session.js';

const LIST_FIELDS = {
    limit: { short: 'n', long: 'limit', help: 'Show only the most recent entries', type: 'int', optional: true },
    unique: {
        short: 'u',
        long: 'unique',
        help: 'Show each line once',
        type: 'bool',
        optional: true,
        autocomplete: booleans,
    },
} satisfies OptionTable;

/**
 * History List Command
 * Shows previously submitted lines, numbered oldest first
 */
export class HistoryList extends BaseCommand<ShellSession> {
    protected readonly fields = LIST_FIELDS;
    protected readonly info = {
        about: 'List command history',
        examples: '--limit 20\n-n 5 --unique true',
    };

    execute(session: ShellSession, tokens: ParsedTokens): void {
        const options = this.parse(tokens);
        let entries = session.history.list().map((line, i) => ({ number: i + 1, line }));

        if (options.bool('unique')) {
            const seen = new Set<string>();
            entries = entries.filter(({ line }) => {
                if (seen.has(line)) return false;
                seen.add(line);
                return true;
            });
        }

        const limit = options.int('limit');
        if (limit !== undefined) {
            entries = limit > 0 ? entries.slice(-limit) : [];
        }

        for (const { number, line } of entries) {
            session.output.appendLine(`${String(number).padStart(4)}  ${line}`);
        }
    }
}

const CLEAR_FIELDS = {} satisfies OptionTable;

/**
 * History Clear Command
 */
export class HistoryClear extends BaseCommand<ShellSession> {
    protected readonly fields = CLEAR_FIELDS;
    protected readonly info = { about: 'Clear command history' };

    async execute(session: ShellSession, tokens: ParsedTokens): Promise<void> {
        this.parse(tokens);
        await session.history.clear();
        session.output.appendLine('History cleared');
    }
}
