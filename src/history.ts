/**
 * Command History
 *
 * Persists submitted lines to ~/.treeshell/history.txt, one per line.
 * Lines starting with a space and immediate repeats are not recorded.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { CONFIG_DIR } from './config.js';

/** Default history file */
export const HISTORY_FILE = join(CONFIG_DIR, 'history.txt');

/** Maximum number of entries kept */
export const HISTORY_LIMIT = 500;

export class History {
    private constructor(
        private readonly file: string,
        private entries: string[]
    ) {}

    /**
     * Loads the history file; a missing file is an empty history
     */
    static async load(file: string = HISTORY_FILE): Promise<History> {
        try {
            const content = await readFile(file, 'utf8');
            const entries = content.split('\n').filter((line) => line.trim() !== '');
            return new History(file, entries.slice(-HISTORY_LIMIT));
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return new History(file, []);
            }
            throw error;
        }
    }

    /** Entries, oldest first */
    list(): readonly string[] {
        return this.entries;
    }

    /**
     * Records a line and saves the file
     *
     * @returns Whether the line was recorded
     */
    async add(line: string): Promise<boolean> {
        if (line.trim() === '' || line.startsWith(' ')) {
            return false;
        }
        if (this.entries[this.entries.length - 1] === line) {
            return false;
        }

        this.entries.push(line);
        if (this.entries.length > HISTORY_LIMIT) {
            this.entries = this.entries.slice(-HISTORY_LIMIT);
        }
        await this.save();
        return true;
    }

    async clear(): Promise<void> {
        this.entries = [];
        await this.save();
    }

    private async save(): Promise<void> {
        await mkdir(dirname(this.file), { recursive: true, mode: 0o700 });
        const content = this.entries.length > 0 ? `${this.entries.join('\n')}\n` : '';
        await writeFile(this.file, content, { encoding: 'utf8', mode: 0o600 });
    }
}
