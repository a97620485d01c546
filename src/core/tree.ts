/**
 * Command Tree
 *
 * Registry of nested scopes and leaf commands. Built once at startup:
 *
 *   tree.addScope('class')
 *       .addCommand('create', new ClassCreate())
 *       .addCommand('info', new ClassInfo());
 *
 * and read-only afterwards. Entries keep their registration order, which is
 * also the order of completions and of the rendered tree.
 */

import type { CliCommand } from './command.js';
import { NameCollisionError } from './errors.js';

/**
 * One suggested completion
 */
export interface Candidate {
    /** Human-readable label */
    display: string;
    /** Text that replaces the current word */
    replacement: string;
}

export class CommandTree<TClient = unknown> {
    private readonly commands = new Map<string, CliCommand<TClient>>();
    private readonly scopes = new Map<string, CommandTree<TClient>>();

    /**
     * Registers (or replaces) a command at this level
     *
     * @returns this node, for chaining
     * @throws NameCollisionError when a scope of the same name exists here
     */
    addCommand(name: string, command: CliCommand<TClient>): this {
        if (this.scopes.has(name)) {
            throw new NameCollisionError(name, 'scope');
        }
        this.commands.set(name, command);
        return this;
    }

    /**
     * Returns the child scope, creating it when absent
     *
     * @throws NameCollisionError when a command of the same name exists here
     */
    addScope(name: string): CommandTree<TClient> {
        if (this.commands.has(name)) {
            throw new NameCollisionError(name, 'command');
        }
        let scope = this.scopes.get(name);
        if (!scope) {
            scope = new CommandTree<TClient>();
            this.scopes.set(name, scope);
        }
        return scope;
    }

    getCommand(name: string): CliCommand<TClient> | undefined {
        return this.commands.get(name);
    }

    getScope(name: string): CommandTree<TClient> | undefined {
        return this.scopes.get(name);
    }

    commandNames(): string[] {
        return [...this.commands.keys()];
    }

    scopeNames(): string[] {
        return [...this.scopes.keys()];
    }

    /**
     * Command names, then scope names, that start with the prefix
     */
    getCompletions(prefix: string): Candidate[] {
        return [...this.commandNames(), ...this.scopeNames()]
            .filter((name) => name.startsWith(prefix))
            .map((name) => ({ display: name, replacement: name }));
    }

    /**
     * Renders the tree, commands before scopes at every level:
     *
     *   ├─ help
     *   └─ class
     *      ├─ create
     *      └─ info
     */
    showTree(): string {
        return this.renderLines('').join('\n');
    }

    private renderLines(prefix: string): string[] {
        const entries: Array<[string, CommandTree<TClient> | null]> = [
            ...this.commandNames().map((name): [string, null] => [name, null]),
            ...[...this.scopes.entries()],
        ];

        const lines: string[] = [];
        entries.forEach(([name, scope], i) => {
            const isLast = i === entries.length - 1;
            lines.push(`${prefix}${isLast ? '└─' : '├─'} ${name}`);
            if (scope) {
                lines.push(...scope.renderLines(`${prefix}${isLast ? '   ' : '│  '}`));
            }
        });
        return lines;
    }
}
