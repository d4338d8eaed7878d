/**
 * Read-only view of the option values commander parsed for one
 * sub-command, keyed by long flag name (`unique-key`, not `uniqueKey`).
 *
 * Dependency direction: arg-matches.ts → commander (types), core/errors.ts
 * Used by: dispatcher.ts, override hooks, CLI api commands
 */

import type { Command } from 'commander';
import { ValidationError } from '../core/errors.js';

export type ArgValue = boolean | string;

export class ArgMatches {
    private constructor(private readonly values: ReadonlyMap<string, unknown>) {}

    /**
     * Collect the values of every option declared on `command`, including
     * options an embedder added after the registry built it. Options the
     * user did not supply are left out.
     */
    static fromCommand(command: Command): ArgMatches {
        const values = new Map<string, unknown>();
        for (const option of command.options) {
            const attribute = option.attributeName();
            const value: unknown = command.getOptionValue(attribute);
            if (value === undefined) continue;
            values.set(option.long ? option.long.replace(/^--/, '') : attribute, value);
        }
        return new ArgMatches(values);
    }

    /**
     * Like `fromCommand`, then put every option back to its default so a
     * command that is parsed again starts from a clean slate.
     */
    static takeFromCommand(command: Command): ArgMatches {
        const matches = ArgMatches.fromCommand(command);
        for (const option of command.options) {
            const defaultValue: unknown = option.defaultValue;
            command.setOptionValue(option.attributeName(), defaultValue);
        }
        return matches;
    }

    /** Build matches directly, e.g. when dispatching without a command line. */
    static fromEntries(entries: Readonly<Record<string, ArgValue>>): ArgMatches {
        return new ArgMatches(new Map(Object.entries(entries)));
    }

    /** Whether a value was supplied for `name`. */
    has(name: string): boolean {
        return this.values.has(name);
    }

    /** Names of all supplied values. */
    names(): string[] {
        return [...this.values.keys()];
    }

    /**
     * @throws {ValidationError} if the value exists but is not a boolean
     */
    getBoolean(name: string): boolean | undefined {
        const value = this.values.get(name);
        if (value === undefined || typeof value === 'boolean') return value;
        throw new ValidationError(`Flag "--${name}" is not a boolean`, { name, value });
    }

    /**
     * @throws {ValidationError} if the value exists but is not a string
     */
    getString(name: string): string | undefined {
        const value = this.values.get(name);
        if (value === undefined || typeof value === 'string') return value;
        throw new ValidationError(`Flag "--${name}" is not a string`, { name, value });
    }
}
