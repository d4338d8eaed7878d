/**
 * Dispatcher: runs one command end to end.
 *
 * Per invocation: builder created → flags applied → override applied →
 * sent → reported. No step repeats and nothing is retried. Request
 * failures are printed like successes; a failed override throws
 * OverrideError out of `execute()` instead of being printed.
 *
 * Dependency direction: dispatcher.ts → commands, registry, arg-matches,
 *   override, output, sdk/client, core/errors, utils/logger
 * Used by: CLI api commands, embedding applications
 */

import type { Command } from 'commander';
import { OverrideError } from '../core/errors.js';
import type { Client } from '../sdk/client.js';
import { logger } from '../utils/logger.js';
import type { ArgMatches } from './arg-matches.js';
import { CliCommand, assertNever } from './commands.js';
import { DefaultCliOverride, type CliOverride } from './override.js';
import { formatOutcome } from './output.js';
import { commandFor } from './registry.js';

export interface CliOptions {
    /** Where outcome reports go. Defaults to console.log. */
    readonly print?: (text: string) => void;
}

export class Cli<T extends CliOverride = DefaultCliOverride> {
    private readonly print: (text: string) => void;

    constructor(
        public readonly client: Client,
        public readonly override: T,
        options: CliOptions = {},
    ) {
        this.print = options.print ?? ((text: string) => console.log(text));
    }

    /** A dispatcher that sends every request as its flags describe it. */
    static create(client: Client, options?: CliOptions): Cli<DefaultCliOverride> {
        return new Cli(client, new DefaultCliOverride(), options);
    }

    static withOverride<O extends CliOverride>(client: Client, override: O, options?: CliOptions): Cli<O> {
        return new Cli(client, override, options);
    }

    /** The commander sub-command for `command`. */
    static getCommand(command: CliCommand): Command {
        return commandFor(command);
    }

    /**
     * Run `command` with already-parsed arguments and print the outcome.
     * @throws {OverrideError} if the override rejects the request
     */
    async execute(command: CliCommand, matches: ArgMatches): Promise<void> {
        switch (command) {
            case CliCommand.KeyGet:
                return this.executeKeyGet(matches);
            default:
                return assertNever(command);
        }
    }

    async executeKeyGet(matches: ArgMatches): Promise<void> {
        const request = this.client.keyGet();

        const key = matches.getBoolean('key');
        if (key !== undefined) {
            request.key(key);
        }

        const uniqueKey = matches.getString('unique-key');
        if (uniqueKey !== undefined) {
            request.uniqueKey(uniqueKey);
        }

        logger.debug(`${CliCommand.KeyGet}: flags applied`, request.fields());

        const verdict = this.override.executeKeyGet(matches, request);
        if (!verdict.ok) {
            throw new OverrideError(CliCommand.KeyGet, verdict.reason);
        }

        logger.debug(`${CliCommand.KeyGet}: sending`, request.fields());
        const result = await request.send();
        this.print(formatOutcome(result));
    }
}
