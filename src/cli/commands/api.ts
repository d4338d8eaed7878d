/**
 * API sub-commands: one per CliCommand, each dispatching through Cli.
 *
 * Dependency direction: api.ts → commander, dispatch layer, sdk/client, config module
 * Used by: cli/program.ts
 */

import type { Command, OptionValues } from 'commander';
import { resolveConfig } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { ArgMatches } from '../../dispatch/arg-matches.js';
import { Cli } from '../../dispatch/dispatcher.js';
import { DefaultCliOverride, type CliOverride } from '../../dispatch/override.js';
import { allCommands } from '../../dispatch/registry.js';
import { Client } from '../../sdk/client.js';
import { LogLevel, logger } from '../../utils/logger.js';

/** Options declared on the root program and read by every API command. */
export type GlobalOptions = {
    baseUrl?: string;
    timeout?: number;
    verbose?: boolean;
};

export interface ApiCommandOptions {
    /** Applied to every dispatched request. Defaults to DefaultCliOverride. */
    readonly override?: CliOverride;
    /** Builds the SDK client from the resolved config. */
    readonly createClient?: (config: AppConfig) => Client;
    /** Directory holding `.key-cli/`. Defaults to the working directory. */
    readonly projectRoot?: string;
    /** Where outcome reports go. Defaults to console.log. */
    readonly print?: (text: string) => void;
}

function defaultClient(config: AppConfig): Client {
    return new Client({ baseUrl: config.client.baseUrl, timeoutMs: config.client.timeoutMs });
}

/** Build one commander sub-command per supported API operation. */
export function createApiCommands(options: ApiCommandOptions = {}): Command[] {
    const override = options.override ?? new DefaultCliOverride();
    const createClient = options.createClient ?? defaultClient;

    return allCommands().map((cliCommand) =>
        Cli.getCommand(cliCommand).action(async (_options: OptionValues, command: Command) => {
            const matches = ArgMatches.takeFromCommand(command);
            const globals = command.optsWithGlobals<GlobalOptions>();
            const config = resolveConfig(options.projectRoot ?? process.cwd(), {
                baseUrl: globals.baseUrl,
                timeoutMs: globals.timeout,
            });

            logger.setLogLevel(globals.verbose ? LogLevel.Debug : logger.parseLogLevel(config.logLevel));
            logger.debug(`Dispatching ${cliCommand} to ${config.client.baseUrl}`);

            const cli = Cli.withOverride(createClient(config), override, { print: options.print });
            await cli.execute(cliCommand, matches);
        }),
    );
}
