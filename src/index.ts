/**
 * Library entry point for embedding the dispatch layer.
 *
 * An embedding application builds a Client, optionally extends
 * DefaultCliOverride, registers `Cli.getCommand()` for each entry of
 * `allCommands()` with its own commander program, and calls
 * `Cli.execute()` from the action.
 */

export {
    AppError,
    ConfigError,
    ClientError,
    OverrideError,
    ValidationError,
} from './core/errors.js';
export type { ClientErrorKind } from './core/errors.js';

export type { AppConfig, ClientConfig, ConfigOverrides } from './core/config/types.js';
export { resolveConfig, loadConfig, saveConfig } from './core/config/manager.js';

export { Client } from './sdk/client.js';
export { KeyGetBuilder, type KeyGetFields } from './sdk/builders.js';
export type { ClientOptions, FetchLike, ResponseValue, SendResult } from './sdk/types.js';

export { CliCommand, ALL_CLI_COMMANDS } from './dispatch/commands.js';
export {
    schemaFor,
    allCommands,
    commandFor,
    type CommandSchema,
    type FlagSpec,
    type FlagValueType,
} from './dispatch/registry.js';
export { ArgMatches, type ArgValue } from './dispatch/arg-matches.js';
export {
    DefaultCliOverride,
    OVERRIDE_OK,
    overrideFailure,
    type CliOverride,
    type OverrideResult,
} from './dispatch/override.js';
export { Cli, type CliOptions } from './dispatch/dispatcher.js';
export { formatOutcome, OUTCOME_PREFIX } from './dispatch/output.js';

export { createApiCommands, type ApiCommandOptions } from './cli/commands/api.js';
export { createProgram } from './cli/program.js';
