/**
 * The closed set of commands, one per API operation.
 *
 * Adding an operation means adding it here, then adding its case to
 * `schemaFor()` in registry.ts, `Cli.execute()` in dispatcher.ts and a
 * method to CliOverride. The exhaustive switches fail the type-check
 * until all of them are done.
 *
 * Dependency direction: commands.ts → nothing (leaf module)
 * Used by: registry.ts, dispatcher.ts, CLI api commands
 */

export const CliCommand = {
    KeyGet: 'key-get',
} as const;

export type CliCommand = (typeof CliCommand)[keyof typeof CliCommand];

/** Every command, in declaration order. */
export const ALL_CLI_COMMANDS: readonly CliCommand[] = Object.values(CliCommand);

/** Compile-time exhaustiveness guard for switches over CliCommand. */
export function assertNever(value: never): never {
    throw new Error(`Unhandled command: ${String(value)}`);
}
