/**
 * Command registry: flag schemas for every command and the commander
 * sub-commands built from them.
 *
 * All flags are optional: an absent flag leaves the builder's default in
 * place. `--key` shares its name with a path-level parameter of the API
 * while `--unique-key` never collides; reconciling the two is left to an
 * override.
 *
 * Dependency direction: registry.ts → commander, commands.ts
 * Used by: dispatcher.ts, CLI api commands
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { ALL_CLI_COMMANDS, CliCommand, assertNever } from './commands.js';

/** Value types a flag can carry. */
export type FlagValueType = 'boolean' | 'string';

/** One long-form flag. */
export interface FlagSpec {
    /** Long name without the leading dashes, e.g. `unique-key`. */
    readonly name: string;
    readonly valueType: FlagValueType;
    /** Generated flags are never mandatory; absence means "leave unset". */
    readonly required: false;
    readonly help: string;
}

/** Declarative description of one sub-command. */
export interface CommandSchema {
    readonly command: CliCommand;
    /** Sub-command name as typed on the command line. */
    readonly name: string;
    readonly about: string;
    /** Flags in declaration order. */
    readonly flags: readonly FlagSpec[];
}

function keyGetSchema(): CommandSchema {
    return {
        command: CliCommand.KeyGet,
        name: CliCommand.KeyGet,
        about: 'Gets a key',
        flags: [
            {
                name: 'key',
                valueType: 'boolean',
                required: false,
                help: 'The same key name',
            },
            {
                name: 'unique-key',
                valueType: 'string',
                required: false,
                help: 'A key parameter that will not be overridden by the path spec',
            },
        ],
    };
}

/** Build the flag schema for a command. Returns a new value on every call. */
export function schemaFor(command: CliCommand): CommandSchema {
    switch (command) {
        case CliCommand.KeyGet:
            return keyGetSchema();
        default:
            return assertNever(command);
    }
}

/** Every command exactly once, in declaration order. */
export function allCommands(): CliCommand[] {
    return [...ALL_CLI_COMMANDS];
}

/** Parse a boolean flag value; commander reports the thrown error. */
export function parseBooleanFlag(value: string): boolean {
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new InvalidArgumentError('Expected "true" or "false".');
}

/** Build the commander sub-command for a command from its schema. */
export function commandFor(command: CliCommand): Command {
    const schema = schemaFor(command);
    const cmd = new Command(schema.name).description(schema.about);

    for (const flag of schema.flags) {
        const option = new Option(`--${flag.name} <${flag.valueType}>`, flag.help);
        if (flag.valueType === 'boolean') {
            option.argParser(parseBooleanFlag);
        }
        cmd.addOption(option);
    }

    return cmd;
}
