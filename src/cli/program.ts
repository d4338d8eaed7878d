/**
 * Root program: global options plus every command.
 *
 * Dependency direction: program.ts → commander, all command files
 * Used by: cli/index.ts
 */

import { Command, InvalidArgumentError } from 'commander';
import { createApiCommands, type ApiCommandOptions } from './commands/api.js';
import { createConfigCommand } from './commands/config.js';
import { createInitCommand } from './commands/init.js';

export const VERSION = '0.1.0';

/** Parse `--timeout` as a positive integer number of milliseconds. */
export function parseTimeout(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer (milliseconds).');
    }
    return parsed;
}

export function createProgram(options: ApiCommandOptions = {}): Command {
    const program = new Command();

    program
        .name('key-cli')
        .description('Command-line client for the key API')
        .version(VERSION)
        .option('--base-url <url>', 'Server base URL (overrides config)')
        .option('--timeout <ms>', 'Request timeout in milliseconds (overrides config)', parseTimeout)
        .option('-v, --verbose', 'Enable debug logging');

    program.addCommand(createInitCommand(options.projectRoot));
    program.addCommand(createConfigCommand(options.projectRoot));

    for (const command of createApiCommands(options)) {
        program.addCommand(command);
    }

    return program;
}
