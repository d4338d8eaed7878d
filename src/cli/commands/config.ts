/**
 * `key-cli config`: Show the effective configuration.
 *
 * Dependency direction: config.ts → commander, chalk, config module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, getConfigPath, resolveConfig } from '../../core/config/manager.js';
import type { GlobalOptions } from './api.js';
import { logger } from '../../utils/logger.js';

/** Build the `config` command. `root` defaults to the working directory. */
export function createConfigCommand(root?: string): Command {
    return new Command('config')
        .description('Show the effective configuration')
        .option('-p, --path', 'Show config file path only')
        .action((options: { path?: boolean }, command: Command) => {
            const projectRoot = root ?? process.cwd();

            if (options.path) {
                console.log(getConfigPath(projectRoot));
                return;
            }

            const globals = command.optsWithGlobals<GlobalOptions>();
            const config = resolveConfig(projectRoot, {
                baseUrl: globals.baseUrl,
                timeoutMs: globals.timeout,
            });

            logger.header('Current Configuration');
            console.log(
                chalk.gray(
                    configExists(projectRoot)
                        ? `File: ${getConfigPath(projectRoot)}`
                        : 'No config file; showing defaults',
                ),
            );
            console.log();
            console.log(JSON.stringify(config, null, 2));
        });
}
