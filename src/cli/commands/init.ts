/**
 * `key-cli init`: Interactive setup wizard.
 *
 * Asks for the server URL and request timeout and writes
 * `.key-cli/config.json` in the current directory.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import { clientConfigSchema, logLevelSchema } from '../../core/config/schema.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';

/** Build the `init` command. `root` defaults to the working directory. */
export function createInitCommand(root?: string): Command {
    return new Command('init')
        .description('Create a key-cli configuration in the current directory')
        .option('-f, --force', 'Overwrite existing configuration')
        .option('-y, --yes', 'Accept defaults without prompting')
        .action(async (options: { force?: boolean; yes?: boolean }) => {
            const projectRoot = root ?? process.cwd();

            logger.header('key-cli: Setup');

            if (configExists(projectRoot) && !options.force) {
                const { overwrite } = await prompts({
                    type: 'confirm',
                    name: 'overwrite',
                    message: 'Configuration already exists. Overwrite?',
                    initial: false,
                });

                if (overwrite !== true) {
                    logger.info('Setup cancelled.');
                    return;
                }
            }

            const config = options.yes ? getDefaultConfig() : await runWizard();

            if (!config) {
                logger.info('Setup cancelled.');
                return;
            }

            const spinner = ora('Saving configuration...').start();
            saveConfig(projectRoot, config);
            spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);

            logger.success('Setup complete!');
            console.error(chalk.gray('  Run "key-cli key-get --help" to see the request flags.'));
        });
}

/**
 * Ask for each client setting. Returns null if the user aborts.
 */
async function runWizard(): Promise<AppConfig | null> {
    const defaults = getDefaultConfig();
    let cancelled = false;

    const answers = await prompts(
        [
            {
                type: 'text',
                name: 'baseUrl',
                message: 'Server base URL:',
                initial: defaults.client.baseUrl,
                validate: (value: string) =>
                    clientConfigSchema.shape.baseUrl.safeParse(value).success || 'Enter a valid URL',
            },
            {
                type: 'number',
                name: 'timeoutMs',
                message: 'Request timeout (ms):',
                initial: defaults.client.timeoutMs,
                min: 1,
                max: 600_000,
            },
            {
                type: 'select',
                name: 'logLevel',
                message: 'Default log level:',
                choices: [
                    { title: 'info', value: 'info' },
                    { title: 'debug', value: 'debug' },
                    { title: 'warn', value: 'warn' },
                    { title: 'error', value: 'error' },
                    { title: 'silent', value: 'silent' },
                ],
                initial: 0,
            },
        ],
        { onCancel: () => { cancelled = true; } },
    );

    if (cancelled) return null;

    const parsed = clientConfigSchema.safeParse({
        baseUrl: answers.baseUrl,
        timeoutMs: answers.timeoutMs,
    });
    if (!parsed.success) {
        logger.error(parsed.error.issues.map((i) => i.message).join('; '));
        return null;
    }

    const logLevel = logLevelFrom(answers.logLevel);
    return getDefaultConfig({ client: parsed.data, logLevel });
}

function logLevelFrom(value: unknown): AppConfig['logLevel'] | undefined {
    const parsed = logLevelSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
}
