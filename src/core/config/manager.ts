/**
 * Configuration manager: load, save, validate, merge, and resolve configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands
 */

import { join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { AppConfig, ClientConfig, ConfigOverrides } from './types.js';
import { fileExists, readJsonFile, writeJsonFile, ensureDir } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** A config fragment to merge over a complete config. */
export interface PartialAppConfig {
    readonly logLevel?: AppConfig['logLevel'];
    readonly client?: Partial<ClientConfig>;
}

function formatIssues(issues: readonly ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Load and validate the configuration from disk.
 *
 * @param projectRoot - The directory holding `.key-cli/`
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadConfig(projectRoot: string): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            'No configuration found. Run "key-cli init" first.',
            { configPath, projectRoot },
        );
    }

    logger.debug(`Loading config from ${configPath}`);

    const raw = readJsonFile(configPath);
    const result = appConfigSchema.safeParse(raw);

    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration file:\n${formatIssues(result.error.issues)}`,
            { configPath, issues: result.error.issues },
        );
    }

    return result.data;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const result = appConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    const configDir = getConfigDir(projectRoot);
    const configPath = getConfigPath(projectRoot);

    ensureDir(configDir);
    writeJsonFile(configPath, result.data);
    logger.debug(`Config saved to ${configPath}`);
}

/**
 * Merge a partial config over a complete one. Undefined source values
 * leave the target untouched.
 */
export function mergeConfig(target: AppConfig, source: PartialAppConfig): AppConfig {
    return {
        version: target.version,
        logLevel: source.logLevel ?? target.logLevel,
        client: {
            baseUrl: source.client?.baseUrl ?? target.client.baseUrl,
            timeoutMs: source.client?.timeoutMs ?? target.client.timeoutMs,
        },
    };
}

/**
 * Get the default configuration with optional partial overrides merged in.
 */
export function getDefaultConfig(overrides?: PartialAppConfig): AppConfig {
    return mergeConfig(DEFAULT_CONFIG, overrides ?? {});
}

/**
 * Build the effective config for a command run: the project's config file
 * (or defaults when there is none) with root command options on top.
 *
 * @throws {ConfigError} if the file is invalid or an override fails validation
 */
export function resolveConfig(projectRoot: string, overrides: ConfigOverrides = {}): AppConfig {
    const base = configExists(projectRoot) ? loadConfig(projectRoot) : getDefaultConfig();
    const merged = mergeConfig(base, {
        client: { baseUrl: overrides.baseUrl, timeoutMs: overrides.timeoutMs },
    });

    const result = appConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(
            `Invalid command-line configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    return result.data;
}
