/**
 * Default configuration values.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts
 */

import type { AppConfig } from './types.js';

/**
 * Full default configuration. Points at a locally running server
 * so a fresh checkout works without any setup.
 */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    client: {
        baseUrl: 'http://localhost:8080',
        timeoutMs: 30_000,
    },

    logLevel: 'info',
};

/** The directory name where config is stored inside a project. */
export const CONFIG_DIR_NAME = '.key-cli';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';
