/**
 * Tests for the config manager (load, save, validate, merge, resolve).
 *
 * Uses a temp directory to simulate project configs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    loadConfig,
    saveConfig,
    configExists,
    getConfigPath,
    mergeConfig,
    getDefaultConfig,
    resolveConfig,
} from '../../../src/core/config/manager.js';
import { DEFAULT_CONFIG, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from '../../../src/core/config/defaults.js';
import { ConfigError } from '../../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = join(tmpdir(), `key-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
    if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true });
    }
});

describe('configExists', () => {
    it('returns false when no config exists', () => {
        expect(configExists(testDir)).toBe(false);
    });

    it('returns true after saving config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(configExists(testDir)).toBe(true);
    });
});

describe('getConfigPath', () => {
    it('returns the correct path', () => {
        const expected = join(testDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
        expect(getConfigPath(testDir)).toBe(expected);
    });
});

describe('saveConfig', () => {
    it('saves valid config and creates directories', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(existsSync(getConfigPath(testDir))).toBe(true);
    });

    it('throws ConfigError for an invalid base URL', () => {
        const invalid = getDefaultConfig({ client: { baseUrl: 'not-a-url' } });
        expect(() => saveConfig(testDir, invalid)).toThrow(ConfigError);
    });
});

describe('loadConfig', () => {
    it('loads a previously saved config', () => {
        saveConfig(testDir, getDefaultConfig({ client: { baseUrl: 'http://saved.test' } }));
        const loaded = loadConfig(testDir);

        expect(loaded.version).toBe(1);
        expect(loaded.client.baseUrl).toBe('http://saved.test');
        expect(loaded.client.timeoutMs).toBe(30_000);
    });

    it('fills in defaults for omitted fields', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), JSON.stringify({ client: {} }), 'utf-8');

        expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('throws ConfigError when no config exists', () => {
        expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it('throws ConfigError for corrupted JSON', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), '{ broken json }', 'utf-8');

        expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it('throws ConfigError for an out-of-range timeout', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), JSON.stringify({ client: { timeoutMs: 0 } }), 'utf-8');

        expect(() => loadConfig(testDir)).toThrow(/client\.timeoutMs/);
    });
});

describe('mergeConfig', () => {
    it('overrides only the values that are defined', () => {
        const result = mergeConfig(DEFAULT_CONFIG, {
            client: { baseUrl: 'http://merged.test', timeoutMs: undefined },
        });
        expect(result.client).toEqual({ baseUrl: 'http://merged.test', timeoutMs: 30_000 });
        expect(result.logLevel).toBe('info');
    });

    it('does not mutate the target', () => {
        mergeConfig(DEFAULT_CONFIG, { logLevel: 'debug' });
        expect(DEFAULT_CONFIG.logLevel).toBe('info');
    });
});

describe('getDefaultConfig', () => {
    it('returns a copy of the defaults', () => {
        const config = getDefaultConfig();
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config).not.toBe(DEFAULT_CONFIG);
    });

    it('applies partial overrides', () => {
        const config = getDefaultConfig({ client: { timeoutMs: 5_000 } });
        expect(config.client.timeoutMs).toBe(5_000);
        expect(config.client.baseUrl).toBe('http://localhost:8080');
    });
});

describe('resolveConfig', () => {
    it('falls back to defaults when there is no config file', () => {
        expect(resolveConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('layers command-line values over the config file', () => {
        saveConfig(testDir, getDefaultConfig({ client: { baseUrl: 'http://file.test', timeoutMs: 1_000 } }));

        const config = resolveConfig(testDir, { timeoutMs: 2_000 });

        expect(config.client).toEqual({ baseUrl: 'http://file.test', timeoutMs: 2_000 });
    });

    it('throws ConfigError for an invalid command-line base URL', () => {
        expect(() => resolveConfig(testDir, { baseUrl: 'nope' })).toThrow(ConfigError);
    });
});
