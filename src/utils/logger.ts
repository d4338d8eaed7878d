/**
 * Structured console logger with chalk colors and log levels.
 *
 * Every level writes to stderr: stdout is reserved for command outcomes,
 * so piping `key-cli key-get` into another tool never picks up log noise.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer for consistent logging output
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

/** Config-file spelling of each level. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warn,
    error: LogLevel.Error,
    silent: LogLevel.Silent,
};

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Get the current global log level. */
export function getLogLevel(): LogLevel {
    return currentLevel;
}

/** Map a level name from config to its LogLevel. */
export function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVELS_BY_NAME[name];
}

/** Log a debug message (grey, only shown at Debug level). */
export function debug(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Debug) {
        console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
}

/** Log an info message (blue). */
export function info(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.error(chalk.blue(`[INFO]  ${message}`), ...args);
    }
}

/** Log a success message (green). */
export function success(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.error(chalk.green(`✔ ${message}`), ...args);
    }
}

/** Log a warning message (yellow). */
export function warn(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Warn) {
        console.error(chalk.yellow(`[WARN]  ${message}`), ...args);
    }
}

/** Log an error message (red). */
export function error(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Error) {
        console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
}

/** Log a header/banner (bold white). */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.error();
        console.error(chalk.bold.white(message));
        console.error(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

export const logger = {
    debug,
    info,
    success,
    warn,
    error,
    header,
    setLogLevel,
    getLogLevel,
    parseLogLevel,
};
