#!/usr/bin/env node

/**
 * CLI entry point.
 *
 * Dependency direction: cli/index.ts → cli/program.ts, utils/logger
 * Used by: package.json bin entry ("key-cli" binary)
 */

import { createProgram } from './program.js';
import { logger } from '../utils/logger.js';

createProgram()
    .parseAsync()
    .catch((err: unknown) => {
        logger.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    });
