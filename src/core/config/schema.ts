/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, types.ts
 */

import { z } from 'zod';

/**
 * Schema for the SDK client connection settings.
 */
export const clientConfigSchema = z.object({
    /** Base URL of the key API server. */
    baseUrl: z.string().url().default('http://localhost:8080'),
    /** Per-request timeout in milliseconds. */
    timeoutMs: z.number().int().min(1).max(600_000).default(30_000),
});

/** Accepted log level names. */
export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * The complete application configuration schema.
 * This is the single source of truth for config structure.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    /** Where and how requests are sent. */
    client: clientConfigSchema,
    /** Default log level; `--verbose` raises it to debug. */
    logLevel: logLevelSchema.default('info'),
});
