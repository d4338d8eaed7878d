/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually: they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import { appConfigSchema, clientConfigSchema } from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** SDK client connection settings. */
export type ClientConfig = z.infer<typeof clientConfigSchema>;

/** Values taken from root command options, applied over the file. */
export interface ConfigOverrides {
    readonly baseUrl?: string;
    readonly timeoutMs?: number;
}
