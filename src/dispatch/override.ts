/**
 * Override protocol: the customization point between flag application
 * and send.
 *
 * An embedder extends DefaultCliOverride and replaces only the methods for
 * the commands it cares about. A method may read any parsed value and
 * call any setter on the request, including ones already set from flags;
 * whatever it sets is what gets sent.
 *
 * Dependency direction: override.ts → arg-matches.ts, sdk/builders.ts
 * Used by: dispatcher.ts, CLI api commands, embedding applications
 */

import type { ArgMatches } from './arg-matches.js';
import type { KeyGetBuilder } from '../sdk/builders.js';

/** Outcome of an override method. A failure aborts the invocation. */
export type OverrideResult =
    | { readonly ok: true }
    | { readonly ok: false; readonly reason: string };

export const OVERRIDE_OK: OverrideResult = { ok: true };

/** Build a failed OverrideResult. */
export function overrideFailure(reason: string): OverrideResult {
    return { ok: false, reason };
}

/** One method per command. */
export interface CliOverride {
    executeKeyGet(matches: ArgMatches, request: KeyGetBuilder): OverrideResult;
}

/** Leaves every request exactly as the flags populated it. */
export class DefaultCliOverride implements CliOverride {
    executeKeyGet(_matches: ArgMatches, _request: KeyGetBuilder): OverrideResult {
        return OVERRIDE_OK;
    }
}
