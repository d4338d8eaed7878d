/**
 * Outcome rendering for dispatched commands.
 *
 * Successes and request failures share the `success` prefix; only the
 * payload below it tells them apart.
 *
 * Dependency direction: output.ts → node:util, sdk/types.ts
 * Used by: dispatcher.ts
 */

import { inspect } from 'node:util';
import type { SendResult } from '../sdk/types.js';

export const OUTCOME_PREFIX = 'success';

/** Render a send result as the prefix line plus a debug dump of the payload. */
export function formatOutcome<T>(result: SendResult<T>): string {
    const payload = result.ok ? result.value : result.error.toJSON();
    return `${OUTCOME_PREFIX}\n${inspect(payload, { depth: null, colors: false })}`;
}
