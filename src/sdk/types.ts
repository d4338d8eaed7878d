/**
 * Key API client contract.
 *
 * Request builders never throw from `send()`: every outcome is a
 * SendResult, so callers decide how failures are reported.
 *
 * Dependency direction: sdk/types.ts → core/errors.ts
 * Used by: sdk/client.ts, sdk/builders.ts, dispatch layer
 */

import type { ClientError } from '../core/errors.js';

/** Minimal fetch signature the client needs. The global fetch satisfies it. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Settings for constructing a Client. */
export interface ClientOptions {
    /** Server root, e.g. `http://localhost:8080` or `https://host/api`. */
    readonly baseUrl: string;
    /** Abort a request after this many milliseconds. */
    readonly timeoutMs?: number;
    /** Replaces the global fetch (tests pass an in-process stub). */
    readonly fetch?: FetchLike;
}

/** A successful response. */
export interface ResponseValue<T> {
    readonly status: number;
    readonly headers: Record<string, string>;
    readonly inner: T;
}

/** What `send()` resolves to. */
export type SendResult<T> =
    | { readonly ok: true; readonly value: ResponseValue<T> }
    | { readonly ok: false; readonly error: ClientError };

/** Transport used by request builders. */
export interface RequestExecutor {
    get(path: string, query: URLSearchParams): Promise<SendResult<null>>;
}
