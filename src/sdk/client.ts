/**
 * HTTP client for the key API.
 *
 * Dependency direction: client.ts → sdk/types.ts, sdk/builders.ts, core/errors.ts
 * Used by: CLI api commands, dispatch/dispatcher.ts
 */

import { ClientError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { KeyGetBuilder } from './builders.js';
import type { ClientOptions, FetchLike, RequestExecutor, ResponseValue, SendResult } from './types.js';

/** Default client settings. */
const DEFAULTS = {
    timeoutMs: 30_000,
} as const;

/**
 * Key API client. Each operation method returns a fresh builder.
 */
export class Client implements RequestExecutor {
    public readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor(options: ClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
        this.fetchImpl = options.fetch ?? fetch;
    }

    /** Start a `GET /key` request. */
    keyGet(): KeyGetBuilder {
        return new KeyGetBuilder(this);
    }

    async get(path: string, query: URLSearchParams): Promise<SendResult<null>> {
        let url: string;
        try {
            url = this.buildUrl(path, query);
        } catch (err) {
            return {
                ok: false,
                error: new ClientError(
                    'InvalidRequest',
                    `Cannot build request URL from base "${this.baseUrl}": ${err instanceof Error ? err.message : String(err)}`,
                    { context: { baseUrl: this.baseUrl, path } },
                ),
            };
        }

        logger.debug(`GET ${url}`);

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method: 'GET',
                headers: { Accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            return {
                ok: false,
                error: new ClientError(
                    'CommunicationError',
                    `Failed to reach ${url}: ${err instanceof Error ? err.message : String(err)}`,
                    { context: { url } },
                ),
            };
        }

        const headers: Record<string, string> = {};
        response.headers.forEach((value, name) => {
            headers[name] = value;
        });

        if (response.ok) {
            const value: ResponseValue<null> = { status: response.status, headers, inner: null };
            return { ok: true, value };
        }

        let body: string;
        try {
            body = await response.text();
        } catch (err) {
            return {
                ok: false,
                error: new ClientError(
                    'InvalidResponsePayload',
                    `Failed to read error body from ${url}: ${err instanceof Error ? err.message : String(err)}`,
                    { status: response.status, context: { url } },
                ),
            };
        }

        return {
            ok: false,
            error: new ClientError(
                'UnexpectedResponse',
                `Unexpected response: ${response.status} ${response.statusText}`.trimEnd(),
                { status: response.status, context: { url, body } },
            ),
        };
    }

    private buildUrl(path: string, query: URLSearchParams): string {
        const url = new URL(`${this.baseUrl}${path}`);
        url.search = query.toString();
        return url.toString();
    }
}
