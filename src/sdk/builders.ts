/**
 * Request builders, one per API operation.
 *
 * Setters mutate the builder in place and return it, so calls chain.
 * A builder is created per request by the Client and not reused.
 *
 * Dependency direction: builders.ts → sdk/types.ts
 * Used by: sdk/client.ts, dispatch/dispatcher.ts, dispatch/override.ts
 */

import type { RequestExecutor, SendResult } from './types.js';

/** Fields of `GET /key` that have been set on a builder. */
export interface KeyGetFields {
    /** `key` query parameter. */
    readonly key?: boolean;
    /** `unique_key` query parameter. */
    readonly uniqueKey?: string;
}

/** Builder for `GET /key`. */
export class KeyGetBuilder {
    private keyValue?: boolean;
    private uniqueKeyValue?: string;

    constructor(private readonly executor: RequestExecutor) {}

    /** The same key name. */
    key(value: boolean): this {
        this.keyValue = value;
        return this;
    }

    /** A key parameter that will not be overridden by the path spec. */
    uniqueKey(value: string): this {
        this.uniqueKeyValue = value;
        return this;
    }

    /** Snapshot of the fields set so far. Unset fields are omitted. */
    fields(): KeyGetFields {
        return {
            ...(this.keyValue !== undefined ? { key: this.keyValue } : {}),
            ...(this.uniqueKeyValue !== undefined ? { uniqueKey: this.uniqueKeyValue } : {}),
        };
    }

    /** Send `GET /key` with the set fields as query parameters. */
    async send(): Promise<SendResult<null>> {
        const query = new URLSearchParams();
        if (this.keyValue !== undefined) query.set('key', String(this.keyValue));
        if (this.uniqueKeyValue !== undefined) query.set('unique_key', this.uniqueKeyValue);

        return this.executor.get('/key', query);
    }
}
