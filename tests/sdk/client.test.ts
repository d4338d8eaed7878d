/**
 * Tests for the key API client and its request builder.
 *
 * Uses an in-process fetch stub; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import { Client } from '../../src/sdk/client.js';
import type { FetchLike } from '../../src/sdk/types.js';

function okFetch(init?: ResponseInit) {
    return vi.fn<FetchLike>(async () => new Response(null, { status: 200, ...init }));
}

describe('Client', () => {
    it('returns a new builder for every keyGet call', () => {
        const client = new Client({ baseUrl: 'http://api.test', fetch: okFetch() });
        expect(client.keyGet()).not.toBe(client.keyGet());
    });

    it('strips trailing slashes from the base URL', async () => {
        const fetchMock = okFetch();
        const client = new Client({ baseUrl: 'http://api.test//', fetch: fetchMock });

        await client.keyGet().send();

        expect(client.baseUrl).toBe('http://api.test');
        expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/key');
    });

    it('keeps a path prefix on the base URL', async () => {
        const fetchMock = okFetch();
        const client = new Client({ baseUrl: 'http://api.test/v1', fetch: fetchMock });

        await client.keyGet().key(false).send();

        expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/v1/key?key=false');
    });

    it('sends a GET with a JSON accept header and a timeout signal', async () => {
        const fetchMock = okFetch();
        const client = new Client({ baseUrl: 'http://api.test', timeoutMs: 500, fetch: fetchMock });

        await client.keyGet().send();

        const init = fetchMock.mock.calls[0][1];
        expect(init?.method).toBe('GET');
        expect(init?.headers).toEqual({ Accept: 'application/json' });
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('returns status and headers for a 2xx response', async () => {
        const client = new Client({
            baseUrl: 'http://api.test',
            fetch: okFetch({ headers: { 'X-Request-Id': 'req-1' } }),
        });

        const result = await client.keyGet().send();

        expect(result).toEqual({
            ok: true,
            value: { status: 200, headers: { 'x-request-id': 'req-1' }, inner: null },
        });
    });

    it('returns UnexpectedResponse for a non-2xx status', async () => {
        const client = new Client({
            baseUrl: 'http://api.test',
            fetch: vi.fn<FetchLike>(async () => new Response('not here', { status: 404, statusText: 'Not Found' })),
        });

        const result = await client.keyGet().send();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('UnexpectedResponse');
            expect(result.error.status).toBe(404);
            expect(result.error.message).toBe('Unexpected response: 404 Not Found');
            expect(result.error.context).toEqual({ url: 'http://api.test/key', body: 'not here' });
        }
    });

    it('returns CommunicationError when fetch rejects', async () => {
        const client = new Client({
            baseUrl: 'http://api.test',
            fetch: vi.fn<FetchLike>(async () => {
                throw new TypeError('fetch failed');
            }),
        });

        const result = await client.keyGet().send();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('CommunicationError');
            expect(result.error.status).toBeUndefined();
            expect(result.error.message).toBe('Failed to reach http://api.test/key: fetch failed');
        }
    });

    it('returns InvalidResponsePayload when an error body cannot be read', async () => {
        const response = new Response('partial', { status: 502 });
        vi.spyOn(response, 'text').mockRejectedValue(new Error('stream broke'));
        const client = new Client({
            baseUrl: 'http://api.test',
            fetch: vi.fn<FetchLike>(async () => response),
        });

        const result = await client.keyGet().send();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('InvalidResponsePayload');
            expect(result.error.status).toBe(502);
            expect(result.error.message).toBe('Failed to read error body from http://api.test/key: stream broke');
        }
    });

    it('returns CommunicationError when the request times out', async () => {
        const hangingFetch = vi.fn<FetchLike>(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
                }),
        );
        const client = new Client({ baseUrl: 'http://api.test', timeoutMs: 20, fetch: hangingFetch });

        const result = await client.keyGet().send();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('CommunicationError');
            expect(result.error.message).toBe('Failed to reach http://api.test/key: request aborted');
        }
    });

    it('returns InvalidRequest without calling fetch when the URL cannot be built', async () => {
        const fetchMock = okFetch();
        const client = new Client({ baseUrl: 'not a url', fetch: fetchMock });

        const result = await client.keyGet().send();

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('InvalidRequest');
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

describe('KeyGetBuilder', () => {
    it('chains setters and reports only set fields', () => {
        const builder = new Client({ baseUrl: 'http://api.test' }).keyGet();
        expect(builder.fields()).toEqual({});
        expect(builder.key(true)).toBe(builder);
        expect(builder.fields()).toEqual({ key: true });
    });

    it('keeps the last value written to a field', () => {
        const builder = new Client({ baseUrl: 'http://api.test' }).keyGet();
        builder.uniqueKey('first').uniqueKey('second');
        expect(builder.fields()).toEqual({ uniqueKey: 'second' });
    });

    it('encodes query values', async () => {
        const fetchMock = okFetch();
        await new Client({ baseUrl: 'http://api.test', fetch: fetchMock })
            .keyGet()
            .uniqueKey('a b&c')
            .send();

        expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/key?unique_key=a+b%26c');
    });
});
