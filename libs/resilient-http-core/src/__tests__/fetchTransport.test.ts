import { describe, expect, it, vi } from 'vitest';
import { createFetchTransport } from '../transport/fetchTransport';

describe('createFetchTransport', () => {
  it('forwards the request and buffers the response', async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response('{"ok":true}', { status: 201, headers: { ETag: 'W/"abc"' } }),
    );
    const transport = createFetchTransport(fetchImpl);
    const body = new ArrayBuffer(8);
    const signal = new AbortController().signal;

    const response = await transport(
      { method: 'POST', url: 'https://primary.example.com/rows', headers: { 'Content-Type': 'application/json' }, body },
      signal,
    );

    expect(fetchImpl).toHaveBeenCalledWith('https://primary.example.com/rows', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal,
    });
    expect(response.status).toBe(201);
    expect(response.headers.etag).toBe('W/"abc"');
    expect(new TextDecoder().decode(response.body)).toBe('{"ok":true}');
  });

  it('returns error statuses instead of throwing', async () => {
    const transport = createFetchTransport(async () => new Response(null, { status: 503 }));

    const response = await transport(
      { method: 'GET', url: 'https://primary.example.com/rows', headers: {} },
      new AbortController().signal,
    );

    expect(response.status).toBe(503);
    expect(response.body.byteLength).toBe(0);
  });
});
