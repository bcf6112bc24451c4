import { describe, expect, it, vi } from 'vitest';
import { createAuthInterceptor, createDateHeaderInterceptor } from '../interceptors';
import type { BeforeSendContext } from '../types';

const beforeSendContext = (): BeforeSendContext => ({
  request: { method: 'GET', url: 'https://primary.example.com/rows', headers: {} },
  attempt: 1,
  location: 'primary',
  signal: new AbortController().signal,
});

describe('createAuthInterceptor', () => {
  it('adds a bearer token fetched per attempt', async () => {
    const getToken = vi.fn().mockResolvedValueOnce('token-1').mockResolvedValueOnce('token-2');
    const interceptor = createAuthInterceptor({ getToken });
    const first = beforeSendContext();
    const second = beforeSendContext();

    await interceptor.beforeSend?.(first);
    await interceptor.beforeSend?.(second);

    expect(first.request.headers).toEqual({ Authorization: 'Bearer token-1' });
    expect(second.request.headers).toEqual({ Authorization: 'Bearer token-2' });
  });

  it('honours a custom header and format', async () => {
    const interceptor = createAuthInterceptor({
      getToken: () => 'test-secret',
      headerName: 'x-api-key',
      formatToken: (token) => token,
    });
    const ctx = beforeSendContext();

    await interceptor.beforeSend?.(ctx);

    expect(ctx.request.headers).toEqual({ 'x-api-key': 'test-secret' });
  });

  it('leaves the request unsigned when no token is available', async () => {
    const interceptor = createAuthInterceptor({ getToken: () => null });
    const ctx = beforeSendContext();

    await interceptor.beforeSend?.(ctx);

    expect(ctx.request.headers).toEqual({});
  });
});

describe('createDateHeaderInterceptor', () => {
  it('stamps the attempt with an RFC 1123 date', async () => {
    const interceptor = createDateHeaderInterceptor({ now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) });
    const ctx = beforeSendContext();

    await interceptor.beforeSend?.(ctx);

    expect(ctx.request.headers).toEqual({ 'x-ms-date': 'Tue, 02 Jan 2024 03:04:05 GMT' });
  });
});
