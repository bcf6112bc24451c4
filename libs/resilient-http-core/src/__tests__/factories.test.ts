import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createDefaultHttpClient } from '../factories';
import { HttpClient } from '../HttpClient';
import type { RawHttpResponse, StorageRequest, TransportRequest } from '../types';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops debug output unless verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().debug('http.request.attempt', { attempt: 1 });
    new ConsoleLogger(true).debug('http.request.attempt', { attempt: 2 });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('http.request.attempt', { attempt: 2 });
  });

  it('forwards the other levels to the console', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new ConsoleLogger().warn('http.request.failed', { status: 503 });

    expect(warn).toHaveBeenCalledWith('http.request.failed', { status: 503 });
  });
});

describe('createDefaultHttpClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds an engine that uses the supplied transport', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const transport = vi.fn(
      async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => ({
        status: 204,
        headers: {},
        body: new ArrayBuffer(0),
      }),
    );
    const request: StorageRequest<number> = {
      operation: 'rows.delete',
      buildRequest: (ctx) => ({ method: 'DELETE', url: `${ctx.baseUrl}/rows`, headers: {} }),
      preProcessResponse: (response) => response.status,
    };

    const client = createDefaultHttpClient({ clientName: 'defaults', transport });
    const result = await client.execute(request, { endpoints: { primary: 'https://primary.example.com' } });

    expect(client).toBeInstanceOf(HttpClient);
    expect(result.value).toBe(204);
    expect(transport).toHaveBeenCalledTimes(1);
  });
});
