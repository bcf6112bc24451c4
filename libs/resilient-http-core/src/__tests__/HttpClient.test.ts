import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DefaultErrorClassifier,
  HttpClient,
  NetworkError,
  TimeoutError,
  getHeader,
  statusToCategory,
} from '../HttpClient';
import { LinearRetryPolicy, noRetryPolicy } from '../retryPolicies';
import type {
  AttemptContext,
  AttemptInfo,
  HttpHeaders,
  HttpRequestInterceptor,
  Logger,
  MetricsSink,
  RawHttpResponse,
  StorageRequest,
  StorageUri,
  TransportRequest,
} from '../types';

const rawResponse = (status: number, headers: HttpHeaders = {}): RawHttpResponse => ({
  status,
  headers,
  body: new ArrayBuffer(0),
});

const endpoints: StorageUri = {
  primary: 'https://primary.example.com',
  secondary: 'https://secondary.example.com/',
};

const statusRequest = (overrides: Partial<StorageRequest<number>> = {}): StorageRequest<number> => ({
  operation: 'rows.get',
  buildRequest: (ctx: AttemptContext) => ({ method: 'GET', url: `${ctx.baseUrl}/rows`, headers: {} }),
  preProcessResponse: (response: RawHttpResponse) => response.status,
  ...overrides,
});

const quickRetries = new LinearRetryPolicy({ maxAttempts: 3, deltaBackoffMs: 0 });

describe('HttpClient', () => {
  let logger: Logger;
  let metrics: MetricsSink;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    metrics = {
      recordRequest: vi.fn().mockResolvedValue(undefined),
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  const createTransport = () =>
    vi.fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => rawResponse(200));

  const createClient = (overrides: Partial<ConstructorParameters<typeof HttpClient>[0]> = {}) =>
    new HttpClient({
      clientName: 'test-client',
      logger,
      metricsSink: metrics,
      defaultRetryPolicy: quickRetries,
      ...overrides,
    });

  it('sends the built request to the primary endpoint with the correlation id', async () => {
    const transport = createTransport();
    const client = createClient({ transport, defaultHeaders: { 'user-agent': 'table-tests' } });

    const result = await client.execute(statusRequest(), { endpoints, correlation: { requestId: 'req-1' } });

    expect(result.value).toBe(200);
    expect(result.outcome).toMatchObject({ ok: true, status: 200, attempts: 1, category: 'none', statusFamily: 200 });
    expect(transport).toHaveBeenCalledTimes(1);
    const [sent, signal] = transport.mock.calls[0];
    expect(sent.url).toBe('https://primary.example.com/rows');
    expect(sent.headers).toEqual({ 'user-agent': 'table-tests', 'x-ms-client-request-id': 'req-1' });
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(logger.info).toHaveBeenCalledWith(
      'http.request.success',
      expect.objectContaining({ operation: 'rows.get', attempt: 1, status: 200, requestId: 'req-1' }),
    );
  });

  it('logs and records only the request id as correlation', async () => {
    const client = createClient({ transport: createTransport() });

    await client.execute(statusRequest(), { endpoints, correlation: { requestId: 'req-7' } });

    expect(vi.mocked(logger.debug).mock.calls[0][1]).toEqual({
      client: 'test-client',
      operation: 'rows.get',
      method: 'GET',
      url: 'https://primary.example.com/rows',
      requestId: 'req-7',
      attempt: 1,
      maxAttempts: 3,
      location: 'primary',
    });
    expect(metrics.recordRequest).toHaveBeenCalledWith(expect.objectContaining({ correlation: { requestId: 'req-7' } }));
  });

  it('keeps a request id header the request already carries', async () => {
    const transport = createTransport();
    const client = createClient({ transport });
    const request = statusRequest({
      buildRequest: (ctx) => ({
        method: 'GET',
        url: `${ctx.baseUrl}/rows`,
        headers: { 'X-MS-Client-Request-Id': 'caller-id' },
      }),
    });

    await client.execute(request, { endpoints, correlation: { requestId: 'req-1' } });

    expect(transport.mock.calls[0][0].headers).toEqual({ 'X-MS-Client-Request-Id': 'caller-id' });
  });

  it('retries network failures and rebuilds the request for every attempt', async () => {
    const transport = createTransport().mockRejectedValueOnce(new Error('socket hang up'));
    const body = new ArrayBuffer(4);
    const buildRequest = vi.fn(
      (ctx: AttemptContext): TransportRequest => ({ method: 'PUT', url: `${ctx.baseUrl}/rows`, headers: {}, body }),
    );
    const client = createClient({ transport });

    const result = await client.execute(statusRequest({ buildRequest }), { endpoints });

    expect(result.value).toBe(200);
    expect(result.outcome.attempts).toBe(2);
    expect(buildRequest).toHaveBeenCalledTimes(2);
    expect(transport.mock.calls[0][0].body).toBe(body);
    expect(transport.mock.calls[1][0].body).toBe(body);
    expect(logger.warn).toHaveBeenCalledWith(
      'http.request.failed',
      expect.objectContaining({ attempt: 1, retryInMs: 0, errorCategory: 'network', error: 'socket hang up' }),
    );
  });

  it('stops after the policy maximum and rethrows the last error', async () => {
    const transport = vi.fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => {
      throw new Error('connection refused');
    });
    const client = createClient({ transport });

    await expect(client.execute(statusRequest(), { endpoints })).rejects.toBeInstanceOf(NetworkError);
    expect(transport).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith('http.request.failed', expect.objectContaining({ attempt: 3 }));
  });

  it('does not retry errors the classifier marks as final', async () => {
    const transport = createTransport();
    const client = createClient({ transport });
    const request = statusRequest({
      preProcessResponse: () => {
        throw new Error('rejected by interpreter');
      },
    });

    await expect(client.execute(request, { endpoints })).rejects.toThrow('rejected by interpreter');
    expect(transport).toHaveBeenCalledTimes(1);
    expect(metrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        operation: 'rows.get',
        outcome: expect.objectContaining({ ok: false, status: 200, attempts: 1, category: 'unknown' }),
      }),
    );
  });

  it('alternates between locations in primaryThenSecondary mode', async () => {
    const transport = createTransport()
      .mockRejectedValueOnce(new Error('reset'))
      .mockRejectedValueOnce(new Error('reset'));
    const attempts: AttemptInfo[] = [];
    const client = createClient({ transport });

    await client.execute(statusRequest(), {
      endpoints,
      locationMode: 'primaryThenSecondary',
      onAttempt: (info) => attempts.push(info),
    });

    expect(transport.mock.calls.map(([req]) => req.url)).toEqual([
      'https://primary.example.com/rows',
      'https://secondary.example.com/rows',
      'https://primary.example.com/rows',
    ]);
    expect(attempts.map((info) => [info.location, info.status])).toEqual([
      ['primary', undefined],
      ['secondary', undefined],
      ['primary', 200],
    ]);
  });

  it('starts on the secondary in secondaryOnly mode', async () => {
    const transport = createTransport();
    const client = createClient({ transport });

    await client.execute(statusRequest(), { endpoints, locationMode: 'secondaryOnly' });

    expect(transport.mock.calls[0][0].url).toBe('https://secondary.example.com/rows');
  });

  it('rejects secondary location modes without a secondary endpoint', async () => {
    const client = createClient({ transport: createTransport() });

    await expect(
      client.execute(statusRequest(), { endpoints: { primary: 'https://primary.example.com' }, locationMode: 'secondaryOnly' }),
    ).rejects.toThrow('Location mode secondaryOnly requires a secondary endpoint');
  });

  it('aborts an attempt that exceeds the per-attempt timeout', async () => {
    const transport = vi.fn(
      (_req: TransportRequest, signal: AbortSignal) =>
        new Promise<RawHttpResponse>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const client = createClient({ transport, defaultRetryPolicy: noRetryPolicy });

    const failure = client.execute(statusRequest(), { endpoints, resilience: { perAttemptTimeoutMs: 5 } });

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('Request timed out after 5ms');
  });

  it('runs beforeSend in registration order and afterResponse in reverse', async () => {
    const calls: string[] = [];
    const tracking = (name: string): HttpRequestInterceptor => ({
      beforeSend: (ctx) => {
        calls.push(`${name}.before`);
        ctx.request.headers[`x-${name}`] = String(ctx.attempt);
      },
      afterResponse: () => {
        calls.push(`${name}.after`);
      },
    });
    const transport = createTransport();
    const client = createClient({ transport, interceptors: [tracking('a'), tracking('b')] });

    await client.execute(statusRequest(), { endpoints });

    expect(calls).toEqual(['a.before', 'b.before', 'b.after', 'a.after']);
    expect(transport.mock.calls[0][0].headers).toMatchObject({ 'x-a': '1', 'x-b': '1' });
  });

  it('logs failing onError interceptors without masking the original error', async () => {
    const client = createClient({
      transport: createTransport(),
      interceptors: [
        {
          onError: () => {
            throw new Error('hook failed');
          },
        },
      ],
    });
    const request = statusRequest({
      preProcessResponse: () => {
        throw new Error('bad response');
      },
    });

    await expect(client.execute(request, { endpoints })).rejects.toThrow('bad response');
    expect(logger.warn).toHaveBeenCalledWith(
      'http.interceptor.onError.failed',
      expect.objectContaining({ error: 'hook failed' }),
    );
  });

  it('hands the pre-processed value to postProcessResponse', async () => {
    const client = createClient({ transport: createTransport() });
    const request = statusRequest({
      postProcessResponse: (_response, value) => value + 1,
    });

    const result = await client.execute(request, { endpoints });

    expect(result.value).toBe(201);
  });

  it('logs metrics sink failures', async () => {
    metrics.recordRequest = vi.fn().mockRejectedValue(new Error('sink down'));
    const client = createClient({ transport: createTransport() });

    await client.execute(statusRequest(), { endpoints });

    expect(logger.warn).toHaveBeenCalledWith(
      'http.metrics.error',
      expect.objectContaining({ operation: 'rows.get', error: 'sink down' }),
    );
  });
});

describe('statusToCategory', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [404, 'not_found'],
    [409, 'conflict'],
    [412, 'conflict'],
    [400, 'validation'],
    [429, 'rate_limit'],
    [408, 'timeout'],
    [503, 'transient'],
    [0, 'network'],
    [302, 'unknown'],
  ])('maps %i to %s', (status, category) => {
    expect(statusToCategory(status)).toBe(category);
  });
});

describe('DefaultErrorClassifier', () => {
  const classifier = new DefaultErrorClassifier();
  const classify = (error: unknown) => classifier.classify({ method: 'GET', url: 'https://x', attempt: 1, error });

  it('treats timeouts and network failures as retryable', () => {
    expect(classify(new TimeoutError('slow'))).toMatchObject({ category: 'timeout', fallback: { retryable: true } });
    expect(classify(new NetworkError('down'))).toMatchObject({ category: 'network', fallback: { retryable: true } });
  });

  it('does not retry cancellation or unknown errors', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(classify(abort)).toMatchObject({ category: 'canceled', fallback: { retryable: false } });
    expect(classify('boom')).toMatchObject({ category: 'unknown', reason: 'non_error_thrown' });
  });
});

describe('getHeader', () => {
  it('matches header names case-insensitively', () => {
    expect(getHeader({ ETag: 'W/"1"' }, 'etag')).toBe('W/"1"');
    expect(getHeader({}, 'etag')).toBeUndefined();
  });
});
