import { fetchTransport } from './transport/fetchTransport';
import { assertLocationModeSupported, initialLocation, nextLocation, resolveBaseUrl } from './locations';
import { ExponentialRetryPolicy } from './retryPolicies';
import type {
  AttemptContext,
  ClassifiedError,
  CorrelationInfo,
  ErrorCategory,
  ErrorClassifier,
  ErrorClassifierContext,
  ExecuteOptions,
  HttpClientConfig,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpResult,
  HttpTransport,
  Logger,
  LoggerMeta,
  MetricsRequestInfo,
  RawHttpResponse,
  RequestOutcome,
  ResilienceProfile,
  RetryPolicy,
  StorageRequest,
  TransportRequest,
} from './types';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_REQUEST_ID_HEADER = 'x-ms-client-request-id';
const RETRYABLE_ERROR_CATEGORIES = new Set<ErrorCategory>(['rate_limit', 'network', 'timeout', 'transient']);

export const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 409 || status === 412) return 'conflict';
  if (status === 400 || status === 422) return 'validation';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'transient';
  if (status === 0) return 'network';
  return 'unknown';
};

export const isRetryableCategory = (category: ErrorCategory): boolean => RETRYABLE_ERROR_CATEGORIES.has(category);

/**
 * Classifies failures the engine itself raises. Anything else (including
 * errors thrown while interpreting a response) is `unknown` and not retried;
 * callers that throw structured errors supply their own classifier.
 */
export class DefaultErrorClassifier implements ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError {
    const { error } = ctx;
    if (error instanceof TimeoutError) {
      return {
        category: 'timeout',
        statusCode: 408,
        reason: 'timeout',
        fallback: { retryable: true },
      };
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return {
        category: 'canceled',
        reason: 'aborted',
        fallback: { retryable: false },
      };
    }

    if (error instanceof NetworkError) {
      return {
        category: 'network',
        statusCode: 0,
        reason: 'network_error',
        fallback: { retryable: true },
      };
    }

    return {
      category: 'unknown',
      reason: error instanceof Error ? error.name : 'non_error_thrown',
      fallback: { retryable: false },
    };
  }
}

export const getHeader = (headers: HttpHeaders, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
};

/**
 * Retry-driven execution engine.
 *
 * Drives a {@link StorageRequest} through sequential attempts: build, intercept,
 * send, pre-process, post-process. Failed attempts are classified and handed
 * to the retry policy; attempts never overlap.
 */
export class HttpClient {
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly interceptors: HttpRequestInterceptor[];
  private readonly errorClassifier: ErrorClassifier;
  private readonly defaultRetryPolicy: RetryPolicy;
  private readonly requestIdHeader: string;

  constructor(private readonly config: HttpClientConfig = {}) {
    this.clientName = config.clientName ?? 'http-client';
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger;
    this.interceptors = [...(config.interceptors ?? [])];
    this.errorClassifier = config.errorClassifier ?? new DefaultErrorClassifier();
    this.defaultRetryPolicy = config.defaultRetryPolicy ?? new ExponentialRetryPolicy();
    this.requestIdHeader = config.requestIdHeader ?? DEFAULT_REQUEST_ID_HEADER;
  }

  async execute<T>(request: StorageRequest<T>, options: ExecuteOptions): Promise<HttpResult<T>> {
    const startedAt = Date.now();
    const retryPolicy = options.retryPolicy ?? this.defaultRetryPolicy;
    const maxAttempts = Math.max(retryPolicy.maxAttempts, 1);
    const resilience: ResilienceProfile = { ...this.config.defaultResilience, ...options.resilience };
    const deadline = resilience.overallTimeoutMs !== undefined ? startedAt + resilience.overallTimeoutMs : undefined;
    const correlation = this.normalizeCorrelation(options.correlation);
    const locationMode = options.locationMode ?? 'primaryOnly';
    assertLocationModeSupported(options.endpoints, locationMode);

    let location = initialLocation(locationMode);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const attemptStart = Date.now();
      const ctx: AttemptContext = {
        attempt,
        location,
        baseUrl: resolveBaseUrl(options.endpoints, location),
        correlation,
      };
      let transportRequest: TransportRequest | undefined;
      let response: RawHttpResponse | undefined;

      try {
        transportRequest = this.prepareTransportRequest(request.buildRequest(ctx), correlation);
        const logMeta = this.baseLogMeta(request, transportRequest, correlation);
        this.logger?.debug('http.request.attempt', { ...logMeta, attempt, maxAttempts, location });

        response = await this.runAttempt(transportRequest, ctx, resilience, deadline);

        let value = await request.preProcessResponse(response, ctx);
        if (request.postProcessResponse) {
          value = await request.postProcessResponse(response, value, ctx);
        }

        options.onAttempt?.({
          attempt,
          location,
          url: transportRequest.url,
          status: response.status,
          headers: response.headers,
          startedAt: new Date(attemptStart),
          finishedAt: new Date(),
        });

        const finishedAt = Date.now();
        const outcome: RequestOutcome = {
          ok: true,
          status: response.status,
          category: 'none',
          attempts: attempt,
          startedAt: new Date(startedAt),
          finishedAt: new Date(finishedAt),
          durationMs: finishedAt - startedAt,
          statusFamily: Math.floor(response.status / 100) * 100,
        };
        await this.recordMetrics({
          operation: request.operation,
          method: transportRequest.method,
          url: transportRequest.url,
          correlation,
          outcome,
        });
        this.logger?.info('http.request.success', {
          ...logMeta,
          attempt,
          status: response.status,
          durationMs: finishedAt - attemptStart,
        });

        return { value, outcome };
      } catch (error) {
        lastError = error;
        const status = response?.status ?? (error instanceof TimeoutError ? 408 : 0);
        const classified = this.errorClassifier.classify({
          method: transportRequest?.method ?? 'GET',
          url: transportRequest?.url ?? ctx.baseUrl,
          attempt,
          error,
        });

        options.onAttempt?.({
          attempt,
          location,
          url: transportRequest?.url ?? ctx.baseUrl,
          status: response?.status,
          headers: response?.headers,
          startedAt: new Date(attemptStart),
          finishedAt: new Date(),
          error,
        });
        if (transportRequest) {
          await this.runErrorInterceptors(transportRequest, error, attempt);
        }

        const decision = retryPolicy.evaluate({ attempt, maxAttempts, error, classified });
        const retryable = decision.retry && attempt < maxAttempts;
        const failureMeta = {
          client: this.clientName,
          operation: request.operation,
          requestId: correlation.requestId,
          attempt,
          maxAttempts,
          location,
          status,
          error: error instanceof Error ? error.message : error,
          errorCategory: classified.category,
        };

        if (!retryable) {
          this.logger?.error('http.request.failed', failureMeta);
          const finishedAt = Date.now();
          await this.recordMetrics({
            operation: request.operation,
            method: transportRequest?.method ?? 'GET',
            url: transportRequest?.url ?? ctx.baseUrl,
            correlation,
            outcome: {
              ok: false,
              status,
              category: classified.category,
              attempts: attempt,
              startedAt: new Date(startedAt),
              finishedAt: new Date(finishedAt),
              durationMs: finishedAt - startedAt,
              statusFamily: status ? Math.floor(status / 100) * 100 : undefined,
              errorMessage: error instanceof Error ? error.message : String(error),
            },
          });
          throw error;
        }

        this.logger?.warn('http.request.failed', { ...failureMeta, retryInMs: decision.delayMs });

        let delay = decision.delayMs;
        if (deadline !== undefined) {
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            throw new TimeoutError('Budget exceeded before retry', { cause: error });
          }
          delay = Math.min(delay, remaining);
        }
        await this.sleep(delay);
        location = nextLocation(locationMode, location);
      }
    }

    throw lastError ?? new Error('Request failed');
  }

  private async runAttempt(
    request: TransportRequest,
    ctx: AttemptContext,
    resilience: ResilienceProfile,
    deadline?: number,
  ): Promise<RawHttpResponse> {
    const controller = new AbortController();
    for (const interceptor of this.interceptors) {
      await interceptor.beforeSend?.({
        request,
        attempt: ctx.attempt,
        location: ctx.location,
        signal: controller.signal,
      });
    }

    const timeoutMs = this.computeAttemptTimeout(resilience, deadline);
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    let response: RawHttpResponse;
    try {
      response = await this.transport(request, controller.signal);
    } catch (error) {
      if (didTimeout) {
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`, { cause: error });
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      throw new NetworkError(error instanceof Error ? error.message : 'Transport failed', { cause: error });
    } finally {
      clearTimeout(timeoutHandle);
    }

    for (const interceptor of [...this.interceptors].reverse()) {
      await interceptor.afterResponse?.({ request, attempt: ctx.attempt, response });
    }
    return response;
  }

  private async runErrorInterceptors(request: TransportRequest, error: unknown, attempt: number): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      try {
        await interceptor.onError?.({ request, attempt, error });
      } catch (hookError) {
        this.logger?.warn('http.interceptor.onError.failed', {
          client: this.clientName,
          error: hookError instanceof Error ? hookError.message : hookError,
        });
      }
    }
  }

  private prepareTransportRequest(request: TransportRequest, correlation: CorrelationInfo): TransportRequest {
    const headers: HttpHeaders = { ...this.config.defaultHeaders, ...request.headers };
    if (correlation.requestId && getHeader(headers, this.requestIdHeader) === undefined) {
      headers[this.requestIdHeader] = correlation.requestId;
    }
    return { ...request, headers };
  }

  private normalizeCorrelation(correlation?: CorrelationInfo): CorrelationInfo {
    return {
      requestId: correlation?.requestId ?? this.generateRequestId(),
    };
  }

  private generateRequestId(): string {
    return typeof crypto !== 'undefined' && 'randomUUID' in crypto
      ? crypto.randomUUID()
      : Math.random().toString(36).slice(2);
  }

  private baseLogMeta(
    request: StorageRequest<unknown>,
    transportRequest: TransportRequest,
    correlation: CorrelationInfo,
  ): LoggerMeta {
    return {
      client: this.clientName,
      operation: request.operation,
      method: transportRequest.method,
      url: transportRequest.url,
      requestId: correlation.requestId,
    };
  }

  private async recordMetrics(info: MetricsRequestInfo): Promise<void> {
    const sink = this.config.metricsSink;
    if (!sink?.recordRequest) return;
    try {
      await sink.recordRequest(info);
    } catch (error) {
      this.logger?.warn('http.metrics.error', {
        client: this.clientName,
        operation: info.operation,
        error: error instanceof Error ? error.message : error,
      });
    }
  }

  private computeAttemptTimeout(resilience: ResilienceProfile, deadline?: number): number {
    const timeoutMs = resilience.perAttemptTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (deadline === undefined) {
      return timeoutMs;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError('Budget exceeded before request could start');
    }
    return Math.min(timeoutMs, remaining);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export class TimeoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeoutError';
  }
}

export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}
