export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'MERGE' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export interface CorrelationInfo {
  requestId?: string;
}

export type LoggerMeta = Record<string, unknown> & {
  requestId?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Error category classification.
 *
 * - 'none': No error
 * - 'auth': Authentication/authorization failure (401, 403)
 * - 'validation': Request rejected before or by the service as malformed (400, local checks)
 * - 'not_found': Addressed resource absent (404)
 * - 'conflict': Optimistic-concurrency or existence conflict (409, 412)
 * - 'rate_limit': Rate limit exceeded (429)
 * - 'timeout': Request timeout (408, per-attempt abort)
 * - 'transient': Temporary server error, retryable (5xx)
 * - 'network': Network-level error (connection failed, DNS, etc.)
 * - 'canceled': Request was canceled by client
 * - 'unknown': Unclassified error
 */
export type ErrorCategory =
  | 'none'
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'network'
  | 'canceled'
  | 'unknown';

export interface FallbackHint {
  retryAfterMs?: number;
  retryable?: boolean;
  hint?: string;
}

export interface ClassifiedError {
  category: ErrorCategory;
  statusCode?: number;
  reason?: string;
  fallback?: FallbackHint;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export interface ErrorClassifierContext {
  method: HttpMethod;
  url: string;
  attempt: number;
  error: unknown;
}

export interface ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: ArrayBuffer;
}

/**
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * Non-2xx statuses are returned, not thrown: interpretation belongs to the request.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type StorageLocation = 'primary' | 'secondary';

export type LocationMode = 'primaryOnly' | 'primaryThenSecondary' | 'secondaryOnly' | 'secondaryThenPrimary';

/** Base URIs of the service, one per location. */
export interface StorageUri {
  primary: string;
  secondary?: string;
}

export interface RequestOutcome {
  ok: boolean;
  status?: number;
  category: ErrorCategory;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  statusFamily?: number; // 2xx, 4xx, 5xx
  errorMessage?: string;
}

export interface MetricsRequestInfo {
  operation: string;
  method: HttpMethod;
  url: string;
  correlation?: CorrelationInfo;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest?(info: MetricsRequestInfo): void | Promise<void>;
}

export interface RetryContext {
  attempt: number;
  maxAttempts: number;
  error: unknown;
  classified: ClassifiedError;
}

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

/**
 * Decides, after a failed attempt, whether the engine tries again and after how long.
 * Policies must be pure: the engine calls them once per failed attempt.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  evaluate(ctx: RetryContext): RetryDecision;
}

export interface AttemptContext {
  attempt: number;
  location: StorageLocation;
  baseUrl: string;
  correlation: CorrelationInfo;
}

/**
 * A replayable unit of work for the engine.
 *
 * `buildRequest` is called once per attempt and must not carry state from a
 * previous attempt. `preProcessResponse` decides success or failure from the
 * status line and headers (throwing on failure); `postProcessResponse` runs
 * only after a successful pre-process and may read the body.
 */
export interface StorageRequest<TResult> {
  operation: string;
  buildRequest(ctx: AttemptContext): TransportRequest;
  preProcessResponse(response: RawHttpResponse, ctx: AttemptContext): TResult | Promise<TResult>;
  postProcessResponse?(response: RawHttpResponse, result: TResult, ctx: AttemptContext): TResult | Promise<TResult>;
}

export interface AttemptInfo {
  attempt: number;
  location: StorageLocation;
  url: string;
  status?: number;
  headers?: HttpHeaders;
  startedAt: Date;
  finishedAt: Date;
  error?: unknown;
}

export interface ResilienceProfile {
  perAttemptTimeoutMs?: number;  // Default: 30_000
  overallTimeoutMs?: number;     // Default: none
}

export interface ExecuteOptions {
  endpoints: StorageUri;
  locationMode?: LocationMode;
  retryPolicy?: RetryPolicy;
  resilience?: ResilienceProfile;
  correlation?: CorrelationInfo;
  /** Called after every attempt, successful or not. */
  onAttempt?: (info: AttemptInfo) => void;
}

export interface HttpResult<T> {
  value: T;
  outcome: RequestOutcome;
}

export interface HttpClientConfig {
  transport?: HttpTransport;
  defaultHeaders?: HttpHeaders;
  defaultResilience?: ResilienceProfile;
  defaultRetryPolicy?: RetryPolicy;
  metricsSink?: MetricsSink;
  interceptors?: HttpRequestInterceptor[];
  errorClassifier?: ErrorClassifier;
  logger?: Logger;
  clientName?: string;
  /** Header that carries the correlation request id; default `x-ms-client-request-id`. */
  requestIdHeader?: string;
}

export interface BeforeSendContext {
  request: TransportRequest;
  attempt: number;
  location: StorageLocation;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: TransportRequest;
  attempt: number;
  response: RawHttpResponse;
}

export interface OnErrorContext {
  request: TransportRequest;
  attempt: number;
  error: unknown;
}

/**
 * HTTP request interceptor for cross-cutting concerns.
 *
 * **Execution Order:**
 * 1. `beforeSend`: Runs in **registration order** (first registered runs first)
 *    - Called before each HTTP attempt (including retries)
 *    - Can mutate the request headers and URL; signing belongs here
 *    - Can throw to prevent the request
 *
 * 2. `afterResponse`: Runs in **reverse registration order**
 *    - Called after each transport response, before the request interprets it
 *
 * 3. `onError`: Runs in **reverse registration order**
 *    - Called after each failed attempt (transport failure or an interpreted failure)
 *    - Cannot suppress the error
 *
 * Interceptors run inside the retry loop and **must not** implement their own retries.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;

  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;

  onError?(ctx: OnErrorContext): Promise<void> | void;
}
