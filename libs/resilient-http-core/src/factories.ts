import { HttpClient } from './HttpClient';
import { ExponentialRetryPolicy } from './retryPolicies';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpClientConfig, Logger, LoggerMeta } from './types';

/**
 * Console logger implementation for use with createDefaultHttpClient.
 * Debug output is dropped unless `verbose` is set.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.verbose) console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates an HttpClient with zero-dependency defaults.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Retry: exponential, 4 attempts, 250ms base backoff with jitter
 * - Per-attempt timeout: 30s
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const engine = createDefaultHttpClient({ clientName: 'orders-table' });
 * ```
 */
export function createDefaultHttpClient(
  config: Partial<HttpClientConfig> & { clientName: string }
): HttpClient {
  return new HttpClient({
    ...config,
    transport: config.transport ?? fetchTransport,
    defaultRetryPolicy: config.defaultRetryPolicy ?? new ExponentialRetryPolicy(),
    defaultResilience: {
      perAttemptTimeoutMs: 30_000,
      ...config.defaultResilience,
    },
    logger: config.logger ?? new ConsoleLogger(),
  });
}
