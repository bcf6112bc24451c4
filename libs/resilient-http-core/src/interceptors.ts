// ============================================================================
// Standard Interceptors
// ============================================================================

import type { HttpRequestInterceptor, BeforeSendContext } from './types';

// ============================================================================
// Auth Interceptor
// ============================================================================

export interface AuthInterceptorOptions {
  getToken: () => Promise<string | null> | string | null;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Creates an interceptor that adds an authorization header to each attempt.
 * The token is fetched per attempt, so a refreshed token is picked up on retry.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({
 *   interceptors: [createAuthInterceptor({ getToken: () => tokenCache.current() })],
 * });
 * ```
 */
export function createAuthInterceptor(
  opts: AuthInterceptorOptions
): HttpRequestInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const token = await opts.getToken();
      if (token) {
        ctx.request.headers[headerName] = formatToken(token);
      }
    },
  };
}

// ============================================================================
// Date Header Interceptor
// ============================================================================

export interface DateHeaderInterceptorOptions {
  headerName?: string; // default: "x-ms-date"
  now?: () => Date;
}

/**
 * Stamps every attempt with the current time as an RFC 1123 date.
 * Register it before any signing interceptor that covers the date.
 */
export function createDateHeaderInterceptor(
  opts?: DateHeaderInterceptorOptions
): HttpRequestInterceptor {
  const headerName = opts?.headerName ?? 'x-ms-date';
  const now = opts?.now ?? (() => new Date());

  return {
    beforeSend: (ctx: BeforeSendContext) => {
      ctx.request.headers[headerName] = now().toUTCString();
    },
  };
}
