import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * fetch-based HTTP transport.
 * Buffers the whole response body; the request's body buffer is sent as-is
 * and is never consumed, so the same bytes can back every retry.
 */
export const createFetchTransport = (fetchImpl: FetchLike = (url, init) => fetch(url, init)): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const init: RequestInit = {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    };

    const response = await fetchImpl(req.url, init);
    const body = await response.arrayBuffer();

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body,
    };
  };
};

export const fetchTransport: HttpTransport = createFetchTransport();
