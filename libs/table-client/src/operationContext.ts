import { randomUUID } from 'crypto';
import { getHeader } from '@tablestore/resilient-http-core';
import type { AttemptInfo, StorageLocation } from '@tablestore/resilient-http-core';
import { HeaderNames } from './constants';

export interface RequestResult {
  attempt: number;
  location: StorageLocation;
  url: string;
  /** 0 when the attempt got no response. */
  httpStatusCode: number;
  serviceRequestId?: string;
  etag?: string;
  startedAt: Date;
  finishedAt: Date;
  errorMessage?: string;
}

/**
 * Caller-side record of the latest `execute` call: the client request id sent
 * on every attempt and what each attempt got back. A reused context keeps its
 * request id; the attempt log restarts with each call.
 */
export class OperationContext {
  readonly clientRequestId: string;
  private readonly results: RequestResult[] = [];

  constructor(clientRequestId: string = randomUUID()) {
    this.clientRequestId = clientRequestId;
  }

  /** Clears the attempt log; called at the start of every execute. */
  initialize(): void {
    this.results.length = 0;
  }

  get requestResults(): readonly RequestResult[] {
    return this.results;
  }

  get lastResult(): RequestResult | undefined {
    return this.results[this.results.length - 1];
  }

  recordAttempt(info: AttemptInfo): void {
    const headers = info.headers ?? {};
    this.results.push({
      attempt: info.attempt,
      location: info.location,
      url: info.url,
      httpStatusCode: info.status ?? 0,
      serviceRequestId: getHeader(headers, HeaderNames.serviceRequestId),
      etag: getHeader(headers, HeaderNames.etag),
      startedAt: info.startedAt,
      finishedAt: info.finishedAt,
      errorMessage: info.error === undefined ? undefined : info.error instanceof Error ? info.error.message : String(info.error),
    });
  }
}
