import type { LocationMode, RetryPolicy } from '@tablestore/resilient-http-core';
import type { EntityProperties, TableEntity } from './entity';

export type TablePayloadFormat = 'json' | 'jsonNoMetadata' | 'jsonFullMetadata';

export interface TableRequestOptions {
  payloadFormat?: TablePayloadFormat;
  /** Server-side timeout, sent as the `timeout` query parameter in whole seconds. */
  timeoutIntervalMs?: number;
  retryPolicy?: RetryPolicy;
  locationMode?: LocationMode;
  /** Budget across all attempts, including backoff. */
  maximumExecutionTimeMs?: number;
  perAttemptTimeoutMs?: number;
}

/** Options after defaults; an absent retry policy means the engine's own default. */
export type ResolvedTableRequestOptions = Required<Pick<TableRequestOptions, 'payloadFormat' | 'locationMode'>> &
  Omit<TableRequestOptions, 'payloadFormat' | 'locationMode'>;

export interface TableResult<T = TableEntity> {
  readonly httpStatusCode: number;
  readonly result: T | null;
  readonly etag: string | null;
}

/** One row as read off the wire, before it is projected onto a caller type. */
export interface ParsedEntity {
  partitionKey: string | null;
  rowKey: string | null;
  timestamp: Date | null;
  etag: string | null;
  properties: EntityProperties;
}

export interface ServiceErrorDetails {
  code?: string;
  message?: string;
}

/**
 * Serializes entities into request bodies and reads response bodies back.
 * `encodeEntity` must be deterministic: equal input gives byte-identical output.
 */
export interface PayloadCodec {
  encodeEntity(entity: TableEntity, isTableEntry: boolean): ArrayBuffer;
  parseEntity(body: ArrayBuffer, format: TablePayloadFormat): ParsedEntity;
  parseError(body: ArrayBuffer): ServiceErrorDetails | undefined;
}
