import { getHeader } from '@tablestore/resilient-http-core';
import type { RawHttpResponse } from '@tablestore/resilient-http-core';
import { HeaderNames } from './constants';
import type { TableEntity } from './entity';
import { StorageError, TableServiceError } from './errors';
import type { RetrieveOperation, TableOperationType, WriteOperation } from './operation';
import type { ParsedEntity, PayloadCodec, TablePayloadFormat, TableResult } from './types';

export type Interpretation =
  | { outcome: 'success'; readBody: boolean }
  | { outcome: 'error'; isFatal: boolean };

const success = (readBody = false): Interpretation => ({ outcome: 'success', readBody });
const failure = (isFatal: boolean): Interpretation => ({ outcome: 'error', isFatal });

/**
 * Maps a status code to an outcome for one operation kind. Non-fatal errors
 * are business outcomes (conflict, missing row) that retrying cannot fix.
 */
export function interpretStatus(type: TableOperationType, echoContent: boolean, status: number): Interpretation {
  switch (type) {
    case 'DELETE':
    case 'MERGE':
    case 'REPLACE':
      if (status === 404 || status === 409) return failure(false);
      return status === 204 ? success() : failure(true);
    case 'INSERT':
      if (status === 409) return failure(false);
      if (echoContent) {
        return status === 201 ? success(true) : failure(true);
      }
      return status === 204 ? success() : failure(true);
    case 'INSERT_OR_MERGE':
    case 'INSERT_OR_REPLACE':
      return status === 204 ? success() : failure(true);
    case 'RETRIEVE':
      if (status === 200) return success(true);
      return status === 404 ? success() : failure(true);
  }
}

export const readEtagHeader = (response: RawHttpResponse): string | null =>
  getHeader(response.headers, HeaderNames.etag) ?? null;

export function createServiceError(
  response: RawHttpResponse,
  isFatal: boolean,
  operationType: TableOperationType,
  codec: PayloadCodec,
): TableServiceError {
  const details = codec.parseError(response.body);
  return new TableServiceError(details?.message ?? `Table service responded with HTTP ${response.status}`, {
    statusCode: response.status,
    isFatal,
    operationType,
    serverErrorCode: details?.code,
    serverMessage: details?.message,
    requestId: getHeader(response.headers, HeaderNames.serviceRequestId),
  });
}

const parseBody = (
  response: RawHttpResponse,
  format: TablePayloadFormat,
  codec: PayloadCodec,
): ParsedEntity => {
  try {
    return codec.parseEntity(response.body, format);
  } catch (error) {
    throw new StorageError('Failed to parse entity from response body', {
      code: 'ParseFailed',
      statusCode: response.status,
      requestId: getHeader(response.headers, HeaderNames.serviceRequestId),
      cause: error,
    });
  }
};

const pending = <T>(status: number): TableResult<T> => ({ httpStatusCode: status, result: null, etag: null });

/**
 * First pass for writes: status and headers only. On the echo-insert success
 * path it returns a placeholder that {@link postProcessEchoInsert} replaces.
 */
export function preProcessWriteResponse(
  operation: WriteOperation,
  response: RawHttpResponse,
  codec: PayloadCodec,
): TableResult<TableEntity> {
  const decision = interpretStatus(operation.type, operation.echoContent, response.status);
  if (decision.outcome === 'error') {
    throw createServiceError(response, decision.isFatal, operation.type, codec);
  }
  if (decision.readBody) {
    return pending<TableEntity>(response.status);
  }

  const { entity } = operation;
  if (operation.type === 'DELETE') {
    return Object.freeze({ httpStatusCode: response.status, result: entity, etag: null });
  }

  const etag = readEtagHeader(response);
  if (etag !== null) {
    entity.etag = etag;
  }
  return Object.freeze({ httpStatusCode: response.status, result: entity, etag });
}

/** Second pass for an echoed insert: the stored row refreshes the caller's entity. */
export function postProcessEchoInsert(
  operation: WriteOperation<'INSERT'>,
  response: RawHttpResponse,
  format: TablePayloadFormat,
  codec: PayloadCodec,
): TableResult<TableEntity> {
  const parsed = parseBody(response, format, codec);
  const { entity } = operation;
  const etag = readEtagHeader(response) ?? parsed.etag;

  entity.etag = etag;
  if (parsed.partitionKey !== null) entity.partitionKey = parsed.partitionKey;
  if (parsed.rowKey !== null) entity.rowKey = parsed.rowKey;
  if (parsed.timestamp !== null) entity.timestamp = parsed.timestamp;
  entity.readEntity(parsed.properties);

  return Object.freeze({ httpStatusCode: response.status, result: entity, etag });
}

export function preProcessRetrieveResponse<R>(
  operation: RetrieveOperation<R>,
  response: RawHttpResponse,
  codec: PayloadCodec,
): TableResult<R> {
  const decision = interpretStatus(operation.type, false, response.status);
  if (decision.outcome === 'error') {
    throw createServiceError(response, decision.isFatal, operation.type, codec);
  }
  // 404 stays a null result; 200 is filled in by postProcessRetrieveResponse.
  return pending<R>(response.status);
}

export function postProcessRetrieveResponse<R>(
  operation: RetrieveOperation<R>,
  response: RawHttpResponse,
  result: TableResult<R>,
  format: TablePayloadFormat,
  codec: PayloadCodec,
): TableResult<R> {
  if (response.status !== 200) {
    return result;
  }

  const parsed = parseBody(response, format, codec);
  const etag = parsed.etag ?? readEtagHeader(response);
  const { projection } = operation;

  if (projection.kind === 'resolver') {
    const value = projection.resolve(
      parsed.partitionKey ?? operation.partitionKey,
      parsed.rowKey ?? operation.rowKey,
      parsed.timestamp,
      parsed.properties,
      etag,
    );
    return Object.freeze({ httpStatusCode: response.status, result: value, etag });
  }

  const entity = projection.create();
  entity.partitionKey = parsed.partitionKey ?? operation.partitionKey;
  entity.rowKey = parsed.rowKey ?? operation.rowKey;
  entity.timestamp = parsed.timestamp;
  entity.etag = etag;
  entity.readEntity(parsed.properties);
  return Object.freeze({ httpStatusCode: response.status, result: entity, etag });
}
