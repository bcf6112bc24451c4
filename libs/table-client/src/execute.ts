import { normalizeBaseUrl } from '@tablestore/resilient-http-core';
import type {
  HttpClient,
  Logger,
  ResilienceProfile,
  StorageRequest,
  StorageUri,
} from '@tablestore/resilient-http-core';
import type { TableEntity } from './entity';
import { InvalidArgumentError, InvalidOperationError, StorageError } from './errors';
import { assertNotNullOrEmpty } from './operation';
import type { RetrieveOperation, TableOperation, WriteOperation } from './operation';
import { OperationContext } from './operationContext';
import { buildDeleteRequest } from './requests/deleteRequest';
import { buildInsertRequest } from './requests/insertRequest';
import { buildRetrieveRequest } from './requests/retrieveRequest';
import { buildMergeRequest, buildReplaceRequest } from './requests/updateRequest';
import type { PayloadCodec, ResolvedTableRequestOptions, TableRequestOptions, TableResult } from './types';

export const DEFAULT_PAYLOAD_FORMAT = 'json';
export const DEFAULT_LOCATION_MODE = 'primaryOnly';

/** What `executeOperation` needs from the owning client. */
export interface TableExecutionTarget {
  engine: HttpClient;
  endpoints: StorageUri;
  codec: PayloadCodec;
  defaultRequestOptions?: TableRequestOptions;
  logger?: Logger;
}

/** Explicit options win over the client's defaults, which win over the built-ins. */
export function applyRequestOptionDefaults(
  options: TableRequestOptions = {},
  defaults: TableRequestOptions = {},
): ResolvedTableRequestOptions {
  return {
    payloadFormat: options.payloadFormat ?? defaults.payloadFormat ?? DEFAULT_PAYLOAD_FORMAT,
    locationMode: options.locationMode ?? defaults.locationMode ?? DEFAULT_LOCATION_MODE,
    retryPolicy: options.retryPolicy ?? defaults.retryPolicy,
    timeoutIntervalMs: options.timeoutIntervalMs ?? defaults.timeoutIntervalMs,
    maximumExecutionTimeMs: options.maximumExecutionTimeMs ?? defaults.maximumExecutionTimeMs,
    perAttemptTimeoutMs: options.perAttemptTimeoutMs ?? defaults.perAttemptTimeoutMs,
  };
}

const describeKind = (operation: unknown): string =>
  typeof operation === 'object' && operation !== null && 'type' in operation
    ? String(operation.type)
    : String(operation);

function buildRequestFor(
  operation: TableOperation,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<unknown>> {
  switch (operation.type) {
    case 'INSERT':
    case 'INSERT_OR_MERGE':
    case 'INSERT_OR_REPLACE':
      return buildInsertRequest(operation, tableName, options, codec);
    case 'MERGE':
      return buildMergeRequest(operation, tableName, options, codec);
    case 'REPLACE':
      return buildReplaceRequest(operation, tableName, options, codec);
    case 'DELETE':
      return buildDeleteRequest(operation, tableName, options, codec);
    case 'RETRIEVE':
      return buildRetrieveRequest(operation, tableName, options, codec);
    default: {
      const unknownOperation: never = operation;
      throw new InvalidOperationError(`Unknown table operation type: ${describeKind(unknownOperation)}`);
    }
  }
}

// Only keys that are set, so the engine's configured defaults still apply.
const resilienceFor = (options: ResolvedTableRequestOptions): ResilienceProfile => {
  const resilience: ResilienceProfile = {};
  if (options.perAttemptTimeoutMs !== undefined) resilience.perAttemptTimeoutMs = options.perAttemptTimeoutMs;
  if (options.maximumExecutionTimeMs !== undefined) resilience.overallTimeoutMs = options.maximumExecutionTimeMs;
  return resilience;
};

/**
 * Validates the table name, resolves options, builds the request for the
 * operation's kind and runs it through the engine. Local argument errors
 * propagate as they are; every other failure surfaces as a {@link StorageError}.
 */
export function executeOperation(
  target: TableExecutionTarget,
  tableName: string,
  operation: WriteOperation,
  options?: TableRequestOptions,
  context?: OperationContext,
): Promise<TableResult<TableEntity>>;
export function executeOperation<R>(
  target: TableExecutionTarget,
  tableName: string,
  operation: RetrieveOperation<R>,
  options?: TableRequestOptions,
  context?: OperationContext,
): Promise<TableResult<R>>;
export async function executeOperation(
  target: TableExecutionTarget,
  tableName: string,
  operation: TableOperation,
  options: TableRequestOptions = {},
  context: OperationContext = new OperationContext(),
): Promise<TableResult<unknown>> {
  assertNotNullOrEmpty('tableName', tableName);
  context.initialize();
  const resolved = applyRequestOptionDefaults(options, target.defaultRequestOptions);
  if (resolved.locationMode !== 'primaryOnly' && !normalizeBaseUrl(target.endpoints.secondary)) {
    throw new InvalidArgumentError(
      `Location mode ${resolved.locationMode} requires a secondary endpoint`,
      'locationMode',
    );
  }

  target.logger?.debug('table.operation.execute', {
    table: tableName,
    operationType: describeKind(operation),
    payloadFormat: resolved.payloadFormat,
    locationMode: resolved.locationMode,
    requestId: context.clientRequestId,
  });

  try {
    const request = buildRequestFor(operation, tableName, resolved, target.codec);
    const { value } = await target.engine.execute(request, {
      endpoints: target.endpoints,
      locationMode: resolved.locationMode,
      retryPolicy: resolved.retryPolicy,
      resilience: resilienceFor(resolved),
      correlation: { requestId: context.clientRequestId },
      onAttempt: (info) => context.recordAttempt(info),
    });
    return value;
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      throw error;
    }
    throw StorageError.translate(error, context.lastResult?.serviceRequestId);
  }
}
