import type { HttpMethod, StorageRequest } from '@tablestore/resilient-http-core';
import { HeaderNames, JSON_CONTENT_TYPE } from '../constants';
import type { TableEntity } from '../entity';
import { preProcessWriteResponse } from '../interpreter';
import { assertNotNull, assertNotNullOrEmpty } from '../operation';
import type { WriteOperation } from '../operation';
import { generateRequestIdentity } from '../requestIdentity';
import type { PayloadCodec, ResolvedTableRequestOptions, TableResult } from '../types';
import { baseHeaders, buildRowUrl, encodeOnce, resolveTableEntry } from './shared';

type UpdateOperation = WriteOperation<'MERGE' | 'REPLACE'>;

function buildConditionalUpdate(
  operation: UpdateOperation,
  method: HttpMethod,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<TableEntity>> {
  const { entity } = operation;
  const etag = entity.etag;
  assertNotNullOrEmpty('entity etag', etag);
  assertNotNull('partitionKey', entity.partitionKey);
  assertNotNull('rowKey', entity.rowKey);

  const { isTableEntry, entryName } = resolveTableEntry(tableName, entity);
  const identity = generateRequestIdentity(operation, isTableEntry, entryName, true);
  const body = encodeOnce(codec, entity, isTableEntry);

  return {
    operation: `table.${operation.type.toLowerCase()}`,
    buildRequest: (ctx) => ({
      method,
      url: buildRowUrl(ctx.baseUrl, tableName, identity, options),
      headers: {
        ...baseHeaders(options.payloadFormat),
        [HeaderNames.contentType]: JSON_CONTENT_TYPE,
        [HeaderNames.ifMatch]: etag ?? '',
      },
      body,
    }),
    preProcessResponse: (response) => preProcessWriteResponse(operation, response, codec),
  };
}

/** Partial update: only the properties sent are changed. */
export const buildMergeRequest = (
  operation: WriteOperation<'MERGE'>,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<TableEntity>> => buildConditionalUpdate(operation, 'MERGE', tableName, options, codec);

/** Full update: the stored row is replaced by the entity. */
export const buildReplaceRequest = (
  operation: WriteOperation<'REPLACE'>,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<TableEntity>> => buildConditionalUpdate(operation, 'PUT', tableName, options, codec);
