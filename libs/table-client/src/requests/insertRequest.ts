import type { HttpHeaders, HttpMethod, StorageRequest } from '@tablestore/resilient-http-core';
import { HeaderNames, JSON_CONTENT_TYPE, PreferValues } from '../constants';
import type { TableEntity } from '../entity';
import { postProcessEchoInsert, preProcessWriteResponse } from '../interpreter';
import { assertNotNull, updateSemanticsOf } from '../operation';
import type { WriteOperation } from '../operation';
import { generateRequestIdentity } from '../requestIdentity';
import type { PayloadCodec, ResolvedTableRequestOptions, TableResult } from '../types';
import { baseHeaders, buildRowUrl, encodeOnce, resolveTableEntry } from './shared';

export type InsertLikeOperation = WriteOperation<'INSERT' | 'INSERT_OR_MERGE' | 'INSERT_OR_REPLACE'>;

const methodFor = (operation: InsertLikeOperation): HttpMethod => {
  switch (updateSemanticsOf(operation.type)) {
    case 'merge':
      return 'MERGE';
    case 'replace':
      return 'PUT';
    default:
      return 'POST';
  }
};

/**
 * INSERT posts to the table; the upsert variants address the row directly and
 * send the entity tag only when the caller holds one.
 */
export function buildInsertRequest(
  operation: InsertLikeOperation,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<TableEntity>> {
  const { entity } = operation;
  const { isTableEntry, entryName } = resolveTableEntry(tableName, entity);
  if (!isTableEntry) {
    assertNotNull('partitionKey', entity.partitionKey);
    assertNotNull('rowKey', entity.rowKey);
  }

  const method = methodFor(operation);
  const identity = generateRequestIdentity(operation, isTableEntry, entryName, true);
  const ifMatch = operation.type !== 'INSERT' ? entity.etag : null;
  const body = encodeOnce(codec, entity, isTableEntry);
  const format = options.payloadFormat;
  const echoInsert = operation.type === 'INSERT' && operation.echoContent ? operation : null;

  return {
    operation: `table.${operation.type.toLowerCase()}`,
    buildRequest: (ctx) => {
      const headers: HttpHeaders = {
        ...baseHeaders(format),
        [HeaderNames.contentType]: JSON_CONTENT_TYPE,
      };
      if (ifMatch) {
        headers[HeaderNames.ifMatch] = ifMatch;
      }
      if (operation.type === 'INSERT') {
        headers[HeaderNames.prefer] = operation.echoContent ? PreferValues.returnContent : PreferValues.returnNoContent;
      }
      return { method, url: buildRowUrl(ctx.baseUrl, tableName, identity, options), headers, body };
    },
    preProcessResponse: (response) => preProcessWriteResponse(operation, response, codec),
    postProcessResponse: echoInsert
      ? (response) => postProcessEchoInsert(echoInsert, response, format, codec)
      : undefined,
  };
}
