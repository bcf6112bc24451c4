import type { StorageRequest } from '@tablestore/resilient-http-core';
import { HeaderNames } from '../constants';
import type { TableEntity } from '../entity';
import { preProcessWriteResponse } from '../interpreter';
import { assertNotNull, assertNotNullOrEmpty } from '../operation';
import type { WriteOperation } from '../operation';
import { generateRequestIdentity } from '../requestIdentity';
import type { PayloadCodec, ResolvedTableRequestOptions, TableResult } from '../types';
import { baseHeaders, buildRowUrl, resolveTableEntry } from './shared';

/**
 * DELETE always carries the entity tag as `If-Match`. Delete-regardless is
 * the caller's explicit `*` tag, not a special case here.
 */
export function buildDeleteRequest(
  operation: WriteOperation<'DELETE'>,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<TableEntity>> {
  const { entity } = operation;
  const { isTableEntry, entryName } = resolveTableEntry(tableName, entity);
  if (!isTableEntry) {
    assertNotNullOrEmpty('entity etag', entity.etag);
    assertNotNull('partitionKey', entity.partitionKey);
    assertNotNull('rowKey', entity.rowKey);
  }

  const identity = generateRequestIdentity(operation, isTableEntry, entryName, true);
  const etag = entity.etag ?? '';

  return {
    operation: 'table.delete',
    buildRequest: (ctx) => ({
      method: 'DELETE',
      url: buildRowUrl(ctx.baseUrl, tableName, identity, options),
      headers: {
        ...baseHeaders(options.payloadFormat),
        [HeaderNames.ifMatch]: etag,
      },
    }),
    preProcessResponse: (response) => preProcessWriteResponse(operation, response, codec),
  };
}
