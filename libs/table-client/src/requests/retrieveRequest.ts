import type { StorageRequest } from '@tablestore/resilient-http-core';
import { postProcessRetrieveResponse, preProcessRetrieveResponse } from '../interpreter';
import type { RetrieveOperation } from '../operation';
import { generateRequestIdentity } from '../requestIdentity';
import type { PayloadCodec, ResolvedTableRequestOptions, TableResult } from '../types';
import { baseHeaders, buildRowUrl } from './shared';

/** Point lookup by keys; a missing row is a successful empty result. */
export function buildRetrieveRequest<R>(
  operation: RetrieveOperation<R>,
  tableName: string,
  options: ResolvedTableRequestOptions,
  codec: PayloadCodec,
): StorageRequest<TableResult<R>> {
  const identity = generateRequestIdentity(operation, false, null, true);

  return {
    operation: 'table.retrieve',
    buildRequest: (ctx) => ({
      method: 'GET',
      url: buildRowUrl(ctx.baseUrl, tableName, identity, options),
      headers: baseHeaders(options.payloadFormat),
    }),
    preProcessResponse: (response) => preProcessRetrieveResponse(operation, response, codec),
    postProcessResponse: (response, result) =>
      postProcessRetrieveResponse(operation, response, result, options.payloadFormat, codec),
  };
}
