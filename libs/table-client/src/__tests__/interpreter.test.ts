import { describe, expect, it } from 'vitest';
import type { RawHttpResponse } from '@tablestore/resilient-http-core';
import { JsonPayloadCodec, toArrayBuffer } from '../codec/jsonPayloadCodec';
import { DynamicTableEntity, EntityProperty } from '../entity';
import { StorageError, TableServiceError } from '../errors';
import {
  interpretStatus,
  postProcessEchoInsert,
  postProcessRetrieveResponse,
  preProcessRetrieveResponse,
  preProcessWriteResponse,
} from '../interpreter';
import { TableOperation } from '../operation';
import type { TableOperationType } from '../operation';

const codec = new JsonPayloadCodec();

const response = (status: number, headers: Record<string, string> = {}, body = ''): RawHttpResponse => ({
  status,
  headers,
  body: toArrayBuffer(new TextEncoder().encode(body)),
});

const tagged = () => {
  const entity = new DynamicTableEntity('p', 'r');
  entity.etag = 'W/"old"';
  return entity;
};

describe('interpretStatus', () => {
  it.each<[TableOperationType, boolean, number, ReturnType<typeof interpretStatus>]>([
    ['DELETE', false, 204, { outcome: 'success', readBody: false }],
    ['DELETE', false, 404, { outcome: 'error', isFatal: false }],
    ['DELETE', false, 409, { outcome: 'error', isFatal: false }],
    ['DELETE', false, 200, { outcome: 'error', isFatal: true }],
    ['DELETE', false, 500, { outcome: 'error', isFatal: true }],
    ['INSERT', true, 201, { outcome: 'success', readBody: true }],
    ['INSERT', true, 204, { outcome: 'error', isFatal: true }],
    ['INSERT', true, 409, { outcome: 'error', isFatal: false }],
    ['INSERT', false, 204, { outcome: 'success', readBody: false }],
    ['INSERT', false, 201, { outcome: 'error', isFatal: true }],
    ['INSERT', false, 409, { outcome: 'error', isFatal: false }],
    ['INSERT', false, 404, { outcome: 'error', isFatal: true }],
    ['INSERT_OR_MERGE', false, 204, { outcome: 'success', readBody: false }],
    ['INSERT_OR_MERGE', false, 409, { outcome: 'error', isFatal: true }],
    ['INSERT_OR_REPLACE', false, 204, { outcome: 'success', readBody: false }],
    ['INSERT_OR_REPLACE', false, 404, { outcome: 'error', isFatal: true }],
    ['MERGE', false, 204, { outcome: 'success', readBody: false }],
    ['MERGE', false, 404, { outcome: 'error', isFatal: false }],
    ['MERGE', false, 409, { outcome: 'error', isFatal: false }],
    ['MERGE', false, 412, { outcome: 'error', isFatal: true }],
    ['REPLACE', false, 204, { outcome: 'success', readBody: false }],
    ['REPLACE', false, 409, { outcome: 'error', isFatal: false }],
    ['REPLACE', false, 503, { outcome: 'error', isFatal: true }],
    ['RETRIEVE', false, 200, { outcome: 'success', readBody: true }],
    ['RETRIEVE', false, 404, { outcome: 'success', readBody: false }],
    ['RETRIEVE', false, 500, { outcome: 'error', isFatal: true }],
  ])('%s (echo=%s) with %i', (type, echo, status, expected) => {
    expect(interpretStatus(type, echo, status)).toEqual(expected);
  });
});

describe('preProcessWriteResponse', () => {
  it('refreshes the entity tag from the ETag header', () => {
    const entity = tagged();
    const op = TableOperation.replace(entity);

    const result = preProcessWriteResponse(op, response(204, { etag: 'W/"new"' }), codec);

    expect(result).toEqual({ httpStatusCode: 204, result: entity, etag: 'W/"new"' });
    expect(entity.etag).toBe('W/"new"');
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('leaves the entity untouched on delete', () => {
    const entity = tagged();

    const result = preProcessWriteResponse(TableOperation.delete(entity), response(204, { ETag: 'W/"x"' }), codec);

    expect(result.etag).toBeNull();
    expect(entity.etag).toBe('W/"old"');
  });

  it('raises a non-fatal service error with the server details', () => {
    const entity = tagged();
    const body = JSON.stringify({
      'odata.error': { code: 'UpdateConditionNotSatisfied', message: { value: 'The update condition was not satisfied.' } },
    });

    try {
      preProcessWriteResponse(TableOperation.merge(entity), response(409, { 'x-ms-request-id': 'srv-1' }, body), codec);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TableServiceError);
      expect(error).toMatchObject({
        message: 'The update condition was not satisfied.',
        statusCode: 409,
        isFatal: false,
        operationType: 'MERGE',
        serverErrorCode: 'UpdateConditionNotSatisfied',
        requestId: 'srv-1',
      });
    }
    expect(entity.etag).toBe('W/"old"');
  });

  it('names the status when the error body is empty', () => {
    expect(() => preProcessWriteResponse(TableOperation.insertOrMerge(tagged()), response(500), codec)).toThrow(
      'Table service responded with HTTP 500',
    );
  });
});

describe('postProcessEchoInsert', () => {
  const echoed = JSON.stringify({
    'odata.etag': 'W/"body"',
    PartitionKey: 'p',
    RowKey: 'r',
    Timestamp: '2024-05-06T07:08:09.000Z',
    name: 'Ada',
  });

  it('merges the echoed row into the caller entity', () => {
    const entity = new DynamicTableEntity('p', 'r');
    const op = TableOperation.insert(entity, true);

    const result = postProcessEchoInsert(op, response(201, { ETag: 'W/"header"' }, echoed), 'json', codec);

    expect(result.result).toBe(entity);
    expect(result.etag).toBe('W/"header"');
    expect(entity.etag).toBe('W/"header"');
    expect(entity.timestamp?.toISOString()).toBe('2024-05-06T07:08:09.000Z');
    expect(entity.get('name')).toEqual(EntityProperty.string('Ada'));
  });

  it('falls back to the body tag', () => {
    const entity = new DynamicTableEntity('p', 'r');

    const result = postProcessEchoInsert(TableOperation.insert(entity, true), response(201, {}, echoed), 'json', codec);

    expect(result.etag).toBe('W/"body"');
  });

  it('reports an unreadable body as a parse failure', () => {
    const op = TableOperation.insert(new DynamicTableEntity('p', 'r'), true);

    expect(() => postProcessEchoInsert(op, response(201, {}, 'not json'), 'json', codec)).toThrow(StorageError);
    expect(() => postProcessEchoInsert(op, response(201, {}, 'not json'), 'json', codec)).toThrow(
      'Failed to parse entity from response body',
    );
  });
});

describe('retrieve interpretation', () => {
  const row = JSON.stringify({ 'odata.etag': 'W/"7"', PartitionKey: 'p', RowKey: 'r', qty: 3 });

  it('projects the row through the entity factory', () => {
    const op = TableOperation.retrieve('p', 'r', () => new DynamicTableEntity());
    const raw = response(200, {}, row);

    const result = postProcessRetrieveResponse(op, raw, preProcessRetrieveResponse(op, raw, codec), 'json', codec);

    expect(result.httpStatusCode).toBe(200);
    expect(result.etag).toBe('W/"7"');
    expect(result.result?.partitionKey).toBe('p');
    expect(result.result?.get('qty')).toEqual(EntityProperty.int32(3));
  });

  it('projects the row through a resolver', () => {
    const op = TableOperation.retrieveWithResolver('p', 'r', (pk, rk, _ts, props, etag) => ({
      id: `${pk}/${rk}`,
      qty: props.qty?.value,
      etag,
    }));
    const raw = response(200, {}, row);

    const result = postProcessRetrieveResponse(op, raw, preProcessRetrieveResponse(op, raw, codec), 'json', codec);

    expect(result.result).toEqual({ id: 'p/r', qty: 3, etag: 'W/"7"' });
  });

  it('reports an invalid timestamp as a parse failure', () => {
    const op = TableOperation.retrieve('p', 'r', () => new DynamicTableEntity());
    const raw = response(200, {}, JSON.stringify({ PartitionKey: 'p', RowKey: 'r', Timestamp: 'soon' }));
    const pending = preProcessRetrieveResponse(op, raw, codec);

    try {
      postProcessRetrieveResponse(op, raw, pending, 'json', codec);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ code: 'ParseFailed', statusCode: 200 });
    }
  });

  it('treats a missing row as an empty success', () => {
    const op = TableOperation.retrieve('p', 'r', () => new DynamicTableEntity());
    const raw = response(404, {}, '{"odata.error":{"code":"ResourceNotFound"}}');

    const result = postProcessRetrieveResponse(op, raw, preProcessRetrieveResponse(op, raw, codec), 'json', codec);

    expect(result).toEqual({ httpStatusCode: 404, result: null, etag: null });
  });
});
