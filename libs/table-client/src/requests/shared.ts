import type { HttpHeaders } from '@tablestore/resilient-http-core';
import {
  DATA_SERVICE_VERSION,
  HeaderNames,
  TABLES_SERVICE_TABLES_NAME,
  TABLE_NAME_PROPERTY,
  TARGET_STORAGE_VERSION,
} from '../constants';
import type { TableEntity } from '../entity';
import { PreconditionError, StorageError } from '../errors';
import type { PayloadCodec, ResolvedTableRequestOptions, TablePayloadFormat } from '../types';

const ACCEPT_BY_FORMAT: Record<TablePayloadFormat, string> = {
  json: 'application/json;odata=minimalmetadata',
  jsonNoMetadata: 'application/json;odata=nometadata',
  jsonFullMetadata: 'application/json;odata=fullmetadata',
};

export const acceptHeaderFor = (format: TablePayloadFormat): string => ACCEPT_BY_FORMAT[format];

/** `<base>/<table>(<identity>)`, or `<base>/<table>` when the identity is empty. */
export function buildRowUrl(
  baseUrl: string,
  tableName: string,
  identity: string,
  options: Pick<ResolvedTableRequestOptions, 'timeoutIntervalMs'>,
): string {
  const path = identity ? `${tableName}(${identity})` : tableName;
  const url = new URL(`${baseUrl}/${path}`);
  if (options.timeoutIntervalMs !== undefined && options.timeoutIntervalMs > 0) {
    url.searchParams.set('timeout', String(Math.ceil(options.timeoutIntervalMs / 1000)));
  }
  return url.toString();
}

export const baseHeaders = (format: TablePayloadFormat): HttpHeaders => ({
  [HeaderNames.accept]: acceptHeaderFor(format),
  [HeaderNames.dataServiceVersion]: DATA_SERVICE_VERSION,
  [HeaderNames.maxDataServiceVersion]: DATA_SERVICE_VERSION,
  [HeaderNames.storageVersion]: TARGET_STORAGE_VERSION,
});

/** Serializes the entity once; every attempt sends the same bytes. */
export function encodeOnce(codec: PayloadCodec, entity: TableEntity, isTableEntry: boolean): ArrayBuffer {
  try {
    return codec.encodeEntity(entity, isTableEntry);
  } catch (error) {
    throw new StorageError(
      `Failed to serialize entity: ${error instanceof Error ? error.message : String(error)}`,
      { code: 'SerializationFailed', cause: error },
    );
  }
}

export interface TableEntryTarget {
  isTableEntry: boolean;
  entryName: string | null;
}

/** Writes against the table-of-tables address the named table, not a keyed row. */
export function resolveTableEntry(tableName: string, entity: TableEntity): TableEntryTarget {
  if (tableName !== TABLES_SERVICE_TABLES_NAME) {
    return { isTableEntry: false, entryName: null };
  }
  const property = entity.writeEntity()[TABLE_NAME_PROPERTY];
  if (!property || property.type !== 'Edm.String' || property.value === '') {
    throw new PreconditionError(`${TABLE_NAME_PROPERTY} property is required for table entries`, TABLE_NAME_PROPERTY);
  }
  return { isTableEntry: true, entryName: property.value };
}

