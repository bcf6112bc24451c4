/** Name of the service's table-of-tables; rows of it address tables themselves. */
export const TABLES_SERVICE_TABLES_NAME = 'Tables';
export const TABLE_NAME_PROPERTY = 'TableName';

export const PARTITION_KEY = 'PartitionKey';
export const ROW_KEY = 'RowKey';
export const TIMESTAMP = 'Timestamp';

export const TARGET_STORAGE_VERSION = '2013-08-15';
export const DATA_SERVICE_VERSION = '3.0;NetFx';

export const HeaderNames = {
  accept: 'Accept',
  contentType: 'Content-Type',
  dataServiceVersion: 'DataServiceVersion',
  maxDataServiceVersion: 'MaxDataServiceVersion',
  etag: 'ETag',
  ifMatch: 'If-Match',
  prefer: 'Prefer',
  storageVersion: 'x-ms-version',
  serviceRequestId: 'x-ms-request-id',
  clientRequestId: 'x-ms-client-request-id',
  date: 'x-ms-date',
  authorization: 'Authorization',
} as const;

export const PreferValues = {
  returnContent: 'return-content',
  returnNoContent: 'return-no-content',
} as const;

export const JSON_CONTENT_TYPE = 'application/json';
