export * from './types';
export * from './constants';
export { DynamicTableEntity, EntityProperty, createTableEntryEntity } from './entity';
export type { EdmType, EntityProperties, TableEntity } from './entity';
export {
  InvalidArgumentError,
  InvalidOperationError,
  PreconditionError,
  StorageError,
  TableErrorClassifier,
  TableServiceError,
} from './errors';
export type { StorageErrorCode, StorageErrorOptions, TableServiceErrorOptions } from './errors';
export { TableOperation, updateSemanticsOf } from './operation';
export type {
  EntityResolver,
  RetrieveOperation,
  RetrieveProjection,
  TableOperationType,
  UpdateSemantics,
  WriteOperation,
  WriteOperationType,
} from './operation';
export { generateRequestIdentity, generateRequestIdentityWithTable, safeEncode } from './requestIdentity';
export { JsonPayloadCodec } from './codec/jsonPayloadCodec';
export { interpretStatus } from './interpreter';
export type { Interpretation } from './interpreter';
export { buildInsertRequest } from './requests/insertRequest';
export { buildMergeRequest, buildReplaceRequest } from './requests/updateRequest';
export { buildDeleteRequest } from './requests/deleteRequest';
export { buildRetrieveRequest } from './requests/retrieveRequest';
export { OperationContext } from './operationContext';
export type { RequestResult } from './operationContext';
export { applyRequestOptionDefaults, executeOperation } from './execute';
export type { TableExecutionTarget } from './execute';
export { buildSharedKeyLiteStringToSign, createSharedKeyLiteInterceptor, signSharedKeyLite } from './auth/sharedKeyLite';
export type { SharedKeyCredentials } from './auth/sharedKeyLite';
export { TableClient } from './TableClient';
export type { TableClientConfig, TableCredentials } from './TableClient';
export { createTableClientFromEnv, loadTableClientConfigFromEnv } from './config';
export type { TableClientEnv } from './config';
