import {
  ConsoleLogger,
  createAuthInterceptor,
  createDateHeaderInterceptor,
  createDefaultHttpClient,
} from '@tablestore/resilient-http-core';
import type {
  HttpClient,
  HttpRequestInterceptor,
  HttpTransport,
  Logger,
  MetricsSink,
  ResilienceProfile,
  StorageUri,
} from '@tablestore/resilient-http-core';
import { createSharedKeyLiteInterceptor } from './auth/sharedKeyLite';
import type { SharedKeyCredentials } from './auth/sharedKeyLite';
import { JsonPayloadCodec } from './codec/jsonPayloadCodec';
import { HeaderNames } from './constants';
import type { TableEntity } from './entity';
import { TableErrorClassifier } from './errors';
import { executeOperation } from './execute';
import type { TableExecutionTarget } from './execute';
import type { RetrieveOperation, TableOperation, WriteOperation } from './operation';
import type { OperationContext } from './operationContext';
import type { PayloadCodec, TableRequestOptions, TableResult } from './types';

export type TableCredentials =
  | ({ kind: 'sharedKey' } & SharedKeyCredentials)
  | { kind: 'token'; getToken: () => Promise<string | null> | string | null }
  | { kind: 'anonymous' };

export interface TableClientConfig {
  endpoints: StorageUri;
  credentials?: TableCredentials;
  defaultRequestOptions?: TableRequestOptions;
  defaultResilience?: ResilienceProfile;
  codec?: PayloadCodec;
  logger?: Logger;
  metricsSink?: MetricsSink;
  transport?: HttpTransport;
  /** Run after the credential interceptors. */
  interceptors?: HttpRequestInterceptor[];
  clientName?: string;
  now?: () => Date;
}

const credentialInterceptors = (credentials: TableCredentials, now?: () => Date): HttpRequestInterceptor[] => {
  switch (credentials.kind) {
    case 'sharedKey':
      return [createDateHeaderInterceptor({ headerName: HeaderNames.date, now }), createSharedKeyLiteInterceptor(credentials)];
    case 'token':
      return [
        createDateHeaderInterceptor({ headerName: HeaderNames.date, now }),
        createAuthInterceptor({ getToken: credentials.getToken, headerName: HeaderNames.authorization }),
      ];
    case 'anonymous':
      return [createDateHeaderInterceptor({ headerName: HeaderNames.date, now })];
  }
};

/**
 * Entry point for single-entity table operations against one storage account.
 *
 * @example
 * ```typescript
 * const client = new TableClient({
 *   endpoints: { primary: 'https://acct.table.core.windows.net' },
 *   credentials: { kind: 'sharedKey', accountName: 'acct', accountKey: process.env.TABLE_ACCOUNT_KEY ?? '' },
 * });
 *
 * const entity = new DynamicTableEntity('customers', 'c-42').set('name', EntityProperty.string('Ada'));
 * const { etag } = await client.execute('people', TableOperation.insert(entity));
 * ```
 */
export class TableClient {
  readonly engine: HttpClient;
  private readonly target: TableExecutionTarget;

  constructor(config: TableClientConfig) {
    const clientName = config.clientName ?? 'table-client';
    const logger = config.logger ?? new ConsoleLogger();
    this.engine = createDefaultHttpClient({
      clientName,
      transport: config.transport,
      logger,
      metricsSink: config.metricsSink,
      defaultResilience: config.defaultResilience,
      defaultRetryPolicy: config.defaultRequestOptions?.retryPolicy,
      errorClassifier: new TableErrorClassifier(),
      requestIdHeader: HeaderNames.clientRequestId,
      interceptors: [
        ...credentialInterceptors(config.credentials ?? { kind: 'anonymous' }, config.now),
        ...(config.interceptors ?? []),
      ],
    });
    this.target = {
      engine: this.engine,
      endpoints: config.endpoints,
      codec: config.codec ?? new JsonPayloadCodec(),
      defaultRequestOptions: config.defaultRequestOptions,
      logger,
    };
  }

  get endpoints(): StorageUri {
    return this.target.endpoints;
  }

  execute(
    tableName: string,
    operation: WriteOperation,
    options?: TableRequestOptions,
    context?: OperationContext,
  ): Promise<TableResult<TableEntity>>;
  execute<R>(
    tableName: string,
    operation: RetrieveOperation<R>,
    options?: TableRequestOptions,
    context?: OperationContext,
  ): Promise<TableResult<R>>;
  execute(
    tableName: string,
    operation: TableOperation,
    options?: TableRequestOptions,
    context?: OperationContext,
  ): Promise<TableResult<unknown>> {
    if (operation.type === 'RETRIEVE') {
      return executeOperation(this.target, tableName, operation, options, context);
    }
    return executeOperation(this.target, tableName, operation, options, context);
  }
}
