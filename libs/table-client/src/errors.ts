import {
  DefaultErrorClassifier,
  NetworkError,
  TimeoutError,
  isRetryableCategory,
  statusToCategory,
} from '@tablestore/resilient-http-core';
import type { ClassifiedError, ErrorClassifier, ErrorClassifierContext } from '@tablestore/resilient-http-core';
import type { TableOperationType } from './operation';

export type StorageErrorCode =
  | 'ServiceError'
  | 'SerializationFailed'
  | 'ParseFailed'
  | 'Timeout'
  | 'TransportFailed'
  | 'Canceled'
  | 'Unknown';

export interface StorageErrorOptions {
  code: StorageErrorCode;
  /** 0 when no response was received. */
  statusCode?: number;
  requestId?: string;
  isFatal?: boolean;
  cause?: unknown;
}

/**
 * Structured failure of a table operation. Callers branch on `statusCode`
 * and `isFatal`, never on the identity of a transport exception.
 */
export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly statusCode: number;
  readonly requestId?: string;
  readonly isFatal: boolean;

  constructor(message: string, options: StorageErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.code = options.code;
    this.statusCode = options.statusCode ?? 0;
    this.requestId = options.requestId;
    this.isFatal = options.isFatal ?? true;
  }

  static translate(error: unknown, requestId?: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new StorageError(error.message, { code: 'Timeout', statusCode: 408, requestId, cause: error });
    }
    if (error instanceof NetworkError) {
      return new StorageError(error.message, { code: 'TransportFailed', requestId, cause: error });
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new StorageError('Operation was canceled', { code: 'Canceled', requestId, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(message, { code: 'Unknown', requestId, cause: error });
  }
}

export interface TableServiceErrorOptions {
  statusCode: number;
  isFatal: boolean;
  operationType: TableOperationType;
  serverErrorCode?: string;
  serverMessage?: string;
  requestId?: string;
}

/** Non-success response from the table service, as interpreted for one operation kind. */
export class TableServiceError extends StorageError {
  readonly operationType: TableOperationType;
  readonly serverErrorCode?: string;
  readonly serverMessage?: string;

  constructor(message: string, options: TableServiceErrorOptions) {
    super(message, {
      code: 'ServiceError',
      statusCode: options.statusCode,
      requestId: options.requestId,
      isFatal: options.isFatal,
    });
    this.name = 'TableServiceError';
    this.operationType = options.operationType;
    this.serverErrorCode = options.serverErrorCode;
    this.serverMessage = options.serverMessage;
  }
}

/** Raised locally, before any request is sent. Never retried. */
export class InvalidArgumentError extends Error {
  constructor(message: string, public readonly argument: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** A key, entity tag or table name the operation needs is missing. */
export class PreconditionError extends InvalidArgumentError {
  constructor(message: string, argument: string) {
    super(message, argument);
    this.name = 'PreconditionError';
  }
}

export class InvalidOperationError extends InvalidArgumentError {
  constructor(message: string) {
    super(message, 'operation.type');
    this.name = 'InvalidOperationError';
  }
}

// 501 and 505 will not succeed on a second try.
const NON_RETRYABLE_SERVER_STATUSES = new Set([501, 505]);

const isRetryableServiceStatus = (status: number): boolean =>
  !NON_RETRYABLE_SERVER_STATUSES.has(status) && isRetryableCategory(statusToCategory(status));

/**
 * Keeps conflict and not-found outcomes of conditional operations out of the
 * retry loop; fatal service errors retry only on transient statuses.
 */
export class TableErrorClassifier implements ErrorClassifier {
  private readonly engineClassifier = new DefaultErrorClassifier();

  classify(ctx: ErrorClassifierContext): ClassifiedError {
    const { error } = ctx;
    if (error instanceof TableServiceError) {
      const category = statusToCategory(error.statusCode);
      return {
        category,
        statusCode: error.statusCode,
        reason: error.isFatal ? 'service_error' : 'service_rejected',
        fallback: { retryable: error.isFatal && isRetryableServiceStatus(error.statusCode) },
      };
    }

    if (error instanceof StorageError || error instanceof InvalidArgumentError) {
      return {
        category: 'validation',
        statusCode: error instanceof StorageError ? error.statusCode : undefined,
        reason: error.name,
        fallback: { retryable: false },
      };
    }

    return this.engineClassifier.classify(ctx);
  }
}
