import type { EntityProperties, TableEntity } from './entity';
import { PreconditionError } from './errors';

export type TableOperationType =
  | 'INSERT'
  | 'INSERT_OR_MERGE'
  | 'INSERT_OR_REPLACE'
  | 'MERGE'
  | 'REPLACE'
  | 'DELETE'
  | 'RETRIEVE';

export type WriteOperationType = Exclude<TableOperationType, 'RETRIEVE'>;

export type UpdateSemantics = 'merge' | 'replace';

/** One variant per write kind, so a switch on `type` narrows to it. */
export type WriteOperation<K extends WriteOperationType = WriteOperationType> = K extends WriteOperationType
  ? {
      readonly type: K;
      readonly entity: TableEntity;
      readonly echoContent: boolean;
    }
  : never;

export type EntityResolver<R> = (
  partitionKey: string,
  rowKey: string,
  timestamp: Date | null,
  properties: EntityProperties,
  etag: string | null,
) => R;

/** How a retrieved row becomes the caller's value: exactly one of the two. */
export type RetrieveProjection<R> =
  | { readonly kind: 'entity'; readonly create: () => R & TableEntity }
  | { readonly kind: 'resolver'; readonly resolve: EntityResolver<R> };

export interface RetrieveOperation<R = unknown> {
  readonly type: 'RETRIEVE';
  readonly partitionKey: string;
  readonly rowKey: string;
  readonly projection: RetrieveProjection<R>;
}

export type TableOperation = WriteOperation | RetrieveOperation;

export const updateSemanticsOf = (type: WriteOperationType): UpdateSemantics | null => {
  switch (type) {
    case 'INSERT_OR_MERGE':
    case 'MERGE':
      return 'merge';
    case 'INSERT_OR_REPLACE':
    case 'REPLACE':
      return 'replace';
    default:
      return null;
  }
};

export const assertNotNull = (name: string, value: unknown): void => {
  if (value === null || value === undefined) {
    throw new PreconditionError(`${name} must not be null`, name);
  }
};

export const assertNotNullOrEmpty = (name: string, value: string | null | undefined): void => {
  assertNotNull(name, value);
  if (value === '') {
    throw new PreconditionError(`${name} must not be empty`, name);
  }
};

const write = <K extends WriteOperationType>(type: K, entity: TableEntity, echoContent: boolean) => {
  assertNotNull('entity', entity);
  return Object.freeze({ type, entity, echoContent });
};

const retrieveOf = <R>(partitionKey: string, rowKey: string, projection: RetrieveProjection<R>): RetrieveOperation<R> => {
  assertNotNull('partitionKey', partitionKey);
  assertNotNull('rowKey', rowKey);
  return Object.freeze({ type: 'RETRIEVE', partitionKey, rowKey, projection: Object.freeze(projection) });
};

/**
 * Factories for operation descriptors. Each enforces its kind's construction
 * invariants; the returned descriptor is frozen.
 *
 * @example
 * ```typescript
 * const op = TableOperation.merge(entity); // entity.etag must be set
 * const result = await client.execute('orders', op);
 * ```
 */
export const TableOperation = {
  /** Plain insert. With `echoContent` the service returns the stored row and the entity is refreshed from it. */
  insert(entity: TableEntity, echoContent = false): WriteOperation<'INSERT'> {
    return write('INSERT', entity, echoContent);
  },

  insertOrMerge(entity: TableEntity): WriteOperation<'INSERT_OR_MERGE'> {
    return write('INSERT_OR_MERGE', entity, false);
  },

  insertOrReplace(entity: TableEntity): WriteOperation<'INSERT_OR_REPLACE'> {
    return write('INSERT_OR_REPLACE', entity, false);
  },

  merge(entity: TableEntity): WriteOperation<'MERGE'> {
    assertNotNull('entity', entity);
    assertNotNullOrEmpty('entity etag', entity.etag);
    return write('MERGE', entity, false);
  },

  replace(entity: TableEntity): WriteOperation<'REPLACE'> {
    assertNotNull('entity', entity);
    assertNotNullOrEmpty('entity etag', entity.etag);
    return write('REPLACE', entity, false);
  },

  /** Use the tag `*` to delete regardless of the stored version. */
  delete(entity: TableEntity): WriteOperation<'DELETE'> {
    assertNotNull('entity', entity);
    assertNotNullOrEmpty('entity etag', entity.etag);
    return write('DELETE', entity, false);
  },

  retrieve<T extends TableEntity>(partitionKey: string, rowKey: string, create: () => T): RetrieveOperation<T> {
    return retrieveOf<T>(partitionKey, rowKey, { kind: 'entity', create });
  },

  retrieveWithResolver<R>(partitionKey: string, rowKey: string, resolve: EntityResolver<R>): RetrieveOperation<R> {
    return retrieveOf(partitionKey, rowKey, { kind: 'resolver', resolve });
  },
};
