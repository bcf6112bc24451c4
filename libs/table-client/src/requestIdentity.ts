import { PARTITION_KEY, ROW_KEY } from './constants';
import { PreconditionError } from './errors';
import type { TableOperation } from './operation';

/** Percent-encodes everything outside the RFC 3986 unreserved set. */
export const safeEncode = (value: string): string =>
  encodeURIComponent(value).replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`);

const encodeKey = (argument: string, value: string): string => {
  try {
    return safeEncode(value);
  } catch (error) {
    // Lone surrogates have no UTF-8 form.
    if (error instanceof URIError) {
      throw new PreconditionError(`${argument} is not a well-formed Unicode string`, argument);
    }
    throw error;
  }
};

/**
 * Identity fragment addressing the operation's row inside a request URL.
 *
 * - table-of-tables rows: `'<entryName>'`
 * - plain inserts: empty (the row identity travels in the body)
 * - everything else: `PartitionKey='<pk>',RowKey='<rk>'`
 */
export function generateRequestIdentity(
  operation: TableOperation,
  isTableEntry: boolean,
  entryName: string | null,
  encodeKeys: boolean,
): string {
  if (isTableEntry) {
    return `'${entryName ?? ''}'`;
  }

  if (operation.type === 'INSERT') {
    return '';
  }

  const { partitionKey, rowKey } = operation.type === 'RETRIEVE' ? operation : operation.entity;
  const pk = partitionKey ?? '';
  const rk = rowKey ?? '';
  if (!encodeKeys) {
    return `${PARTITION_KEY}='${pk}',${ROW_KEY}='${rk}'`;
  }
  return `${PARTITION_KEY}='${encodeKey('partitionKey', pk)}',${ROW_KEY}='${encodeKey('rowKey', rk)}'`;
}

export function generateRequestIdentityWithTable(operation: TableOperation, tableName: string): string {
  return `${tableName}(${generateRequestIdentity(operation, false, null, false)})`;
}
