import { TABLE_NAME_PROPERTY } from './constants';

export type EdmType =
  | 'Edm.String'
  | 'Edm.Int32'
  | 'Edm.Int64'
  | 'Edm.Double'
  | 'Edm.Boolean'
  | 'Edm.DateTime'
  | 'Edm.Guid'
  | 'Edm.Binary';

export type EntityProperty =
  | { type: 'Edm.String'; value: string }
  | { type: 'Edm.Int32'; value: number }
  | { type: 'Edm.Int64'; value: bigint }
  | { type: 'Edm.Double'; value: number }
  | { type: 'Edm.Boolean'; value: boolean }
  | { type: 'Edm.DateTime'; value: Date }
  | { type: 'Edm.Guid'; value: string }
  | { type: 'Edm.Binary'; value: Uint8Array };

export type EntityProperties = Record<string, EntityProperty>;

export const EntityProperty = {
  string: (value: string): EntityProperty => ({ type: 'Edm.String', value }),
  int32: (value: number): EntityProperty => ({ type: 'Edm.Int32', value }),
  int64: (value: bigint): EntityProperty => ({ type: 'Edm.Int64', value }),
  double: (value: number): EntityProperty => ({ type: 'Edm.Double', value }),
  boolean: (value: boolean): EntityProperty => ({ type: 'Edm.Boolean', value }),
  dateTime: (value: Date): EntityProperty => ({ type: 'Edm.DateTime', value }),
  guid: (value: string): EntityProperty => ({ type: 'Edm.Guid', value }),
  binary: (value: Uint8Array): EntityProperty => ({ type: 'Edm.Binary', value }),
};

/**
 * A row as the caller owns it. Keys and the entity tag live beside the
 * property bag; `writeEntity` returns only the user properties.
 */
export interface TableEntity {
  partitionKey: string | null;
  rowKey: string | null;
  etag: string | null;
  timestamp: Date | null;
  readEntity(properties: EntityProperties): void;
  writeEntity(): EntityProperties;
}

export class DynamicTableEntity implements TableEntity {
  etag: string | null = null;
  timestamp: Date | null = null;
  private properties: EntityProperties;

  constructor(
    public partitionKey: string | null = null,
    public rowKey: string | null = null,
    properties: EntityProperties = {},
  ) {
    this.properties = { ...properties };
  }

  get(name: string): EntityProperty | undefined {
    return this.properties[name];
  }

  set(name: string, property: EntityProperty): this {
    this.properties[name] = property;
    return this;
  }

  readEntity(properties: EntityProperties): void {
    this.properties = { ...properties };
  }

  writeEntity(): EntityProperties {
    return { ...this.properties };
  }
}

/** Row of the table-of-tables naming `tableName`. */
export const createTableEntryEntity = (tableName: string, etag: string | null = null): DynamicTableEntity => {
  const entity = new DynamicTableEntity(null, null, { [TABLE_NAME_PROPERTY]: EntityProperty.string(tableName) });
  entity.etag = etag;
  return entity;
};
