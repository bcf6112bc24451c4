import { z } from 'zod';
import { PARTITION_KEY, ROW_KEY, TABLE_NAME_PROPERTY, TIMESTAMP } from '../constants';
import type { EdmType, EntityProperties, EntityProperty, TableEntity } from '../entity';
import type { ParsedEntity, PayloadCodec, ServiceErrorDetails, TablePayloadFormat } from '../types';

const ODATA_TYPE_SUFFIX = '@odata.type';
const ODATA_ETAG = 'odata.etag';
const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

const RESERVED_PROPERTIES = new Set([PARTITION_KEY, ROW_KEY, TIMESTAMP]);

const entityPayloadSchema = z.record(z.unknown());

const odataErrorSchema = z.object({
  'odata.error': z.object({
    code: z.string().optional(),
    message: z
      .object({
        lang: z.string().optional(),
        value: z.string().optional(),
      })
      .optional(),
  }),
});

const EDM_TYPES = new Set<string>([
  'Edm.String',
  'Edm.Int32',
  'Edm.Int64',
  'Edm.Double',
  'Edm.Boolean',
  'Edm.DateTime',
  'Edm.Guid',
  'Edm.Binary',
]);

const isEdmType = (value: unknown): value is EdmType => typeof value === 'string' && EDM_TYPES.has(value);

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export const toArrayBuffer = (bytes: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

const encodeDouble = (value: number): number | string => {
  if (Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return 'NaN';
  return value > 0 ? 'Infinity' : '-Infinity';
};

const writeProperty = (payload: Record<string, unknown>, name: string, property: EntityProperty): void => {
  switch (property.type) {
    case 'Edm.String':
    case 'Edm.Boolean':
      payload[name] = property.value;
      return;
    case 'Edm.Int32':
      if (!Number.isInteger(property.value) || property.value < INT32_MIN || property.value > INT32_MAX) {
        throw new RangeError(`Property ${name} is not a 32-bit integer: ${property.value}`);
      }
      payload[name] = property.value;
      return;
    case 'Edm.Int64':
      payload[`${name}${ODATA_TYPE_SUFFIX}`] = property.type;
      payload[name] = property.value.toString();
      return;
    case 'Edm.Double':
      // A bare integral or string value would be read back as Int32 or String.
      if (!Number.isFinite(property.value) || Number.isInteger(property.value)) {
        payload[`${name}${ODATA_TYPE_SUFFIX}`] = property.type;
      }
      payload[name] = encodeDouble(property.value);
      return;
    case 'Edm.DateTime':
      payload[`${name}${ODATA_TYPE_SUFFIX}`] = property.type;
      payload[name] = property.value.toISOString();
      return;
    case 'Edm.Guid':
      payload[`${name}${ODATA_TYPE_SUFFIX}`] = property.type;
      payload[name] = property.value;
      return;
    case 'Edm.Binary':
      payload[`${name}${ODATA_TYPE_SUFFIX}`] = property.type;
      payload[name] = Buffer.from(property.value).toString('base64');
      return;
  }
};

const expectString = (name: string, value: unknown): string => {
  if (typeof value !== 'string') {
    throw new TypeError(`Property ${name} should be a string`);
  }
  return value;
};

const parseDate = (name: string, value: unknown): Date => {
  const date = new Date(expectString(name, value));
  if (Number.isNaN(date.getTime())) {
    throw new TypeError(`Property ${name} is not a valid date`);
  }
  return date;
};

const readTypedProperty = (name: string, type: EdmType, value: unknown): EntityProperty => {
  switch (type) {
    case 'Edm.String':
      return { type, value: expectString(name, value) };
    case 'Edm.Guid':
      return { type, value: expectString(name, value) };
    case 'Edm.Int64':
      return { type, value: BigInt(typeof value === 'number' ? value : expectString(name, value)) };
    case 'Edm.Int32':
    case 'Edm.Double': {
      const numeric = typeof value === 'number' ? value : Number(expectString(name, value));
      return { type, value: numeric };
    }
    case 'Edm.Boolean':
      if (typeof value !== 'boolean') throw new TypeError(`Property ${name} should be a boolean`);
      return { type, value };
    case 'Edm.DateTime':
      return { type, value: parseDate(name, value) };
    case 'Edm.Binary':
      return { type, value: new Uint8Array(Buffer.from(expectString(name, value), 'base64')) };
  }
};

const inferProperty = (name: string, value: unknown): EntityProperty | undefined => {
  if (value === null) return undefined;
  if (typeof value === 'string') return { type: 'Edm.String', value };
  if (typeof value === 'boolean') return { type: 'Edm.Boolean', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
      ? { type: 'Edm.Int32', value }
      : { type: 'Edm.Double', value };
  }
  throw new TypeError(`Property ${name} has an unsupported JSON value`);
};

const isMetadataKey = (key: string): boolean => key.startsWith('odata.') || key.includes('@odata.');

const parseJson = (body: ArrayBuffer): unknown => JSON.parse(textDecoder.decode(body));

/**
 * OData JSON codec. Requests carry `@odata.type` annotations for the types
 * JSON cannot express; responses are read in any of the three metadata
 * levels, inferring types when no annotation is present.
 */
export class JsonPayloadCodec implements PayloadCodec {
  encodeEntity(entity: TableEntity, isTableEntry: boolean): ArrayBuffer {
    const properties = entity.writeEntity();
    const payload: Record<string, unknown> = {};

    if (isTableEntry) {
      const tableName = properties[TABLE_NAME_PROPERTY];
      if (!tableName || tableName.type !== 'Edm.String') {
        throw new TypeError(`Table entry requires a string ${TABLE_NAME_PROPERTY} property`);
      }
      payload[TABLE_NAME_PROPERTY] = tableName.value;
    } else {
      if (entity.partitionKey !== null) payload[PARTITION_KEY] = entity.partitionKey;
      if (entity.rowKey !== null) payload[ROW_KEY] = entity.rowKey;
      for (const [name, property] of Object.entries(properties)) {
        if (RESERVED_PROPERTIES.has(name)) continue;
        writeProperty(payload, name, property);
      }
    }

    return toArrayBuffer(textEncoder.encode(JSON.stringify(payload)));
  }

  parseEntity(body: ArrayBuffer, _format: TablePayloadFormat): ParsedEntity {
    const payload = entityPayloadSchema.parse(parseJson(body));
    const properties: EntityProperties = {};
    let partitionKey: string | null = null;
    let rowKey: string | null = null;
    let timestamp: Date | null = null;

    for (const [key, value] of Object.entries(payload)) {
      if (isMetadataKey(key)) continue;

      if (key === PARTITION_KEY) {
        partitionKey = expectString(key, value);
        continue;
      }
      if (key === ROW_KEY) {
        rowKey = expectString(key, value);
        continue;
      }
      if (key === TIMESTAMP) {
        timestamp = parseDate(key, value);
        continue;
      }

      const annotation = payload[`${key}${ODATA_TYPE_SUFFIX}`];
      const property = isEdmType(annotation) ? readTypedProperty(key, annotation, value) : inferProperty(key, value);
      if (property) {
        properties[key] = property;
      }
    }

    const etag = payload[ODATA_ETAG];
    return {
      partitionKey,
      rowKey,
      timestamp,
      etag: typeof etag === 'string' ? etag : null,
      properties,
    };
  }

  parseError(body: ArrayBuffer): ServiceErrorDetails | undefined {
    if (body.byteLength === 0) return undefined;

    let json: unknown;
    try {
      json = parseJson(body);
    } catch {
      // Error bodies are not guaranteed to be JSON (gateways, proxies).
      return { message: textDecoder.decode(body).trim() || undefined };
    }

    const parsed = odataErrorSchema.safeParse(json);
    if (!parsed.success) return undefined;
    const error = parsed.data['odata.error'];
    return { code: error.code, message: error.message?.value };
  }
}
