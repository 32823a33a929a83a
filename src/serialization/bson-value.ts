/**
 * Serialized values and their BSON type classification
 */
import { Binary, BSONRegExp, Decimal128, Double, Int32, Long, ObjectId } from 'bson';

/**
 * A value in the form it takes on the wire, before byte encoding
 */
export type BsonValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | ObjectId
  | Int32
  | Long
  | Double
  | Decimal128
  | BSONRegExp
  | Binary
  | BsonValue[]
  | IBsonDocument;

export interface IBsonDocument {
  [key: string]: BsonValue;
}

/**
 * BSON type names, as reported by `$type`
 */
export type BsonType =
  | 'double'
  | 'string'
  | 'object'
  | 'array'
  | 'binData'
  | 'objectId'
  | 'bool'
  | 'date'
  | 'null'
  | 'regex'
  | 'int'
  | 'long'
  | 'decimal';

/**
 * Get the BSON type of a serialized value.
 *
 * Plain numbers follow the encoder's default: integral values within the
 * 32-bit range are `int`, everything else is `double`.
 */
export function bsonTypeOf(value: BsonValue): BsonType {
  if (value === null) return 'null';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'bigint') return 'long';
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= -2147483648 && value <= 2147483647
      ? 'int'
      : 'double';
  }
  if (value instanceof Date) return 'date';
  if (Array.isArray(value)) return 'array';
  if (value instanceof ObjectId) return 'objectId';
  if (value instanceof Int32) return 'int';
  if (value instanceof Long) return 'long';
  if (value instanceof Double) return 'double';
  if (value instanceof Decimal128) return 'decimal';
  if (value instanceof BSONRegExp) return 'regex';
  if (value instanceof Binary) return 'binData';
  return 'object';
}

/**
 * Whether a serialized value is an embedded document
 */
export function isBsonDocument(value: BsonValue): value is IBsonDocument {
  return bsonTypeOf(value) === 'object';
}
