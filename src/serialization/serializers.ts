/**
 * Concrete serializers for the primitive, collection and dictionary types
 * a model can declare
 */

import { Double, Long, ObjectId } from 'bson';
import { Types } from '../expressions/type-refs';
import { TypeRef } from '../expressions/types';
import { BsonValue, bsonTypeOf } from './bson-value';
import { BsonSerializationError } from './errors';
import {
  DictionaryRepresentation,
  IArraySerializer,
  IBsonSerializer,
  IDictionarySerializer
} from './types';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

export class StringSerializer implements IBsonSerializer {
  public readonly kind = 'StringSerializer';
  public readonly valueType: TypeRef = Types.string;

  public serialize(value: unknown): BsonValue {
    if (typeof value !== 'string') {
      throw new BsonSerializationError(`Expected a string, got ${describeValue(value)}`, this.kind);
    }
    return value;
  }
}

export class Int32Serializer implements IBsonSerializer {
  public readonly kind = 'Int32Serializer';
  public readonly valueType: TypeRef = Types.number;

  public serialize(value: unknown): BsonValue {
    if (
      typeof value !== 'number' ||
      !Number.isInteger(value) ||
      value < INT32_MIN ||
      value > INT32_MAX
    ) {
      throw new BsonSerializationError(
        `Expected a 32-bit integer, got ${typeof value === 'number' ? value : describeValue(value)}`,
        this.kind
      );
    }
    return value;
  }
}

export class Int64Serializer implements IBsonSerializer {
  public readonly kind = 'Int64Serializer';
  public readonly valueType: TypeRef = Types.number;

  public serialize(value: unknown): BsonValue {
    if (typeof value === 'bigint') {
      return Long.fromBigInt(value);
    }
    if (typeof value === 'number' && Number.isSafeInteger(value)) {
      return Long.fromNumber(value);
    }
    throw new BsonSerializationError(`Expected a 64-bit integer, got ${describeValue(value)}`, this.kind);
  }
}

export class DoubleSerializer implements IBsonSerializer {
  public readonly kind = 'DoubleSerializer';
  public readonly valueType: TypeRef = Types.number;

  public serialize(value: unknown): BsonValue {
    if (typeof value !== 'number') {
      throw new BsonSerializationError(`Expected a number, got ${describeValue(value)}`, this.kind);
    }
    return new Double(value);
  }
}

export class BooleanSerializer implements IBsonSerializer {
  public readonly kind = 'BooleanSerializer';
  public readonly valueType: TypeRef = Types.boolean;

  public serialize(value: unknown): BsonValue {
    if (typeof value !== 'boolean') {
      throw new BsonSerializationError(`Expected a boolean, got ${describeValue(value)}`, this.kind);
    }
    return value;
  }
}

export class DateTimeSerializer implements IBsonSerializer {
  public readonly kind = 'DateTimeSerializer';
  public readonly valueType: TypeRef = Types.date;

  public serialize(value: unknown): BsonValue {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new BsonSerializationError(`Expected a valid Date, got ${describeValue(value)}`, this.kind);
    }
    return value;
  }
}

export type ObjectIdRepresentation = 'objectId' | 'string';

/**
 * Serializes object ids, stored either as native ObjectIds or as their
 * 24 character hex string
 */
export class ObjectIdSerializer implements IBsonSerializer {
  public readonly kind = 'ObjectIdSerializer';
  public readonly valueType: TypeRef = Types.objectId;

  constructor(public readonly representation: ObjectIdRepresentation = 'objectId') {}

  public serialize(value: unknown): BsonValue {
    let id: ObjectId;
    if (value instanceof ObjectId) {
      id = value;
    } else if (typeof value === 'string' && ObjectId.isValid(value) && value.length === 24) {
      id = ObjectId.createFromHexString(value);
    } else {
      throw new BsonSerializationError(`Expected an ObjectId, got ${describeValue(value)}`, this.kind);
    }
    return this.representation === 'string' ? id.toHexString() : id;
  }
}

export type EnumRepresentation = 'string' | 'int';

/**
 * Serializes members of a numeric enum, stored by name or by value
 *
 * @example
 * ```typescript
 * enum Color { Red = 1, Green = 2 }
 * const byName = new EnumSerializer('Color', { Red: 1, Green: 2 }, 'string');
 * byName.serialize(Color.Green); // 'Green'
 * ```
 */
export class EnumSerializer implements IBsonSerializer {
  public readonly kind = 'EnumSerializer';
  public readonly valueType: TypeRef;
  private readonly namesByValue: ReadonlyMap<number, string>;

  constructor(
    private readonly enumName: string,
    private readonly values: Readonly<Record<string, number>>,
    public readonly representation: EnumRepresentation = 'int'
  ) {
    this.valueType = Types.enumOf(enumName);
    this.namesByValue = new Map(Object.entries(values).map(([name, v]) => [v, name]));
  }

  public serialize(value: unknown): BsonValue {
    let numeric: number | undefined;
    if (typeof value === 'number' && this.namesByValue.has(value)) {
      numeric = value;
    } else if (typeof value === 'string' && Object.prototype.hasOwnProperty.call(this.values, value)) {
      numeric = this.values[value];
    }

    if (numeric === undefined) {
      throw new BsonSerializationError(
        `${String(value)} is not a member of enum ${this.enumName}`,
        this.kind
      );
    }

    if (this.representation === 'int') {
      return numeric;
    }
    return this.namesByValue.get(numeric) ?? String(numeric);
  }
}

/**
 * Serializes arrays, delegating each item to the item serializer
 */
export class ArraySerializer implements IArraySerializer {
  public readonly kind = 'ArraySerializer';
  public readonly valueType: TypeRef;

  constructor(public readonly itemSerializer: IBsonSerializer) {
    this.valueType = Types.arrayOf(itemSerializer.valueType);
  }

  public serialize(value: unknown): BsonValue {
    if (!Array.isArray(value)) {
      throw new BsonSerializationError(`Expected an array, got ${describeValue(value)}`, this.kind);
    }
    return value.map((item: unknown) => this.itemSerializer.serialize(item));
  }
}

/**
 * Serializes key/value mappings (a Map or a plain object) using one of the
 * dictionary representations
 */
export class DictionarySerializer implements IDictionarySerializer {
  public readonly kind = 'DictionarySerializer';
  public readonly valueType: TypeRef;

  constructor(
    public readonly dictionaryRepresentation: DictionaryRepresentation,
    public readonly keySerializer: IBsonSerializer,
    public readonly valueSerializer: IBsonSerializer
  ) {
    this.valueType = Types.mapOf(keySerializer.valueType, valueSerializer.valueType);
  }

  /**
   * Return a serializer for the same key and value types stored with a
   * different representation
   */
  public withDictionaryRepresentation(
    representation: DictionaryRepresentation
  ): DictionarySerializer {
    return representation === this.dictionaryRepresentation
      ? this
      : new DictionarySerializer(representation, this.keySerializer, this.valueSerializer);
  }

  public serialize(value: unknown): BsonValue {
    const entries = this.entriesOf(value);

    switch (this.dictionaryRepresentation) {
      case 'Document': {
        const document: Record<string, BsonValue> = {};
        for (const [key, entryValue] of entries) {
          const serializedKey = this.keySerializer.serialize(key);
          if (typeof serializedKey !== 'string') {
            throw new BsonSerializationError(
              `Document representation requires keys that serialize as strings, got ${bsonTypeOf(serializedKey)}`,
              this.kind
            );
          }
          document[serializedKey] = this.valueSerializer.serialize(entryValue);
        }
        return document;
      }
      case 'ArrayOfDocuments':
        return entries.map(([key, entryValue]) => ({
          k: this.keySerializer.serialize(key),
          v: this.valueSerializer.serialize(entryValue)
        }));
      case 'ArrayOfArrays':
        return entries.map(([key, entryValue]) => [
          this.keySerializer.serialize(key),
          this.valueSerializer.serialize(entryValue)
        ]);
    }
  }

  private entriesOf(value: unknown): Array<[unknown, unknown]> {
    if (value instanceof Map) {
      return Array.from(value.entries());
    }
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.entries(value);
    }
    throw new BsonSerializationError(`Expected a Map or an object, got ${describeValue(value)}`, this.kind);
  }
}
