import { Double, Long, ObjectId } from 'bson';
import { Types } from '../expressions/type-refs';
import { BsonSerializationError } from './errors';
import {
  ArraySerializer,
  BooleanSerializer,
  DateTimeSerializer,
  DictionarySerializer,
  DoubleSerializer,
  EnumSerializer,
  Int32Serializer,
  Int64Serializer,
  ObjectIdSerializer,
  StringSerializer
} from './serializers';
import { isArraySerializer, isDictionarySerializer, isDocumentSerializer } from './types';

describe('serializers', () => {
  describe('primitives', () => {
    it('should pass strings and booleans through', () => {
      expect(new StringSerializer().serialize('a')).toBe('a');
      expect(new BooleanSerializer().serialize(false)).toBe(false);
    });

    it('should reject values of another type', () => {
      expect(() => new StringSerializer().serialize(1)).toThrow(BsonSerializationError);
      expect(() => new StringSerializer().serialize(1)).toThrow('Expected a string, got number');
      expect(() => new BooleanSerializer().serialize('true')).toThrow('Expected a boolean, got string');
    });

    it('should keep 32-bit integers as numbers', () => {
      expect(new Int32Serializer().serialize(42)).toBe(42);
      expect(() => new Int32Serializer().serialize(2147483648)).toThrow(
        'Expected a 32-bit integer, got 2147483648'
      );
      expect(() => new Int32Serializer().serialize(1.5)).toThrow('Expected a 32-bit integer, got 1.5');
    });

    it('should wrap 64-bit integers', () => {
      expect(new Int64Serializer().serialize(7)).toEqual(Long.fromNumber(7));
      expect(new Int64Serializer().serialize(BigInt(7))).toEqual(Long.fromBigInt(BigInt(7)));
      expect(() => new Int64Serializer().serialize(0.5)).toThrow(BsonSerializationError);
    });

    it('should wrap doubles', () => {
      expect(new DoubleSerializer().serialize(2)).toEqual(new Double(2));
    });

    it('should accept valid dates only', () => {
      const date = new Date('2024-05-01T00:00:00.000Z');

      expect(new DateTimeSerializer().serialize(date)).toBe(date);
      expect(() => new DateTimeSerializer().serialize(new Date('not a date'))).toThrow(
        'Expected a valid Date, got Date'
      );
    });
  });

  describe('ObjectIdSerializer', () => {
    const hex = '64b7f0c2a1b2c3d4e5f60718';

    it('should store object ids natively by default', () => {
      expect(new ObjectIdSerializer().serialize(hex)).toEqual(ObjectId.createFromHexString(hex));
    });

    it('should store object ids as hex strings', () => {
      const id = ObjectId.createFromHexString(hex);

      expect(new ObjectIdSerializer('string').serialize(id)).toBe(hex);
    });

    it('should reject strings that are not object ids', () => {
      expect(() => new ObjectIdSerializer().serialize('abc')).toThrow('Expected an ObjectId, got string');
    });
  });

  describe('EnumSerializer', () => {
    const values = { Red: 1, Green: 2 };

    it('should store members by value', () => {
      const serializer = new EnumSerializer('Color', values);

      expect(serializer.serialize(2)).toBe(2);
      expect(serializer.serialize('Red')).toBe(1);
      expect(serializer.valueType).toEqual(Types.enumOf('Color'));
    });

    it('should store members by name', () => {
      expect(new EnumSerializer('Color', values, 'string').serialize(2)).toBe('Green');
    });

    it('should reject values that are not members', () => {
      expect(() => new EnumSerializer('Color', values).serialize(3)).toThrow('3 is not a member of enum Color');
    });
  });

  describe('ArraySerializer', () => {
    it('should serialize every item', () => {
      const serializer = new ArraySerializer(new DoubleSerializer());

      expect(serializer.serialize([1, 2])).toEqual([new Double(1), new Double(2)]);
      expect(serializer.valueType).toEqual(Types.arrayOf(Types.number));
      expect(isArraySerializer(serializer)).toBe(true);
      expect(isDictionarySerializer(serializer)).toBe(false);
    });
  });

  describe('DictionarySerializer', () => {
    const tags = new DictionarySerializer('Document', new StringSerializer(), new Int32Serializer());

    it('should expose the dictionary capability', () => {
      expect(isDictionarySerializer(tags)).toBe(true);
      expect(isDocumentSerializer(tags)).toBe(false);
      expect(tags.valueType).toEqual(Types.mapOf(Types.string, Types.number));
    });

    it('should store entries as document fields', () => {
      expect(tags.serialize(new Map([['red', 1]]))).toEqual({ red: 1 });
      expect(tags.serialize({ blue: 2 })).toEqual({ blue: 2 });
    });

    it('should store entries as key/value documents', () => {
      expect(tags.withDictionaryRepresentation('ArrayOfDocuments').serialize({ red: 1 })).toEqual([
        { k: 'red', v: 1 }
      ]);
    });

    it('should store entries as pairs', () => {
      expect(tags.withDictionaryRepresentation('ArrayOfArrays').serialize({ red: 1 })).toEqual([['red', 1]]);
    });

    it('should reuse itself for the same representation', () => {
      expect(tags.withDictionaryRepresentation('Document')).toBe(tags);
    });

    it('should require string keys for the document representation', () => {
      const scores = new DictionarySerializer('Document', new Int32Serializer(), new Int32Serializer());

      expect(() => scores.serialize(new Map([[1, 1]]))).toThrow(
        'Document representation requires keys that serialize as strings, got int'
      );
    });
  });
});
