/**
 * Serializer capability interfaces
 *
 * Translators never look at concrete serializer classes. They ask whether a
 * serializer has a capability (document members, array items, dictionary
 * keys and values) and read the representation metadata it exposes.
 */

import { TypeRef } from '../expressions/types';
import { BsonValue } from './bson-value';

/**
 * How a dictionary is laid out in the stored document
 *
 * - `Document`: `{ key1: value1, key2: value2 }`
 * - `ArrayOfDocuments`: `[{ k: key1, v: value1 }, ...]`
 * - `ArrayOfArrays`: `[[key1, value1], ...]`
 */
export type DictionaryRepresentation = 'Document' | 'ArrayOfDocuments' | 'ArrayOfArrays';

/**
 * Base contract of every serializer
 */
export interface IBsonSerializer {
  /**
   * Name of the concrete serializer, used in diagnostics
   */
  readonly kind: string;

  /**
   * Type of the values this serializer handles
   */
  readonly valueType: TypeRef;

  /**
   * Convert an application value to its stored form
   * @throws {BsonSerializationError} If the value is not of the expected type
   */
  serialize(value: unknown): BsonValue;
}

/**
 * Serialization info for one member of a document
 */
export interface IMemberSerializationInfo {
  elementName: string;
  serializer: IBsonSerializer;
}

/**
 * Capability of serializers whose values are stored as documents with
 * named members
 */
export interface IDocumentSerializer extends IBsonSerializer {
  tryGetMemberSerializationInfo(memberName: string): IMemberSerializationInfo | undefined;
}

/**
 * Capability of serializers whose values are stored as arrays
 */
export interface IArraySerializer extends IBsonSerializer {
  readonly itemSerializer: IBsonSerializer;
}

/**
 * Capability of serializers for key/value mappings
 */
export interface IDictionarySerializer extends IBsonSerializer {
  readonly dictionaryRepresentation: DictionaryRepresentation;
  readonly keySerializer: IBsonSerializer;
  readonly valueSerializer: IBsonSerializer;
}

export function isDocumentSerializer(
  serializer: IBsonSerializer
): serializer is IDocumentSerializer {
  return 'tryGetMemberSerializationInfo' in serializer;
}

export function isArraySerializer(serializer: IBsonSerializer): serializer is IArraySerializer {
  return 'itemSerializer' in serializer;
}

export function isDictionarySerializer(
  serializer: IBsonSerializer
): serializer is IDictionarySerializer {
  return (
    'dictionaryRepresentation' in serializer &&
    'keySerializer' in serializer &&
    'valueSerializer' in serializer
  );
}
