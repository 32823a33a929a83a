import { Expression } from '../expressions/types';
import { BsonValue } from '../serialization/bson-value';
import { BsonSerializationError } from '../serialization/errors';
import { IBsonSerializer } from '../serialization/types';
import { UnsupportedExpressionError } from './errors';

/**
 * Serialize a constant with the serializer of the field it is compared to.
 * A null constant stays null.
 *
 * @throws {UnsupportedExpressionError} If the serializer rejects the value
 */
export function serializeConstant(
  expression: Expression,
  serializer: IBsonSerializer,
  value: unknown
): BsonValue {
  if (value === null || value === undefined) {
    return null;
  }

  try {
    return serializer.serialize(value);
  } catch (error) {
    if (error instanceof BsonSerializationError) {
      throw new UnsupportedExpressionError(
        expression,
        `the value cannot be serialized by ${serializer.kind}: ${error.message}`,
        { cause: error }
      );
    }
    throw error;
  }
}
