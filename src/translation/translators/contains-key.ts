/**
 * Translates `dictionary.containsKey(key)` (or `map.has(key)`) into an
 * existence check on the sub-field named by the key.
 *
 * Only dictionaries stored as documents keyed by their own keys can be
 * checked this way; with the array representations the key is stored as
 * element data and there is no sub-field to test.
 */

import { exists, subField } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { Expression, IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { BsonValue } from '../../serialization/bson-value';
import { BsonSerializationError } from '../../serialization/errors';
import { IBsonSerializer, IDictionarySerializer, isDictionarySerializer } from '../../serialization/types';
import { TranslationContext } from '../context';
import {
  NonConstantOrNonStringKeyError,
  NotADictionaryError,
  UnsupportedExpressionError,
  UnsupportedRepresentationError
} from '../errors';
import { ITranslatedFilterField, translateFilterField } from '../field-resolver';

const CONTAINS_KEY_METHOD_NAMES: ReadonlySet<string> = new Set(['containsKey', 'has']);

/**
 * Structural check on the signature only, independent of the mapping type
 */
export function isContainsKeyMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    isBooleanType(method.returnType) &&
    CONTAINS_KEY_METHOD_NAMES.has(method.name) &&
    method.parameters.length === 1
  );
}

export function translateContainsKey(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const fieldExpression = expression.object;
  if (!isContainsKeyMethod(expression.method) || fieldExpression === null || expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }
  const keyExpression = expression.args[0];

  const fieldTranslation = translateFilterField(context, fieldExpression);
  const dictionarySerializer = getDictionarySerializer(expression, fieldTranslation);
  const representation = dictionarySerializer.dictionaryRepresentation;

  switch (representation) {
    case 'Document': {
      const key = getKeyStringConstant(expression, keyExpression, dictionarySerializer.keySerializer);
      return exists(subField(fieldTranslation.field, key));
    }
    default:
      throw new UnsupportedRepresentationError(
        expression,
        representation,
        `${expression.method.name} is not supported when the dictionary representation is ${representation}`
      );
  }
}

function getDictionarySerializer(
  expression: Expression,
  field: ITranslatedFilterField
): IDictionarySerializer {
  if (isDictionarySerializer(field.serializer)) {
    return field.serializer;
  }

  throw new NotADictionaryError(expression, field.serializer.kind);
}

function getKeyStringConstant(
  expression: Expression,
  keyExpression: Expression,
  keySerializer: IBsonSerializer
): string {
  if (keyExpression.kind !== 'constant') {
    throw new NonConstantOrNonStringKeyError(expression);
  }

  let serializedKey: BsonValue;
  try {
    serializedKey = keySerializer.serialize(keyExpression.value);
  } catch (error) {
    if (error instanceof BsonSerializationError) {
      throw new NonConstantOrNonStringKeyError(
        expression,
        `key cannot be serialized by ${keySerializer.kind}`,
        { cause: error }
      );
    }
    throw error;
  }

  if (typeof serializedKey !== 'string') {
    throw new NonConstantOrNonStringKeyError(expression);
  }
  return serializedKey;
}
