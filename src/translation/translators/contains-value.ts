/**
 * Translates `dictionary.containsValue(value)`.
 *
 * The array representations store each entry as an element, so the check is
 * an `$elemMatch` on the element's value slot. The document representation
 * has no fixed path to the values and is rejected.
 */

import { astField, elemMatch, eq } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { isDictionarySerializer } from '../../serialization/types';
import { TranslationContext } from '../context';
import {
  NotADictionaryError,
  UnsupportedExpressionError,
  UnsupportedRepresentationError
} from '../errors';
import { translateFilterField } from '../field-resolver';
import { serializeConstant } from '../serialize';

export function isContainsValueMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    isBooleanType(method.returnType) &&
    method.name === 'containsValue' &&
    method.parameters.length === 1
  );
}

export function translateContainsValue(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const fieldExpression = expression.object;
  if (fieldExpression === null || expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }
  const valueExpression = expression.args[0];

  const { field, serializer } = translateFilterField(context, fieldExpression);
  if (!isDictionarySerializer(serializer)) {
    throw new NotADictionaryError(expression, serializer.kind);
  }

  if (valueExpression.kind !== 'constant') {
    throw new UnsupportedExpressionError(expression, 'value must be a constant');
  }
  const value = serializeConstant(expression, serializer.valueSerializer, valueExpression.value);

  const representation = serializer.dictionaryRepresentation;
  switch (representation) {
    case 'ArrayOfDocuments':
      return elemMatch(field, eq(astField('v'), value));
    case 'ArrayOfArrays':
      return elemMatch(field, eq(astField('1'), value));
    case 'Document':
      throw new UnsupportedRepresentationError(
        expression,
        representation,
        `containsValue is not supported when the dictionary representation is ${representation}`
      );
  }
}
