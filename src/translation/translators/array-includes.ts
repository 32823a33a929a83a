/**
 * Translates `Array.prototype.includes` in its two directions:
 *
 * - `field.includes(value)`: the array field has an element equal to value
 * - `[a, b, c].includes(field)`: the field is one of the listed values (`$in`)
 */

import { eq, inValues } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { isArraySerializer } from '../../serialization/types';
import { TranslationContext } from '../context';
import { NotAnArrayError, UnsupportedExpressionError } from '../errors';
import { translateFilterField } from '../field-resolver';
import { serializeConstant } from '../serialize';

export function isArrayIncludesMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    method.declaringType.kind === 'array' &&
    isBooleanType(method.returnType) &&
    method.name === 'includes' &&
    method.parameters.length === 1
  );
}

export function translateArrayIncludes(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const fieldExpression = expression.object;
  if (fieldExpression === null || expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }

  const { field, serializer } = translateFilterField(context, fieldExpression);
  if (!isArraySerializer(serializer)) {
    throw new NotAnArrayError(expression, serializer.kind);
  }

  const valueExpression = expression.args[0];
  if (valueExpression.kind !== 'constant') {
    throw new UnsupportedExpressionError(expression, 'the searched element must be a constant');
  }

  return eq(field, serializeConstant(expression, serializer.itemSerializer, valueExpression.value));
}

export function translateInList(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const listExpression = expression.object;
  if (
    listExpression === null ||
    listExpression.kind !== 'constant' ||
    !Array.isArray(listExpression.value) ||
    expression.args.length !== 1
  ) {
    throw new UnsupportedExpressionError(expression, 'the list of values must be an array constant');
  }
  const values: unknown[] = listExpression.value;

  const { field, serializer } = translateFilterField(context, expression.args[0]);
  return inValues(
    field,
    values.map(value => serializeConstant(expression, serializer, value))
  );
}
