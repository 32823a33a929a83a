/**
 * Translates `field.some(element => predicate)` into `$elemMatch`
 */

import { elemMatch } from '../../ast/factory';
import { FilterRenderError, renderFilter } from '../../ast/render';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { isArraySerializer } from '../../serialization/types';
import { TranslationContext } from '../context';
import { translateFilter } from '../dispatcher';
import { NotAnArrayError, UnsupportedExpressionError } from '../errors';
import { translateFilterField } from '../field-resolver';

export function isSomeMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    method.declaringType.kind === 'array' &&
    isBooleanType(method.returnType) &&
    method.name === 'some' &&
    method.parameters.length === 1
  );
}

export function translateSome(context: TranslationContext, expression: IMethodCallExpression): AstFilter {
  const fieldExpression = expression.object;
  if (fieldExpression === null || expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }

  const predicate = expression.args[0];
  if (predicate.kind !== 'lambda' || predicate.parameters.length !== 1) {
    throw new UnsupportedExpressionError(expression, 'the predicate must be a lambda with one parameter');
  }

  const { field, serializer } = translateFilterField(context, fieldExpression);
  if (!isArraySerializer(serializer)) {
    throw new NotAnArrayError(expression, serializer.kind);
  }

  const elementContext = context.withElementScope(
    field,
    predicate.parameters[0],
    serializer.itemSerializer
  );
  const elementFilter = translateFilter(elementContext, predicate.body);
  // {} and { _id: { $exists: false } } change meaning once nested in $elemMatch
  if (containsConstantFilter(elementFilter)) {
    throw new UnsupportedExpressionError(
      expression,
      'a constant predicate cannot be expressed inside $elemMatch'
    );
  }
  const filter = elemMatch(field, elementFilter);

  // The element predicate must have an operator-document form, e.g. an $or
  // over the element itself has none
  try {
    renderFilter(filter);
  } catch (error) {
    if (error instanceof FilterRenderError) {
      throw new UnsupportedExpressionError(
        expression,
        'the predicate cannot be expressed inside $elemMatch',
        { cause: error }
      );
    }
    throw error;
  }

  return filter;
}

/**
 * Whether a filter holds `matchesEverything` or `matchesNothing` outside of a
 * nested `$elemMatch`, which checks its own predicate
 */
function containsConstantFilter(filter: AstFilter): boolean {
  switch (filter.type) {
    case 'matchesEverything':
    case 'matchesNothing':
      return true;
    case 'and':
    case 'or':
      return filter.filters.some(containsConstantFilter);
    case 'not':
      return containsConstantFilter(filter.filter);
    default:
      return false;
  }
}
