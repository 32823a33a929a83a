import { eq, matchesEverything, matchesNothing } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { IIndexExpression, IMemberExpression, IParameterExpression } from '../../expressions/types';
import { TranslationContext } from '../context';
import { translateFilterField } from '../field-resolver';
import { serializeConstant } from '../serialize';

/**
 * A boolean field used as a predicate on its own means `field == true`
 */
export function translateBooleanField(
  context: TranslationContext,
  expression: IMemberExpression | IIndexExpression | IParameterExpression
): AstFilter {
  const { field, serializer } = translateFilterField(context, expression);
  return eq(field, serializeConstant(expression, serializer, true));
}

export function translateBooleanConstant(value: boolean): AstFilter {
  return value ? matchesEverything() : matchesNothing();
}
