/**
 * Translates `startsWith`, `endsWith` and `includes` on string fields into
 * regular expressions
 */

import { regex } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { TranslationContext } from '../context';
import { UnsupportedExpressionError } from '../errors';
import { translateFilterField } from '../field-resolver';

const STRING_MATCH_METHOD_NAMES: ReadonlySet<string> = new Set(['startsWith', 'endsWith', 'includes']);

/**
 * Escape regular expression metacharacters so a string matches literally
 */
export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isStringMatchMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    method.declaringType.kind === 'string' &&
    isBooleanType(method.returnType) &&
    STRING_MATCH_METHOD_NAMES.has(method.name) &&
    method.parameters.length === 1
  );
}

export function translateStringMatch(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const fieldExpression = expression.object;
  if (fieldExpression === null || expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }

  const { field, serializer } = translateFilterField(context, fieldExpression);
  if (serializer.valueType.kind !== 'string') {
    throw new UnsupportedExpressionError(
      expression,
      `${expression.method.name} requires a field stored as a string, but ${serializer.kind} is used`
    );
  }

  const searchExpression = expression.args[0];
  if (searchExpression.kind !== 'constant' || typeof searchExpression.value !== 'string') {
    throw new UnsupportedExpressionError(expression, 'the search string must be a string constant');
  }

  const escaped = escapeRegex(searchExpression.value);
  switch (expression.method.name) {
    case 'startsWith':
      return regex(field, `^${escaped}`);
    case 'endsWith':
      return regex(field, `${escaped}$`);
    default:
      return regex(field, escaped);
  }
}
