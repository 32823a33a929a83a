import { regex } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { isBooleanType } from '../../expressions/type-refs';
import { IMethodCallExpression, IMethodInfo } from '../../expressions/types';
import { TranslationContext } from '../context';
import { UnsupportedExpressionError } from '../errors';
import { translateFilterField } from '../field-resolver';

// Flags the server understands, and flags that do not change what `test` matches
const SUPPORTED_FLAGS = new Set(['i', 'm', 's', 'u']);
const IGNORED_FLAGS = new Set(['g', 'd']);

export function isRegexTestMethod(method: IMethodInfo): boolean {
  return (
    !method.isStatic &&
    method.isPublic &&
    method.declaringType.kind === 'regexp' &&
    isBooleanType(method.returnType) &&
    method.name === 'test' &&
    method.parameters.length === 1
  );
}

/**
 * Translate `/pattern/flags.test(field)` into a `$regex` filter
 */
export function translateRegexTest(
  context: TranslationContext,
  expression: IMethodCallExpression
): AstFilter {
  const patternExpression = expression.object;
  if (
    patternExpression === null ||
    patternExpression.kind !== 'constant' ||
    !(patternExpression.value instanceof RegExp)
  ) {
    throw new UnsupportedExpressionError(expression, 'the regular expression must be a constant');
  }
  if (expression.args.length !== 1) {
    throw new UnsupportedExpressionError(expression);
  }
  const pattern = patternExpression.value;

  const { field, serializer } = translateFilterField(context, expression.args[0]);
  if (serializer.valueType.kind !== 'string') {
    throw new UnsupportedExpressionError(
      expression,
      `a regular expression can only be applied to a field stored as a string, but ${serializer.kind} is used`
    );
  }

  let flags = '';
  for (const flag of pattern.flags) {
    if (SUPPORTED_FLAGS.has(flag)) {
      flags += flag;
    } else if (!IGNORED_FLAGS.has(flag)) {
      throw new UnsupportedExpressionError(expression, `the regular expression flag "${flag}" is not supported`);
    }
  }

  return regex(field, pattern.source, flags);
}
