/**
 * Entry point for translating a predicate body into a Filter AST
 *
 * The dispatcher recognizes the shape of a node and hands it to the one
 * translator registered for that shape. Anything without a recognized shape
 * is rejected with the base UnsupportedExpressionError.
 */

import { AstFilter } from '../ast/types';
import { Expression } from '../expressions/types';
import { TranslationContext } from './context';
import { UnsupportedExpressionError } from './errors';
import { recognizeShape } from './shapes';
import { translateArrayIncludes, translateInList } from './translators/array-includes';
import { translateBooleanConstant, translateBooleanField } from './translators/boolean';
import { translateComparison } from './translators/comparison';
import { translateContainsKey } from './translators/contains-key';
import { translateContainsValue } from './translators/contains-value';
import { translateAndAlso, translateNot, translateOrElse } from './translators/logical';
import { translateRegexTest } from './translators/regex-test';
import { translateSome } from './translators/some';
import { translateStringMatch } from './translators/string-match';

function assertNever(value: never): never {
  throw new Error(`Unhandled shape: ${JSON.stringify(value)}`);
}

/**
 * Translate a boolean expression into a filter
 *
 * @throws {UnsupportedExpressionError} If the expression, or any part of it,
 * cannot be expressed as a filter
 */
export function translateFilter(context: TranslationContext, expression: Expression): AstFilter {
  const recognized = recognizeShape(expression);
  if (!recognized) {
    throw new UnsupportedExpressionError(
      expression,
      expression.kind === 'call' ? `method ${expression.method.name} is not supported` : undefined
    );
  }

  context.logger.debug('dispatch', 'Dispatching expression', {
    shape: recognized.shape,
    kind: expression.kind
  });

  switch (recognized.shape) {
    case 'andAlso':
      return translateAndAlso(context, recognized.expression);
    case 'orElse':
      return translateOrElse(context, recognized.expression);
    case 'not':
      return translateNot(context, recognized.expression);
    case 'comparison':
      return translateComparison(context, recognized.expression, recognized.operator);
    case 'booleanField':
      return translateBooleanField(context, recognized.expression);
    case 'booleanConstant':
      return translateBooleanConstant(recognized.value);
    case 'containsKey':
      return translateContainsKey(context, recognized.expression);
    case 'containsValue':
      return translateContainsValue(context, recognized.expression);
    case 'stringMatch':
      return translateStringMatch(context, recognized.expression);
    case 'regexTest':
      return translateRegexTest(context, recognized.expression);
    case 'inList':
      return translateInList(context, recognized.expression);
    case 'arrayIncludes':
      return translateArrayIncludes(context, recognized.expression);
    case 'some':
      return translateSome(context, recognized.expression);
    default:
      return assertNever(recognized);
  }
}
