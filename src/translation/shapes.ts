/**
 * Recognition of the expression shapes the dispatcher can translate
 *
 * Each recognized shape maps to exactly one translator. A node is matched by
 * its kind first; a method call is then matched by its signature, trying the
 * method shapes in registry order and taking the first that claims it.
 */

import { isBooleanType } from '../expressions/type-refs';
import {
  BinaryOperator,
  ComparisonBinaryOperator,
  Expression,
  IBinaryExpression,
  IConstantExpression,
  IIndexExpression,
  IMemberExpression,
  IMethodCallExpression,
  INotExpression,
  IParameterExpression
} from '../expressions/types';
import { isArrayIncludesMethod } from './translators/array-includes';
import { isContainsKeyMethod } from './translators/contains-key';
import { isContainsValueMethod } from './translators/contains-value';
import { isRegexTestMethod } from './translators/regex-test';
import { isSomeMethod } from './translators/some';
import { isStringMatchMethod } from './translators/string-match';

export type MethodShape =
  | 'containsKey'
  | 'containsValue'
  | 'stringMatch'
  | 'regexTest'
  | 'inList'
  | 'arrayIncludes'
  | 'some';

export type RecognizedShape =
  | { readonly shape: 'andAlso'; readonly expression: IBinaryExpression }
  | { readonly shape: 'orElse'; readonly expression: IBinaryExpression }
  | { readonly shape: 'not'; readonly expression: INotExpression }
  | {
      readonly shape: 'comparison';
      readonly expression: IBinaryExpression;
      readonly operator: ComparisonBinaryOperator;
    }
  | {
      readonly shape: 'booleanField';
      readonly expression: IMemberExpression | IIndexExpression | IParameterExpression;
    }
  | { readonly shape: 'booleanConstant'; readonly expression: IConstantExpression; readonly value: boolean }
  | { readonly shape: MethodShape; readonly expression: IMethodCallExpression };

export interface IMethodShapeRecognizer {
  shape: MethodShape;
  matches(expression: IMethodCallExpression): boolean;
}

/**
 * Method shapes in the order they are tried
 */
export const METHOD_SHAPES: readonly IMethodShapeRecognizer[] = [
  { shape: 'containsKey', matches: e => isContainsKeyMethod(e.method) },
  { shape: 'containsValue', matches: e => isContainsValueMethod(e.method) },
  { shape: 'stringMatch', matches: e => isStringMatchMethod(e.method) },
  { shape: 'regexTest', matches: e => isRegexTestMethod(e.method) },
  {
    shape: 'inList',
    matches: e => isArrayIncludesMethod(e.method) && e.object?.kind === 'constant'
  },
  {
    shape: 'arrayIncludes',
    matches: e => isArrayIncludesMethod(e.method) && e.object !== null && e.object.kind !== 'constant'
  },
  { shape: 'some', matches: e => isSomeMethod(e.method) }
];

export function isComparisonOperator(operator: BinaryOperator): operator is ComparisonBinaryOperator {
  return operator !== 'andAlso' && operator !== 'orElse';
}

/**
 * Find the shape of an expression, or undefined when no translator claims it
 */
export function recognizeShape(expression: Expression): RecognizedShape | undefined {
  switch (expression.kind) {
    case 'binary': {
      const { operator } = expression;
      if (operator === 'andAlso' || operator === 'orElse') {
        return { shape: operator, expression };
      }
      return isComparisonOperator(operator)
        ? { shape: 'comparison', expression, operator }
        : undefined;
    }
    case 'not':
      return { shape: 'not', expression };
    case 'member':
    case 'index':
    case 'parameter':
      return isBooleanType(expression.type) ? { shape: 'booleanField', expression } : undefined;
    case 'constant':
      return typeof expression.value === 'boolean'
        ? { shape: 'booleanConstant', expression, value: expression.value }
        : undefined;
    case 'call': {
      const recognizer = METHOD_SHAPES.find(candidate => candidate.matches(expression));
      return recognizer ? { shape: recognizer.shape, expression } : undefined;
    }
    case 'lambda':
      return undefined;
  }
}
