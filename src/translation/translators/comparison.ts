/**
 * Translates comparisons between a field and a constant
 *
 * `length` of an array or string field gets its own translation: arrays use
 * `$size` and positional `$exists`, strings use an anchored `$regex`.
 */

import { comparison, exists, not, regex, size, subField } from '../../ast/factory';
import { AstComparisonOperator, AstFilter, IAstFilterField } from '../../ast/types';
import {
  ComparisonBinaryOperator,
  Expression,
  IBinaryExpression,
  IConstantExpression,
  IMemberExpression
} from '../../expressions/types';
import { isArraySerializer } from '../../serialization/types';
import { TranslationContext } from '../context';
import { NotAnArrayError, UnsupportedExpressionError } from '../errors';
import { translateFilterField } from '../field-resolver';
import { serializeConstant } from '../serialize';

const AST_OPERATORS: Record<ComparisonBinaryOperator, AstComparisonOperator> = {
  equal: '$eq',
  notEqual: '$ne',
  lessThan: '$lt',
  lessThanOrEqual: '$lte',
  greaterThan: '$gt',
  greaterThanOrEqual: '$gte'
};

// Operator to use when the operands change sides
const FLIPPED_OPERATORS: Record<ComparisonBinaryOperator, ComparisonBinaryOperator> = {
  equal: 'equal',
  notEqual: 'notEqual',
  lessThan: 'greaterThan',
  lessThanOrEqual: 'greaterThanOrEqual',
  greaterThan: 'lessThan',
  greaterThanOrEqual: 'lessThanOrEqual'
};

interface INormalizedComparison {
  operator: ComparisonBinaryOperator;
  fieldExpression: Expression;
  constant: IConstantExpression;
}

function normalize(
  expression: IBinaryExpression,
  operator: ComparisonBinaryOperator
): INormalizedComparison {
  const { left, right } = expression;
  if (right.kind === 'constant' && left.kind !== 'constant') {
    return { operator, fieldExpression: left, constant: right };
  }
  if (left.kind === 'constant' && right.kind !== 'constant') {
    return { operator: FLIPPED_OPERATORS[operator], fieldExpression: right, constant: left };
  }
  throw new UnsupportedExpressionError(expression, 'one side of the comparison must be a constant');
}

function isLengthMember(expression: Expression): expression is IMemberExpression {
  return (
    expression.kind === 'member' &&
    expression.name === 'length' &&
    (expression.target.type.kind === 'array' || expression.target.type.kind === 'string')
  );
}

export function translateComparison(
  context: TranslationContext,
  expression: IBinaryExpression,
  operator: ComparisonBinaryOperator
): AstFilter {
  const normalized = normalize(expression, operator);

  if (isLengthMember(normalized.fieldExpression)) {
    return translateLengthComparison(context, expression, normalized.fieldExpression, normalized);
  }

  const { field, serializer } = translateFilterField(context, normalized.fieldExpression);
  const value = serializeConstant(expression, serializer, normalized.constant.value);
  return comparison(AST_OPERATORS[normalized.operator], field, value);
}

function translateLengthComparison(
  context: TranslationContext,
  expression: IBinaryExpression,
  lengthExpression: IMemberExpression,
  { operator, constant }: INormalizedComparison
): AstFilter {
  const length = constant.value;
  if (typeof length !== 'number' || !Number.isInteger(length) || length < 0) {
    throw new UnsupportedExpressionError(expression, 'a length must be compared to a non-negative integer');
  }

  const { field, serializer } = translateFilterField(context, lengthExpression.target);

  if (lengthExpression.target.type.kind === 'array') {
    if (!isArraySerializer(serializer)) {
      throw new NotAnArrayError(expression, serializer.kind);
    }
    return translateArrayLength(expression, field, operator, length);
  }

  if (serializer.valueType.kind !== 'string') {
    throw new UnsupportedExpressionError(
      expression,
      `length requires a field stored as a string, but ${serializer.kind} is used`
    );
  }
  if (operator === 'lessThan' && length === 0) {
    throw new UnsupportedExpressionError(expression, 'comparing a string length below 0 is not supported');
  }
  return translateStringLength(field, operator, length);
}

function translateArrayLength(
  expression: IBinaryExpression,
  field: IAstFilterField,
  operator: ComparisonBinaryOperator,
  length: number
): AstFilter {
  // An array is longer than n exactly when it has an element at index n
  const elementAt = (index: number, present: boolean): AstFilter =>
    exists(subField(field, String(index)), present);

  switch (operator) {
    case 'equal':
      return size(field, length);
    case 'notEqual':
      return not(size(field, length));
    case 'greaterThan':
      return elementAt(length, true);
    case 'lessThanOrEqual':
      return elementAt(length, false);
    case 'greaterThanOrEqual':
    case 'lessThan':
      if (length === 0) {
        throw new UnsupportedExpressionError(
          expression,
          `comparing an array length ${operator === 'lessThan' ? 'below' : 'from'} 0 is not supported`
        );
      }
      return elementAt(length - 1, operator === 'greaterThanOrEqual');
  }
}

function translateStringLength(
  field: IAstFilterField,
  operator: ComparisonBinaryOperator,
  length: number
): AstFilter {
  switch (operator) {
    case 'equal':
      return regex(field, `^.{${length}}$`, 's');
    case 'notEqual':
      return not(regex(field, `^.{${length}}$`, 's'));
    case 'greaterThan':
      return regex(field, `^.{${length + 1},}$`, 's');
    case 'greaterThanOrEqual':
      return regex(field, `^.{${length},}$`, 's');
    case 'lessThan':
      return regex(field, `^.{0,${length - 1}}$`, 's');
    case 'lessThanOrEqual':
      return regex(field, `^.{0,${length}}$`, 's');
  }
}
