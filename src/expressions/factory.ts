/**
 * Factory functions for source expression nodes
 *
 * @example
 * ```typescript
 * const x = parameter('x', Types.classOf('Product'));
 * const tags = member(x, 'Tags', Types.mapOf(Types.string, Types.string));
 * const predicate = lambda([x], call(tags, Methods.containsKey(tags.type), [constant('red')]));
 * ```
 */

import { Types, typeOfValue } from './type-refs';
import {
  BinaryOperator,
  ComparisonBinaryOperator,
  Expression,
  IBinaryExpression,
  IConstantExpression,
  IIndexExpression,
  ILambdaExpression,
  IMemberExpression,
  IMethodCallExpression,
  IMethodInfo,
  INotExpression,
  IParameterExpression,
  TypeRef
} from './types';

export function parameter(name: string, type: TypeRef): IParameterExpression {
  return { kind: 'parameter', name, type };
}

/**
 * Create a constant node. The type is inferred from the value when omitted.
 */
export function constant(value: unknown, type?: TypeRef): IConstantExpression {
  return { kind: 'constant', value, type: type ?? typeOfValue(value) };
}

export function member(target: Expression, name: string, type: TypeRef): IMemberExpression {
  return { kind: 'member', target, name, type };
}

export function index(target: Expression, indexExpression: Expression, type: TypeRef): IIndexExpression {
  return { kind: 'index', target, index: indexExpression, type };
}

export function call(
  object: Expression | null,
  method: IMethodInfo,
  args: readonly Expression[]
): IMethodCallExpression {
  return { kind: 'call', object, method, args, type: method.returnType };
}

export function binary(
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): IBinaryExpression {
  return { kind: 'binary', operator, left, right, type: Types.boolean };
}

export function andAlso(left: Expression, right: Expression): IBinaryExpression {
  return binary('andAlso', left, right);
}

export function orElse(left: Expression, right: Expression): IBinaryExpression {
  return binary('orElse', left, right);
}

export function not(operand: Expression): INotExpression {
  return { kind: 'not', operand, type: Types.boolean };
}

export function compare(
  operator: ComparisonBinaryOperator,
  left: Expression,
  right: Expression
): IBinaryExpression {
  return binary(operator, left, right);
}

export function equal(left: Expression, right: Expression): IBinaryExpression {
  return binary('equal', left, right);
}

export function notEqual(left: Expression, right: Expression): IBinaryExpression {
  return binary('notEqual', left, right);
}

export function lambda(
  parameters: readonly IParameterExpression[],
  body: Expression
): ILambdaExpression {
  return {
    kind: 'lambda',
    parameters,
    body,
    type: Types.functionOf(
      parameters.map(p => p.type),
      body.type
    )
  };
}
