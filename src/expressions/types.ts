/**
 * Core types for docfilter's source expression tree
 *
 * A predicate is a lambda whose body is built from these nodes. Nodes are
 * immutable and carry the static type of the value they produce, so that
 * translators can recognize a construct from its shape alone.
 */

/**
 * Static type of an expression node
 */
export type TypeRef =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'string' }
  | { readonly kind: 'number' }
  | { readonly kind: 'date' }
  | { readonly kind: 'objectId' }
  | { readonly kind: 'regexp' }
  | { readonly kind: 'null' }
  | { readonly kind: 'unknown' }
  | { readonly kind: 'array'; readonly element: TypeRef }
  | { readonly kind: 'map'; readonly key: TypeRef; readonly value: TypeRef }
  | { readonly kind: 'class'; readonly name: string }
  | { readonly kind: 'enum'; readonly name: string }
  | {
      readonly kind: 'function';
      readonly parameters: readonly TypeRef[];
      readonly returnType: TypeRef;
    };

/**
 * A declared parameter of a method
 */
export interface IParameterInfo {
  name: string;
  type: TypeRef;
}

/**
 * Signature of a method invoked by a call expression
 */
export interface IMethodInfo {
  name: string;
  declaringType: TypeRef;
  parameters: readonly IParameterInfo[];
  returnType: TypeRef;
  isStatic: boolean;
  isPublic: boolean;
}

/**
 * Binary operators of the source language
 */
export type BinaryOperator =
  | 'andAlso'
  | 'orElse'
  | 'equal'
  | 'notEqual'
  | 'lessThan'
  | 'lessThanOrEqual'
  | 'greaterThan'
  | 'greaterThanOrEqual';

/**
 * The comparison subset of binary operators
 */
export type ComparisonBinaryOperator = Exclude<BinaryOperator, 'andAlso' | 'orElse'>;

export interface IParameterExpression {
  readonly kind: 'parameter';
  readonly name: string;
  readonly type: TypeRef;
}

export interface IConstantExpression {
  readonly kind: 'constant';
  readonly value: unknown;
  readonly type: TypeRef;
}

export interface IMemberExpression {
  readonly kind: 'member';
  readonly target: Expression;
  readonly name: string;
  readonly type: TypeRef;
}

export interface IIndexExpression {
  readonly kind: 'index';
  readonly target: Expression;
  readonly index: Expression;
  readonly type: TypeRef;
}

export interface IMethodCallExpression {
  readonly kind: 'call';
  /**
   * Receiver of an instance method; null for static methods
   */
  readonly object: Expression | null;
  readonly method: IMethodInfo;
  readonly args: readonly Expression[];
  readonly type: TypeRef;
}

export interface IBinaryExpression {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly type: TypeRef;
}

export interface INotExpression {
  readonly kind: 'not';
  readonly operand: Expression;
  readonly type: TypeRef;
}

export interface ILambdaExpression {
  readonly kind: 'lambda';
  readonly parameters: readonly IParameterExpression[];
  readonly body: Expression;
  readonly type: TypeRef;
}

/**
 * Any node of the source expression tree
 */
export type Expression =
  | IParameterExpression
  | IConstantExpression
  | IMemberExpression
  | IIndexExpression
  | IMethodCallExpression
  | IBinaryExpression
  | INotExpression
  | ILambdaExpression;

export type ExpressionKind = Expression['kind'];
