/**
 * Translation failures
 *
 * Every failure carries the offending source expression and, where known, the
 * reason it cannot be translated. All of them extend UnsupportedExpressionError
 * so callers can catch the family with a single check.
 */

import { printExpression } from '../expressions/printer';
import { Expression } from '../expressions/types';
import { DictionaryRepresentation } from '../serialization/types';

function formatMessage(expression: Expression, reason?: string): string {
  const printed = printExpression(expression);
  return reason
    ? `Expression not supported: ${printed} because ${reason}.`
    : `Expression not supported: ${printed}.`;
}

/**
 * Error thrown when an expression cannot be translated into a filter
 *
 * @example
 * ```typescript
 * try {
 *   translator.translate(predicate);
 * } catch (error) {
 *   if (error instanceof UnsupportedExpressionError) {
 *     console.error(error.reason);
 *   }
 * }
 * ```
 */
export class UnsupportedExpressionError extends Error {
  constructor(
    public readonly expression: Expression,
    public readonly reason?: string,
    options?: { cause?: unknown }
  ) {
    super(formatMessage(expression, reason), options);
    this.name = 'UnsupportedExpressionError';
  }
}

/**
 * The field's stored representation cannot express the predicate
 */
export class UnsupportedRepresentationError extends UnsupportedExpressionError {
  constructor(
    expression: Expression,
    public readonly representation: DictionaryRepresentation,
    reason: string
  ) {
    super(expression, reason);
    this.name = 'UnsupportedRepresentationError';
  }
}

/**
 * An operand does not denote a deterministic path from the document root
 */
export class UnresolvedFieldError extends UnsupportedExpressionError {
  constructor(expression: Expression, reason?: string) {
    super(expression, reason);
    this.name = 'UnresolvedFieldError';
  }
}

/**
 * A key argument is not a constant, or does not serialize as a string
 */
export class NonConstantOrNonStringKeyError extends UnsupportedExpressionError {
  constructor(
    expression: Expression,
    reason = 'key must be a constant represented as a string',
    options?: { cause?: unknown }
  ) {
    super(expression, reason, options);
    this.name = 'NonConstantOrNonStringKeyError';
  }
}

/**
 * The resolved field's serializer lacks a capability the translator needs
 */
export class SerializerCapabilityError extends UnsupportedExpressionError {
  constructor(
    expression: Expression,
    public readonly serializerKind: string,
    capability: string
  ) {
    super(expression, `serializer ${serializerKind} does not implement the ${capability} capability`);
    this.name = 'SerializerCapabilityError';
  }
}

export class NotADictionaryError extends SerializerCapabilityError {
  constructor(expression: Expression, serializerKind: string) {
    super(expression, serializerKind, 'dictionary serializer');
    this.name = 'NotADictionaryError';
  }
}

export class NotAnArrayError extends SerializerCapabilityError {
  constructor(expression: Expression, serializerKind: string) {
    super(expression, serializerKind, 'array serializer');
    this.name = 'NotAnArrayError';
  }
}
