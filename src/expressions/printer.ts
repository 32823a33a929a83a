import { BinaryOperator, Expression } from './types';

const BINARY_OPERATOR_SYMBOLS: Record<BinaryOperator, string> = {
  andAlso: '&&',
  orElse: '||',
  equal: '==',
  notEqual: '!=',
  lessThan: '<',
  lessThanOrEqual: '<=',
  greaterThan: '>',
  greaterThanOrEqual: '>='
};

export function binaryOperatorSymbol(operator: BinaryOperator): string {
  return BINARY_OPERATOR_SYMBOLS[operator];
}

function printValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? 'new Date(NaN)'
      : `new Date(${JSON.stringify(value.toISOString())})`;
  }
  if (value instanceof RegExp) return String(value);
  if (Array.isArray(value)) return `[${value.map(printValue).join(', ')}]`;
  return String(value);
}

/**
 * Render an expression as source-like text, used in error messages
 *
 * @example
 * ```typescript
 * printExpression(predicate); // 'x => x.Tags.containsKey("red")'
 * ```
 */
export function printExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'parameter':
      return expression.name;
    case 'constant':
      return printValue(expression.value);
    case 'member':
      return `${printExpression(expression.target)}.${expression.name}`;
    case 'index':
      return `${printExpression(expression.target)}[${printExpression(expression.index)}]`;
    case 'call': {
      const receiver =
        expression.object === null
          ? (expression.method.declaringType.kind === 'class'
              ? expression.method.declaringType.name
              : expression.method.declaringType.kind)
          : printExpression(expression.object);
      const args = expression.args.map(printExpression).join(', ');
      return `${receiver}.${expression.method.name}(${args})`;
    }
    case 'binary':
      return `(${printExpression(expression.left)} ${binaryOperatorSymbol(expression.operator)} ${printExpression(expression.right)})`;
    case 'not':
      return `!${printExpression(expression.operand)}`;
    case 'lambda': {
      const params =
        expression.parameters.length === 1
          ? expression.parameters[0].name
          : `(${expression.parameters.map(p => p.name).join(', ')})`;
      return `${params} => ${printExpression(expression.body)}`;
    }
  }
}
