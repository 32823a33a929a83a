import { parse as liqeParse } from 'liqe';
import type {
  BooleanOperatorToken,
  ExpressionToken,
  FieldToken,
  ImplicitBooleanOperatorToken,
  LiqeQuery,
  LogicalExpressionToken,
  ParenthesizedExpressionToken,
  TagToken,
  UnaryOperatorToken
} from 'liqe';
import {
  andAlso,
  call,
  compare,
  constant,
  equal,
  index,
  lambda,
  member,
  not,
  orElse,
  parameter
} from '../expressions/factory';
import { Methods } from '../expressions/methods';
import { Types } from '../expressions/type-refs';
import {
  ComparisonBinaryOperator,
  Expression,
  ILambdaExpression,
  IParameterExpression,
  TypeRef
} from '../expressions/types';
import { ClassMap, ClassSerializer } from '../serialization/class-map';
import {
  IBsonSerializer,
  IDocumentSerializer,
  isArraySerializer,
  isDictionarySerializer,
  isDocumentSerializer
} from '../serialization/types';
import { escapeRegex } from '../translation/translators/string-match';
import { IParserOptions, IQueryParser, IResolvedQueryField, QueryModel } from './types';

/**
 * Error thrown when query parsing fails
 */
export class QueryParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryParseError';
  }
}

const COMPARISON_OPERATORS: Record<string, ComparisonBinaryOperator> = {
  ':>': 'greaterThan',
  ':>=': 'greaterThanOrEqual',
  ':<': 'lessThan',
  ':<=': 'lessThanOrEqual'
};

type LiteralValue = string | number | boolean | null;

/**
 * Parses Lucene-style query strings, using Liqe, into predicate lambdas over
 * a class map
 *
 * @example
 * ```typescript
 * const parser = new QueryParser();
 * parser.parse('Tags:red AND Age:>=18', personMap);
 * // x => (x.Tags.containsKey("red") && (x.Age >= 18))
 * ```
 */
export class QueryParser implements IQueryParser {
  private options: Required<IParserOptions>;

  constructor(options: IParserOptions = {}) {
    this.options = {
      caseInsensitiveFields: options.caseInsensitiveFields ?? false,
      fieldMappings: options.fieldMappings ?? {},
      parameterName: options.parameterName ?? 'x'
    };
  }

  /**
   * Parse a query string into a predicate lambda
   */
  public parse(query: string, model: QueryModel): ILambdaExpression {
    const serializer = model instanceof ClassSerializer ? model : new ClassSerializer(model);
    const document = parameter(this.options.parameterName, serializer.valueType);

    try {
      const liqeAst = liqeParse(query);
      return lambda([document], this.convertLiqeAst(liqeAst, document, serializer));
    } catch (error) {
      throw new QueryParseError(
        `Failed to parse query: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Validate a query string
   */
  public validate(query: string, model: QueryModel): boolean {
    try {
      this.parse(query, model);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Resolve a dotted field name against a model
   *
   * @throws {QueryParseError} If a segment does not name a member, key or
   * array position
   */
  public resolveField(
    fieldName: string,
    document: IParameterExpression,
    serializer: IBsonSerializer
  ): IResolvedQueryField {
    const segments = this.normalizeFieldName(fieldName).split('.');
    let current: IResolvedQueryField = { expression: document, serializer };

    for (const segment of segments) {
      current = this.resolveSegment(fieldName, current, segment);
    }
    return current;
  }

  /**
   * Convert a Liqe AST node to a predicate body
   */
  private convertLiqeAst(
    node: LiqeQuery,
    document: IParameterExpression,
    serializer: IBsonSerializer
  ): Expression {
    if (!node || typeof node !== 'object') {
      throw new QueryParseError('Invalid AST node');
    }

    switch (node.type) {
      case 'LogicalExpression': {
        const logicalNode = node as LogicalExpressionToken;
        const operator = (logicalNode.operator as BooleanOperatorToken | ImplicitBooleanOperatorToken).operator;
        const left = this.convertLiqeAst(logicalNode.left, document, serializer);
        const right = this.convertLiqeAst(logicalNode.right, document, serializer);
        return operator.toLowerCase() === 'or' ? orElse(left, right) : andAlso(left, right);
      }

      case 'UnaryOperator': {
        const unaryNode = node as UnaryOperatorToken;
        return not(this.convertLiqeAst(unaryNode.operand, document, serializer));
      }

      case 'Tag': {
        const tagNode = node as TagToken;
        if (!tagNode.field || tagNode.field.type !== 'Field') {
          throw new QueryParseError('Every term must name a field');
        }
        const field = this.resolveField((tagNode.field as FieldToken).name, document, serializer);
        return this.convertTag(field, tagNode.operator.operator, tagNode.expression);
      }

      case 'EmptyExpression':
        return constant(true);

      case 'ParenthesizedExpression': {
        const parenNode = node as ParenthesizedExpressionToken;
        if (parenNode.expression) {
          return this.convertLiqeAst(parenNode.expression, document, serializer);
        }
        throw new QueryParseError('Invalid parenthesized expression');
      }

      default:
        throw new QueryParseError(`Unsupported node type: ${(node as { type: string }).type}`);
    }
  }

  private convertTag(
    field: IResolvedQueryField,
    operator: string,
    expression: ExpressionToken
  ): Expression {
    switch (expression.type) {
      case 'RangeExpression': {
        const { min, max, minInclusive, maxInclusive } = expression.range;
        return andAlso(
          compare(
            minInclusive ? 'greaterThanOrEqual' : 'greaterThan',
            field.expression,
            this.typedConstant(field.serializer.valueType, min)
          ),
          compare(
            maxInclusive ? 'lessThanOrEqual' : 'lessThan',
            field.expression,
            this.typedConstant(field.serializer.valueType, max)
          )
        );
      }

      case 'RegexExpression':
        return call(constant(this.convertRegex(expression.value)), Methods.test(), [field.expression]);

      case 'LiteralExpression': {
        const value: LiteralValue = expression.value;
        const comparison = COMPARISON_OPERATORS[operator];
        if (comparison) {
          return compare(comparison, field.expression, this.typedConstant(field.serializer.valueType, value));
        }
        if (operator !== ':' && operator !== ':=') {
          throw new QueryParseError(`Unsupported operator: ${operator}`);
        }
        return this.convertMatch(field, value, operator === ':' && !expression.quoted);
      }

      default:
        throw new QueryParseError(`Unsupported expression type: ${expression.type}`);
    }
  }

  /**
   * `field:value`: key membership on dictionaries, element membership on
   * arrays, wildcard matching on strings and equality otherwise
   */
  private convertMatch(field: IResolvedQueryField, value: LiteralValue, allowWildcards: boolean): Expression {
    const { expression, serializer } = field;

    if (isDictionarySerializer(serializer)) {
      const key = this.typedConstant(serializer.keySerializer.valueType, value);
      return call(expression, Methods.containsKey(serializer.valueType), [key]);
    }

    if (isArraySerializer(serializer)) {
      const element = this.typedConstant(serializer.itemSerializer.valueType, value);
      return call(expression, Methods.arrayIncludes(serializer.valueType), [element]);
    }

    if (
      allowWildcards &&
      serializer.valueType.kind === 'string' &&
      typeof value === 'string' &&
      /[*?]/.test(value)
    ) {
      return this.convertWildcard(expression, value);
    }

    return equal(expression, this.typedConstant(serializer.valueType, value));
  }

  private convertWildcard(expression: Expression, pattern: string): Expression {
    const leading = pattern.startsWith('*');
    const trailing = pattern.endsWith('*') && pattern.length > 1;
    const inner = pattern.slice(leading ? 1 : 0, trailing ? -1 : undefined);

    if (inner.length > 0 && !/[*?]/.test(inner)) {
      if (leading && trailing) {
        return call(expression, Methods.stringIncludes(), [constant(inner)]);
      }
      if (trailing) {
        return call(expression, Methods.startsWith(), [constant(inner)]);
      }
      if (leading) {
        return call(expression, Methods.endsWith(), [constant(inner)]);
      }
    }

    const source = Array.from(pattern)
      .map(char => (char === '*' ? '.*' : char === '?' ? '.' : escapeRegex(char)))
      .join('');
    return call(constant(new RegExp(`^${source}$`)), Methods.test(), [expression]);
  }

  /**
   * Convert a Liqe regex literal such as `/^jo/i`
   */
  private convertRegex(literal: string): RegExp {
    const end = literal.lastIndexOf('/');
    if (!literal.startsWith('/') || end <= 0) {
      throw new QueryParseError(`Invalid regular expression: ${literal}`);
    }
    try {
      return new RegExp(literal.slice(1, end), literal.slice(end + 1));
    } catch (error) {
      throw new QueryParseError(`Invalid regular expression: ${literal}`, { cause: error });
    }
  }

  /**
   * Build a constant for a field of the given type. Liqe infers numbers and
   * booleans from unquoted text, so values are converted to the field's type
   * where the conversion is unambiguous.
   */
  private typedConstant(type: TypeRef, value: LiteralValue): Expression {
    if (value === null) {
      return constant(null);
    }

    switch (type.kind) {
      case 'string':
        return constant(String(value), Types.string);
      case 'number':
        if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
          return constant(Number(value), Types.number);
        }
        return constant(value);
      case 'boolean':
        if (value === 'true' || value === 'false') {
          return constant(value === 'true', Types.boolean);
        }
        return constant(value);
      case 'date': {
        if (typeof value === 'boolean') {
          throw new QueryParseError(`Invalid date: ${value}`);
        }
        const date = new Date(value);
        if (Number.isNaN(date.getTime())) {
          throw new QueryParseError(`Invalid date: ${value}`);
        }
        return constant(date, Types.date);
      }
      default:
        return constant(value);
    }
  }

  private resolveSegment(
    fieldName: string,
    current: IResolvedQueryField,
    segment: string
  ): IResolvedQueryField {
    const { expression, serializer } = current;

    if (serializer instanceof ClassSerializer) {
      const memberName = this.findMemberName(serializer.classMap, segment);
      if (memberName) {
        return this.memberField(serializer, expression, memberName);
      }
    } else if (isDocumentSerializer(serializer) && serializer.tryGetMemberSerializationInfo(segment)) {
      return this.memberField(serializer, expression, segment);
    }

    if (isDictionarySerializer(serializer)) {
      const key = this.typedConstant(serializer.keySerializer.valueType, segment);
      return {
        expression: index(expression, key, serializer.valueSerializer.valueType),
        serializer: serializer.valueSerializer
      };
    }

    if (isArraySerializer(serializer) && /^\d+$/.test(segment)) {
      return {
        expression: index(expression, constant(Number(segment)), serializer.itemSerializer.valueType),
        serializer: serializer.itemSerializer
      };
    }

    throw new QueryParseError(`Unknown field: ${fieldName} (no member, key or position "${segment}")`);
  }

  private memberField(
    serializer: IDocumentSerializer,
    target: Expression,
    memberName: string
  ): IResolvedQueryField {
    const info = serializer.tryGetMemberSerializationInfo(memberName);
    if (!info) {
      throw new QueryParseError(`Unknown member: ${memberName}`);
    }
    return {
      expression: member(target, memberName, info.serializer.valueType),
      serializer: info.serializer
    };
  }

  private findMemberName(classMap: ClassMap, segment: string): string | undefined {
    if (!this.options.caseInsensitiveFields) {
      return classMap.memberNames.find(name => name === segment);
    }
    const lowered = segment.toLowerCase();
    return classMap.memberNames.find(name => name.toLowerCase() === lowered);
  }

  /**
   * Apply field mappings; with case-insensitive fields the mapping is looked
   * up by the lowercased name and members are matched ignoring case
   */
  private normalizeFieldName(field: string): string {
    const lookupName = this.options.caseInsensitiveFields
      ? field.toLowerCase()
      : field;

    return this.options.fieldMappings[lookupName] ?? field;
  }
}
