/**
 * Resolution of member and index chains into translated fields
 */

import { elementField, fieldPath, fieldsEqual, subField } from '../ast/factory';
import { IAstFilterField } from '../ast/types';
import { typesEqual } from '../expressions/type-refs';
import {
  Expression,
  IIndexExpression,
  IMemberExpression,
  IParameterExpression
} from '../expressions/types';
import { bsonTypeOf } from '../serialization/bson-value';
import {
  IBsonSerializer,
  isArraySerializer,
  isDictionarySerializer,
  isDocumentSerializer
} from '../serialization/types';
import { TranslationContext } from './context';
import { UnresolvedFieldError } from './errors';
import { serializeConstant } from './serialize';

/**
 * A field path together with the serializer of the values stored there
 */
export interface ITranslatedFilterField {
  readonly field: IAstFilterField;
  readonly serializer: IBsonSerializer;
}

interface IResolvedOperand extends ITranslatedFilterField {
  readonly isRoot: boolean;
}

/**
 * Two translated fields are equal when their paths and value types match
 */
export function translatedFieldsEqual(a: ITranslatedFilterField, b: ITranslatedFilterField): boolean {
  return fieldsEqual(a.field, b.field) && typesEqual(a.serializer.valueType, b.serializer.valueType);
}

/**
 * Resolve an expression to the field it denotes
 *
 * @throws {UnresolvedFieldError} If the expression is not a deterministic path
 * from the document root (or from the current element inside `$elemMatch`)
 */
export function translateFilterField(
  context: TranslationContext,
  expression: Expression
): ITranslatedFilterField {
  const resolved = resolve(context, expression);
  if (resolved.isRoot) {
    throw new UnresolvedFieldError(expression, 'the root document is not a field');
  }

  context.logger.debug('fields', 'Resolved field', {
    path: fieldPath(resolved.field),
    serializer: resolved.serializer.kind
  });
  return { field: resolved.field, serializer: resolved.serializer };
}

function resolve(context: TranslationContext, expression: Expression): IResolvedOperand {
  switch (expression.kind) {
    case 'parameter':
      return resolveParameter(context, expression);
    case 'member':
      return resolveMember(context, expression);
    case 'index':
      return resolveIndex(context, expression);
    default:
      throw new UnresolvedFieldError(
        expression,
        `a ${expression.kind} expression does not denote a field`
      );
  }
}

function resolveParameter(
  context: TranslationContext,
  expression: IParameterExpression
): IResolvedOperand {
  const symbol = context.tryGetSymbol(expression);
  if (!symbol) {
    throw new UnresolvedFieldError(expression, `parameter ${expression.name} is not in scope`);
  }

  if (!symbol.isCurrent && context.fieldScope) {
    throw new UnresolvedFieldError(
      expression,
      `fields of ${expression.name} cannot be referenced inside $elemMatch on ${fieldPath(context.fieldScope)}`
    );
  }

  return {
    field: elementField(),
    serializer: symbol.serializer,
    isRoot: !symbol.isCurrent
  };
}

function resolveMember(context: TranslationContext, expression: IMemberExpression): IResolvedOperand {
  const target = resolve(context, expression.target);
  const { serializer } = target;

  if (!isDocumentSerializer(serializer)) {
    throw new UnresolvedFieldError(
      expression,
      `serializer ${serializer.kind} does not have members`
    );
  }

  const info = serializer.tryGetMemberSerializationInfo(expression.name);
  if (!info) {
    throw new UnresolvedFieldError(
      expression,
      `serializer ${serializer.kind} has no member named ${expression.name}`
    );
  }

  return {
    field: subField(target.field, info.elementName),
    serializer: info.serializer,
    isRoot: false
  };
}

function resolveIndex(context: TranslationContext, expression: IIndexExpression): IResolvedOperand {
  const target = resolve(context, expression.target);
  const { serializer } = target;

  if (target.isRoot) {
    throw new UnresolvedFieldError(expression, 'the root document cannot be indexed');
  }

  if (expression.index.kind !== 'constant') {
    throw new UnresolvedFieldError(expression, 'index must be a constant');
  }
  const indexValue = expression.index.value;

  if (isArraySerializer(serializer)) {
    if (typeof indexValue !== 'number' || !Number.isInteger(indexValue) || indexValue < 0) {
      throw new UnresolvedFieldError(expression, 'array index must be a non-negative integer');
    }
    return {
      field: subField(target.field, String(indexValue)),
      serializer: serializer.itemSerializer,
      isRoot: false
    };
  }

  if (isDictionarySerializer(serializer)) {
    if (serializer.dictionaryRepresentation !== 'Document') {
      throw new UnresolvedFieldError(
        expression,
        `dictionary entries cannot be addressed by key when the representation is ${serializer.dictionaryRepresentation}`
      );
    }
    const key = serializeConstant(expression, serializer.keySerializer, indexValue);
    if (typeof key !== 'string') {
      throw new UnresolvedFieldError(
        expression,
        `key serializes as ${bsonTypeOf(key)} instead of a string`
      );
    }
    return {
      field: subField(target.field, key),
      serializer: serializer.valueSerializer,
      isRoot: false
    };
  }

  throw new UnresolvedFieldError(
    expression,
    `serializer ${serializer.kind} does not support indexing`
  );
}
