/**
 * Rendering of Filter AST nodes as MongoDB filter documents
 *
 * @example
 * ```typescript
 * renderFilter(exists(astField('a', 'b'))); // { 'a.b': { $exists: true } }
 * ```
 */

import type { Document } from 'bson';
import { BSONRegExp } from 'bson';
import { isBsonDocument } from '../serialization/bson-value';
import { fieldPath, isElementField, isFieldOperation } from './factory';
import { AstFieldOperationFilter, AstFilter } from './types';

/**
 * Error thrown when a Filter AST cannot be rendered
 */
export class FilterRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterRenderError';
  }
}

/**
 * Render a filter as a filter document
 * @throws {FilterRenderError} If an element filter appears outside an `$elemMatch`
 */
export function renderFilter(filter: AstFilter): Document {
  switch (filter.type) {
    case 'and':
      return { $and: filter.filters.map(renderFilter) };
    case 'or':
      return { $or: filter.filters.map(renderFilter) };
    case 'not':
      return renderNot(filter.filter);
    case 'matchesEverything':
      return {};
    case 'matchesNothing':
      return { _id: { $exists: false } };
    default:
      return { [requireFieldPath(filter)]: renderOperation(filter) };
  }
}

function requireFieldPath(filter: AstFieldOperationFilter): string {
  if (isElementField(filter.field)) {
    throw new FilterRenderError(
      `A ${filter.type} filter on the current array element can only appear inside $elemMatch`
    );
  }
  return fieldPath(filter.field);
}

/**
 * The value placed under the field's path. Equality uses the `{ path: value }`
 * shorthand unless the value would be mistaken for an operator document.
 */
function renderOperation(filter: AstFieldOperationFilter): unknown {
  if (filter.type === 'comparison' && filter.operator === '$eq') {
    const { value } = filter;
    if (!isBsonDocument(value) && !(value instanceof BSONRegExp)) {
      return value;
    }
  }
  return renderOperatorDocument(filter);
}

function renderOperatorDocument(filter: AstFieldOperationFilter): Document {
  switch (filter.type) {
    case 'exists':
      return { $exists: filter.exists };
    case 'comparison':
      return { [filter.operator]: filter.value };
    case 'in':
      return { $in: [...filter.values] };
    case 'regex':
      return filter.flags
        ? { $regex: filter.pattern, $options: filter.flags }
        : { $regex: filter.pattern };
    case 'size':
      return { $size: filter.size };
    case 'elemMatch': {
      const elementOperators = renderElementOperators(filter.filter);
      return {
        $elemMatch: elementOperators ?? renderFilter(filter.filter)
      };
    }
  }
}

function renderNot(filter: AstFilter): Document {
  if (isFieldOperation(filter)) {
    const path = requireFieldPath(filter);
    if (filter.type === 'comparison' && filter.operator === '$eq') {
      return { [path]: { $ne: filter.value } };
    }
    if (filter.type === 'in') {
      return { [path]: { $nin: [...filter.values] } };
    }
    return { [path]: { $not: renderOperatorDocument(filter) } };
  }
  return { $nor: [renderFilter(filter)] };
}

/**
 * Render a predicate on the current element as an operator document, for
 * example `{ $gt: 1, $lt: 5 }`. Returns undefined when the predicate does not
 * apply to the element itself.
 */
function renderElementOperators(filter: AstFilter): Document | undefined {
  if (isFieldOperation(filter)) {
    return isElementField(filter.field) ? renderOperatorDocument(filter) : undefined;
  }

  if (filter.type === 'not') {
    const inner = filter.filter;
    if (!isFieldOperation(inner) || !isElementField(inner.field)) {
      return undefined;
    }
    if (inner.type === 'comparison' && inner.operator === '$eq') {
      return { $ne: inner.value };
    }
    return { $not: renderOperatorDocument(inner) };
  }

  if (filter.type === 'and' && filter.filters.length > 0) {
    const merged: Document = {};
    for (const child of filter.filters) {
      const operators = renderElementOperators(child);
      if (!operators) {
        return undefined;
      }
      for (const [operator, operand] of Object.entries(operators)) {
        if (operator in merged) {
          return undefined;
        }
        merged[operator] = operand;
      }
    }
    return merged;
  }

  return undefined;
}
