/**
 * Factory functions for Filter AST nodes and field paths
 */

import { BsonValue } from '../serialization/bson-value';
import {
  AstComparisonOperator,
  AstFieldOperationFilter,
  AstFilter,
  IAstAndFilter,
  IAstComparisonFilter,
  IAstElemMatchFilter,
  IAstExistsFilter,
  IAstFilterField,
  IAstInFilter,
  IAstMatchesEverythingFilter,
  IAstMatchesNothingFilter,
  IAstNotFilter,
  IAstOrFilter,
  IAstRegexFilter,
  IAstSizeFilter
} from './types';

/**
 * Create a field from its path segments
 */
export function astField(...path: string[]): IAstFilterField {
  return { kind: 'field', path };
}

/**
 * The current array element inside an `$elemMatch`
 */
export function elementField(): IAstFilterField {
  return { kind: 'field', path: [] };
}

/**
 * Extend a field by a literal sub-field name
 *
 * @example
 * ```typescript
 * subField(astField('Tags'), 'red'); // { kind: 'field', path: ['Tags', 'red'] }
 * ```
 */
export function subField(field: IAstFilterField, name: string): IAstFilterField {
  return { kind: 'field', path: [...field.path, name] };
}

export function isElementField(field: IAstFilterField): boolean {
  return field.path.length === 0;
}

/**
 * Dotted path of a field, as written in a filter document
 */
export function fieldPath(field: IAstFilterField): string {
  return field.path.join('.');
}

export function fieldsEqual(a: IAstFilterField, b: IAstFilterField): boolean {
  return a.path.length === b.path.length && a.path.every((segment, i) => segment === b.path[i]);
}

export function exists(field: IAstFilterField, existsFlag = true): IAstExistsFilter {
  return { type: 'exists', field, exists: existsFlag };
}

export function comparison(
  operator: AstComparisonOperator,
  field: IAstFilterField,
  value: BsonValue
): IAstComparisonFilter {
  return { type: 'comparison', operator, field, value };
}

export function eq(field: IAstFilterField, value: BsonValue): IAstComparisonFilter {
  return comparison('$eq', field, value);
}

export function ne(field: IAstFilterField, value: BsonValue): IAstComparisonFilter {
  return comparison('$ne', field, value);
}

export function inValues(field: IAstFilterField, values: readonly BsonValue[]): IAstInFilter {
  return { type: 'in', field, values };
}

export function regex(field: IAstFilterField, pattern: string, flags = ''): IAstRegexFilter {
  return { type: 'regex', field, pattern, flags };
}

export function size(field: IAstFilterField, count: number): IAstSizeFilter {
  return { type: 'size', field, size: count };
}

export function elemMatch(field: IAstFilterField, filter: AstFilter): IAstElemMatchFilter {
  return { type: 'elemMatch', field, filter };
}

export function and(filters: readonly AstFilter[]): IAstAndFilter {
  return { type: 'and', filters };
}

export function or(filters: readonly AstFilter[]): IAstOrFilter {
  return { type: 'or', filters };
}

export function not(filter: AstFilter): IAstNotFilter {
  return { type: 'not', filter };
}

export function matchesEverything(): IAstMatchesEverythingFilter {
  return { type: 'matchesEverything' };
}

export function matchesNothing(): IAstMatchesNothingFilter {
  return { type: 'matchesNothing' };
}

export function isFieldOperation(filter: AstFilter): filter is AstFieldOperationFilter {
  return 'field' in filter;
}
