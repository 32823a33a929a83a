/**
 * Filter AST types
 *
 * The Filter AST mirrors the MongoDB query-filter grammar. It is independent of
 * the final encoding: `renderFilter` turns it into a filter document.
 */

import { BsonValue } from '../serialization/bson-value';

/**
 * A resolved field path.
 *
 * The path is relative to the document root, or to the current array element
 * when the node sits inside an `$elemMatch`. An empty path denotes the current
 * element itself.
 */
export interface IAstFilterField {
  readonly kind: 'field';
  readonly path: readonly string[];
}

/**
 * Field comparison operators
 */
export type AstComparisonOperator = '$eq' | '$ne' | '$gt' | '$gte' | '$lt' | '$lte';

export interface IAstExistsFilter {
  readonly type: 'exists';
  readonly field: IAstFilterField;
  readonly exists: boolean;
}

export interface IAstComparisonFilter {
  readonly type: 'comparison';
  readonly operator: AstComparisonOperator;
  readonly field: IAstFilterField;
  readonly value: BsonValue;
}

export interface IAstInFilter {
  readonly type: 'in';
  readonly field: IAstFilterField;
  readonly values: readonly BsonValue[];
}

export interface IAstRegexFilter {
  readonly type: 'regex';
  readonly field: IAstFilterField;
  readonly pattern: string;
  readonly flags: string;
}

export interface IAstSizeFilter {
  readonly type: 'size';
  readonly field: IAstFilterField;
  readonly size: number;
}

export interface IAstElemMatchFilter {
  readonly type: 'elemMatch';
  readonly field: IAstFilterField;
  readonly filter: AstFilter;
}

export interface IAstAndFilter {
  readonly type: 'and';
  readonly filters: readonly AstFilter[];
}

export interface IAstOrFilter {
  readonly type: 'or';
  readonly filters: readonly AstFilter[];
}

export interface IAstNotFilter {
  readonly type: 'not';
  readonly filter: AstFilter;
}

export interface IAstMatchesEverythingFilter {
  readonly type: 'matchesEverything';
}

export interface IAstMatchesNothingFilter {
  readonly type: 'matchesNothing';
}

/**
 * Filters that apply an operator to a single field
 */
export type AstFieldOperationFilter =
  | IAstExistsFilter
  | IAstComparisonFilter
  | IAstInFilter
  | IAstRegexFilter
  | IAstSizeFilter
  | IAstElemMatchFilter;

/**
 * Any node of the Filter AST
 */
export type AstFilter =
  | AstFieldOperationFilter
  | IAstAndFilter
  | IAstOrFilter
  | IAstNotFilter
  | IAstMatchesEverythingFilter
  | IAstMatchesNothingFilter;

export type AstFilterType = AstFilter['type'];
