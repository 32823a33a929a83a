/**
 * Core types for docfilter's query-string parser
 */

import { Expression, ILambdaExpression } from '../expressions/types';
import { ClassMap, ClassSerializer } from '../serialization/class-map';
import { IBsonSerializer } from '../serialization/types';

/**
 * The model a query is parsed against: a class map, or the serializer built
 * from one
 */
export type QueryModel = ClassMap | ClassSerializer;

/**
 * A field path of a query resolved against the model
 */
export interface IResolvedQueryField {
  /**
   * Member and index chain denoting the field
   */
  expression: Expression;

  /**
   * Serializer of the values stored at the field
   */
  serializer: IBsonSerializer;
}

/**
 * Configuration options for the parser
 */
export interface IParserOptions {
  /**
   * Whether to allow case-insensitive field names
   */
  caseInsensitiveFields?: boolean;

  /**
   * Custom field name mappings
   */
  fieldMappings?: Record<string, string>;

  /**
   * Name of the document parameter of the produced lambda
   */
  parameterName?: string;
}

/**
 * Interface for the query parser
 */
export interface IQueryParser {
  /**
   * Parse a query string into a predicate over the model's documents
   * @param query The query string to parse
   * @param model The class map the field names refer to
   * @returns A lambda with a single document parameter
   * @throws {QueryParseError} If the query is invalid
   */
  parse(query: string, model: QueryModel): ILambdaExpression;

  /**
   * Validate a query string against a model
   * @returns true if the query is valid, false otherwise
   */
  validate(query: string, model: QueryModel): boolean;
}
