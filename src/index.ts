/**
 * docfilter - Typed predicate expressions to MongoDB filters
 *
 * docfilter translates boolean predicates over a mapped document model into
 * a Filter AST and renders it as a MongoDB filter document. Predicates can be
 * built with the expression factories or parsed from Lucene-style query
 * strings.
 */

import type { Document } from 'bson';
import { renderFilter } from './ast/render';
import { AstFilter } from './ast/types';
import { ILambdaExpression } from './expressions/types';
import { QueryParseError, QueryParser } from './parser/parser';
import { IParserOptions, QueryModel } from './parser/types';
import { ISecurityOptions } from './security/types';
import { FilterSecurityValidator } from './security/validator';
import { ClassSerializer } from './serialization/class-map';
import { UnsupportedExpressionError } from './translation/errors';
import { FilterTranslator } from './translators/filter';
import { ILogger, logger as defaultLogger } from './utils/logger';

/**
 * Options for creating a new docfilter instance
 */
export interface IDocFilterOptions {
  /**
   * The class map (or the serializer built from it) of the documents being
   * filtered
   */
  model: QueryModel;

  /**
   * Security options; when given, every translated filter is validated
   */
  security?: ISecurityOptions;

  /**
   * Options for the query-string parser
   */
  parser?: IParserOptions;

  /**
   * Logger for translation entries
   */
  logger?: ILogger;
}

/**
 * A translated predicate
 */
export interface IDocFilterResult {
  /**
   * The predicate that was translated
   */
  expression: ILambdaExpression;

  /**
   * The Filter AST
   */
  filter: AstFilter;

  /**
   * Render the filter as a MongoDB filter document
   */
  toDocument(): Document;
}

/**
 * Public docfilter type
 */
export type DocFilter = {
  /**
   * Translate a predicate lambda, or parse and translate a query string
   *
   * @throws {QueryParseError} If a query string is invalid
   * @throws {UnsupportedExpressionError} If the predicate has no filter equivalent
   * @throws {FilterSecurityError} If security options are set and the filter violates them
   */
  where(predicate: ILambdaExpression | string): IDocFilterResult;

  /**
   * Check if a predicate or query string can be translated
   */
  canTranslate(predicate: ILambdaExpression | string): boolean;
};

/**
 * Create a new docfilter instance
 *
 * @example
 * ```typescript
 * const people = new ClassMap('Person')
 *   .mapMember('Name', { serializer: new StringSerializer() })
 *   .mapMember('Tags', {
 *     serializer: new DictionarySerializer('Document', new StringSerializer(), new Int32Serializer())
 *   });
 *
 * const docFilter = createDocFilter({ model: people });
 * docFilter.where('Tags:red').toDocument(); // { 'Tags.red': { $exists: true } }
 * ```
 */
export function createDocFilter(options: IDocFilterOptions): DocFilter {
  const serializer =
    options.model instanceof ClassSerializer ? options.model : new ClassSerializer(options.model);
  const logger = options.logger ?? defaultLogger;
  const parser = new QueryParser(options.parser);
  const translator = new FilterTranslator(serializer, { logger });
  const securityValidator = options.security
    ? new FilterSecurityValidator(options.security)
    : undefined;

  const toLambda = (predicate: ILambdaExpression | string): ILambdaExpression =>
    typeof predicate === 'string' ? parser.parse(predicate, serializer) : predicate;

  const where = (predicate: ILambdaExpression | string): IDocFilterResult => {
    const expression = toLambda(predicate);
    const filter = translator.translate(expression);
    securityValidator?.validate(filter);

    return {
      expression,
      filter,
      toDocument: () => renderFilter(filter)
    };
  };

  return {
    where,
    canTranslate: (predicate: ILambdaExpression | string): boolean => {
      try {
        return translator.canTranslate(toLambda(predicate));
      } catch (error) {
        if (error instanceof QueryParseError || error instanceof UnsupportedExpressionError) {
          return false;
        }
        throw error;
      }
    }
  };
}

/**
 * Create a new QueryParser instance
 */
export function createQueryParser(options?: IParserOptions): QueryParser {
  return new QueryParser(options);
}

// Expression and filter factories share names such as `not`, so each set is
// exported under its own namespace
export * as Expr from './expressions/factory';
export * as Filters from './ast/factory';

export * from './expressions/types';
export * from './expressions/type-refs';
export * from './expressions/methods';
export * from './expressions/printer';
export * from './ast/types';
export * from './ast/render';
export * from './serialization';
export * from './translation';
export * from './translators';
export * from './parser';
export * from './security';
export * from './config/debug';
export * from './utils/logger';
