/**
 * MongoDB filter document translator for docfilter
 *
 * This translator converts a predicate lambda into a filter document that can
 * be passed to a MongoDB driver's `find`.
 */

import type { Document } from 'bson';
import { FilterRenderError, renderFilter } from '../../ast/render';
import { ILambdaExpression } from '../../expressions/types';
import { IBsonSerializer } from '../../serialization/types';
import { UnsupportedExpressionError } from '../../translation/errors';
import { FilterTranslator } from '../filter';
import { ITranslator, ITranslatorOptions } from '../types';

/**
 * Translates predicate lambdas into MongoDB filter documents
 */
export class MongoFilterTranslator implements ITranslator<Document> {
  private readonly filterTranslator: FilterTranslator;

  constructor(serializer: IBsonSerializer, options: ITranslatorOptions = {}) {
    this.filterTranslator = new FilterTranslator(serializer, options);
  }

  /**
   * Translate a predicate into a filter document
   *
   * @throws {UnsupportedExpressionError} If the predicate has no filter
   * equivalent
   */
  public translate(predicate: ILambdaExpression): Document {
    const filter = this.filterTranslator.translate(predicate);
    try {
      return renderFilter(filter);
    } catch (error) {
      if (error instanceof FilterRenderError) {
        throw new UnsupportedExpressionError(predicate, error.message, { cause: error });
      }
      throw error;
    }
  }

  public canTranslate(predicate: ILambdaExpression): boolean {
    try {
      this.translate(predicate);
      return true;
    } catch (error) {
      if (error instanceof UnsupportedExpressionError) {
        return false;
      }
      throw error;
    }
  }
}
