/**
 * docfilter Translator Types
 *
 * These are the core interfaces for translators, which convert a predicate
 * lambda into a filter the document store can evaluate.
 */

import { ILambdaExpression } from '../expressions/types';
import { ILogger, logger } from '../utils/logger';

/**
 * Options for configuring a translator
 */
export interface ITranslatorOptions {
  /**
   * Logger receiving dispatch and field resolution entries
   */
  logger?: ILogger;
}

export const DEFAULT_TRANSLATOR_OPTIONS: Required<ITranslatorOptions> = {
  logger
};

/**
 * Interface for a predicate translator
 */
export interface ITranslator<T = unknown> {
  /**
   * Translate a predicate into the target format
   *
   * @param predicate A lambda with a single parameter denoting the document
   * @returns The translated filter in the target format
   */
  translate(predicate: ILambdaExpression): T;

  /**
   * Check if a predicate can be translated
   *
   * @param predicate The predicate to check
   * @returns true if the predicate can be translated, false otherwise
   */
  canTranslate(predicate: ILambdaExpression): boolean;
}
