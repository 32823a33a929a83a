/**
 * Filter AST translator for docfilter
 *
 * This translator converts a predicate lambda into a Filter AST, resolving
 * every field against the serializer of the root document.
 */

import { AstFilter } from '../../ast/types';
import { printExpression } from '../../expressions/printer';
import { typeName, typesEqual } from '../../expressions/type-refs';
import { ILambdaExpression } from '../../expressions/types';
import { IBsonSerializer } from '../../serialization/types';
import { TranslationContext } from '../../translation/context';
import { translateFilter } from '../../translation/dispatcher';
import { UnsupportedExpressionError } from '../../translation/errors';
import { DEFAULT_TRANSLATOR_OPTIONS, ITranslator, ITranslatorOptions } from '../types';

/**
 * Translates predicate lambdas into Filter AST nodes
 *
 * @example
 * ```typescript
 * const translator = new FilterTranslator(new ClassSerializer(personMap));
 * translator.translate(lambda([x], call(personMap.property(x, 'Tags'), Methods.containsKey(tagsType), [constant('red')])));
 * // { type: 'exists', field: { kind: 'field', path: ['Tags', 'red'] }, exists: true }
 * ```
 */
export class FilterTranslator implements ITranslator<AstFilter> {
  private options: Required<ITranslatorOptions>;

  constructor(
    private readonly serializer: IBsonSerializer,
    options: ITranslatorOptions = {}
  ) {
    this.options = {
      logger: options.logger ?? DEFAULT_TRANSLATOR_OPTIONS.logger
    };
  }

  /**
   * Translate a predicate into a Filter AST
   *
   * @throws {UnsupportedExpressionError} If the predicate, or any part of it,
   * has no filter equivalent
   */
  public translate(predicate: ILambdaExpression): AstFilter {
    if (predicate.parameters.length !== 1) {
      throw new UnsupportedExpressionError(
        predicate,
        `a filter predicate takes exactly one parameter but this one takes ${predicate.parameters.length}`
      );
    }

    const [parameter] = predicate.parameters;
    if (!typesEqual(parameter.type, this.serializer.valueType)) {
      throw new UnsupportedExpressionError(
        predicate,
        `parameter ${parameter.name} has type ${typeName(parameter.type)} but the documents are ${typeName(this.serializer.valueType)}`
      );
    }

    if (this.options.logger.isDebugEnabled('dispatch')) {
      this.options.logger.debug('dispatch', 'Translating predicate', {
        predicate: printExpression(predicate)
      });
    }

    const context = TranslationContext.forRoot(parameter, this.serializer, {
      logger: this.options.logger
    });
    return this.translateWithContext(context, predicate.body);
  }

  /**
   * Translate a predicate body in a caller-built context
   */
  public translateWithContext(context: TranslationContext, body: ILambdaExpression['body']): AstFilter {
    return translateFilter(context, body);
  }

  /**
   * Check if a predicate can be translated
   */
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
