/**
 * Per-call translation state
 *
 * A context is never changed in place. Entering a nested lambda produces a new
 * context with the extra parameter binding; the enclosing context is left as
 * it was.
 */

import { IAstFilterField } from '../ast/types';
import { IParameterExpression } from '../expressions/types';
import { IBsonSerializer } from '../serialization/types';
import { ILogger, logger as defaultLogger } from '../utils/logger';

/**
 * A lambda parameter in scope
 */
export interface ITranslationSymbol {
  readonly parameter: IParameterExpression;
  readonly serializer: IBsonSerializer;

  /**
   * True for the element parameter of an `$elemMatch` predicate, whose
   * fields are relative to the current array element. False for the root
   * document parameter.
   */
  readonly isCurrent: boolean;
}

export interface ITranslationContextOptions {
  logger?: ILogger;
}

export class TranslationContext {
  private constructor(
    private readonly symbols: ReadonlyMap<string, ITranslationSymbol>,
    public readonly fieldScope: IAstFilterField | undefined,
    public readonly logger: ILogger
  ) {}

  /**
   * Create an empty context
   */
  public static create(options: ITranslationContextOptions = {}): TranslationContext {
    return new TranslationContext(new Map(), undefined, options.logger ?? defaultLogger);
  }

  /**
   * Create a context in which `parameter` denotes the root document
   */
  public static forRoot(
    parameter: IParameterExpression,
    serializer: IBsonSerializer,
    options: ITranslationContextOptions = {}
  ): TranslationContext {
    return TranslationContext.create(options).withSymbol({
      parameter,
      serializer,
      isCurrent: false
    });
  }

  /**
   * Return a context with an additional binding; an inner binding hides an
   * outer one with the same name
   */
  public withSymbol(symbol: ITranslationSymbol): TranslationContext {
    const symbols = new Map(this.symbols);
    symbols.set(symbol.parameter.name, symbol);
    return new TranslationContext(symbols, this.fieldScope, this.logger);
  }

  /**
   * Return a context for translating a predicate on the elements of `field`.
   * `parameter` becomes the current element; parameters bound by enclosing
   * scopes stay visible by name but no longer denote the current element.
   */
  public withElementScope(
    field: IAstFilterField,
    parameter: IParameterExpression,
    serializer: IBsonSerializer
  ): TranslationContext {
    const symbols = new Map<string, ITranslationSymbol>();
    for (const [name, symbol] of this.symbols) {
      symbols.set(name, symbol.isCurrent ? { ...symbol, isCurrent: false } : symbol);
    }
    symbols.set(parameter.name, { parameter, serializer, isCurrent: true });
    return new TranslationContext(symbols, field, this.logger);
  }

  public tryGetSymbol(parameter: IParameterExpression): ITranslationSymbol | undefined {
    return this.symbols.get(parameter.name);
  }

  public get symbolNames(): string[] {
    return Array.from(this.symbols.keys());
  }
}
