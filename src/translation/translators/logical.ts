import { and, not, or } from '../../ast/factory';
import { AstFilter } from '../../ast/types';
import { IBinaryExpression, INotExpression } from '../../expressions/types';
import { TranslationContext } from '../context';
import { translateFilter } from '../dispatcher';

/**
 * `left && right`; operands keep their source order and nested
 * conjunctions are not flattened
 */
export function translateAndAlso(context: TranslationContext, expression: IBinaryExpression): AstFilter {
  return and([translateFilter(context, expression.left), translateFilter(context, expression.right)]);
}

export function translateOrElse(context: TranslationContext, expression: IBinaryExpression): AstFilter {
  return or([translateFilter(context, expression.left), translateFilter(context, expression.right)]);
}

export function translateNot(context: TranslationContext, expression: INotExpression): AstFilter {
  return not(translateFilter(context, expression.operand));
}
