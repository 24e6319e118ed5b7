import { AstNode } from './types';
import { assertNever, toExpression } from './kinds';

/**
 * Render an expression subtree as display text. Total: unknown shapes
 * degrade to the concatenation of their children.
 */
export function formatExpression(node: AstNode | undefined | null): string {
  if (!node) {
    return '';
  }

  const expr = toExpression(node);
  switch (expr.kind) {
    case 'variable':
      return expr.name;
    case 'constant':
      return expr.value;
    case 'comparison':
    case 'binary':
      // Operands beyond the first two are not rendered
      return `(${formatExpression(expr.left)} ${expr.operator.symbol} ${formatExpression(expr.right)})`;
    case 'logical':
      return `(${expr.operands.map(formatExpression).join(expr.operator.symbol)})`;
    case 'unary':
      return expr.operand ? `${expr.operator.symbol}(${formatExpression(expr.operand)})` : '';
    case 'ternary':
      return `${formatExpression(expr.condition)} ? ${formatExpression(expr.whenTrue)} : ${formatExpression(expr.whenFalse)}`;
    case 'structural':
    case 'other':
      return expr.node.children.map(formatExpression).join('');
    default:
      return assertNever(expr);
  }
}
