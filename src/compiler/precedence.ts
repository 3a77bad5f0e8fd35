import type { BinaryOperator, Expression, UnaryOperator } from '../expr/types.js';

// Binding strength, low → high. NOT sits between AND and the comparisons,
// `||` between the comparisons and additive arithmetic.
const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  OR: 1,
  AND: 2,
  '=': 4,
  '<>': 4,
  '!=': 4,
  '<': 4,
  '<=': 4,
  '>': 4,
  '>=': 4,
  LIKE: 4,
  'NOT LIKE': 4,
  ILIKE: 4,
  IN: 4,
  'NOT IN': 4,
  IS: 4,
  'IS NOT': 4,
  '||': 5,
  '+': 6,
  '-': 6,
  '*': 7,
  '/': 7,
  '%': 7,
};

const UNARY_PRECEDENCE: Readonly<Record<UnaryOperator, number>> = {
  NOT: 3,
  '-': 8,
  '+': 8,
};

const COMPARISON_LEVEL = 4;

/** Operators where `a op (b op c)` equals `(a op b) op c`. */
const ASSOCIATIVE: ReadonlySet<BinaryOperator> = new Set(['AND', 'OR', '+', '*', '||']);

export function binaryPrecedence(operator: BinaryOperator): number {
  return BINARY_PRECEDENCE[operator];
}

export function unaryPrecedence(operator: UnaryOperator): number {
  return UNARY_PRECEDENCE[operator];
}

function precedenceOf(expr: Expression): number {
  if (expr.kind === 'binary') return binaryPrecedence(expr.operator);
  if (expr.kind === 'unary') return unaryPrecedence(expr.operator);
  return Infinity;
}

function isLogical(operator: BinaryOperator): boolean {
  return operator === 'AND' || operator === 'OR';
}

/**
 * Whether `child`, rendered as the `side` operand of `parent`, must be
 * wrapped to keep its grouping. A child flagged `needsParentheses` wraps
 * itself and is never wrapped again here.
 */
export function operandNeedsParentheses(
  child: Expression,
  parent: BinaryOperator,
  side: 'left' | 'right',
): boolean {
  if (child.kind === 'binary' && child.needsParentheses) return false;

  const childLevel = precedenceOf(child);
  const parentLevel = binaryPrecedence(parent);
  if (childLevel < parentLevel) return true;
  if (child.kind !== 'binary') return false;

  // Mixed AND/OR is always spelled out, even where precedence would agree.
  if (isLogical(child.operator) && isLogical(parent) && child.operator !== parent) return true;

  if (childLevel === parentLevel) {
    if (childLevel === COMPARISON_LEVEL) return true;
    if (side === 'right') return !(child.operator === parent && ASSOCIATIVE.has(parent));
  }
  return false;
}

/** Whether the operand of a prefix operator must be wrapped. */
export function unaryOperandNeedsParentheses(operand: Expression, operator: UnaryOperator): boolean {
  if (operand.kind === 'binary' && operand.needsParentheses) return false;
  return precedenceOf(operand) < unaryPrecedence(operator);
}
