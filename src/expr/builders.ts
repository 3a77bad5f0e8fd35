import { InvalidSortDirectionError } from '../errors.js';
import type {
  BinaryOperation,
  BinaryOperator,
  CaseBranch,
  CaseExpression,
  Column,
  ColumnReference,
  Expression,
  FrameBound,
  FunctionExpression,
  LiteralExpression,
  LiteralValue,
  OrderByClause,
  SortDirection,
  UnaryOperation,
  UnaryOperator,
  WindowFrame,
  WindowSpec,
} from './types.js';

/** Anything a builder accepts as an operand: an expression or a plain value. */
export type Operand = Expression | LiteralValue;

export type SortToken = SortDirection | Lowercase<SortDirection> | Capitalize<Lowercase<SortDirection>>;

/**
 * One ORDER BY entry as callers may write it: a bare expression (ascending),
 * an `[expression, direction]` pair, or a ready OrderByClause.
 */
export type OrderSpec = Expression | OrderByClause | readonly [Expression, SortToken];

const EXPRESSION_KINDS: ReadonlySet<string> = new Set([
  'literal',
  'column_ref',
  'binary',
  'unary',
  'function',
  'case',
]);

export function isExpression(value: unknown): value is Expression {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Date) {
    return false;
  }
  const kind: unknown = Reflect.get(value, 'kind');
  return typeof kind === 'string' && EXPRESSION_KINDS.has(kind);
}

export function toExpression(operand: Operand): Expression {
  return isExpression(operand) ? operand : lit(operand);
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

export function lit(value: LiteralValue): LiteralExpression {
  return { kind: 'literal', value };
}

export function col(name: string, table?: string): ColumnReference {
  return table === undefined ? { kind: 'column_ref', name } : { kind: 'column_ref', name, table };
}

/** `*`, or `table.*` when qualified. */
export function star(table?: string): ColumnReference {
  return col('*', table);
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export function binary(
  left: Operand,
  operator: BinaryOperator,
  right: Operand,
  options: { parenthesize?: boolean } = {},
): BinaryOperation {
  return {
    kind: 'binary',
    left: toExpression(left),
    operator,
    right: toExpression(right),
    needsParentheses: options.parenthesize ?? false,
  };
}

/** Marks a binary node to always render inside parentheses. */
export function paren(expr: Expression): Expression {
  if (expr.kind !== 'binary' || expr.needsParentheses) return expr;
  return { ...expr, needsParentheses: true };
}

export function unary(operator: UnaryOperator, operand: Operand): UnaryOperation {
  return { kind: 'unary', operator, operand: toExpression(operand) };
}

export const eq = (l: Operand, r: Operand): BinaryOperation => binary(l, '=', r);
export const neq = (l: Operand, r: Operand): BinaryOperation => binary(l, '<>', r);
export const lt = (l: Operand, r: Operand): BinaryOperation => binary(l, '<', r);
export const lte = (l: Operand, r: Operand): BinaryOperation => binary(l, '<=', r);
export const gt = (l: Operand, r: Operand): BinaryOperation => binary(l, '>', r);
export const gte = (l: Operand, r: Operand): BinaryOperation => binary(l, '>=', r);
export const like = (l: Operand, pattern: Operand): BinaryOperation => binary(l, 'LIKE', pattern);
export const notLike = (l: Operand, pattern: Operand): BinaryOperation => binary(l, 'NOT LIKE', pattern);
export const ilike = (l: Operand, pattern: Operand): BinaryOperation => binary(l, 'ILIKE', pattern);
export const isIn = (l: Operand, values: readonly LiteralValue[] | Expression): BinaryOperation =>
  binary(l, 'IN', isExpression(values) ? values : lit(values));
export const notIn = (l: Operand, values: readonly LiteralValue[] | Expression): BinaryOperation =>
  binary(l, 'NOT IN', isExpression(values) ? values : lit(values));
export const isNull = (e: Operand): BinaryOperation => binary(e, 'IS', null);
export const isNotNull = (e: Operand): BinaryOperation => binary(e, 'IS NOT', null);

export const add = (l: Operand, r: Operand): BinaryOperation => binary(l, '+', r);
export const sub = (l: Operand, r: Operand): BinaryOperation => binary(l, '-', r);
export const mul = (l: Operand, r: Operand): BinaryOperation => binary(l, '*', r);
export const div = (l: Operand, r: Operand): BinaryOperation => binary(l, '/', r);
export const mod = (l: Operand, r: Operand): BinaryOperation => binary(l, '%', r);
export const concat = (l: Operand, r: Operand): BinaryOperation => binary(l, '||', r);

export const not = (e: Operand): UnaryOperation => unary('NOT', e);
export const neg = (e: Operand): UnaryOperation => unary('-', e);

function fold(operator: 'AND' | 'OR', first: Operand, rest: readonly Operand[]): Expression {
  return rest.reduce<Expression>((acc, next) => binary(acc, operator, next), toExpression(first));
}

/** Left-folds its operands: and(a, b, c) is (a AND b) AND c. */
export function and(first: Operand, ...rest: Operand[]): Expression {
  return fold('AND', first, rest);
}

export function or(first: Operand, ...rest: Operand[]): Expression {
  return fold('OR', first, rest);
}

export function caseWhen(
  branches: readonly (readonly [Operand, Operand])[],
  otherwise?: Operand,
): CaseExpression {
  const mapped: CaseBranch[] = branches.map(([when, then]) => ({
    when: toExpression(when),
    then: toExpression(then),
  }));
  return otherwise === undefined
    ? { kind: 'case', branches: mapped }
    : { kind: 'case', branches: mapped, else: toExpression(otherwise) };
}

// ---------------------------------------------------------------------------
// Functions
// ---------------------------------------------------------------------------

export function fn(name: string, ...args: Operand[]): FunctionExpression {
  return { kind: 'function', name, args: args.map(toExpression), functionKind: 'scalar' };
}

export function agg(
  name: string,
  args: readonly Operand[],
  options: { distinct?: boolean } = {},
): FunctionExpression {
  const node: FunctionExpression = {
    kind: 'function',
    name,
    args: args.map(toExpression),
    functionKind: 'aggregate',
  };
  return options.distinct === true ? { ...node, distinct: true } : node;
}

/** COUNT(*) when called without an operand. */
export function count(operand?: Operand, options: { distinct?: boolean } = {}): FunctionExpression {
  return agg('COUNT', [operand === undefined ? star() : operand], options);
}

export const sum = (e: Operand): FunctionExpression => agg('SUM', [e]);
export const avg = (e: Operand): FunctionExpression => agg('AVG', [e]);
export const min = (e: Operand): FunctionExpression => agg('MIN', [e]);
export const max = (e: Operand): FunctionExpression => agg('MAX', [e]);

function windowFn(name: string): FunctionExpression {
  return {
    kind: 'function',
    name,
    args: [],
    functionKind: 'window',
    window: { partitionBy: [], orderBy: [] },
  };
}

export const rowNumber = (): FunctionExpression => windowFn('ROW_NUMBER');
export const rank = (): FunctionExpression => windowFn('RANK');
export const denseRank = (): FunctionExpression => windowFn('DENSE_RANK');

export interface WindowOptions {
  partitionBy?: readonly Operand[];
  orderBy?: readonly OrderSpec[];
  frame?: WindowFrame;
}

/** Turns any function call into a window call: `fn(...) OVER (...)`. */
export function over(call: FunctionExpression, options: WindowOptions = {}): FunctionExpression {
  const window: WindowSpec = {
    partitionBy: (options.partitionBy ?? []).map(toExpression),
    orderBy: (options.orderBy ?? []).map(toOrderByClause),
    ...(options.frame !== undefined ? { frame: options.frame } : {}),
  };
  return { ...call, functionKind: 'window', window };
}

export function rows(preceding: FrameBound, following: FrameBound): WindowFrame {
  return { unit: 'ROWS', preceding, following };
}

export function range(preceding: FrameBound, following: FrameBound): WindowFrame {
  return { unit: 'RANGE', preceding, following };
}

// ---------------------------------------------------------------------------
// Select-list and ordering helpers
// ---------------------------------------------------------------------------

export function alias(expr: Operand, name: string): Column {
  return { kind: 'column', expression: toExpression(expr), alias: name };
}

export function toColumn(item: Column | Expression): Column {
  return item.kind === 'column' ? item : { kind: 'column', expression: item };
}

export const asc = (e: Operand): OrderByClause => ({ expression: toExpression(e), direction: 'ASC' });
export const desc = (e: Operand): OrderByClause => ({ expression: toExpression(e), direction: 'DESC' });

export function parseSortDirection(token: string): SortDirection {
  const upper = token.toUpperCase();
  if (upper === 'ASC' || upper === 'DESC') return upper;
  throw new InvalidSortDirectionError(token);
}

export function toOrderByClause(spec: OrderSpec): OrderByClause {
  if (isExpression(spec)) {
    return { expression: spec, direction: 'ASC' };
  }
  if (isOrderPair(spec)) {
    const [expression, token] = spec;
    return { expression, direction: parseSortDirection(token) };
  }
  return { expression: spec.expression, direction: parseSortDirection(spec.direction) };
}

function isOrderPair(spec: OrderSpec): spec is readonly [Expression, SortToken] {
  return Array.isArray(spec);
}

// ---------------------------------------------------------------------------
// Structural equality
// ---------------------------------------------------------------------------

export function isLiteralList(value: LiteralValue): value is readonly LiteralValue[] {
  return Array.isArray(value);
}

function literalsEqual(a: LiteralValue, b: LiteralValue): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (isLiteralList(a) || isLiteralList(b)) {
    if (!isLiteralList(a) || !isLiteralList(b) || a.length !== b.length) return false;
    const right = b;
    return a.every((item, i) => {
      const other = right[i];
      return other !== undefined && literalsEqual(item, other);
    });
  }
  return a === b;
}

function listsEqual(a: readonly Expression[], b: readonly Expression[]): boolean {
  return a.length === b.length && a.every((item, i) => {
    const other = b[i];
    return other !== undefined && expressionsEqual(item, other);
  });
}

function windowsEqual(a: WindowSpec | undefined, b: WindowSpec | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (!listsEqual(a.partitionBy, b.partitionBy)) return false;
  if (a.orderBy.length !== b.orderBy.length) return false;
  const orderEqual = a.orderBy.every((clause, i) => {
    const other = b.orderBy[i];
    return other !== undefined
      && clause.direction === other.direction
      && expressionsEqual(clause.expression, other.expression);
  });
  if (!orderEqual) return false;
  if (a.frame === undefined || b.frame === undefined) return a.frame === b.frame;
  return a.frame.unit === b.frame.unit
    && a.frame.preceding === b.frame.preceding
    && a.frame.following === b.frame.following;
}

/**
 * Structural equality over expression trees. Forced parentheses are
 * ignored: `a + 1` and `(a + 1)` are the same expression.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'literal':
      return b.kind === 'literal' && literalsEqual(a.value, b.value);
    case 'column_ref':
      return b.kind === 'column_ref' && a.name === b.name && a.table === b.table;
    case 'binary':
      return b.kind === 'binary'
        && a.operator === b.operator
        && expressionsEqual(a.left, b.left)
        && expressionsEqual(a.right, b.right);
    case 'unary':
      return b.kind === 'unary' && a.operator === b.operator && expressionsEqual(a.operand, b.operand);
    case 'function':
      return b.kind === 'function'
        && a.name.toUpperCase() === b.name.toUpperCase()
        && a.functionKind === b.functionKind
        && (a.distinct ?? false) === (b.distinct ?? false)
        && listsEqual(a.args, b.args)
        && windowsEqual(a.window, b.window);
    case 'case': {
      if (b.kind !== 'case' || a.branches.length !== b.branches.length) return false;
      const branchesEqual = a.branches.every((branch, i) => {
        const other = b.branches[i];
        return other !== undefined
          && expressionsEqual(branch.when, other.when)
          && expressionsEqual(branch.then, other.then);
      });
      if (!branchesEqual) return false;
      if (a.else === undefined || b.else === undefined) return a.else === b.else;
      return expressionsEqual(a.else, b.else);
    }
  }
}
