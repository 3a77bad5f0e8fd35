export type LiteralValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | readonly LiteralValue[];

export type LogicalOperator = 'AND' | 'OR';

export type ComparisonOperator =
  | '='
  | '<>'
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'LIKE'
  | 'NOT LIKE'
  | 'ILIKE'
  | 'IN'
  | 'NOT IN'
  | 'IS'
  | 'IS NOT';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '||';

export type BinaryOperator = LogicalOperator | ComparisonOperator | ArithmeticOperator;

export type UnaryOperator = 'NOT' | '-' | '+';

export type FunctionKind = 'scalar' | 'aggregate' | 'window';

export type SortDirection = 'ASC' | 'DESC';

export interface LiteralExpression {
  readonly kind: 'literal';
  readonly value: LiteralValue;
}

export interface ColumnReference {
  readonly kind: 'column_ref';
  readonly name: string;
  /** Source-table qualifier (table name or alias). */
  readonly table?: string;
}

export interface BinaryOperation {
  readonly kind: 'binary';
  readonly left: Expression;
  readonly operator: BinaryOperator;
  readonly right: Expression;
  /** Forces parentheses around this node regardless of precedence. */
  readonly needsParentheses: boolean;
}

export interface UnaryOperation {
  readonly kind: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface FunctionExpression {
  readonly kind: 'function';
  readonly name: string;
  readonly args: readonly Expression[];
  readonly functionKind: FunctionKind;
  /** Aggregates only: renders NAME(DISTINCT ...). */
  readonly distinct?: boolean;
  /** Window functions only. */
  readonly window?: WindowSpec;
}

export interface CaseBranch {
  readonly when: Expression;
  readonly then: Expression;
}

export interface CaseExpression {
  readonly kind: 'case';
  readonly branches: readonly CaseBranch[];
  readonly else?: Expression;
}

export type Expression =
  | LiteralExpression
  | ColumnReference
  | BinaryOperation
  | UnaryOperation
  | FunctionExpression
  | CaseExpression;

/**
 * A select-list entry. The only node that carries a display name; it is
 * never an operand of another expression.
 */
export interface Column {
  readonly kind: 'column';
  readonly expression: Expression;
  readonly alias?: string;
}

export interface OrderByClause {
  readonly expression: Expression;
  readonly direction: SortDirection;
}

export const UNBOUNDED = 'UNBOUNDED' as const;

/**
 * Distance from the current row. `UNBOUNDED` reaches the partition edge,
 * `0` is the current row.
 */
export type FrameBound = number | typeof UNBOUNDED;

export interface WindowFrame {
  readonly unit: 'ROWS' | 'RANGE';
  readonly preceding: FrameBound;
  readonly following: FrameBound;
}

export interface WindowSpec {
  readonly partitionBy: readonly Expression[];
  readonly orderBy: readonly OrderByClause[];
  readonly frame?: WindowFrame;
}
