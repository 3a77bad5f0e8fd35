import type { Column, Expression, OrderByClause } from '../expr/types.js';
import type { DataSource } from '../source/types.js';

export interface GroupByClause {
  readonly expressions: readonly Expression[];
}

export interface CommonTableExpression {
  readonly name: string;
  /** Raw SQL text or a query compiled in the same dialect. */
  readonly body: QueryDefinition | string;
  readonly columns: readonly string[];
  readonly isRecursive: boolean;
}

export interface QueryState {
  readonly columns: readonly Column[];
  readonly source: DataSource | null;
  readonly filter: Expression | null;
  readonly groupBy: GroupByClause | null;
  readonly having: Expression | null;
  readonly qualify: Expression | null;
  readonly orderBy: readonly OrderByClause[];
  readonly limit: number | null;
  readonly offset: number | null;
  readonly distinct: boolean;
  readonly ctes: readonly CommonTableExpression[];
}

/**
 * Opaque query value consumed by the compiler.
 * Built via the query DSL; do not construct directly.
 */
export interface QueryDefinition {
  readonly _state: QueryState;
}
