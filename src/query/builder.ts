import {
  InvalidFilterConditionError,
  InvalidJoinTargetError,
  MissingSourceError,
} from '../errors.js';
import {
  expressionsEqual,
  isExpression,
  lit,
  toColumn,
  toOrderByClause,
  type OrderSpec,
} from '../expr/builders.js';
import type { Column, Expression, OrderByClause } from '../expr/types.js';
import { countSubqueries, isTableReference, subquery } from '../source/builders.js';
import type { DataSource, JoinType, TableReference } from '../source/types.js';
import type { CommonTableExpression, QueryDefinition, QueryState } from './types.js';
import { DEFAULT_DIALECT, compile, type CompileOptions } from '../compiler/index.js';

export const EMPTY_STATE: QueryState = {
  columns: [],
  source: null,
  filter: null,
  groupBy: null,
  having: null,
  qualify: null,
  orderBy: [],
  limit: null,
  offset: null,
  distinct: false,
  ctes: [],
};

export type JoinTarget = Query | TableReference;

export interface CteOptions {
  columns?: readonly string[];
  recursive?: boolean;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const kind: unknown = Reflect.get(value, 'kind');
    return typeof kind === 'string' ? `${kind} node` : 'object';
  }
  return typeof value;
}

/**
 * Combines a new condition into an optional existing one using AND.
 * The first condition is installed as-is.
 */
function combineCondition(
  existing: Expression | null,
  condition: Expression,
  clause: 'filter' | 'having' | 'qualify',
): Expression {
  if (!isExpression(condition)) {
    throw new InvalidFilterConditionError(clause, describeValue(condition));
  }
  if (existing === null) return condition;
  return { kind: 'binary', left: existing, operator: 'AND', right: condition, needsParentheses: false };
}

/**
 * Appends ORDER BY entries, dropping any whose expression already appears.
 * The earliest occurrence keeps its direction.
 */
function mergeOrderBy(existing: readonly OrderByClause[], specs: readonly OrderSpec[]): OrderByClause[] {
  const merged = [...existing];
  for (const spec of specs) {
    const clause = toOrderByClause(spec);
    if (!merged.some((m) => expressionsEqual(m.expression, clause.expression))) {
      merged.push(clause);
    }
  }
  return merged;
}

/**
 * A bare-table query contributes its table directly to a join; anything
 * with clauses of its own must stay a subquery.
 */
function isBareTable(state: QueryState): state is QueryState & { source: TableReference } {
  return state.source !== null
    && state.source.kind === 'table'
    && state.columns.length === 0
    && state.filter === null
    && state.groupBy === null
    && state.having === null
    && state.qualify === null
    && state.orderBy.length === 0
    && state.limit === null
    && state.offset === null
    && !state.distinct
    && state.ctes.length === 0;
}

/**
 * Fluent immutable query value. Implements QueryDefinition so it can be
 * handed straight to the compiler. Every operation returns a new Query
 * sharing unchanged slots with its predecessor; instances are never
 * mutated.
 */
export class Query implements QueryDefinition {
  constructor(readonly _state: QueryState = EMPTY_STATE) {}

  private next(patch: Partial<QueryState>): Query {
    return new Query({ ...this._state, ...patch });
  }

  /** Replace the select list. */
  select(...items: (Column | Expression)[]): Query {
    return this.next({ columns: items.map(toColumn) });
  }

  /** Append to the select list; duplicates are kept. */
  extend(...items: (Column | Expression)[]): Query {
    return this.next({ columns: [...this._state.columns, ...items.map(toColumn)] });
  }

  /** Add a WHERE condition, AND-ed with any existing one. */
  filter(condition: Expression): Query {
    return this.next({ filter: combineCondition(this._state.filter, condition, 'filter') });
  }

  /** Replace the GROUP BY clause wholesale. */
  groupBy(...expressions: Expression[]): Query {
    return this.next({ groupBy: { expressions } });
  }

  having(condition: Expression): Query {
    return this.next({ having: combineCondition(this._state.having, condition, 'having') });
  }

  /** Filter on window-function results (DuckDB QUALIFY). */
  qualify(condition: Expression): Query {
    return this.next({ qualify: combineCondition(this._state.qualify, condition, 'qualify') });
  }

  orderBy(...specs: OrderSpec[]): Query {
    return this.next({ orderBy: mergeOrderBy(this._state.orderBy, specs) });
  }

  limit(n: number): Query {
    return this.next({ limit: n });
  }

  offset(n: number): Query {
    return this.next({ offset: n });
  }

  distinctRows(): Query {
    return this.next({ distinct: true });
  }

  /** Append a CTE. Names are not checked for collisions. */
  withCte(name: string, body: QueryDefinition | string, options: CteOptions = {}): Query {
    const cte: CommonTableExpression = {
      name,
      body,
      columns: options.columns ?? [],
      isRecursive: options.recursive ?? false,
    };
    return this.next({ ctes: [...this._state.ctes, cte] });
  }

  join(right: JoinTarget, condition: Expression, joinType: JoinType = 'INNER'): Query {
    const left = this._state.source;
    if (left === null) {
      throw new MissingSourceError('join', 'Cannot join a query that has no data source');
    }
    const source: DataSource = {
      kind: 'join',
      left,
      right: this.resolveJoinTarget(right, left),
      joinType,
      condition,
    };
    return this.next({ source });
  }

  leftJoin(right: JoinTarget, condition: Expression): Query {
    return this.join(right, condition, 'LEFT');
  }

  rightJoin(right: JoinTarget, condition: Expression): Query {
    return this.join(right, condition, 'RIGHT');
  }

  fullJoin(right: JoinTarget, condition: Expression): Query {
    return this.join(right, condition, 'FULL');
  }

  crossJoin(right: JoinTarget): Query {
    return this.join(right, lit(true), 'CROSS');
  }

  /** Compile with the default compiler. */
  toSql(dialect: string = DEFAULT_DIALECT, options?: CompileOptions): string {
    return compile(this, dialect, options);
  }

  private resolveJoinTarget(right: unknown, left: DataSource): DataSource {
    if (right instanceof Query) {
      const state = right._state;
      if (state.source === null) {
        throw new MissingSourceError('join', 'Right side of a join has no data source');
      }
      if (isBareTable(state)) return state.source;
      return subquery(right, `subquery_${countSubqueries(left)}`);
    }
    if (isTableReference(right)) return right;
    throw new InvalidJoinTargetError(describeValue(right));
  }
}
