import type { Expression } from '../expr/types.js';
import type { QueryDefinition } from '../query/types.js';

export type ColumnType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'date'
  | 'timestamp'
  | 'any';

/** Column-name → type manifest describing a table's shape. */
export type ColumnManifest = Readonly<Record<string, ColumnType>>;

export interface TableReference<M extends ColumnManifest = ColumnManifest> {
  readonly kind: 'table';
  readonly name: string;
  readonly schema?: string;
  readonly alias?: string;
  /** Only consulted while building expressions; the compiler ignores it. */
  readonly columns?: M;
}

export interface SubquerySource {
  readonly kind: 'subquery';
  readonly query: QueryDefinition;
  readonly alias: string;
}

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

/**
 * Joins nest left-deep: each new join wraps the whole prior source tree
 * as `left`.
 */
export interface JoinOperation {
  readonly kind: 'join';
  readonly left: DataSource;
  readonly right: DataSource;
  readonly joinType: JoinType;
  readonly condition: Expression;
}

export type DataSource = TableReference | SubquerySource | JoinOperation;
