import type { ColumnManifest, DataSource, SubquerySource, TableReference } from './types.js';
import type { QueryDefinition } from '../query/types.js';

export interface TableOptions<M extends ColumnManifest> {
  schema?: string;
  alias?: string;
  columns?: M;
}

export function table<M extends ColumnManifest = ColumnManifest>(
  name: string,
  options: TableOptions<M> = {},
): TableReference<M> {
  return {
    kind: 'table',
    name,
    ...(options.schema !== undefined ? { schema: options.schema } : {}),
    ...(options.alias !== undefined ? { alias: options.alias } : {}),
    ...(options.columns !== undefined ? { columns: options.columns } : {}),
  };
}

export function subquery(query: QueryDefinition, alias: string): SubquerySource {
  return { kind: 'subquery', query, alias };
}

/** Name other expressions use to qualify this table's columns. */
export function tableQualifier(ref: TableReference): string {
  return ref.alias ?? ref.name;
}

export function isTableReference(value: unknown): value is TableReference {
  return typeof value === 'object'
    && value !== null
    && Reflect.get(value, 'kind') === 'table'
    && typeof Reflect.get(value, 'name') === 'string';
}

/** Number of subquery sources anywhere in a (possibly joined) source tree. */
export function countSubqueries(source: DataSource): number {
  switch (source.kind) {
    case 'table':
      return 0;
    case 'subquery':
      return 1;
    case 'join':
      return countSubqueries(source.left) + countSubqueries(source.right);
  }
}
