import { Query, EMPTY_STATE } from './builder.js';
import { subquery, table, type TableOptions } from '../source/builders.js';
import type { ColumnManifest, TableReference } from '../source/types.js';
import type { QueryDefinition } from './types.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * const e = table('employees', { alias: 'e' });
 * query.from(e)
 *   .filter(gt(col('salary', 'e'), 50_000))
 *   .select(col('name', 'e'))
 *   .orderBy([col('salary', 'e'), 'desc'])
 *   .toSql('duckdb');
 */
export const query = {
  from<M extends ColumnManifest>(
    source: string | TableReference<M>,
    options: TableOptions<M> = {},
  ): Query {
    const ref = typeof source === 'string' ? table(source, options) : source;
    return new Query({ ...EMPTY_STATE, source: ref });
  },

  /** Use an already-built query as the data source. */
  fromSubquery(inner: QueryDefinition, alias: string): Query {
    return new Query({ ...EMPTY_STATE, source: subquery(inner, alias) });
  },
};
