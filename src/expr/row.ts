import { ColumnResolutionError } from '../errors.js';
import { tableQualifier } from '../source/builders.js';
import type { ColumnManifest, SubquerySource, TableReference } from '../source/types.js';
import { col } from './builders.js';
import type { ColumnReference } from './types.js';

/**
 * Symbolic row over a source: every property read yields a qualified
 * ColumnReference. A manifest restricts (and types) the readable names.
 */
export type Row<M extends ColumnManifest = ColumnManifest> = {
  readonly [K in keyof M & string]: ColumnReference;
};

// Probed by await, Promise.resolve and JSON.stringify; never column names.
const NOT_COLUMNS: ReadonlySet<string> = new Set(['then', 'toJSON']);

/**
 * Builds a symbolic row for a table or subquery.
 *
 * @example
 * const e = rowOf(table('employees', { alias: 'e', columns: { salary: 'float' } }));
 * gt(e.salary, 50_000) // e.salary > 50000
 */
export function rowOf<M extends ColumnManifest>(source: TableReference<M> | SubquerySource): Row<M> {
  const qualifier = source.kind === 'table' ? tableQualifier(source) : source.alias;
  const manifest = source.kind === 'table' ? source.columns : undefined;
  const sourceName = source.kind === 'table' ? source.name : source.alias;

  const resolve = (name: string): ColumnReference => {
    if (manifest !== undefined && !Object.prototype.hasOwnProperty.call(manifest, name)) {
      throw new ColumnResolutionError(name, sourceName);
    }
    return col(name, qualifier);
  };

  // Safe: the get trap answers every key of M; the compiler cannot see through a Proxy
  const target = {} as Row<M>;
  return new Proxy(target, {
    get(_target, property) {
      if (typeof property !== 'string' || NOT_COLUMNS.has(property)) return undefined;
      return resolve(property);
    },
    has(_target, property) {
      return typeof property === 'string'
        && (manifest === undefined || Object.prototype.hasOwnProperty.call(manifest, property));
    },
  });
}
