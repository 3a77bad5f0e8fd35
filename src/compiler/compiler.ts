import { UnsupportedDialectError } from '../errors.js';
import type { QueryDefinition } from '../query/types.js';
import { DuckDbGenerator } from './dialects/duckdb.js';
import { PostgresGenerator } from './dialects/postgres.js';
import type { CompileOptions, GeneratorConfig } from './generator.js';

export type GeneratorFn = (query: QueryDefinition, options?: CompileOptions) => string;

export type CompilerConfig = GeneratorConfig;

/**
 * Dialect name → generator. Names are matched case-insensitively; a name
 * registered twice keeps the latest generator.
 */
export class SqlCompiler {
  private readonly generators = new Map<string, GeneratorFn>();

  register(dialect: string, generator: GeneratorFn): this {
    if (dialect.trim() === '') {
      throw new Error('SqlCompiler.register: dialect must be a non-empty string');
    }
    this.generators.set(dialect.toLowerCase(), generator);
    return this;
  }

  has(dialect: string): boolean {
    return this.generators.has(dialect.toLowerCase());
  }

  dialects(): string[] {
    return [...this.generators.keys()].sort();
  }

  compile(query: QueryDefinition, dialect: string, options?: CompileOptions): string {
    const generator = this.generators.get(dialect.toLowerCase());
    if (generator === undefined) {
      throw new UnsupportedDialectError(dialect, this.dialects());
    }
    return generator(query, options);
  }
}

/** A compiler with `duckdb`, `postgres` and its alias `postgresql` registered. */
export function createCompiler(config: CompilerConfig = {}): SqlCompiler {
  const duckdb = new DuckDbGenerator(config);
  const postgres = new PostgresGenerator(config);
  const toPostgres: GeneratorFn = (query, options) => postgres.generate(query, options);

  return new SqlCompiler()
    .register('duckdb', (query, options) => duckdb.generate(query, options))
    .register('postgres', toPostgres)
    .register('postgresql', toPostgres);
}
