import type { QueryDefinition } from '../query/types.js';
import { createCompiler, type GeneratorFn } from './compiler.js';
import type { CompileOptions } from './generator.js';

export { SqlCompiler, createCompiler } from './compiler.js';
export type { CompilerConfig, GeneratorFn } from './compiler.js';
export { SqlGenerator, formatFrame } from './generator.js';
export type { CompileOptions, GeneratorConfig } from './generator.js';
export { DuckDbGenerator } from './dialects/duckdb.js';
export { PostgresGenerator } from './dialects/postgres.js';

const defaultCompiler = createCompiler();

export const DEFAULT_DIALECT = 'duckdb';

export function compile(
  query: QueryDefinition,
  dialect: string = DEFAULT_DIALECT,
  options?: CompileOptions,
): string {
  return defaultCompiler.compile(query, dialect, options);
}

/** Adds or replaces a dialect on the compiler behind `compile()` and `Query.toSql()`. */
export function registerDialect(dialect: string, generator: GeneratorFn): void {
  defaultCompiler.register(dialect, generator);
}

export function supportedDialects(): string[] {
  return defaultCompiler.dialects();
}
