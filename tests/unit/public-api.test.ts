import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports query object', async () => {
    const { query } = await import('../../src/index.js');
    expect(typeof query.from).toBe('function');
    expect(typeof query.fromSubquery).toBe('function');
  });

  it('exports the compiler entry points', async () => {
    const { compile, createCompiler, registerDialect, supportedDialects, DEFAULT_DIALECT } =
      await import('../../src/index.js');
    expect(typeof compile).toBe('function');
    expect(typeof createCompiler).toBe('function');
    expect(typeof registerDialect).toBe('function');
    expect(DEFAULT_DIALECT).toBe('duckdb');
    expect(supportedDialects()).toEqual(expect.arrayContaining(['duckdb', 'postgres', 'postgresql']));
  });

  it('exports UnsupportedDialectError as a class usable with instanceof', async () => {
    const { UnsupportedDialectError } = await import('../../src/index.js');
    const err = new UnsupportedDialectError('oracle');
    expect(err).toBeInstanceOf(UnsupportedDialectError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnsupportedDialectError');
  });

  it('does NOT export toOrderByClause (internal)', async () => {
    const api = await import('../../src/index.js');
    expect(Reflect.get(api, 'toOrderByClause')).toBeUndefined();
  });

  it('does NOT export countSubqueries (internal)', async () => {
    const api = await import('../../src/index.js');
    expect(Reflect.get(api, 'countSubqueries')).toBeUndefined();
  });

  it('does NOT export the operator precedence table (internal)', async () => {
    const api = await import('../../src/index.js');
    expect(Reflect.get(api, 'operandNeedsParentheses')).toBeUndefined();
  });

  it('the functions subpath exports the registry', async () => {
    const { FunctionRegistry, createDefaultFunctionRegistry, BUILTIN_FUNCTIONS } =
      await import('../../src/functions/index.js');
    expect(typeof FunctionRegistry).toBe('function');
    expect(createDefaultFunctionRegistry().names()).toHaveLength(BUILTIN_FUNCTIONS.length);
  });

  it('query.from returns a compilable QueryDefinition', async () => {
    const { query } = await import('../../src/index.js');
    expect(query.from('users').toSql()).toBe('SELECT * FROM users');
  });
});
