import { describe, it, expect, vi } from 'vitest';
import { query } from '../../src/query/query-object.js';
import { alias, col, eq, fn, isIn, lit, over, rowNumber } from '../../src/expr/builders.js';
import { DuckDbGenerator } from '../../src/compiler/dialects/duckdb.js';
import { PostgresGenerator } from '../../src/compiler/dialects/postgres.js';
import { InvalidLiteralError, UnsupportedFeatureError } from '../../src/errors.js';

const duckdb = new DuckDbGenerator();
const postgres = new PostgresGenerator();

describe('DuckDbGenerator', () => {

  // ---------------------------------------------------------------------------
  // Literals
  // ---------------------------------------------------------------------------
  describe('literals', () => {
    it('renders keywords and numbers', () => {
      expect(duckdb.expression(lit(null))).toBe('NULL');
      expect(duckdb.expression(lit(true))).toBe('TRUE');
      expect(duckdb.expression(lit(false))).toBe('FALSE');
      expect(duckdb.expression(lit(2.5))).toBe('2.5');
      expect(duckdb.expression(lit(9007199254740993n))).toBe('9007199254740993');
    });

    it('doubles single quotes in strings', () => {
      expect(duckdb.expression(lit("O'Brien"))).toBe("'O''Brien'");
    });

    it('casts non-finite numbers', () => {
      expect(duckdb.expression(lit(Number.NaN))).toBe("CAST('NaN' AS DOUBLE)");
      expect(duckdb.expression(lit(-Infinity))).toBe("CAST('-Infinity' AS DOUBLE)");
    });

    it('renders midnight UTC as DATE and anything else as TIMESTAMP', () => {
      expect(duckdb.expression(lit(new Date(Date.UTC(2024, 0, 15))))).toBe("DATE '2024-01-15'");
      expect(duckdb.expression(lit(new Date(Date.UTC(2024, 0, 15, 10, 30))))).toBe(
        "TIMESTAMP '2024-01-15 10:30:00.000'",
      );
    });

    it('pads every date field', () => {
      const early = new Date(Date.UTC(2000, 0, 1));
      early.setUTCFullYear(5);
      expect(duckdb.expression(lit(early))).toBe("DATE '0005-01-01'");
      expect(duckdb.expression(lit(new Date(Date.UTC(2024, 1, 3, 4, 5, 6, 7))))).toBe(
        "TIMESTAMP '2024-02-03 04:05:06.007'",
      );
    });

    it('rejects invalid dates and years past 9999', () => {
      expect(() => duckdb.expression(lit(new Date(Number.NaN)))).toThrow(InvalidLiteralError);
      expect(() => duckdb.expression(lit(new Date(Date.UTC(10000, 0, 1))))).toThrow(
        'Cannot render Date in year 10000 as a SQL literal: years must lie between 0 and 9999',
      );
    });

    it('does not report a bad date argument as a function resolution failure', () => {
      const onResolutionError = vi.fn();
      const generator = new DuckDbGenerator({ onResolutionError });
      expect(() => generator.expression(fn('upper', lit(new Date(Number.NaN))))).toThrow(InvalidLiteralError);
      expect(onResolutionError).not.toHaveBeenCalled();
    });

    it('renders lists for IN', () => {
      expect(duckdb.expression(isIn(col('id'), [1, 2, 3]))).toBe('id IN (1, 2, 3)');
    });
  });

  // ---------------------------------------------------------------------------
  // Identifiers
  // ---------------------------------------------------------------------------
  describe('identifiers', () => {
    it('leaves plain names bare, including mixed case', () => {
      expect(duckdb.expression(col('userName', 'u'))).toBe('u.userName');
    });

    it('quotes names with spaces and reserved words', () => {
      expect(duckdb.expression(col('First Name'))).toBe('"First Name"');
      expect(duckdb.expression(col('order'))).toBe('"order"');
      expect(duckdb.expression(col('say "hi"'))).toBe('"say ""hi"""');
    });

    it('never quotes *', () => {
      expect(duckdb.expression(col('*', 'select'))).toBe('"select".*');
    });

    it('quotes aliases and table names the same way', () => {
      const q = query.from('order', { alias: 'u' }).select(alias(col('id', 'u'), 'group'));
      expect(duckdb.generate(q)).toBe('SELECT u.id AS "group" FROM "order" AS u');
    });

    it('quotes every reserved keyword', () => {
      for (const word of ['primary', 'for', 'to', 'only', 'fetch', 'unique', 'array', 'into', 'grant', 'lateral']) {
        const q = query.from('t').select(alias(col(word), word));
        expect(duckdb.generate(q)).toBe(`SELECT "${word}" AS "${word}" FROM t`);
      }
    });

    it('quotes DuckDB-only keywords', () => {
      expect(duckdb.expression(col('pivot'))).toBe('"pivot"');
      expect(duckdb.expression(col('qualify'))).toBe('"qualify"');
    });
  });

  // ---------------------------------------------------------------------------
  // Catalogue
  // ---------------------------------------------------------------------------
  describe('function catalogue', () => {
    it('uses the default renderings', () => {
      expect(duckdb.expression(fn('length', col('name')))).toBe('LENGTH(name)');
      expect(duckdb.expression(fn('concat', col('a'), ' ', col('b')))).toBe("(a || ' ' || b)");
      expect(duckdb.expression(fn('date_part', 'year', col('hired')))).toBe("DATE_PART('year', CAST(hired AS DATE))");
      expect(duckdb.expression(fn('date_add', 'day', 7, col('d')))).toBe('(CAST(d AS DATE) + INTERVAL 7 DAY)');
      expect(duckdb.expression(fn('current_date'))).toBe('CURRENT_DATE');
    });
  });
});

describe('PostgresGenerator', () => {
  describe('literals', () => {
    it('escapes strings through pg', () => {
      expect(postgres.expression(lit("O'Brien"))).toBe("'O''Brien'");
    });

    it('uses the E prefix for backslashes', () => {
      expect(postgres.expression(lit('a\\b'))).toBe("E'a\\\\b'");
    });

    it('casts non-finite numbers to DOUBLE PRECISION', () => {
      expect(postgres.expression(lit(Infinity))).toBe("CAST('Infinity' AS DOUBLE PRECISION)");
    });
  });

  describe('identifiers', () => {
    it('quotes names that would fold to lower case', () => {
      expect(postgres.expression(col('userName', 'u'))).toBe('u."userName"');
      expect(postgres.expression(col('user_name'))).toBe('user_name');
    });

    it('quotes reserved words', () => {
      expect(postgres.generate(query.from('user'))).toBe('SELECT * FROM "user"');
    });

    it('quotes every reserved keyword, including those that can be functions or types', () => {
      const words = ['primary', 'for', 'to', 'only', 'fetch', 'current_date', 'lateral', 'unique', 'array', 'into', 'grant', 'verbose'];
      for (const word of words) {
        const q = query.from('t').select(alias(col(word), word));
        expect(postgres.generate(q)).toBe(`SELECT "${word}" AS "${word}" FROM t`);
      }
    });

    it('leaves words bare that only DuckDB reserves', () => {
      expect(postgres.expression(col('pivot'))).toBe('pivot');
    });
  });

  describe('clauses', () => {
    it('rejects QUALIFY', () => {
      const q = query.from('t').qualify(eq(over(rowNumber(), { orderBy: [col('a')] }), 1));
      expect(() => postgres.generate(q)).toThrow(UnsupportedFeatureError);
      expect(() => q.toSql('postgresql')).toThrow('QUALIFY is not supported by the postgres dialect');
    });

    it('renders the same clause text as DuckDB otherwise', () => {
      const q = query.from('employees').select(col('name')).filter(eq(col('dept'), 'eng')).limit(5);
      expect(q.toSql('postgres')).toBe("SELECT name FROM employees WHERE dept = 'eng' LIMIT 5");
    });
  });

  describe('function catalogue', () => {
    it('uses the PostgreSQL overrides', () => {
      expect(postgres.expression(fn('length', col('name')))).toBe('CHAR_LENGTH(name)');
      expect(postgres.expression(fn('ceil', col('x')))).toBe('CEILING(x)');
      expect(postgres.expression(fn('mod', col('a'), 3))).toBe('(a % 3)');
      expect(postgres.expression(fn('round', col('x'), 2))).toBe('ROUND(CAST(x AS NUMERIC), 2)');
      expect(postgres.expression(fn('date_part', 'year', col('hired')))).toBe('EXTRACT(YEAR FROM hired)');
      expect(postgres.expression(fn('date_add', 'day', 7, col('d')))).toBe("(d + 7 * INTERVAL '1 day')");
    });

    it('falls back to the default rendering where there is no override', () => {
      expect(postgres.expression(fn('upper', col('name')))).toBe('UPPER(name)');
    });
  });
});
