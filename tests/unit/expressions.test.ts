import { describe, it, expect } from 'vitest';
import {
  add,
  agg,
  alias,
  and,
  asc,
  caseWhen,
  col,
  count,
  desc,
  eq,
  expressionsEqual,
  fn,
  gt,
  isExpression,
  isIn,
  isNull,
  lit,
  neg,
  or,
  over,
  paren,
  parseSortDirection,
  rowNumber,
  rows,
  star,
  sum,
  toColumn,
  toOrderByClause,
} from '../../src/expr/builders.js';
import { UNBOUNDED } from '../../src/expr/types.js';
import { InvalidSortDirectionError } from '../../src/errors.js';

describe('Expression builders', () => {

  // ---------------------------------------------------------------------------
  // Leaves
  // ---------------------------------------------------------------------------
  describe('leaves', () => {
    it('lit wraps any literal value', () => {
      expect(lit(3)).toEqual({ kind: 'literal', value: 3 });
      expect(lit(null)).toEqual({ kind: 'literal', value: null });
    });

    it('col omits the table key when unqualified', () => {
      expect(col('name')).toEqual({ kind: 'column_ref', name: 'name' });
      expect('table' in col('name')).toBe(false);
      expect(col('name', 'e')).toEqual({ kind: 'column_ref', name: 'name', table: 'e' });
    });

    it('star is a column reference named *', () => {
      expect(star('e')).toEqual({ kind: 'column_ref', name: '*', table: 'e' });
    });
  });

  // ---------------------------------------------------------------------------
  // Operators
  // ---------------------------------------------------------------------------
  describe('operators', () => {
    it('coerces plain values to literals', () => {
      expect(gt(col('salary'), 50000)).toEqual({
        kind: 'binary',
        left: { kind: 'column_ref', name: 'salary' },
        operator: '>',
        right: { kind: 'literal', value: 50000 },
        needsParentheses: false,
      });
    });

    it('isIn turns an array into a list literal', () => {
      const node = isIn(col('id'), [1, 2]);
      expect(node.operator).toBe('IN');
      expect(node.right).toEqual({ kind: 'literal', value: [1, 2] });
    });

    it('isNull compares against NULL with IS', () => {
      const node = isNull(col('x'));
      expect(node.operator).toBe('IS');
      expect(node.right).toEqual(lit(null));
    });

    it('and left-folds its operands', () => {
      const a = eq(col('a'), 1);
      const b = eq(col('b'), 2);
      const c = eq(col('c'), 3);
      const node = and(a, b, c);
      expect(node).toEqual({
        kind: 'binary',
        left: { kind: 'binary', left: a, operator: 'AND', right: b, needsParentheses: false },
        operator: 'AND',
        right: c,
        needsParentheses: false,
      });
    });

    it('and with one operand returns it unchanged', () => {
      const a = eq(col('a'), 1);
      expect(and(a)).toBe(a);
    });

    it('paren flags a binary node and leaves others alone', () => {
      const node = paren(add(col('a'), 1));
      expect(node.kind === 'binary' && node.needsParentheses).toBe(true);
      const leaf = col('a');
      expect(paren(leaf)).toBe(leaf);
    });

    it('neg builds a unary minus', () => {
      expect(neg(col('x'))).toEqual({ kind: 'unary', operator: '-', operand: col('x') });
    });

    it('caseWhen keeps an else branch only when given', () => {
      const withElse = caseWhen([[gt(col('x'), 0), 'pos']], 'other');
      expect(withElse.else).toEqual(lit('other'));
      const without = caseWhen([[gt(col('x'), 0), 'pos']]);
      expect('else' in without).toBe(false);
      expect(without.branches[0]!.then).toEqual(lit('pos'));
    });
  });

  // ---------------------------------------------------------------------------
  // Functions
  // ---------------------------------------------------------------------------
  describe('functions', () => {
    it('fn builds a scalar call', () => {
      expect(fn('upper', col('name'))).toEqual({
        kind: 'function',
        name: 'upper',
        args: [col('name')],
        functionKind: 'scalar',
      });
    });

    it('count() counts star', () => {
      expect(count().args).toEqual([star()]);
      expect(count().functionKind).toBe('aggregate');
    });

    it('agg sets distinct only when requested', () => {
      expect(agg('COUNT', [col('x')], { distinct: true }).distinct).toBe(true);
      expect('distinct' in agg('COUNT', [col('x')])).toBe(false);
    });

    it('over turns a call into a window call', () => {
      const node = over(sum(col('amount')), {
        partitionBy: [col('region')],
        orderBy: [[col('day'), 'desc']],
        frame: rows(UNBOUNDED, 0),
      });
      expect(node.functionKind).toBe('window');
      expect(node.window).toEqual({
        partitionBy: [col('region')],
        orderBy: [{ expression: col('day'), direction: 'DESC' }],
        frame: { unit: 'ROWS', preceding: 'UNBOUNDED', following: 0 },
      });
    });

    it('rowNumber starts with an empty window', () => {
      expect(rowNumber().window).toEqual({ partitionBy: [], orderBy: [] });
    });
  });

  // ---------------------------------------------------------------------------
  // Select items and ordering
  // ---------------------------------------------------------------------------
  describe('select items and ordering', () => {
    it('alias produces a Column', () => {
      expect(alias(col('n'), 'name')).toEqual({ kind: 'column', expression: col('n'), alias: 'name' });
    });

    it('toColumn wraps bare expressions without alias', () => {
      expect(toColumn(col('n'))).toEqual({ kind: 'column', expression: col('n') });
    });

    it('parseSortDirection is case-insensitive', () => {
      expect(parseSortDirection('asc')).toBe('ASC');
      expect(parseSortDirection('Desc')).toBe('DESC');
    });

    it('parseSortDirection rejects other tokens', () => {
      expect(() => parseSortDirection('up')).toThrow(InvalidSortDirectionError);
    });

    it('toOrderByClause accepts all three spellings', () => {
      expect(toOrderByClause(col('a'))).toEqual({ expression: col('a'), direction: 'ASC' });
      expect(toOrderByClause([col('a'), 'desc'])).toEqual({ expression: col('a'), direction: 'DESC' });
      expect(toOrderByClause(desc(col('a')))).toEqual({ expression: col('a'), direction: 'DESC' });
      expect(asc(1)).toEqual({ expression: lit(1), direction: 'ASC' });
    });
  });

  // ---------------------------------------------------------------------------
  // Guards and equality
  // ---------------------------------------------------------------------------
  describe('isExpression', () => {
    it('accepts every node kind', () => {
      expect(isExpression(lit(1))).toBe(true);
      expect(isExpression(col('a'))).toBe(true);
      expect(isExpression(caseWhen([[true, 1]]))).toBe(true);
    });

    it('rejects plain values, arrays and select items', () => {
      expect(isExpression('a')).toBe(false);
      expect(isExpression(null)).toBe(false);
      expect(isExpression([])).toBe(false);
      expect(isExpression(new Date(0))).toBe(false);
      expect(isExpression(alias(col('a'), 'b'))).toBe(false);
    });
  });

  describe('expressionsEqual', () => {
    it('compares structurally', () => {
      expect(expressionsEqual(col('a', 't'), col('a', 't'))).toBe(true);
      expect(expressionsEqual(col('a', 't'), col('a'))).toBe(false);
      expect(expressionsEqual(gt(col('a'), 1), gt(col('a'), 1))).toBe(true);
      expect(expressionsEqual(gt(col('a'), 1), gt(col('a'), 2))).toBe(false);
    });

    it('compares dates by time and lists element-wise', () => {
      expect(expressionsEqual(lit(new Date(5)), lit(new Date(5)))).toBe(true);
      expect(expressionsEqual(lit([1, 2]), lit([1, 2]))).toBe(true);
      expect(expressionsEqual(lit([1, 2]), lit([1]))).toBe(false);
    });

    it('matches function names case-insensitively', () => {
      expect(expressionsEqual(fn('upper', col('a')), fn('UPPER', col('a')))).toBe(true);
    });

    it('ignores forced parentheses', () => {
      const plain = or(col('a'), col('b'));
      expect(expressionsEqual(plain, paren(plain))).toBe(true);
      expect(expressionsEqual(add(col('a'), 1), paren(add(col('a'), 1)))).toBe(true);
    });

    it('distinguishes else branches', () => {
      expect(expressionsEqual(caseWhen([[true, 1]], 0), caseWhen([[true, 1]]))).toBe(false);
    });
  });
});
