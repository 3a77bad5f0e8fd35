import type { FunctionDefinition } from './types.js';

function at(args: readonly string[], index: number): string {
  const value = args[index];
  if (value === undefined) {
    throw new RangeError(`argument ${index} is missing`);
  }
  return value;
}

/** `'day'` → `day`; date-part arguments arrive as rendered string literals. */
function unquote(sql: string): string {
  const match = /^'(.*)'$/s.exec(sql);
  return match?.[1] ?? sql;
}

const call = (name: string) => (args: readonly string[]): string => `${name}(${args.join(', ')})`;

export const BUILTIN_FUNCTIONS: readonly FunctionDefinition[] = [
  // -- strings --------------------------------------------------------------
  { name: 'upper', arity: 1, render: call('UPPER') },
  { name: 'lower', arity: 1, render: call('LOWER') },
  {
    name: 'length',
    arity: 1,
    render: call('LENGTH'),
    dialects: { postgres: call('CHAR_LENGTH') },
  },
  {
    name: 'concat',
    arity: [2, Infinity],
    render: (args) => `(${args.join(' || ')})`,
  },
  { name: 'substring', arity: [2, 3], render: call('SUBSTRING') },
  { name: 'replace', arity: 3, render: call('REPLACE') },

  // -- numbers --------------------------------------------------------------
  { name: 'abs', arity: 1, render: call('ABS') },
  {
    name: 'round',
    arity: [1, 2],
    render: call('ROUND'),
    dialects: {
      // two-argument ROUND only exists for numeric on PostgreSQL
      postgres: (args) => args.length === 2
        ? `ROUND(CAST(${at(args, 0)} AS NUMERIC), ${at(args, 1)})`
        : `ROUND(${at(args, 0)})`,
    },
  },
  {
    name: 'ceil',
    arity: 1,
    render: call('CEIL'),
    dialects: { postgres: call('CEILING') },
  },
  { name: 'floor', arity: 1, render: call('FLOOR') },
  { name: 'power', arity: 2, render: call('POWER') },
  { name: 'sqrt', arity: 1, render: call('SQRT') },
  {
    name: 'mod',
    arity: 2,
    render: call('MOD'),
    dialects: { postgres: (args) => `(${at(args, 0)} % ${at(args, 1)})` },
  },

  // -- dates ----------------------------------------------------------------
  {
    // date_diff(part, start, end)
    name: 'date_diff',
    arity: 3,
    render: (args) =>
      `DATE_DIFF(${at(args, 0)}, CAST(${at(args, 1)} AS DATE), CAST(${at(args, 2)} AS DATE))`,
    dialects: {
      // whole days; PostgreSQL has no DATE_DIFF
      postgres: (args) =>
        `(EXTRACT(EPOCH FROM (CAST(${at(args, 2)} AS TIMESTAMP) - CAST(${at(args, 1)} AS TIMESTAMP))) / 86400)`,
    },
  },
  {
    // date_part(part, date)
    name: 'date_part',
    arity: 2,
    render: (args) => `DATE_PART(${at(args, 0)}, CAST(${at(args, 1)} AS DATE))`,
    dialects: {
      postgres: (args) => `EXTRACT(${unquote(at(args, 0)).toUpperCase()} FROM ${at(args, 1)})`,
    },
  },
  {
    name: 'date_trunc',
    arity: 2,
    render: (args) => `DATE_TRUNC(${at(args, 0)}, CAST(${at(args, 1)} AS DATE))`,
    dialects: { postgres: call('DATE_TRUNC') },
  },
  { name: 'current_date', arity: 0, render: () => 'CURRENT_DATE' },
  {
    // date_add(part, amount, date)
    name: 'date_add',
    arity: 3,
    render: (args) =>
      `(CAST(${at(args, 2)} AS DATE) + INTERVAL ${at(args, 1)} ${unquote(at(args, 0)).toUpperCase()})`,
    dialects: {
      postgres: (args) => `(${at(args, 2)} + ${at(args, 1)} * INTERVAL '1 ${unquote(at(args, 0))}')`,
    },
  },
  {
    name: 'date_sub',
    arity: 3,
    render: (args) =>
      `(CAST(${at(args, 2)} AS DATE) - INTERVAL ${at(args, 1)} ${unquote(at(args, 0)).toUpperCase()})`,
    dialects: {
      postgres: (args) => `(${at(args, 2)} - ${at(args, 1)} * INTERVAL '1 ${unquote(at(args, 0))}')`,
    },
  },
];
