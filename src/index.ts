export { query } from './query/query-object.js';
export { Query, EMPTY_STATE } from './query/builder.js';
export type { CteOptions, JoinTarget } from './query/builder.js';
export type { CommonTableExpression, GroupByClause, QueryDefinition, QueryState } from './query/types.js';

export {
  UNBOUNDED,
} from './expr/types.js';
export type {
  ArithmeticOperator,
  BinaryOperation,
  BinaryOperator,
  CaseBranch,
  CaseExpression,
  Column,
  ColumnReference,
  ComparisonOperator,
  Expression,
  FrameBound,
  FunctionExpression,
  FunctionKind,
  LiteralExpression,
  LiteralValue,
  LogicalOperator,
  OrderByClause,
  SortDirection,
  UnaryOperation,
  UnaryOperator,
  WindowFrame,
  WindowSpec,
} from './expr/types.js';
export {
  add,
  agg,
  alias,
  and,
  asc,
  avg,
  binary,
  caseWhen,
  col,
  concat,
  count,
  denseRank,
  desc,
  div,
  eq,
  expressionsEqual,
  fn,
  gt,
  gte,
  ilike,
  isExpression,
  isIn,
  isNotNull,
  isNull,
  like,
  lit,
  lt,
  lte,
  max,
  min,
  mod,
  mul,
  neg,
  neq,
  not,
  notIn,
  notLike,
  or,
  over,
  paren,
  range,
  rank,
  rowNumber,
  rows,
  star,
  sub,
  sum,
  unary,
} from './expr/builders.js';
export type { Operand, OrderSpec, SortToken, WindowOptions } from './expr/builders.js';
export { rowOf } from './expr/row.js';
export type { Row } from './expr/row.js';

export { subquery, table } from './source/builders.js';
export type { TableOptions } from './source/builders.js';
export type {
  ColumnManifest,
  ColumnType,
  DataSource,
  JoinOperation,
  JoinType,
  SubquerySource,
  TableReference,
} from './source/types.js';

export {
  DEFAULT_DIALECT,
  DuckDbGenerator,
  PostgresGenerator,
  SqlCompiler,
  SqlGenerator,
  compile,
  createCompiler,
  registerDialect,
  supportedDialects,
} from './compiler/index.js';
export type { CompileOptions, CompilerConfig, GeneratorConfig, GeneratorFn } from './compiler/index.js';

export {
  ColumnResolutionError,
  FunctionResolutionError,
  InvalidFilterConditionError,
  InvalidJoinTargetError,
  InvalidLiteralError,
  InvalidSortDirectionError,
  MissingSourceError,
  UnsupportedDialectError,
  UnsupportedFeatureError,
} from './errors.js';
