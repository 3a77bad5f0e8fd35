import { InvalidLiteralError, MissingSourceError } from '../errors.js';
import { isLiteralList } from '../expr/builders.js';
import {
  UNBOUNDED,
  type BinaryOperation,
  type CaseExpression,
  type Column,
  type ColumnReference,
  type Expression,
  type FrameBound,
  type FunctionExpression,
  type LiteralValue,
  type OrderByClause,
  type UnaryOperation,
  type WindowFrame,
  type WindowSpec,
} from '../expr/types.js';
import { createDefaultFunctionRegistry } from '../functions/registry.js';
import type { FunctionResolver, RenderContext } from '../functions/types.js';
import type { CommonTableExpression, QueryDefinition, QueryState } from '../query/types.js';
import type { DataSource, TableReference } from '../source/types.js';
import { operandNeedsParentheses, unaryOperandNeedsParentheses } from './precedence.js';

export interface CompileOptions {
  /** Put each clause on its own line instead of joining with spaces. */
  pretty?: boolean;
}

export interface GeneratorConfig extends CompileOptions {
  /** Specialized function renderings; defaults to the built-in catalogue. */
  functions?: FunctionResolver;
  /**
   * Called when a specialized rendering fails and the generic `NAME(args)`
   * form is used instead. Never rethrown.
   */
  onResolutionError?: (functionName: string, error: unknown) => void;
}

export interface ResolvedGeneratorConfig {
  functions: FunctionResolver;
  pretty: boolean;
  onResolutionError: (functionName: string, error: unknown) => void;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatBound(bound: FrameBound, direction: 'PRECEDING' | 'FOLLOWING'): string {
  if (bound === UNBOUNDED) return `UNBOUNDED ${direction}`;
  if (bound === 0) return 'CURRENT ROW';
  if (bound < 0) {
    // a negative distance points the other way
    return `${-bound} ${direction === 'PRECEDING' ? 'FOLLOWING' : 'PRECEDING'}`;
  }
  return `${bound} ${direction}`;
}

export function formatFrame(frame: WindowFrame): string {
  return `${frame.unit} BETWEEN ${formatBound(frame.preceding, 'PRECEDING')} AND ${formatBound(frame.following, 'FOLLOWING')}`;
}

/**
 * Walks a query value and emits SQL in canonical clause order. The
 * traversal is dialect-independent; subclasses override only literal and
 * identifier formatting plus the few clauses a dialect lacks.
 */
export abstract class SqlGenerator {
  abstract readonly dialect: string;
  protected readonly resolved: ResolvedGeneratorConfig;

  constructor(config: GeneratorConfig = {}) {
    this.resolved = {
      functions: config.functions ?? createDefaultFunctionRegistry(),
      pretty: config.pretty ?? false,
      onResolutionError: config.onResolutionError ?? ((name, err) => {
        console.warn(`[relq] function "${name}" fell back to generic rendering:`, err);
      }),
    };
  }

  generate(query: QueryDefinition, options: CompileOptions = {}): string {
    return this.renderQuery(query._state, options.pretty ?? this.resolved.pretty);
  }

  // ---------------------------------------------------------------------------
  // Clauses
  // ---------------------------------------------------------------------------

  protected renderQuery(state: QueryState, pretty: boolean): string {
    if (state.source === null) {
      throw new MissingSourceError('compile');
    }

    const parts: string[] = [];
    if (state.ctes.length > 0) {
      parts.push(this.renderWith(state.ctes, pretty));
    }
    parts.push(this.renderSelect(state));
    parts.push(`FROM ${this.renderSource(state.source, pretty)}`);
    if (state.filter !== null) {
      parts.push(`WHERE ${this.expression(state.filter)}`);
    }
    if (state.groupBy !== null && state.groupBy.expressions.length > 0) {
      parts.push(`GROUP BY ${state.groupBy.expressions.map((e) => this.expression(e)).join(', ')}`);
    }
    if (state.having !== null) {
      parts.push(`HAVING ${this.expression(state.having)}`);
    }
    if (state.qualify !== null) {
      parts.push(this.renderQualify(state.qualify));
    }
    if (state.orderBy.length > 0) {
      parts.push(`ORDER BY ${this.renderOrderList(state.orderBy)}`);
    }
    if (state.limit !== null) {
      parts.push(`LIMIT ${state.limit}`);
    }
    if (state.offset !== null) {
      parts.push(`OFFSET ${state.offset}`);
    }
    return parts.join(pretty ? '\n' : ' ');
  }

  protected renderWith(ctes: readonly CommonTableExpression[], pretty: boolean): string {
    const recursive = ctes.some((cte) => cte.isRecursive);
    const definitions = ctes.map((cte) => {
      const columns = cte.columns.length > 0
        ? `(${cte.columns.map((c) => this.quoteIdentifier(c)).join(', ')})`
        : '';
      const body = typeof cte.body === 'string' ? cte.body : this.renderQuery(cte.body._state, pretty);
      return `${this.quoteIdentifier(cte.name)}${columns} AS (${body})`;
    });
    return `WITH ${recursive ? 'RECURSIVE ' : ''}${definitions.join(', ')}`;
  }

  protected renderSelect(state: QueryState): string {
    const list = state.columns.length === 0
      ? '*'
      : state.columns.map((column) => this.renderColumn(column)).join(', ');
    return `SELECT ${state.distinct ? 'DISTINCT ' : ''}${list}`;
  }

  protected renderColumn(column: Column): string {
    const sql = this.expression(column.expression);
    return column.alias === undefined ? sql : `${sql} AS ${this.quoteIdentifier(column.alias)}`;
  }

  protected renderQualify(condition: Expression): string {
    return `QUALIFY ${this.expression(condition)}`;
  }

  protected renderOrderList(clauses: readonly OrderByClause[]): string {
    return clauses.map((clause) => `${this.expression(clause.expression)} ${clause.direction}`).join(', ');
  }

  // ---------------------------------------------------------------------------
  // Sources
  // ---------------------------------------------------------------------------

  protected renderSource(source: DataSource, pretty: boolean): string {
    switch (source.kind) {
      case 'table':
        return this.renderTable(source);
      case 'subquery':
        return `(${this.renderQuery(source.query._state, pretty)}) AS ${this.quoteIdentifier(source.alias)}`;
      case 'join': {
        const left = this.renderSource(source.left, pretty);
        // only hand-built trees nest a join on the right
        const right = source.right.kind === 'join'
          ? `(${this.renderSource(source.right, pretty)})`
          : this.renderSource(source.right, pretty);
        const joined = `${left} ${source.joinType} JOIN ${right}`;
        return source.joinType === 'CROSS' ? joined : `${joined} ON ${this.expression(source.condition)}`;
      }
    }
  }

  protected renderTable(ref: TableReference): string {
    const qualified = ref.schema === undefined
      ? this.quoteIdentifier(ref.name)
      : `${this.quoteIdentifier(ref.schema)}.${this.quoteIdentifier(ref.name)}`;
    return ref.alias === undefined ? qualified : `${qualified} AS ${this.quoteIdentifier(ref.alias)}`;
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  expression(expr: Expression): string {
    switch (expr.kind) {
      case 'literal':
        return this.formatLiteral(expr.value);
      case 'column_ref':
        return this.renderColumnReference(expr);
      case 'binary':
        return this.renderBinary(expr);
      case 'unary':
        return this.renderUnary(expr);
      case 'function':
        return this.renderFunction(expr);
      case 'case':
        return this.renderCase(expr);
    }
  }

  protected renderColumnReference(ref: ColumnReference): string {
    const name = ref.name === '*' ? '*' : this.quoteIdentifier(ref.name);
    return ref.table === undefined ? name : `${this.quoteIdentifier(ref.table)}.${name}`;
  }

  protected renderBinary(node: BinaryOperation): string {
    const left = this.renderOperand(node.left, node, 'left');
    const right = this.renderOperand(node.right, node, 'right');
    const sql = `${left} ${node.operator} ${right}`;
    return node.needsParentheses ? `(${sql})` : sql;
  }

  private renderOperand(child: Expression, parent: BinaryOperation, side: 'left' | 'right'): string {
    const sql = this.expression(child);
    return operandNeedsParentheses(child, parent.operator, side) ? `(${sql})` : sql;
  }

  protected renderUnary(node: UnaryOperation): string {
    let operand = this.expression(node.operand);
    if (unaryOperandNeedsParentheses(node.operand, node.operator)) {
      operand = `(${operand})`;
    }
    if (node.operator === 'NOT') return `NOT ${operand}`;
    // `--` would open a line comment
    if (operand.startsWith('-') || operand.startsWith('+')) operand = `(${operand})`;
    return `${node.operator}${operand}`;
  }

  protected renderCase(node: CaseExpression): string {
    const branches = node.branches
      .map((branch) => `WHEN ${this.expression(branch.when)} THEN ${this.expression(branch.then)}`)
      .join(' ');
    const otherwise = node.else === undefined ? '' : ` ELSE ${this.expression(node.else)}`;
    return `CASE ${branches}${otherwise} END`;
  }

  protected renderFunction(node: FunctionExpression): string {
    const call = (node.distinct === true ? undefined : this.renderSpecialized(node))
      ?? this.renderGenericCall(node);
    if (node.functionKind !== 'window') return call;
    return `${call} OVER (${this.renderWindow(node.window)})`;
  }

  /**
   * Asks the function resolver for a dialect-aware rendering. Any failure
   * along the way is reported and answered with undefined.
   */
  private renderSpecialized(node: FunctionExpression): string | undefined {
    const ctx: RenderContext = {
      dialect: this.dialect,
      expression: (expr) => this.expression(expr),
    };
    try {
      const factory = this.resolved.functions.lookup(node.name);
      if (factory === undefined) return undefined;
      return factory(node.args).render(ctx);
    } catch (err) {
      // a bad argument is the caller's error, not the resolver's
      if (err instanceof InvalidLiteralError) throw err;
      this.resolved.onResolutionError(node.name, err);
      return undefined;
    }
  }

  protected renderGenericCall(node: FunctionExpression): string {
    const args = node.args.map((arg) => this.expression(arg)).join(', ');
    return `${node.name.toUpperCase()}(${node.distinct === true ? 'DISTINCT ' : ''}${args})`;
  }

  protected renderWindow(spec: WindowSpec | undefined): string {
    if (spec === undefined) return '';
    const parts: string[] = [];
    if (spec.partitionBy.length > 0) {
      parts.push(`PARTITION BY ${spec.partitionBy.map((e) => this.expression(e)).join(', ')}`);
    }
    if (spec.orderBy.length > 0) {
      parts.push(`ORDER BY ${this.renderOrderList(spec.orderBy)}`);
    }
    if (spec.frame !== undefined) {
      parts.push(formatFrame(spec.frame));
    }
    return parts.join(' ');
  }

  // ---------------------------------------------------------------------------
  // Dialect hooks
  // ---------------------------------------------------------------------------

  protected formatLiteral(value: LiteralValue): string {
    if (value === null) return 'NULL';
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    if (typeof value === 'number') return this.formatNumber(value);
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'string') return this.quoteString(value);
    if (value instanceof Date) return this.formatDate(value);
    if (isLiteralList(value)) {
      return `(${value.map((item) => this.formatLiteral(item)).join(', ')})`;
    }
    return value;
  }

  protected formatNumber(value: number): string {
    if (Number.isFinite(value)) return String(value);
    const text = Number.isNaN(value) ? 'NaN' : value > 0 ? 'Infinity' : '-Infinity';
    return `CAST('${text}' AS ${this.floatType()})`;
  }

  /** Midnight UTC renders as a DATE, anything else as a TIMESTAMP (UTC). */
  protected formatDate(value: Date): string {
    if (!Number.isFinite(value.getTime())) {
      throw new InvalidLiteralError('Invalid Date', 'the date is not a valid point in time');
    }
    const year = value.getUTCFullYear();
    if (year < 0 || year > 9999) {
      throw new InvalidLiteralError(`Date in year ${year}`, 'years must lie between 0 and 9999');
    }
    const date = `${pad(year, 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
    const hours = value.getUTCHours();
    const minutes = value.getUTCMinutes();
    const seconds = value.getUTCSeconds();
    const millis = value.getUTCMilliseconds();
    if (hours === 0 && minutes === 0 && seconds === 0 && millis === 0) {
      return `DATE '${date}'`;
    }
    return `TIMESTAMP '${date} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}'`;
  }

  protected quoteString(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
  }

  protected abstract quoteIdentifier(name: string): string;

  /** Lower-case keywords the dialect refuses as bare identifiers. */
  protected abstract reservedWords(): ReadonlySet<string>;

  protected isReserved(name: string): boolean {
    return this.reservedWords().has(name.toLowerCase());
  }

  protected abstract floatType(): string;
}
