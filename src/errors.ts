export class MissingSourceError extends Error {
  override readonly name = 'MissingSourceError';

  constructor(
    readonly operation: 'compile' | 'join',
    message?: string,
  ) {
    super(message ?? `Cannot ${operation} a query that has no data source`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidJoinTargetError extends Error {
  override readonly name = 'InvalidJoinTargetError';

  constructor(readonly received: string) {
    super(`Right side of a join must be a Query or a TableReference, got ${received}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidFilterConditionError extends Error {
  override readonly name = 'InvalidFilterConditionError';

  constructor(
    readonly clause: 'filter' | 'having' | 'qualify',
    readonly received: string,
  ) {
    super(`${clause}() expects an Expression, got ${received}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedDialectError extends Error {
  override readonly name = 'UnsupportedDialectError';

  constructor(
    readonly dialect: string,
    readonly available: readonly string[] = [],
  ) {
    super(
      available.length > 0
        ? `Unsupported SQL dialect: ${dialect} (registered: ${available.join(', ')})`
        : `Unsupported SQL dialect: ${dialect}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised while building expressions, never by the compiler: a column was
 * read from a table whose manifest does not list it.
 */
export class ColumnResolutionError extends Error {
  override readonly name = 'ColumnResolutionError';

  constructor(
    readonly column: string,
    readonly table: string,
  ) {
    super(`Column "${column}" does not exist on table "${table}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidSortDirectionError extends Error {
  override readonly name = 'InvalidSortDirectionError';

  constructor(readonly direction: string) {
    super(`Invalid sort direction "${direction}": expected ASC or DESC`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedFeatureError extends Error {
  override readonly name = 'UnsupportedFeatureError';

  constructor(
    readonly feature: string,
    readonly dialect: string,
  ) {
    super(`${feature} is not supported by the ${dialect} dialect`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FunctionResolutionError extends Error {
  override readonly name = 'FunctionResolutionError';

  constructor(
    readonly functionName: string,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidLiteralError extends Error {
  override readonly name = 'InvalidLiteralError';

  constructor(
    readonly received: string,
    readonly reason: string,
  ) {
    super(`Cannot render ${received} as a SQL literal: ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
