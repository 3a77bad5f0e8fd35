import type { Expression } from '../expr/types.js';

/** What a specialized function sees while it is being rendered. */
export interface RenderContext {
  /** Canonical name of the dialect being generated, e.g. `duckdb`. */
  readonly dialect: string;
  /** Renders a sub-expression in the current dialect. */
  expression(expr: Expression): string;
}

export interface SpecializedFunction {
  render(ctx: RenderContext): string;
}

/** May throw; the compiler treats any failure as "no specialized rendering". */
export type FunctionConstructor = (args: readonly Expression[]) => SpecializedFunction;

/**
 * Capability map consulted by the compiler for every function call.
 * Returning undefined means "render generically".
 */
export interface FunctionResolver {
  lookup(name: string): FunctionConstructor | undefined;
}

/** Renders already-compiled argument SQL. */
export type ArgumentRenderer = (args: readonly string[]) => string;

export interface FunctionDefinition {
  readonly name: string;
  /** Exact count, or an inclusive `[min, max]` range. */
  readonly arity: number | readonly [number, number];
  readonly render: ArgumentRenderer;
  /** Per-dialect overrides of `render`, keyed by dialect name. */
  readonly dialects?: Readonly<Record<string, ArgumentRenderer>>;
}
