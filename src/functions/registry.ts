import { FunctionResolutionError } from '../errors.js';
import type { Expression } from '../expr/types.js';
import { BUILTIN_FUNCTIONS } from './catalog.js';
import type {
  FunctionConstructor,
  FunctionDefinition,
  FunctionResolver,
  SpecializedFunction,
} from './types.js';

function arityBounds(arity: FunctionDefinition['arity']): readonly [number, number] {
  return typeof arity === 'number' ? [arity, arity] : arity;
}

function describeArity(arity: FunctionDefinition['arity']): string {
  const [lo, hi] = arityBounds(arity);
  if (lo === hi) return `${lo}`;
  return hi === Infinity ? `at least ${lo}` : `${lo} to ${hi}`;
}

/**
 * Name → constructor map for functions with dialect-specific renderings.
 * Lookups are case-insensitive.
 */
export class FunctionRegistry implements FunctionResolver {
  private readonly definitions = new Map<string, FunctionDefinition>();

  register(definition: FunctionDefinition): this {
    if (definition.name.trim() === '') {
      throw new Error('FunctionRegistry.register: name must be a non-empty string');
    }
    this.definitions.set(definition.name.toLowerCase(), definition);
    return this;
  }

  has(name: string): boolean {
    return this.definitions.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.definitions.keys()].sort();
  }

  lookup(name: string): FunctionConstructor | undefined {
    const definition = this.definitions.get(name.toLowerCase());
    if (definition === undefined) return undefined;
    return (args) => this.instantiate(definition, args);
  }

  /** Like lookup() followed by a call, but throws for unknown names. */
  construct(name: string, args: readonly Expression[]): SpecializedFunction {
    const constructor = this.lookup(name);
    if (constructor === undefined) {
      throw new FunctionResolutionError(name, `Function '${name}' is not registered`);
    }
    return constructor(args);
  }

  private instantiate(definition: FunctionDefinition, args: readonly Expression[]): SpecializedFunction {
    const [lo, hi] = arityBounds(definition.arity);
    if (args.length < lo || args.length > hi) {
      throw new FunctionResolutionError(
        definition.name,
        `Function '${definition.name}' expects ${describeArity(definition.arity)} arguments, `
          + `but ${args.length} were provided`,
      );
    }
    return {
      render(ctx) {
        const sql = args.map((arg) => ctx.expression(arg));
        const renderer = definition.dialects?.[ctx.dialect] ?? definition.render;
        return renderer(sql);
      },
    };
  }
}

export function createDefaultFunctionRegistry(): FunctionRegistry {
  const registry = new FunctionRegistry();
  for (const definition of BUILTIN_FUNCTIONS) {
    registry.register(definition);
  }
  return registry;
}
