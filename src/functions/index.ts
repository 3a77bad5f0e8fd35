// Public API barrel for the relq/functions subpath.

export { FunctionRegistry, createDefaultFunctionRegistry } from './registry.js';
export { BUILTIN_FUNCTIONS } from './catalog.js';
export type {
  ArgumentRenderer,
  FunctionConstructor,
  FunctionDefinition,
  FunctionResolver,
  RenderContext,
  SpecializedFunction,
} from './types.js';
