/**
 * Core module exports for @refinum/core
 *
 * This package provides:
 * - Macro system infrastructure (types, registry, context)
 * - Configuration and the diagnostics catalog
 * - Runtime safety primitives (invariant, unreachable)
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./context.js";

// Runtime Safety Primitives
export { InvariantError, invariant, unreachable } from "./safety.js";

// Configuration System
export {
  config,
  type RefinumConfig,
  type LiteralsConfig,
  type LiteralMode,
  type ConfigResetOptions,
} from "./config.js";

// Diagnostics System
export * from "./diagnostics.js";
