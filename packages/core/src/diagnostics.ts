/**
 * Diagnostics catalog for refinum
 *
 * Every diagnostic a macro reports has a stable code in the TS custom
 * range (9301-9399) and a message template with {placeholders}.
 *
 * @example
 * ```typescript
 * reportDiagnostic(ctx, RF9301, callExpr, {
 *   type: "PosInt",
 *   constraint: "positive (x > 0)",
 *   example: "42",
 * });
 * ```
 */

import type * as ts from "typescript";
import type { MacroContext } from "./types.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Literal = "literal",
  MacroSyntax = "syntax",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9301-9399 */
  readonly code: number;

  /** Default severity (can be overridden per-emit) */
  readonly severity: "error" | "warning";

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs */
  readonly explanation: string;
}

// ============================================================================
// Error Catalog: Literal checks (9301-9399)
// ============================================================================

export const RF9301: DiagnosticDescriptor = {
  code: 9301,
  severity: "error",
  category: DiagnosticCategory.Literal,
  messageTemplate:
    "{type}(...) can only be invoked on a {constraint} literal, like {type}({example}).",
  explanation: `The literal passed to a refinement type does not satisfy the type's predicate.

The same predicate runs at run time, so this call would throw. Either fix the
literal or, for values that are only known at run time, use {type}.from.`,
};

export const RF9302: DiagnosticDescriptor = {
  code: 9302,
  severity: "error",
  category: DiagnosticCategory.Literal,
  messageTemplate:
    "{type}(...) can only be invoked on a literal, like {type}({example}). Please use {type}.from instead.",
  explanation: `Calling a refinement type directly is reserved for compile-time constants, which
are checked during compilation. Values computed at run time go through
{type}.from, {type}.ensuringValid, {type}.fromOrElse and friends.`,
};

export const RF9303: DiagnosticDescriptor = {
  code: 9303,
  severity: "error",
  category: DiagnosticCategory.MacroSyntax,
  messageTemplate: "{type}(...) takes exactly one argument, got {count}.",
  explanation: `A refinement type is applied to a single value.`,
};

/**
 * Interpolate a descriptor's message template.
 */
export function formatDiagnosticMessage(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number>
): string {
  let message = descriptor.messageTemplate;
  for (const [key, value] of Object.entries(args)) {
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), String(value));
  }
  return message;
}

/**
 * Report a catalog diagnostic through the macro context.
 */
export function reportDiagnostic(
  ctx: MacroContext,
  descriptor: DiagnosticDescriptor,
  node: ts.Node,
  args: Record<string, string | number>,
  severity: "error" | "warning" = descriptor.severity
): void {
  const message = formatDiagnosticMessage(descriptor, args);
  if (severity === "error") {
    ctx.reportError(node, message, descriptor.code);
  } else {
    ctx.reportWarning(node, message, descriptor.code);
  }
}
