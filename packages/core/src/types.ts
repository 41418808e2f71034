/**
 * Core types for the refinum macro system
 */

import * as ts from "typescript";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** The TypeScript Program instance */
  program: ts.Program;

  /** Type checker for semantic analysis */
  typeChecker: ts.TypeChecker;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  /** Create a numeric literal, wrapping negative values in a unary minus */
  createNumericLiteral(value: number): ts.Expression;

  /** Create a string literal */
  createStringLiteral(value: string): ts.StringLiteral;

  /** Convert a compile-time value back into an expression */
  comptimeValueToExpression(value: ComptimeValue): ts.Expression;

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string, code?: number): void;

  /** Report a compile-time warning */
  reportWarning(node: ts.Node, message: string, code?: number): void;

  /** Diagnostics reported so far */
  getDiagnostics(): MacroDiagnostic[];

  // -------------------------------------------------------------------------
  // Compile-Time Evaluation
  // -------------------------------------------------------------------------

  /** Evaluate an expression at compile time */
  evaluate(node: ts.Node): ComptimeValue;

  /** Check if a node can be evaluated at compile time */
  isComptime(node: ts.Node): boolean;
}

// ============================================================================
// Compile-Time Values
// ============================================================================

export type ComptimeValue =
  | { kind: "number"; value: number }
  | { kind: "bigint"; value: bigint }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "undefined" }
  | { kind: "error"; message: string };

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder.
   * When set, the macro is only activated when the placeholder is imported
   * from this module (or from a file inside the package that owns it).
   *
   * Examples: "@refinum/anyvals"
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name` if not specified.
   */
  exportName?: string;
}

/** Expression macro - checks or rewrites a call expression */
export interface ExpressionMacro extends MacroDefinitionBase {
  kind: "expression";

  /**
   * Expand the macro call into a new expression
   * @param ctx - The macro context
   * @param callExpr - The macro call expression
   * @param args - The arguments passed to the macro
   */
  expand(
    ctx: MacroContext,
    callExpr: ts.CallExpression,
    args: readonly ts.Expression[]
  ): ts.Expression;
}

/** Union of all macro types */
export type MacroDefinition = ExpressionMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  /** Severity level */
  severity: "error" | "warning";

  /** Diagnostic message */
  message: string;

  /** Catalog code, when the diagnostic comes from a descriptor */
  code?: number;

  /** Source node that caused the diagnostic */
  node?: ts.Node;
}
