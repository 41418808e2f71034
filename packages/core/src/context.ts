/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { MacroContext, ComptimeValue, MacroDiagnostic } from "./types.js";

/** Global identifiers that always denote the same value */
const GLOBAL_CONSTANTS: ReadonlyMap<string, ComptimeValue> = new Map<string, ComptimeValue>([
  ["NaN", { kind: "number", value: NaN }],
  ["Infinity", { kind: "number", value: Infinity }],
  ["undefined", { kind: "undefined" }],
]);

export class MacroContextImpl implements MacroContext {
  private readonly diagnostics: MacroDiagnostic[] = [];

  /** Const declarations currently being evaluated, to stop on cycles */
  private resolving = new Set<ts.VariableDeclaration>();

  constructor(
    public readonly program: ts.Program,
    public readonly typeChecker: ts.TypeChecker,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory
  ) {}

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  createNumericLiteral(value: number): ts.Expression {
    if (Number.isNaN(value)) {
      return this.factory.createIdentifier("NaN");
    }
    const magnitude = Math.abs(value);
    const literal =
      magnitude === Infinity
        ? this.factory.createIdentifier("Infinity")
        : this.factory.createNumericLiteral(magnitude);
    return value < 0 || Object.is(value, -0)
      ? this.factory.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, literal)
      : literal;
  }

  createStringLiteral(value: string): ts.StringLiteral {
    return this.factory.createStringLiteral(value);
  }

  comptimeValueToExpression(value: ComptimeValue): ts.Expression {
    switch (value.kind) {
      case "number":
        return this.createNumericLiteral(value.value);
      case "bigint": {
        const literal = this.factory.createBigIntLiteral(
          `${value.value < 0n ? -value.value : value.value}n`
        );
        return value.value < 0n
          ? this.factory.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, literal)
          : literal;
      }
      case "string":
        return this.createStringLiteral(value.value);
      case "boolean":
        return value.value ? this.factory.createTrue() : this.factory.createFalse();
      case "null":
        return this.factory.createNull();
      case "undefined":
        return this.factory.createIdentifier("undefined");
      case "error":
        throw new Error(`Cannot convert error value to expression: ${value.message}`);
    }
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportError(node: ts.Node, message: string, code?: number): void {
    this.diagnostics.push({ severity: "error", message, code, node });
  }

  reportWarning(node: ts.Node, message: string, code?: number): void {
    this.diagnostics.push({ severity: "warning", message, code, node });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }

  // -------------------------------------------------------------------------
  // Compile-Time Evaluation
  // -------------------------------------------------------------------------

  evaluate(node: ts.Node): ComptimeValue {
    return this.evaluateNode(node);
  }

  isComptime(node: ts.Node): boolean {
    if (
      ts.isNumericLiteral(node) ||
      ts.isBigIntLiteral(node) ||
      ts.isStringLiteral(node) ||
      ts.isNoSubstitutionTemplateLiteral(node)
    ) {
      return true;
    }

    if (
      node.kind === ts.SyntaxKind.TrueKeyword ||
      node.kind === ts.SyntaxKind.FalseKeyword ||
      node.kind === ts.SyntaxKind.NullKeyword
    ) {
      return true;
    }

    if (ts.isBinaryExpression(node)) {
      return this.isComptime(node.left) && this.isComptime(node.right);
    }

    if (ts.isPrefixUnaryExpression(node)) {
      return this.isComptime(node.operand);
    }

    if (ts.isConditionalExpression(node)) {
      return (
        this.isComptime(node.condition) &&
        this.isComptime(node.whenTrue) &&
        this.isComptime(node.whenFalse)
      );
    }

    if (ts.isParenthesizedExpression(node)) {
      return this.isComptime(node.expression);
    }

    // Identifiers are comptime only if they refer to const values
    if (ts.isIdentifier(node)) {
      if (GLOBAL_CONSTANTS.has(node.text)) return true;
      const decl = this.constDeclarationOf(node);
      if (!decl?.initializer || this.resolving.has(decl)) return false;
      this.resolving.add(decl);
      try {
        return this.isComptime(decl.initializer);
      } finally {
        this.resolving.delete(decl);
      }
    }

    return false;
  }

  private constDeclarationOf(node: ts.Identifier): ts.VariableDeclaration | undefined {
    let symbol = this.typeChecker.getSymbolAtLocation(node);
    if (symbol && symbol.flags & ts.SymbolFlags.Alias) {
      symbol = this.typeChecker.getAliasedSymbol(symbol);
    }
    const decl = symbol?.getDeclarations()?.[0];
    if (
      decl &&
      ts.isVariableDeclaration(decl) &&
      ts.isVariableDeclarationList(decl.parent) &&
      decl.parent.flags & ts.NodeFlags.Const
    ) {
      return decl;
    }
    return undefined;
  }

  private evaluateNode(node: ts.Node): ComptimeValue {
    // Numeric literals (the scanner normalizes hex/octal/binary and separators)
    if (ts.isNumericLiteral(node)) {
      return { kind: "number", value: Number(node.text) };
    }

    // BigInt literals keep their trailing "n"
    if (ts.isBigIntLiteral(node)) {
      return { kind: "bigint", value: BigInt(node.text.slice(0, -1)) };
    }

    // String literals
    if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
      return { kind: "string", value: node.text };
    }

    // Boolean literals
    if (node.kind === ts.SyntaxKind.TrueKeyword) {
      return { kind: "boolean", value: true };
    }
    if (node.kind === ts.SyntaxKind.FalseKeyword) {
      return { kind: "boolean", value: false };
    }

    if (node.kind === ts.SyntaxKind.NullKeyword) {
      return { kind: "null" };
    }

    // Parenthesized expressions
    if (ts.isParenthesizedExpression(node)) {
      return this.evaluateNode(node.expression);
    }

    if (ts.isIdentifier(node)) {
      return this.evaluateIdentifier(node);
    }

    // Binary expressions
    if (ts.isBinaryExpression(node)) {
      return this.evaluateBinaryExpression(node);
    }

    // Prefix unary expressions
    if (ts.isPrefixUnaryExpression(node)) {
      return this.evaluatePrefixUnary(node);
    }

    // Conditional expressions (ternary)
    if (ts.isConditionalExpression(node)) {
      const condition = this.evaluateNode(node.condition);
      if (condition.kind === "error") return condition;
      const condValue = this.comptimeToBoolean(condition);
      if (condValue === null) {
        return { kind: "error", message: "Cannot convert to boolean" };
      }
      return condValue ? this.evaluateNode(node.whenTrue) : this.evaluateNode(node.whenFalse);
    }

    return {
      kind: "error",
      message: `Cannot evaluate node of kind ${ts.SyntaxKind[node.kind]} at compile time`,
    };
  }

  private evaluateIdentifier(node: ts.Identifier): ComptimeValue {
    const global = GLOBAL_CONSTANTS.get(node.text);
    if (global) return global;

    const decl = this.constDeclarationOf(node);
    if (!decl?.initializer) {
      return { kind: "error", message: `'${node.text}' is not a compile-time constant` };
    }
    if (this.resolving.has(decl)) {
      return { kind: "error", message: `'${node.text}' refers to itself` };
    }

    this.resolving.add(decl);
    try {
      return this.evaluateNode(decl.initializer);
    } finally {
      this.resolving.delete(decl);
    }
  }

  private evaluateBinaryExpression(node: ts.BinaryExpression): ComptimeValue {
    const op = node.operatorToken.kind;

    // Short-circuit evaluation for && and ||
    if (op === ts.SyntaxKind.AmpersandAmpersandToken || op === ts.SyntaxKind.BarBarToken) {
      const left = this.evaluateNode(node.left);
      if (left.kind === "error") return left;
      const leftBool = this.comptimeToBoolean(left);
      if (leftBool === null) {
        return { kind: "error", message: "Cannot convert to boolean" };
      }
      const isAnd = op === ts.SyntaxKind.AmpersandAmpersandToken;
      if (leftBool !== isAnd) return left;
      return this.evaluateNode(node.right);
    }

    const left = this.evaluateNode(node.left);
    const right = this.evaluateNode(node.right);

    if (left.kind === "error") return left;
    if (right.kind === "error") return right;

    if (left.kind === "number" && right.kind === "number") {
      return this.evaluateNumeric(op, left.value, right.value);
    }

    if (left.kind === "bigint" && right.kind === "bigint") {
      return this.evaluateBigInt(op, left.value, right.value);
    }

    if (left.kind === "string" && right.kind === "string") {
      switch (op) {
        case ts.SyntaxKind.PlusToken:
          return { kind: "string", value: left.value + right.value };
        case ts.SyntaxKind.EqualsEqualsEqualsToken:
          return { kind: "boolean", value: left.value === right.value };
        case ts.SyntaxKind.ExclamationEqualsEqualsToken:
          return { kind: "boolean", value: left.value !== right.value };
      }
    }

    return {
      kind: "error",
      message: `Cannot apply operator ${ts.tokenToString(op) ?? ts.SyntaxKind[op]} to ${left.kind} and ${right.kind}`,
    };
  }

  private evaluateNumeric(op: ts.BinaryOperator, left: number, right: number): ComptimeValue {
    switch (op) {
      case ts.SyntaxKind.PlusToken:
        return { kind: "number", value: left + right };
      case ts.SyntaxKind.MinusToken:
        return { kind: "number", value: left - right };
      case ts.SyntaxKind.AsteriskToken:
        return { kind: "number", value: left * right };
      case ts.SyntaxKind.SlashToken:
        return { kind: "number", value: left / right };
      case ts.SyntaxKind.PercentToken:
        return { kind: "number", value: left % right };
      case ts.SyntaxKind.AsteriskAsteriskToken:
        return { kind: "number", value: left ** right };
      case ts.SyntaxKind.LessThanToken:
        return { kind: "boolean", value: left < right };
      case ts.SyntaxKind.LessThanEqualsToken:
        return { kind: "boolean", value: left <= right };
      case ts.SyntaxKind.GreaterThanToken:
        return { kind: "boolean", value: left > right };
      case ts.SyntaxKind.GreaterThanEqualsToken:
        return { kind: "boolean", value: left >= right };
      case ts.SyntaxKind.EqualsEqualsEqualsToken:
        return { kind: "boolean", value: left === right };
      case ts.SyntaxKind.ExclamationEqualsEqualsToken:
        return { kind: "boolean", value: left !== right };
      case ts.SyntaxKind.AmpersandToken:
        return { kind: "number", value: left & right };
      case ts.SyntaxKind.BarToken:
        return { kind: "number", value: left | right };
      case ts.SyntaxKind.CaretToken:
        return { kind: "number", value: left ^ right };
      case ts.SyntaxKind.LessThanLessThanToken:
        return { kind: "number", value: left << right };
      case ts.SyntaxKind.GreaterThanGreaterThanToken:
        return { kind: "number", value: left >> right };
      case ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken:
        return { kind: "number", value: left >>> right };
    }
    return { kind: "error", message: `Unsupported numeric operator ${ts.tokenToString(op)}` };
  }

  private evaluateBigInt(op: ts.BinaryOperator, left: bigint, right: bigint): ComptimeValue {
    if ((op === ts.SyntaxKind.SlashToken || op === ts.SyntaxKind.PercentToken) && right === 0n) {
      return { kind: "error", message: "Division by zero" };
    }
    switch (op) {
      case ts.SyntaxKind.PlusToken:
        return { kind: "bigint", value: left + right };
      case ts.SyntaxKind.MinusToken:
        return { kind: "bigint", value: left - right };
      case ts.SyntaxKind.AsteriskToken:
        return { kind: "bigint", value: left * right };
      case ts.SyntaxKind.SlashToken:
        return { kind: "bigint", value: left / right };
      case ts.SyntaxKind.PercentToken:
        return { kind: "bigint", value: left % right };
      case ts.SyntaxKind.AsteriskAsteriskToken:
        return right < 0n
          ? { kind: "error", message: "Negative bigint exponent" }
          : { kind: "bigint", value: left ** right };
      case ts.SyntaxKind.LessThanToken:
        return { kind: "boolean", value: left < right };
      case ts.SyntaxKind.LessThanEqualsToken:
        return { kind: "boolean", value: left <= right };
      case ts.SyntaxKind.GreaterThanToken:
        return { kind: "boolean", value: left > right };
      case ts.SyntaxKind.GreaterThanEqualsToken:
        return { kind: "boolean", value: left >= right };
      case ts.SyntaxKind.EqualsEqualsEqualsToken:
        return { kind: "boolean", value: left === right };
      case ts.SyntaxKind.ExclamationEqualsEqualsToken:
        return { kind: "boolean", value: left !== right };
      case ts.SyntaxKind.AmpersandToken:
        return { kind: "bigint", value: left & right };
      case ts.SyntaxKind.BarToken:
        return { kind: "bigint", value: left | right };
      case ts.SyntaxKind.CaretToken:
        return { kind: "bigint", value: left ^ right };
      case ts.SyntaxKind.LessThanLessThanToken:
        return { kind: "bigint", value: left << right };
      case ts.SyntaxKind.GreaterThanGreaterThanToken:
        return { kind: "bigint", value: left >> right };
    }
    return { kind: "error", message: `Unsupported bigint operator ${ts.tokenToString(op)}` };
  }

  private evaluatePrefixUnary(node: ts.PrefixUnaryExpression): ComptimeValue {
    const operand = this.evaluateNode(node.operand);
    if (operand.kind === "error") return operand;

    switch (node.operator) {
      case ts.SyntaxKind.MinusToken:
        if (operand.kind === "number") return { kind: "number", value: -operand.value };
        if (operand.kind === "bigint") return { kind: "bigint", value: -operand.value };
        break;
      case ts.SyntaxKind.PlusToken:
        if (operand.kind === "number") return { kind: "number", value: +operand.value };
        break;
      case ts.SyntaxKind.TildeToken:
        if (operand.kind === "number") return { kind: "number", value: ~operand.value };
        if (operand.kind === "bigint") return { kind: "bigint", value: ~operand.value };
        break;
      case ts.SyntaxKind.ExclamationToken: {
        const boolValue = this.comptimeToBoolean(operand);
        if (boolValue !== null) return { kind: "boolean", value: !boolValue };
        break;
      }
    }

    return {
      kind: "error",
      message: `Cannot apply unary ${ts.tokenToString(node.operator)} to ${operand.kind}`,
    };
  }

  private comptimeToBoolean(value: ComptimeValue): boolean | null {
    switch (value.kind) {
      case "boolean":
        return value.value;
      case "number":
        return value.value !== 0 && !Number.isNaN(value.value);
      case "bigint":
        return value.value !== 0n;
      case "string":
        return value.value !== "";
      case "null":
      case "undefined":
        return false;
      case "error":
        return null;
    }
  }
}

/**
 * Create a macro context for a given program and source file
 */
export function createMacroContext(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  transformContext: ts.TransformationContext
): MacroContextImpl {
  return new MacroContextImpl(
    program,
    program.getTypeChecker(),
    sourceFile,
    transformContext.factory
  );
}
