/**
 * Compile-Time Literal Checking
 *
 * Calling a refinement type directly, as in `PosInt(42)`, is reserved for
 * literals. Two static layers check the call, both using the type's own
 * predicate wording:
 *
 * 1. The companion's call signature carries `LiteralGuard<N, V>`, which
 *    turns an argument the type cannot hold into a type error whose message
 *    names the type:
 *
 *    ```typescript
 *    PosInt(0);
 *    // Argument of type '0' is not assignable to parameter of type
 *    // '0 & { readonly "PosInt(...) can only be invoked on a positive (x > 0) literal, like PosInt(42).": never; }'
 *    ```
 *
 * 2. An expression macro per type, run by `@refinum/transformer`, evaluates
 *    the argument at compile time and runs the real predicate, so it also
 *    catches what types cannot see (`PosInt(2 ** 31)`, `PosFloat(1e-50)`).
 *    A compile-time constant that is not a literal is folded to one.
 */

import * as ts from "typescript";
import {
  RF9301,
  RF9302,
  RF9303,
  config,
  defineExpressionMacro,
  globalRegistry,
  reportDiagnostic,
  type MacroContext,
} from "@refinum/core";
import type { IntegralKind } from "./primitives.js";
import type { AnyValDefinition } from "./registry.js";
import type { AnyValName, AnyValTable, KindOf, LiteralRule } from "./table.js";

/** The module the companions are exported from */
export const ANYVALS_MODULE = "@refinum/anyvals";

// ============================================================================
// Type-Level Guard
// ============================================================================

type Reject<Message extends string> = { readonly [P in Message]: never };

type NotALiteral<N extends AnyValName> =
  `${N}(...) can only be invoked on a literal, like ${N}(${AnyValTable[N]["example"]}). Please use ${N}.from instead.`;

type NotValid<N extends AnyValName> =
  `${N}(...) can only be invoked on a ${AnyValTable[N]["description"]} literal, like ${N}(${AnyValTable[N]["example"]}).`;

type DigitText = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";
type DigitCode = 48 | 49 | 50 | 51 | 52 | 53 | 54 | 55 | 56 | 57;

type IsZero<V> = V extends 0 | 0n ? true : false;
type IsNegative<V extends number | bigint> = `${V}` extends `-${string}` ? true : false;
type IsFractional<V extends number | bigint> = `${V}` extends `${string}.${string}` ? true : false;

type RuleHolds<Rule extends LiteralRule, V extends number | bigint> = Rule extends "positive"
  ? IsZero<V> extends true
    ? false
    : IsNegative<V> extends true
      ? false
      : true
  : Rule extends "nonNegative"
    ? IsNegative<V> extends true
      ? false
      : true
    : Rule extends "nonZero"
      ? IsZero<V> extends true
        ? false
        : true
      : false;

/** `true` for each member of V the type accepts, `false` for each it rejects */
type Verdict<N extends AnyValName, V> = V extends unknown
  ? AnyValTable[N]["literal"] extends "digit"
    ? V extends DigitText | DigitCode
      ? true
      : false
    : V extends number | bigint
      ? KindOf<N> extends IntegralKind
        ? IsFractional<V> extends true
          ? false
          : RuleHolds<AnyValTable[N]["literal"], V>
        : RuleHolds<AnyValTable[N]["literal"], V>
      : false
  : never;

/**
 * `unknown` when V is a literal type the refinement type accepts, otherwise
 * an object type whose only key is the rejection message.
 */
export type LiteralGuard<N extends AnyValName, V> = [number] extends [V]
  ? Reject<NotALiteral<N>>
  : [bigint] extends [V]
    ? Reject<NotALiteral<N>>
    : [string] extends [V]
      ? Reject<NotALiteral<N>>
      : false extends Verdict<N, V>
        ? Reject<NotValid<N>>
        : unknown;

// ============================================================================
// Literal-Check Macro
// ============================================================================

function isLiteralNode(node: ts.Expression): boolean {
  if (ts.isParenthesizedExpression(node)) return isLiteralNode(node.expression);
  if (
    ts.isPrefixUnaryExpression(node) &&
    (node.operator === ts.SyntaxKind.MinusToken || node.operator === ts.SyntaxKind.PlusToken)
  ) {
    return ts.isNumericLiteral(node.operand) || ts.isBigIntLiteral(node.operand);
  }
  return ts.isNumericLiteral(node) || ts.isBigIntLiteral(node) || ts.isStringLiteral(node);
}

/**
 * Check one call of a refinement type. Returns the call unchanged, or with
 * its constant argument folded to a literal.
 */
export function expandLiteralCall(
  ctx: MacroContext,
  definition: AnyValDefinition,
  callExpr: ts.CallExpression,
  args: readonly ts.Expression[]
): ts.Expression {
  const mode = config.literalMode();
  if (mode === "off") return callExpr;

  const severity = mode === "warning" ? "warning" : "error";
  const messageArgs = {
    type: definition.typeName,
    constraint: definition.description,
    example: definition.example,
  };

  if (args.length !== 1) {
    reportDiagnostic(ctx, RF9303, callExpr, { type: definition.typeName, count: args.length }, severity);
    return callExpr;
  }

  const [arg] = args;
  if (!ctx.isComptime(arg)) {
    reportDiagnostic(ctx, RF9302, arg, messageArgs, severity);
    return callExpr;
  }

  const evaluated = ctx.evaluate(arg);
  if (evaluated.kind !== "number" && evaluated.kind !== "bigint" && evaluated.kind !== "string") {
    reportDiagnostic(ctx, evaluated.kind === "error" ? RF9302 : RF9301, arg, messageArgs, severity);
    return callExpr;
  }

  if (definition.admit(evaluated.value) === undefined) {
    reportDiagnostic(ctx, RF9301, arg, messageArgs, severity);
    return callExpr;
  }

  if (isLiteralNode(arg)) return callExpr;

  return ctx.factory.updateCallExpression(callExpr, callExpr.expression, callExpr.typeArguments, [
    ctx.comptimeValueToExpression(evaluated),
  ]);
}

/** Register the literal-check macro of a refinement type */
export function registerLiteralMacro(definition: AnyValDefinition): void {
  globalRegistry.register(
    defineExpressionMacro({
      name: definition.typeName,
      module: ANYVALS_MODULE,
      description: `Checks that ${definition.typeName}(...) is applied to a ${definition.description} literal`,
      expand: (ctx, callExpr, args) => expandLiteralCall(ctx, definition, callExpr, args),
    })
  );
}
