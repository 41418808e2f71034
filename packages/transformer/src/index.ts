/**
 * @refinum/transformer - TypeScript transformer for the literal-check macros
 *
 * Expands every call whose callee resolves to a macro registered for its
 * module (the refinement type companions of `@refinum/anyvals`) and reports
 * the macro diagnostics through the TypeScript diagnostic pipeline.
 *
 * Use it with ts-patch as a `before` transformer, or run the pass without
 * emitting through `checkProgram`.
 */

import * as ts from "typescript";
import {
  config as refinumConfig,
  createMacroContext,
  globalRegistry,
  type ExpressionMacro,
  type MacroContextImpl,
  type MacroDiagnostic,
} from "@refinum/core";
import { ANYVALS_MODULE } from "@refinum/anyvals";

/**
 * Configuration for the transformer
 */
export interface MacroTransformerConfig {
  /** Enable verbose logging */
  verbose?: boolean;

  /**
   * Receive macro diagnostics directly. Without it, diagnostics go to the
   * transformation context when it accepts them.
   */
  onDiagnostic?: (diagnostic: ts.DiagnosticWithLocation) => void;
}

/** The `source` of every diagnostic the transformer reports */
export const DIAGNOSTIC_SOURCE = "refinum";

/** Code used for macro diagnostics that carry no catalog code */
const FALLBACK_CODE = 9300;

/** Source directory of each workspace package that registers macros */
const MACRO_PACKAGES: ReadonlyMap<string, string> = new Map([["anyvals", ANYVALS_MODULE]]);

interface DiagnosticSink {
  addDiagnostic(diagnostic: ts.DiagnosticWithLocation): void;
}

function isDiagnosticSink(context: object): context is DiagnosticSink {
  return "addDiagnostic" in context && typeof context.addDiagnostic === "function";
}

/**
 * Create the TypeScript transformer factory
 */
export default function macroTransformerFactory(
  program: ts.Program,
  config?: MacroTransformerConfig
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = config?.verbose ?? false;

  if (verbose) {
    console.log("[refinum] Initializing transformer");
    const configFile = refinumConfig.getConfigFilePath();
    if (configFile) {
      console.log(`[refinum] Using config file: ${configFile}`);
    }
    console.log(
      `[refinum] Registered macros: ${globalRegistry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[refinum] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(program, sourceFile, context);
      const transformer = new MacroTransformer(ctx, context, verbose);
      const result = ts.visitEachChild(sourceFile, transformer.visitor, context);

      for (const diag of ctx.getDiagnostics()) {
        const tsDiag = toTsDiagnostic(diag, sourceFile);

        if (config?.onDiagnostic) {
          config.onDiagnostic(tsDiag);
        } else if (isDiagnosticSink(context)) {
          context.addDiagnostic(tsDiag);
        }

        // Also log for build tools that don't surface TS diagnostics
        if (verbose) {
          const prefix = diag.severity === "error" ? "ERROR" : "WARNING";
          const { line } = sourceFile.getLineAndCharacterOfPosition(tsDiag.start);
          console.log(`[refinum ${prefix}] at ${sourceFile.fileName}:${line + 1} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

function toTsDiagnostic(diag: MacroDiagnostic, sourceFile: ts.SourceFile): ts.DiagnosticWithLocation {
  // Synthesized nodes have no position
  const node = diag.node !== undefined && diag.node.pos >= 0 ? diag.node : undefined;
  return {
    file: sourceFile,
    start: node ? node.getStart(sourceFile) : 0,
    length: node ? node.getWidth(sourceFile) : 0,
    messageText: `[refinum] ${diag.message}`,
    category: diag.severity === "error" ? ts.DiagnosticCategory.Error : ts.DiagnosticCategory.Warning,
    code: diag.code ?? FALLBACK_CODE,
    source: DIAGNOSTIC_SOURCE,
  };
}

/**
 * Walks one source file and expands the macro calls in it
 */
class MacroTransformer {
  /** Macro each callee symbol resolved to, or null when it is not a macro */
  private symbolMacroCache = new Map<ts.Symbol, ExpressionMacro | null>();

  readonly visitor = (node: ts.Node): ts.Node => this.visit(node);

  constructor(
    private ctx: MacroContextImpl,
    private context: ts.TransformationContext,
    private verbose: boolean
  ) {}

  private visit(node: ts.Node): ts.Node {
    if (ts.isCallExpression(node)) {
      const expanded = this.tryExpandExpressionMacro(node);
      if (expanded !== undefined) {
        // The expansion is not expanded again; only its operands are visited
        return ts.visitEachChild(expanded, this.visitor, this.context);
      }
    }
    return ts.visitEachChild(node, this.visitor, this.context);
  }

  private tryExpandExpressionMacro(node: ts.CallExpression): ts.Expression | undefined {
    let macroName: string | undefined;
    if (ts.isIdentifier(node.expression)) {
      macroName = node.expression.text;
    } else if (ts.isPropertyAccessExpression(node.expression) && ts.isIdentifier(node.expression.expression)) {
      // Namespace import: anyvals.PosInt(42)
      macroName = node.expression.name.text;
    }
    if (macroName === undefined) return undefined;

    const macro = this.resolveMacro(node.expression);
    if (!macro) return undefined;

    if (this.verbose) {
      console.log(`[refinum] Expanding expression macro: ${macroName}`);
    }

    try {
      return macro.expand(this.ctx, node, node.arguments);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.ctx.reportError(node, `Macro expansion failed: ${message}`);
      return node;
    }
  }

  /**
   * Resolve a callee to a macro definition: follow aliases to the original
   * declaration, then look the export up under the module it comes from.
   */
  private resolveMacro(callee: ts.Expression): ExpressionMacro | undefined {
    const symbol = this.ctx.typeChecker.getSymbolAtLocation(callee);
    if (!symbol) return undefined;

    const cached = this.symbolMacroCache.get(symbol);
    if (cached !== undefined) return cached ?? undefined;

    const resolved =
      symbol.flags & ts.SymbolFlags.Alias ? this.ctx.typeChecker.getAliasedSymbol(symbol) : symbol;

    let result: ExpressionMacro | null = null;
    for (const decl of resolved.getDeclarations() ?? []) {
      const moduleSpecifier = resolveModuleSpecifier(decl.getSourceFile().fileName);
      if (moduleSpecifier === undefined) continue;
      const macro = globalRegistry.getByModuleExport(moduleSpecifier, resolved.name);
      if (macro?.kind === "expression") {
        result = macro;
        break;
      }
    }

    this.symbolMacroCache.set(symbol, result);
    return result ?? undefined;
  }
}

/**
 * Map a file path back to the module specifier it is imported by, like
 * "@refinum/anyvals".
 */
export function resolveModuleSpecifier(fileName: string): string | undefined {
  const normalized = fileName.replace(/\\/g, "/");

  // Installed package
  const nodeModulesMatch = normalized.match(/\/node_modules\/((?:@[^/]+\/)?[^/]+)\//);
  if (nodeModulesMatch) {
    return nodeModulesMatch[1];
  }

  // Development mode: detect from the workspace layout
  for (const [directory, moduleName] of MACRO_PACKAGES) {
    if (normalized.includes(`/packages/${directory}/`)) return moduleName;
  }

  return undefined;
}

/**
 * Run the macro pass over the program's root files without emitting and
 * return the macro diagnostics.
 */
export function checkProgram(
  program: ts.Program,
  config?: Omit<MacroTransformerConfig, "onDiagnostic">
): ts.Diagnostic[] {
  const sourceFiles = program
    .getRootFileNames()
    .map((fileName) => program.getSourceFile(fileName))
    .filter((file): file is ts.SourceFile => file !== undefined && !file.isDeclarationFile);

  const diagnostics: ts.Diagnostic[] = [];
  const result = ts.transform(
    sourceFiles,
    [macroTransformerFactory(program, { ...config, onDiagnostic: (d) => diagnostics.push(d) })],
    program.getCompilerOptions()
  );
  result.dispose();
  return diagnostics;
}

export { macroTransformerFactory };
