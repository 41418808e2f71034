/**
 * Integration tests for the macro transformer.
 *
 * Fixture files importing the refinement types are compiled together with
 * the real sources, so macro resolution goes through the type checker the
 * same way it does in a user project.
 */

import { describe, it, expect, beforeAll, afterEach, vi } from "vitest";
import * as ts from "typescript";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "@refinum/core";
import macroTransformerFactory, { DIAGNOSTIC_SOURCE, checkProgram, resolveModuleSpecifier } from "../src/index.js";

const ANYVALS = "../../anyvals/src/index.js";

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./${name}`, import.meta.url));
}

const FIXTURES: Record<string, string> = {
  "valid.fixture.ts": [
    `import { NonZeroLong, PosInt } from "${ANYVALS}";`,
    "export const a = PosInt(42);",
    "export const b = NonZeroLong(-5n);",
  ].join("\n"),
  "alias.fixture.ts": [`import { PosZDouble as Dbl } from "${ANYVALS}";`, "export const d = Dbl(-1);"].join("\n"),
  "namespace.fixture.ts": [`import * as anyvals from "${ANYVALS}";`, "export const n = anyvals.PosInt(0);"].join(
    "\n"
  ),
  "other.fixture.ts": [
    `import { PosInt as Checked } from "${ANYVALS}";`,
    "function PosInt(value: number): number {",
    "  return value;",
    "}",
    "export const s = PosInt(0);",
    "export const f = Checked.from(0);",
  ].join("\n"),
  "fold.fixture.ts": [
    `import { PosInt } from "${ANYVALS}";`,
    "const base = 20;",
    "export const value = PosInt(base + 1);",
  ].join("\n"),
};

const OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  lib: ["lib.es2022.d.ts"],
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  noEmit: true,
  skipLibCheck: true,
  types: ["node"],
};

let program: ts.Program;

beforeAll(() => {
  const virtualFiles = new Map<string, ts.SourceFile>();
  for (const [name, source] of Object.entries(FIXTURES)) {
    const fileName = fixturePath(name);
    virtualFiles.set(fileName, ts.createSourceFile(fileName, source, ts.ScriptTarget.ES2022, true));
  }

  const host = ts.createCompilerHost(OPTIONS);
  const getSourceFile = host.getSourceFile.bind(host);
  host.getSourceFile = (fileName, languageVersion, onError, shouldCreate) =>
    virtualFiles.get(fileName) ?? getSourceFile(fileName, languageVersion, onError, shouldCreate);
  const fileExists = host.fileExists.bind(host);
  host.fileExists = (fileName) => virtualFiles.has(fileName) || fileExists(fileName);

  program = ts.createProgram([...virtualFiles.keys()], OPTIONS, host);
}, 120_000);

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

interface Reported {
  line: number;
  code: number;
  category: ts.DiagnosticCategory;
  source: string | undefined;
  message: string;
}

function reportedFor(diagnostics: readonly ts.Diagnostic[], name: string): Reported[] {
  return diagnostics
    .filter((d) => d.file?.fileName === fixturePath(name))
    .map((d) => ({
      line: d.file ? d.file.getLineAndCharacterOfPosition(d.start ?? 0).line : -1,
      code: d.code,
      category: d.category,
      source: d.source,
      message: ts.flattenDiagnosticMessageText(d.messageText, "\n"),
    }));
}

function sourceFileOf(name: string): ts.SourceFile {
  const sourceFile = program.getSourceFile(fixturePath(name));
  if (!sourceFile) throw new Error(`${name} was not loaded`);
  return sourceFile;
}

describe("checkProgram", () => {
  it("should accept valid literals", () => {
    expect(reportedFor(checkProgram(program), "valid.fixture.ts")).toEqual([]);
  });

  it("should follow an aliased import to the refinement type", () => {
    expect(reportedFor(checkProgram(program), "alias.fixture.ts")).toEqual([
      {
        line: 1,
        code: 9301,
        category: ts.DiagnosticCategory.Error,
        source: DIAGNOSTIC_SOURCE,
        message:
          "[refinum] PosZDouble(...) can only be invoked on a non-negative (x >= 0) literal, like PosZDouble(42.0).",
      },
    ]);
  });

  it("should resolve a call through a namespace import", () => {
    expect(reportedFor(checkProgram(program), "namespace.fixture.ts")).toEqual([
      {
        line: 1,
        code: 9301,
        category: ts.DiagnosticCategory.Error,
        source: DIAGNOSTIC_SOURCE,
        message: "[refinum] PosInt(...) can only be invoked on a positive (x > 0) literal, like PosInt(42).",
      },
    ]);
  });

  it("should ignore local functions and companion methods", () => {
    expect(reportedFor(checkProgram(program), "other.fixture.ts")).toEqual([]);
  });

  it("should only report the rejected fixtures", () => {
    const files = new Set(checkProgram(program).map((d) => d.file?.fileName));
    expect(files).toEqual(new Set([fixturePath("alias.fixture.ts"), fixturePath("namespace.fixture.ts")]));
  });

  it("should report warnings in warning mode", () => {
    config.set({ literals: { mode: "warning" } });
    const reported = reportedFor(checkProgram(program), "namespace.fixture.ts");
    expect(reported.map((r) => r.category)).toEqual([ts.DiagnosticCategory.Warning]);
  });

  it("should report nothing when the check is off", () => {
    config.set({ literals: { mode: "off" } });
    expect(checkProgram(program)).toEqual([]);
  });
});

describe("macroTransformerFactory", () => {
  it("should fold a constant argument in the emitted code", () => {
    const diagnostics: ts.Diagnostic[] = [];
    const factory = macroTransformerFactory(program, { onDiagnostic: (d) => diagnostics.push(d) });
    const result = ts.transform(sourceFileOf("fold.fixture.ts"), [factory], program.getCompilerOptions());
    const [transformed] = result.transformed;
    const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
    const lines = printer.printFile(transformed).split("\n");
    result.dispose();

    expect(lines).toContain("export const value = PosInt(21);");
    expect(diagnostics).toEqual([]);
  });

  it("should log its setup when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    macroTransformerFactory(program, { verbose: true });
    expect(log).toHaveBeenNthCalledWith(1, "[refinum] Initializing transformer");
  });

  it("should log the config file it was configured from", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "refinum-transformer-"));
    try {
      fs.writeFileSync(path.join(dir, ".refinumrc.json"), JSON.stringify({ literals: { mode: "warning" } }));
      config.reset({ searchFrom: dir });
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      macroTransformerFactory(program, { verbose: true });
      expect(log).toHaveBeenNthCalledWith(2, `[refinum] Using config file: ${path.join(dir, ".refinumrc.json")}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("resolveModuleSpecifier", () => {
  it("should read the package name from an installed path", () => {
    expect(resolveModuleSpecifier("/proj/node_modules/@refinum/anyvals/src/types.ts")).toBe("@refinum/anyvals");
    expect(resolveModuleSpecifier("C:\\proj\\node_modules\\lodash\\index.d.ts")).toBe("lodash");
  });

  it("should recognize the workspace layout", () => {
    expect(resolveModuleSpecifier("/repo/packages/anyvals/src/types.ts")).toBe("@refinum/anyvals");
  });

  it("should return undefined for other files", () => {
    expect(resolveModuleSpecifier("/repo/src/main.ts")).toBeUndefined();
  });
});
