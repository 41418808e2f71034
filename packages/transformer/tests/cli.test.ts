/**
 * Tests for the refinum CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { CliError, main, parseArgs } from "../src/cli.js";

const TESTS_DIR = path.dirname(fileURLToPath(import.meta.url));

const COMPILER_OPTIONS = {
  target: "ES2022",
  lib: ["ES2022"],
  module: "NodeNext",
  moduleResolution: "NodeNext",
  strict: true,
  skipLibCheck: true,
  outDir: "dist",
};

let projectDir: string;
let errors: string[];

beforeEach(() => {
  projectDir = fs.mkdtempSync(path.join(TESTS_DIR, ".cli-"));
  errors = [];
  vi.spyOn(console, "error").mockImplementation((message: unknown) => {
    errors.push(String(message));
  });
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(projectDir, { recursive: true, force: true });
});

function writeProject(source: string, types: string[] = []): string {
  fs.mkdirSync(path.join(projectDir, "src"));
  fs.writeFileSync(path.join(projectDir, "src", "index.ts"), source);
  const tsconfig = path.join(projectDir, "tsconfig.json");
  fs.writeFileSync(
    tsconfig,
    JSON.stringify({ compilerOptions: { ...COMPILER_OPTIONS, types }, include: ["src/**/*.ts"] }, null, 2)
  );
  return tsconfig;
}

describe("parseArgs", () => {
  it("should default to check with the local tsconfig", () => {
    expect(parseArgs([])).toEqual({ command: "check", project: "tsconfig.json", verbose: false });
  });

  it("should read the project and verbose flags", () => {
    expect(parseArgs(["build", "-p", "tsconfig.build.json", "--verbose"])).toEqual({
      command: "build",
      project: "tsconfig.build.json",
      verbose: true,
    });
  });

  it("should reject unknown commands and options", () => {
    expect(() => parseArgs(["deploy"])).toThrow(CliError);
    expect(() => parseArgs(["check", "--watch"])).toThrow("Unknown option: --watch");
    expect(() => parseArgs(["check", "-p"])).toThrow("-p needs a path to a tsconfig.json");
  });
});

describe("main", () => {
  it("should print help", () => {
    expect(main(["--help"])).toBe(0);
  });

  it("should report a usage error", () => {
    expect(main(["deploy"])).toBe(1);
    expect(errors).toEqual(["Unknown command: deploy\nUsage: refinum <check|build> [options]"]);
  });

  it("should report a missing tsconfig", () => {
    const missing = path.join(projectDir, "missing.json");
    expect(main(["check", "-p", missing])).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain(`Error reading ${missing}: Cannot read file`);
  });

  it("should pass a clean project", () => {
    const tsconfig = writeProject("export const answer: number = 42;\n");
    expect(main(["check", "-p", tsconfig])).toBe(0);
    expect(errors).toEqual([]);
  });

  it("should fail on a type error", () => {
    const tsconfig = writeProject('export const answer: number = "42";\n');
    expect(main(["check", "-p", tsconfig])).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("TS2322: ");
  });

  it("should not emit on check", () => {
    const tsconfig = writeProject("export const answer: number = 42;\n");
    main(["check", "-p", tsconfig]);
    expect(fs.existsSync(path.join(projectDir, "dist"))).toBe(false);
  });

  it("should emit on build", () => {
    const tsconfig = writeProject("export const answer: number = 42;\n");
    expect(main(["build", "-p", tsconfig])).toBe(0);
    const emitted = fs.readFileSync(path.join(projectDir, "dist", "index.js"), "utf8");
    expect(emitted).toContain("export const answer = 42;");
  });

  it("should report an invalid refinement literal", () => {
    const tsconfig = writeProject(
      ['import { PosInt } from "../../../../anyvals/src/index.js";', "export const n = PosInt(0);", ""].join("\n"),
      ["node"]
    );
    expect(main(["check", "-p", tsconfig])).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("TS9301: ");
    expect(errors[0]).toContain(
      "[refinum] PosInt(...) can only be invoked on a positive (x > 0) literal, like PosInt(42)."
    );
  }, 60_000);
});
