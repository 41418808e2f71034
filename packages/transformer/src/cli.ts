/**
 * refinum CLI -- Check or compile a project with the literal-check macros
 *
 * Usage:
 *   refinum check [--project tsconfig.json] [--verbose]
 *   refinum build [--project tsconfig.json] [--verbose]
 */

import * as ts from "typescript";
import * as path from "path";
import macroTransformerFactory, { checkProgram } from "./index.js";

export type Command = "check" | "build";

const COMMANDS: readonly Command[] = ["check", "build"];

export interface CliOptions {
  command: Command;
  project: string;
  verbose: boolean;
}

/** A usage or configuration problem, reported without a stack trace */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: readonly string[]): CliOptions {
  const name = args[0] ?? "check";
  if (!isCommand(name)) {
    throw new CliError(`Unknown command: ${name}\nUsage: refinum <check|build> [options]`);
  }

  let project = "tsconfig.json";
  let verbose = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--project" || arg === "-p") {
      const value = args[++i];
      if (value === undefined) {
        throw new CliError(`${arg} needs a path to a tsconfig.json`);
      }
      project = value;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else {
      throw new CliError(`Unknown option: ${arg}`);
    }
  }

  return { command: name, project, verbose };
}

function printHelp(): void {
  console.log(`
refinum - numeric refinement types with compile-time literal checks

USAGE:
  refinum <command> [options]

COMMANDS:
  check              Type-check and run the literal checks, without emitting (default)
  build              Compile with the literal checks and emit

OPTIONS:
  -p, --project <path>   Path to tsconfig.json (default: tsconfig.json)
  -v, --verbose          Enable verbose logging
  -h, --help             Show this help message

EXAMPLES:
  refinum check
  refinum build --project tsconfig.build.json
`);
}

function readTsConfig(configPath: string): ts.ParsedCommandLine {
  const absolutePath = path.resolve(configPath);
  const configFile = ts.readConfigFile(absolutePath, ts.sys.readFile);

  if (configFile.error) {
    const message = ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n");
    throw new CliError(`Error reading ${configPath}: ${message}`);
  }

  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(absolutePath));

  if (parsed.errors.length > 0) {
    const messages = parsed.errors.map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));
    throw new CliError(`Config errors:\n${messages.join("\n")}`);
  }

  return parsed;
}

const formatHost: ts.FormatDiagnosticsHost = {
  getCanonicalFileName: (fileName) => fileName,
  getCurrentDirectory: () => ts.sys.getCurrentDirectory(),
  getNewLine: () => ts.sys.newLine,
};

/**
 * Run one command and return the process exit code: 1 when any error was
 * reported, otherwise 0.
 */
export function run(options: CliOptions): number {
  const config = readTsConfig(options.project);

  if (options.verbose) {
    console.log(`[refinum] Using config: ${path.resolve(options.project)}`);
    console.log(`[refinum] Checking ${config.fileNames.length} files...`);
  }

  const noEmit = options.command === "check";
  const program = ts.createProgram({
    rootNames: config.fileNames,
    options: { ...config.options, ...(noEmit ? { noEmit: true } : {}) },
    projectReferences: config.projectReferences,
  });

  const diagnostics: ts.Diagnostic[] = [...ts.getPreEmitDiagnostics(program)];

  if (noEmit) {
    diagnostics.push(...checkProgram(program, { verbose: options.verbose }));
  } else {
    const transformer = macroTransformerFactory(program, {
      verbose: options.verbose,
      onDiagnostic: (d) => diagnostics.push(d),
    });
    const emitResult = program.emit(undefined, undefined, undefined, false, { before: [transformer] });
    diagnostics.push(...emitResult.diagnostics);
  }

  const errorCount = diagnostics.filter((d) => d.category === ts.DiagnosticCategory.Error).length;

  if (diagnostics.length > 0) {
    console.error(ts.formatDiagnosticsWithColorAndContext(diagnostics, formatHost));
  }
  if (options.verbose) {
    console.log(`[refinum] ${errorCount} error(s), ${diagnostics.length - errorCount} warning(s)`);
  }

  return errorCount > 0 ? 1 : 0;
}

/**
 * CLI entry point; returns the exit code.
 */
export function main(args: readonly string[]): number {
  if (args[0] === "--help" || args[0] === "-h") {
    printHelp();
    return 0;
  }

  try {
    return run(parseArgs(args));
  } catch (error) {
    if (error instanceof CliError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}
