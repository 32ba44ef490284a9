import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError } from "commander";
import { lex, LexError } from "@groom/lexer";
import {
  BUILTIN_REGISTRY,
  FixityError,
  ParseError,
  buildRegistryFromModule,
  createRegistry,
  mergeRegistries,
  parseModule,
  resolveModuleOperators,
} from "@groom/parser";
import {
  DEFAULT_CONFIG_NAME,
  loadConfig,
  type ResolvedGroomConfig,
} from "@groom/config";
import type { FixityRegistry } from "@groom/syntax";

export interface CliOptions {
  cwd?: string;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

interface GlobalOptions {
  config?: string;
  pretty: string;
}

interface ExecuteOptions {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  configPath?: string;
  pretty: number;
}

const SOURCE_EXTENSION = ".elm";

export async function run(
  args: string[],
  options: CliOptions = {}
): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const cwd = options.cwd ?? process.cwd();

  let exitCode = 0;
  const program = new Command();

  program
    .name("groom")
    .version("0.1.0")
    .description("Comment-preserving parser for Elm source files")
    .option("-c, --config <path>", `Path to ${DEFAULT_CONFIG_NAME} config file`)
    .option(
      "-p, --pretty <n>",
      "Pretty-print JSON output with <n> spaces",
      "2"
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    });

  const execution = (): ExecuteOptions => {
    const globals = program.opts<GlobalOptions>();
    const pretty = Number.parseInt(globals.pretty, 10);
    return {
      cwd,
      stdout,
      stderr,
      configPath: globals.config,
      pretty: Number.isNaN(pretty) ? 2 : Math.max(0, pretty),
    };
  };

  program
    .command("tokenize <file>")
    .description("Print the tokens of a source file, comments included")
    .action((file: string) => {
      exitCode = tokenizeCommand(file, execution());
    });

  program
    .command("parse <file>")
    .description("Print the comment-annotated AST of a source file")
    .action((file: string) => {
      exitCode = parseCommand(file, execution());
    });

  program
    .command("check [files...]")
    .description(
      `Parse files and group their operators (default: every ${SOURCE_EXTENSION} file under src)`
    )
    .action((files: string[]) => {
      exitCode = checkCommand(files, execution());
    });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    stderr.write(`${describeError(error)}\n`);
    return 1;
  }
}

function tokenizeCommand(file: string, exec: ExecuteOptions): number {
  const filePath = path.resolve(exec.cwd, file);
  let source = "";

  try {
    source = fs.readFileSync(filePath, "utf8");
    const tokens = lex(source);
    exec.stdout.write(`${JSON.stringify(tokens, null, exec.pretty)}\n`);
    return 0;
  } catch (error) {
    formatAndWriteError(error, displayPath(exec.cwd, filePath), source, exec.stderr);
    return 1;
  }
}

function parseCommand(file: string, exec: ExecuteOptions): number {
  const filePath = path.resolve(exec.cwd, file);
  let source = "";

  try {
    source = fs.readFileSync(filePath, "utf8");
    const module = parseModule(source);
    exec.stdout.write(`${JSON.stringify(module, bigintAsString, exec.pretty)}\n`);
    return 0;
  } catch (error) {
    formatAndWriteError(error, displayPath(exec.cwd, filePath), source, exec.stderr);
    return 1;
  }
}

function checkCommand(files: string[], exec: ExecuteOptions): number {
  const { cwd, stdout, stderr } = exec;

  let config: ResolvedGroomConfig | null;
  try {
    config = findConfig(exec, files.length === 0);
  } catch (error) {
    stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  const registry = config
    ? mergeRegistries(BUILTIN_REGISTRY, createRegistry(config.operators))
    : BUILTIN_REGISTRY;

  let targets: string[];
  if (files.length > 0) {
    targets = files.map((file) => path.resolve(cwd, file));
  } else if (config) {
    if (!fs.existsSync(config.srcDir)) {
      stderr.write(`Source directory ${config.srcDir} does not exist\n`);
      return 1;
    }
    targets = collectSourceFiles(config.srcDir);
  } else {
    targets = [];
  }

  let failed = 0;
  for (const filePath of targets) {
    if (!checkFile(filePath, registry, exec)) {
      failed += 1;
    }
  }

  stdout.write(`Checked ${targets.length} file(s), ${failed} failed\n`);
  return failed > 0 ? 1 : 0;
}

/**
 * Parse one file and group its operator chains using the base registry
 * extended with the file's own infix declarations.
 */
function checkFile(
  filePath: string,
  registry: FixityRegistry,
  exec: ExecuteOptions
): boolean {
  const shownPath = displayPath(exec.cwd, filePath);
  let source = "";

  try {
    source = fs.readFileSync(filePath, "utf8");
    const module = parseModule(source);
    const declared = buildRegistryFromModule(module);
    for (const error of declared.errors) {
      formatAndWriteError(error, shownPath, source, exec.stderr);
    }
    resolveModuleOperators(
      module,
      mergeRegistries(registry, declared.registry)
    );
    return declared.errors.length === 0;
  } catch (error) {
    formatAndWriteError(error, shownPath, source, exec.stderr);
    return false;
  }
}

/**
 * Load the config when one was named or exists in the working directory.
 * `required` turns a missing default config into an error.
 */
function findConfig(
  exec: ExecuteOptions,
  required: boolean
): ResolvedGroomConfig | null {
  const defaultPath = path.join(exec.cwd, DEFAULT_CONFIG_NAME);
  if (!exec.configPath && !required && !fs.existsSync(defaultPath)) {
    return null;
  }
  return loadConfig({ cwd: exec.cwd, path: exec.configPath });
}

function collectSourceFiles(dir: string): string[] {
  const found: string[] = [];
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...collectSourceFiles(fullPath));
    } else if (entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION)) {
      found.push(fullPath);
    }
  }
  return found;
}

function displayPath(cwd: string, filePath: string): string {
  const relative = path.relative(cwd, filePath);
  return relative.startsWith("..") ? filePath : relative;
}

export function formatAndWriteError(
  error: unknown,
  filePath: string,
  source: string,
  stderr: NodeJS.WritableStream
): void {
  if (
    error instanceof ParseError ||
    error instanceof LexError ||
    error instanceof FixityError
  ) {
    const { span, message } = error;
    const lines = source.split("\n");
    const line = lines[span.start.line - 1] ?? "";

    stderr.write(
      `${filePath}:${span.start.line}:${span.start.column}: error: ${message}\n`
    );
    stderr.write(`${line}\n`);

    const caretPos = span.start.column - 1;
    if (caretPos >= 0) {
      stderr.write(`${" ".repeat(caretPos)}^\n`);
    }
  } else {
    stderr.write(`${describeError(error)}\n`);
  }
}

/** Integer literals are exact; JSON numbers are not. */
function bigintAsString(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
