import fs from "node:fs";
import path from "node:path";
import type { Associativity, OperatorFixity } from "@groom/syntax";

export interface GroomConfig {
  src: string;
  /** Fixities for operators the parsed code uses but does not declare. */
  operators: Record<string, OperatorFixity>;
}

export interface ResolvedGroomConfig extends GroomConfig {
  rootDir: string;
  configPath: string;
  srcDir: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  path?: string;
}

export const DEFAULT_CONFIG_NAME = "groom.json";

const ASSOCIATIVITIES: readonly Associativity[] = ["left", "right", "none"];

export function loadConfig(
  options: LoadConfigOptions = {}
): ResolvedGroomConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolveConfigPath(options.path, cwd);

  if (!fs.existsSync(configPath)) {
    throw new Error(`No ${DEFAULT_CONFIG_NAME} found at ${configPath}`);
  }

  const rawText = fs.readFileSync(configPath, "utf8");
  let rawConfig: unknown;

  try {
    rawConfig = JSON.parse(rawText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${configPath}: ${reason}`);
  }

  const config = validateConfig(rawConfig, configPath);
  const rootDir = path.dirname(configPath);

  return {
    ...config,
    rootDir,
    configPath,
    srcDir: path.resolve(rootDir, config.src),
  };
}

function resolveConfigPath(
  explicitPath: string | undefined,
  cwd: string
): string {
  if (explicitPath) {
    return path.isAbsolute(explicitPath)
      ? explicitPath
      : path.resolve(cwd, explicitPath);
  }
  return path.join(cwd, DEFAULT_CONFIG_NAME);
}

function validateConfig(config: unknown, sourcePath: string): GroomConfig {
  if (!isRecord(config)) {
    throw new Error(`Config at ${sourcePath} must be an object`);
  }

  const src = expectString(config, "src", sourcePath);
  const operators = expectOperators(config, "operators", sourcePath);

  return { src, operators };
}

function expectString(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): string {
  const value = config[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must be a non-empty string`
    );
  }
  return value;
}

function expectOperators(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): Record<string, OperatorFixity> {
  const value = config[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must map operators to fixities`
    );
  }

  const operators: Record<string, OperatorFixity> = {};
  for (const [symbol, entry] of Object.entries(value)) {
    operators[symbol] = expectFixity(entry, `${key}.${symbol}`, sourcePath);
  }
  return operators;
}

function expectFixity(
  entry: unknown,
  field: string,
  sourcePath: string
): OperatorFixity {
  if (!isRecord(entry)) {
    throw new Error(
      `Config field "${field}" in ${sourcePath} must be an object with precedence and associativity`
    );
  }

  const { precedence, associativity } = entry;
  if (
    typeof precedence !== "number" ||
    !Number.isInteger(precedence) ||
    precedence < 0 ||
    precedence > 9
  ) {
    throw new Error(
      `Config field "${field}.precedence" in ${sourcePath} must be an integer from 0 to 9`
    );
  }

  const match = ASSOCIATIVITIES.find((candidate) => candidate === associativity);
  if (!match) {
    throw new Error(
      `Config field "${field}.associativity" in ${sourcePath} must be one of ${ASSOCIATIVITIES.join(", ")}`
    );
  }

  return { precedence, associativity: match };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
