import { describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, DEFAULT_CONFIG_NAME } from "../src/index";

function createTempDir(): string {
  return fs.mkdtempSync(path.join(tmpdir(), "groom-config-"));
}

function writeConfig(root: string, contents: unknown): string {
  const configPath = path.join(root, DEFAULT_CONFIG_NAME);
  fs.writeFileSync(configPath, JSON.stringify(contents, null, 2));
  return configPath;
}

describe("loadConfig", () => {
  test("loads groom.json and resolves the source directory", () => {
    const root = createTempDir();
    const configPath = writeConfig(root, {
      src: "src",
      operators: { "<+>": { precedence: 6, associativity: "left" } },
    });

    const config = loadConfig({ cwd: root });

    expect(config.configPath).toBe(configPath);
    expect(config.rootDir).toBe(root);
    expect(config.srcDir).toBe(path.join(root, "src"));
    expect(config.operators).toEqual({
      "<+>": { precedence: 6, associativity: "left" },
    });
  });

  test("operators default to none", () => {
    const root = createTempDir();
    writeConfig(root, { src: "." });

    expect(loadConfig({ cwd: root }).operators).toEqual({});
  });

  test("accepts an explicit path relative to cwd", () => {
    const root = createTempDir();
    fs.mkdirSync(path.join(root, "conf"));
    const configPath = path.join(root, "conf", "custom.json");
    fs.writeFileSync(configPath, JSON.stringify({ src: "../lib" }));

    const config = loadConfig({ cwd: root, path: "conf/custom.json" });

    expect(config.configPath).toBe(configPath);
    expect(config.srcDir).toBe(path.join(root, "lib"));
  });

  test("throws when the file is missing", () => {
    const root = createTempDir();
    expect(() => loadConfig({ cwd: root })).toThrow(
      `No groom.json found at ${path.join(root, DEFAULT_CONFIG_NAME)}`
    );
  });

  test("throws on invalid JSON", () => {
    const root = createTempDir();
    fs.writeFileSync(path.join(root, DEFAULT_CONFIG_NAME), "{ src: ");
    expect(() => loadConfig({ cwd: root })).toThrow("Invalid JSON in");
  });

  test("throws when required fields are missing", () => {
    const root = createTempDir();
    writeConfig(root, { operators: {} });

    expect(() => loadConfig({ cwd: root })).toThrow(
      'Config field "src"'
    );
  });

  test("validates operator fixities", () => {
    const root = createTempDir();
    writeConfig(root, {
      src: "src",
      operators: { "<+>": { precedence: 12, associativity: "left" } },
    });
    expect(() => loadConfig({ cwd: root })).toThrow(
      'Config field "operators.<+>.precedence"'
    );

    writeConfig(root, {
      src: "src",
      operators: { "<+>": { precedence: 1, associativity: "both" } },
    });
    expect(() => loadConfig({ cwd: root })).toThrow(
      "must be one of left, right, none"
    );
  });
});
