import { describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { DEFAULT_CONFIG_NAME } from "@groom/config";
import { run } from "../src/index";

function createWorkspace(config: unknown = { src: "src" }): string {
  const root = fs.mkdtempSync(path.join(tmpdir(), "groom-cli-"));
  fs.mkdirSync(path.join(root, "src"), { recursive: true });

  if (config !== null) {
    fs.writeFileSync(
      path.join(root, DEFAULT_CONFIG_NAME),
      JSON.stringify(config, null, 2)
    );
  }

  writeSource(root, "Main.elm", [
    "module Main exposing (..)",
    "",
    "value = 1",
    "",
  ]);

  return root;
}

function writeSource(root: string, name: string, lines: string[]): void {
  fs.writeFileSync(path.join(root, "src", name), lines.join("\n"));
}

function createCollector() {
  let buffer = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      buffer += String(chunk);
      callback();
    },
  });
  return { stream, text: () => buffer };
}

async function runIn(root: string, args: string[]) {
  const stdout = createCollector();
  const stderr = createCollector();
  const exitCode = await run(args, {
    cwd: root,
    stdout: stdout.stream,
    stderr: stderr.stream,
  });
  return { exitCode, stdout: stdout.text(), stderr: stderr.text() };
}

describe("cli", () => {
  test("tokenizes a file", async () => {
    const root = createWorkspace();

    const result = await runIn(root, ["tokenize", "src/Main.elm"]);

    expect(result.exitCode).toBe(0);
    const tokens = JSON.parse(result.stdout);
    expect(tokens[0]).toMatchObject({ kind: "Keyword", lexeme: "module" });
    expect(result.stderr).toBe("");
  });

  test("parses a file and prints the AST", async () => {
    const root = createWorkspace();

    const result = await runIn(root, ["parse", "src/Main.elm"]);

    expect(result.exitCode).toBe(0);
    const ast = JSON.parse(result.stdout);
    expect(ast.header.value.name.value).toEqual(["Main"]);
    expect(ast.body).toHaveLength(1);
    expect(result.stderr).toBe("");
  });

  test("prints integer literals as exact strings", async () => {
    const root = createWorkspace();
    writeSource(root, "Big.elm", ["big = 9007199254740993", ""]);

    const result = await runIn(root, ["parse", "src/Big.elm"]);

    expect(result.exitCode).toBe(0);
    const ast = JSON.parse(result.stdout);
    expect(ast.body[0].value.declaration.body.value.literal).toEqual({
      kind: "IntNum",
      value: "9007199254740993",
      representation: "DecimalInt",
    });
  });

  test("honours the pretty option", async () => {
    const root = createWorkspace();

    const result = await runIn(root, ["-p", "0", "parse", "src/Main.elm"]);

    expect(result.stdout.trimEnd().split("\n")).toHaveLength(1);
  });

  test("checks every source file under src by default", async () => {
    const root = createWorkspace();
    fs.mkdirSync(path.join(root, "src", "Nested"));
    fs.writeFileSync(
      path.join(root, "src", "Nested", "Util.elm"),
      "module Nested.Util exposing (..)\n\nsum = a + b * c\n"
    );

    const result = await runIn(root, ["check"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("Checked 2 file(s), 0 failed\n");
    expect(result.stderr).toBe("");
  });

  test("reports parse errors with source locations", async () => {
    const root = createWorkspace();
    writeSource(root, "Bad.elm", ["  value = 1", ""]);

    const result = await runIn(root, ["check", "src/Bad.elm"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      [
        `${path.join("src", "Bad.elm")}:1:3: error: Expected a declaration starting at column 1 but found LowerIdentifier 'value'`,
        "  value = 1",
        "  ^",
        "",
      ].join("\n")
    );
    expect(result.stdout).toBe("Checked 1 file(s), 1 failed\n");
  });

  test("reports operator chains that cannot be grouped", async () => {
    const root = createWorkspace();
    writeSource(root, "Eq.elm", [
      "module Eq exposing (..)",
      "",
      "value = a == b == c",
      "",
    ]);

    const result = await runIn(root, ["check"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr.split("\n")[0]).toBe(
      `${path.join("src", "Eq.elm")}:3:16: error: Cannot chain '==' and '==': non-associative operators at precedence 4 need parentheses`
    );
    expect(result.stdout).toBe("Checked 2 file(s), 1 failed\n");
  });

  test("uses operator fixities from the config", async () => {
    const lines = ["module Ops exposing (..)", "", "value = a <+> b <+> c", ""];

    const plain = createWorkspace();
    writeSource(plain, "Ops.elm", lines);
    expect((await runIn(plain, ["check", "src/Ops.elm"])).exitCode).toBe(0);

    const configured = createWorkspace({
      src: "src",
      operators: { "<+>": { precedence: 5, associativity: "none" } },
    });
    writeSource(configured, "Ops.elm", lines);
    const result = await runIn(configured, ["check", "src/Ops.elm"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain(
      "Cannot chain '<+>' and '<+>': non-associative operators at precedence 5 need parentheses"
    );
  });

  test("module infix declarations override the config", async () => {
    const root = createWorkspace({
      src: "src",
      operators: { "<+>": { precedence: 5, associativity: "none" } },
    });
    writeSource(root, "Ops.elm", [
      "module Ops exposing (..)",
      "",
      "infixr 5 <+>",
      "",
      "value = a <+> b <+> c",
      "",
    ]);

    const result = await runIn(root, ["check", "src/Ops.elm"]);

    expect(result.exitCode).toBe(0);
  });

  test("reports duplicate infix declarations", async () => {
    const root = createWorkspace();
    writeSource(root, "Dup.elm", ["infixl 6 <+>", "infixr 6 <+>", ""]);

    const result = await runIn(root, ["check", "src/Dup.elm"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      [
        `${path.join("src", "Dup.elm")}:2:1: error: Duplicate infix declaration for operator '<+>'`,
        "infixr 6 <+>",
        "^",
        "",
      ].join("\n")
    );
  });

  test("check without files needs a config", async () => {
    const root = createWorkspace(null);

    const result = await runIn(root, ["check"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      `No groom.json found at ${path.join(root, DEFAULT_CONFIG_NAME)}\n`
    );
  });

  test("files can be checked without a config", async () => {
    const root = createWorkspace(null);

    const result = await runIn(root, ["check", "src/Main.elm"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("Checked 1 file(s), 0 failed\n");
  });

  test("reports a missing file", async () => {
    const root = createWorkspace();

    const result = await runIn(root, ["parse", "src/Missing.elm"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("ENOENT");
  });
});
