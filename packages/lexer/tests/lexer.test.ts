import { describe, expect, test } from "vitest";
import { TokenKind } from "@groom/syntax";
import { lex, LexError } from "../src/index";

const kinds = (source: string) =>
  lex(source).map((token) => [token.kind, token.lexeme]);

describe("lex", () => {
  test("lexes a small module", () => {
    const source = `module Main exposing (..)
import Html exposing (text)

main : Html msg
main =
  let
    value = "ok"
  in
    text value
`;

    expect(kinds(source)).toEqual([
      [TokenKind.Keyword, "module"],
      [TokenKind.UpperIdentifier, "Main"],
      [TokenKind.Keyword, "exposing"],
      [TokenKind.LParen, "("],
      [TokenKind.Range, ".."],
      [TokenKind.RParen, ")"],
      [TokenKind.Keyword, "import"],
      [TokenKind.UpperIdentifier, "Html"],
      [TokenKind.Keyword, "exposing"],
      [TokenKind.LParen, "("],
      [TokenKind.LowerIdentifier, "text"],
      [TokenKind.RParen, ")"],
      [TokenKind.LowerIdentifier, "main"],
      [TokenKind.Colon, ":"],
      [TokenKind.UpperIdentifier, "Html"],
      [TokenKind.LowerIdentifier, "msg"],
      [TokenKind.LowerIdentifier, "main"],
      [TokenKind.Equals, "="],
      [TokenKind.Keyword, "let"],
      [TokenKind.LowerIdentifier, "value"],
      [TokenKind.Equals, "="],
      [TokenKind.String, '"ok"'],
      [TokenKind.Keyword, "in"],
      [TokenKind.LowerIdentifier, "text"],
      [TokenKind.LowerIdentifier, "value"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("keeps line and nested block comments as tokens", () => {
    const source = `value -- inline comment
  {- block {- nested -} -}
  = 42
`;

    expect(kinds(source)).toEqual([
      [TokenKind.LowerIdentifier, "value"],
      [TokenKind.LineComment, "-- inline comment"],
      [TokenKind.BlockComment, "{- block {- nested -} -}"],
      [TokenKind.Equals, "="],
      [TokenKind.Number, "42"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("line comments stop before a carriage return", () => {
    expect(kinds("x -- note\r\ny")).toEqual([
      [TokenKind.LowerIdentifier, "x"],
      [TokenKind.LineComment, "-- note"],
      [TokenKind.LowerIdentifier, "y"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("classifies reserved operator spellings", () => {
    expect(kinds("= | : . .. -> \\ λ ++ |> ::")).toEqual([
      [TokenKind.Equals, "="],
      [TokenKind.Pipe, "|"],
      [TokenKind.Colon, ":"],
      [TokenKind.Dot, "."],
      [TokenKind.Range, ".."],
      [TokenKind.Arrow, "->"],
      [TokenKind.Backslash, "\\"],
      [TokenKind.Backslash, "λ"],
      [TokenKind.Operator, "++"],
      [TokenKind.Operator, "|>"],
      [TokenKind.Operator, "::"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("operators use maximal munch", () => {
    expect(kinds("a|=b")).toEqual([
      [TokenKind.LowerIdentifier, "a"],
      [TokenKind.Operator, "|="],
      [TokenKind.LowerIdentifier, "b"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("punctuation directly before a minus is its own token", () => {
    expect(kinds("x=-1")).toEqual([
      [TokenKind.LowerIdentifier, "x"],
      [TokenKind.Equals, "="],
      [TokenKind.Operator, "-"],
      [TokenKind.Number, "1"],
      [TokenKind.Eof, ""],
    ]);
    expect(kinds("->- :- ..-").map(([, lexeme]) => lexeme)).toEqual([
      "->",
      "-",
      ":",
      "-",
      "..",
      "-",
      "",
    ]);
    expect(kinds("=-= |-")).toEqual([
      [TokenKind.Operator, "=-="],
      [TokenKind.Operator, "|-"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("an operator run stops where a line comment starts", () => {
    expect(kinds("a +-- why")).toEqual([
      [TokenKind.LowerIdentifier, "a"],
      [TokenKind.Operator, "+"],
      [TokenKind.LineComment, "-- why"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes number forms", () => {
    expect(kinds("1 2.5 0x1F 3e10 4.0e-2 [1..2]")).toEqual([
      [TokenKind.Number, "1"],
      [TokenKind.Number, "2.5"],
      [TokenKind.Number, "0x1F"],
      [TokenKind.Number, "3e10"],
      [TokenKind.Number, "4.0e-2"],
      [TokenKind.LBracket, "["],
      [TokenKind.Number, "1"],
      [TokenKind.Range, ".."],
      [TokenKind.Number, "2"],
      [TokenKind.RBracket, "]"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes strings, multi-line strings and chars", () => {
    const source = `"a\\"b" """one
two""" 'c' '\\n' '\\u{41}'`;
    expect(kinds(source)).toEqual([
      [TokenKind.String, '"a\\"b"'],
      [TokenKind.String, '"""one\ntwo"""'],
      [TokenKind.Char, "'c'"],
      [TokenKind.Char, "'\\n'"],
      [TokenKind.Char, "'\\u{41}'"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes a shader block as a single token", () => {
    const source = "[glsl| void main() {} |]";
    expect(kinds(source)).toEqual([
      [TokenKind.Shader, "[glsl| void main() {} |]"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("tracks 1-based lines and columns", () => {
    const tokens = lex("a\n  bc");
    expect(tokens[1]?.span).toEqual({
      start: { offset: 4, line: 2, column: 3 },
      end: { offset: 6, line: 2, column: 5 },
    });
  });

  test("reports unterminated literals", () => {
    expect(() => lex('"abc')).toThrow("Unterminated string literal");
    expect(() => lex("{- open")).toThrow("Unterminated block comment");
    expect(() => lex("[glsl| open")).toThrow("Unterminated shader block");
    expect(() => lex("'ab'")).toThrow(LexError);
  });

  test("rejects unknown characters", () => {
    expect(() => lex("a ; b")).toThrow("Unexpected character ';'");
  });
});
