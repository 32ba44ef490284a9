import { describe, expect, test } from "vitest";
import {
  KEYWORDS,
  TokenKind,
  at,
  commented,
  isCommentToken,
  isKeyword,
  isMultiline,
  multilineFromBool,
  postCommented,
  preCommented,
} from "../src/index";

describe("keywords", () => {
  test("detect known keywords", () => {
    for (const word of ["if", "then", "case", "of", "let", "in", "infixl"]) {
      expect(isKeyword(word)).toBe(true);
    }
  });

  test("reject non-keywords", () => {
    for (const word of ["main", "Html", "String", "True", "alias"]) {
      expect(isKeyword(word)).toBe(false);
    }
  });

  test("keyword list has no duplicates", () => {
    expect(new Set(KEYWORDS).size).toBe(KEYWORDS.length);
  });
});

describe("trivia helpers", () => {
  const comment = { kind: "LineComment" as const, text: " note" };

  test("commented keeps both sides", () => {
    expect(commented([comment], 1, [])).toEqual({
      before: [comment],
      value: 1,
      after: [],
    });
  });

  test("pre and post commented fill the other side with an empty list", () => {
    expect(preCommented([comment], "x")).toEqual({
      before: [comment],
      value: "x",
      after: [],
    });
    expect(postCommented("x", [comment])).toEqual({
      before: [],
      value: "x",
      after: [comment],
    });
  });

  test("at builds a located value", () => {
    const start = { offset: 0, line: 1, column: 1 };
    const end = { offset: 3, line: 1, column: 4 };
    expect(at(start, end, "abc")).toEqual({
      span: { start, end },
      value: "abc",
    });
  });

  test("multiline tags round through booleans", () => {
    expect(multilineFromBool(true)).toBe("SplitAll");
    expect(multilineFromBool(false)).toBe("JoinAll");
    expect(isMultiline("SplitAll")).toBe(true);
    expect(isMultiline("JoinAll")).toBe(false);
  });
});

describe("tokens", () => {
  const span = {
    start: { offset: 0, line: 1, column: 1 },
    end: { offset: 4, line: 1, column: 5 },
  };

  test("comment tokens are recognized", () => {
    expect(
      isCommentToken({ kind: TokenKind.LineComment, lexeme: "-- x", span })
    ).toBe(true);
    expect(
      isCommentToken({ kind: TokenKind.BlockComment, lexeme: "{--}", span })
    ).toBe(true);
    expect(
      isCommentToken({ kind: TokenKind.Operator, lexeme: "++", span })
    ).toBe(false);
  });
});
