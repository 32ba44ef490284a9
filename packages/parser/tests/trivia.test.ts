import { describe, expect, test } from "vitest";
import { lex } from "@groom/lexer";
import { isCommentToken } from "@groom/syntax";
import { parseModule } from "../src/index";

/** Text of every comment reachable from a tree, in no particular order. */
function collectComments(node: unknown, found: string[] = []): string[] {
  if (Array.isArray(node)) {
    for (const item of node) collectComments(item, found);
    return found;
  }
  if (typeof node !== "object" || node === null) return found;

  if ("kind" in node && node.kind === "LineComment" && "text" in node) {
    found.push(String(node.text));
    return found;
  }
  if ("kind" in node && node.kind === "BlockComment" && "lines" in node) {
    found.push(Array.isArray(node.lines) ? node.lines.join("\n") : "");
    return found;
  }
  for (const value of Object.values(node)) collectComments(value, found);
  return found;
}

describe("comment preservation", () => {
  test("every comment in the source is reachable from the tree", () => {
    const source = `{- a -}
module M exposing (..)
-- b
import A
f {- c -} x = -- d
    case {- e -} x of
        -- f
        A -> {- g -} 1 {- h -} + {- i -} 2
        _ ->
            let -- j
                y = 1
            in {- k -} y
-- l
`;
    const lexed = lex(source).filter(isCommentToken);
    const collected = collectComments(parseModule(source));

    expect(collected).toHaveLength(lexed.length);
    expect([...collected].sort()).toEqual(
      [" a ", " b", " c ", " d", " e ", " f", " g ", " h ", " i ", " j", " k ", " l"].sort()
    );
  });

  test("comments between a type name and (..) are kept", () => {
    const module = parseModule(
      "module M exposing (Msg {- keep -} (..))\n\nx = 1\n"
    );
    expect(module.header?.value.exposing.value).toEqual({
      kind: "ExplicitListing",
      names: [
        {
          before: [],
          value: {
            name: "Msg",
            constructors: [{ kind: "BlockComment", lines: [" keep "] }],
          },
          after: [],
        },
      ],
      trailing: [],
    });
  });

  test("comments inside an empty listing are kept", () => {
    const [imported] = parseModule("import A exposing ({- none -})\n").imports;
    expect(imported?.value.value.exposing?.value).toEqual({
      kind: "ExplicitListing",
      names: [],
      trailing: [{ kind: "BlockComment", lines: [" none "] }],
    });
  });
});
