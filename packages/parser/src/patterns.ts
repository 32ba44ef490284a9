import {
  TokenKind,
  at,
  commented,
  postCommented,
  preCommented,
  type Comments,
  type Commented,
  type Pattern,
  type PatternNode,
} from "@groom/syntax";
import type { Cursor } from "./cursor";
import {
  literal,
  lowVar,
  qualifiedCapVar,
  spacePrefix,
} from "./primitives";

/**
 * Pattern grammar.
 *
 * Grammar:
 *   PatternTerm = "_" | lowVar | QualifiedCapVar | Literal
 *               | "(" ")" | "(" Pattern {"," Pattern} ")"
 *               | "[" [Pattern {"," Pattern}] "]"
 *               | "{" lowVar {"," lowVar} "}"
 *   Pattern     = (Constructor {PatternTerm} | PatternTerm) {"::" ...} ["as" lowVar]
 */

/**
 * A pattern that needs no parentheses: what may appear as a function or
 * lambda argument.
 */
export function patternTerm(cursor: Cursor): Pattern {
  return cursor.expecting("a pattern", (c) =>
    c.located<PatternNode>(() =>
      c.choice([recordPattern, tuplePattern, listPattern, basicPattern])
    )
  );
}

/** A full pattern: constructor application, cons chain and `as` alias. */
export function patternExpr(cursor: Cursor): Pattern {
  return cursor.expecting("a pattern", (c) => {
    const start = c.position();
    const pattern = consPattern(c);
    const alias = c.optional((inner) =>
      inner.attempt(() => {
        const preAs = inner.whitespace();
        inner.keyword("as");
        return preAs;
      })
    );
    if (alias === null) return pattern;

    const postAs = c.whitespace();
    const name = lowVar(c);
    return at(start, c.position(), {
      kind: "Alias",
      pattern: postCommented(pattern, alias),
      name: preCommented(postAs, name),
    });
  });
}

function consPattern(cursor: Cursor): Pattern {
  const start = cursor.position();
  const [first, ...rest] = separatedByCons(cursor);
  if (!first) throw cursor.error(["a pattern"]);
  if (rest.length === 0) return first.value;

  return at(start, cursor.position(), {
    kind: "ConsPattern",
    first,
    rest,
  });
}

/**
 * Operands of a `::` chain. The comments before each `::` go in the `after`
 * of the operand on its left, those after it in the `before` of the operand
 * on its right.
 */
function separatedByCons(cursor: Cursor): Commented<Pattern>[] {
  const operands: Commented<Pattern>[] = [];
  let before: Comments = [];
  let current = constructorOrTerm(cursor);

  while (true) {
    const next = cursor.optional((c) =>
      c.attempt(() => {
        const preOp = c.whitespace();
        c.operator("::");
        const postOp = c.whitespace();
        return { preOp, postOp, operand: constructorOrTerm(c) };
      })
    );
    if (next === null) {
      operands.push(preCommented(before, current));
      return operands;
    }
    operands.push(commented(before, current, next.preOp));
    before = next.postOp;
    current = next.operand;
  }
}

function constructorOrTerm(cursor: Cursor): Pattern {
  if (cursor.peekIs(TokenKind.UpperIdentifier)) {
    return cursor.located<PatternNode>((c) => ({
      kind: "DataPattern",
      constructor: qualifiedCapVar(c),
      args: spacePrefix(c, patternTerm),
    }));
  }
  return patternTerm(cursor);
}

function basicPattern(cursor: Cursor): PatternNode {
  if (cursor.peekIs(TokenKind.LowerIdentifier, "_")) {
    cursor.token(TokenKind.LowerIdentifier, "'_'");
    return { kind: "Anything" };
  }
  if (cursor.peekIs(TokenKind.LowerIdentifier)) {
    return { kind: "VarPattern", name: lowVar(cursor) };
  }
  if (cursor.peekIs(TokenKind.UpperIdentifier)) {
    return {
      kind: "DataPattern",
      constructor: qualifiedCapVar(cursor),
      args: [],
    };
  }
  return { kind: "LiteralPattern", literal: literal(cursor) };
}

function tuplePattern(cursor: Cursor): PatternNode {
  const { items, trailing } = cursor.group(
    TokenKind.LParen,
    TokenKind.RParen,
    patternExpr,
    "')'"
  );
  const [only] = items;
  if (!only) return { kind: "UnitPattern", comments: trailing };
  if (items.length === 1) return { kind: "PatternParens", pattern: only };
  return { kind: "TuplePattern", elements: items };
}

function listPattern(cursor: Cursor): PatternNode {
  const { items, trailing } = cursor.group(
    TokenKind.LBracket,
    TokenKind.RBracket,
    patternExpr,
    "']'"
  );
  if (items.length === 0) {
    return { kind: "EmptyListPattern", comments: trailing };
  }
  return { kind: "ListPattern", elements: items };
}

function recordPattern(cursor: Cursor): PatternNode {
  const { items } = cursor.group(
    TokenKind.LBrace,
    TokenKind.RBrace,
    lowVar,
    "'}'"
  );
  if (items.length === 0) throw cursor.error(["a record field"]);
  return { kind: "RecordPattern", fields: items };
}
