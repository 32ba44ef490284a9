import {
  TokenKind,
  at,
  commented,
  postCommented,
  preCommented,
  type Comments,
  type Commented,
  type RecordTypeField,
  type Type,
  type TypeNode,
} from "@groom/syntax";
import type { Cursor } from "./cursor";
import { lowVar, qualifiedCapVar, spacePrefix } from "./primitives";

/**
 * Type grammar.
 *
 * Grammar:
 *   TypeTerm = lowVar | QualifiedCapVar | "(" ")" | "(" Type {"," Type} ")"
 *            | "{" [lowVar "|"] [Field {"," Field}] "}"
 *   TypeApp  = QualifiedCapVar {TypeTerm}
 *   Type     = (TypeApp | TypeTerm) {"->" (TypeApp | TypeTerm)}
 *
 * Examples:
 *   Int
 *   Maybe (List a)
 *   { model | name : String }
 *   a -> b -> ( a, b )
 */

/** A type that needs no parentheses as an argument. */
export function typeTerm(cursor: Cursor): Type {
  return cursor.expecting("a type", (c) =>
    c.located<TypeNode>(() =>
      c.choice([tupleType, recordType, typeVariable, constructor0])
    )
  );
}

export function typeExpr(cursor: Cursor): Type {
  return cursor.expecting("a type", (c) => {
    const start = c.position();
    const [operands, multiline] = c.trackNewline(separatedByArrows);
    const [first, ...rest] = operands;
    if (!first) throw c.error(["a type"]);
    if (rest.length === 0) return first.value;
    return at(start, c.position(), {
      kind: "FunctionType",
      first,
      rest,
      multiline,
    });
  });
}

function separatedByArrows(cursor: Cursor): Commented<Type>[] {
  const operands: Commented<Type>[] = [];
  let before: Comments = [];
  let current = typeApp(cursor);

  while (true) {
    const next = cursor.optional((c) =>
      c.attempt(() => {
        const preArrow = c.whitespace();
        c.token(TokenKind.Arrow, "'->'");
        const postArrow = c.whitespace();
        return { preArrow, postArrow, operand: typeApp(c) };
      })
    );
    if (next === null) {
      operands.push(preCommented(before, current));
      return operands;
    }
    operands.push(commented(before, current, next.preArrow));
    before = next.postArrow;
    current = next.operand;
  }
}

function typeApp(cursor: Cursor): Type {
  if (!cursor.peekIs(TokenKind.UpperIdentifier)) return typeTerm(cursor);
  return cursor.located<TypeNode>((c) => ({
    kind: "TypeConstruction",
    constructor: qualifiedCapVar(c),
    args: spacePrefix(c, typeTerm),
  }));
}

function typeVariable(cursor: Cursor): TypeNode {
  return { kind: "TypeVariable", name: lowVar(cursor) };
}

function constructor0(cursor: Cursor): TypeNode {
  return {
    kind: "TypeConstruction",
    constructor: qualifiedCapVar(cursor),
    args: [],
  };
}

function tupleType(cursor: Cursor): TypeNode {
  const { items, trailing } = cursor.group(
    TokenKind.LParen,
    TokenKind.RParen,
    typeExpr,
    "')'"
  );
  const [only] = items;
  if (!only) return { kind: "UnitType", comments: trailing };
  if (items.length === 1) return { kind: "TypeParens", type: only };
  return { kind: "TupleType", elements: items };
}

function recordType(cursor: Cursor): TypeNode {
  const [node, multiline] = cursor.trackNewline((c) => {
    c.token(TokenKind.LBrace, "'{'");
    const base = c.optional((inner) =>
      inner.attempt(() => {
        const name = inner.padded(lowVar);
        inner.token(TokenKind.Pipe, "'|'");
        return name;
      })
    );
    const { items, trailing } = c.sequence(TokenKind.RBrace, field, "'}'");
    return { base, fields: items, trailing };
  });
  return { kind: "RecordType", ...node, multiline };
}

function field(cursor: Cursor): RecordTypeField {
  const name = lowVar(cursor);
  const preColon = cursor.whitespace();
  cursor.token(TokenKind.Colon, "':'");
  const postColon = cursor.whitespace();
  const type = typeExpr(cursor);
  return {
    name: postCommented(name, preColon),
    type: preCommented(postColon, type),
  };
}
