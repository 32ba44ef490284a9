import {
  TokenKind,
  preCommented,
  type Commented,
  type Literal,
  type VarRef,
} from "@groom/syntax";
import type { Cursor, Parse } from "./cursor";

/**
 * Token-level building blocks shared by the pattern, type and expression
 * grammars.
 */

export type QualifiedName = { namespace: string[]; name: string };

export function lowVar(cursor: Cursor): string {
  return cursor.token(TokenKind.LowerIdentifier, "a lower-case name").lexeme;
}

export function capVar(cursor: Cursor): string {
  return cursor.token(TokenKind.UpperIdentifier, "an upper-case name").lexeme;
}

/**
 * Dot-separated upper-case names with no whitespace around the dots.
 *
 * Examples:
 *   Maybe              { namespace: [], name: "Maybe" }
 *   Html.Attributes    { namespace: ["Html"], name: "Attributes" }
 */
export function qualifiedCapVar(cursor: Cursor): QualifiedName {
  const namespace: string[] = [];
  let name = capVar(cursor);
  while (true) {
    const next = cursor.optional((c) =>
      c.attempt(() => {
        c.token(TokenKind.Dot, "'.'");
        return capVar(c);
      })
    );
    if (next === null) return { namespace, name };
    namespace.push(name);
    name = next;
  }
}

/**
 * A possibly qualified value or constructor reference.
 *
 * Examples:
 *   x            VarRef [] x
 *   List.map     VarRef [List] map
 *   Just         TagRef [] Just
 *   Maybe.Just   TagRef [Maybe] Just
 */
export function varRef(cursor: Cursor): VarRef {
  if (cursor.peekIs(TokenKind.LowerIdentifier)) {
    return { kind: "VarRef", namespace: [], name: lowVar(cursor) };
  }
  if (!cursor.peekIs(TokenKind.UpperIdentifier)) {
    throw cursor.error(["a name"]);
  }

  const namespace: string[] = [];
  let name = capVar(cursor);
  while (true) {
    const next = cursor.optional((c) =>
      c.attempt(() => {
        c.token(TokenKind.Dot, "'.'");
        return c.satisfy(
          (token) =>
            token.kind === TokenKind.UpperIdentifier ||
            token.kind === TokenKind.LowerIdentifier,
          "a name"
        );
      })
    );
    if (next === null) return { kind: "TagRef", namespace, name };
    namespace.push(name);
    if (next.kind === TokenKind.LowerIdentifier) {
      return { kind: "VarRef", namespace, name: next.lexeme };
    }
    name = next.lexeme;
  }
}

export function anyOp(cursor: Cursor): VarRef {
  const token = cursor.token(TokenKind.Operator, "an infix operator");
  return { kind: "OpRef", symbol: token.lexeme };
}

/** An operator wrapped in parentheses, as in `(+)`. */
export function symOpInParens(cursor: Cursor): string {
  cursor.token(TokenKind.LParen, "'('");
  const symbol = cursor.token(TokenKind.Operator, "an infix operator").lexeme;
  cursor.token(TokenKind.RParen, "')'");
  return symbol;
}

/**
 * Numeric, string and char literals. Escapes are kept as written so the
 * printer can reproduce them.
 */
export function literal(cursor: Cursor): Literal {
  const token = cursor.satisfy(
    (token) =>
      token.kind === TokenKind.Number ||
      token.kind === TokenKind.String ||
      token.kind === TokenKind.Char,
    "a literal"
  );

  switch (token.kind) {
    case TokenKind.String:
      return token.lexeme.startsWith('"""')
        ? { kind: "Str", value: token.lexeme.slice(3, -3), multiline: true }
        : { kind: "Str", value: token.lexeme.slice(1, -1), multiline: false };
    case TokenKind.Char:
      return { kind: "Chr", value: token.lexeme.slice(1, -1) };
    default:
      return numberLiteral(token.lexeme);
  }
}

function numberLiteral(lexeme: string): Literal {
  if (/^0[xX]/.test(lexeme)) {
    return {
      kind: "IntNum",
      value: BigInt(lexeme),
      representation: "HexadecimalInt",
    };
  }
  if (/[eE]/.test(lexeme)) {
    return {
      kind: "FloatNum",
      value: Number(lexeme),
      representation: "ExponentFloat",
    };
  }
  if (lexeme.includes(".")) {
    return {
      kind: "FloatNum",
      value: Number(lexeme),
      representation: "DecimalFloat",
    };
  }
  return {
    kind: "IntNum",
    value: BigInt(lexeme),
    representation: "DecimalInt",
  };
}

/**
 * Zero or more items, each preceded by whitespace and starting past the
 * indentation reference. The comments before each item are kept with it.
 */
export function spacePrefix<T>(
  cursor: Cursor,
  item: Parse<T>
): Commented<T>[] {
  return cursor.many((c) =>
    c.attempt(() => {
      const comments = c.whitespace();
      c.indented();
      return preCommented(comments, item(c));
    })
  );
}

/**
 * Like `spacePrefix` for a single item, but an item written with no
 * whitespace before it must not start with `-`: `a-1` is a subtraction,
 * not `a` applied to `-1`.
 */
export function constrainedSpacePrefix<T>(
  cursor: Cursor,
  item: Parse<T>
): Commented<T> {
  return cursor.attempt((c) => {
    const start = c.position().offset;
    const comments = c.whitespace();
    if (
      c.position().offset === start &&
      c.peekIs(TokenKind.Operator) &&
      c.peek().lexeme.startsWith("-")
    ) {
      throw c.error(["whitespace"]);
    }
    c.indented();
    return preCommented(comments, item(c));
  });
}
