import {
  TokenKind,
  commented,
  preCommented,
  type Associativity,
  type Comments,
  type Commented,
  type ConstructorVariant,
  type DatatypeDeclaration,
  type Expression,
  type FixityDeclaration,
  type ImportDeclaration,
  type ListedName,
  type Listing,
  type Located,
  type Module,
  type ModuleHeader,
  type Pattern,
  type TopLevel,
  type Type,
  type TypeAliasDeclaration,
} from "@groom/syntax";
import { Cursor, ParseError, type Parse } from "./cursor";
import { commonDeclaration, expr } from "./expressions";
import { patternExpr } from "./patterns";
import {
  capVar,
  lowVar,
  qualifiedCapVar,
  spacePrefix,
  symOpInParens,
} from "./primitives";
import { typeExpr, typeTerm } from "./types";

const FIXITY_KEYWORDS: Readonly<Record<string, Associativity>> = {
  infixl: "left",
  infixr: "right",
  infix: "none",
};

/**
 * Parse a whole source file.
 *
 * Grammar:
 *   Module = [Header] {Import} {TopLevel}
 *
 * Every top-level declaration starts at column 1; anything it continues onto
 * later lines must be indented.
 */
export function parseModule(source: string): Module {
  const cursor = Cursor.fromSource(source);
  const initialComments = cursor.whitespace();
  const header = cursor.optional(moduleHeader);

  const imports: Commented<Located<ImportDeclaration>>[] = [];
  let pending = cursor.located((c) => c.whitespace());
  while (cursor.peekIs(TokenKind.Keyword, "import")) {
    const declaration = importDeclaration(cursor);
    imports.push(preCommented(pending.value, declaration));
    pending = cursor.located((c) => c.whitespace());
  }

  const body: TopLevel[] = bodyComments(pending);
  while (cursor.peek().kind !== TokenKind.Eof) {
    body.push(topLevel(cursor));
    body.push(...bodyComments(cursor.located((c) => c.whitespace())));
  }
  cursor.eof();

  return { initialComments, header, imports, body };
}

/** Parse a single expression, with the comments around it. */
export function parseExpression(source: string): Commented<Expression> {
  return parseWhole(source, expr);
}

export function parsePattern(source: string): Commented<Pattern> {
  return parseWhole(source, patternExpr);
}

export function parseType(source: string): Commented<Type> {
  return parseWhole(source, typeExpr);
}

function parseWhole<T>(source: string, parse: Parse<T>): Commented<T> {
  const cursor = Cursor.fromSource(source);
  const before = cursor.whitespace();
  const value = cursor.withPos(parse);
  const after = cursor.whitespace();
  cursor.eof();
  return commented(before, value, after);
}

function bodyComments({ span, value }: Located<Comments>): TopLevel[] {
  return value.map((comment) => ({
    span,
    value: { kind: "BodyComment", comment },
  }));
}

// ===== Header and imports =====

function moduleHeader(cursor: Cursor): Located<ModuleHeader> {
  return cursor.located((c) => {
    c.keyword("module");
    const preName = c.whitespace();
    const name = moduleName(c);
    const postName = c.whitespace();
    c.keyword("exposing");
    const preListing = c.whitespace();
    return {
      name: commented(preName, name, postName),
      exposing: preCommented(preListing, listing(c)),
    };
  });
}

function importDeclaration(cursor: Cursor): Located<ImportDeclaration> {
  return cursor.located((c) => {
    c.keyword("import");
    const preName = c.whitespace();
    const module = preCommented(preName, moduleName(c));

    const alias = c.optional((inner) =>
      inner.attempt(() => {
        const preAs = inner.whitespace();
        inner.keyword("as");
        const postAs = inner.whitespace();
        return preCommented([...preAs, ...postAs], capVar(inner));
      })
    );

    const exposing = c.optional((inner) =>
      inner.attempt(() => {
        const preExposing = inner.whitespace();
        inner.keyword("exposing");
        const postExposing = inner.whitespace();
        return preCommented([...preExposing, ...postExposing], listing(inner));
      })
    );

    return { module, alias, exposing };
  });
}

function moduleName(cursor: Cursor): string[] {
  const { namespace, name } = qualifiedCapVar(cursor);
  return [...namespace, name];
}

/**
 * Examples:
 *   (..)
 *   (main, Model, Msg(..), (+))
 */
function listing(cursor: Cursor): Listing {
  cursor.token(TokenKind.LParen, "'('");
  const open = cursor.optional((c) =>
    c.attempt(() => {
      const before = c.whitespace();
      c.token(TokenKind.Range, "'..'");
      const after = c.whitespace();
      c.token(TokenKind.RParen, "')'");
      return [...before, ...after];
    })
  );
  if (open !== null) return { kind: "OpenListing", comments: open };

  const { items, trailing } = cursor.sequence(
    TokenKind.RParen,
    listedName,
    "')'"
  );
  return { kind: "ExplicitListing", names: items, trailing };
}

function listedName(cursor: Cursor): ListedName {
  return cursor.choice<ListedName>(
    [
      (c) => ({ name: lowVar(c), constructors: null }),
      (c) => ({ name: `(${symOpInParens(c)})`, constructors: null }),
      (c) => {
        const name = capVar(c);
        const constructors = c.optional((inner) =>
          inner.attempt(() => {
            const comments = inner.whitespace();
            inner.token(TokenKind.LParen, "'('");
            inner.token(TokenKind.Range, "'..'");
            inner.token(TokenKind.RParen, "')'");
            return comments;
          })
        );
        return { name, constructors };
      },
    ],
    "an exposed name"
  );
}

// ===== Declarations =====

function topLevel(cursor: Cursor): TopLevel {
  if (cursor.position().column !== 1) {
    throw cursor.error(["a declaration starting at column 1"]);
  }
  return cursor.withPos((c) =>
    c.located<TopLevel["value"]>((inner) =>
      inner.choice<TopLevel["value"]>(
        [
          fixityDeclaration,
          typeDeclaration,
          (d) => ({ kind: "CommonDeclaration", declaration: commonDeclaration(d) }),
        ],
        "a declaration"
      )
    )
  );
}

/**
 * Examples:
 *   infixl 6 +
 *   infixr 5 (++)
 */
function fixityDeclaration(cursor: Cursor): FixityDeclaration {
  const keyword = cursor.satisfy(
    (token) =>
      token.kind === TokenKind.Keyword && token.lexeme in FIXITY_KEYWORDS,
    "an infix declaration"
  );
  const associativity = FIXITY_KEYWORDS[keyword.lexeme] ?? "none";

  const prePrecedence = cursor.whitespace();
  const number = cursor.token(TokenKind.Number, "a precedence from 0 to 9");
  const precedence = Number(number.lexeme);
  if (!Number.isInteger(precedence) || precedence < 0 || precedence > 9) {
    throw new ParseError(
      `Operator precedence must be an integer from 0 to 9, got ${number.lexeme}`,
      number.span,
      ["a precedence from 0 to 9"]
    );
  }

  const preOperator = cursor.whitespace();
  const symbol = cursor.choice([
    symOpInParens,
    (c) => c.token(TokenKind.Operator, "an infix operator").lexeme,
  ]);

  return {
    kind: "Fixity",
    associativity,
    precedence: preCommented(prePrecedence, precedence),
    operator: preCommented(preOperator, symbol),
  };
}

/**
 * Examples:
 *   type alias Model = { count : Int }
 *   type Msg = Increment | Add Int
 */
function typeDeclaration(
  cursor: Cursor
): TypeAliasDeclaration | DatatypeDeclaration {
  cursor.keyword("type");
  const aliasComments = cursor.optional((c) =>
    c.attempt(() => {
      const comments = c.whitespace();
      // `alias` is only special after `type`.
      c.satisfy(
        (token) =>
          token.kind === TokenKind.LowerIdentifier && token.lexeme === "alias",
        "'alias'"
      );
      return comments;
    })
  );

  const preName = cursor.whitespace();
  const name = capVar(cursor);
  const params = spacePrefix(cursor, lowVar);
  const preEquals = cursor.whitespace();
  cursor.token(TokenKind.Equals, "'='");
  const postEquals = cursor.whitespace();
  const equalsComments = [...preEquals, ...postEquals];

  if (aliasComments !== null) {
    return {
      kind: "TypeAlias",
      name: preCommented([...aliasComments, ...preName], name),
      params,
      type: preCommented(equalsComments, typeExpr(cursor)),
    };
  }

  return {
    kind: "Datatype",
    name: preCommented(preName, name),
    params,
    variants: variants(cursor, equalsComments),
  };
}

function variants(
  cursor: Cursor,
  leading: Comments
): Commented<Located<ConstructorVariant>>[] {
  const result: Commented<Located<ConstructorVariant>>[] = [];
  let before = leading;

  while (true) {
    const variant = cursor.located((c) => ({
      name: capVar(c),
      args: spacePrefix(c, typeTerm),
    }));
    const prePipe = cursor.optional((c) =>
      c.attempt(() => {
        const comments = c.whitespace();
        c.token(TokenKind.Pipe, "'|'");
        return comments;
      })
    );
    if (prePipe === null) {
      result.push(preCommented(before, variant));
      return result;
    }
    result.push(commented(before, variant, prePipe));
    before = cursor.whitespace();
  }
}
