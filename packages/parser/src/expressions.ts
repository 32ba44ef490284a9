import {
  TokenKind,
  at,
  commented,
  postCommented,
  preCommented,
  type CaseBranch,
  type Comments,
  type Commented,
  type CommonDeclaration,
  type Expression,
  type ExpressionNode,
  type FAMultiline,
  type IfClause,
  type LetDeclaration,
  type Located,
  type Pattern,
  type RecordPair,
  type Ref,
  type Type,
} from "@groom/syntax";
import { binops } from "./binops";
import type { Cursor } from "./cursor";
import { patternExpr, patternTerm } from "./patterns";
import {
  anyOp,
  constrainedSpacePrefix,
  literal,
  lowVar,
  spacePrefix,
  symOpInParens,
  varRef,
} from "./primitives";
import { typeExpr } from "./types";

/**
 * Expression grammar.
 *
 * Grammar:
 *   Expr    = Let | Case | If | Lambda | Binops(AppExpr, Let | Case | If | Lambda)
 *   AppExpr = Term {Term}
 *   Term    = Literal | List | Accessor | Negative | Accessible(Var | Parens | Record)
 *
 * Nothing here applies operator precedence; see `binops` and the fixity pass.
 */

// ===== Terms =====

/**
 * A term: an expression that can be a function argument without
 * parentheses.
 */
export function term(cursor: Cursor): Expression {
  return cursor.expecting("an expression", (c) =>
    c.choice([
      literalTerm,
      listTerm,
      accessor,
      negative,
      (inner) =>
        accessible(inner, (target) =>
          target.choice([varTerm, parensTerm, recordTerm])
        ),
    ])
  );
}

function literalTerm(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => ({
    kind: "Literal",
    literal: literal(c),
  }));
}

/**
 * A name. Unqualified `True` and `False` become boolean literals.
 */
function varTerm(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const ref = varRef(c);
    if (
      ref.kind === "TagRef" &&
      ref.namespace.length === 0 &&
      (ref.name === "True" || ref.name === "False")
    ) {
      return {
        kind: "Literal",
        literal: { kind: "Boolean", value: ref.name === "True" },
      };
    }
    return { kind: "VarExpr", ref };
  });
}

/** `.field`, a function that reads a record field. */
function accessor(cursor: Cursor): Expression {
  return cursor.attempt((c) =>
    c.located<ExpressionNode>(() => {
      c.token(TokenKind.Dot, "'.'");
      return { kind: "AccessFunction", field: lowVar(c) };
    })
  );
}

/** `-x`: a minus sign written directly against a term. */
function negative(cursor: Cursor): Expression {
  return cursor.attempt((c) =>
    c.located<ExpressionNode>(() => {
      c.operator("-");
      return { kind: "Unary", operator: "Negative", operand: term(c) };
    })
  );
}

/** Any number of `.field` accesses written directly after a term. */
function accessible(
  cursor: Cursor,
  parse: (cursor: Cursor) => Expression
): Expression {
  const start = cursor.position();
  let expression = parse(cursor);

  while (true) {
    const field = cursor.optional((c) =>
      c.attempt(() => {
        c.token(TokenKind.Dot, "'.'");
        return lowVar(c);
      })
    );
    if (field === null) return expression;
    expression = at(start, cursor.position(), {
      kind: "Access",
      record: expression,
      field,
    });
  }
}

function listTerm(cursor: Cursor): Expression {
  return cursor.choice([shader, (c) => c.attempt(range), explicitList]);
}

function shader(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const token = c.token(TokenKind.Shader, "a shader block");
    const source = token.lexeme.slice("[glsl|".length, -"|]".length);
    return { kind: "GLShader", source: source.replace(/\r/g, "") };
  });
}

/** `[low..high]` */
function range(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const [bounds, multiline] = c.trackNewline(() => {
      c.token(TokenKind.LBracket, "'['");
      const low = c.padded(expr);
      c.token(TokenKind.Range, "'..'");
      const high = c.padded(expr);
      c.token(TokenKind.RBracket, "']'");
      return { low, high };
    });
    return { kind: "Range", ...bounds, multiline };
  });
}

function explicitList(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const { items, trailing, multiline } = c.group(
      TokenKind.LBracket,
      TokenKind.RBracket,
      expr,
      "']'"
    );
    return { kind: "ExplicitList", terms: items, trailing, multiline };
  });
}

/**
 * Everything that starts with `(`.
 *
 * Examples:
 *   (+)        operator as a value
 *   (,,)       tuple constructor of arity 3
 *   ()         unit
 *   (a)        parenthesized expression
 *   (a, b)     tuple
 */
function parensTerm(cursor: Cursor): Expression {
  return cursor.choice([
    (c) =>
      c.attempt(() =>
        c.located<ExpressionNode>(() => ({
          kind: "VarExpr",
          ref: { kind: "OpRef", symbol: symOpInParens(c) },
        }))
      ),
    (c) =>
      c.attempt(() =>
        c.located<ExpressionNode>(() => {
          c.token(TokenKind.LParen, "'('");
          const commas = c.many1((inner) =>
            inner.token(TokenKind.Comma, "','")
          );
          c.token(TokenKind.RParen, "')'");
          return { kind: "TupleFunction", arity: commas.length + 1 };
        })
      ),
    (c) =>
      c.located<ExpressionNode>(() => {
        const { items, trailing, multiline } = c.group(
          TokenKind.LParen,
          TokenKind.RParen,
          expr,
          "')'"
        );
        const [only] = items;
        if (!only) return { kind: "Unit", comments: trailing };
        if (items.length === 1) return { kind: "Parens", expression: only };
        return { kind: "Tuple", elements: items, multiline };
      }),
  ]);
}

/**
 * Record literal or update.
 *
 * Examples:
 *   {}
 *   { name = "groom", size = 2 }
 *   { model | size = 3 }
 */
function recordTerm(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const [record, multiline] = c.trackNewline(() => {
      c.token(TokenKind.LBrace, "'{'");
      const base = c.optional((inner) =>
        inner.attempt(() => {
          const name = inner.padded(lowVar);
          inner.token(TokenKind.Pipe, "'|'");
          return name;
        })
      );
      const { items, trailing } = c.sequence(TokenKind.RBrace, recordPair, "'}'");
      return { base, fields: items, trailing };
    });
    return { kind: "Record", ...record, multiline };
  });
}

/** `key = value`; `:` is accepted in place of `=`. */
function recordPair(cursor: Cursor): RecordPair {
  const key = lowVar(cursor);
  const [comments, multiline] = cursor.trackNewline((c) => {
    const preSeparator = c.whitespace();
    c.satisfy(
      (token) =>
        token.kind === TokenKind.Equals || token.kind === TokenKind.Colon,
      "'='"
    );
    return { preSeparator, postSeparator: c.whitespace() };
  });
  const value = expr(cursor);
  return {
    key: postCommented(key, comments.preSeparator),
    value: preCommented(comments.postSeparator, value),
    multiline,
  };
}

// ===== Application =====

/**
 * A term applied to zero or more argument terms. Arguments must be indented
 * past the current indentation reference.
 */
export function appExpr(cursor: Cursor): Expression {
  return cursor.expecting("an expression", (c) => {
    const start = c.position();
    const [head, headMultiline] = c.trackNewline(term);
    const args = c.many((inner) =>
      inner.trackNewline((arg) => constrainedSpacePrefix(arg, term))
    );

    const [first, ...rest] = args;
    if (!first) return head;

    return at(start, c.position(), {
      kind: "App",
      head,
      args: args.map(([arg]) => arg),
      multiline: applicationLayout(headMultiline, first[1], rest.map(([, m]) => m)),
    });
  });
}

function applicationLayout(
  headMultiline: boolean,
  firstMultiline: boolean,
  restMultiline: boolean[]
): FAMultiline {
  if (headMultiline || firstMultiline) return { kind: "FASplitFirst" };
  return {
    kind: "FAJoinFirst",
    rest: restMultiline.some(Boolean) ? "SplitAll" : "JoinAll",
  };
}

// ===== Expressions =====

export function expr(cursor: Cursor): Expression {
  return cursor.expecting("an expression", (c) =>
    c.choice([letExpr, caseExpr, ifExpr, lambdaExpr, binaryExpr])
  );
}

function binaryExpr(cursor: Cursor): Expression {
  return binops(cursor, appExpr, lastExpr, anyOp);
}

/** Operands that may only close an operator chain. */
function lastExpr(cursor: Cursor): Expression {
  return cursor.choice([letExpr, caseExpr, ifExpr, lambdaExpr]);
}

// ===== If =====

/**
 * Grammar:
 *   If = "if" Expr "then" Expr {"else" "if" Expr "then" Expr} "else" Expr
 */
export function ifExpr(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const first = ifClause(c);
    const rest = c.many((inner) =>
      inner.attempt(() => {
        const comments = elseKeyword(inner);
        return preCommented(comments, ifClause(inner));
      })
    );
    const comments = elseKeyword(c);
    const final = preCommented(comments, expr(c));
    return { kind: "If", first, rest, final };
  });
}

function ifClause(cursor: Cursor): IfClause {
  cursor.attempt((c) => c.keyword("if"));
  const preCondition = cursor.whitespace();
  const condition = expr(cursor);
  const postCondition = cursor.whitespace();
  cursor.keyword("then");
  const bodyComments = cursor.whitespace();
  const body = expr(cursor);
  const preElse = cursor.whitespace();
  return {
    condition: commented(preCondition, condition, postCondition),
    body: commented(bodyComments, body, preElse),
  };
}

function elseKeyword(cursor: Cursor): Comments {
  cursor.expecting("an 'else' branch", (c) => c.keyword("else"));
  return cursor.whitespace();
}

// ===== Lambda =====

/**
 * Grammar:
 *   Lambda = ("\" | "λ") PatternTerm {PatternTerm} "->" Expr
 */
export function lambdaExpr(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    const [lambda, multiline] = c.trackNewline(() => {
      c.expecting("an anonymous function", (inner) =>
        inner.token(TokenKind.Backslash, "'\\'")
      );
      const args = spacePrefix(c, patternTerm);
      if (args.length === 0) throw c.error(["an argument pattern"]);
      const arrow = c.padded((inner) => inner.token(TokenKind.Arrow, "'->'"));
      const body = expr(c);
      return { args, comments: [...arrow.before, ...arrow.after], body };
    });
    return { kind: "Lambda", ...lambda, multiline };
  });
}

// ===== Case =====

/**
 * Grammar:
 *   Case   = "case" Expr "of" Branch {Branch}
 *   Branch = Pattern "->" Expr
 *
 * Branches are aligned to the column of the first one.
 */
export function caseExpr(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    c.attempt((inner) => inner.keyword("case"));
    const [subject, multilineSubject] = c.trackNewline((inner) =>
      inner.padded(expr)
    );
    c.keyword("of");
    const firstComments = c.whitespace();
    const branches = c.withPos((inner) => {
      const first = caseBranch(inner, firstComments);
      const rest = inner.many((next) => caseBranch(next, []));
      return [first, ...rest];
    });
    return { kind: "Case", subject, multilineSubject, branches };
  });
}

function caseBranch(
  cursor: Cursor,
  leading: Comments
): Located<CaseBranch> {
  const head = cursor.attempt((c) => {
    const comments = c.whitespace();
    c.checkIndent();
    const pattern = patternExpr(c);
    const arrow = c.padded((inner) => inner.token(TokenKind.Arrow, "'->'"));
    return { comments, pattern, arrow };
  });
  const body = expr(cursor);

  return at(head.pattern.span.start, cursor.position(), {
    beforePattern: [...leading, ...head.comments],
    pattern: head.pattern,
    beforeArrow: head.arrow.before,
    afterArrow: head.arrow.after,
    body,
  });
}

// ===== Let =====

/**
 * Grammar:
 *   Let = "let" Declaration {Declaration} "in" Expr
 *
 * Declarations are aligned to the column of the first one. Comments between
 * them are kept as their own entries.
 */
export function letExpr(cursor: Cursor): Expression {
  return cursor.located<ExpressionNode>((c) => {
    c.attempt((inner) => inner.keyword("let"));
    const leading = letComments(c);
    const declarations = c.withPos((inner) =>
      inner.many1((block) => {
        block.checkIndent();
        const declaration = block.located((d) => ({
          kind: "LetCommonDeclaration" as const,
          declaration: d.located(commonDeclaration),
        }));
        return [declaration, ...letComments(block)];
      })
    );
    c.keyword("in");
    const bodyComments = c.whitespace();
    const body = expr(c);
    return {
      kind: "Let",
      declarations: [...leading, ...declarations.flat()],
      bodyComments,
      body,
    };
  });
}

function letComments(cursor: Cursor): LetDeclaration[] {
  const { span, value } = cursor.located((c) => c.whitespace());
  return value.map((comment) => ({
    span,
    value: { kind: "LetComment", comment },
  }));
}

/** A type annotation or a definition, as found in `let` and at the top level. */
export function commonDeclaration(cursor: Cursor): CommonDeclaration {
  return cursor.choice<CommonDeclaration>([
    (c) =>
      typeAnnotation<CommonDeclaration>(c, (name, annotation) => ({
        kind: "TypeAnnotation",
        name,
        annotation,
      })),
    (c) =>
      definition<CommonDeclaration>(c, (pattern, args, comments, body) => ({
        kind: "Definition",
        pattern,
        args,
        comments,
        body,
      })),
  ]);
}

// ===== Declarations =====

/**
 * A value or function definition. `build` receives the pieces so callers
 * can wrap them in their own declaration type.
 *
 * Grammar:
 *   Definition = (PatternTerm | "(" Operator ")") {PatternTerm} "=" Expr
 *
 * Arguments are only read after a plain name or an operator; a
 * destructuring pattern such as `(a, b) = pair` takes none.
 */
export function definition<A>(
  cursor: Cursor,
  build: (
    pattern: Pattern,
    args: Commented<Pattern>[],
    comments: Comments,
    body: Expression
  ) => A
): A {
  return cursor.withPos((c) => {
    const [pattern, args] = definitionStart(c);
    const equals = c.padded((inner) => inner.token(TokenKind.Equals, "'='"));
    const body = expr(c);
    return build(pattern, args, [...equals.before, ...equals.after], body);
  });
}

function definitionStart(cursor: Cursor): [Pattern, Commented<Pattern>[]] {
  return cursor.expecting("the definition of a variable (x = ...)", (c) => {
    const pattern = c.choice<Pattern>([
      (inner) => inner.attempt(patternTerm),
      (inner) =>
        inner.located((op) => ({
          kind: "OpPattern" as const,
          symbol: symOpInParens(op),
        })),
    ]);
    const takesArgs =
      pattern.value.kind === "VarPattern" || pattern.value.kind === "OpPattern";
    return [pattern, takesArgs ? spacePrefix(c, patternTerm) : []];
  });
}

/**
 * A type annotation. `build` receives the annotated name, with the comments
 * before `:` as its `after`, and the type, with the comments after `:` as
 * its `before`.
 *
 * Grammar:
 *   TypeAnnotation = (lowVar | "(" Operator ")") ":" Type
 */
export function typeAnnotation<A>(
  cursor: Cursor,
  build: (name: Commented<Ref>, annotation: Commented<Type>) => A
): A {
  const { name, colon } = cursor.attempt((c) => {
    const name = c.choice<Ref>([
      (inner) => ({ kind: "VarRef", name: lowVar(inner) }),
      (inner) => ({ kind: "OpRef", symbol: symOpInParens(inner) }),
    ]);
    const colon = c.padded((inner) => inner.token(TokenKind.Colon, "':'"));
    return { name, colon };
  });
  const type = typeExpr(cursor);
  return build(postCommented(name, colon.before), preCommented(colon.after, type));
}
