export type Position = {
  /** Character offset from the start of the source. */
  offset: number;
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
};

export type Span = {
  start: Position;
  end: Position;
};

export enum TokenKind {
  Keyword = "Keyword",
  LowerIdentifier = "LowerIdentifier",
  UpperIdentifier = "UpperIdentifier",
  Number = "Number",
  String = "String",
  Char = "Char",
  Operator = "Operator",
  LParen = "LParen",
  RParen = "RParen",
  LBrace = "LBrace",
  RBrace = "RBrace",
  LBracket = "LBracket",
  RBracket = "RBracket",
  Comma = "Comma",
  Dot = "Dot",
  Range = "Range",
  Colon = "Colon",
  Equals = "Equals",
  Pipe = "Pipe",
  Arrow = "Arrow",
  Backslash = "Backslash",
  Shader = "Shader",
  LineComment = "LineComment",
  BlockComment = "BlockComment",
  Eof = "Eof",
}

export type Token = {
  kind: TokenKind;
  lexeme: string;
  span: Span;
};

export function isCommentToken(token: Token): boolean {
  return (
    token.kind === TokenKind.LineComment ||
    token.kind === TokenKind.BlockComment
  );
}

export const KEYWORDS = [
  "if",
  "then",
  "else",
  "let",
  "in",
  "case",
  "of",
  "type",
  "module",
  "import",
  "exposing",
  "as",
  "port",
  "infix",
  "infixl",
  "infixr",
] as const;

export type Keyword = (typeof KEYWORDS)[number];

const KEYWORD_SET: ReadonlySet<string> = new Set<string>(KEYWORDS);

export function isKeyword(value: string): value is Keyword {
  return KEYWORD_SET.has(value);
}

// ===== Trivia =====
// Comments are kept in source order and attached to the syntactic position
// they were written at. A printer must be able to reach every one of them.

export type Comment =
  | { kind: "LineComment"; text: string }
  | { kind: "BlockComment"; lines: string[] };

export type Comments = Comment[];

/**
 * A value with the comments written immediately before and after it.
 * A side that cannot carry comments in a given position is an empty list.
 */
export type Commented<T> = {
  before: Comments;
  value: T;
  after: Comments;
};

export function commented<T>(
  before: Comments,
  value: T,
  after: Comments
): Commented<T> {
  return { before, value, after };
}

export function preCommented<T>(before: Comments, value: T): Commented<T> {
  return { before, value, after: [] };
}

export function postCommented<T>(value: T, after: Comments): Commented<T> {
  return { before: [], value, after };
}

export type Located<T> = {
  span: Span;
  value: T;
};

export function at<T>(start: Position, end: Position, value: T): Located<T> {
  return { span: { start, end }, value };
}

/**
 * Whether a region was written on one line or crossed a line break.
 * Only ever computed from the source while parsing.
 */
export type Multiline = "JoinAll" | "SplitAll";

/**
 * Layout of a function application: where the first line break happened
 * relative to the head and the first argument.
 */
export type FAMultiline =
  | { kind: "FASplitFirst" }
  | { kind: "FAJoinFirst"; rest: Multiline };

export function multilineFromBool(crossed: boolean): Multiline {
  return crossed ? "SplitAll" : "JoinAll";
}

export function isMultiline(multiline: Multiline): boolean {
  return multiline === "SplitAll";
}

// ===== References =====

export type VarRef =
  | { kind: "VarRef"; namespace: string[]; name: string }
  | { kind: "TagRef"; namespace: string[]; name: string }
  | { kind: "OpRef"; symbol: string };

/** Left-hand side of a type annotation. */
export type Ref =
  | { kind: "VarRef"; name: string }
  | { kind: "OpRef"; symbol: string };

// ===== Literals =====

export type IntRepresentation = "DecimalInt" | "HexadecimalInt";
export type FloatRepresentation = "DecimalFloat" | "ExponentFloat";

export type Literal =
  | { kind: "IntNum"; value: bigint; representation: IntRepresentation }
  | { kind: "FloatNum"; value: number; representation: FloatRepresentation }
  | { kind: "Chr"; value: string }
  | { kind: "Str"; value: string; multiline: boolean }
  | { kind: "Boolean"; value: boolean };

// ===== Patterns =====

export type Pattern = Located<PatternNode>;

export type PatternNode =
  | { kind: "Anything" }
  | { kind: "UnitPattern"; comments: Comments }
  | { kind: "LiteralPattern"; literal: Literal }
  | { kind: "VarPattern"; name: string }
  | { kind: "OpPattern"; symbol: string }
  | {
      kind: "DataPattern";
      constructor: { namespace: string[]; name: string };
      args: Commented<Pattern>[];
    }
  | { kind: "PatternParens"; pattern: Commented<Pattern> }
  | { kind: "TuplePattern"; elements: Commented<Pattern>[] }
  | { kind: "EmptyListPattern"; comments: Comments }
  | { kind: "ListPattern"; elements: Commented<Pattern>[] }
  | { kind: "ConsPattern"; first: Commented<Pattern>; rest: Commented<Pattern>[] }
  | { kind: "RecordPattern"; fields: Commented<string>[] }
  | { kind: "Alias"; pattern: Commented<Pattern>; name: Commented<string> };

// ===== Types =====

export type Type = Located<TypeNode>;

export type RecordTypeField = {
  name: Commented<string>;
  type: Commented<Type>;
};

export type TypeNode =
  | { kind: "UnitType"; comments: Comments }
  | { kind: "TypeVariable"; name: string }
  | {
      kind: "TypeConstruction";
      constructor: { namespace: string[]; name: string };
      args: Commented<Type>[];
    }
  | { kind: "TypeParens"; type: Commented<Type> }
  | { kind: "TupleType"; elements: Commented<Type>[] }
  | {
      kind: "RecordType";
      base: Commented<string> | null;
      fields: Commented<RecordTypeField>[];
      trailing: Comments;
      multiline: boolean;
    }
  | {
      kind: "FunctionType";
      /** `after` holds the comments before the first `->`. */
      first: Commented<Type>;
      /** `before` holds the comments after an `->`, `after` those before the next one. */
      rest: Commented<Type>[];
      multiline: boolean;
    };

// ===== Expressions =====

export type Expression = Located<ExpressionNode>;

/**
 * One unresolved step of an operator chain: the operator, the comments on
 * either side of it, and its right operand. Precedence is applied later.
 */
export type BinopsClause = {
  preOperator: Comments;
  operator: Located<VarRef>;
  preExpression: Comments;
  expression: Expression;
};

export type IfClause = {
  /** Comments between `if` and the condition, and between the condition and `then`. */
  condition: Commented<Expression>;
  /** Comments between `then` and the body, and after the body. */
  body: Commented<Expression>;
};

export type CaseBranch = {
  beforePattern: Comments;
  pattern: Pattern;
  beforeArrow: Comments;
  afterArrow: Comments;
  body: Expression;
};

export type RecordPair = {
  key: Commented<string>;
  value: Commented<Expression>;
  multiline: boolean;
};

export type ExpressionNode =
  | { kind: "Literal"; literal: Literal }
  | { kind: "VarExpr"; ref: VarRef }
  | { kind: "Unary"; operator: "Negative"; operand: Expression }
  | {
      kind: "Range";
      low: Commented<Expression>;
      high: Commented<Expression>;
      multiline: boolean;
    }
  | {
      kind: "ExplicitList";
      terms: Commented<Expression>[];
      trailing: Comments;
      multiline: boolean;
    }
  | {
      kind: "App";
      head: Expression;
      args: Commented<Expression>[];
      multiline: FAMultiline;
    }
  | {
      kind: "Binops";
      left: Expression;
      clauses: BinopsClause[];
      multiline: Multiline;
    }
  | {
      kind: "If";
      first: IfClause;
      /** `else if` clauses; `before` holds the comments after `else`. */
      rest: Commented<IfClause>[];
      final: Commented<Expression>;
    }
  | {
      kind: "Case";
      subject: Commented<Expression>;
      multilineSubject: boolean;
      branches: Located<CaseBranch>[];
    }
  | {
      kind: "Let";
      declarations: LetDeclaration[];
      bodyComments: Comments;
      body: Expression;
    }
  | {
      kind: "Lambda";
      args: Commented<Pattern>[];
      comments: Comments;
      body: Expression;
      multiline: boolean;
    }
  | { kind: "Tuple"; elements: Commented<Expression>[]; multiline: boolean }
  | { kind: "Parens"; expression: Commented<Expression> }
  | { kind: "Unit"; comments: Comments }
  | {
      kind: "Record";
      base: Commented<string> | null;
      fields: Commented<RecordPair>[];
      trailing: Comments;
      multiline: boolean;
    }
  | { kind: "Access"; record: Expression; field: string }
  | { kind: "AccessFunction"; field: string }
  | { kind: "TupleFunction"; arity: number }
  | { kind: "GLShader"; source: string };

// ===== Declarations =====

export type Definition = {
  kind: "Definition";
  pattern: Pattern;
  args: Commented<Pattern>[];
  /** Comments on both sides of `=`, in source order. */
  comments: Comments;
  body: Expression;
};

export type TypeAnnotation = {
  kind: "TypeAnnotation";
  /** `after` holds the comments before `:`. */
  name: Commented<Ref>;
  /** `before` holds the comments after `:`. */
  annotation: Commented<Type>;
};

export type CommonDeclaration = Definition | TypeAnnotation;

export type LetDeclaration = Located<
  | { kind: "LetCommonDeclaration"; declaration: Located<CommonDeclaration> }
  | { kind: "LetComment"; comment: Comment }
>;

// ===== Modules =====

/**
 * A name in an explicit listing. `constructors` is null unless the name is
 * followed by `(..)`, in which case it holds the comments written between
 * the name and `(..)`.
 */
export type ListedName = {
  name: string;
  constructors: Comments | null;
};

export type Listing =
  | { kind: "OpenListing"; comments: Comments }
  | {
      kind: "ExplicitListing";
      names: Commented<ListedName>[];
      /** Comments inside an empty `( )`. */
      trailing: Comments;
    };

export type ModuleHeader = {
  name: Commented<string[]>;
  exposing: Commented<Listing>;
};

export type ImportDeclaration = {
  module: Commented<string[]>;
  alias: Commented<string> | null;
  exposing: Commented<Listing> | null;
};

export type FixityDeclaration = {
  kind: "Fixity";
  associativity: "left" | "right" | "none";
  precedence: Commented<number>;
  operator: Commented<string>;
};

export type TypeAliasDeclaration = {
  kind: "TypeAlias";
  name: Commented<string>;
  params: Commented<string>[];
  /** `before` holds the comments after `=`. */
  type: Commented<Type>;
};

export type ConstructorVariant = {
  name: string;
  args: Commented<Type>[];
};

export type DatatypeDeclaration = {
  kind: "Datatype";
  name: Commented<string>;
  params: Commented<string>[];
  variants: Commented<Located<ConstructorVariant>>[];
};

export type TopLevel = Located<
  | { kind: "CommonDeclaration"; declaration: CommonDeclaration }
  | FixityDeclaration
  | TypeAliasDeclaration
  | DatatypeDeclaration
  | { kind: "BodyComment"; comment: Comment }
>;

export type Module = {
  /** Comments before the module header (or before the first import/declaration). */
  initialComments: Comments;
  header: Located<ModuleHeader> | null;
  imports: Commented<Located<ImportDeclaration>>[];
  body: TopLevel[];
};

export * from "./operators";
