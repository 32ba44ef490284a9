import { lex } from "@groom/lexer";
import {
  TokenKind,
  at,
  commented,
  isCommentToken,
  type Comment,
  type Comments,
  type Commented,
  type Located,
  type Position,
  type Span,
  type Token,
} from "@groom/syntax";

/**
 * Error thrown when the input does not match what the grammar expects.
 *
 * The same error is used for "try the next alternative" and for "nothing
 * matched": ordered choice decides which one it is by checking whether the
 * failing alternative consumed input.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly span: Span,
    public readonly expected: string[] = []
  ) {
    super(message);
  }
}

export type Parse<T> = (cursor: Cursor) => T;

/**
 * Everything a trial parse can change. Replaced wholesale, never mutated,
 * so restoring a snapshot undoes a failed trial completely.
 */
type CursorState = Readonly<{
  /** Next unread token, comment tokens included. */
  index: number;
  /** How far the input has been consumed. */
  at: Position;
  /** Indentation reference columns, innermost last. */
  indent: readonly number[];
}>;

const TOP_LEVEL_COLUMN = 1;

/**
 * Token cursor with Parsec-style combinators.
 *
 * A token only matches when it starts exactly where the input has been
 * consumed to: whitespace and comments are never skipped implicitly, they
 * are consumed by `whitespace()` so that every comment ends up in the tree.
 */
export class Cursor {
  private state: CursorState;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string
  ) {
    this.state = {
      index: 0,
      at: { offset: 0, line: 1, column: 1 },
      indent: [],
    };
  }

  static fromSource(source: string): Cursor {
    return new Cursor(lex(source), source);
  }

  // ===== Position and lookahead =====

  position(): Position {
    return this.state.at;
  }

  peek(): Token {
    const token =
      this.tokens[this.state.index] ?? this.tokens[this.tokens.length - 1];
    if (!token) {
      throw new ParseError("No tokens available", {
        start: this.state.at,
        end: this.state.at,
      });
    }
    return token;
  }

  /** The next token starts where the input has been consumed to. */
  isAdjacent(): boolean {
    return this.peek().span.start.offset === this.state.at.offset;
  }

  peekIs(kind: TokenKind, lexeme?: string): boolean {
    const token = this.peek();
    return (
      this.isAdjacent() &&
      token.kind === kind &&
      (lexeme === undefined || token.lexeme === lexeme)
    );
  }

  // ===== Tokens =====

  satisfy(predicate: (token: Token) => boolean, label: string): Token {
    const token = this.peek();
    if (!this.isAdjacent() || isCommentToken(token) || !predicate(token)) {
      throw this.error([label]);
    }
    this.state = {
      ...this.state,
      index: this.state.index + 1,
      at: token.span.end,
    };
    return token;
  }

  token(kind: TokenKind, label: string): Token {
    return this.satisfy((token) => token.kind === kind, label);
  }

  keyword(word: string): Token {
    return this.satisfy(
      (token) => token.kind === TokenKind.Keyword && token.lexeme === word,
      `'${word}'`
    );
  }

  operator(symbol: string): Token {
    return this.satisfy(
      (token) => token.kind === TokenKind.Operator && token.lexeme === symbol,
      `'${symbol}'`
    );
  }

  eof(): void {
    if (this.peek().kind !== TokenKind.Eof || !this.isAdjacent()) {
      throw this.error(["end of input"]);
    }
  }

  // ===== Trivia =====

  /**
   * Consume spaces, newlines and comments. Returns the comments in source
   * order; an empty list when only blanks (or nothing) were crossed.
   */
  whitespace(): Comments {
    const comments: Comments = [];
    let index = this.state.index;

    while (true) {
      const token = this.tokens[index];
      if (!token || !isCommentToken(token)) break;
      comments.push(toComment(token));
      index += 1;
    }

    const next = this.tokens[index] ?? this.peek();
    this.state = { ...this.state, index, at: next.span.start };
    return comments;
  }

  padded<T>(parse: Parse<T>): Commented<T> {
    const before = this.whitespace();
    const value = parse(this);
    const after = this.whitespace();
    return commented(before, value, after);
  }

  /** Run a parser and report whether the input it consumed crossed a line break. */
  trackNewline<T>(parse: Parse<T>): [T, boolean] {
    const start = this.state.at.offset;
    const value = parse(this);
    const end = this.state.at.offset;
    return [value, this.source.slice(start, end).includes("\n")];
  }

  located<T>(parse: Parse<T>): Located<T> {
    const start = this.state.at;
    const value = parse(this);
    return at(start, this.state.at, value);
  }

  // ===== Indentation =====

  indentReference(): number {
    return this.state.indent[this.state.indent.length - 1] ?? TOP_LEVEL_COLUMN;
  }

  /** Run a parser with the current column as indentation reference. */
  withPos<T>(parse: Parse<T>): T {
    const outer = this.state.indent;
    this.state = {
      ...this.state,
      indent: [...outer, this.state.at.column],
    };
    try {
      return parse(this);
    } finally {
      this.state = { ...this.state, indent: outer };
    }
  }

  /** Require the current column to be past the indentation reference. */
  indented(): void {
    const reference = this.indentReference();
    if (this.state.at.column <= reference) {
      throw this.error([`an indented line (past column ${reference})`]);
    }
  }

  /** Require the current column to equal the indentation reference. */
  checkIndent(): void {
    const reference = this.indentReference();
    if (this.state.at.column !== reference) {
      throw this.error([`a line aligned at column ${reference}`]);
    }
  }

  // ===== Backtracking and choice =====

  /** Run a parser; on failure rewind as if nothing had been consumed. */
  attempt<T>(parse: Parse<T>): T {
    const saved = this.state;
    try {
      return parse(this);
    } catch (error) {
      if (error instanceof ParseError) {
        this.state = saved;
      }
      throw error;
    }
  }

  lookAhead<T>(parse: Parse<T>): T {
    const saved = this.state;
    try {
      return parse(this);
    } finally {
      this.state = saved;
    }
  }

  /** `null` when the parser fails without consuming input. */
  optional<T>(parse: Parse<T>): T | null {
    const saved = this.state;
    try {
      return parse(this);
    } catch (error) {
      if (!(error instanceof ParseError) || this.consumedSince(saved)) {
        throw error;
      }
      this.state = saved;
      return null;
    }
  }

  many<T>(parse: Parse<T>): T[] {
    const results: T[] = [];
    while (true) {
      const before = this.state;
      const result = this.optional(parse);
      if (result === null) break;
      results.push(result);
      // A parser that succeeds without consuming would repeat forever.
      if (!this.consumedSince(before)) break;
    }
    return results;
  }

  many1<T>(parse: Parse<T>): T[] {
    const first = parse(this);
    return [first, ...this.many(parse)];
  }

  /**
   * Ordered choice: the first alternative that succeeds wins. An
   * alternative that fails after consuming input is not backtracked over.
   */
  choice<T>(alternatives: ReadonlyArray<Parse<T>>, label?: string): T {
    const expected: string[] = [];
    for (const alternative of alternatives) {
      const saved = this.state;
      try {
        return alternative(this);
      } catch (error) {
        if (!(error instanceof ParseError) || this.consumedSince(saved)) {
          throw error;
        }
        this.state = saved;
        expected.push(...error.expected);
      }
    }
    throw this.error(label ? [label] : expected);
  }

  /** Replace what a non-consuming failure reports as expected. */
  expecting<T>(label: string, parse: Parse<T>): T {
    const saved = this.state;
    try {
      return parse(this);
    } catch (error) {
      if (error instanceof ParseError && !this.consumedSince(saved)) {
        throw this.error([label]);
      }
      throw error;
    }
  }

  /**
   * Commit to `parse` once `check` succeeds as a lookahead: from then on a
   * failure inside `parse` is not backtracked over.
   */
  commitIf<T>(check: Parse<unknown>, parse: Parse<T>): T {
    this.lookAhead(check);
    return parse(this);
  }

  // ===== Sequences =====

  /**
   * Comma-separated items up to `close`, the opening bracket already
   * consumed. Each item keeps the comments on both of its sides; comments in
   * an empty sequence are returned as `trailing`.
   */
  sequence<T>(
    close: TokenKind,
    item: Parse<T>,
    label: string
  ): { items: Commented<T>[]; trailing: Comments } {
    const items: Commented<T>[] = [];
    let before = this.whitespace();

    if (this.peekIs(close)) {
      this.token(close, label);
      return { items, trailing: before };
    }

    while (true) {
      const value = item(this);
      const after = this.whitespace();
      items.push(commented(before, value, after));
      if (!this.peekIs(TokenKind.Comma)) break;
      this.token(TokenKind.Comma, "','");
      before = this.whitespace();
    }

    this.token(close, label);
    return { items, trailing: [] };
  }

  group<T>(
    open: TokenKind,
    close: TokenKind,
    item: Parse<T>,
    label: string
  ): { items: Commented<T>[]; trailing: Comments; multiline: boolean } {
    const [{ items, trailing }, multiline] = this.trackNewline(() => {
      this.token(open, label);
      return this.sequence(close, item, label);
    });
    return { items, trailing, multiline };
  }

  // ===== Errors =====

  error(expected: string[]): ParseError {
    const token = this.peek();
    const found =
      token.kind === TokenKind.Eof
        ? "end of input"
        : `${token.kind} '${token.lexeme}'`;
    const labels = unique(expected);
    const wanted = labels.length > 0 ? labels.join(" or ") : "more input";
    return new ParseError(
      `Expected ${wanted} but found ${found}`,
      token.span,
      labels
    );
  }

  private consumedSince(saved: CursorState): boolean {
    return (
      saved.index !== this.state.index ||
      saved.at.offset !== this.state.at.offset
    );
  }
}

function toComment(token: Token): Comment {
  if (token.kind === TokenKind.LineComment) {
    return { kind: "LineComment", text: token.lexeme.slice(2) };
  }
  return { kind: "BlockComment", lines: token.lexeme.slice(2, -2).split("\n") };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
