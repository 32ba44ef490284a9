import type { Keyword, Token, Position, Span } from "@groom/syntax";
import { TokenKind, isKeyword, isOperatorChar } from "@groom/syntax";

const SHADER_OPEN = "[glsl|";
const SHADER_CLOSE = "|]";
const LAMBDA_GLYPH = "λ";

/**
 * Operator spellings that are punctuation rather than user operators.
 */
const RESERVED_OPERATORS: Readonly<Record<string, TokenKind>> = {
  "=": TokenKind.Equals,
  "|": TokenKind.Pipe,
  ":": TokenKind.Colon,
  ".": TokenKind.Dot,
  "..": TokenKind.Range,
  "->": TokenKind.Arrow,
  "\\": TokenKind.Backslash,
};

/**
 * Punctuation that ends before a directly following `-`.
 */
const SPLIT_BEFORE_MINUS: ReadonlySet<string> = new Set(["=", "->", ":", ".."]);

class LexerState {
  private index = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  position(): Position {
    return { offset: this.index, line: this.line, column: this.column };
  }

  offset(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.source.length;
  }

  peek(offset = 0): string | undefined {
    return this.source[this.index + offset];
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.index);
  }

  advance(): string {
    const char = this.source[this.index++];
    if (char === undefined) {
      throw new LexError("Advanced past end of input", {
        start: this.position(),
        end: this.position(),
      });
    }
    if (char === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return char;
  }

  advanceBy(count: number): void {
    for (let i = 0; i < count; i += 1) {
      this.advance();
    }
  }

  slice(start: number, end?: number): string {
    return this.source.slice(start, end);
  }
}

export class LexError extends Error {
  constructor(message: string, public readonly span: Span) {
    super(message);
  }
}

/**
 * Tokenize source text.
 *
 * Comments are emitted as tokens so the parser can attach them to the tree.
 * Whitespace is not: the gap between two tokens is recoverable from their spans.
 */
export function lex(source: string): Token[] {
  const state = new LexerState(source);
  const tokens: Token[] = [];

  while (!state.isAtEnd()) {
    const current = state.peek();

    if (current === undefined) {
      break;
    }

    if (isWhitespace(current)) {
      skipWhitespace(state);
      continue;
    }

    const startPosition = state.position();

    if (current === "-" && state.peek(1) === "-") {
      tokens.push(readLineComment(state, startPosition));
      continue;
    }

    if (current === "{" && state.peek(1) === "-") {
      tokens.push(readBlockComment(state, startPosition));
      continue;
    }

    if (state.startsWith(SHADER_OPEN)) {
      tokens.push(readShader(state, startPosition));
      continue;
    }

    if (isIdentifierStart(current)) {
      tokens.push(readIdentifierOrKeyword(state, startPosition));
      continue;
    }

    if (isDigit(current)) {
      tokens.push(readNumber(state, startPosition));
      continue;
    }

    if (current === '"') {
      tokens.push(readString(state, startPosition));
      continue;
    }

    if (current === "'") {
      tokens.push(readChar(state, startPosition));
      continue;
    }

    const punctuated = readPunctuationOrOperator(state, startPosition);
    if (punctuated) {
      tokens.push(punctuated);
      continue;
    }

    throw new LexError(`Unexpected character '${current}'`, {
      start: startPosition,
      end: state.position(),
    });
  }

  const endPosition = state.position();
  tokens.push({
    kind: TokenKind.Eof,
    lexeme: "",
    span: { start: endPosition, end: endPosition },
  });

  return tokens;
}

function readIdentifierOrKeyword(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  const first = state.advance();
  const isUpper = isUppercase(first);

  while (true) {
    const next = state.peek();
    if (next && (isIdentifierPart(next) || next === "'")) {
      state.advance();
      continue;
    }
    break;
  }

  const text = state.slice(startIndex, state.offset());
  const end = state.position();

  if (isKeyword(text)) {
    return { kind: TokenKind.Keyword, lexeme: text, span: { start, end } };
  }

  return {
    kind: isUpper ? TokenKind.UpperIdentifier : TokenKind.LowerIdentifier,
    lexeme: text,
    span: { start, end },
  };
}

function readNumber(state: LexerState, start: Position): Token {
  const startIndex = state.offset();

  if (state.peek() === "0" && (state.peek(1) === "x" || state.peek(1) === "X")) {
    state.advanceBy(2);
    if (!isHexDigit(state.peek() ?? "")) {
      throw new LexError("Expected hexadecimal digits after 0x", {
        start,
        end: state.position(),
      });
    }
    while (isHexDigit(state.peek() ?? "")) {
      state.advance();
    }
    return makeToken(state, start, TokenKind.Number, startIndex);
  }

  consumeDigits(state);

  if (state.peek() === "." && isDigit(state.peek(1) ?? "")) {
    state.advance();
    consumeDigits(state);
  }

  if (state.peek() === "e" || state.peek() === "E") {
    const sign = state.peek(1);
    const digitAt = sign === "+" || sign === "-" ? 2 : 1;
    if (isDigit(state.peek(digitAt) ?? "")) {
      state.advanceBy(digitAt);
      consumeDigits(state);
    }
  }

  return makeToken(state, start, TokenKind.Number, startIndex);
}

function readString(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  const multiline = state.startsWith('"""');
  state.advanceBy(multiline ? 3 : 1);

  while (true) {
    const next = state.peek();
    if (next === undefined) {
      throw unterminated("string", start, state);
    }
    if (multiline && state.startsWith('"""')) {
      state.advanceBy(3);
      break;
    }
    if (!multiline && next === '"') {
      state.advance();
      break;
    }
    if (!multiline && next === "\n") {
      throw unterminated("string", start, state);
    }
    if (next === "\\") {
      readEscape(state, start, 'nrt"\'\\');
      continue;
    }
    state.advance();
  }

  return makeToken(state, start, TokenKind.String, startIndex);
}

function readChar(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  state.advance();

  const next = state.peek();
  if (next === undefined || next === "\n") {
    throw unterminated("char", start, state);
  }

  if (next === "\\") {
    readEscape(state, start, "nrt\"'\\");
  } else {
    state.advance();
  }

  if (state.peek() !== "'") {
    throw new LexError("Char literal must contain exactly one character", {
      start,
      end: state.position(),
    });
  }

  state.advance();

  return makeToken(state, start, TokenKind.Char, startIndex);
}

function readEscape(state: LexerState, start: Position, simple: string) {
  state.advance();
  const escape = state.peek();

  if (escape === "u" && state.peek(1) === "{") {
    state.advanceBy(2);
    while (isHexDigit(state.peek() ?? "")) {
      state.advance();
    }
    if (state.peek() !== "}") {
      throw new LexError("Unterminated unicode escape", {
        start,
        end: state.position(),
      });
    }
    state.advance();
    return;
  }

  if (!escape || !simple.includes(escape)) {
    throw new LexError(`Invalid escape \\${escape ?? ""}`, {
      start,
      end: state.position(),
    });
  }
  state.advance();
}

function readShader(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  state.advanceBy(SHADER_OPEN.length);

  while (!state.startsWith(SHADER_CLOSE)) {
    if (state.isAtEnd()) {
      throw new LexError("Unterminated shader block", {
        start,
        end: state.position(),
      });
    }
    state.advance();
  }
  state.advanceBy(SHADER_CLOSE.length);

  return makeToken(state, start, TokenKind.Shader, startIndex);
}

function readLineComment(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  while (!state.isAtEnd()) {
    const next = state.peek();
    if (next === "\n" || next === "\r") {
      break;
    }
    state.advance();
  }
  return makeToken(state, start, TokenKind.LineComment, startIndex);
}

function readBlockComment(state: LexerState, start: Position): Token {
  const startIndex = state.offset();
  let depth = 1;
  state.advanceBy(2);

  while (!state.isAtEnd() && depth > 0) {
    const current = state.peek();
    const next = state.peek(1);

    if (current === "{" && next === "-") {
      depth += 1;
      state.advanceBy(2);
      continue;
    }

    if (current === "-" && next === "}") {
      depth -= 1;
      state.advanceBy(2);
      continue;
    }

    state.advance();
  }

  if (depth !== 0) {
    throw new LexError("Unterminated block comment", {
      start,
      end: state.position(),
    });
  }

  return makeToken(state, start, TokenKind.BlockComment, startIndex);
}

function readPunctuationOrOperator(
  state: LexerState,
  start: Position
): Token | null {
  const startIndex = state.offset();
  const current = state.peek();

  if (current === undefined) return null;

  if (current === "(")
    return makeSimpleToken(state, start, TokenKind.LParen, 1);
  if (current === ")")
    return makeSimpleToken(state, start, TokenKind.RParen, 1);
  if (current === "{")
    return makeSimpleToken(state, start, TokenKind.LBrace, 1);
  if (current === "}")
    return makeSimpleToken(state, start, TokenKind.RBrace, 1);
  if (current === "[")
    return makeSimpleToken(state, start, TokenKind.LBracket, 1);
  if (current === "]")
    return makeSimpleToken(state, start, TokenKind.RBracket, 1);
  if (current === ",") return makeSimpleToken(state, start, TokenKind.Comma, 1);
  if (current === LAMBDA_GLYPH)
    return makeSimpleToken(state, start, TokenKind.Backslash, 1);

  if (!isOperatorChar(current)) return null;

  // Maximal munch, stopping where a line comment begins.
  let length = 1;
  while (true) {
    const next = state.peek(length);
    if (
      next !== undefined &&
      isOperatorChar(next) &&
      !(next === "-" && state.peek(length + 1) === "-")
    ) {
      length += 1;
      continue;
    }
    break;
  }

  // `x=-1`, `\x->-x`: the minus belongs to the operand.
  const munched = state.slice(startIndex, startIndex + length);
  if (munched.endsWith("-") && SPLIT_BEFORE_MINUS.has(munched.slice(0, -1))) {
    length -= 1;
  }

  state.advanceBy(length);
  const lexeme = state.slice(startIndex, state.offset());
  const kind = RESERVED_OPERATORS[lexeme] ?? TokenKind.Operator;
  return makeToken(state, start, kind, startIndex);
}

function makeToken(
  state: LexerState,
  start: Position,
  kind: TokenKind,
  startIndex: number
): Token {
  const end = state.position();
  const lexeme = state.slice(startIndex, state.offset());
  return { kind, lexeme, span: { start, end } };
}

function makeSimpleToken(
  state: LexerState,
  start: Position,
  kind: TokenKind,
  length: number
): Token {
  const startIndex = state.offset();
  state.advanceBy(length);
  return makeToken(state, start, kind, startIndex);
}

function skipWhitespace(state: LexerState) {
  while (!state.isAtEnd() && isWhitespace(state.peek() ?? "")) {
    state.advance();
  }
}

function consumeDigits(state: LexerState) {
  while (isDigit(state.peek() ?? "")) {
    state.advance();
  }
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r";
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isHexDigit(char: string): boolean {
  return (
    isDigit(char) ||
    (char >= "a" && char <= "f") ||
    (char >= "A" && char <= "F")
  );
}

function isUppercase(char: string): boolean {
  return char >= "A" && char <= "Z";
}

function isLowercase(char: string): boolean {
  return char >= "a" && char <= "z";
}

function isIdentifierStart(char: string): boolean {
  return isLowercase(char) || isUppercase(char) || char === "_";
}

function isIdentifierPart(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char);
}

function unterminated(
  kind: "string" | "char",
  start: Position,
  state: LexerState
): LexError {
  return new LexError(`Unterminated ${kind} literal`, {
    start,
    end: state.position(),
  });
}

export type { Token, TokenKind, Keyword, Position, Span };
