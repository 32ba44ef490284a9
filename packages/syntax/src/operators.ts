/**
 * Shared operator definitions.
 *
 * This module is the single source of truth for:
 * - Which characters are valid operator characters
 * - Which operator spellings are reserved punctuation
 * - Builtin operator fixity declarations
 *
 * Used by the lexer, the parser and the fixity resolution pass.
 */

// ============================================================================
// Operator Characters
// ============================================================================

/**
 * Set of characters that can appear in operators.
 * Used by the lexer to recognize multi-character operators.
 */
export const OPERATOR_CHARS: ReadonlySet<string> = new Set(
  Array.from("!#$%&*+./<=>?@\\^|~:-")
);

export function isOperatorChar(char: string): boolean {
  return OPERATOR_CHARS.has(char);
}

// ============================================================================
// Fixity
// ============================================================================

export type Associativity = "left" | "right" | "none";

/**
 * Operator fixity information.
 */
export interface OperatorFixity {
  /** Operator associativity: left, right, or none */
  associativity: Associativity;
  /** Operator precedence (higher binds tighter) */
  precedence: number;
}

export type FixityRegistry = Map<string, OperatorFixity>;

export interface BuiltinOperator {
  symbol: string;
  fixity: OperatorFixity;
}

const left = (precedence: number): OperatorFixity => ({
  associativity: "left",
  precedence,
});
const right = (precedence: number): OperatorFixity => ({
  associativity: "right",
  precedence,
});
const none = (precedence: number): OperatorFixity => ({
  associativity: "none",
  precedence,
});

/**
 * Operators declared by the core library, with their fixity.
 *
 * Precedence levels:
 * 0: |>, <|              (application operators)
 * 2: ||                  (logical or)
 * 3: &&                  (logical and)
 * 4: ==, /=, <, <=, >, >= (comparison, non-associative)
 * 5: ::, ++              (cons, append)
 * 6: +, -                (addition, subtraction)
 * 7: *, /, //            (multiplication, division)
 * 8: ^                   (exponentiation)
 * 9: <<, >>              (composition)
 */
export const BUILTIN_OPERATORS: readonly BuiltinOperator[] = [
  { symbol: "|>", fixity: left(0) },
  { symbol: "<|", fixity: right(0) },
  { symbol: "||", fixity: right(2) },
  { symbol: "&&", fixity: right(3) },
  { symbol: "==", fixity: none(4) },
  { symbol: "/=", fixity: none(4) },
  { symbol: "<", fixity: none(4) },
  { symbol: ">", fixity: none(4) },
  { symbol: "<=", fixity: none(4) },
  { symbol: ">=", fixity: none(4) },
  { symbol: "++", fixity: right(5) },
  { symbol: "::", fixity: right(5) },
  { symbol: "+", fixity: left(6) },
  { symbol: "-", fixity: left(6) },
  { symbol: "*", fixity: left(7) },
  { symbol: "/", fixity: left(7) },
  { symbol: "//", fixity: left(7) },
  { symbol: "^", fixity: right(8) },
  { symbol: "<<", fixity: left(9) },
  { symbol: ">>", fixity: right(9) },
];

/**
 * Map from operator symbol to fixity information.
 */
export const BUILTIN_OPERATOR_FIXITY: Readonly<Record<string, OperatorFixity>> =
  Object.fromEntries(BUILTIN_OPERATORS.map((op) => [op.symbol, op.fixity]));

/**
 * Fixity of an operator nobody declared.
 *
 * Precedence 9 (high) and left associativity, so unknown operators bind
 * tightly and behave predictably without explicit declarations.
 */
export const DEFAULT_OPERATOR_FIXITY: OperatorFixity = left(9);
