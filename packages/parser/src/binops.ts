import {
  at,
  multilineFromBool,
  type BinopsClause,
  type Expression,
  type Located,
  type VarRef,
} from "@groom/syntax";
import type { Cursor, Parse } from "./cursor";

/**
 * Parse an operator chain into a flat, unassociated list of clauses.
 *
 * Grammar:
 *   Binops = term {Operator (term | last)}
 *
 * `last` is for operands that extend as far right as possible (`if`,
 * `case`, `let`, lambda); once one is taken the chain ends, so
 * `a |> \x -> x + 1` keeps `+ 1` inside the lambda body.
 *
 * Precedence is not applied here. The chain is grouped later against a
 * fixity table, which may come from declarations the parser has not seen.
 */
export function binops(
  cursor: Cursor,
  term: Parse<Expression>,
  last: Parse<Expression>,
  operator: Parse<VarRef>
): Expression {
  const start = cursor.position();
  const [[left, clauses], crossed] = cursor.trackNewline(
    (c): [Expression, BinopsClause[]] => [term(c), nextOps(c, term, last, operator)]
  );

  if (clauses.length === 0) return left;

  return at(start, cursor.position(), {
    kind: "Binops",
    left,
    clauses,
    multiline: multilineFromBool(crossed),
  });
}

function nextOps(
  cursor: Cursor,
  term: Parse<Expression>,
  last: Parse<Expression>,
  operator: Parse<VarRef>
): BinopsClause[] {
  const clauses: BinopsClause[] = [];

  while (true) {
    const step = cursor.optional((c) =>
      c.commitIf(
        (check) => {
          check.whitespace();
          operator(check);
        },
        () => clause(c, term, last, operator)
      )
    );
    if (step === null) return clauses;

    clauses.push(step.clause);
    if (step.final) return clauses;
  }
}

function clause(
  cursor: Cursor,
  term: Parse<Expression>,
  last: Parse<Expression>,
  operator: Parse<VarRef>
): { clause: BinopsClause; final: boolean } {
  const preOperator = cursor.whitespace();
  const op: Located<VarRef> = cursor.located(operator);
  const preExpression = cursor.whitespace();

  const operand = cursor.expecting("an expression", (c) =>
    c.choice<{ expression: Expression; final: boolean }>([
      (inner) => ({ expression: inner.attempt(term), final: false }),
      (inner) => ({ expression: last(inner), final: true }),
    ])
  );

  return {
    clause: {
      preOperator,
      operator: op,
      preExpression,
      expression: operand.expression,
    },
    final: operand.final,
  };
}
