/**
 * Fixity resolution - groups flat operator chains by precedence.
 *
 * The parser keeps `a + b * c` as a flat list of clauses because fixities
 * can come from declarations anywhere in the module, or from configuration.
 * This module provides utilities for:
 * - Building a fixity registry from a module's infix declarations
 * - Querying and merging registries
 * - Associating a chain into a binary operator tree
 */

import {
  BUILTIN_OPERATORS,
  DEFAULT_OPERATOR_FIXITY,
  type BinopsClause,
  type Expression,
  type FixityRegistry,
  type Located,
  type Module,
  type OperatorFixity,
  type Span,
  type VarRef,
} from "@groom/syntax";
import { moduleExpressions, walkExpression } from "./walk";

/**
 * Error raised when a chain cannot be grouped, or when fixity declarations
 * conflict.
 */
export class FixityError extends Error {
  constructor(message: string, public readonly span: Span) {
    super(message);
  }
}

export type OperatorTree =
  | { kind: "Operand"; expression: Expression }
  | {
      kind: "Operation";
      operator: Located<VarRef>;
      left: OperatorTree;
      right: OperatorTree;
      span: Span;
    };

/** A `Binops` node together with its grouping. */
export type ResolvedChain = {
  expression: Expression;
  tree: OperatorTree;
};

/**
 * Result of collecting the infix declarations of a module.
 */
export type RegistryBuildResult = {
  registry: FixityRegistry;
  errors: FixityError[];
};

/**
 * Fixities of the core library operators.
 */
export const BUILTIN_REGISTRY: FixityRegistry = new Map(
  BUILTIN_OPERATORS.map(({ symbol, fixity }) => [symbol, fixity])
);

export function createRegistry(
  entries: Readonly<Record<string, OperatorFixity>> = {}
): FixityRegistry {
  return new Map(Object.entries(entries));
}

/**
 * Merge two registries. Entries of `override` win.
 */
export function mergeRegistries(
  base: FixityRegistry,
  override: FixityRegistry
): FixityRegistry {
  const merged: FixityRegistry = new Map(base);
  for (const [symbol, fixity] of override) {
    merged.set(symbol, fixity);
  }
  return merged;
}

/**
 * Fixity of an operator, falling back to left-associative precedence 9.
 */
export function getFixity(
  registry: FixityRegistry,
  symbol: string
): OperatorFixity {
  return registry.get(symbol) ?? DEFAULT_OPERATOR_FIXITY;
}

/**
 * Collect the `infix`/`infixl`/`infixr` declarations of a module. A second
 * declaration for the same operator is reported and ignored.
 */
export function buildRegistryFromModule(module: Module): RegistryBuildResult {
  const registry: FixityRegistry = new Map();
  const errors: FixityError[] = [];

  for (const { span, value } of module.body) {
    if (value.kind !== "Fixity") continue;
    const symbol = value.operator.value;
    if (registry.has(symbol)) {
      errors.push(
        new FixityError(
          `Duplicate infix declaration for operator '${symbol}'`,
          span
        )
      );
      continue;
    }
    registry.set(symbol, {
      associativity: value.associativity,
      precedence: value.precedence.value,
    });
  }

  return { registry, errors };
}

export function operatorSymbol(ref: VarRef): string {
  return ref.kind === "OpRef" ? ref.symbol : ref.name;
}

/**
 * Group an operator chain by precedence climbing.
 *
 * Left-associative operators of equal precedence group to the left,
 * right-associative ones to the right. Chaining a non-associative operator
 * with anything of the same precedence, or mixing left- and
 * right-associative operators of one precedence, is an error.
 *
 * Example: `a - b - c * d` with the builtin fixities gives
 *   ((a - b) - (c * d))
 */
export function associate(
  left: Expression,
  clauses: readonly BinopsClause[],
  registry: FixityRegistry
): OperatorTree {
  let index = 0;
  const fixityOf = (clause: BinopsClause) =>
    getFixity(registry, operatorSymbol(clause.operator.value));

  const climb = (lhs: OperatorTree, minPrecedence: number): OperatorTree => {
    let result = lhs;
    while (index < clauses.length) {
      const clause = clauses[index];
      if (!clause) break;
      const fixity = fixityOf(clause);
      if (fixity.precedence < minPrecedence) break;
      index += 1;

      let rhs = operand(clause.expression);
      while (index < clauses.length) {
        const next = clauses[index];
        if (!next) break;
        const nextFixity = fixityOf(next);

        if (nextFixity.precedence > fixity.precedence) {
          rhs = climb(rhs, fixity.precedence + 1);
        } else if (nextFixity.precedence === fixity.precedence) {
          checkCompatible(clause, fixity, next, nextFixity);
          if (fixity.associativity !== "right") break;
          rhs = climb(rhs, fixity.precedence);
        } else {
          break;
        }
      }

      result = operation(clause.operator, result, rhs);
    }
    return result;
  };

  return climb(operand(left), Number.NEGATIVE_INFINITY);
}

/**
 * Group every operator chain in the module, nested ones included.
 * Throws `FixityError` on the first chain that cannot be grouped.
 */
export function resolveModuleOperators(
  module: Module,
  registry: FixityRegistry
): ResolvedChain[] {
  const chains: ResolvedChain[] = [];
  for (const body of moduleExpressions(module)) {
    chains.push(...resolveExpressionOperators(body, registry));
  }
  return chains;
}

export function resolveExpressionOperators(
  expression: Expression,
  registry: FixityRegistry
): ResolvedChain[] {
  const chains: ResolvedChain[] = [];
  walkExpression(expression, (node) => {
    if (node.value.kind !== "Binops") return;
    chains.push({
      expression: node,
      tree: associate(node.value.left, node.value.clauses, registry),
    });
  });
  return chains;
}

function checkCompatible(
  clause: BinopsClause,
  fixity: OperatorFixity,
  next: BinopsClause,
  nextFixity: OperatorFixity
): void {
  const current = operatorSymbol(clause.operator.value);
  const following = operatorSymbol(next.operator.value);

  if (fixity.associativity === "none" || nextFixity.associativity === "none") {
    throw new FixityError(
      `Cannot chain '${current}' and '${following}': non-associative operators at precedence ${fixity.precedence} need parentheses`,
      next.operator.span
    );
  }
  if (fixity.associativity !== nextFixity.associativity) {
    throw new FixityError(
      `Cannot mix ${fixity.associativity}-associative '${current}' and ${nextFixity.associativity}-associative '${following}' at precedence ${fixity.precedence}`,
      next.operator.span
    );
  }
}

function operand(expression: Expression): OperatorTree {
  return { kind: "Operand", expression };
}

function operation(
  operator: Located<VarRef>,
  left: OperatorTree,
  right: OperatorTree
): OperatorTree {
  return {
    kind: "Operation",
    operator,
    left,
    right,
    span: { start: treeSpan(left).start, end: treeSpan(right).end },
  };
}

export function treeSpan(tree: OperatorTree): Span {
  return tree.kind === "Operand" ? tree.expression.span : tree.span;
}
