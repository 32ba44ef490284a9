import type {
  CommonDeclaration,
  Expression,
  LetDeclaration,
  Module,
} from "@groom/syntax";

/**
 * Direct sub-expressions of an expression, in source order.
 */
export function childExpressions(expression: Expression): Expression[] {
  const node = expression.value;
  switch (node.kind) {
    case "Literal":
    case "VarExpr":
    case "Unit":
    case "AccessFunction":
    case "TupleFunction":
    case "GLShader":
      return [];
    case "Unary":
      return [node.operand];
    case "Range":
      return [node.low.value, node.high.value];
    case "ExplicitList":
      return node.terms.map((term) => term.value);
    case "App":
      return [node.head, ...node.args.map((arg) => arg.value)];
    case "Binops":
      return [node.left, ...node.clauses.map((clause) => clause.expression)];
    case "If":
      return [
        node.first.condition.value,
        node.first.body.value,
        ...node.rest.flatMap(({ value }) => [
          value.condition.value,
          value.body.value,
        ]),
        node.final.value,
      ];
    case "Case":
      return [
        node.subject.value,
        ...node.branches.map((branch) => branch.value.body),
      ];
    case "Let":
      return [...node.declarations.flatMap(letBodies), node.body];
    case "Lambda":
      return [node.body];
    case "Tuple":
      return node.elements.map((element) => element.value);
    case "Parens":
      return [node.expression.value];
    case "Record":
      return node.fields.map((field) => field.value.value.value);
    case "Access":
      return [node.record];
  }
}

/** Visit an expression and everything nested in it, parents first. */
export function walkExpression(
  expression: Expression,
  visit: (expression: Expression) => void
): void {
  visit(expression);
  for (const child of childExpressions(expression)) {
    walkExpression(child, visit);
  }
}

/** Bodies of the module's top-level definitions. */
export function moduleExpressions(module: Module): Expression[] {
  return module.body.flatMap((topLevel) =>
    topLevel.value.kind === "CommonDeclaration"
      ? declarationBodies(topLevel.value.declaration)
      : []
  );
}

function letBodies(declaration: LetDeclaration): Expression[] {
  return declaration.value.kind === "LetCommonDeclaration"
    ? declarationBodies(declaration.value.declaration.value)
    : [];
}

function declarationBodies(declaration: CommonDeclaration): Expression[] {
  return declaration.kind === "Definition" ? [declaration.body] : [];
}
