/**
 * Groom parser - turns source text into a comment-preserving syntax tree.
 *
 * The tree keeps every comment at the position it was written and records
 * where the source broke lines, so a printer can reproduce the author's
 * layout choices. Operator chains are left flat; `associate` and
 * `resolveModuleOperators` group them once fixities are known.
 */

export { Cursor, ParseError, type Parse } from "./cursor";
export { binops } from "./binops";
export {
  appExpr,
  caseExpr,
  commonDeclaration,
  definition,
  expr,
  ifExpr,
  lambdaExpr,
  letExpr,
  term,
  typeAnnotation,
} from "./expressions";
export { patternExpr, patternTerm } from "./patterns";
export { typeExpr, typeTerm } from "./types";
export {
  parseExpression,
  parseModule,
  parsePattern,
  parseType,
} from "./module";
export {
  BUILTIN_REGISTRY,
  FixityError,
  associate,
  buildRegistryFromModule,
  createRegistry,
  getFixity,
  mergeRegistries,
  operatorSymbol,
  resolveExpressionOperators,
  resolveModuleOperators,
  treeSpan,
  type OperatorTree,
  type RegistryBuildResult,
  type ResolvedChain,
} from "./fixity";
export { childExpressions, moduleExpressions, walkExpression } from "./walk";
