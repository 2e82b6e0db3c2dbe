export { Node, UNKNOWN_LOCATION, ZERO_OFFSET, NO_ARGUMENT_MAP, loc, fieldOffset, dimensionName } from './ast.js';
export { DefaultAstVisitor, assertNever, collectExprs, collectStmts } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
export {
  stmtEquals,
  exprEquals,
  fieldEquals,
  stencilCallEquals,
  intervalEquals,
  boundEquals,
} from './equality.js';
export type { EqualityOptions } from './equality.js';
export { cloneStmt, cloneExpr } from './clone.js';
export type { ExprRewrite } from './clone.js';
export { resolveFieldOffset, offsetArgumentOf, staticOffsetOf } from './offsets.js';
export type { OffsetArgument } from './offsets.js';
