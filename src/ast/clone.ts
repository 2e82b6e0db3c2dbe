import type { Expr, Stmt } from '../types.js';
import { assertNever } from './ast_visitor.js';

/** Applied to every copied expression, children first. */
export type ExprRewrite = (copy: Expr) => Expr;

const keep: ExprRewrite = e => e;

/**
 * Deep copy of a statement. Nodes are fresh objects, so a copy can be bound to its own AccessIDs;
 * locations and offset tuples are immutable and shared.
 */
export function cloneStmt(s: Stmt, rewrite: ExprRewrite = keep): Stmt {
  const stmt = (child: Stmt): Stmt => cloneStmt(child, rewrite);
  const expr = (child: Expr): Expr => cloneExpr(child, rewrite);
  switch (s.kind) {
    case 'Block':
      return { ...s, statements: s.statements.map(stmt) };
    case 'ExpressionStatement':
    case 'Return':
      return { ...s, expr: expr(s.expr) };
    case 'VariableDeclaration':
      return { ...s, initList: s.initList.map(expr) };
    case 'StencilCallDeclaration':
      return { ...s, call: { ...s.call, arguments: [...s.call.arguments] } };
    case 'VerticalRegionDeclaration':
      return { ...s, region: { ...s.region, ast: stmt(s.region.ast) } };
    case 'BoundaryConditionDeclaration':
      return { ...s, fields: [...s.fields] };
    case 'If':
      return {
        ...s,
        cond: stmt(s.cond),
        thenPart: stmt(s.thenPart),
        elsePart: s.elsePart ? stmt(s.elsePart) : null,
      };
    default:
      return assertNever(s, 'statement');
  }
}

export function cloneExpr(e: Expr, rewrite: ExprRewrite = keep): Expr {
  return rewrite(copyExpr(e, rewrite));
}

function copyExpr(e: Expr, rewrite: ExprRewrite): Expr {
  const expr = (child: Expr): Expr => cloneExpr(child, rewrite);
  switch (e.kind) {
    case 'Unary':
      return { ...e, operand: expr(e.operand) };
    case 'Binary':
    case 'Assignment':
      return { ...e, left: expr(e.left), right: expr(e.right) };
    case 'Ternary':
      return { ...e, cond: expr(e.cond), left: expr(e.left), right: expr(e.right) };
    case 'FunctionCall':
    case 'StencilFunctionCall':
      return { ...e, args: e.args.map(expr) };
    case 'VariableAccess':
      return { ...e, index: e.index ? expr(e.index) : null };
    case 'StencilFunctionArgument':
    case 'FieldAccess':
    case 'LiteralAccess':
      return { ...e };
    default:
      return assertNever(e, 'expression');
  }
}
