import type { Expr, Stmt } from '../types.js';

/**
 * Read-only AST traversal.
 *
 * - Entry points: visitStmt / visitExpr
 * - The default implementation walks depth first in declared child order; subclasses override the
 *   methods they care about and call `super` to keep descending
 */
export interface AstVisitor<Ctx, R = void> {
  visitStmt(s: Stmt, ctx: Ctx): R;
  visitExpr(e: Expr, ctx: Ctx): R;
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

export class DefaultAstVisitor<Ctx = undefined> implements AstVisitor<Ctx, void> {
  visitStmt(s: Stmt, ctx: Ctx): void {
    switch (s.kind) {
      case 'Block':
        for (const child of s.statements) this.visitStmt(child, ctx);
        return;
      case 'ExpressionStatement':
      case 'Return':
        this.visitExpr(s.expr, ctx);
        return;
      case 'VariableDeclaration':
        for (const init of s.initList) this.visitExpr(init, ctx);
        return;
      case 'StencilCallDeclaration':
      case 'BoundaryConditionDeclaration':
        return;
      case 'VerticalRegionDeclaration':
        this.visitStmt(s.region.ast, ctx);
        return;
      case 'If':
        this.visitStmt(s.cond, ctx);
        this.visitStmt(s.thenPart, ctx);
        if (s.elsePart) this.visitStmt(s.elsePart, ctx);
        return;
      default:
        return assertNever(s, 'statement');
    }
  }

  visitExpr(e: Expr, ctx: Ctx): void {
    switch (e.kind) {
      case 'Unary':
        this.visitExpr(e.operand, ctx);
        return;
      case 'Binary':
      case 'Assignment':
        this.visitExpr(e.left, ctx);
        this.visitExpr(e.right, ctx);
        return;
      case 'Ternary':
        this.visitExpr(e.cond, ctx);
        this.visitExpr(e.left, ctx);
        this.visitExpr(e.right, ctx);
        return;
      case 'FunctionCall':
      case 'StencilFunctionCall':
        for (const arg of e.args) this.visitExpr(arg, ctx);
        return;
      case 'VariableAccess':
        if (e.index) this.visitExpr(e.index, ctx);
        return;
      case 'StencilFunctionArgument':
      case 'FieldAccess':
      case 'LiteralAccess':
        return;
      default:
        return assertNever(e, 'expression');
    }
  }
}

/** Collects every expression below `root`, in traversal order. */
export function collectExprs(root: Stmt): Expr[] {
  const out: Expr[] = [];
  class Collector extends DefaultAstVisitor {
    override visitExpr(e: Expr, ctx: undefined): void {
      out.push(e);
      super.visitExpr(e, ctx);
    }
  }
  new Collector().visitStmt(root, undefined);
  return out;
}

/** Collects `root` and every statement below it, in traversal order. */
export function collectStmts(root: Stmt): Stmt[] {
  const out: Stmt[] = [];
  class Collector extends DefaultAstVisitor {
    override visitStmt(s: Stmt, ctx: undefined): void {
      out.push(s);
      super.visitStmt(s, ctx);
    }
  }
  new Collector().visitStmt(root, undefined);
  return out;
}
