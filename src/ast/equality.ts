import type {
  Expr,
  Field,
  FieldOffset,
  Int3,
  Interval,
  IntervalBound,
  SourceLocation,
  StencilCall,
  Stmt,
  ValueType,
} from '../types.js';
import { assertNever } from './ast_visitor.js';

export interface EqualityOptions {
  /** Also compare source locations (ignored by default). */
  readonly compareLocations?: boolean;
}

function locEquals(a: SourceLocation, b: SourceLocation, opts: EqualityOptions): boolean {
  return !opts.compareLocations || (a.line === b.line && a.column === b.column);
}

function listEquals<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  return (
    a.length === b.length &&
    a.every((x, i) => {
      const y = b[i];
      return y !== undefined && eq(x, y);
    })
  );
}

function int3Equals(a: Int3, b: Int3): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export function boundEquals(a: IntervalBound, b: IntervalBound): boolean {
  if (a.offset !== b.offset || a.level.kind !== b.level.kind) return false;
  return a.level.kind !== 'Level' || b.level.kind !== 'Level' || a.level.value === b.level.value;
}

export function intervalEquals(a: Interval, b: Interval): boolean {
  return boundEquals(a.lower, b.lower) && boundEquals(a.upper, b.upper);
}

function typeEquals(a: ValueType, b: ValueType): boolean {
  if (a.isConst !== b.isConst || a.isVolatile !== b.isVolatile) return false;
  if (a.kind === 'Builtin') return b.kind === 'Builtin' && a.typeId === b.typeId;
  return b.kind === 'Custom' && a.name === b.name;
}

export function fieldEquals(a: Field, b: Field, opts: EqualityOptions = {}): boolean {
  return (
    a.name === b.name &&
    a.isTemporary === b.isTemporary &&
    listEquals(a.fieldDimensions, b.fieldDimensions, (x, y) => x === y) &&
    locEquals(a.loc, b.loc, opts)
  );
}

export function stencilCallEquals(a: StencilCall, b: StencilCall, opts: EqualityOptions = {}): boolean {
  return (
    a.callee === b.callee &&
    listEquals(a.arguments, b.arguments, (x, y) => fieldEquals(x, y, opts)) &&
    locEquals(a.loc, b.loc, opts)
  );
}

function offsetEquals(a: FieldOffset, b: FieldOffset): boolean {
  if (a.state === 'resolved') return b.state === 'resolved' && int3Equals(a.offset, b.offset);
  return (
    b.state === 'unresolved' &&
    int3Equals(a.offset, b.offset) &&
    int3Equals(a.argumentMap, b.argumentMap) &&
    int3Equals(a.argumentOffset, b.argumentOffset)
  );
}

/** Structural statement comparison. */
export function stmtEquals(a: Stmt, b: Stmt, opts: EqualityOptions = {}): boolean {
  if (a.kind !== b.kind || !locEquals(a.loc, b.loc, opts)) return false;
  const stmts = (x: readonly Stmt[], y: readonly Stmt[]): boolean =>
    listEquals(x, y, (s, t) => stmtEquals(s, t, opts));
  const exprs = (x: readonly Expr[], y: readonly Expr[]): boolean =>
    listEquals(x, y, (s, t) => exprEquals(s, t, opts));

  switch (a.kind) {
    case 'Block':
      return b.kind === 'Block' && stmts(a.statements, b.statements);
    case 'ExpressionStatement':
      return b.kind === 'ExpressionStatement' && exprEquals(a.expr, b.expr, opts);
    case 'Return':
      return b.kind === 'Return' && exprEquals(a.expr, b.expr, opts);
    case 'VariableDeclaration':
      return (
        b.kind === 'VariableDeclaration' &&
        a.name === b.name &&
        a.dimension === b.dimension &&
        a.op === b.op &&
        typeEquals(a.type, b.type) &&
        exprs(a.initList, b.initList)
      );
    case 'StencilCallDeclaration':
      return b.kind === 'StencilCallDeclaration' && stencilCallEquals(a.call, b.call, opts);
    case 'VerticalRegionDeclaration':
      return (
        b.kind === 'VerticalRegionDeclaration' &&
        a.region.loopOrder === b.region.loopOrder &&
        intervalEquals(a.region.interval, b.region.interval) &&
        locEquals(a.region.loc, b.region.loc, opts) &&
        stmtEquals(a.region.ast, b.region.ast, opts)
      );
    case 'BoundaryConditionDeclaration':
      return (
        b.kind === 'BoundaryConditionDeclaration' &&
        a.functor === b.functor &&
        listEquals(a.fields, b.fields, (x, y) => fieldEquals(x, y, opts))
      );
    case 'If':
      if (b.kind !== 'If') return false;
      if (!stmtEquals(a.cond, b.cond, opts) || !stmtEquals(a.thenPart, b.thenPart, opts)) return false;
      if (a.elsePart === null || b.elsePart === null) return a.elsePart === b.elsePart;
      return stmtEquals(a.elsePart, b.elsePart, opts);
    default:
      return assertNever(a, 'statement');
  }
}

/** Structural expression comparison. */
export function exprEquals(a: Expr, b: Expr, opts: EqualityOptions = {}): boolean {
  if (a.kind !== b.kind || !locEquals(a.loc, b.loc, opts)) return false;
  const exprs = (x: readonly Expr[], y: readonly Expr[]): boolean =>
    listEquals(x, y, (s, t) => exprEquals(s, t, opts));

  switch (a.kind) {
    case 'Unary':
      return b.kind === 'Unary' && a.op === b.op && exprEquals(a.operand, b.operand, opts);
    case 'Binary':
    case 'Assignment':
      return (
        (b.kind === 'Binary' || b.kind === 'Assignment') &&
        a.op === b.op &&
        exprEquals(a.left, b.left, opts) &&
        exprEquals(a.right, b.right, opts)
      );
    case 'Ternary':
      return (
        b.kind === 'Ternary' &&
        exprEquals(a.cond, b.cond, opts) &&
        exprEquals(a.left, b.left, opts) &&
        exprEquals(a.right, b.right, opts)
      );
    case 'FunctionCall':
    case 'StencilFunctionCall':
      return (
        (b.kind === 'FunctionCall' || b.kind === 'StencilFunctionCall') &&
        a.callee === b.callee &&
        exprs(a.args, b.args)
      );
    case 'StencilFunctionArgument':
      return (
        b.kind === 'StencilFunctionArgument' &&
        a.dimension === b.dimension &&
        a.offset === b.offset &&
        a.argumentIndex === b.argumentIndex
      );
    case 'VariableAccess':
      if (b.kind !== 'VariableAccess' || a.name !== b.name || a.isExternal !== b.isExternal) return false;
      if (a.index === null || b.index === null) return a.index === b.index;
      return exprEquals(a.index, b.index, opts);
    case 'FieldAccess':
      return (
        b.kind === 'FieldAccess' &&
        a.name === b.name &&
        a.negateOffset === b.negateOffset &&
        offsetEquals(a.offset, b.offset)
      );
    case 'LiteralAccess':
      return b.kind === 'LiteralAccess' && a.value === b.value && a.builtinType === b.builtinType;
    default:
      return assertNever(a, 'expression');
  }
}
