// AST node constructors
import type * as AST from '../types.js';
import { BuiltinTypeID, Dimension, VerticalLoopOrder } from '../types.js';

export const UNKNOWN_LOCATION: AST.SourceLocation = Object.freeze({ line: -1, column: -1 });

export function loc(line: number, column: number): AST.SourceLocation {
  return { line, column };
}

export const ZERO_OFFSET: AST.Int3 = [0, 0, 0];
export const NO_ARGUMENT_MAP: AST.Int3 = [-1, -1, -1];

/**
 * Builds a field offset. An argument map without any entry >= 0 carries no deferred part, so the
 * offset collapses to `resolved` and the argument offsets are dropped.
 */
export function fieldOffset(
  offset: AST.Int3 = ZERO_OFFSET,
  argumentMap: AST.Int3 = NO_ARGUMENT_MAP,
  argumentOffset: AST.Int3 = ZERO_OFFSET
): AST.FieldOffset {
  if (argumentMap.every(index => index < 0)) {
    return { state: 'resolved', offset };
  }
  return { state: 'unresolved', offset, argumentMap, argumentOffset };
}

/** An unresolved offset whose argument map binds nothing is stored as resolved. */
function normalizeOffset(offset: AST.FieldOffset | AST.Int3): AST.FieldOffset {
  if (!('state' in offset)) return fieldOffset(offset);
  if (offset.state === 'resolved') return offset;
  return fieldOffset(offset.offset, offset.argumentMap, offset.argumentOffset);
}

export const Node = {
  // Types and declarations
  BuiltinType: (typeId: AST.BuiltinTypeID, isConst = false, isVolatile = false): AST.ValueType => ({
    kind: 'Builtin',
    typeId,
    isConst,
    isVolatile,
  }),
  CustomType: (name: string, isConst = false, isVolatile = false): AST.ValueType => ({
    kind: 'Custom',
    name,
    isConst,
    isVolatile,
  }),
  Field: (
    name: string,
    options: { isTemporary?: boolean; fieldDimensions?: readonly number[]; loc?: AST.SourceLocation } = {}
  ): AST.Field => ({
    name,
    loc: options.loc ?? UNKNOWN_LOCATION,
    isTemporary: options.isTemporary ?? false,
    fieldDimensions: options.fieldDimensions ?? [],
  }),
  StencilCall: (
    callee: string,
    args: readonly AST.Field[],
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.StencilCall => ({
    loc: location,
    callee,
    arguments: args,
  }),
  VerticalRegion: (
    ast: AST.Stmt,
    interval: AST.Interval,
    loopOrder: AST.VerticalLoopOrder = VerticalLoopOrder.Forward,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.VerticalRegion => ({
    loc: location,
    ast,
    interval,
    loopOrder,
  }),

  // Statements
  Block: (statements: readonly AST.Stmt[], location: AST.SourceLocation = UNKNOWN_LOCATION): AST.Block => ({
    kind: 'Block',
    statements,
    loc: location,
  }),
  ExpressionStatement: (
    expr: AST.Expr,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.ExpressionStatement => ({
    kind: 'ExpressionStatement',
    expr,
    loc: location,
  }),
  Return: (expr: AST.Expr, location: AST.SourceLocation = UNKNOWN_LOCATION): AST.Return => ({
    kind: 'Return',
    expr,
    loc: location,
  }),
  VariableDeclaration: (
    type: AST.ValueType,
    name: string,
    initList: readonly AST.Expr[] = [],
    options: { dimension?: number; op?: string; loc?: AST.SourceLocation } = {}
  ): AST.VariableDeclaration => ({
    kind: 'VariableDeclaration',
    type,
    name,
    dimension: options.dimension ?? 0,
    op: options.op ?? '=',
    initList,
    loc: options.loc ?? UNKNOWN_LOCATION,
  }),
  StencilCallDeclaration: (
    call: AST.StencilCall,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.StencilCallDeclaration => ({
    kind: 'StencilCallDeclaration',
    call,
    loc: location,
  }),
  VerticalRegionDeclaration: (
    region: AST.VerticalRegion,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.VerticalRegionDeclaration => ({
    kind: 'VerticalRegionDeclaration',
    region,
    loc: location,
  }),
  BoundaryConditionDeclaration: (
    functor: string,
    fields: readonly AST.Field[],
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.BoundaryConditionDeclaration => ({
    kind: 'BoundaryConditionDeclaration',
    functor,
    fields,
    loc: location,
  }),
  If: (
    cond: AST.Stmt,
    thenPart: AST.Stmt,
    elsePart: AST.Stmt | null = null,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.If => ({
    kind: 'If',
    cond,
    thenPart,
    elsePart,
    loc: location,
  }),

  // Expressions
  Unary: (op: string, operand: AST.Expr, location: AST.SourceLocation = UNKNOWN_LOCATION): AST.Unary => ({
    kind: 'Unary',
    op,
    operand,
    loc: location,
  }),
  Binary: (
    left: AST.Expr,
    op: string,
    right: AST.Expr,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.Binary => ({
    kind: 'Binary',
    left,
    op,
    right,
    loc: location,
  }),
  Assignment: (
    left: AST.Expr,
    right: AST.Expr,
    op = '=',
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.Assignment => ({
    kind: 'Assignment',
    left,
    op,
    right,
    loc: location,
  }),
  Ternary: (
    cond: AST.Expr,
    left: AST.Expr,
    right: AST.Expr,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.Ternary => ({
    kind: 'Ternary',
    cond,
    left,
    right,
    loc: location,
  }),
  FunctionCall: (
    callee: string,
    args: readonly AST.Expr[],
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.FunctionCall => ({
    kind: 'FunctionCall',
    callee,
    args,
    loc: location,
  }),
  StencilFunctionCall: (
    callee: string,
    args: readonly AST.Expr[],
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.StencilFunctionCall => ({
    kind: 'StencilFunctionCall',
    callee,
    args,
    loc: location,
  }),
  StencilFunctionArgument: (
    dimension: AST.Dimension,
    offset = 0,
    argumentIndex = -1,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.StencilFunctionArgument => ({
    kind: 'StencilFunctionArgument',
    dimension,
    offset,
    argumentIndex,
    loc: location,
  }),
  VariableAccess: (
    name: string,
    options: { index?: AST.Expr | null; isExternal?: boolean; loc?: AST.SourceLocation } = {}
  ): AST.VariableAccess => ({
    kind: 'VariableAccess',
    name,
    index: options.index ?? null,
    isExternal: options.isExternal ?? false,
    loc: options.loc ?? UNKNOWN_LOCATION,
  }),
  FieldAccess: (
    name: string,
    offset: AST.FieldOffset | AST.Int3 = ZERO_OFFSET,
    options: { negateOffset?: boolean; loc?: AST.SourceLocation } = {}
  ): AST.FieldAccess => ({
    kind: 'FieldAccess',
    name,
    offset: normalizeOffset(offset),
    negateOffset: options.negateOffset ?? false,
    loc: options.loc ?? UNKNOWN_LOCATION,
  }),
  LiteralAccess: (
    value: string,
    builtinType: AST.BuiltinTypeID = BuiltinTypeID.Float,
    location: AST.SourceLocation = UNKNOWN_LOCATION
  ): AST.LiteralAccess => ({
    kind: 'LiteralAccess',
    value,
    builtinType,
    loc: location,
  }),
};

/** Direction name as written in stencil sources. */
export function dimensionName(dimension: AST.Dimension): string {
  switch (dimension) {
    case Dimension.I:
      return 'i';
    case Dimension.J:
      return 'j';
    case Dimension.K:
      return 'k';
    case Dimension.Invalid:
      return '?';
  }
}
