// Type definitions for the source-level AST, the HIR document and the internal IR

// ============================================================
// Primitives
// ============================================================

/** `(-1, -1)` is the unknown location. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

/** Symbolic storage location within one compilation unit. Literal IDs are negative. */
export type AccessID = number;

/** One value per spatial dimension, in I, J, K order. */
export type Int3 = readonly [number, number, number];

export enum BuiltinTypeID {
  Invalid = 0,
  Auto = 1,
  Boolean = 2,
  Integer = 3,
  Float = 4,
}

export enum Dimension {
  I = 0,
  J = 1,
  K = 2,
  Invalid = 3,
}

/** Loop order as written on a vertical region. */
export enum VerticalLoopOrder {
  Forward = 0,
  Backward = 1,
}

export type ValueType =
  | {
      readonly kind: 'Builtin';
      readonly typeId: BuiltinTypeID;
      readonly isConst: boolean;
      readonly isVolatile: boolean;
    }
  | {
      readonly kind: 'Custom';
      readonly name: string;
      readonly isConst: boolean;
      readonly isVolatile: boolean;
    };

export interface Field {
  readonly name: string;
  readonly loc: SourceLocation;
  readonly isTemporary: boolean;
  /** User-declared legal dimensions, empty when not given. */
  readonly fieldDimensions: readonly number[];
}

export interface StencilCall {
  readonly loc: SourceLocation;
  readonly callee: string;
  readonly arguments: readonly Field[];
}

// ============================================================
// Interval
// ============================================================

export type IntervalLevel =
  | { readonly kind: 'Start' }
  | { readonly kind: 'End' }
  | { readonly kind: 'Level'; readonly value: number };

export interface IntervalBound {
  readonly level: IntervalLevel;
  readonly offset: number;
}

export interface Interval {
  readonly lower: IntervalBound;
  readonly upper: IntervalBound;
}

export interface VerticalRegion {
  readonly loc: SourceLocation;
  readonly ast: Stmt;
  readonly interval: Interval;
  readonly loopOrder: VerticalLoopOrder;
}

// ============================================================
// Statements
// ============================================================

export interface Block {
  readonly kind: 'Block';
  readonly statements: readonly Stmt[];
  readonly loc: SourceLocation;
}

export interface ExpressionStatement {
  readonly kind: 'ExpressionStatement';
  readonly expr: Expr;
  readonly loc: SourceLocation;
}

export interface Return {
  readonly kind: 'Return';
  readonly expr: Expr;
  readonly loc: SourceLocation;
}

export interface VariableDeclaration {
  readonly kind: 'VariableDeclaration';
  readonly type: ValueType;
  readonly name: string;
  /** Array length, 0 for scalars. */
  readonly dimension: number;
  readonly op: string;
  readonly initList: readonly Expr[];
  readonly loc: SourceLocation;
}

export interface StencilCallDeclaration {
  readonly kind: 'StencilCallDeclaration';
  readonly call: StencilCall;
  readonly loc: SourceLocation;
}

export interface VerticalRegionDeclaration {
  readonly kind: 'VerticalRegionDeclaration';
  readonly region: VerticalRegion;
  readonly loc: SourceLocation;
}

export interface BoundaryConditionDeclaration {
  readonly kind: 'BoundaryConditionDeclaration';
  readonly functor: string;
  readonly fields: readonly Field[];
  readonly loc: SourceLocation;
}

export interface If {
  readonly kind: 'If';
  /** Expected to be an ExpressionStatement; checked by validation. */
  readonly cond: Stmt;
  readonly thenPart: Stmt;
  readonly elsePart: Stmt | null;
  readonly loc: SourceLocation;
}

export type Stmt =
  | Block
  | ExpressionStatement
  | Return
  | VariableDeclaration
  | StencilCallDeclaration
  | VerticalRegionDeclaration
  | BoundaryConditionDeclaration
  | If;

export type StmtKind = Stmt['kind'];

// ============================================================
// Expressions
// ============================================================

export interface Unary {
  readonly kind: 'Unary';
  readonly op: string;
  readonly operand: Expr;
  readonly loc: SourceLocation;
}

export interface Binary {
  readonly kind: 'Binary';
  readonly left: Expr;
  readonly op: string;
  readonly right: Expr;
  readonly loc: SourceLocation;
}

export interface Assignment {
  readonly kind: 'Assignment';
  readonly left: Expr;
  readonly op: string;
  readonly right: Expr;
  readonly loc: SourceLocation;
}

export interface Ternary {
  readonly kind: 'Ternary';
  readonly cond: Expr;
  readonly left: Expr;
  readonly right: Expr;
  readonly loc: SourceLocation;
}

export interface FunctionCall {
  readonly kind: 'FunctionCall';
  readonly callee: string;
  readonly args: readonly Expr[];
  readonly loc: SourceLocation;
}

export interface StencilFunctionCall {
  readonly kind: 'StencilFunctionCall';
  readonly callee: string;
  readonly args: readonly Expr[];
  readonly loc: SourceLocation;
}

export interface StencilFunctionArgument {
  readonly kind: 'StencilFunctionArgument';
  readonly dimension: Dimension;
  readonly offset: number;
  /** Index of the enclosing function's argument this one forwards, -1 if none. */
  readonly argumentIndex: number;
  readonly loc: SourceLocation;
}

export interface VariableAccess {
  readonly kind: 'VariableAccess';
  readonly name: string;
  /** Array subscript, `null` for plain variables. */
  readonly index: Expr | null;
  /** Global (true) or local (false) binding. */
  readonly isExternal: boolean;
  readonly loc: SourceLocation;
}

/**
 * Offset of a field access.
 *
 * Inside a stencil function part of the offset may depend on a directional or offset argument of
 * the function; such an access stays `unresolved` until the function is instantiated.
 */
export type FieldOffset =
  | { readonly state: 'resolved'; readonly offset: Int3 }
  | {
      readonly state: 'unresolved';
      readonly offset: Int3;
      /** Per dimension, index of the supplying argument or -1. */
      readonly argumentMap: Int3;
      readonly argumentOffset: Int3;
    };

export interface FieldAccess {
  readonly kind: 'FieldAccess';
  readonly name: string;
  readonly offset: FieldOffset;
  readonly negateOffset: boolean;
  readonly loc: SourceLocation;
}

export interface LiteralAccess {
  readonly kind: 'LiteralAccess';
  readonly value: string;
  readonly builtinType: BuiltinTypeID;
  readonly loc: SourceLocation;
}

export type Expr =
  | Unary
  | Binary
  | Assignment
  | Ternary
  | FunctionCall
  | StencilFunctionCall
  | StencilFunctionArgument
  | VariableAccess
  | FieldAccess
  | LiteralAccess;

export type ExprKind = Expr['kind'];

// ============================================================
// HIR document
// ============================================================

export type StencilFunctionArg =
  | { readonly kind: 'Field'; readonly field: Field }
  | { readonly kind: 'Direction'; readonly name: string; readonly loc: SourceLocation }
  | { readonly kind: 'Offset'; readonly name: string; readonly loc: SourceLocation };

export interface HirStencil {
  readonly name: string;
  readonly loc: SourceLocation;
  readonly ast: Stmt;
  readonly fields: readonly Field[];
}

export interface HirStencilFunction {
  readonly name: string;
  readonly loc: SourceLocation;
  readonly asts: readonly Stmt[];
  readonly intervals: readonly Interval[];
  readonly arguments: readonly StencilFunctionArg[];
}

export type HirGlobalValue =
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'integer'; readonly value: number }
  | { readonly type: 'double'; readonly value: number }
  | { readonly type: 'string'; readonly value: string };

export interface HirGlobalVariable {
  readonly value: HirGlobalValue;
  readonly isConstexpr: boolean;
}

export interface Hir {
  readonly filename: string;
  readonly stencils: readonly HirStencil[];
  readonly stencilFunctions: readonly HirStencilFunction[];
  readonly globalVariables: ReadonlyMap<string, HirGlobalVariable>;
}

// ============================================================
// Internal IR
// ============================================================

/** Vertical execution order of a multi-stage. Codes are wire values; 2 is reserved. */
export enum LoopOrder {
  Forward = 0,
  Backward = 1,
  Parallel = 3,
}

/** Pragma-derived stencil flags, combined into one bit set. */
export enum StencilAttr {
  NoCodeGen = 1 << 0,
  MergeStages = 1 << 1,
  MergeDoMethods = 1 << 2,
  MergeTemporaries = 1 << 3,
  UseKCaches = 1 << 4,
}

/**
 * Global variable value in the metadata; `value === null` is a declared but unset global,
 * which is not the same as one set to zero.
 */
export type GlobalValue =
  | { readonly type: 'boolean'; readonly value: boolean | null }
  | { readonly type: 'integer'; readonly value: number | null }
  | { readonly type: 'double'; readonly value: number | null };

export namespace Iir {
  export interface Extent {
    readonly minus: number;
    readonly plus: number;
  }

  export type Extents = readonly [Extent, Extent, Extent];

  export interface Accesses {
    readonly writes: ReadonlyMap<AccessID, Extents>;
    readonly reads: ReadonlyMap<AccessID, Extents>;
  }

  export interface StatementAccessPair {
    statement: Stmt;
    callerAccesses: Accesses;
    calleeAccesses: Accesses;
  }

  export interface DoMethod {
    readonly id: number;
    interval: Interval;
    readonly statementAccessPairs: StatementAccessPair[];
  }

  export interface Stage {
    readonly id: number;
    readonly doMethods: DoMethod[];
  }

  export interface MultiStage {
    readonly id: number;
    loopOrder: LoopOrder;
    readonly stages: Stage[];
  }

  export interface Stencil {
    readonly id: number;
    /** Bit set of {@link StencilAttr}. */
    attributes: number;
    readonly multiStages: MultiStage[];
  }

  export interface InternalIR {
    readonly stencils: Stencil[];
  }

  /** Top-level control-flow statement with the stencil calls that led to it, outermost first. */
  export interface StencilDescStatement {
    readonly stmt: Stmt;
    readonly stackTrace: readonly StencilCall[];
  }
}
