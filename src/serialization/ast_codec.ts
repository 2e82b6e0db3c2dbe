/**
 * @module serialization/ast_codec
 *
 * Conversion between AST nodes and the `stencil.statements` messages, in both directions.
 * Enum codes are written as the numbers the schema defines.
 */

import { fieldOffset } from '../ast/ast.js';
import { assertNever } from '../ast/ast_visitor.js';
import { Interval } from '../iir/interval.js';
import type {
  Expr,
  Field,
  IntervalBound,
  SourceLocation,
  StencilCall,
  Stmt,
  ValueType,
  VerticalRegion,
} from '../types.js';
import { BuiltinTypeID, Dimension, VerticalLoopOrder } from '../types.js';
import { MessageTypes, messageType } from './schema.js';
import { WireReader, decodeMessage, encodeMessage } from './wire.js';
import type { WireObject } from './wire.js';

const BUILTIN_TYPE_IDS: readonly BuiltinTypeID[] = [
  BuiltinTypeID.Invalid,
  BuiltinTypeID.Auto,
  BuiltinTypeID.Boolean,
  BuiltinTypeID.Integer,
  BuiltinTypeID.Float,
];
const DIMENSIONS: readonly Dimension[] = [Dimension.I, Dimension.J, Dimension.K, Dimension.Invalid];
const VERTICAL_LOOP_ORDERS: readonly VerticalLoopOrder[] = [VerticalLoopOrder.Forward, VerticalLoopOrder.Backward];

const SPECIAL_START = 0;
const SPECIAL_END = 1;

const STMT_BRANCHES = [
  'block_stmt',
  'expr_stmt',
  'return_stmt',
  'var_decl_stmt',
  'stencil_call_decl_stmt',
  'vertical_region_decl_stmt',
  'boundary_condition_decl_stmt',
  'if_stmt',
] as const;

const EXPR_BRANCHES = [
  'unary_operator',
  'binary_operator',
  'assignment_expr',
  'ternary_operator',
  'fun_call_expr',
  'stencil_fun_call_expr',
  'stencil_fun_arg_expr',
  'var_access_expr',
  'field_access_expr',
  'literal_access_expr',
] as const;

// ============================================================
// Leaves
// ============================================================

export function locationToWire(loc: SourceLocation): WireObject {
  return { line: loc.line, column: loc.column };
}

export function locationFromWire(r: WireReader): SourceLocation {
  return { line: r.int('line'), column: r.int('column') };
}

export function fieldToWire(field: Field): WireObject {
  return {
    name: field.name,
    loc: locationToWire(field.loc),
    is_temporary: field.isTemporary,
    field_dimensions: [...field.fieldDimensions],
  };
}

export function fieldFromWire(r: WireReader): Field {
  return {
    name: r.string('name'),
    loc: locationFromWire(r.message('loc')),
    isTemporary: r.bool('is_temporary'),
    fieldDimensions: r.ints('field_dimensions'),
  };
}

export function stencilCallToWire(call: StencilCall): WireObject {
  return { loc: locationToWire(call.loc), callee: call.callee, arguments: call.arguments.map(fieldToWire) };
}

export function stencilCallFromWire(r: WireReader): StencilCall {
  return {
    loc: locationFromWire(r.message('loc')),
    callee: r.string('callee'),
    arguments: r.messages('arguments').map(fieldFromWire),
  };
}

function boundToWire(bound: IntervalBound, side: 'lower' | 'upper', out: WireObject): void {
  switch (bound.level.kind) {
    case 'Start':
      out[`special_${side}_level`] = SPECIAL_START;
      break;
    case 'End':
      out[`special_${side}_level`] = SPECIAL_END;
      break;
    case 'Level':
      out[`${side}_level`] = bound.level.value;
      break;
  }
  out[`${side}_offset`] = bound.offset;
}

function boundFromWire(r: WireReader, side: 'lower' | 'upper'): IntervalBound {
  const special = `special_${side}_level`;
  const concrete = `${side}_level`;
  const offset = r.int(`${side}_offset`);
  const branch = r.oneof(`Interval.${side}`, [special, concrete]);
  if (branch === concrete) return { level: { kind: 'Level', value: r.int(concrete) }, offset };
  const code = r.enumValue(special, 'Interval.SpecialLevel', [SPECIAL_START, SPECIAL_END]);
  return { level: code === SPECIAL_START ? { kind: 'Start' } : { kind: 'End' }, offset };
}

export function intervalToWire(interval: Interval): WireObject {
  const out: WireObject = {};
  boundToWire(interval.lower, 'lower', out);
  boundToWire(interval.upper, 'upper', out);
  return out;
}

/** Unchecked: an ill-ordered interval decodes and is reported by validation. */
export function intervalFromWire(r: WireReader): Interval {
  return Interval.raw(boundFromWire(r, 'lower'), boundFromWire(r, 'upper'));
}

function builtinTypeToWire(typeId: BuiltinTypeID): WireObject {
  return { type_id: typeId };
}

function builtinTypeFromWire(r: WireReader): BuiltinTypeID {
  return r.enumValue('type_id', 'BuiltinType.TypeID', BUILTIN_TYPE_IDS);
}

function typeToWire(type: ValueType): WireObject {
  const out: WireObject = { is_const: type.isConst, is_volatile: type.isVolatile };
  if (type.kind === 'Builtin') out.builtin_type = builtinTypeToWire(type.typeId);
  else out.name = type.name;
  return out;
}

function typeFromWire(r: WireReader): ValueType {
  const isConst = r.bool('is_const');
  const isVolatile = r.bool('is_volatile');
  if (r.oneof('Type', ['name', 'builtin_type']) === 'name') {
    return { kind: 'Custom', name: r.string('name'), isConst, isVolatile };
  }
  return { kind: 'Builtin', typeId: builtinTypeFromWire(r.message('builtin_type')), isConst, isVolatile };
}

function verticalRegionToWire(region: VerticalRegion): WireObject {
  return {
    loc: locationToWire(region.loc),
    ast: { root: stmtToWire(region.ast) },
    interval: intervalToWire(region.interval),
    loop_order: region.loopOrder,
  };
}

function verticalRegionFromWire(r: WireReader): VerticalRegion {
  return {
    loc: locationFromWire(r.message('loc')),
    ast: stmtFromWire(r.message('ast').message('root')),
    interval: intervalFromWire(r.message('interval')),
    loopOrder: r.enumValue('loop_order', 'VerticalRegion.LoopOrder', VERTICAL_LOOP_ORDERS),
  };
}

// ============================================================
// Statements
// ============================================================

export function stmtToWire(s: Stmt): WireObject {
  const loc = locationToWire(s.loc);
  switch (s.kind) {
    case 'Block':
      return { block_stmt: { statements: s.statements.map(stmtToWire), loc } };
    case 'ExpressionStatement':
      return { expr_stmt: { expr: exprToWire(s.expr), loc } };
    case 'Return':
      return { return_stmt: { expr: exprToWire(s.expr), loc } };
    case 'VariableDeclaration':
      return {
        var_decl_stmt: {
          type: typeToWire(s.type),
          name: s.name,
          dimension: s.dimension,
          op: s.op,
          init_list: s.initList.map(exprToWire),
          loc,
        },
      };
    case 'StencilCallDeclaration':
      return { stencil_call_decl_stmt: { stencil_call: stencilCallToWire(s.call), loc } };
    case 'VerticalRegionDeclaration':
      return { vertical_region_decl_stmt: { vertical_region: verticalRegionToWire(s.region), loc } };
    case 'BoundaryConditionDeclaration':
      return { boundary_condition_decl_stmt: { functor: s.functor, fields: s.fields.map(fieldToWire), loc } };
    case 'If': {
      const body: WireObject = { cond_part: stmtToWire(s.cond), then_part: stmtToWire(s.thenPart), loc };
      if (s.elsePart) body.else_part = stmtToWire(s.elsePart);
      return { if_stmt: body };
    }
    default:
      return assertNever(s, 'statement');
  }
}

export function stmtFromWire(r: WireReader): Stmt {
  const branch = r.oneof('Stmt', STMT_BRANCHES);
  const m = r.message(branch);
  const loc = locationFromWire(m.message('loc'));
  switch (branch) {
    case 'block_stmt':
      return { kind: 'Block', statements: m.messages('statements').map(stmtFromWire), loc };
    case 'expr_stmt':
      return { kind: 'ExpressionStatement', expr: exprFromWire(m.message('expr')), loc };
    case 'return_stmt':
      return { kind: 'Return', expr: exprFromWire(m.message('expr')), loc };
    case 'var_decl_stmt':
      return {
        kind: 'VariableDeclaration',
        type: typeFromWire(m.message('type')),
        name: m.string('name'),
        dimension: m.int('dimension'),
        op: m.string('op'),
        initList: m.messages('init_list').map(exprFromWire),
        loc,
      };
    case 'stencil_call_decl_stmt':
      return { kind: 'StencilCallDeclaration', call: stencilCallFromWire(m.message('stencil_call')), loc };
    case 'vertical_region_decl_stmt':
      return {
        kind: 'VerticalRegionDeclaration',
        region: verticalRegionFromWire(m.message('vertical_region')),
        loc,
      };
    case 'boundary_condition_decl_stmt':
      return {
        kind: 'BoundaryConditionDeclaration',
        functor: m.string('functor'),
        fields: m.messages('fields').map(fieldFromWire),
        loc,
      };
    case 'if_stmt': {
      const elsePart = m.optionalMessage('else_part');
      return {
        kind: 'If',
        cond: stmtFromWire(m.message('cond_part')),
        thenPart: stmtFromWire(m.message('then_part')),
        elsePart: elsePart ? stmtFromWire(elsePart) : null,
        loc,
      };
    }
  }
}

// ============================================================
// Expressions
// ============================================================

export function exprToWire(e: Expr): WireObject {
  const loc = locationToWire(e.loc);
  switch (e.kind) {
    case 'Unary':
      return { unary_operator: { op: e.op, operand: exprToWire(e.operand), loc } };
    case 'Binary':
      return { binary_operator: { left: exprToWire(e.left), op: e.op, right: exprToWire(e.right), loc } };
    case 'Assignment':
      return { assignment_expr: { left: exprToWire(e.left), op: e.op, right: exprToWire(e.right), loc } };
    case 'Ternary':
      return {
        ternary_operator: { cond: exprToWire(e.cond), left: exprToWire(e.left), right: exprToWire(e.right), loc },
      };
    case 'FunctionCall':
      return { fun_call_expr: { callee: e.callee, arguments: e.args.map(exprToWire), loc } };
    case 'StencilFunctionCall':
      return { stencil_fun_call_expr: { callee: e.callee, arguments: e.args.map(exprToWire), loc } };
    case 'StencilFunctionArgument':
      return {
        stencil_fun_arg_expr: {
          dimension: { direction: e.dimension },
          offset: e.offset,
          argument_index: e.argumentIndex,
          loc,
        },
      };
    case 'VariableAccess': {
      const body: WireObject = { name: e.name, is_external: e.isExternal, loc };
      if (e.index) body.index = exprToWire(e.index);
      return { var_access_expr: body };
    }
    case 'FieldAccess': {
      const offset = e.offset;
      return {
        field_access_expr: {
          name: e.name,
          offset: [...offset.offset],
          argument_map: offset.state === 'unresolved' ? [...offset.argumentMap] : [-1, -1, -1],
          argument_offset: offset.state === 'unresolved' ? [...offset.argumentOffset] : [0, 0, 0],
          negate_offset: e.negateOffset,
          loc,
        },
      };
    }
    case 'LiteralAccess':
      return { literal_access_expr: { value: e.value, type: builtinTypeToWire(e.builtinType), loc } };
    default:
      return assertNever(e, 'expression');
  }
}

export function exprFromWire(r: WireReader): Expr {
  const branch = r.oneof('Expr', EXPR_BRANCHES);
  const m = r.message(branch);
  const loc = locationFromWire(m.message('loc'));
  switch (branch) {
    case 'unary_operator':
      return { kind: 'Unary', op: m.string('op'), operand: exprFromWire(m.message('operand')), loc };
    case 'binary_operator':
      return {
        kind: 'Binary',
        left: exprFromWire(m.message('left')),
        op: m.string('op'),
        right: exprFromWire(m.message('right')),
        loc,
      };
    case 'assignment_expr':
      return {
        kind: 'Assignment',
        left: exprFromWire(m.message('left')),
        op: m.string('op'),
        right: exprFromWire(m.message('right')),
        loc,
      };
    case 'ternary_operator':
      return {
        kind: 'Ternary',
        cond: exprFromWire(m.message('cond')),
        left: exprFromWire(m.message('left')),
        right: exprFromWire(m.message('right')),
        loc,
      };
    case 'fun_call_expr':
      return { kind: 'FunctionCall', callee: m.string('callee'), args: m.messages('arguments').map(exprFromWire), loc };
    case 'stencil_fun_call_expr':
      return {
        kind: 'StencilFunctionCall',
        callee: m.string('callee'),
        args: m.messages('arguments').map(exprFromWire),
        loc,
      };
    case 'stencil_fun_arg_expr':
      return {
        kind: 'StencilFunctionArgument',
        dimension: m.message('dimension').enumValue('direction', 'Dimension.Direction', DIMENSIONS),
        offset: m.int('offset'),
        argumentIndex: m.int('argument_index'),
        loc,
      };
    case 'var_access_expr': {
      const index = m.optionalMessage('index');
      return {
        kind: 'VariableAccess',
        name: m.string('name'),
        index: index ? exprFromWire(index) : null,
        isExternal: m.bool('is_external'),
        loc,
      };
    }
    case 'field_access_expr':
      return {
        kind: 'FieldAccess',
        name: m.string('name'),
        offset: fieldOffset(m.int3('offset'), m.int3('argument_map'), m.int3('argument_offset')),
        negateOffset: m.bool('negate_offset'),
        loc,
      };
    case 'literal_access_expr':
      return {
        kind: 'LiteralAccess',
        value: m.string('value'),
        builtinType: builtinTypeFromWire(m.message('type')),
        loc,
      };
  }
}

// ============================================================
// Standalone nodes
// ============================================================

export function encodeStatement(stmt: Stmt): Uint8Array {
  return encodeMessage(messageType(MessageTypes.Stmt), stmtToWire(stmt));
}

export function decodeStatement(bytes: Uint8Array): Stmt {
  return stmtFromWire(decodeMessage(messageType(MessageTypes.Stmt), bytes));
}

export function encodeExpression(expr: Expr): Uint8Array {
  return encodeMessage(messageType(MessageTypes.Expr), exprToWire(expr));
}

export function decodeExpression(bytes: Uint8Array): Expr {
  return exprFromWire(decodeMessage(messageType(MessageTypes.Expr), bytes));
}
