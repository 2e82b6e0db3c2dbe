/**
 * @module serialization/hir_codec
 *
 * Binary persistence of the high-level IR (`stencil.hir.HIR`), with the same union rules as the
 * internal IR: every oneof must carry exactly one branch.
 */

import type {
  Hir,
  HirGlobalValue,
  HirGlobalVariable,
  HirStencil,
  HirStencilFunction,
  StencilFunctionArg,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import {
  fieldFromWire,
  fieldToWire,
  intervalFromWire,
  intervalToWire,
  locationFromWire,
  locationToWire,
  stmtFromWire,
  stmtToWire,
} from './ast_codec.js';
import { MessageTypes, messageType } from './schema.js';
import { WireReader, decodeMessage, encodeMessage } from './wire.js';
import type { WireObject } from './wire.js';

const logger = createLogger('hir-codec');

function argumentToWire(arg: StencilFunctionArg): WireObject {
  switch (arg.kind) {
    case 'Field':
      return { field_value: fieldToWire(arg.field) };
    case 'Direction':
      return { direction_value: { name: arg.name, loc: locationToWire(arg.loc) } };
    case 'Offset':
      return { offset_value: { name: arg.name, loc: locationToWire(arg.loc) } };
  }
}

function argumentFromWire(r: WireReader): StencilFunctionArg {
  const branch = r.oneof('StencilFunctionArg', ['field_value', 'direction_value', 'offset_value']);
  const m = r.message(branch);
  switch (branch) {
    case 'field_value':
      return { kind: 'Field', field: fieldFromWire(m) };
    case 'direction_value':
      return { kind: 'Direction', name: m.string('name'), loc: locationFromWire(m.message('loc')) };
    case 'offset_value':
      return { kind: 'Offset', name: m.string('name'), loc: locationFromWire(m.message('loc')) };
  }
}

function globalToWire(global: HirGlobalVariable): WireObject {
  const out: WireObject = { is_constexpr: global.isConstexpr };
  switch (global.value.type) {
    case 'boolean':
      out.boolean_value = global.value.value;
      break;
    case 'integer':
      out.integer_value = global.value.value;
      break;
    case 'double':
      out.double_value = global.value.value;
      break;
    case 'string':
      out.string_value = global.value.value;
      break;
  }
  return out;
}

const GLOBAL_BRANCHES = ['boolean_value', 'integer_value', 'double_value', 'string_value'] as const;

function globalValueFromWire(r: WireReader, branch: (typeof GLOBAL_BRANCHES)[number]): HirGlobalValue {
  switch (branch) {
    case 'boolean_value':
      return { type: 'boolean', value: r.bool(branch) };
    case 'integer_value':
      return { type: 'integer', value: r.int(branch) };
    case 'double_value':
      return { type: 'double', value: r.double(branch) };
    case 'string_value':
      return { type: 'string', value: r.string(branch) };
  }
}

function globalFromWire(r: WireReader): HirGlobalVariable {
  const branch = r.oneof('GlobalVariableValue', GLOBAL_BRANCHES);
  return { value: globalValueFromWire(r, branch), isConstexpr: r.bool('is_constexpr') };
}

function stencilToWire(stencil: HirStencil): WireObject {
  return {
    name: stencil.name,
    loc: locationToWire(stencil.loc),
    ast: { root: stmtToWire(stencil.ast) },
    fields: stencil.fields.map(fieldToWire),
  };
}

function stencilFromWire(r: WireReader): HirStencil {
  return {
    name: r.string('name'),
    loc: locationFromWire(r.message('loc')),
    ast: stmtFromWire(r.message('ast').message('root')),
    fields: r.messages('fields').map(fieldFromWire),
  };
}

function stencilFunctionToWire(fn: HirStencilFunction): WireObject {
  return {
    name: fn.name,
    loc: locationToWire(fn.loc),
    asts: fn.asts.map(ast => ({ root: stmtToWire(ast) })),
    intervals: fn.intervals.map(intervalToWire),
    arguments: fn.arguments.map(argumentToWire),
  };
}

function stencilFunctionFromWire(r: WireReader): HirStencilFunction {
  return {
    name: r.string('name'),
    loc: locationFromWire(r.message('loc')),
    asts: r.messages('asts').map(ast => stmtFromWire(ast.message('root'))),
    intervals: r.messages('intervals').map(intervalFromWire),
    arguments: r.messages('arguments').map(argumentFromWire),
  };
}

export function hirToWire(hir: Hir): WireObject {
  const globals: WireObject = {};
  for (const [name, global] of hir.globalVariables) globals[name] = globalToWire(global);
  return {
    filename: hir.filename,
    stencils: hir.stencils.map(stencilToWire),
    stencil_functions: hir.stencilFunctions.map(stencilFunctionToWire),
    global_variables: { map: globals },
  };
}

export function hirFromWire(r: WireReader): Hir {
  return {
    filename: r.string('filename'),
    stencils: r.messages('stencils').map(stencilFromWire),
    stencilFunctions: r.messages('stencil_functions').map(stencilFunctionFromWire),
    globalVariables: new Map(
      r
        .message('global_variables')
        .stringMessageMap('map')
        .map(([name, global]): [string, HirGlobalVariable] => [name, globalFromWire(global)])
    ),
  };
}

export function encodeHir(hir: Hir): Uint8Array {
  const bytes = encodeMessage(messageType(MessageTypes.Hir), hirToWire(hir));
  logger.debug('Encoded HIR', { filename: hir.filename, stencils: hir.stencils.length, bytes: bytes.length });
  return bytes;
}

export function decodeHir(bytes: Uint8Array): Hir {
  const hir = hirFromWire(decodeMessage(messageType(MessageTypes.Hir), bytes));
  logger.debug('Decoded HIR', { filename: hir.filename, stencils: hir.stencils.length, bytes: bytes.length });
  return hir;
}
