/**
 * @module serialization/iir_codec
 *
 * Binary persistence of a {@link StencilInstantiation} (`stencil.iir.StencilInstantiation`).
 *
 * Contract:
 * - `decodeStencilInstantiation(encodeStencilInstantiation(x))` is structurally equal to `x`,
 *   including unset globals and exact enum codes;
 * - decoding raises MalformedEncoding or UnknownVariant, never InvariantViolation;
 * - node bindings travel as copies of the bound node and are re-attached on decode to the tree
 *   node they match, in traversal order.
 */

import { collectExprs, collectStmts } from '../ast/ast_visitor.js';
import { exprEquals, stmtEquals } from '../ast/equality.js';
import { ConfigService } from '../config/config-service.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { accessIdsOf } from '../iir/accesses.js';
import { LOOP_ORDER_CODES, allStatementAccessPairs } from '../iir/iir.js';
import { StencilMetaInfo } from '../metadata/meta_info.js';
import { VariableVersions } from '../metadata/variable_versions.js';
import { StencilInstantiation } from '../stencil_instantiation.js';
import type { AccessID, Expr, GlobalValue, Int3, Iir, Stmt } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { rootStatements } from '../validate.js';
import {
  exprFromWire,
  exprToWire,
  intervalFromWire,
  intervalToWire,
  locationFromWire,
  locationToWire,
  stencilCallFromWire,
  stencilCallToWire,
  stmtFromWire,
  stmtToWire,
} from './ast_codec.js';
import { MessageTypes, messageType } from './schema.js';
import { WireReader, decodeMessage, encodeMessage } from './wire.js';
import type { WireObject } from './wire.js';

const logger = createLogger('iir-codec');

const GLOBAL_TYPE_CODES = { boolean: 0, integer: 1, double: 2 } as const;

// ============================================================
// Access footprints
// ============================================================

function extentMapToWire(map: ReadonlyMap<AccessID, Iir.Extents>): WireObject {
  const out: WireObject = {};
  for (const [id, extents] of map) {
    out[String(id)] = { extents: extents.map(e => ({ minus: e.minus, plus: e.plus })) };
  }
  return out;
}

function extentMapFromWire(r: WireReader, key: string): Map<AccessID, Iir.Extents> {
  const map = new Map<AccessID, Iir.Extents>();
  for (const [id, entry] of r.intMessageMap(key)) {
    const list = entry.messages('extents').map(e => ({ minus: e.int('minus'), plus: e.int('plus') }));
    const [i, j, k] = list;
    if (list.length !== 3 || i === undefined || j === undefined || k === undefined) {
      throw Diagnostics.badArity(entry.at('extents'), 3, list.length);
    }
    map.set(id, [i, j, k]);
  }
  return map;
}

function accessesToWire(a: Iir.Accesses): WireObject {
  return { write_access: extentMapToWire(a.writes), read_access: extentMapToWire(a.reads) };
}

function accessesFromWire(r: WireReader): Iir.Accesses {
  return { writes: extentMapFromWire(r, 'write_access'), reads: extentMapFromWire(r, 'read_access') };
}

// ============================================================
// Internal IR
// ============================================================

function irToWire(ir: Iir.InternalIR): WireObject {
  return {
    stencils: ir.stencils.map(stencil => ({
      stencil_id: stencil.id,
      attr: { attr_bits: stencil.attributes },
      multi_stages: stencil.multiStages.map(ms => ({
        multi_stage_id: ms.id,
        loop_order: ms.loopOrder,
        stages: ms.stages.map(stage => ({
          stage_id: stage.id,
          do_methods: stage.doMethods.map(dm => ({
            do_method_id: dm.id,
            interval: intervalToWire(dm.interval),
            stmt_access_pairs: dm.statementAccessPairs.map(pair => ({
              statement: { ast_stmt: stmtToWire(pair.statement) },
              caller_accesses: accessesToWire(pair.callerAccesses),
              callee_accesses: accessesToWire(pair.calleeAccesses),
            })),
          })),
        })),
      })),
    })),
  };
}

function irFromWire(r: WireReader): Iir.InternalIR {
  return {
    stencils: r.messages('stencils').map(s => ({
      id: s.int('stencil_id'),
      attributes: s.message('attr').int('attr_bits'),
      multiStages: s.messages('multi_stages').map(ms => ({
        id: ms.int('multi_stage_id'),
        loopOrder: ms.enumValue('loop_order', 'MultiStage.LoopOrder', LOOP_ORDER_CODES),
        stages: ms.messages('stages').map(stage => ({
          id: stage.int('stage_id'),
          doMethods: stage.messages('do_methods').map(dm => ({
            id: dm.int('do_method_id'),
            interval: intervalFromWire(dm.message('interval')),
            statementAccessPairs: dm.messages('stmt_access_pairs').map(pair => ({
              statement: stmtFromWire(pair.message('statement').message('ast_stmt')),
              callerAccesses: accessesFromWire(pair.message('caller_accesses')),
              calleeAccesses: accessesFromWire(pair.message('callee_accesses')),
            })),
          })),
        })),
      })),
    })),
  };
}

// ============================================================
// Node bindings
// ============================================================

/**
 * Bindings in traversal order of the instantiation's trees, then any binding to a node outside
 * them. Shared subtrees are visited once.
 */
function orderedBindings<N extends object>(
  roots: readonly Stmt[],
  collect: (root: Stmt) => N[],
  bindings: ReadonlyArray<[N, AccessID]>
): Array<[N, AccessID]> {
  const byNode = new Map(bindings);
  const out: Array<[N, AccessID]> = [];
  const emitted = new Set<N>();
  for (const root of roots) {
    for (const node of collect(root)) {
      const id = byNode.get(node);
      if (id === undefined || emitted.has(node)) continue;
      emitted.add(node);
      out.push([node, id]);
    }
  }
  for (const [node, id] of bindings) {
    if (!emitted.has(node)) out.push([node, id]);
  }
  return out;
}

/**
 * Attaches each decoded binding to the first not-yet-passed tree node that matches it
 * (locations included). A binding without a match keeps its own decoded node.
 */
function restoreBindings<N extends object>(
  roots: readonly Stmt[],
  collect: (root: Stmt) => N[],
  decoded: ReadonlyArray<[N, AccessID]>,
  equals: (a: N, b: N) => boolean,
  bind: (node: N, id: AccessID) => void
): void {
  const nodes = roots.flatMap(collect);
  let cursor = 0;
  for (const [copy, id] of decoded) {
    let match = -1;
    for (let j = cursor; j < nodes.length; j++) {
      const candidate = nodes[j];
      if (candidate !== undefined && equals(candidate, copy)) {
        match = j;
        break;
      }
    }
    const target = match >= 0 ? nodes[match] : undefined;
    if (target !== undefined) {
      bind(target, id);
      cursor = match + 1;
    } else {
      bind(copy, id);
    }
  }
}

// ============================================================
// Metadata
// ============================================================

function globalToWire(value: GlobalValue): WireObject {
  const out: WireObject = { type: GLOBAL_TYPE_CODES[value.type], value_is_set: value.value !== null };
  if (value.value !== null) out.value = typeof value.value === 'boolean' ? Number(value.value) : value.value;
  return out;
}

function globalFromWire(r: WireReader): GlobalValue {
  const type = r.enumValue('type', 'GlobalValueAndType.TypeKind', [
    GLOBAL_TYPE_CODES.boolean,
    GLOBAL_TYPE_CODES.integer,
    GLOBAL_TYPE_CODES.double,
  ]);
  const isSet = r.bool('value_is_set');
  const raw = r.double('value');
  switch (type) {
    case GLOBAL_TYPE_CODES.boolean:
      return { type: 'boolean', value: isSet ? raw !== 0 : null };
    case GLOBAL_TYPE_CODES.integer:
      return { type: 'integer', value: isSet ? Math.trunc(raw) : null };
    case GLOBAL_TYPE_CODES.double:
      return { type: 'double', value: isSet ? raw : null };
  }
}

function int3ToWire(dims: Int3): WireObject {
  return { int1: dims[0], int2: dims[1], int3: dims[2] };
}

function int3FromWire(r: WireReader): Int3 {
  return [r.int('int1'), r.int('int2'), r.int('int3')];
}

function metaToWire(inst: StencilInstantiation): WireObject {
  const meta = inst.metadata;
  const roots = rootStatements(inst);
  const versions = meta.variableVersions;

  return {
    access_id_to_name: Object.fromEntries(meta.accessIdNames().map(([id, name]) => [String(id), name])),
    expr_to_access_id: orderedBindings(roots, collectExprs, meta.exprBindings()).map(([expr, id]) => ({
      expr: exprToWire(expr),
      ids: id,
    })),
    stmt_to_access_id: orderedBindings(roots, collectStmts, meta.stmtBindings()).map(([stmt, id]) => ({
      stmt: stmtToWire(stmt),
      ids: id,
    })),
    literal_id_to_name: Object.fromEntries(meta.literalNames().map(([id, name]) => [String(id), name])),
    field_access_ids: meta.fieldIds(),
    api_field_ids: [...meta.apiFieldIds()],
    temporary_field_ids: meta.temporaryFieldIds(),
    global_variable_ids: meta.globalVariableIds(),
    versioned_fields: {
      variable_version_map: Object.fromEntries(
        versions.entries().map(([original, all]) => [String(original), { all_ids: [...all] }])
      ),
      version_ids: versions.allVersionIds(),
      version_id_to_original_id: Object.fromEntries(
        versions.inverseEntries().map(([version, original]) => [String(version), original])
      ),
    },
    stencil_desc_statements: meta.stencilDescStatements.map(desc => ({
      stmt: stmtToWire(desc.stmt),
      stacktrace: desc.stackTrace.map(stencilCallToWire),
    })),
    id_to_stencil_call: Object.fromEntries(meta.stencilCalls().map(([id, stmt]) => [String(id), stmtToWire(stmt)])),
    fieldname_to_boundary_condition: Object.fromEntries(
      meta.boundaryConditions().map(([name, stmt]) => [name, stmtToWire(stmt)])
    ),
    field_id_to_legal_dimensions: Object.fromEntries(
      meta.legalDimensions().map(([id, dims]) => [String(id), int3ToWire(dims)])
    ),
    global_variable_to_value: Object.fromEntries(meta.globalVariables().map(([name, v]) => [name, globalToWire(v)])),
    stencil_location: locationToWire(meta.stencilLocation),
    stencil_name: meta.stencilName,
    file_name: meta.fileName,
  };
}

interface DecodedMeta {
  readonly meta: StencilMetaInfo;
  readonly exprBindings: Array<[Expr, AccessID]>;
  readonly stmtBindings: Array<[Stmt, AccessID]>;
}

function metaFromWire(r: WireReader): DecodedMeta {
  const versions = r.message('versioned_fields');
  const variableVersions = VariableVersions.fromTables(
    versions
      .intMessageMap('variable_version_map')
      .map(([original, all]): [AccessID, AccessID[]] => [original, all.ints('all_ids')]),
    versions.ints('version_ids'),
    versions.intIntMap('version_id_to_original_id')
  );

  const meta = StencilMetaInfo.fromTables({
    stencilName: r.string('stencil_name'),
    fileName: r.string('file_name'),
    stencilLocation: locationFromWire(r.message('stencil_location')),
    accessIdToName: r.intStringMap('access_id_to_name'),
    literalIdToName: r.intStringMap('literal_id_to_name'),
    fieldIds: r.ints('field_access_ids'),
    apiFieldIds: r.ints('api_field_ids'),
    temporaryFieldIds: r.ints('temporary_field_ids'),
    globalVariableIds: r.ints('global_variable_ids'),
    variableVersions,
    stencilDescStatements: r.messages('stencil_desc_statements').map(desc => ({
      stmt: stmtFromWire(desc.message('stmt')),
      stackTrace: desc.messages('stacktrace').map(stencilCallFromWire),
    })),
    stencilCalls: r.intMessageMap('id_to_stencil_call').map(([id, stmt]): [number, Stmt] => [id, stmtFromWire(stmt)]),
    boundaryConditions: r
      .stringMessageMap('fieldname_to_boundary_condition')
      .map(([name, stmt]): [string, Stmt] => [name, stmtFromWire(stmt)]),
    legalDimensions: r
      .intMessageMap('field_id_to_legal_dimensions')
      .map(([id, dims]): [AccessID, Int3] => [id, int3FromWire(dims)]),
    globalValues: r
      .stringMessageMap('global_variable_to_value')
      .map(([name, v]): [string, GlobalValue] => [name, globalFromWire(v)]),
  });

  return {
    meta,
    exprBindings: r
      .messages('expr_to_access_id')
      .map((pair): [Expr, AccessID] => [exprFromWire(pair.message('expr')), pair.int('ids')]),
    stmtBindings: r
      .messages('stmt_to_access_id')
      .map((pair): [Stmt, AccessID] => [stmtFromWire(pair.message('stmt')), pair.int('ids')]),
  };
}

// ============================================================
// Entry points
// ============================================================

export function instantiationToWire(inst: StencilInstantiation): WireObject {
  return { metadata: metaToWire(inst), internal_ir: irToWire(inst.ir) };
}

export function instantiationFromWire(r: WireReader): StencilInstantiation {
  const ir = irFromWire(r.message('internal_ir'));
  const { meta, exprBindings, stmtBindings } = metaFromWire(r.message('metadata'));
  const inst = new StencilInstantiation(meta, ir);

  const roots = rootStatements(inst);
  restoreBindings(roots, collectExprs, exprBindings, (a, b) => exprEquals(a, b, { compareLocations: true }), (n, id) =>
    meta.bindExpr(n, id)
  );
  restoreBindings(roots, collectStmts, stmtBindings, (a, b) => stmtEquals(a, b, { compareLocations: true }), (n, id) =>
    meta.bindStmt(n, id)
  );

  for (const [, id] of [...exprBindings, ...stmtBindings]) meta.observeAccessId(id);
  for (const pair of allStatementAccessPairs(ir)) {
    for (const id of [...accessIdsOf(pair.callerAccesses), ...accessIdsOf(pair.calleeAccesses)]) {
      meta.observeAccessId(id);
    }
  }
  return inst;
}

export function encodeStencilInstantiation(inst: StencilInstantiation): Uint8Array {
  if (ConfigService.getInstance().validateOnEncode) inst.validate();
  const bytes = encodeMessage(messageType(MessageTypes.StencilInstantiation), instantiationToWire(inst));
  logger.debug('Encoded stencil instantiation', {
    stencil: inst.metadata.stencilName,
    stencils: inst.ir.stencils.length,
    bytes: bytes.length,
  });
  return bytes;
}

export function decodeStencilInstantiation(bytes: Uint8Array): StencilInstantiation {
  const inst = instantiationFromWire(decodeMessage(messageType(MessageTypes.StencilInstantiation), bytes));
  logger.debug('Decoded stencil instantiation', {
    stencil: inst.metadata.stencilName,
    stencils: inst.ir.stencils.length,
    bytes: bytes.length,
  });
  return inst;
}
