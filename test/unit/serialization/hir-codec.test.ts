import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Node, fieldOffset, loc } from '../../../src/ast/ast.js';
import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { Bound, Interval } from '../../../src/iir/interval.js';
import { decodeHir, encodeHir } from '../../../src/serialization/hir_codec.js';
import { MessageTypes, messageType } from '../../../src/serialization/schema.js';
import type { Hir, HirStencilFunction } from '../../../src/types.js';
import { BuiltinTypeID, Dimension, VerticalLoopOrder } from '../../../src/types.js';
import { TestFactories } from '../../helpers/test-factories.js';

function laplacian(): HirStencilFunction {
  const center = Node.FieldAccess('u', fieldOffset([0, 0, 0], [0, -1, -1], [1, 0, 0]), { loc: loc(12, 10) });
  return {
    name: 'lap',
    loc: loc(10, 1),
    asts: [Node.Return(Node.Binary(center, '-', Node.LiteralAccess('4', BuiltinTypeID.Integer)), loc(12, 3))],
    intervals: [Interval.create(Bound.level(0, 1), Bound.end())],
    arguments: [
      { kind: 'Field', field: Node.Field('u', { fieldDimensions: [1, 1, 0], loc: loc(10, 12) }) },
      { kind: 'Direction', name: 'dir', loc: loc(10, 20) },
      { kind: 'Offset', name: 'off', loc: loc(10, 30) },
    ],
  };
}

describe('HIR codec', () => {
  it('round-trips stencils, stencil functions and every global kind', () => {
    const base = TestFactories.smoothHir();
    const hir: Hir = {
      ...base,
      stencilFunctions: [laplacian()],
      globalVariables: new Map([
        ['dt', { value: { type: 'double', value: 0.5 }, isConstexpr: false }],
        ['flag', { value: { type: 'boolean', value: false }, isConstexpr: true }],
        ['steps', { value: { type: 'integer', value: 0 }, isConstexpr: false }],
        ['mode', { value: { type: 'string', value: 'fast' }, isConstexpr: true }],
      ]),
    };

    assert.deepEqual(decodeHir(encodeHir(hir)), hir);
  });

  it('keeps the loop order and location of a backward region', () => {
    const region = Node.VerticalRegionDeclaration(
      Node.VerticalRegion(
        Node.Block([TestFactories.assign('out', Node.StencilFunctionArgument(Dimension.K, -1))]),
        Interval.create(Bound.start(), Bound.level(4)),
        VerticalLoopOrder.Backward,
        loc(7, 5)
      ),
      loc(7, 1)
    );
    const hir = TestFactories.hir([TestFactories.stencil('back', [region], [Node.Field('out')])]);
    assert.deepEqual(decodeHir(encodeHir(hir)), hir);
  });

  it('rejects a global without a value', () => {
    const bytes = messageType(MessageTypes.Hir)
      .encode({ global_variables: { map: { eps: { is_constexpr: true } } } })
      .finish();
    assert.throws(
      () => decodeHir(bytes),
      (e: unknown) => isIrError(e, IrErrorKind.UnknownVariant) && e.code === DiagnosticCode.U001_NoBranchSet
    );
  });

  it('rejects bytes that are not a message', () => {
    assert.throws(
      () => decodeHir(new Uint8Array([0xff, 0xff])),
      (e: unknown) => isIrError(e, IrErrorKind.MalformedEncoding)
    );
  });
});
