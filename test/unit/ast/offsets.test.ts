import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Node, fieldOffset } from '../../../src/ast/ast.js';
import { offsetArgumentOf, resolveFieldOffset } from '../../../src/ast/offsets.js';
import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { Dimension } from '../../../src/types.js';

describe('field offset resolution', () => {
  it('returns a resolved access unchanged', () => {
    const access = Node.FieldAccess('u', [1, 0, 0]);
    assert.equal(resolveFieldOffset(access, []), access);
  });

  it('adds the argument offset along the dimension of a direction argument', () => {
    const access = Node.FieldAccess('u', fieldOffset([0, 0, 0], [0, -1, -1], [1, 0, 0]));
    const resolved = resolveFieldOffset(access, [{ kind: 'direction', dimension: Dimension.J }]);
    assert.deepEqual(resolved.offset, { state: 'resolved', offset: [0, 1, 0] });
  });

  it('adds the value of an offset argument to the static part', () => {
    const access = Node.FieldAccess('u', fieldOffset([0, 0, 1], [-1, -1, 0], [0, 0, 0]));
    const resolved = resolveFieldOffset(access, [{ kind: 'offset', dimension: Dimension.K, offset: -2 }]);
    assert.deepEqual(resolved.offset, { state: 'resolved', offset: [0, 0, -1] });
  });

  it('subtracts the offset argument of a negated access', () => {
    const access = Node.FieldAccess('u', fieldOffset([0, 0, 0], [0, -1, -1], [0, 0, 0]), { negateOffset: true });
    const resolved = resolveFieldOffset(access, [{ kind: 'offset', dimension: Dimension.I, offset: 2 }]);
    assert.deepEqual(resolved.offset, { state: 'resolved', offset: [-2, 0, 0] });
  });

  it('fails when the supplying argument is missing', () => {
    const access = Node.FieldAccess('u', fieldOffset([0, 0, 0], [1, -1, -1], [0, 0, 0]));
    assert.throws(
      () => resolveFieldOffset(access, [{ kind: 'direction', dimension: Dimension.I }]),
      (e: unknown) => isIrError(e, IrErrorKind.LookupFailure) && e.code === DiagnosticCode.L006_UnknownArgument
    );
  });

  it('fails when the supplying argument carries no offset', () => {
    const access = Node.FieldAccess('u', fieldOffset([0, 0, 0], [0, -1, -1], [0, 0, 0]));
    assert.throws(
      () => resolveFieldOffset(access, [{ kind: 'other' }]),
      (e: unknown) => isIrError(e) && e.code === DiagnosticCode.L006_UnknownArgument
    );
  });

  it('reads call-site arguments', () => {
    assert.deepEqual(offsetArgumentOf(Node.StencilFunctionArgument(Dimension.K)), {
      kind: 'direction',
      dimension: Dimension.K,
    });
    assert.deepEqual(offsetArgumentOf(Node.StencilFunctionArgument(Dimension.I, -1)), {
      kind: 'offset',
      dimension: Dimension.I,
      offset: -1,
    });
  });
});
