import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Node } from '../../../src/ast/ast.js';
import { collectExprs } from '../../../src/ast/ast_visitor.js';
import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { zeroExtents } from '../../../src/iir/extent.js';
import { allStatementAccessPairs } from '../../../src/iir/iir.js';
import { intervalToString } from '../../../src/iir/interval.js';
import { codeGenCallName, lowerStencil } from '../../../src/lower_to_iir.js';
import { BuiltinTypeID, LoopOrder, StencilAttr, VerticalLoopOrder } from '../../../src/types.js';
import { TestFactories } from '../../helpers/test-factories.js';

function throwsCode(fn: () => unknown, kind: IrErrorKind, code: DiagnosticCode): void {
  assert.throws(fn, (e: unknown) => isIrError(e, kind) && e.code === code);
}

/** `inner(a, b)` copies `a[j+1]` into `b`; `outer(x, y)` calls it. Both declare a temporary `t`. */
function callingHir(args = [Node.Field('x'), Node.Field('y')]) {
  const inner = TestFactories.stencil(
    'inner',
    [TestFactories.verticalRegion([TestFactories.assign('b', Node.FieldAccess('a', [0, 1, 0]))])],
    [Node.Field('a'), Node.Field('b'), Node.Field('t', { isTemporary: true })]
  );
  const outer = TestFactories.stencil(
    'outer',
    [Node.StencilCallDeclaration(Node.StencilCall('inner', args))],
    [Node.Field('x'), Node.Field('y'), Node.Field('t', { isTemporary: true })]
  );
  return TestFactories.hir([inner, outer]);
}

describe('lowerStencil', () => {
  describe('a single vertical region', () => {
    it('registers globals first, then fields in declaration order', () => {
      const inst = lowerStencil(TestFactories.smoothHir(), 'smooth');
      const meta = inst.metadata;

      assert.deepEqual(meta.globalVariableIds(), [1]);
      assert.deepEqual(meta.apiFieldIds(), [2, 3]);
      assert.deepEqual(meta.temporaryFieldIds(), [4]);
      assert.deepEqual(meta.getGlobalVariableValue('dt'), { type: 'double', value: 0.5 });
      assert.equal(meta.stencilName, 'smooth');
      assert.equal(meta.fileName, 'test.cpp');
    });

    it('gives every statement of the region its own stage', () => {
      const inst = lowerStencil(TestFactories.smoothHir(), 'smooth');
      const [stencil] = inst.ir.stencils;
      assert.ok(stencil);
      const [ms] = stencil.multiStages;
      assert.ok(ms);

      assert.equal(inst.ir.stencils.length, 1);
      assert.equal(ms.loopOrder, LoopOrder.Forward);
      assert.equal(ms.stages.length, 2);
      for (const stage of ms.stages) {
        assert.equal(stage.doMethods.length, 1);
        const [dm] = stage.doMethods;
        assert.ok(dm);
        assert.equal(intervalToString(dm.interval), '[start, end]');
      }
    });

    it('computes caller accesses with merged extents', () => {
      const inst = lowerStencil(TestFactories.smoothHir(), 'smooth');
      const [first, second] = allStatementAccessPairs(inst.ir);
      assert.ok(first && second);

      assert.deepEqual(first.callerAccesses.writes, new Map([[4, zeroExtents()]]));
      assert.deepEqual(first.callerAccesses.reads.get(2), [
        { minus: -1, plus: 1 },
        { minus: 0, plus: 0 },
        { minus: 0, plus: 0 },
      ]);
      assert.deepEqual([...second.callerAccesses.writes.keys()], [3]);
      assert.deepEqual([...second.callerAccesses.reads.keys()], [4, 1]);
    });

    it('binds the lowered access nodes, not the HIR ones', () => {
      const hir = TestFactories.smoothHir();
      const inst = lowerStencil(hir, 'smooth');
      const [first] = allStatementAccessPairs(inst.ir);
      assert.ok(first);
      const [, target] = collectExprs(first.statement);
      assert.ok(target);

      assert.equal(inst.metadata.getAccessIdOfExpr(target), 4);
      const [stencil] = hir.stencils;
      assert.ok(stencil);
      const hirNodes = collectExprs(stencil.ast);
      assert.equal(hirNodes.some(e => inst.metadata.hasExprBinding(e)), false);
    });

    it('replaces the region by a generated stencil call and keeps the boundary condition', () => {
      const inst = lowerStencil(TestFactories.smoothHir(), 'smooth');
      const [call, bc] = inst.metadata.stencilDescStatements;
      assert.ok(call && bc);

      assert.equal(call.stmt.kind, 'StencilCallDeclaration');
      assert.equal(call.stmt.kind === 'StencilCallDeclaration' && call.stmt.call.callee, codeGenCallName(1));
      assert.equal(inst.metadata.getStencilCall(1), call.stmt);
      assert.equal(bc.stmt.kind, 'BoundaryConditionDeclaration');
      assert.equal(inst.metadata.getBoundaryCondition('out'), bc.stmt);
      assert.doesNotThrow(() => inst.validate());
    });

    it('maps a backward region to a backward multi-stage and applies attributes', () => {
      const hir = TestFactories.hir([
        TestFactories.stencil(
          'up',
          [TestFactories.verticalRegion([TestFactories.assign('u', Node.LiteralAccess('0'))], VerticalLoopOrder.Backward)],
          [Node.Field('u')]
        ),
      ]);
      const inst = lowerStencil(hir, 'up', { attributes: StencilAttr.UseKCaches, validate: true });
      const [stencil] = inst.ir.stencils;
      assert.ok(stencil);

      assert.equal(stencil.attributes, StencilAttr.UseKCaches);
      assert.equal(stencil.multiStages[0]?.loopOrder, LoopOrder.Backward);
      assert.deepEqual(inst.metadata.literalNames(), [[-1, '0']]);
    });
  });

  describe('locals', () => {
    it('registers declarations and literals as they are met', () => {
      const decl = Node.VariableDeclaration(Node.BuiltinType(BuiltinTypeID.Float), 'f', [Node.LiteralAccess('2.0')]);
      const use = TestFactories.assign('out', Node.Binary(Node.VariableAccess('f'), '*', Node.FieldAccess('in')));
      const hir = TestFactories.hir([
        TestFactories.stencil('scale', [TestFactories.verticalRegion([decl, use])], [Node.Field('in'), Node.Field('out')]),
      ]);
      const inst = lowerStencil(hir, 'scale');
      const [declPair, usePair] = allStatementAccessPairs(inst.ir);
      assert.ok(declPair && usePair);

      assert.equal(inst.metadata.getAccessIdOfStmt(declPair.statement), 3);
      assert.equal(inst.metadata.getNameFromAccessId(-1), '2.0');
      assert.deepEqual([...declPair.callerAccesses.writes.keys()], [3]);
      assert.deepEqual([...declPair.callerAccesses.reads.keys()], [-1]);
      assert.deepEqual([...usePair.callerAccesses.reads.keys()], [3, 1]);
    });

    it('fails on an undeclared local', () => {
      const hir = TestFactories.hir([
        TestFactories.stencil(
          'bad',
          [TestFactories.verticalRegion([TestFactories.assign('out', Node.VariableAccess('nope'))])],
          [Node.Field('out')]
        ),
      ]);
      throwsCode(() => lowerStencil(hir, 'bad'), IrErrorKind.LookupFailure, DiagnosticCode.L002_UnknownName);
    });
  });

  describe('stencil calls', () => {
    it('inlines the callee with its fields bound to the arguments', () => {
      const inst = lowerStencil(callingHir(), 'outer');
      const [pair] = allStatementAccessPairs(inst.ir);
      assert.ok(pair);

      assert.deepEqual([...pair.callerAccesses.writes.keys()], [2]);
      assert.deepEqual(pair.callerAccesses.reads.get(1), [
        { minus: 0, plus: 0 },
        { minus: 0, plus: 1 },
        { minus: 0, plus: 0 },
      ]);
    });

    it('renames inlined field accesses to the fields they are bound to', () => {
      const inst = lowerStencil(callingHir(), 'outer');
      const meta = inst.metadata;
      const [pair] = allStatementAccessPairs(inst.ir);
      assert.ok(pair);
      const fieldAccesses = collectExprs(pair.statement).filter(e => e.kind === 'FieldAccess');

      assert.deepEqual(
        fieldAccesses.map(e => e.kind === 'FieldAccess' && e.name),
        ['y', 'x']
      );
      for (const e of fieldAccesses) {
        assert.equal(e.kind === 'FieldAccess' && e.name, meta.getNameFromAccessId(meta.getAccessIdOfExpr(e)));
      }
      assert.doesNotThrow(() => inst.validate());
    });

    it('renames a callee temporary that shadows a caller temporary', () => {
      const inner = TestFactories.stencil(
        'inner',
        [TestFactories.verticalRegion([TestFactories.assign('t', Node.FieldAccess('a', [0, 1, 0]))])],
        [Node.Field('a'), Node.Field('t', { isTemporary: true })]
      );
      const outer = TestFactories.stencil(
        'outer',
        [Node.StencilCallDeclaration(Node.StencilCall('inner', [Node.Field('x')]))],
        [Node.Field('x'), Node.Field('t', { isTemporary: true })]
      );
      const inst = lowerStencil(TestFactories.hir([inner, outer]), 'outer');
      const meta = inst.metadata;
      const [pair] = allStatementAccessPairs(inst.ir);
      assert.ok(pair);
      const fieldAccesses = collectExprs(pair.statement).filter(e => e.kind === 'FieldAccess');

      assert.deepEqual(
        fieldAccesses.map(e => e.kind === 'FieldAccess' && e.name),
        ['inner_t', 'x']
      );
      assert.deepEqual(
        fieldAccesses.map(e => meta.getAccessIdOfExpr(e)),
        [meta.getAccessIdFromName('inner_t'), meta.getAccessIdFromName('x')]
      );
      assert.notEqual(meta.getAccessIdFromName('inner_t'), meta.getAccessIdFromName('t'));
    });

    it('gives the callee temporaries fresh names', () => {
      const inst = lowerStencil(callingHir(), 'outer');
      assert.equal(inst.metadata.getNameFromAccessId(4), 'inner_t');
      assert.equal(inst.metadata.isTemporaryField(4), true);
    });

    it('records the call on the stack trace of the inlined flow', () => {
      const inst = lowerStencil(callingHir(), 'outer');
      const [desc] = inst.metadata.stencilDescStatements;
      assert.ok(desc);
      assert.deepEqual(
        desc.stackTrace.map(call => call.callee),
        ['inner']
      );
    });

    it('rejects a call with the wrong number of fields', () => {
      throwsCode(
        () => lowerStencil(callingHir([Node.Field('x')]), 'outer'),
        IrErrorKind.InvariantViolation,
        DiagnosticCode.V011_StatementShape
      );
    });

    it('rejects recursion and unknown callees', () => {
      const loop = TestFactories.stencil('loop', [Node.StencilCallDeclaration(Node.StencilCall('loop', []))], []);
      throwsCode(
        () => lowerStencil(TestFactories.hir([loop]), 'loop'),
        IrErrorKind.InvariantViolation,
        DiagnosticCode.V011_StatementShape
      );

      const lost = TestFactories.stencil('lost', [Node.StencilCallDeclaration(Node.StencilCall('missing', []))], []);
      throwsCode(
        () => lowerStencil(TestFactories.hir([lost]), 'lost'),
        IrErrorKind.LookupFailure,
        DiagnosticCode.L005_UnknownStencil
      );
    });
  });

  describe('failures', () => {
    it('rejects unknown stencils, fields and globals', () => {
      throwsCode(
        () => lowerStencil(TestFactories.smoothHir(), 'nope'),
        IrErrorKind.LookupFailure,
        DiagnosticCode.L005_UnknownStencil
      );

      const unknownField = TestFactories.hir([
        TestFactories.stencil('f', [TestFactories.verticalRegion([TestFactories.assign('ghost', Node.LiteralAccess('1'))])], []),
      ]);
      throwsCode(() => lowerStencil(unknownField, 'f'), IrErrorKind.LookupFailure, DiagnosticCode.L002_UnknownName);

      const unknownGlobal = TestFactories.hir([
        TestFactories.stencil(
          'g',
          [TestFactories.verticalRegion([TestFactories.assign('u', Node.VariableAccess('eps', { isExternal: true }))])],
          [Node.Field('u')]
        ),
      ]);
      throwsCode(() => lowerStencil(unknownGlobal, 'g'), IrErrorKind.LookupFailure, DiagnosticCode.L003_UnknownGlobal);
    });

    it('rejects string globals', () => {
      const hir = TestFactories.hir(
        [TestFactories.stencil('s', [], [])],
        [['mode', { value: { type: 'string', value: 'fast' }, isConstexpr: true }]]
      );
      throwsCode(() => lowerStencil(hir, 's'), IrErrorKind.InvariantViolation, DiagnosticCode.V013_UnsupportedGlobal);
    });

    it('rejects control flow nested in a region', () => {
      const hir = TestFactories.hir([
        TestFactories.stencil('n', [TestFactories.verticalRegion([TestFactories.verticalRegion([])])], []),
      ]);
      throwsCode(() => lowerStencil(hir, 'n'), IrErrorKind.InvariantViolation, DiagnosticCode.V011_StatementShape);
    });
  });
});
