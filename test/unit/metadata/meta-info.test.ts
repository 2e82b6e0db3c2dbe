import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Node } from '../../../src/ast/ast.js';
import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { GlobalValues } from '../../../src/metadata/global_value.js';
import { StencilMetaInfo } from '../../../src/metadata/meta_info.js';

function throwsCode(fn: () => unknown, code: DiagnosticCode): void {
  assert.throws(fn, (e: unknown) => isIrError(e) && e.code === code);
}

describe('StencilMetaInfo', () => {
  describe('registration', () => {
    it('hands out sequential positive IDs and classifies fields', () => {
      const meta = new StencilMetaInfo();
      const a = meta.registerField('a');
      const b = meta.registerField('b', { isTemporary: true });
      const g = meta.registerGlobalVariable('g', GlobalValues.integer(2));

      assert.deepEqual([a, b, g], [1, 2, 3]);
      assert.deepEqual(meta.apiFieldIds(), [1]);
      assert.deepEqual(meta.temporaryFieldIds(), [2]);
      assert.deepEqual(meta.fieldIds(), [1, 2]);
      assert.deepEqual(meta.globalVariableIds(), [3]);
      assert.equal(meta.isApiField(b), false);
      assert.equal(meta.isGlobalVariable(g), true);
    });

    it('keeps field and global names unique', () => {
      const meta = new StencilMetaInfo();
      meta.registerField('u');
      throwsCode(() => meta.registerField('u'), DiagnosticCode.V009_DuplicateName);
      throwsCode(() => meta.registerGlobalVariable('u', GlobalValues.boolean(true)), DiagnosticCode.V009_DuplicateName);
    });

    it('gives every local declaration its own ID', () => {
      const meta = new StencilMetaInfo();
      const first = meta.registerLocalVariable('x');
      const second = meta.registerLocalVariable('x');
      assert.notEqual(first, second);
      assert.equal(meta.getAccessIdFromName('x'), first);
    });

    it('puts literals in a negative namespace', () => {
      const meta = new StencilMetaInfo();
      assert.equal(meta.registerLiteral('0.5'), -1);
      assert.equal(meta.registerLiteral('2'), -2);
      assert.equal(meta.getNameFromAccessId(-1), '0.5');
      assert.equal(meta.isLiteral(-2), true);
      assert.equal(meta.isField(-2), false);
    });

    it('stores legal dimensions only when declared', () => {
      const meta = new StencilMetaInfo();
      const horizontal = meta.registerField('h', { legalDimensions: [1, 1, 0] });
      const plain = meta.registerField('p');
      assert.deepEqual(meta.getLegalDimensions(horizontal), [1, 1, 0]);
      assert.equal(meta.getLegalDimensions(plain), undefined);
    });
  });

  describe('lookups', () => {
    it('fails on unknown IDs, names and globals', () => {
      const meta = new StencilMetaInfo();
      assert.throws(
        () => meta.getNameFromAccessId(99),
        (e: unknown) => isIrError(e, IrErrorKind.LookupFailure) && e.code === DiagnosticCode.L001_UnknownAccessId
      );
      throwsCode(() => meta.getAccessIdFromName('nope'), DiagnosticCode.L002_UnknownName);
      throwsCode(() => meta.getGlobalVariableValue('nope'), DiagnosticCode.L003_UnknownGlobal);
      throwsCode(() => meta.getStencilCall(7), DiagnosticCode.L005_UnknownStencil);
      throwsCode(() => meta.getBoundaryCondition('u'), DiagnosticCode.L002_UnknownName);
    });

    it('binds nodes by identity', () => {
      const meta = new StencilMetaInfo();
      const id = meta.registerField('u');
      const bound = Node.FieldAccess('u');
      meta.bindExpr(bound, id);

      assert.equal(meta.getAccessIdOfExpr(bound), id);
      assert.equal(meta.hasExprBinding(Node.FieldAccess('u')), false);
      throwsCode(() => meta.getAccessIdOfExpr(Node.FieldAccess('u')), DiagnosticCode.L004_UnboundNode);
    });
  });

  describe('globals', () => {
    it('tells an unset global from one set to zero', () => {
      const meta = new StencilMetaInfo();
      meta.registerGlobalVariable('eps', GlobalValues.double());
      meta.registerGlobalVariable('dt', GlobalValues.double(0));

      assert.equal(meta.isGlobalVariableSet('eps'), false);
      assert.equal(meta.isGlobalVariableSet('dt'), true);
      assert.deepEqual(meta.getGlobalVariableValue('dt'), { type: 'double', value: 0 });
    });

    it('replaces a value in place', () => {
      const meta = new StencilMetaInfo();
      meta.registerGlobalVariable('eps', GlobalValues.double());
      meta.setGlobalVariableValue('eps', GlobalValues.double(1e-6));
      assert.deepEqual(meta.getGlobalVariableValue('eps'), { type: 'double', value: 1e-6 });
    });

    it('keeps fractional values out of integer globals', () => {
      throwsCode(() => GlobalValues.integer(2.5), DiagnosticCode.V014_GlobalValueType);

      const meta = new StencilMetaInfo();
      throwsCode(
        () => meta.registerGlobalVariable('steps', { type: 'integer', value: 2.5 }),
        DiagnosticCode.V014_GlobalValueType
      );
      assert.equal(meta.hasGlobalVariable('steps'), false);

      meta.registerGlobalVariable('steps', GlobalValues.integer(2));
      throwsCode(
        () => meta.setGlobalVariableValue('steps', { type: 'integer', value: 0.5 }),
        DiagnosticCode.V014_GlobalValueType
      );
      assert.deepEqual(meta.getGlobalVariableValue('steps'), { type: 'integer', value: 2 });
      assert.doesNotThrow(() => GlobalValues.double(2.5));
    });
  });

  describe('createVersion', () => {
    it('names versions after the original and registers their lineage', () => {
      const meta = new StencilMetaInfo();
      const u = meta.registerField('u', { legalDimensions: [1, 1, 1] });
      const v1 = meta.createVersion(u);
      const v2 = meta.createVersion(v1);

      assert.equal(meta.getNameFromAccessId(v1), 'u_1');
      assert.equal(meta.getNameFromAccessId(v2), 'u_2');
      assert.deepEqual(meta.variableVersions.versionsOf(u), [v1, v2]);
      assert.equal(meta.isField(v1), true);
      assert.equal(meta.isApiField(v1), false);
      assert.deepEqual(meta.getLegalDimensions(v2), [1, 1, 1]);
    });

    it('keeps versions of a temporary temporary', () => {
      const meta = new StencilMetaInfo();
      const tmp = meta.registerField('tmp', { isTemporary: true });
      assert.equal(meta.isTemporaryField(meta.createVersion(tmp)), true);
    });

    it('skips a version name already taken', () => {
      const meta = new StencilMetaInfo();
      const u = meta.registerField('u');
      meta.registerField('u_1');
      assert.equal(meta.getNameFromAccessId(meta.createVersion(u)), 'u_2');
    });

    it('only versions fields', () => {
      const meta = new StencilMetaInfo();
      const g = meta.registerGlobalVariable('g', GlobalValues.integer());
      throwsCode(() => meta.createVersion(g), DiagnosticCode.V007_ClassificationOverlap);
    });
  });

  it('never hands out an observed ID again', () => {
    const meta = new StencilMetaInfo();
    meta.observeAccessId(10);
    meta.observeAccessId(-4);
    assert.equal(meta.nextAccessId(), 11);
    assert.equal(meta.registerLiteral('1'), -5);
  });
});
