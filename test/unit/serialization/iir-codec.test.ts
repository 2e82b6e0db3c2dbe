import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { collectExprs } from '../../../src/ast/ast_visitor.js';
import { Node, fieldOffset } from '../../../src/ast/ast.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { accesses } from '../../../src/iir/accesses.js';
import { zeroExtents } from '../../../src/iir/extent.js';
import { IirNode, allStatementAccessPairs } from '../../../src/iir/iir.js';
import { Bound, Interval } from '../../../src/iir/interval.js';
import { GlobalValues } from '../../../src/metadata/global_value.js';
import { decodeStatement, encodeStatement } from '../../../src/serialization/ast_codec.js';
import { decodeStencilInstantiation, encodeStencilInstantiation } from '../../../src/serialization/iir_codec.js';
import { instantiationEquals } from '../../../src/serialization/json.js';
import { MessageTypes, messageType } from '../../../src/serialization/schema.js';
import { StencilInstantiation } from '../../../src/stencil_instantiation.js';
import { Dimension, LoopOrder } from '../../../src/types.js';
import { TestFactories } from '../../helpers/test-factories.js';

function roundTrip(inst: StencilInstantiation): StencilInstantiation {
  return decodeStencilInstantiation(encodeStencilInstantiation(inst));
}

function failsWith(kind: IrErrorKind, code?: DiagnosticCode): (e: unknown) => boolean {
  return (e: unknown): boolean => isIrError(e, kind) && (code === undefined || e.code === code);
}

describe('StencilInstantiation codec', () => {
  describe('round trip', () => {
    it('reproduces every table and the IR tree', () => {
      const { inst } = TestFactories.sampleInstantiation();
      const decoded = roundTrip(inst);

      assert.equal(instantiationEquals(decoded, inst), true);
      assert.equal(decoded.metadata.stencilName, 'diffusion');
      assert.deepEqual(decoded.metadata.stencilLocation, { line: 3, column: 1 });
      assert.doesNotThrow(() => decoded.validate());
    });

    it('re-attaches node bindings to the decoded tree', () => {
      const { inst, ids } = TestFactories.sampleInstantiation();
      const decoded = roundTrip(inst);
      const [update, decl] = allStatementAccessPairs(decoded.ir).map(pair => pair.statement);
      assert.ok(update && decl);

      const [, lhs, , uAccess, dtAccess] = collectExprs(update);
      assert.ok(lhs && uAccess && dtAccess);
      assert.equal(decoded.metadata.getAccessIdOfExpr(lhs), ids.out);
      assert.equal(decoded.metadata.getAccessIdOfExpr(uAccess), ids.u);
      assert.equal(decoded.metadata.getAccessIdOfExpr(dtAccess), ids.dt);
      assert.equal(decoded.metadata.getAccessIdOfStmt(decl), ids.factor);
    });

    it('keeps an unset global apart from one set to zero', () => {
      const { inst } = TestFactories.sampleInstantiation();
      const decoded = roundTrip(inst);

      assert.equal(decoded.metadata.isGlobalVariableSet('eps'), false);
      assert.deepEqual(decoded.metadata.getGlobalVariableValue('eps'), { type: 'double', value: null });
      assert.equal(decoded.metadata.isGlobalVariableSet('dt'), true);
      assert.deepEqual(decoded.metadata.getGlobalVariableValue('dt'), { type: 'double', value: 0 });
    });

    it('keeps boolean and integer globals', () => {
      const inst = new StencilInstantiation();
      inst.metadata.registerGlobalVariable('flag', GlobalValues.boolean(false));
      inst.metadata.registerGlobalVariable('steps', GlobalValues.integer(12));
      const decoded = roundTrip(inst);

      assert.deepEqual(decoded.metadata.getGlobalVariableValue('flag'), { type: 'boolean', value: false });
      assert.deepEqual(decoded.metadata.getGlobalVariableValue('steps'), { type: 'integer', value: 12 });
    });

    it('keeps the exact loop order codes', () => {
      const inst = new StencilInstantiation();
      const stencil = inst.addStencil();
      inst.addMultiStage(stencil, LoopOrder.Forward);
      inst.addMultiStage(stencil, LoopOrder.Backward);
      inst.addMultiStage(stencil, LoopOrder.Parallel);

      const decoded = roundTrip(inst);
      assert.deepEqual(
        decoded.getStencil(stencil.id).multiStages.map(ms => ms.loopOrder),
        [0, 1, 3]
      );
    });

    it('hands out fresh IDs above the decoded ones', () => {
      const { inst, ids } = TestFactories.sampleInstantiation();
      const decoded = roundTrip(inst);

      assert.equal(decoded.metadata.registerLocalVariable('x'), ids.factor + 1);
      assert.equal(decoded.metadata.registerLiteral('3'), ids.literal - 1);
      assert.equal(decoded.addStencil().id, 2);
    });

    it('keeps field versions and legal dimensions', () => {
      const { inst, ids } = TestFactories.sampleInstantiation();
      const decoded = roundTrip(inst);

      assert.deepEqual(decoded.metadata.variableVersions.versionsOf(ids.u), [ids.uVersion]);
      assert.equal(decoded.metadata.getNameFromAccessId(ids.uVersion), 'u_1');
      assert.deepEqual(decoded.metadata.getLegalDimensions(ids.uVersion), [1, 1, 1]);
    });
  });

  describe('decode failures', () => {
    it('rejects a statement with no branch set', () => {
      assert.throws(
        () => decodeStatement(new Uint8Array([])),
        failsWith(IrErrorKind.UnknownVariant, DiagnosticCode.U001_NoBranchSet)
      );
    });

    it('rejects a statement with two branches set', () => {
      assert.throws(
        () => decodeStatement(new Uint8Array([0x0a, 0x00, 0x12, 0x00])),
        failsWith(IrErrorKind.UnknownVariant, DiagnosticCode.U002_MultipleBranchesSet)
      );
    });

    it('rejects an invalid wire type', () => {
      assert.throws(
        () => decodeStencilInstantiation(new Uint8Array([0x3f])),
        failsWith(IrErrorKind.MalformedEncoding, DiagnosticCode.W001_UnreadableBytes)
      );
    });

    it('rejects a truncated nested message', () => {
      assert.throws(
        () => decodeStencilInstantiation(new Uint8Array([0x0a, 0x05, 0x01])),
        failsWith(IrErrorKind.MalformedEncoding)
      );
    });

    it('rejects a known field sent with the wrong wire type', () => {
      // metadata { stencil_name (field 16) as varint 0 }
      const bytes = new Uint8Array([0x0a, 0x03, 0x80, 0x01, 0x00]);
      assert.throws(
        () => decodeStencilInstantiation(bytes),
        (e: unknown) =>
          isIrError(e, IrErrorKind.MalformedEncoding) &&
          e.code === DiagnosticCode.W002_WrongValueType &&
          e.context.path === 'metadata.stencil_name'
      );
    });

    it('checks the wire type of map values', () => {
      // metadata { access_id_to_name { key: 1, value: varint 5 } }
      const bytes = new Uint8Array([0x0a, 0x06, 0x0a, 0x04, 0x08, 0x01, 0x10, 0x05]);
      assert.throws(
        () => decodeStencilInstantiation(bytes),
        (e: unknown) =>
          isIrError(e, IrErrorKind.MalformedEncoding) &&
          e.code === DiagnosticCode.W002_WrongValueType &&
          e.context.path === 'metadata.access_id_to_name.value'
      );
    });

    it('rejects the reserved loop order code', () => {
      const bytes = messageType(MessageTypes.StencilInstantiation)
        .encode({ internal_ir: { stencils: [{ stencil_id: 1, multi_stages: [{ multi_stage_id: 1, loop_order: 2 }] }] } })
        .finish();
      assert.throws(
        () => decodeStencilInstantiation(bytes),
        failsWith(IrErrorKind.UnknownVariant, DiagnosticCode.U003_UnknownEnumValue)
      );
    });

    it('decodes an ill-ordered interval and leaves it to validation', () => {
      const inst = new StencilInstantiation();
      const stage = inst.addStage(inst.addMultiStage(inst.addStencil()));
      stage.doMethods.push(IirNode.DoMethod(1, Interval.raw(Bound.end(1), Bound.start())));

      const decoded = roundTrip(inst);
      assert.throws(
        () => decoded.validate(),
        failsWith(IrErrorKind.InvariantViolation, DiagnosticCode.V001_IntervalOrder)
      );
    });
  });

  describe('encode failures', () => {
    it('refuses an AccessID outside the int32 range', () => {
      const inst = new StencilInstantiation();
      const dm = inst.addDoMethod(inst.addStage(inst.addMultiStage(inst.addStencil())), Interval.full());
      inst.addStatementAccessPair(
        dm,
        Node.ExpressionStatement(Node.FieldAccess('u')),
        accesses([[2 ** 31, zeroExtents()]])
      );
      assert.throws(
        () => encodeStencilInstantiation(inst),
        failsWith(IrErrorKind.MalformedEncoding, DiagnosticCode.W004_IntegerOutOfRange)
      );
    });

    it('accepts the int32 bounds themselves', () => {
      const inst = new StencilInstantiation();
      const dm = inst.addDoMethod(inst.addStage(inst.addMultiStage(inst.addStencil())), Interval.full());
      inst.addStatementAccessPair(
        dm,
        Node.ExpressionStatement(Node.FieldAccess('u')),
        accesses([[2 ** 31 - 1, zeroExtents()], [-(2 ** 31), zeroExtents()]])
      );
      const [pair] = allStatementAccessPairs(roundTrip(inst).ir);
      assert.ok(pair);
      assert.deepEqual([...pair.callerAccesses.writes.keys()].sort((a, b) => a - b), [-(2 ** 31), 2 ** 31 - 1]);
    });
  });

  describe('standalone statements', () => {
    it('round-trips a statement with an unresolved field access', () => {
      const stmt = Node.If(
        Node.ExpressionStatement(Node.VariableAccess('c', { index: Node.LiteralAccess('0') })),
        Node.Block([
          Node.ExpressionStatement(
            Node.Assignment(
              Node.FieldAccess('u', fieldOffset([0, 0, 1], [-1, -1, 0], [0, 0, 0])),
              Node.StencilFunctionArgument(Dimension.I, 1, 0)
            )
          ),
        ])
      );
      assert.deepEqual(decodeStatement(encodeStatement(stmt)), stmt);
    });
  });

  describe('validate on encode', () => {
    const saved = process.env.STENCIL_IR_VALIDATE_ON_ENCODE;

    beforeEach(() => {
      process.env.STENCIL_IR_VALIDATE_ON_ENCODE = '1';
      ConfigService.resetForTesting();
    });

    afterEach(() => {
      if (saved === undefined) delete process.env.STENCIL_IR_VALIDATE_ON_ENCODE;
      else process.env.STENCIL_IR_VALIDATE_ON_ENCODE = saved;
      ConfigService.resetForTesting();
    });

    it('refuses to encode an inconsistent instantiation', () => {
      const inst = new StencilInstantiation();
      inst.metadata.setStencilCall(1, Node.Block([]));
      assert.throws(
        () => encodeStencilInstantiation(inst),
        failsWith(IrErrorKind.InvariantViolation, DiagnosticCode.V011_StatementShape)
      );
    });
  });
});
