/**
 * @module stencil_instantiation
 *
 * One lowered user stencil: the metadata tables plus the internal-IR tree. The instance is owned
 * by one pipeline stage at a time; nothing here is shared between instantiations.
 *
 * Nodes are added through this class so that every node gets a fresh ID from the per-kind
 * allocators.
 */

import { DiagnosticCode, IrError } from './diagnostics/diagnostics.js';
import { IirIdAllocators } from './iir/ids.js';
import { IirNode } from './iir/iir.js';
import { Interval } from './iir/interval.js';
import { StencilMetaInfo } from './metadata/meta_info.js';
import type { Iir, IntervalBound, Stmt } from './types.js';
import { LoopOrder } from './types.js';
import { collectViolations, validate } from './validate.js';

export class StencilInstantiation {
  readonly metadata: StencilMetaInfo;
  readonly ir: Iir.InternalIR;
  private readonly ids = new IirIdAllocators();

  constructor(metadata: StencilMetaInfo = new StencilMetaInfo(), ir: Iir.InternalIR = IirNode.InternalIR()) {
    this.metadata = metadata;
    this.ir = ir;
    for (const stencil of ir.stencils) {
      this.ids.observe('stencil', stencil.id);
      for (const ms of stencil.multiStages) {
        this.ids.observe('multiStage', ms.id);
        for (const stage of ms.stages) {
          this.ids.observe('stage', stage.id);
          for (const dm of stage.doMethods) this.ids.observe('doMethod', dm.id);
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  addStencil(attributes = 0): Iir.Stencil {
    const stencil = IirNode.Stencil(this.ids.next('stencil'), attributes);
    this.ir.stencils.push(stencil);
    return stencil;
  }

  createMultiStage(loopOrder: LoopOrder = LoopOrder.Parallel): Iir.MultiStage {
    return IirNode.MultiStage(this.ids.next('multiStage'), loopOrder);
  }

  addMultiStage(stencil: Iir.Stencil, loopOrder: LoopOrder = LoopOrder.Parallel): Iir.MultiStage {
    const ms = this.createMultiStage(loopOrder);
    stencil.multiStages.push(ms);
    return ms;
  }

  createStage(): Iir.Stage {
    return IirNode.Stage(this.ids.next('stage'));
  }

  addStage(ms: Iir.MultiStage): Iir.Stage {
    const stage = this.createStage();
    ms.stages.push(stage);
    return stage;
  }

  /** Rejects an ill-ordered interval with an InvariantViolation. */
  createDoMethod(lower: IntervalBound, upper: IntervalBound): Iir.DoMethod {
    const interval = Interval.create(lower, upper);
    return IirNode.DoMethod(this.ids.next('doMethod'), interval);
  }

  addDoMethod(stage: Iir.Stage, interval: Interval): Iir.DoMethod {
    const dm = this.createDoMethod(interval.lower, interval.upper);
    stage.doMethods.push(dm);
    return dm;
  }

  addStatementAccessPair(
    dm: Iir.DoMethod,
    statement: Stmt,
    callerAccesses?: Iir.Accesses,
    calleeAccesses?: Iir.Accesses
  ): Iir.StatementAccessPair {
    const pair = IirNode.StatementAccessPair(statement, callerAccesses, calleeAccesses);
    dm.statementAccessPairs.push(pair);
    return pair;
  }

  // ---------------------------------------------------------------------------
  // Optimizer requests
  // ---------------------------------------------------------------------------

  /** Replaces `old` inside `ms` by `replacement` (one or several stages, in order). */
  replaceStage(ms: Iir.MultiStage, old: Iir.Stage, ...replacement: Iir.Stage[]): void {
    spliceChild(ms.stages, old, replacement, 'Stage', ms.id);
  }

  replaceDoMethod(stage: Iir.Stage, old: Iir.DoMethod, ...replacement: Iir.DoMethod[]): void {
    spliceChild(stage.doMethods, old, replacement, 'DoMethod', stage.id);
  }

  replaceMultiStage(stencil: Iir.Stencil, old: Iir.MultiStage, ...replacement: Iir.MultiStage[]): void {
    spliceChild(stencil.multiStages, old, replacement, 'MultiStage', stencil.id);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getStencil(id: number): Iir.Stencil {
    const stencil = this.ir.stencils.find(s => s.id === id);
    if (!stencil) {
      throw new IrError(DiagnosticCode.L005_UnknownStencil, `Stencil ${id} is not part of the IR`, { stencilId: id });
    }
    return stencil;
  }

  get stencilName(): string {
    return this.metadata.stencilName;
  }

  /** Throws the first InvariantViolation found. */
  validate(): void {
    validate(this);
  }

  collectViolations(): IrError[] {
    return collectViolations(this);
  }
}

function spliceChild<T extends { readonly id: number }>(
  children: T[],
  old: T,
  replacement: readonly T[],
  what: string,
  parentId: number
): void {
  const index = children.indexOf(old);
  if (index < 0) {
    throw new IrError(DiagnosticCode.L004_UnboundNode, `${what} ${old.id} is not a child of node ${parentId}`);
  }
  children.splice(index, 1, ...replacement);
}
