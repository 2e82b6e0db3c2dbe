// Internal-IR node constructors and small structural queries
import type { Interval, Iir, Stmt } from '../types.js';
import { LoopOrder, StencilAttr } from '../types.js';
import { emptyAccesses } from './accesses.js';

export const IirNode = {
  StatementAccessPair: (
    statement: Stmt,
    callerAccesses: Iir.Accesses = emptyAccesses(),
    calleeAccesses: Iir.Accesses = emptyAccesses()
  ): Iir.StatementAccessPair => ({ statement, callerAccesses, calleeAccesses }),
  DoMethod: (id: number, interval: Interval): Iir.DoMethod => ({ id, interval, statementAccessPairs: [] }),
  Stage: (id: number): Iir.Stage => ({ id, doMethods: [] }),
  MultiStage: (id: number, loopOrder: LoopOrder = LoopOrder.Parallel): Iir.MultiStage => ({
    id,
    loopOrder,
    stages: [],
  }),
  Stencil: (id: number, attributes = 0): Iir.Stencil => ({ id, attributes, multiStages: [] }),
  InternalIR: (): Iir.InternalIR => ({ stencils: [] }),
};

export const LOOP_ORDER_CODES: readonly LoopOrder[] = [LoopOrder.Forward, LoopOrder.Backward, LoopOrder.Parallel];

export function isLoopOrder(code: number): code is LoopOrder {
  return LOOP_ORDER_CODES.some(order => order === code);
}

export function loopOrderName(order: LoopOrder): string {
  switch (order) {
    case LoopOrder.Forward:
      return 'forward';
    case LoopOrder.Backward:
      return 'backward';
    case LoopOrder.Parallel:
      return 'parallel';
  }
}

export function hasAttr(stencil: Iir.Stencil, attr: StencilAttr): boolean {
  return (stencil.attributes & attr) !== 0;
}

export function setAttr(stencil: Iir.Stencil, attr: StencilAttr): void {
  stencil.attributes |= attr;
}

export function clearAttr(stencil: Iir.Stencil, attr: StencilAttr): void {
  stencil.attributes &= ~attr;
}

const ALL_ATTRS: readonly StencilAttr[] = [
  StencilAttr.NoCodeGen,
  StencilAttr.MergeStages,
  StencilAttr.MergeDoMethods,
  StencilAttr.MergeTemporaries,
  StencilAttr.UseKCaches,
];

export function attrNames(bits: number): string[] {
  return ALL_ATTRS.filter(attr => (bits & attr) !== 0).map(attr => StencilAttr[attr]);
}

/** Every statement-access pair of the IR, in tree order. */
export function allStatementAccessPairs(ir: Iir.InternalIR): Iir.StatementAccessPair[] {
  return ir.stencils.flatMap(stencil =>
    stencil.multiStages.flatMap(ms =>
      ms.stages.flatMap(stage => stage.doMethods.flatMap(dm => dm.statementAccessPairs))
    )
  );
}

export function allDoMethods(stencil: Iir.Stencil): Iir.DoMethod[] {
  return stencil.multiStages.flatMap(ms => ms.stages.flatMap(stage => stage.doMethods));
}

export function allStages(stencil: Iir.Stencil): Iir.Stage[] {
  return stencil.multiStages.flatMap(ms => ms.stages);
}
