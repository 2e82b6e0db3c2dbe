import type { Iir } from '../types.js';

/**
 * Read-only walk over the internal-IR tree.
 *
 * - Entry point: visitIR
 * - Override the levels of interest and call `super` to keep descending
 */
export interface IirVisitor<Ctx> {
  visitIR(ir: Iir.InternalIR, ctx: Ctx): void;
  visitStencil(stencil: Iir.Stencil, ctx: Ctx): void;
  visitMultiStage(ms: Iir.MultiStage, ctx: Ctx): void;
  visitStage(stage: Iir.Stage, ctx: Ctx): void;
  visitDoMethod(dm: Iir.DoMethod, ctx: Ctx): void;
  visitStatementAccessPair(pair: Iir.StatementAccessPair, ctx: Ctx): void;
}

export class DefaultIirVisitor<Ctx = undefined> implements IirVisitor<Ctx> {
  visitIR(ir: Iir.InternalIR, ctx: Ctx): void {
    for (const stencil of ir.stencils) this.visitStencil(stencil, ctx);
  }

  visitStencil(stencil: Iir.Stencil, ctx: Ctx): void {
    for (const ms of stencil.multiStages) this.visitMultiStage(ms, ctx);
  }

  visitMultiStage(ms: Iir.MultiStage, ctx: Ctx): void {
    for (const stage of ms.stages) this.visitStage(stage, ctx);
  }

  visitStage(stage: Iir.Stage, ctx: Ctx): void {
    for (const dm of stage.doMethods) this.visitDoMethod(dm, ctx);
  }

  visitDoMethod(dm: Iir.DoMethod, ctx: Ctx): void {
    for (const pair of dm.statementAccessPairs) this.visitStatementAccessPair(pair, ctx);
  }

  visitStatementAccessPair(_pair: Iir.StatementAccessPair, _ctx: Ctx): void {}
}
