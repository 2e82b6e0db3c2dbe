/**
 * @module validate
 *
 * Invariant checks over a whole instantiation. Decoding never rejects a well-formed but
 * inconsistent object; callers decode, then validate when they want to fail fast.
 */

import { collectStmts } from './ast/ast_visitor.js';
import { DiagnosticCode, IrError, formatIrError } from './diagnostics/diagnostics.js';
import { accessIdsOf } from './iir/accesses.js';
import { allDoMethods, allStages } from './iir/iir.js';
import { intervalOrderError, isValidInterval } from './iir/interval.js';
import { globalValueError } from './metadata/global_value.js';
import type { StencilInstantiation } from './stencil_instantiation.js';
import type { AccessID, Stmt } from './types.js';
import { createLogger, LogLevel } from './utils/logger.js';

const logger = createLogger('validate');

/** Every statement tree held by the instantiation: IR statements first, then program flow. */
export function rootStatements(inst: StencilInstantiation): Stmt[] {
  const roots: Stmt[] = [];
  for (const stencil of inst.ir.stencils) {
    for (const dm of allDoMethods(stencil)) {
      for (const pair of dm.statementAccessPairs) roots.push(pair.statement);
    }
  }
  for (const desc of inst.metadata.stencilDescStatements) roots.push(desc.stmt);
  for (const [, stmt] of inst.metadata.stencilCalls()) roots.push(stmt);
  for (const [, stmt] of inst.metadata.boundaryConditions()) roots.push(stmt);
  return roots;
}

function checkStatementShapes(inst: StencilInstantiation, errors: IrError[]): void {
  for (const root of rootStatements(inst)) {
    for (const stmt of collectStmts(root)) {
      if (stmt.kind === 'VerticalRegionDeclaration' && !isValidInterval(stmt.region.interval)) {
        errors.push(intervalOrderError(stmt.region.interval, stmt.region.loc));
      }
      if (stmt.kind === 'If' && stmt.cond.kind !== 'ExpressionStatement') {
        errors.push(
          new IrError(
            DiagnosticCode.V011_StatementShape,
            `If condition must be an ExpressionStatement, found ${stmt.cond.kind}`,
            { location: stmt.loc }
          )
        );
      }
    }
  }
}

function checkUniqueIds(
  nodes: ReadonlyArray<{ readonly id: number }>,
  what: string,
  stencilId: number | undefined,
  errors: IrError[]
): void {
  const seen = new Set<number>();
  for (const node of nodes) {
    if (seen.has(node.id)) {
      errors.push(
        new IrError(
          DiagnosticCode.V005_DuplicateNodeId,
          `${what} ID ${node.id} appears more than once`,
          stencilId === undefined ? {} : { stencilId }
        )
      );
    }
    seen.add(node.id);
  }
}

function checkTree(inst: StencilInstantiation, errors: IrError[]): void {
  checkUniqueIds(inst.ir.stencils, 'Stencil', undefined, errors);
  for (const stencil of inst.ir.stencils) {
    const doMethods = allDoMethods(stencil);
    checkUniqueIds(stencil.multiStages, 'MultiStage', stencil.id, errors);
    checkUniqueIds(allStages(stencil), 'Stage', stencil.id, errors);
    checkUniqueIds(doMethods, 'DoMethod', stencil.id, errors);
    for (const dm of doMethods) {
      if (!isValidInterval(dm.interval)) {
        const error = intervalOrderError(dm.interval);
        errors.push(new IrError(error.code, error.message, { stencilId: stencil.id, doMethodId: dm.id }));
      }
    }
  }
}

function checkClassification(inst: StencilInstantiation, errors: IrError[]): void {
  const meta = inst.metadata;
  const fields = new Set(meta.fieldIds());
  const api = meta.apiFieldIds();
  const temporaries = new Set(meta.temporaryFieldIds());
  const globals = new Set(meta.globalVariableIds());
  const overlap = (id: AccessID, message: string): void => {
    errors.push(new IrError(DiagnosticCode.V007_ClassificationOverlap, message, { accessId: id }));
  };

  const apiSeen = new Set<AccessID>();
  for (const id of api) {
    if (apiSeen.has(id)) {
      errors.push(
        new IrError(DiagnosticCode.V006_DuplicateAccessId, `AccessID ${id} is listed twice as an API field`, {
          accessId: id,
        })
      );
    }
    apiSeen.add(id);
    if (temporaries.has(id)) overlap(id, `AccessID ${id} is both an API field and a temporary`);
    if (globals.has(id)) overlap(id, `AccessID ${id} is both an API field and a global variable`);
    if (!fields.has(id)) overlap(id, `API field ${id} is not a field`);
  }
  for (const id of temporaries) {
    if (globals.has(id)) overlap(id, `AccessID ${id} is both a temporary and a global variable`);
    if (!fields.has(id)) overlap(id, `Temporary ${id} is not a field`);
  }

  const named = new Set(meta.accessIdNames().map(([id]) => id));
  const names = new Map<string, AccessID>();
  for (const id of [...fields, ...globals]) {
    if (!named.has(id)) {
      errors.push(
        new IrError(DiagnosticCode.V008_UnnamedAccessId, `AccessID ${id} has no name`, { accessId: id })
      );
      continue;
    }
    const name = meta.getNameFromAccessId(id);
    const previous = names.get(name);
    if (previous !== undefined && previous !== id) {
      errors.push(
        new IrError(DiagnosticCode.V009_DuplicateName, `Name '${name}' is used by AccessIDs ${previous} and ${id}`, {
          name,
          accessId: id,
        })
      );
    }
    names.set(name, id);
  }

  for (const [id] of meta.literalNames()) {
    if (id >= 0) {
      errors.push(
        new IrError(DiagnosticCode.V012_LiteralIdSign, `Literal AccessID ${id} is not negative`, { accessId: id })
      );
    }
    if (named.has(id)) {
      errors.push(
        new IrError(DiagnosticCode.V006_DuplicateAccessId, `AccessID ${id} is both a literal and a named access`, {
          accessId: id,
        })
      );
    }
  }
}

function checkGlobalValues(inst: StencilInstantiation, errors: IrError[]): void {
  for (const [name, value] of inst.metadata.globalVariables()) {
    const error = globalValueError(value, name);
    if (error) errors.push(error);
  }
}

function checkAccessIdsKnown(inst: StencilInstantiation, errors: IrError[]): void {
  const meta = inst.metadata;
  const unknown = (id: AccessID, where: string): void => {
    errors.push(
      new IrError(DiagnosticCode.V010_UnknownAccessId, `AccessID ${id} used by ${where} is not registered`, {
        accessId: id,
      })
    );
  };
  for (const stencil of inst.ir.stencils) {
    for (const dm of allDoMethods(stencil)) {
      for (const pair of dm.statementAccessPairs) {
        const used = [...accessIdsOf(pair.callerAccesses), ...accessIdsOf(pair.calleeAccesses)];
        for (const id of new Set(used)) {
          if (!meta.hasAccessId(id)) unknown(id, `a statement of DoMethod ${dm.id}`);
        }
      }
    }
  }
  for (const [expr, id] of meta.exprBindings()) {
    if (!meta.hasAccessId(id)) unknown(id, `a ${expr.kind} expression`);
  }
  for (const [stmt, id] of meta.stmtBindings()) {
    if (!meta.hasAccessId(id)) unknown(id, `a ${stmt.kind} statement`);
  }
}

function checkProgramFlow(inst: StencilInstantiation, errors: IrError[]): void {
  for (const [stencilId, stmt] of inst.metadata.stencilCalls()) {
    if (stmt.kind !== 'StencilCallDeclaration') {
      errors.push(
        new IrError(
          DiagnosticCode.V011_StatementShape,
          `Stencil call of stencil ${stencilId} is a ${stmt.kind}, not a StencilCallDeclaration`,
          { stencilId }
        )
      );
    }
  }
  for (const [name, stmt] of inst.metadata.boundaryConditions()) {
    if (stmt.kind !== 'BoundaryConditionDeclaration') {
      errors.push(
        new IrError(
          DiagnosticCode.V011_StatementShape,
          `Boundary condition of field '${name}' is a ${stmt.kind}, not a BoundaryConditionDeclaration`,
          { name }
        )
      );
    }
  }
}

/** All invariant violations, in check order. */
export function collectViolations(inst: StencilInstantiation): IrError[] {
  const errors: IrError[] = [];
  checkStatementShapes(inst, errors);
  checkTree(inst, errors);
  checkClassification(inst, errors);
  checkGlobalValues(inst, errors);
  errors.push(...inst.metadata.variableVersions.checkInvariants());
  checkAccessIdsKnown(inst, errors);
  checkProgramFlow(inst, errors);
  return errors;
}

/** Throws the first violation after logging how many were found. */
export function validate(inst: StencilInstantiation): void {
  const errors = collectViolations(inst);
  const first = errors[0];
  if (first === undefined) return;
  logger.warn('Stencil instantiation failed validation', {
    stencil: inst.metadata.stencilName,
    violations: errors.length,
    first: first.code,
    ...(logger.isEnabled(LogLevel.DEBUG) ? { all: errors.map(formatIrError) } : {}),
  });
  throw first;
}
