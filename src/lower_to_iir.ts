/**
 * @module lower_to_iir
 *
 * Lowers one HIR stencil to a {@link StencilInstantiation}.
 *
 * - Fields and globals are registered first; locals and literals as they are met
 * - Each vertical region becomes an IIR stencil with one multi-stage; every statement of the
 *   region gets its own stage holding one do-method over the region's interval
 * - In the program flow, a region is replaced by a call to `__code_gen_<stencilID>`
 * - A call to another HIR stencil is inlined with its fields bound to the call's arguments, and
 *   the call is pushed on the stack trace of every statement it produces
 * - Field accesses are renamed to the caller's fields they stand for
 * - Every access node is bound to its AccessID; caller accesses are computed per statement
 */

import { Node } from './ast/ast.js';
import { assertNever } from './ast/ast_visitor.js';
import { cloneStmt } from './ast/clone.js';
import { staticOffsetOf } from './ast/offsets.js';
import { DiagnosticCode, Diagnostics, IrError } from './diagnostics/diagnostics.js';
import { addAccess } from './iir/accesses.js';
import { extentsFromOffset, zeroExtents } from './iir/extent.js';
import { StencilInstantiation } from './stencil_instantiation.js';
import type {
  AccessID,
  Expr,
  Field,
  FieldAccess,
  GlobalValue,
  Hir,
  HirGlobalVariable,
  HirStencil,
  Iir,
  Int3,
  StencilCall,
  StencilCallDeclaration,
  Stmt,
  VerticalRegionDeclaration,
} from './types.js';
import { LoopOrder, VerticalLoopOrder } from './types.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('lower-to-iir');

export interface LowerOptions {
  /** Attribute bits given to every generated IIR stencil. */
  readonly attributes?: number;
  /** Run `validate()` on the result. */
  readonly validate?: boolean;
}

/** Name of the placeholder call that stands for a generated stencil in the program flow. */
export function codeGenCallName(stencilId: number): string {
  return `__code_gen_${stencilId}`;
}

interface Scope {
  /** Field name as written in the current stencil → AccessID in the instantiation. */
  readonly fields: ReadonlyMap<string, AccessID>;
  readonly locals: Map<string, AccessID>;
  readonly stackTrace: readonly StencilCall[];
  /** Names of the HIR stencils being lowered, outermost first. */
  readonly callChain: readonly string[];
}

type Emit = (stmt: Stmt, stackTrace: readonly StencilCall[]) => void;

interface AccessBuilder {
  readonly writes: Map<AccessID, Iir.Extents>;
  readonly reads: Map<AccessID, Iir.Extents>;
}

export function lowerStencil(hir: Hir, stencilName: string, options: LowerOptions = {}): StencilInstantiation {
  const stencil = findStencil(hir, stencilName);
  logger.debug('Lowering stencil', { stencil: stencilName, file: hir.filename });

  const lowering = new IirLowering(hir, options);
  const inst = lowering.lower(stencil);

  logger.debug('Lowered stencil', {
    stencil: stencilName,
    iirStencils: inst.ir.stencils.length,
    descStatements: inst.metadata.stencilDescStatements.length,
  });
  if (options.validate) inst.validate();
  return inst;
}

function findStencil(hir: Hir, name: string): HirStencil {
  const stencil = hir.stencils.find(s => s.name === name);
  if (!stencil) {
    throw new IrError(DiagnosticCode.L005_UnknownStencil, `Stencil '${name}' is not defined in '${hir.filename}'`, {
      name,
    });
  }
  return stencil;
}

function toGlobalValue(name: string, global: HirGlobalVariable): GlobalValue {
  switch (global.value.type) {
    case 'boolean':
      return { type: 'boolean', value: global.value.value };
    case 'integer':
      return { type: 'integer', value: global.value.value };
    case 'double':
      return { type: 'double', value: global.value.value };
    case 'string':
      throw new IrError(
        DiagnosticCode.V013_UnsupportedGlobal,
        `Global variable '${name}' holds a string, which a stencil instantiation cannot store`,
        { name }
      );
  }
}

function legalDimensionsOf(field: Field): Int3 | undefined {
  const [i, j, k] = field.fieldDimensions;
  if (field.fieldDimensions.length !== 3 || i === undefined || j === undefined || k === undefined) return undefined;
  return [i, j, k];
}

function bodyOf(stmt: Stmt): readonly Stmt[] {
  return stmt.kind === 'Block' ? stmt.statements : [stmt];
}

class IirLowering {
  private readonly inst = new StencilInstantiation();

  constructor(
    private readonly hir: Hir,
    private readonly options: LowerOptions
  ) {}

  private get meta() {
    return this.inst.metadata;
  }

  lower(stencil: HirStencil): StencilInstantiation {
    this.meta.stencilName = stencil.name;
    this.meta.fileName = this.hir.filename;
    this.meta.stencilLocation = stencil.loc;

    for (const [name, global] of this.hir.globalVariables) {
      this.meta.registerGlobalVariable(name, toGlobalValue(name, global));
    }

    const fields = new Map<string, AccessID>();
    for (const field of stencil.fields) {
      const legalDimensions = legalDimensionsOf(field);
      const id = this.meta.registerField(field.name, {
        isTemporary: field.isTemporary,
        ...(legalDimensions ? { legalDimensions } : {}),
      });
      fields.set(field.name, id);
    }

    const scope: Scope = { fields, locals: new Map(), stackTrace: [], callChain: [stencil.name] };
    const emit: Emit = (stmt, stackTrace) => this.meta.addStencilDescStatement(stmt, stackTrace);
    for (const stmt of bodyOf(stencil.ast)) this.lowerFlow(stmt, scope, emit);
    return this.inst;
  }

  // ---------------------------------------------------------------------------
  // Program flow
  // ---------------------------------------------------------------------------

  private lowerFlow(stmt: Stmt, scope: Scope, emit: Emit): void {
    switch (stmt.kind) {
      case 'Block':
        for (const child of stmt.statements) this.lowerFlow(child, scope, emit);
        return;
      case 'VerticalRegionDeclaration':
        emit(this.lowerVerticalRegion(stmt, scope), scope.stackTrace);
        return;
      case 'StencilCallDeclaration':
        this.inlineStencilCall(stmt, scope, emit);
        return;
      case 'BoundaryConditionDeclaration': {
        const fields = stmt.fields.map(field => ({ ...field, name: this.fieldName(field.name, scope) }));
        const bc = Node.BoundaryConditionDeclaration(stmt.functor, fields, stmt.loc);
        for (const field of fields) this.meta.setBoundaryCondition(field.name, bc);
        emit(bc, scope.stackTrace);
        return;
      }
      case 'If': {
        const cond = this.copyStmt(stmt.cond, scope);
        this.collectAccesses(cond, scope);
        const thenPart = this.collectFlow(stmt.thenPart, scope);
        const elsePart = stmt.elsePart ? this.collectFlow(stmt.elsePart, scope) : null;
        emit(Node.If(cond, thenPart, elsePart, stmt.loc), scope.stackTrace);
        return;
      }
      case 'ExpressionStatement':
      case 'Return':
      case 'VariableDeclaration': {
        const lowered = this.copyStmt(stmt, scope);
        this.collectAccesses(lowered, scope);
        emit(lowered, scope.stackTrace);
        return;
      }
      default:
        return assertNever(stmt, 'statement');
    }
  }

  /** Lowers a nested branch of the program flow into one statement. */
  private collectFlow(stmt: Stmt, scope: Scope): Stmt {
    const out: Stmt[] = [];
    this.lowerFlow(stmt, scope, s => out.push(s));
    const [only] = out;
    if (stmt.kind !== 'Block' && out.length === 1 && only !== undefined) return only;
    return Node.Block(out, stmt.loc);
  }

  private lowerVerticalRegion(decl: VerticalRegionDeclaration, scope: Scope): StencilCallDeclaration {
    const { region } = decl;
    const stencil = this.inst.addStencil(this.options.attributes ?? 0);
    const loopOrder = region.loopOrder === VerticalLoopOrder.Backward ? LoopOrder.Backward : LoopOrder.Forward;
    const ms = this.inst.addMultiStage(stencil, loopOrder);
    const regionScope: Scope = { ...scope, locals: new Map(scope.locals) };

    for (const stmt of bodyOf(region.ast)) {
      const stage = this.inst.addStage(ms);
      const dm = this.inst.addDoMethod(stage, region.interval);
      const lowered = this.copyStmt(stmt, regionScope);
      const accesses = this.collectAccesses(lowered, regionScope);
      this.inst.addStatementAccessPair(dm, lowered, accesses);
    }

    const call = Node.StencilCallDeclaration(Node.StencilCall(codeGenCallName(stencil.id), [], region.loc), decl.loc);
    this.meta.setStencilCall(stencil.id, call);
    return call;
  }

  private inlineStencilCall(decl: StencilCallDeclaration, scope: Scope, emit: Emit): void {
    const { call } = decl;
    if (scope.callChain.includes(call.callee)) {
      throw new IrError(
        DiagnosticCode.V011_StatementShape,
        `Stencil '${call.callee}' calls itself through ${scope.callChain.join(' -> ')}`,
        { name: call.callee, location: decl.loc }
      );
    }
    const callee = findStencil(this.hir, call.callee);
    const apiFields = callee.fields.filter(f => !f.isTemporary);
    if (apiFields.length !== call.arguments.length) {
      throw new IrError(
        DiagnosticCode.V011_StatementShape,
        `Stencil '${callee.name}' takes ${apiFields.length} fields, the call passes ${call.arguments.length}`,
        { name: callee.name, location: decl.loc }
      );
    }

    const fields = new Map<string, AccessID>();
    apiFields.forEach((field, i) => {
      const arg = call.arguments[i];
      if (arg) fields.set(field.name, this.fieldId(arg.name, scope));
    });
    for (const temp of callee.fields.filter(f => f.isTemporary)) {
      const legalDimensions = legalDimensionsOf(temp);
      fields.set(
        temp.name,
        this.meta.registerField(this.freshFieldName(temp.name, callee.name), {
          isTemporary: true,
          ...(legalDimensions ? { legalDimensions } : {}),
        })
      );
    }

    const calleeScope: Scope = {
      fields,
      locals: new Map(),
      stackTrace: [...scope.stackTrace, call],
      callChain: [...scope.callChain, callee.name],
    };
    for (const stmt of bodyOf(callee.ast)) this.lowerFlow(stmt, calleeScope, emit);
  }

  private freshFieldName(name: string, callee: string): string {
    const taken = (candidate: string): boolean =>
      this.meta.fieldIds().some(id => this.meta.getNameFromAccessId(id) === candidate);
    if (!taken(name)) return name;
    let candidate = `${callee}_${name}`;
    for (let n = 1; taken(candidate); n++) candidate = `${callee}_${name}_${n}`;
    return candidate;
  }

  private fieldId(name: string, scope: Scope): AccessID {
    const id = scope.fields.get(name);
    if (id === undefined) {
      throw Diagnostics.unknownName(name, `the fields of stencil '${scope.callChain.at(-1) ?? ''}'`);
    }
    return id;
  }

  private fieldName(name: string, scope: Scope): string {
    return this.meta.getNameFromAccessId(this.fieldId(name, scope));
  }

  /**
   * Copy of a statement whose field accesses carry the caller's field names and are bound to the
   * caller's AccessIDs; inside an inlined callee the written name is the callee's parameter.
   */
  private copyStmt(stmt: Stmt, scope: Scope): Stmt {
    return cloneStmt(stmt, expr => {
      if (expr.kind !== 'FieldAccess') return expr;
      const id = this.fieldId(expr.name, scope);
      const renamed: FieldAccess = { ...expr, name: this.meta.getNameFromAccessId(id) };
      this.meta.bindExpr(renamed, id);
      return renamed;
    });
  }

  // ---------------------------------------------------------------------------
  // Accesses
  // ---------------------------------------------------------------------------

  /** Binds every access node below `stmt` and returns the statement's caller accesses. */
  private collectAccesses(stmt: Stmt, scope: Scope): Iir.Accesses {
    const builder: AccessBuilder = { writes: new Map(), reads: new Map() };
    this.visitStmt(stmt, scope, builder);
    return builder;
  }

  private visitStmt(stmt: Stmt, scope: Scope, acc: AccessBuilder): void {
    switch (stmt.kind) {
      case 'Block':
        for (const child of stmt.statements) this.visitStmt(child, scope, acc);
        return;
      case 'ExpressionStatement':
      case 'Return':
        this.visitExpr(stmt.expr, scope, acc);
        return;
      case 'VariableDeclaration': {
        for (const init of stmt.initList) this.visitExpr(init, scope, acc);
        const id = this.meta.registerLocalVariable(stmt.name);
        scope.locals.set(stmt.name, id);
        this.meta.bindStmt(stmt, id);
        addAccess(acc.writes, id, zeroExtents());
        return;
      }
      case 'If':
        this.visitStmt(stmt.cond, scope, acc);
        this.visitStmt(stmt.thenPart, scope, acc);
        if (stmt.elsePart) this.visitStmt(stmt.elsePart, scope, acc);
        return;
      case 'StencilCallDeclaration':
      case 'VerticalRegionDeclaration':
      case 'BoundaryConditionDeclaration':
        throw new IrError(
          DiagnosticCode.V011_StatementShape,
          `${stmt.kind} cannot appear inside a vertical region`,
          { location: stmt.loc }
        );
      default:
        return assertNever(stmt, 'statement');
    }
  }

  private visitExpr(expr: Expr, scope: Scope, acc: AccessBuilder): void {
    switch (expr.kind) {
      case 'Assignment':
        this.visitTarget(expr.left, scope, acc, expr.op !== '=');
        this.visitExpr(expr.right, scope, acc);
        return;
      case 'Unary':
        if (expr.op === '++' || expr.op === '--') this.visitTarget(expr.operand, scope, acc, true);
        else this.visitExpr(expr.operand, scope, acc);
        return;
      case 'Binary':
        this.visitExpr(expr.left, scope, acc);
        this.visitExpr(expr.right, scope, acc);
        return;
      case 'Ternary':
        this.visitExpr(expr.cond, scope, acc);
        this.visitExpr(expr.left, scope, acc);
        this.visitExpr(expr.right, scope, acc);
        return;
      case 'FunctionCall':
      case 'StencilFunctionCall':
        for (const arg of expr.args) this.visitExpr(arg, scope, acc);
        return;
      case 'StencilFunctionArgument':
        return;
      case 'FieldAccess':
      case 'VariableAccess':
      case 'LiteralAccess': {
        const [id, extents] = this.bindAccess(expr, scope, acc);
        addAccess(acc.reads, id, extents);
        return;
      }
      default:
        return assertNever(expr, 'expression');
    }
  }

  /** Left-hand side of an assignment; `alsoRead` for compound assignment and increments. */
  private visitTarget(expr: Expr, scope: Scope, acc: AccessBuilder, alsoRead: boolean): void {
    if (expr.kind !== 'FieldAccess' && expr.kind !== 'VariableAccess') {
      this.visitExpr(expr, scope, acc);
      return;
    }
    const [id, extents] = this.bindAccess(expr, scope, acc);
    addAccess(acc.writes, id, extents);
    if (alsoRead) addAccess(acc.reads, id, extents);
  }

  private bindAccess(expr: Expr, scope: Scope, acc: AccessBuilder): [AccessID, Iir.Extents] {
    switch (expr.kind) {
      case 'FieldAccess': {
        const id = this.meta.getAccessIdOfExpr(expr);
        return [id, extentsFromOffset(staticOffsetOf(expr))];
      }
      case 'VariableAccess': {
        if (expr.index) this.visitExpr(expr.index, scope, acc);
        const id = expr.isExternal ? this.globalId(expr.name) : scope.locals.get(expr.name);
        if (id === undefined) throw Diagnostics.unknownName(expr.name, 'the local variables');
        this.meta.bindExpr(expr, id);
        return [id, zeroExtents()];
      }
      case 'LiteralAccess': {
        const id = this.meta.registerLiteral(expr.value);
        this.meta.bindExpr(expr, id);
        return [id, zeroExtents()];
      }
      default:
        throw new IrError(DiagnosticCode.V011_StatementShape, `${expr.kind} is not an access`, {
          location: expr.loc,
        });
    }
  }

  private globalId(name: string): AccessID {
    const id = this.meta.globalVariableIds().find(candidate => this.meta.getNameFromAccessId(candidate) === name);
    if (id === undefined) throw Diagnostics.unknownGlobal(name);
    return id;
  }
}
