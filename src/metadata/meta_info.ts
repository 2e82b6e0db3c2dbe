/**
 * @module metadata/meta_info
 *
 * Symbol table of one stencil instantiation.
 *
 * - AccessID → name for fields, globals and locals; literal IDs live in their own negative namespace
 * - Field classification: every API and temporary field is a field; API, temporary and global sets
 *   are pairwise disjoint
 * - Bindings from AST nodes to AccessIDs, keyed by node identity
 * - Program flow: stencil description statements, stencil calls, boundary conditions
 * - Typed global values, possibly unset
 */

import { UNKNOWN_LOCATION } from '../ast/ast.js';
import { DiagnosticCode, Diagnostics, IrError } from '../diagnostics/diagnostics.js';
import type { AccessID, Expr, GlobalValue, Int3, Iir, SourceLocation, StencilCall, Stmt } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { checkGlobalValue, isSet } from './global_value.js';
import { VariableVersions } from './variable_versions.js';

const logger = createLogger('meta-info');

export interface FieldOptions {
  readonly isTemporary?: boolean;
  /** User-declared legal dimensions, e.g. `[1, 1, 0]` for a horizontal field. */
  readonly legalDimensions?: Int3;
}

export class StencilMetaInfo {
  stencilName = '';
  fileName = '';
  stencilLocation: SourceLocation = UNKNOWN_LOCATION;

  readonly variableVersions: VariableVersions;

  private readonly accessIdToName = new Map<AccessID, string>();
  private readonly literalIdToName = new Map<AccessID, string>();
  private readonly fieldIdSet = new Set<AccessID>();
  private readonly apiFieldIdList: AccessID[] = [];
  private readonly temporaryFieldIdSet = new Set<AccessID>();
  private readonly globalVariableIdSet = new Set<AccessID>();
  private readonly exprToAccessId = new Map<Expr, AccessID>();
  private readonly stmtToAccessId = new Map<Stmt, AccessID>();
  private readonly descStatements: Iir.StencilDescStatement[] = [];
  private readonly idToStencilCall = new Map<number, Stmt>();
  private readonly boundaryConditionByField = new Map<string, Stmt>();
  private readonly legalDimensionsById = new Map<AccessID, Int3>();
  private readonly globalValues = new Map<string, GlobalValue>();

  private nextId = 1;
  private nextLiteralId = -1;

  constructor(variableVersions: VariableVersions = new VariableVersions()) {
    this.variableVersions = variableVersions;
  }

  // ---------------------------------------------------------------------------
  // AccessID allocation and registration
  // ---------------------------------------------------------------------------

  /** Fresh positive AccessID, never handed out before in this unit. */
  nextAccessId(): AccessID {
    return this.nextId++;
  }

  /** Keeps the allocators clear of an ID that was assigned elsewhere (decode). */
  observeAccessId(id: AccessID): void {
    if (id > 0 && id >= this.nextId) this.nextId = id + 1;
    if (id < 0 && id <= this.nextLiteralId) this.nextLiteralId = id - 1;
  }

  registerField(name: string, options: FieldOptions = {}): AccessID {
    this.assertNameFree(name);
    const id = this.nextAccessId();
    this.accessIdToName.set(id, name);
    this.fieldIdSet.add(id);
    if (options.isTemporary) this.temporaryFieldIdSet.add(id);
    else this.apiFieldIdList.push(id);
    if (options.legalDimensions) this.legalDimensionsById.set(id, options.legalDimensions);
    logger.debug('Registered field', { name, accessId: id, isTemporary: options.isTemporary ?? false });
    return id;
  }

  registerGlobalVariable(name: string, value: GlobalValue): AccessID {
    checkGlobalValue(value, name);
    this.assertNameFree(name);
    const id = this.nextAccessId();
    this.accessIdToName.set(id, name);
    this.globalVariableIdSet.add(id);
    this.globalValues.set(name, value);
    return id;
  }

  /** Locals are not unique by name; every declaration gets its own ID. */
  registerLocalVariable(name: string): AccessID {
    const id = this.nextAccessId();
    this.accessIdToName.set(id, name);
    return id;
  }

  registerLiteral(value: string): AccessID {
    const id = this.nextLiteralId--;
    this.literalIdToName.set(id, value);
    return id;
  }

  private assertNameFree(name: string): void {
    const existing = this.findFieldOrGlobal(name);
    if (existing !== undefined) {
      throw new IrError(
        DiagnosticCode.V009_DuplicateName,
        `Name '${name}' is already used by AccessID ${existing}`,
        { name, accessId: existing }
      );
    }
  }

  private findFieldOrGlobal(name: string): AccessID | undefined {
    for (const [id, candidate] of this.accessIdToName) {
      if (candidate === name && (this.fieldIdSet.has(id) || this.globalVariableIdSet.has(id))) return id;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Versioning
  // ---------------------------------------------------------------------------

  /**
   * Allocates the next version of a field, named `<original>_<n>`. The version inherits the
   * classification and legal dimensions of its original; a version of an API field is a plain
   * field, since the API list only holds the arguments of the user call.
   */
  createVersion(originalId: AccessID): AccessID {
    const original = this.variableVersions.isVersion(originalId)
      ? this.variableVersions.originalOf(originalId)
      : originalId;
    const name = this.getNameFromAccessId(original);
    if (!this.fieldIdSet.has(original)) {
      throw new IrError(DiagnosticCode.V007_ClassificationOverlap, `AccessID ${original} ('${name}') is not a field`, {
        accessId: original,
        name,
      });
    }

    let n = (this.variableVersions.isVersioned(original) ? this.variableVersions.versionsOf(original).length : 0) + 1;
    while (this.findFieldOrGlobal(`${name}_${n}`) !== undefined) n++;
    const versionName = `${name}_${n}`;

    const id = this.nextAccessId();
    this.accessIdToName.set(id, versionName);
    this.fieldIdSet.add(id);
    if (this.temporaryFieldIdSet.has(original)) this.temporaryFieldIdSet.add(id);
    const dims = this.legalDimensionsById.get(original);
    if (dims) this.legalDimensionsById.set(id, dims);
    this.variableVersions.registerVersion(original, id);
    logger.debug('Created field version', { original, version: id, name: versionName });
    return id;
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  hasAccessId(id: AccessID): boolean {
    return this.accessIdToName.has(id) || this.literalIdToName.has(id);
  }

  getNameFromAccessId(id: AccessID): string {
    const name = this.accessIdToName.get(id) ?? this.literalIdToName.get(id);
    if (name === undefined) throw Diagnostics.unknownAccessId(id, 'the access-ID table');
    return name;
  }

  /** Field and global names are unique; for a local the first declaration wins. */
  getAccessIdFromName(name: string): AccessID {
    const unique = this.findFieldOrGlobal(name);
    if (unique !== undefined) return unique;
    for (const [id, candidate] of this.accessIdToName) {
      if (candidate === name) return id;
    }
    throw Diagnostics.unknownName(name, 'the access-ID table');
  }

  isField(id: AccessID): boolean {
    return this.fieldIdSet.has(id);
  }

  isApiField(id: AccessID): boolean {
    return this.apiFieldIdList.includes(id);
  }

  isTemporaryField(id: AccessID): boolean {
    return this.temporaryFieldIdSet.has(id);
  }

  isGlobalVariable(id: AccessID): boolean {
    return this.globalVariableIdSet.has(id);
  }

  isLiteral(id: AccessID): boolean {
    return this.literalIdToName.has(id);
  }

  fieldIds(): AccessID[] {
    return [...this.fieldIdSet];
  }

  apiFieldIds(): readonly AccessID[] {
    return [...this.apiFieldIdList];
  }

  temporaryFieldIds(): AccessID[] {
    return [...this.temporaryFieldIdSet];
  }

  globalVariableIds(): AccessID[] {
    return [...this.globalVariableIdSet];
  }

  accessIdNames(): Array<[AccessID, string]> {
    return [...this.accessIdToName];
  }

  literalNames(): Array<[AccessID, string]> {
    return [...this.literalIdToName];
  }

  // ---------------------------------------------------------------------------
  // Node bindings
  // ---------------------------------------------------------------------------

  bindExpr(expr: Expr, id: AccessID): void {
    this.exprToAccessId.set(expr, id);
  }

  bindStmt(stmt: Stmt, id: AccessID): void {
    this.stmtToAccessId.set(stmt, id);
  }

  hasExprBinding(expr: Expr): boolean {
    return this.exprToAccessId.has(expr);
  }

  hasStmtBinding(stmt: Stmt): boolean {
    return this.stmtToAccessId.has(stmt);
  }

  getAccessIdOfExpr(expr: Expr): AccessID {
    const id = this.exprToAccessId.get(expr);
    if (id === undefined) {
      throw new IrError(DiagnosticCode.L004_UnboundNode, `${expr.kind} expression has no AccessID`, {
        location: expr.loc,
      });
    }
    return id;
  }

  getAccessIdOfStmt(stmt: Stmt): AccessID {
    const id = this.stmtToAccessId.get(stmt);
    if (id === undefined) {
      throw new IrError(DiagnosticCode.L004_UnboundNode, `${stmt.kind} statement has no AccessID`, {
        location: stmt.loc,
      });
    }
    return id;
  }

  exprBindings(): Array<[Expr, AccessID]> {
    return [...this.exprToAccessId];
  }

  stmtBindings(): Array<[Stmt, AccessID]> {
    return [...this.stmtToAccessId];
  }

  // ---------------------------------------------------------------------------
  // Program flow
  // ---------------------------------------------------------------------------

  addStencilDescStatement(stmt: Stmt, stackTrace: readonly StencilCall[] = []): void {
    this.descStatements.push({ stmt, stackTrace });
  }

  get stencilDescStatements(): readonly Iir.StencilDescStatement[] {
    return this.descStatements;
  }

  setStencilCall(stencilId: number, stmt: Stmt): void {
    this.idToStencilCall.set(stencilId, stmt);
  }

  getStencilCall(stencilId: number): Stmt {
    const stmt = this.idToStencilCall.get(stencilId);
    if (!stmt) {
      throw new IrError(DiagnosticCode.L005_UnknownStencil, `No stencil call is recorded for stencil ${stencilId}`, {
        stencilId,
      });
    }
    return stmt;
  }

  stencilCalls(): Array<[number, Stmt]> {
    return [...this.idToStencilCall];
  }

  setBoundaryCondition(fieldName: string, stmt: Stmt): void {
    this.boundaryConditionByField.set(fieldName, stmt);
  }

  hasBoundaryCondition(fieldName: string): boolean {
    return this.boundaryConditionByField.has(fieldName);
  }

  getBoundaryCondition(fieldName: string): Stmt {
    const stmt = this.boundaryConditionByField.get(fieldName);
    if (!stmt) throw Diagnostics.unknownName(fieldName, 'the boundary-condition table');
    return stmt;
  }

  boundaryConditions(): Array<[string, Stmt]> {
    return [...this.boundaryConditionByField];
  }

  setLegalDimensions(id: AccessID, dimensions: Int3): void {
    this.legalDimensionsById.set(id, dimensions);
  }

  /** `undefined` when the user declared none. */
  getLegalDimensions(id: AccessID): Int3 | undefined {
    return this.legalDimensionsById.get(id);
  }

  legalDimensions(): Array<[AccessID, Int3]> {
    return [...this.legalDimensionsById];
  }

  // ---------------------------------------------------------------------------
  // Globals
  // ---------------------------------------------------------------------------

  setGlobalVariableValue(name: string, value: GlobalValue): void {
    this.globalValues.set(name, checkGlobalValue(value, name));
  }

  hasGlobalVariable(name: string): boolean {
    return this.globalValues.has(name);
  }

  getGlobalVariableValue(name: string): GlobalValue {
    const value = this.globalValues.get(name);
    if (!value) throw Diagnostics.unknownGlobal(name);
    return value;
  }

  isGlobalVariableSet(name: string): boolean {
    return isSet(this.getGlobalVariableValue(name));
  }

  globalVariables(): Array<[string, GlobalValue]> {
    return [...this.globalValues];
  }

  // ---------------------------------------------------------------------------
  // Raw restoration (decode)
  // ---------------------------------------------------------------------------

  /**
   * Loads already-assigned tables without checking them; `validate()` reports inconsistencies.
   * Node bindings are restored separately, once the trees they point into exist.
   */
  static fromTables(tables: MetaInfoTables): StencilMetaInfo {
    const meta = new StencilMetaInfo(tables.variableVersions);
    meta.stencilName = tables.stencilName;
    meta.fileName = tables.fileName;
    meta.stencilLocation = tables.stencilLocation;
    for (const [id, name] of tables.accessIdToName) {
      meta.accessIdToName.set(id, name);
      meta.observeAccessId(id);
    }
    for (const [id, name] of tables.literalIdToName) {
      meta.literalIdToName.set(id, name);
      meta.observeAccessId(id);
    }
    for (const id of tables.fieldIds) meta.fieldIdSet.add(id);
    meta.apiFieldIdList.push(...tables.apiFieldIds);
    for (const id of tables.temporaryFieldIds) meta.temporaryFieldIdSet.add(id);
    for (const id of tables.globalVariableIds) meta.globalVariableIdSet.add(id);
    for (const id of [...tables.fieldIds, ...tables.globalVariableIds, ...tables.variableVersions.allVersionIds()]) {
      meta.observeAccessId(id);
    }
    for (const desc of tables.stencilDescStatements) meta.descStatements.push(desc);
    for (const [id, stmt] of tables.stencilCalls) meta.idToStencilCall.set(id, stmt);
    for (const [name, stmt] of tables.boundaryConditions) meta.boundaryConditionByField.set(name, stmt);
    for (const [id, dims] of tables.legalDimensions) meta.legalDimensionsById.set(id, dims);
    for (const [name, value] of tables.globalValues) meta.globalValues.set(name, value);
    return meta;
  }
}

export interface MetaInfoTables {
  readonly stencilName: string;
  readonly fileName: string;
  readonly stencilLocation: SourceLocation;
  readonly accessIdToName: Iterable<readonly [AccessID, string]>;
  readonly literalIdToName: Iterable<readonly [AccessID, string]>;
  readonly fieldIds: readonly AccessID[];
  readonly apiFieldIds: readonly AccessID[];
  readonly temporaryFieldIds: readonly AccessID[];
  readonly globalVariableIds: readonly AccessID[];
  readonly variableVersions: VariableVersions;
  readonly stencilDescStatements: readonly Iir.StencilDescStatement[];
  readonly stencilCalls: Iterable<readonly [number, Stmt]>;
  readonly boundaryConditions: Iterable<readonly [string, Stmt]>;
  readonly legalDimensions: Iterable<readonly [AccessID, Int3]>;
  readonly globalValues: Iterable<readonly [string, GlobalValue]>;
}
