// Error kinds, codes and constructors shared by the codec, the metadata tables and validation

import type { AccessID, SourceLocation } from '../types.js';

export enum IrErrorKind {
  /** Bytes do not parse as the declared schema. */
  MalformedEncoding = 'MalformedEncoding',
  /** A tagged union with zero or several branches, or an unknown enum code. */
  UnknownVariant = 'UnknownVariant',
  /** A well-formed object breaks a domain invariant. */
  InvariantViolation = 'InvariantViolation',
  /** An AccessID, name or node is missing from the metadata tables. */
  LookupFailure = 'LookupFailure',
}

export enum DiagnosticCode {
  // Wire errors (W001-W099)
  W001_UnreadableBytes = 'W001',
  W002_WrongValueType = 'W002',
  W003_BadArity = 'W003',
  W004_IntegerOutOfRange = 'W004',

  // Union errors (U001-U099)
  U001_NoBranchSet = 'U001',
  U002_MultipleBranchesSet = 'U002',
  U003_UnknownEnumValue = 'U003',

  // Invariant violations (V001-V099)
  V001_IntervalOrder = 'V001',
  V002_VersionReparented = 'V002',
  V003_SelfVersion = 'V003',
  V004_VersionTablesDisagree = 'V004',
  V005_DuplicateNodeId = 'V005',
  V006_DuplicateAccessId = 'V006',
  V007_ClassificationOverlap = 'V007',
  V008_UnnamedAccessId = 'V008',
  V009_DuplicateName = 'V009',
  V010_UnknownAccessId = 'V010',
  V011_StatementShape = 'V011',
  V012_LiteralIdSign = 'V012',
  V013_UnsupportedGlobal = 'V013',
  V014_GlobalValueType = 'V014',

  // Lookup failures (L001-L099)
  L001_UnknownAccessId = 'L001',
  L002_UnknownName = 'L002',
  L003_UnknownGlobal = 'L003',
  L004_UnboundNode = 'L004',
  L005_UnknownStencil = 'L005',
  L006_UnknownArgument = 'L006',
}

/** Whatever the caller needs to point at the offending piece. */
export interface IrErrorContext {
  readonly accessId?: AccessID;
  readonly name?: string;
  /** Dotted path of the wire field or tree position, e.g. `metadata.api_field_ids`. */
  readonly path?: string;
  readonly location?: SourceLocation;
  readonly stencilId?: number;
  readonly doMethodId?: number;
}

function kindOf(code: DiagnosticCode): IrErrorKind {
  switch (code.charAt(0)) {
    case 'W':
      return IrErrorKind.MalformedEncoding;
    case 'U':
      return IrErrorKind.UnknownVariant;
    case 'V':
      return IrErrorKind.InvariantViolation;
    default:
      return IrErrorKind.LookupFailure;
  }
}

export class IrError extends Error {
  readonly kind: IrErrorKind;
  readonly code: DiagnosticCode;
  readonly context: IrErrorContext;

  constructor(code: DiagnosticCode, message: string, context: IrErrorContext = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IrError';
    this.code = code;
    this.kind = kindOf(code);
    this.context = context;
  }

  /** UnknownVariant is reported with the same severity as MalformedEncoding. */
  get isDecodeError(): boolean {
    return this.kind === IrErrorKind.MalformedEncoding || this.kind === IrErrorKind.UnknownVariant;
  }
}

export function isIrError(error: unknown, kind?: IrErrorKind): error is IrError {
  return error instanceof IrError && (kind === undefined || error.kind === kind);
}

// Common error patterns
export const Diagnostics = {
  malformedEncoding: (path: string, message: string): IrError =>
    new IrError(DiagnosticCode.W002_WrongValueType, message, { path }),

  unknownVariant: (path: string, message: string): IrError =>
    new IrError(DiagnosticCode.U001_NoBranchSet, message, { path }),

  invariantViolation: (code: DiagnosticCode, message: string, context: IrErrorContext = {}): IrError =>
    new IrError(code, message, context),

  lookupFailure: (code: DiagnosticCode, message: string, context: IrErrorContext = {}): IrError =>
    new IrError(code, message, context),

  unreadableBytes: (cause: unknown): IrError =>
    new IrError(
      DiagnosticCode.W001_UnreadableBytes,
      `Malformed encoding: ${cause instanceof Error ? cause.message : String(cause)}`,
      {},
      { cause }
    ),

  wrongValueType: (path: string, expected: string, actual: unknown): IrError =>
    new IrError(
      DiagnosticCode.W002_WrongValueType,
      `Expected ${expected} at '${path}', got ${actual === null ? 'null' : typeof actual}`,
      { path }
    ),

  wrongWireType: (path: string, expected: number, actual: number): IrError =>
    new IrError(DiagnosticCode.W002_WrongValueType, `Expected wire type ${expected} at '${path}', got ${actual}`, {
      path,
    }),

  integerOutOfRange: (path: string, type: string, value: number): IrError =>
    new IrError(DiagnosticCode.W004_IntegerOutOfRange, `${value} at '${path}' does not fit in ${type}`, { path }),

  badArity: (path: string, expected: number, actual: number): IrError =>
    new IrError(DiagnosticCode.W003_BadArity, `Expected ${expected} entries at '${path}', got ${actual}`, { path }),

  noBranchSet: (path: string, union: string): IrError =>
    new IrError(DiagnosticCode.U001_NoBranchSet, `No alternative of ${union} is set at '${path}'`, { path }),

  multipleBranchesSet: (path: string, union: string, branches: readonly string[]): IrError =>
    new IrError(
      DiagnosticCode.U002_MultipleBranchesSet,
      `More than one alternative of ${union} is set at '${path}': ${branches.join(', ')}`,
      { path }
    ),

  unknownEnumValue: (path: string, enumName: string, value: number): IrError =>
    new IrError(DiagnosticCode.U003_UnknownEnumValue, `Unknown ${enumName} code ${value} at '${path}'`, { path }),

  unknownAccessId: (accessId: AccessID, table: string): IrError =>
    new IrError(DiagnosticCode.L001_UnknownAccessId, `AccessID ${accessId} is not registered in ${table}`, {
      accessId,
    }),

  unknownName: (name: string, table: string): IrError =>
    new IrError(DiagnosticCode.L002_UnknownName, `Name '${name}' is not registered in ${table}`, { name }),

  unknownGlobal: (name: string): IrError =>
    new IrError(DiagnosticCode.L003_UnknownGlobal, `Global variable '${name}' is not declared`, { name }),
};

export function formatIrError(error: IrError): string {
  const { accessId, name, path, location, stencilId, doMethodId } = error.context;
  const details: string[] = [];
  if (accessId !== undefined) details.push(`accessId=${accessId}`);
  if (name !== undefined) details.push(`name=${name}`);
  if (path !== undefined) details.push(`path=${path}`);
  if (stencilId !== undefined) details.push(`stencil=${stencilId}`);
  if (doMethodId !== undefined) details.push(`doMethod=${doMethodId}`);

  let result = `${error.kind} ${error.code}: ${error.message}`;
  if (details.length > 0) result += ` [${details.join(', ')}]`;
  if (location && location.line >= 0) result += ` at ${location.line}:${location.column}`;
  return result;
}
