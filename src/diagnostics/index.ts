/**
 * @module diagnostics
 *
 * Error model of the IR layer: one {@link IrError} class whose `kind` tells decode errors,
 * invariant violations and failed lookups apart, plus a stable `code` per situation.
 */

export {
  IrErrorKind,
  DiagnosticCode,
  IrError,
  Diagnostics,
  isIrError,
  formatIrError,
} from './diagnostics.js';
export type { IrErrorContext } from './diagnostics.js';
