/**
 * @module stencil-ir
 *
 * Intermediate representation of a stencil compiler: the source-level AST and HIR, the lowered
 * internal IR with its metadata tables, and their binary wire format.
 *
 * **Pipeline**:
 * ```
 * front-end → HIR → lowerStencil → StencilInstantiation → optimizer passes → code generation
 *                                          ↕
 *                     encodeStencilInstantiation / decodeStencilInstantiation
 * ```
 *
 * @example
 * ```typescript
 * import { lowerStencil, encodeStencilInstantiation, decodeStencilInstantiation } from 'stencil-ir';
 *
 * const inst = lowerStencil(hir, 'copy_stencil');
 * const bytes = encodeStencilInstantiation(inst);
 * const restored = decodeStencilInstantiation(bytes);
 * restored.validate();
 * ```
 */

// Model
export * from './types.js';
export * from './ast/index.js';
export * from './iir/index.js';
export * from './metadata/index.js';
export { Interval } from './iir/interval.js';
export { StencilInstantiation } from './stencil_instantiation.js';
export { validate, collectViolations, rootStatements } from './validate.js';

// Lowering and persistence
export { lowerStencil, codeGenCallName } from './lower_to_iir.js';
export type { LowerOptions } from './lower_to_iir.js';
export * from './serialization/index.js';

// Debug output
export { formatInstantiation, formatStmt, formatExpr } from './pretty/pretty_iir.js';

// Errors, logging, configuration
export * from './diagnostics/index.js';
export { Logger, LogLevel, createLogger } from './utils/logger.js';
export type { LogMetadata } from './utils/logger.js';
export { ConfigService } from './config/config-service.js';
