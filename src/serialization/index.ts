export { MessageTypes, loadSchema, messageType, resolveProtoDir, resetSchemaForTesting } from './schema.js';
export type { MessageTypeName } from './schema.js';
export { WireReader, encodeMessage, decodeMessage } from './wire.js';
export type { WireObject, WireValue } from './wire.js';
export {
  stmtToWire,
  stmtFromWire,
  exprToWire,
  exprFromWire,
  encodeStatement,
  decodeStatement,
  encodeExpression,
  decodeExpression,
} from './ast_codec.js';
export {
  encodeStencilInstantiation,
  decodeStencilInstantiation,
  instantiationToWire,
  instantiationFromWire,
} from './iir_codec.js';
export { encodeHir, decodeHir, hirToWire, hirFromWire } from './hir_codec.js';
export {
  instantiationToJson,
  instantiationEquals,
  serializeInstantiationJson,
  deserializeInstantiationJson,
} from './json.js';
export type { InstantiationEnvelope } from './json.js';
