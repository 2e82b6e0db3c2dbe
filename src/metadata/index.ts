export {
  GlobalValues,
  isSet,
  globalValueEquals,
  globalValueToString,
  globalValueError,
  checkGlobalValue,
} from './global_value.js';
export { VariableVersions } from './variable_versions.js';
export { StencilMetaInfo } from './meta_info.js';
export type { FieldOptions, MetaInfoTables } from './meta_info.js';
