export {
  ZERO_EXTENT,
  extent,
  zeroExtents,
  mergeExtent,
  mergeExtents,
  extentsFromOffset,
  extentsEqual,
  extentsContain,
  extentsToString,
} from './extent.js';
export {
  emptyAccesses,
  accesses,
  mergeAccesses,
  addAccess,
  isSubsetOf,
  overlaps,
  hasDataDependency,
  accessesEqual,
  accessIdsOf,
} from './accesses.js';
export {
  Interval,
  Bound,
  compareBounds,
  isValidInterval,
  boundToString,
  intervalToString,
  intervalOrderError,
} from './interval.js';
export {
  IirNode,
  LOOP_ORDER_CODES,
  isLoopOrder,
  loopOrderName,
  hasAttr,
  setAttr,
  clearAttr,
  attrNames,
  allStatementAccessPairs,
  allDoMethods,
  allStages,
} from './iir.js';
export { IdAllocator, IirIdAllocators } from './ids.js';
export type { IirNodeKind } from './ids.js';
export { DefaultIirVisitor } from './visitor.js';
export type { IirVisitor } from './visitor.js';
