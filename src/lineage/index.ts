export { LineageGraph, type RootsResult } from './graph.js';
export {
  walkAncestors,
  walkDescendants,
  buildChildIndex,
  descendantIds,
  type LineageResult,
} from './traverse.js';
