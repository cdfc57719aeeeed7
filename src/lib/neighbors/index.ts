/**
 * Neighbor resolution: offset steps and the 4- and 8-neighbor bundles.
 */

export {
  neighborOffset,
  upOf,
  downOf,
  leftOf,
  rightOf,
  rowAbove,
  rowBelow,
} from './resolve.js';
export { XyNeighbors, AllAroundNeighbors } from './bundles.js';
export type { XyOffsets, AllAroundOffsets } from './bundles.js';
