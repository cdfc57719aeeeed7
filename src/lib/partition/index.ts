export {
  regionExtent,
  regionOf,
  regionStart,
  regionSlots,
  validateDivisor,
} from './nrant.js';
export type { RegionExtent } from './nrant.js';
