/**
 * Dense 2-D grid with configurable coordinate addressing, neighbor lookup
 * and region partitioning.
 */

export { Grid } from './grid.js';

export { Origin, isOrigin } from './core/origin.js';
export { DEFAULT_GRID_OPTIONS, createGridOptions } from './core/options.js';
export type { GridOptions } from './core/options.js';
export { GridError, isGridError } from './core/errors.js';
export type { GridErrorKind } from './core/errors.js';
export { Coordinates } from './core/position.js';
export type { XyPair } from './core/position.js';
export type { CellRef, GridIndex, GridLayout } from './core/types.js';
export { Direction, flipDirection, CARDINAL_DIRECTIONS, ALL_AROUND_DIRECTIONS } from './core/direction.js';
export {
  toCanonical,
  fromCanonical,
  locateXy,
  xyToOffset,
  offsetToXy,
  coordinateRange,
} from './core/coordinate-system.js';
export type { CoordinateRange } from './core/coordinate-system.js';
export {
  FlatIndex,
  XyIndex,
  CoordinatesIndex,
  resolveIndex,
  tryResolveIndex,
} from './core/index-forms.js';
export type { CoordinateForm } from './core/index-forms.js';

export { XyNeighbors, AllAroundNeighbors, neighborOffset } from './neighbors/index.js';
export type { XyOffsets, AllAroundOffsets } from './neighbors/index.js';
export { regionExtent, regionOf, regionStart, regionSlots } from './partition/index.js';
export type { RegionExtent } from './partition/index.js';
export { CellSequence, SlotSequence } from './iterators/index.js';
export { MAX_GRID_CELLS } from './construction/into-grid.js';

export { parseGrid, parseGridWith, exportGrid } from './parser/parser.js';
export type { CellParser } from './parser/parser.js';
export { parseGridOptions, readGridOptions, loadGridDocument } from './parser/document.js';
