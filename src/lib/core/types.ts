/**
 * Shared shapes for the addressing layer.
 */

import type { GridOptions } from './options.js';
import type { Coordinates, XyPair } from './position.js';

/**
 * Shape and configuration of a grid. Everything coordinate math needs,
 * without the cell storage.
 */
export interface GridLayout {
  readonly rows: number;
  readonly cols: number;
  readonly options: GridOptions;
}

/**
 * Any supported way of addressing a cell: a canonical flat offset,
 * a signed pair, or named coordinates.
 */
export type GridIndex = number | XyPair | Coordinates;

/**
 * Mutable handle on one cell. Writes go straight to grid storage.
 *
 * Callers must not hold a CellRef across operations that are expected
 * to see the old value.
 */
export interface CellRef<T> {
  readonly offset: number;
  value: T;
}

/**
 * Number of cells in a layout.
 */
export function layoutSize(layout: GridLayout): number {
  return layout.rows * layout.cols;
}

/**
 * Whether a number is a canonical offset of the layout.
 */
export function isValidOffset(layout: GridLayout, offset: number): boolean {
  return Number.isInteger(offset) && offset >= 0 && offset < layoutSize(layout);
}
