/**
 * Partitioning of a grid into a divisor × divisor arrangement of regions.
 *
 * Region extents use ceiling division, so when the grid is not evenly
 * divisible the regions along the bottom and right edges are smaller, and
 * some trailing regions may hold no cells at all. Regions are numbered in
 * row-major order over canonical layout; origin and inversion options have
 * no effect.
 */

import { GridError } from '../core/errors.js';
import type { GridLayout } from '../core/types.js';

/**
 * Width and height of one region.
 */
export interface RegionExtent {
  readonly width: number;
  readonly height: number;
}

function ceiling(a: number, b: number): number {
  return Math.floor((a + b - 1) / b);
}

/**
 * @throws GridError InvalidDivisionSize unless 1 <= divisor <= max(rows, cols)
 */
export function validateDivisor(layout: GridLayout, divisor: number): void {
  if (!Number.isInteger(divisor) || divisor < 1 || divisor > Math.max(layout.rows, layout.cols)) {
    throw new GridError('InvalidDivisionSize', `divisor ${divisor}`);
  }
}

export function regionExtent(layout: GridLayout, divisor: number): RegionExtent {
  validateDivisor(layout, divisor);
  return {
    width: ceiling(layout.cols, divisor),
    height: ceiling(layout.rows, divisor),
  };
}

/**
 * Region id of a validated canonical offset.
 */
export function regionOf(layout: GridLayout, offset: number, divisor: number): number {
  const { width, height } = regionExtent(layout, divisor);
  const rowBlock = Math.floor(Math.floor(offset / layout.cols) / height);
  const colBlock = Math.floor((offset % layout.cols) / width);
  return rowBlock * divisor + colBlock;
}

/**
 * First canonical offset of a region.
 *
 * @throws GridError IndexOutOfBounds for an id outside [0, divisor²) or a region holding no cells
 */
export function regionStart(layout: GridLayout, regionId: number, divisor: number): number {
  const { width, height } = regionExtent(layout, divisor);
  if (!Number.isInteger(regionId) || regionId < 0 || regionId >= divisor * divisor) {
    throw new GridError('IndexOutOfBounds', `region ${regionId}`);
  }
  const row = Math.floor(regionId / divisor) * height;
  const col = (regionId % divisor) * width;
  if (row >= layout.rows || col >= layout.cols) {
    throw new GridError('IndexOutOfBounds', `region ${regionId} holds no cells`);
  }
  return row * layout.cols + col;
}

/**
 * Canonical offsets of every slot of the region containing `offset`, in
 * row-major order within the region. Slots past the true grid edge are
 * undefined, so every region yields exactly width × height slots.
 */
export function* regionSlots(
  layout: GridLayout,
  offset: number,
  divisor: number
): Generator<number | undefined> {
  const { width, height } = regionExtent(layout, divisor);
  const start = regionStart(layout, regionOf(layout, offset, divisor), divisor);
  const startRow = Math.floor(start / layout.cols);
  const startCol = start % layout.cols;

  for (let slot = 0; slot < width * height; slot++) {
    const row = startRow + Math.floor(slot / width);
    const col = startCol + (slot % width);
    yield row < layout.rows && col < layout.cols ? row * layout.cols + col : undefined;
  }
}
