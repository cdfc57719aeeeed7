/**
 * Mapping between logical (x, y) coordinates and canonical storage space.
 *
 * Canonical space has (0, 0) at the upper-left cell, x growing rightward and
 * y growing downward, so a canonical (x, y) is simply (column, row).
 */

import { GridError } from './errors.js';
import { Origin } from './origin.js';
import type { GridLayout } from './types.js';

/**
 * Negation without producing -0.
 */
function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

function applyInversion(layout: GridLayout, y: number): number {
  return layout.options.invertedY ? negate(y) : y;
}

/**
 * Translate a logical coordinate into canonical (column, row). No bounds checking.
 */
export function toCanonical(layout: GridLayout, x: number, y: number): [number, number] {
  const ly = applyInversion(layout, y);
  const lastCol = layout.cols - 1;
  const lastRow = layout.rows - 1;

  switch (layout.options.origin) {
    case Origin.UpperLeft:
      return [x, negate(ly)];
    case Origin.UpperRight:
      return [x + lastCol, negate(ly)];
    case Origin.Center:
      return [x + Math.floor(layout.cols / 2), Math.floor(layout.rows / 2) - ly];
    case Origin.LowerLeft:
      return [x, lastRow - ly];
    case Origin.LowerRight:
      return [x + lastCol, lastRow - ly];
  }
}

function originToLogical(layout: GridLayout, col: number, row: number): [number, number] {
  const lastCol = layout.cols - 1;
  const lastRow = layout.rows - 1;

  switch (layout.options.origin) {
    case Origin.UpperLeft:
      return [col, negate(row)];
    case Origin.UpperRight:
      return [col - lastCol, negate(row)];
    case Origin.Center:
      return [col - Math.floor(layout.cols / 2), Math.floor(layout.rows / 2) - row];
    case Origin.LowerLeft:
      return [col, lastRow - row];
    case Origin.LowerRight:
      return [col - lastCol, lastRow - row];
  }
}

/**
 * Translate canonical (column, row) back into the layout's logical coordinate.
 * Exact inverse of toCanonical.
 */
export function fromCanonical(layout: GridLayout, col: number, row: number): [number, number] {
  const [x, ly] = originToLogical(layout, col, row);
  return [x, applyInversion(layout, ly)];
}

/**
 * Canonical flat offset of a logical coordinate, or undefined when the
 * coordinate is not a cell of the layout.
 */
export function locateXy(layout: GridLayout, x: number, y: number): number | undefined {
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    return undefined;
  }
  const [col, row] = toCanonical(layout, x, y);
  if (col < 0 || col >= layout.cols || row < 0 || row >= layout.rows) {
    return undefined;
  }
  return row * layout.cols + col;
}

/**
 * Check a logical coordinate and convert it to a canonical flat offset.
 *
 * @throws GridError IndexOutOfBounds when the coordinate is not a cell of the layout
 */
export function xyToOffset(layout: GridLayout, x: number, y: number): number {
  const offset = locateXy(layout, x, y);
  if (offset === undefined) {
    throw new GridError('IndexOutOfBounds', `(${x}, ${y})`);
  }
  return offset;
}

/**
 * Logical coordinate of a canonical flat offset. The offset is not checked.
 */
export function offsetToXy(layout: GridLayout, offset: number): [number, number] {
  return fromCanonical(layout, offset % layout.cols, Math.floor(offset / layout.cols));
}

/**
 * Inclusive logical bounds of a layout.
 */
export interface CoordinateRange {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

/**
 * Compute the logical coordinate range from the two opposite canonical corners.
 */
export function coordinateRange(layout: GridLayout): CoordinateRange {
  const [ax, ay] = fromCanonical(layout, 0, 0);
  const [bx, by] = fromCanonical(layout, layout.cols - 1, layout.rows - 1);
  return {
    minX: Math.min(ax, bx),
    maxX: Math.max(ax, bx),
    minY: Math.min(ay, by),
    maxY: Math.max(ay, by),
  };
}
