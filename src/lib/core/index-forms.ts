/**
 * Index resolution for every supported coordinate representation.
 *
 * Each form converts its value to a validated canonical offset (`resolve`)
 * and rebuilds a value from an offset (`materialize`). An offset returned by
 * `resolve` is always safe for direct storage access.
 */

import { locateXy, offsetToXy, xyToOffset } from './coordinate-system.js';
import { GridError } from './errors.js';
import { Coordinates } from './position.js';
import type { XyPair } from './position.js';
import { isValidOffset } from './types.js';
import type { GridIndex, GridLayout } from './types.js';

export interface CoordinateForm<C> {
  /**
   * @throws GridError IndexOutOfBounds
   */
  resolve(coord: C, layout: GridLayout): number;
  materialize(offset: number, layout: GridLayout): C;
}

/**
 * Canonical flat offsets. Resolution is only a bounds check.
 */
export const FlatIndex: CoordinateForm<number> = Object.freeze({
  resolve(offset: number, layout: GridLayout): number {
    if (!isValidOffset(layout, offset)) {
      throw new GridError('IndexOutOfBounds', `offset ${offset}`);
    }
    return offset;
  },
  materialize(offset: number): number {
    return offset;
  },
});

export const XyIndex: CoordinateForm<XyPair> = Object.freeze({
  resolve([x, y]: XyPair, layout: GridLayout): number {
    return xyToOffset(layout, x, y);
  },
  materialize(offset: number, layout: GridLayout): XyPair {
    return offsetToXy(layout, offset);
  },
});

export const CoordinatesIndex: CoordinateForm<Coordinates> = Object.freeze({
  resolve(coord: Coordinates, layout: GridLayout): number {
    return xyToOffset(layout, coord.x, coord.y);
  },
  materialize(offset: number, layout: GridLayout): Coordinates {
    const [x, y] = offsetToXy(layout, offset);
    return new Coordinates(x, y);
  },
});

/**
 * Resolve any supported index to a canonical offset.
 *
 * @throws GridError IndexOutOfBounds
 */
export function resolveIndex(index: GridIndex, layout: GridLayout): number {
  if (typeof index === 'number') {
    return FlatIndex.resolve(index, layout);
  }
  if (index instanceof Coordinates) {
    return CoordinatesIndex.resolve(index, layout);
  }
  if (!Array.isArray(index)) {
    throw new GridError('IndexOutOfBounds', `unsupported index ${String(index)}`);
  }
  return XyIndex.resolve(index, layout);
}

/**
 * Like resolveIndex, but out-of-bounds indices give undefined.
 */
export function tryResolveIndex(index: GridIndex, layout: GridLayout): number | undefined {
  if (typeof index === 'number') {
    return isValidOffset(layout, index) ? index : undefined;
  }
  if (index instanceof Coordinates) {
    return locateXy(layout, index.x, index.y);
  }
  if (!Array.isArray(index)) {
    return undefined;
  }
  return locateXy(layout, index[0], index[1]);
}
