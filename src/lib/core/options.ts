/**
 * Coordinate and neighbor configuration copied into every Grid.
 */

import { Origin } from './origin.js';

/**
 * Custom configuration of a grid.
 *
 * For grids whose x and y values are always positive, `UpperLeft` with
 * `invertedY: true` fits best, and is therefore the default.
 *
 * @property invertedY - Increasing logical y moves toward larger row index
 * @property neighborYBased - With `invertedY`, "up" neighbors follow logical y (y + 1)
 *                            instead of the storage row above
 */
export interface GridOptions {
  readonly origin: Origin;
  readonly invertedY: boolean;
  readonly neighborYBased: boolean;
  readonly wrapX: boolean;
  readonly wrapY: boolean;
}

export const DEFAULT_GRID_OPTIONS: GridOptions = Object.freeze({
  origin: Origin.UpperLeft,
  invertedY: true,
  neighborYBased: true,
  wrapX: false,
  wrapY: false,
});

/**
 * Merge a partial configuration over the defaults.
 *
 * @returns Frozen options record, never the caller's object
 */
export function createGridOptions(options: Partial<GridOptions> = {}): GridOptions {
  return Object.freeze({
    origin: options.origin ?? DEFAULT_GRID_OPTIONS.origin,
    invertedY: options.invertedY ?? DEFAULT_GRID_OPTIONS.invertedY,
    neighborYBased: options.neighborYBased ?? DEFAULT_GRID_OPTIONS.neighborYBased,
    wrapX: options.wrapX ?? DEFAULT_GRID_OPTIONS.wrapX,
    wrapY: options.wrapY ?? DEFAULT_GRID_OPTIONS.wrapY,
  });
}
