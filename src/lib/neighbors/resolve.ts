/**
 * Neighbor offset resolution over canonical offsets.
 *
 * All functions take an already-validated offset and return the neighbor's
 * offset, or undefined where the grid ends and the axis does not wrap.
 */

import { Direction } from '../core/direction.js';
import { layoutSize } from '../core/types.js';
import type { GridLayout } from '../core/types.js';

/**
 * One storage row up (toward row 0).
 */
export function rowAbove(layout: GridLayout, offset: number): number | undefined {
  if (offset >= layout.cols) {
    return offset - layout.cols;
  }
  return layout.options.wrapY ? offset + layoutSize(layout) - layout.cols : undefined;
}

/**
 * One storage row down (toward the last row).
 */
export function rowBelow(layout: GridLayout, offset: number): number | undefined {
  const next = offset + layout.cols;
  if (next < layoutSize(layout)) {
    return next;
  }
  return layout.options.wrapY ? next - layoutSize(layout) : undefined;
}

export function leftOf(layout: GridLayout, offset: number): number | undefined {
  if (offset % layout.cols !== 0) {
    return offset - 1;
  }
  return layout.options.wrapX ? offset + layout.cols - 1 : undefined;
}

export function rightOf(layout: GridLayout, offset: number): number | undefined {
  const next = offset + 1;
  if (next % layout.cols !== 0) {
    return next;
  }
  return layout.options.wrapX ? next - layout.cols : undefined;
}

/**
 * Whether "up" means toward greater logical y rather than the storage row above.
 */
function upFollowsY(layout: GridLayout): boolean {
  return layout.options.invertedY && layout.options.neighborYBased;
}

export function upOf(layout: GridLayout, offset: number): number | undefined {
  return upFollowsY(layout) ? rowBelow(layout, offset) : rowAbove(layout, offset);
}

export function downOf(layout: GridLayout, offset: number): number | undefined {
  return upFollowsY(layout) ? rowAbove(layout, offset) : rowBelow(layout, offset);
}

type Step = (layout: GridLayout, offset: number) => number | undefined;

/**
 * Vertical step first, then horizontal. Absent if either step is.
 */
function diagonal(layout: GridLayout, offset: number, vertical: Step, horizontal: Step): number | undefined {
  const mid = vertical(layout, offset);
  return mid === undefined ? undefined : horizontal(layout, mid);
}

/**
 * Offset of the neighbor in a direction.
 */
export function neighborOffset(
  layout: GridLayout,
  offset: number,
  direction: Direction
): number | undefined {
  switch (direction) {
    case Direction.Up:
      return upOf(layout, offset);
    case Direction.Down:
      return downOf(layout, offset);
    case Direction.Left:
      return leftOf(layout, offset);
    case Direction.Right:
      return rightOf(layout, offset);
    case Direction.UpLeft:
      return diagonal(layout, offset, upOf, leftOf);
    case Direction.UpRight:
      return diagonal(layout, offset, upOf, rightOf);
    case Direction.DownLeft:
      return diagonal(layout, offset, downOf, leftOf);
    case Direction.DownRight:
      return diagonal(layout, offset, downOf, rightOf);
  }
}
