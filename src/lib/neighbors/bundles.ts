/**
 * Fixed-shape neighbor records. Each field is independently present or absent.
 *
 * Presence is decided by the resolved neighbor offsets, not by the values:
 * on a grid whose cells may hold undefined, `values()` cannot tell a missing
 * neighbor from an empty cell, while `offsets` and `presentCount()` can.
 */

/**
 * Canonical offsets of the four cardinal neighbors; undefined where there is none.
 */
export interface XyOffsets {
  readonly up: number | undefined;
  readonly left: number | undefined;
  readonly right: number | undefined;
  readonly down: number | undefined;
}

/**
 * Canonical offsets of all eight neighbors; undefined where there is none.
 */
export interface AllAroundOffsets extends XyOffsets {
  readonly upleft: number | undefined;
  readonly upright: number | undefined;
  readonly downleft: number | undefined;
  readonly downright: number | undefined;
}

function readSlot<T>(offset: number | undefined, read: (offset: number) => T): T | undefined {
  return offset === undefined ? undefined : read(offset);
}

function countPresent(offsets: ReadonlyArray<number | undefined>): number {
  return offsets.filter(offset => offset !== undefined).length;
}

/**
 * The four cardinal neighbors of a cell.
 */
export class XyNeighbors<T> {
  readonly up: T | undefined;
  readonly left: T | undefined;
  readonly right: T | undefined;
  readonly down: T | undefined;

  constructor(
    public readonly offsets: XyOffsets,
    read: (offset: number) => T
  ) {
    this.up = readSlot(offsets.up, read);
    this.left = readSlot(offsets.left, read);
    this.right = readSlot(offsets.right, read);
    this.down = readSlot(offsets.down, read);
  }

  /**
   * Neighbors top to bottom, left to right: up, left, right, down.
   * Absent neighbors stay in place as undefined.
   */
  values(): (T | undefined)[] {
    return [this.up, this.left, this.right, this.down];
  }

  /**
   * Number of neighbors that exist, whatever they hold.
   */
  presentCount(): number {
    const { up, left, right, down } = this.offsets;
    return countPresent([up, left, right, down]);
  }
}

/**
 * All eight neighbors of a cell.
 */
export class AllAroundNeighbors<T> {
  readonly upleft: T | undefined;
  readonly up: T | undefined;
  readonly upright: T | undefined;
  readonly left: T | undefined;
  readonly right: T | undefined;
  readonly downleft: T | undefined;
  readonly down: T | undefined;
  readonly downright: T | undefined;

  constructor(
    public readonly offsets: AllAroundOffsets,
    read: (offset: number) => T
  ) {
    this.upleft = readSlot(offsets.upleft, read);
    this.up = readSlot(offsets.up, read);
    this.upright = readSlot(offsets.upright, read);
    this.left = readSlot(offsets.left, read);
    this.right = readSlot(offsets.right, read);
    this.downleft = readSlot(offsets.downleft, read);
    this.down = readSlot(offsets.down, read);
    this.downright = readSlot(offsets.downright, read);
  }

  /**
   * Neighbors top to bottom, left to right:
   * upleft, up, upright, left, right, downleft, down, downright.
   */
  values(): (T | undefined)[] {
    return [
      this.upleft,
      this.up,
      this.upright,
      this.left,
      this.right,
      this.downleft,
      this.down,
      this.downright,
    ];
  }

  presentCount(): number {
    const { upleft, up, upright, left, right, downleft, down, downright } = this.offsets;
    return countPresent([upleft, up, upright, left, right, downleft, down, downright]);
  }
}
