/**
 * Lazy, restartable cell sequences. Every `for..of` over a sequence starts
 * again from its first cell; nothing is read until iteration begins.
 */

import type { CellRef, GridLayout } from '../core/types.js';

/**
 * Read/write access to grid storage by canonical offset.
 */
export interface CellAccess<T> {
  read(offset: number): T;
  write(offset: number, value: T): void;
}

/**
 * Create a mutable reference to one stored cell.
 */
export function createCellRef<T>(access: CellAccess<T>, offset: number): CellRef<T> {
  return {
    offset,
    get value(): T {
      return access.read(offset);
    },
    set value(next: T) {
      access.write(offset, next);
    },
  };
}

/**
 * A sequence of cells, each projected from its canonical offset.
 */
export class CellSequence<R> implements Iterable<R> {
  constructor(
    private readonly offsets: () => Iterable<number>,
    private readonly project: (offset: number) => R
  ) {}

  *[Symbol.iterator](): Iterator<R> {
    for (const offset of this.offsets()) {
      yield this.project(offset);
    }
  }
}

/**
 * A sequence of fixed slots where some slots may hold no cell.
 */
export class SlotSequence<R> implements Iterable<R | undefined> {
  constructor(
    private readonly slots: () => Iterable<number | undefined>,
    private readonly project: (offset: number) => R
  ) {}

  *[Symbol.iterator](): Iterator<R | undefined> {
    for (const offset of this.slots()) {
      yield offset === undefined ? undefined : this.project(offset);
    }
  }
}

/**
 * Canonical offsets of the row containing `offset`.
 */
export function* rowOffsets(layout: GridLayout, offset: number): Generator<number> {
  const start = Math.floor(offset / layout.cols) * layout.cols;
  for (let col = 0; col < layout.cols; col++) {
    yield start + col;
  }
}

/**
 * Canonical offsets of the column containing `offset`, top row first.
 */
export function* columnOffsets(layout: GridLayout, offset: number): Generator<number> {
  const size = layout.rows * layout.cols;
  for (let at = offset % layout.cols; at < size; at += layout.cols) {
    yield at;
  }
}

/**
 * Offsets of nothing. Backs sequences started from an out-of-bounds index.
 */
export function* noOffsets(): Generator<number> {}
