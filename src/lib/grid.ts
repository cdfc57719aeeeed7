/**
 * A dense 2-D grid addressed through interchangeable coordinate forms.
 *
 * Cells are stored contiguously in row-major order. Every coordinate form
 * (flat offset, [x, y] pair, Coordinates) is resolved to one canonical
 * offset under the grid's origin, y-inversion and wrap settings.
 */

import { coordinateRange } from './core/coordinate-system.js';
import type { CoordinateRange } from './core/coordinate-system.js';
import { Direction } from './core/direction.js';
import { GridError } from './core/errors.js';
import { CoordinatesIndex, XyIndex, resolveIndex, tryResolveIndex } from './core/index-forms.js';
import { createGridOptions } from './core/options.js';
import type { GridOptions } from './core/options.js';
import { Origin } from './core/origin.js';
import type { Coordinates, XyPair } from './core/position.js';
import type { CellRef, GridIndex, GridLayout } from './core/types.js';
import {
  fromFill,
  fromFlatItems,
  fromNestedRows,
  fromRowPattern,
} from './construction/into-grid.js';
import type { GridStorage } from './construction/into-grid.js';
import {
  CellSequence,
  SlotSequence,
  columnOffsets,
  createCellRef,
  noOffsets,
  rowOffsets,
} from './iterators/sequences.js';
import type { CellAccess } from './iterators/sequences.js';
import { AllAroundNeighbors, XyNeighbors } from './neighbors/bundles.js';
import { neighborOffset } from './neighbors/resolve.js';
import { regionOf, regionSlots, regionStart, validateDivisor } from './partition/nrant.js';

export class Grid<T> implements GridLayout, Iterable<T> {
  readonly rows: number;
  readonly cols: number;
  readonly options: GridOptions;
  private readonly items: T[];
  private readonly access: CellAccess<T>;
  private readonly range: CoordinateRange;

  private constructor(storage: GridStorage<T>, options: Partial<GridOptions> = {}) {
    this.items = storage.items;
    this.rows = storage.rows;
    this.cols = storage.cols;
    this.options = createGridOptions(options);

    if (this.options.origin === Origin.Center && (this.rows % 2 === 0 || this.cols % 2 === 0)) {
      throw new GridError(
        'InvalidSize',
        `center origin needs odd dimensions, got ${this.cols} columns × ${this.rows} rows`
      );
    }

    this.access = {
      read: offset => this.items[offset],
      write: (offset, value) => {
        this.items[offset] = value;
      },
    };
    this.range = coordinateRange(this);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Create a grid from rectangular nested rows, first row on top.
   *
   * @throws GridError InvalidSize for no rows or empty rows, RowSizeMismatch for ragged rows
   */
  static fromRows<T>(rows: ReadonlyArray<ReadonlyArray<T>>, options?: Partial<GridOptions>): Grid<T> {
    return new Grid(fromNestedRows(rows), options);
  }

  /**
   * Create a grid from flat row-major items.
   *
   * @throws GridError InvalidSize when items.length !== columns * rows
   */
  static fromFlat<T>(
    items: ReadonlyArray<T>,
    columns: number,
    rows: number,
    options?: Partial<GridOptions>
  ): Grid<T> {
    return new Grid(fromFlatItems(items, columns, rows), options);
  }

  /**
   * Create a grid by repeating one row pattern.
   */
  static fromPattern<T>(
    pattern: ReadonlyArray<T>,
    rowCount: number,
    options?: Partial<GridOptions>
  ): Grid<T> {
    return new Grid(fromRowPattern(pattern, rowCount), options);
  }

  /**
   * Create a grid with every cell set to `value`.
   */
  static filled<T>(columns: number, rows: number, value: T, options?: Partial<GridOptions>): Grid<T> {
    return new Grid(fromFill(columns, rows, value), options);
  }

  // ===========================================================================
  // Shape
  // ===========================================================================

  get size(): number {
    return this.items.length;
  }

  get columns(): number {
    return this.cols;
  }

  /** Smallest valid logical x under the grid's origin. */
  get minX(): number {
    return this.range.minX;
  }

  get maxX(): number {
    return this.range.maxX;
  }

  get minY(): number {
    return this.range.minY;
  }

  get maxY(): number {
    return this.range.maxY;
  }

  // ===========================================================================
  // Index resolution
  // ===========================================================================

  /**
   * Canonical flat offset of an index.
   *
   * @throws GridError IndexOutOfBounds
   */
  offsetOf(index: GridIndex): number {
    return resolveIndex(index, this);
  }

  /**
   * Canonical flat offset of an index, or undefined if it is out of bounds.
   */
  tryOffsetOf(index: GridIndex): number | undefined {
    return tryResolveIndex(index, this);
  }

  /**
   * Logical [x, y] of a canonical offset.
   *
   * @throws GridError IndexOutOfBounds
   */
  xyOf(offset: number): XyPair {
    return XyIndex.materialize(resolveIndex(offset, this), this);
  }

  /**
   * @throws GridError IndexOutOfBounds
   */
  coordinatesOf(offset: number): Coordinates {
    return CoordinatesIndex.materialize(resolveIndex(offset, this), this);
  }

  // ===========================================================================
  // Cell access
  // ===========================================================================

  /**
   * @returns The cell value, or undefined if the index is out of bounds
   */
  get(index: GridIndex): T | undefined {
    const offset = tryResolveIndex(index, this);
    return offset === undefined ? undefined : this.items[offset];
  }

  /**
   * @throws GridError IndexOutOfBounds
   */
  set(index: GridIndex, value: T): void {
    this.items[resolveIndex(index, this)] = value;
  }

  /**
   * Mutable reference to a cell, or undefined if the index is out of bounds.
   */
  cell(index: GridIndex): CellRef<T> | undefined {
    const offset = tryResolveIndex(index, this);
    return offset === undefined ? undefined : createCellRef(this.access, offset);
  }

  /**
   * Swap two cells.
   *
   * @throws GridError IndexOutOfBounds if either index is invalid; nothing is swapped then
   */
  swap(a: GridIndex, b: GridIndex): void {
    const first = resolveIndex(a, this);
    const second = resolveIndex(b, this);
    const held = this.items[first];
    this.items[first] = this.items[second];
    this.items[second] = held;
  }

  /**
   * Iterate over all values in canonical row-major order.
   */
  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Iterate over [offset, value] pairs in canonical row-major order.
   */
  *entries(): Generator<[number, T]> {
    for (let offset = 0; offset < this.items.length; offset++) {
      yield [offset, this.items[offset]];
    }
  }

  // ===========================================================================
  // Neighbors
  // ===========================================================================

  /**
   * Canonical offset of the neighbor in a direction, or undefined when the
   * index is invalid or there is no such neighbor.
   */
  neighborOffset(index: GridIndex, direction: Direction): number | undefined {
    const offset = tryResolveIndex(index, this);
    return offset === undefined ? undefined : neighborOffset(this, offset, direction);
  }

  getNeighbor(index: GridIndex, direction: Direction): T | undefined {
    const offset = this.neighborOffset(index, direction);
    return offset === undefined ? undefined : this.items[offset];
  }

  /**
   * Mutable reference to a neighboring cell.
   */
  neighborCell(index: GridIndex, direction: Direction): CellRef<T> | undefined {
    const offset = this.neighborOffset(index, direction);
    return offset === undefined ? undefined : createCellRef(this.access, offset);
  }

  /**
   * Value one step "up". With `invertedY` and `neighborYBased` this is the
   * cell at y + 1, otherwise the storage row above.
   */
  getUp(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.Up);
  }

  getDown(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.Down);
  }

  getLeft(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.Left);
  }

  getRight(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.Right);
  }

  getUpLeft(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.UpLeft);
  }

  getUpRight(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.UpRight);
  }

  getDownLeft(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.DownLeft);
  }

  getDownRight(index: GridIndex): T | undefined {
    return this.getNeighbor(index, Direction.DownRight);
  }

  /**
   * The four cardinal neighbors, honoring wrap settings.
   *
   * @returns undefined if the index itself is out of bounds
   */
  xyNeighbors(index: GridIndex): XyNeighbors<T> | undefined {
    const offset = tryResolveIndex(index, this);
    if (offset === undefined) {
      return undefined;
    }
    const step = (direction: Direction) => neighborOffset(this, offset, direction);
    return new XyNeighbors(
      {
        up: step(Direction.Up),
        left: step(Direction.Left),
        right: step(Direction.Right),
        down: step(Direction.Down),
      },
      this.access.read
    );
  }

  /**
   * All eight neighbors, honoring wrap settings.
   *
   * @returns undefined if the index itself is out of bounds
   */
  allAroundNeighbors(index: GridIndex): AllAroundNeighbors<T> | undefined {
    const offset = tryResolveIndex(index, this);
    if (offset === undefined) {
      return undefined;
    }
    const step = (direction: Direction) => neighborOffset(this, offset, direction);
    return new AllAroundNeighbors(
      {
        upleft: step(Direction.UpLeft),
        up: step(Direction.Up),
        upright: step(Direction.UpRight),
        left: step(Direction.Left),
        right: step(Direction.Right),
        downleft: step(Direction.DownLeft),
        down: step(Direction.Down),
        downright: step(Direction.DownRight),
      },
      this.access.read
    );
  }

  // ===========================================================================
  // Partitioning
  // ===========================================================================

  /**
   * Which of the divisor × divisor regions the index falls in. Region size is
   * computed with ceiling division, so grids not evenly divisible by
   * `divisor` have smaller regions along the bottom and right.
   * For a 9×9 Sudoku board, use a divisor of 3.
   *
   * @throws GridError InvalidDivisionSize or IndexOutOfBounds
   */
  nrant(index: GridIndex, divisor: number): number {
    validateDivisor(this, divisor);
    return regionOf(this, resolveIndex(index, this), divisor);
  }

  /**
   * Region id with a divisor of 2. Options have no effect on the numbering.
   */
  quadrant(index: GridIndex): number {
    return this.nrant(index, 2);
  }

  /**
   * Canonical offset of the first cell of a region.
   *
   * @throws GridError InvalidDivisionSize or IndexOutOfBounds
   */
  regionStart(regionId: number, divisor: number): number {
    return regionStart(this, regionId, divisor);
  }

  /**
   * Values of the region containing the index, row-major within the region.
   * Slots past a ragged edge are undefined; an invalid index gives an empty
   * sequence. Where cells may themselves hold undefined, use nrantOffsets or
   * nrantIterMut to tell the two apart.
   *
   * @throws GridError InvalidDivisionSize
   */
  nrantIter(divisor: number, index: GridIndex): SlotSequence<T> {
    return new SlotSequence(this.regionSlotsOf(divisor, index), offset => this.items[offset]);
  }

  nrantIterMut(divisor: number, index: GridIndex): SlotSequence<CellRef<T>> {
    return new SlotSequence(this.regionSlotsOf(divisor, index), offset =>
      createCellRef(this.access, offset)
    );
  }

  /**
   * Canonical offsets of the region's slots; undefined only past a ragged edge.
   *
   * @throws GridError InvalidDivisionSize
   */
  nrantOffsets(divisor: number, index: GridIndex): SlotSequence<number> {
    return new SlotSequence(this.regionSlotsOf(divisor, index), offset => offset);
  }

  quadrantIter(index: GridIndex): SlotSequence<T> {
    return this.nrantIter(2, index);
  }

  private regionSlotsOf(divisor: number, index: GridIndex): () => Iterable<number | undefined> {
    validateDivisor(this, divisor);
    const offset = tryResolveIndex(index, this);
    if (offset === undefined) {
      return noOffsets;
    }
    return () => regionSlots(this, offset, divisor);
  }

  // ===========================================================================
  // Row and column iteration
  // ===========================================================================

  /**
   * Values of the row the index is on, from the start of that row.
   * An invalid index gives an empty sequence.
   */
  rowIter(index: GridIndex): CellSequence<T> {
    return new CellSequence(this.lineOffsets(index, rowOffsets), offset => this.items[offset]);
  }

  rowIterMut(index: GridIndex): CellSequence<CellRef<T>> {
    return new CellSequence(this.lineOffsets(index, rowOffsets), offset =>
      createCellRef(this.access, offset)
    );
  }

  /**
   * Values of the column the index is on, from the top storage row.
   * An invalid index gives an empty sequence.
   */
  colIter(index: GridIndex): CellSequence<T> {
    return new CellSequence(this.lineOffsets(index, columnOffsets), offset => this.items[offset]);
  }

  colIterMut(index: GridIndex): CellSequence<CellRef<T>> {
    return new CellSequence(this.lineOffsets(index, columnOffsets), offset =>
      createCellRef(this.access, offset)
    );
  }

  private lineOffsets(
    index: GridIndex,
    line: (layout: GridLayout, offset: number) => Iterable<number>
  ): () => Iterable<number> {
    const offset = tryResolveIndex(index, this);
    if (offset === undefined) {
      return noOffsets;
    }
    return () => line(this, offset);
  }
}
