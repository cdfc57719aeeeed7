/**
 * Conversion of input sequences into flat row-major storage.
 *
 * Every converter validates its input and returns a fresh array, so the
 * grid never aliases caller storage.
 */

import { GridError } from '../core/errors.js';

/**
 * Cell count ceiling. Grids at or above this many cells, rows or columns are refused.
 */
export const MAX_GRID_CELLS = 2 ** 31 - 1;

/**
 * Flat storage plus the shape it was built with.
 */
export interface GridStorage<T> {
  readonly items: T[];
  readonly rows: number;
  readonly cols: number;
}

/**
 * Validate a requested shape.
 *
 * @returns The total cell count
 * @throws GridError ExcessiveSize or InvalidSize
 */
export function checkShape(rows: number, cols: number): number {
  if (rows >= MAX_GRID_CELLS || cols >= MAX_GRID_CELLS) {
    throw new GridError('ExcessiveSize', `${cols} columns × ${rows} rows`);
  }
  if (!Number.isInteger(rows) || !Number.isInteger(cols)) {
    throw new GridError('InvalidSize', `${cols} columns × ${rows} rows`);
  }
  const size = rows * cols;
  if (size >= MAX_GRID_CELLS) {
    throw new GridError('ExcessiveSize', `${size} cells`);
  }
  if (rows < 1 || cols < 1) {
    throw new GridError('InvalidSize', `${cols} columns × ${rows} rows`);
  }
  return size;
}

/**
 * Flatten rectangular nested rows.
 */
export function fromNestedRows<T>(rows: ReadonlyArray<ReadonlyArray<T>>): GridStorage<T> {
  if (rows.length === 0) {
    throw new GridError('InvalidSize', 'no rows');
  }
  const cols = rows[0].length;
  if (cols === 0) {
    throw new GridError('InvalidSize', 'empty first row');
  }
  checkShape(rows.length, cols);

  const items: T[] = [];
  for (const [rowIdx, row] of rows.entries()) {
    if (row.length !== cols) {
      throw new GridError(
        'RowSizeMismatch',
        `row ${rowIdx}: expected ${cols}, got ${row.length}`
      );
    }
    for (const item of row) {
      items.push(item);
    }
  }
  return { items, rows: rows.length, cols };
}

/**
 * Copy a flat row-major sequence with an explicit shape.
 */
export function fromFlatItems<T>(items: ReadonlyArray<T>, cols: number, rows: number): GridStorage<T> {
  const size = checkShape(rows, cols);
  if (items.length !== size) {
    throw new GridError(
      'InvalidSize',
      `${items.length} items for ${cols} columns × ${rows} rows`
    );
  }
  return { items: items.slice(), rows, cols };
}

/**
 * Replicate one row pattern `rowCount` times.
 */
export function fromRowPattern<T>(pattern: ReadonlyArray<T>, rowCount: number): GridStorage<T> {
  if (pattern.length === 0 || rowCount === 0) {
    throw new GridError('InvalidSize', `pattern of ${pattern.length} × ${rowCount} rows`);
  }
  checkShape(rowCount, pattern.length);

  const items: T[] = [];
  for (let row = 0; row < rowCount; row++) {
    for (const item of pattern) {
      items.push(item);
    }
  }
  return { items, rows: rowCount, cols: pattern.length };
}

/**
 * Fill every cell with one value.
 */
export function fromFill<T>(cols: number, rows: number, value: T): GridStorage<T> {
  const size = checkShape(rows, cols);
  return { items: new Array<T>(size).fill(value), rows, cols };
}
