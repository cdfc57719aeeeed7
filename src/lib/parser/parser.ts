/**
 * Compact text format for grids.
 *
 * Format:
 * - Rows separated by |, first row on top
 * - Cells separated by single spaces
 * - Adjacent spaces produce empty-string cells
 *
 * Example: "1 2 3|4 5 6" is a 3-column, 2-row grid.
 */

import { GridError } from '../core/errors.js';
import type { GridOptions } from '../core/options.js';
import { Grid } from '../grid.js';

/**
 * Convert one cell string to a cell value.
 */
export type CellParser<T> = (cellStr: string, row: number, col: number) => T;

/**
 * Parse a grid of strings from the compact format.
 *
 * @throws GridError InvalidSize for an empty definition, RowSizeMismatch for ragged rows
 */
export function parseGrid(definition: string, options?: Partial<GridOptions>): Grid<string> {
  return parseGridWith(definition, cellStr => cellStr, options);
}

/**
 * Parse a grid from the compact format, converting each cell with `parseCell`.
 */
export function parseGridWith<T>(
  definition: string,
  parseCell: CellParser<T>,
  options?: Partial<GridOptions>
): Grid<T> {
  if (definition.length === 0) {
    throw new GridError('InvalidSize', 'empty grid definition');
  }

  const rowStrings = definition.split('|');
  const rows = rowStrings.map((rowStr, rowIdx) =>
    rowStr.split(' ').map((cellStr, colIdx) => parseCell(cellStr, rowIdx, colIdx))
  );

  const cols = rows[0].length;
  const mismatched = rows
    .map((row, rowIdx) => [rowIdx, row.length] as const)
    .filter(([, length]) => length !== cols);

  if (mismatched.length > 0) {
    const details = mismatched
      .map(([rowIdx, length]) => `row ${rowIdx} has ${length} cells - "${rowStrings[rowIdx]}"`)
      .join('; ');
    throw new GridError('RowSizeMismatch', `expected ${cols} cells per row (from row 0); ${details}`);
  }

  return Grid.fromRows(rows, options);
}

/**
 * Export a grid to the compact format (inverse of parseGrid), in canonical
 * row order regardless of origin.
 *
 * @example
 * exportGrid(parseGrid('1 2|3 4')) // '1 2|3 4'
 */
export function exportGrid<T>(grid: Grid<T>, format: (value: T) => string = String): string {
  const rowStrings: string[] = [];

  for (let row = 0; row < grid.rows; row++) {
    rowStrings.push(Array.from(grid.rowIter(row * grid.cols), format).join(' '));
  }

  return rowStrings.join('|');
}
