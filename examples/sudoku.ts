/**
 * Sudoku board validation through row, column and region iteration.
 *
 * Run with: npm run example:sudoku
 */

import { Grid, exportGrid, parseGridWith } from '../src/lib/index.js';

function isComplete(values: Iterable<number | undefined>): boolean {
  const seen = new Set<number>();
  for (const value of values) {
    if (value === undefined || value < 1 || value > 9 || seen.has(value)) {
      return false;
    }
    seen.add(value);
  }
  return seen.size === 9;
}

function isSolved(board: Grid<number>): boolean {
  for (let i = 0; i < 9; i++) {
    // Row i, column i and the first cell of region i
    if (!isComplete(board.rowIter(i * 9))) return false;
    if (!isComplete(board.colIter(i))) return false;
    if (!isComplete(board.nrantIter(3, board.regionStart(i, 3)))) return false;
  }
  return true;
}

// Shifted-row construction always yields a valid solution
const rows: string[] = [];
for (let row = 0; row < 9; row++) {
  const cells: number[] = [];
  for (let col = 0; col < 9; col++) {
    cells.push(((row * 3 + Math.floor(row / 3) + col) % 9) + 1);
  }
  rows.push(cells.join(' '));
}

const board = parseGridWith(rows.join('|'), cellStr => Number(cellStr));

console.log('=== Solved board ===\n');
console.log(exportGrid(board).split('|').join('\n'));
console.log('\nValid?', isSolved(board));

board.swap([0, 0], [1, 0]);
console.log('\nAfter swapping two cells of the first row:');
console.log('Valid?', isSolved(board));
