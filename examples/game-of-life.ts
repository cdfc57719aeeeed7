/**
 * Conway's Game of Life on a toroidal board.
 *
 * Run with: npm run example:life
 */

import { Grid } from '../src/lib/index.js';

const SIZE = 8;
const GENERATIONS = 4;

function render(board: Grid<boolean>): string {
  const lines: string[] = [];
  for (let row = 0; row < board.rows; row++) {
    lines.push(Array.from(board.rowIter(row * board.cols), alive => (alive ? '#' : '.')).join(''));
  }
  return lines.join('\n');
}

function step(board: Grid<boolean>): Grid<boolean> {
  const next = Grid.filled(board.cols, board.rows, false, board.options);

  for (const [offset, alive] of board.entries()) {
    const neighbors = board.allAroundNeighbors(offset);
    const living = neighbors ? neighbors.values().filter(v => v === true).length : 0;
    next.set(offset, living === 3 || (alive && living === 2));
  }

  return next;
}

let board = Grid.filled(SIZE, SIZE, false, { wrapX: true, wrapY: true });

// Glider, default options: y grows downward from the upper-left corner
for (const [x, y] of [[1, 0], [2, 1], [0, 2], [1, 2], [2, 2]] as const) {
  board.set([x, y], true);
}

console.log('=== Generation 0 ===\n');
console.log(render(board));

for (let gen = 1; gen <= GENERATIONS; gen++) {
  board = step(board);
  console.log(`\n=== Generation ${gen} ===\n`);
  console.log(render(board));
}
