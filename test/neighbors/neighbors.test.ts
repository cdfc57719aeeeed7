/**
 * Tests for neighbor getters and neighbor bundles on a Grid.
 */

import { describe, it, expect } from 'vitest';
import { Direction } from '../../src/lib/core/direction.js';
import { Origin } from '../../src/lib/core/origin.js';
import { Grid } from '../../src/lib/grid.js';
import { AllAroundNeighbors, XyNeighbors } from '../../src/lib/neighbors/bundles.js';

function fiveRows(): number[][] {
  return [
    [0, 1, 2],
    [3, 4, 5],
    [6, 7, 8],
    [9, 10, 11],
    [12, 13, 14],
  ];
}

function fourByFive(): number[][] {
  return [
    [0, 1, 2, 3],
    [4, 5, 6, 7],
    [8, 9, 10, 11],
    [12, 13, 14, 15],
    [16, 17, 18, 19],
  ];
}

function centerGrid(): Grid<number> {
  return Grid.fromRows(fiveRows(), { origin: Origin.Center, invertedY: false });
}

function wrapGrid(wrapX: boolean, wrapY: boolean): Grid<number> {
  return Grid.fromRows(fiveRows(), { wrapX, wrapY, neighborYBased: false });
}

describe('TestNeighborGetters', () => {
  it('test_should_get_up', () => {
    const grid = centerGrid();
    expect(grid.getUp([0, 0])).toBe(4);
    expect(grid.getUp([-1, 1])).toBe(0);
    expect(grid.getUp(1)).toBeUndefined();
    expect(grid.getUp([-2, 0])).toBeUndefined();
  });

  it('test_should_get_down', () => {
    const grid = centerGrid();
    expect(grid.getDown([0, 0])).toBe(10);
    expect(grid.getDown([-1, 1])).toBe(6);
    expect(grid.getDown(12)).toBeUndefined();
    expect(grid.getDown([-2, 0])).toBeUndefined();
  });

  it('test_should_get_left', () => {
    const grid = centerGrid();
    expect(grid.getLeft([0, 0])).toBe(6);
    expect(grid.getLeft([1, 1])).toBe(4);
    expect(grid.getLeft(12)).toBeUndefined();
    expect(grid.getLeft([-2, 0])).toBeUndefined();
  });

  it('test_should_get_right', () => {
    const grid = centerGrid();
    expect(grid.getRight([0, 0])).toBe(8);
    expect(grid.getRight([-1, -1])).toBe(10);
    expect(grid.getRight(11)).toBeUndefined();
    expect(grid.getRight([-2, 0])).toBeUndefined();
  });

  it('test_should_get_diagonals', () => {
    const grid = centerGrid();
    expect(grid.getUpLeft([0, 0])).toBe(3);
    expect(grid.getUpRight([0, 0])).toBe(5);
    expect(grid.getDownLeft([0, 0])).toBe(9);
    expect(grid.getDownRight([0, 0])).toBe(11);
    expect(grid.getUpLeft([-1, 2])).toBeUndefined();
  });

  it('test_should_get_up_wrap', () => {
    const grid = wrapGrid(false, true);
    expect(grid.getUp([0, 1])).toBe(0);
    expect(grid.getUp([0, 0])).toBe(12);
    expect(grid.getUp([0, 2])).toBe(3);
  });

  it('test_should_get_down_wrap', () => {
    const grid = wrapGrid(false, true);
    expect(grid.getDown([0, 3])).toBe(12);
    expect(grid.getDown([0, 4])).toBe(0);
    expect(grid.getDown([0, 0])).toBe(3);
  });

  it('test_should_get_left_wrap', () => {
    const grid = wrapGrid(true, false);
    expect(grid.getLeft([1, 0])).toBe(0);
    expect(grid.getLeft([0, 0])).toBe(2);
    expect(grid.getLeft([2, 0])).toBe(1);
  });

  it('test_should_get_right_wrap', () => {
    const grid = wrapGrid(true, false);
    expect(grid.getRight([1, 0])).toBe(2);
    expect(grid.getRight([2, 0])).toBe(0);
    expect(grid.getRight([0, 0])).toBe(1);
  });

  it('test_neighbor_offset_and_cell', () => {
    const grid = wrapGrid(true, true);
    expect(grid.neighborOffset([0, 0], Direction.UpLeft)).toBe(14);
    expect(grid.neighborOffset([5, 0], Direction.Up)).toBeUndefined();

    const cell = grid.neighborCell([1, 1], Direction.Right);
    expect(cell?.offset).toBe(5);
    if (cell) {
      cell.value = 50;
    }
    expect(grid.get([2, 1])).toBe(50);
    expect(grid.neighborCell([9, 9], Direction.Right)).toBeUndefined();
  });
});

describe('TestNeighborBasis', () => {
  it('test_lower_left_math_axis', () => {
    for (const neighborYBased of [true, false]) {
      const grid = Grid.fromRows(fiveRows(), {
        origin: Origin.LowerLeft,
        invertedY: false,
        neighborYBased,
      });
      // (2, 1) holds 11, the storage row above holds 8
      expect(grid.getUp([2, 1])).toBe(8);
      expect(grid.get([2, 4])).toBe(2);
      expect(grid.getUp([2, 4])).toBeUndefined();
    }
  });

  it('test_lower_left_inverted_y_based', () => {
    const grid = Grid.fromRows(fiveRows(), {
      origin: Origin.LowerLeft,
      invertedY: true,
      neighborYBased: true,
    });
    // Up follows y + 1, which is the storage row below here
    expect(grid.getUp([2, -1])).toBe(14);
    expect(grid.get([2, -4])).toBe(2);
    expect(grid.getUp([2, -4])).toBe(5);
  });

  it('test_lower_left_inverted_storage_based', () => {
    const grid = Grid.fromRows(fiveRows(), {
      origin: Origin.LowerLeft,
      invertedY: true,
      neighborYBased: false,
    });
    expect(grid.getUp([2, -1])).toBe(8);
    expect(grid.get([2, -4])).toBe(2);
    expect(grid.getUp([2, -4])).toBeUndefined();
  });
});

describe('TestXyNeighbors', () => {
  it('test_edge_cell', () => {
    const grid = centerGrid();
    // Neighbors of 12
    const neighbors = grid.xyNeighbors([-1, -2]);
    expect(neighbors).toBeInstanceOf(XyNeighbors);
    expect(neighbors?.up).toBe(9);
    expect(neighbors?.down).toBeUndefined();
    expect(neighbors?.left).toBeUndefined();
    expect(neighbors?.right).toBe(13);
    expect(neighbors?.presentCount()).toBe(2);
  });

  it('test_wrapped', () => {
    const grid = Grid.fromRows(fiveRows(), {
      origin: Origin.Center,
      invertedY: false,
      wrapX: true,
      wrapY: true,
    });
    const neighbors = grid.xyNeighbors([-1, -2]);
    expect(neighbors?.values()).toEqual([9, 14, 13, 0]);
  });

  it('test_out_of_bounds_center', () => {
    expect(centerGrid().xyNeighbors([5, 5])).toBeUndefined();
  });
});

describe('TestAllAroundNeighbors', () => {
  it('test_all_around', () => {
    const grid = Grid.fromRows(fourByFive(), { neighborYBased: false });
    // Neighbors of 4
    const neighbors = grid.allAroundNeighbors([0, 1]);
    expect(neighbors).toBeInstanceOf(AllAroundNeighbors);
    expect(neighbors?.upleft).toBeUndefined();
    expect(neighbors?.up).toBe(0);
    expect(neighbors?.upright).toBe(1);
    expect(neighbors?.left).toBeUndefined();
    expect(neighbors?.right).toBe(5);
    expect(neighbors?.downleft).toBeUndefined();
    expect(neighbors?.down).toBe(8);
    expect(neighbors?.downright).toBe(9);
  });

  it('test_all_around_wrap', () => {
    const grid = Grid.fromRows(fourByFive(), { neighborYBased: false, wrapX: true, wrapY: true });
    const neighbors = grid.allAroundNeighbors([0, 1]);
    expect(neighbors?.values()).toEqual([3, 0, 1, 7, 5, 11, 8, 9]);
    expect(neighbors?.presentCount()).toBe(8);
  });

  it('test_values_keep_absent_slots', () => {
    const grid = Grid.fromRows(fourByFive(), { neighborYBased: false });
    expect(grid.allAroundNeighbors(0)?.values()).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      1,
      undefined,
      4,
      5,
    ]);
  });

  it('test_out_of_bounds_center', () => {
    expect(Grid.fromRows(fourByFive()).allAroundNeighbors(20)).toBeUndefined();
  });
});

describe('TestEmptyCells', () => {
  // Cells holding undefined are present cells, not missing neighbors
  function sparseBoard(): Grid<number | undefined> {
    return Grid.fromRows<number | undefined>([
      [1, undefined, 3],
      [undefined, 5, undefined],
      [7, undefined, 9],
    ]);
  }

  it('test_xy_neighbors_count_existing_cells', () => {
    const neighbors = sparseBoard().xyNeighbors(4);
    expect(neighbors?.values()).toEqual([undefined, undefined, undefined, undefined]);
    expect(neighbors?.presentCount()).toBe(4);
    // Default basis: up is the storage row below
    expect(neighbors?.offsets).toEqual({ up: 7, left: 3, right: 5, down: 1 });
  });

  it('test_all_around_neighbors_count_existing_cells', () => {
    const board = sparseBoard();
    expect(board.allAroundNeighbors(4)?.presentCount()).toBe(8);
    expect(board.allAroundNeighbors(1)?.presentCount()).toBe(5);
  });

  it('test_offsets_mark_missing_neighbors', () => {
    const neighbors = sparseBoard().xyNeighbors(0);
    expect(neighbors?.offsets).toEqual({ up: 3, left: undefined, right: 1, down: undefined });
    expect(neighbors?.presentCount()).toBe(2);
  });

  it('test_region_slots_tell_empty_cells_from_ragged_edge', () => {
    const board = Grid.fromRows<number | undefined>([[1, undefined, undefined]]);
    expect(Array.from(board.nrantIter(2, 2))).toEqual([undefined, undefined]);
    expect(Array.from(board.nrantOffsets(2, 2))).toEqual([2, undefined]);
    expect(Array.from(board.nrantOffsets(2, 0))).toEqual([0, 1]);

    const cells = Array.from(board.nrantIterMut(2, 2));
    expect(cells[0]?.offset).toBe(2);
    expect(cells[1]).toBeUndefined();
  });
});
