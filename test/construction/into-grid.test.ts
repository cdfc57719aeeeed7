/**
 * Tests for grid construction from input sequences.
 */

import { describe, it, expect } from 'vitest';
import { MAX_GRID_CELLS, checkShape } from '../../src/lib/construction/into-grid.js';
import { Origin } from '../../src/lib/core/origin.js';
import { Grid } from '../../src/lib/grid.js';
import { expectGridError } from '../support/grid-error.js';

function simple2d(): number[][] {
  return [
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ];
}

describe('TestFromRows', () => {
  it('test_should_create_new_from_2d_rows', () => {
    const grid = Grid.fromRows(simple2d());
    expect(grid.size).toBe(9);
    expect(grid.rows).toBe(3);
    expect(grid.columns).toBe(3);
    expect(Array.from(grid)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('test_should_error_on_uneven_rows', () => {
    const rows = simple2d();
    rows[2].push(10);
    expectGridError(() => Grid.fromRows(rows), 'RowSizeMismatch');
  });

  it('test_should_error_on_empty_rows', () => {
    expectGridError(() => Grid.fromRows([]), 'InvalidSize');
    expectGridError(() => Grid.fromRows([[], []]), 'InvalidSize');
  });

  it('test_does_not_alias_input', () => {
    const rows = simple2d();
    const grid = Grid.fromRows(rows);
    rows[0][0] = 99;
    expect(grid.get(0)).toBe(1);
  });
});

describe('TestFromFlat', () => {
  it('test_should_create_grid', () => {
    const grid = Grid.fromFlat([0, 1, 2, 3, 4, 5], 3, 2);
    expect(grid.rows).toBe(2);
    expect(grid.cols).toBe(3);
    expect(grid.get([2, 1])).toBe(5);
  });

  it('test_should_error_on_size_mismatch', () => {
    expectGridError(() => Grid.fromFlat([0, 1, 2, 3, 4], 3, 2), 'InvalidSize');
    expectGridError(() => Grid.fromFlat([], 0, 0), 'InvalidSize');
  });

  it('test_does_not_alias_input', () => {
    const items = [1, 2, 3, 4];
    const grid = Grid.fromFlat(items, 2, 2);
    items[0] = 99;
    grid.set(1, 42);
    expect(grid.get(0)).toBe(1);
    expect(items[1]).toBe(2);
  });
});

describe('TestFromPattern', () => {
  it('test_should_create_grid', () => {
    const grid = Grid.fromPattern([1, 2, 3], 4);
    expect(grid.size).toBe(12);
    expect(grid.rows).toBe(4);
    expect(grid.cols).toBe(3);
    expect(Array.from(grid)).toEqual([1, 2, 3, 1, 2, 3, 1, 2, 3, 1, 2, 3]);
  });

  it('test_should_error_on_empty_pattern', () => {
    expectGridError(() => Grid.fromPattern([], 5), 'InvalidSize');
  });

  it('test_should_error_on_no_rows', () => {
    expectGridError(() => Grid.fromPattern([1, 2, 3], 0), 'InvalidSize');
  });
});

describe('TestFilled', () => {
  it('test_fills_every_cell', () => {
    const grid = Grid.filled(3, 2, 'x');
    expect(grid.size).toBe(6);
    expect(Array.from(grid)).toEqual(['x', 'x', 'x', 'x', 'x', 'x']);
  });

  it('test_non_integer_shape', () => {
    expectGridError(() => Grid.filled(2.5, 2, 0), 'InvalidSize');
  });
});

describe('TestSizeLimits', () => {
  it('test_excessive_product', () => {
    expectGridError(() => Grid.filled(2 ** 16, 2 ** 16, 0), 'ExcessiveSize');
  });

  it('test_excessive_single_axis', () => {
    expectGridError(() => Grid.filled(MAX_GRID_CELLS, 1, 0), 'ExcessiveSize');
    expectGridError(() => Grid.fromFlat([], 1, MAX_GRID_CELLS), 'ExcessiveSize');
  });

  it('test_infinite_axis_is_excessive', () => {
    expectGridError(() => Grid.filled(Infinity, 1, 0), 'ExcessiveSize');
    expectGridError(() => checkShape(3, Infinity), 'ExcessiveSize');
    expectGridError(() => checkShape(Number.NaN, 3), 'InvalidSize');
  });

  it('test_check_shape_returns_size', () => {
    expect(checkShape(1000, 2 ** 16 - 1)).toBe(65_535_000);
    expectGridError(() => checkShape(-1, 3), 'InvalidSize');
  });
});

describe('TestCenterOrigin', () => {
  it('test_requires_odd_dimensions', () => {
    expectGridError(() => Grid.filled(4, 5, 0, { origin: Origin.Center }), 'InvalidSize');
    expectGridError(() => Grid.filled(3, 4, 0, { origin: Origin.Center }), 'InvalidSize');
    expect(Grid.filled(3, 5, 0, { origin: Origin.Center }).size).toBe(15);
  });
});
