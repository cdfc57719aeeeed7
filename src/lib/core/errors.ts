/**
 * Grid failure information.
 */

/**
 * Reasons a grid operation can fail.
 */
export type GridErrorKind =
  | 'IndexOutOfBounds'
  | 'RowSizeMismatch'
  | 'InvalidSize'
  | 'ExcessiveSize'
  | 'InvalidDivisionSize';

const MESSAGES: Readonly<Record<GridErrorKind, string>> = {
  IndexOutOfBounds: 'Index out of bounds',
  RowSizeMismatch: 'Row size must match other rows',
  InvalidSize: 'Invalid grid size',
  ExcessiveSize: 'Resulting grid is too large',
  InvalidDivisionSize: 'Divisor is either less than 1 or larger than the grid',
};

/**
 * Error thrown by construction, explicit resolution and mutation calls.
 */
export class GridError extends Error {
  constructor(
    public readonly kind: GridErrorKind,
    public readonly details?: string
  ) {
    super(details ? `${MESSAGES[kind]}: ${details}` : MESSAGES[kind]);
    this.name = 'GridError';
  }
}

/**
 * Type guard to check if a value is a GridError, optionally of one kind.
 */
export function isGridError(value: unknown, kind?: GridErrorKind): value is GridError {
  return value instanceof GridError && (kind === undefined || value.kind === kind);
}
