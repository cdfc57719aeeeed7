/**
 * Neighbor directions. Up and down follow the grid's neighbor basis,
 * see `GridOptions.neighborYBased`.
 */
export enum Direction {
  Up = 'Up',
  Down = 'Down',
  Left = 'Left',
  Right = 'Right',
  UpLeft = 'UpLeft',
  UpRight = 'UpRight',
  DownLeft = 'DownLeft',
  DownRight = 'DownRight',
}

/**
 * The four cardinal directions, in neighbor-bundle order.
 */
export const CARDINAL_DIRECTIONS: readonly Direction[] = Object.freeze([
  Direction.Up,
  Direction.Left,
  Direction.Right,
  Direction.Down,
]);

/**
 * All eight directions, upper row first, left to right.
 */
export const ALL_AROUND_DIRECTIONS: readonly Direction[] = Object.freeze([
  Direction.UpLeft,
  Direction.Up,
  Direction.UpRight,
  Direction.Left,
  Direction.Right,
  Direction.DownLeft,
  Direction.Down,
  Direction.DownRight,
]);

/**
 * Get the opposite direction.
 */
export function flipDirection(dir: Direction): Direction {
  switch (dir) {
    case Direction.Up:
      return Direction.Down;
    case Direction.Down:
      return Direction.Up;
    case Direction.Left:
      return Direction.Right;
    case Direction.Right:
      return Direction.Left;
    case Direction.UpLeft:
      return Direction.DownRight;
    case Direction.UpRight:
      return Direction.DownLeft;
    case Direction.DownLeft:
      return Direction.UpRight;
    case Direction.DownRight:
      return Direction.UpLeft;
  }
}
