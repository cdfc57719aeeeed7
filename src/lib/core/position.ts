/**
 * A signed (x, y) pair in the grid's logical coordinate system.
 */
export type XyPair = readonly [x: number, y: number];

/**
 * Named logical coordinates. Addresses the same cell as the pair `[x, y]`.
 */
export class Coordinates {
  constructor(
    public readonly x: number,
    public readonly y: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.x},${this.y}`;
  }

  equals(other: Coordinates): boolean {
    return this.x === other.x && this.y === other.y;
  }

  clone(): Coordinates {
    return new Coordinates(this.x, this.y);
  }

  toPair(): XyPair {
    return [this.x, this.y];
  }

  toString(): string {
    return `Coordinates(${this.x}, ${this.y})`;
  }
}
