/**
 * Which cell of the grid a caller's coordinate system treats as (0, 0).
 */
export enum Origin {
  UpperLeft = 'UpperLeft',
  UpperRight = 'UpperRight',
  Center = 'Center',
  LowerLeft = 'LowerLeft',
  LowerRight = 'LowerRight',
}

const ORIGINS: ReadonlySet<string> = new Set(Object.values(Origin));

/**
 * Type guard for origin names read from untyped input.
 */
export function isOrigin(value: unknown): value is Origin {
  return typeof value === 'string' && ORIGINS.has(value);
}
