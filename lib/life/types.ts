/**
 * Core value types shared by the grid store and the rule engine.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

/** Integer cell coordinate `[x, y]`. May lie outside a surface. */
export type Cell = readonly [x: number, y: number]

/** Stringified coordinate for Map/Set keys. */
export function cellKey(x: number, y: number): string {
  return `${x},${y}`
}

// ---------------------------------------------------------------------------
// Surface
// ---------------------------------------------------------------------------

/**
 * The fixed rectangle of valid cells, `[0, width) x [0, height)`.
 *
 * Life cannot exist outside it.
 */
export interface Surface {
  readonly width: number
  readonly height: number
}

/** Pixel geometry a surface is derived from. */
export interface WindowGeometry {
  /** Window width in pixels. */
  width: number
  /** Window height in pixels. */
  height: number
  /** Side of one cell in pixels; must divide both window dimensions. */
  cellSize: number
}

// ---------------------------------------------------------------------------
// Randomness
// ---------------------------------------------------------------------------

/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number
