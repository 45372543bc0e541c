/**
 * Grid state store.
 *
 * A Grid is an immutable, total mapping from every cell of a fixed surface
 * to an alive flag, backed by a flat row-major Uint8Array
 * (index = y * width + x). Every operation that "changes" a grid returns a
 * new one; the previous generation is never written to.
 *
 * No side effects on import.
 */

import { OutOfBoundsError } from './errors.js'
import { isInSurface } from './surface.js'
import type { Cell, RandomSource, Surface } from './types.js'

// ---------------------------------------------------------------------------
// Grid value
// ---------------------------------------------------------------------------

export class Grid {
  readonly surface: Surface
  private readonly _cells: Uint8Array

  /**
   * Wrap an existing cell buffer. The buffer is owned by the new Grid and
   * must not be written to afterwards.
   */
  constructor(surface: Surface, cells?: Uint8Array) {
    const size = surface.width * surface.height
    if (cells && cells.length !== size) {
      throw new RangeError(
        `Cell buffer holds ${cells.length} entries, surface needs ${size}`,
      )
    }
    this.surface = surface
    this._cells = cells ?? new Uint8Array(size)
  }

  /** Number of cells in the mapping; always width * height. */
  get size(): number {
    return this._cells.length
  }

  /** Number of alive cells. */
  get population(): number {
    let count = 0
    for (const v of this._cells) count += v
    return count
  }

  isAlive(cell: Cell): boolean {
    return this._cells[this._indexOf(cell)] === 1
  }

  /**
   * Alive check that treats every out-of-surface coordinate as dead
   * instead of throwing. Used by neighbor enumeration.
   */
  peek(x: number, y: number): boolean {
    if (x < 0 || x >= this.surface.width || y < 0 || y >= this.surface.height) {
      return false
    }
    return this._cells[y * this.surface.width + x] === 1
  }

  /** Alive cells in row-major order. */
  liveCells(): Cell[] {
    const { width } = this.surface
    const result: Cell[] = []
    for (let i = 0; i < this._cells.length; i++) {
      if (this._cells[i] === 1) {
        result.push([i % width, Math.floor(i / width)])
      }
    }
    return result
  }

  /** Fresh copy of the backing buffer, safe to mutate. */
  snapshot(): Uint8Array {
    return this._cells.slice()
  }

  equals(other: Grid): boolean {
    if (
      other.surface.width !== this.surface.width ||
      other.surface.height !== this.surface.height
    ) {
      return false
    }
    for (let i = 0; i < this._cells.length; i++) {
      if (this._cells[i] !== other._cells[i]) return false
    }
    return true
  }

  private _indexOf(cell: Cell): number {
    if (!isInSurface(this.surface, cell)) {
      throw new OutOfBoundsError(cell, this.surface.width, this.surface.height)
    }
    return cell[1] * this.surface.width + cell[0]
  }
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function createEmpty(surface: Surface): Grid {
  return new Grid(surface)
}

/**
 * Seed floor(width * height / fraction) distinct random cells.
 *
 * Sampling rejects indices already taken, so no cell is chosen twice.
 */
export function createRandom(
  surface: Surface,
  fraction: number,
  random: RandomSource = Math.random,
): Grid {
  if (!Number.isFinite(fraction) || fraction < 1) {
    throw new RangeError(`Random fraction must be a finite number >= 1, got ${fraction}`)
  }

  const total = surface.width * surface.height
  const target = Math.floor(total / fraction)
  const cells = new Uint8Array(total)
  const chosen = new Set<number>()

  while (chosen.size < target) {
    const x = Math.floor(random() * surface.width)
    const y = Math.floor(random() * surface.height)
    const index = y * surface.width + x
    if (chosen.has(index)) continue
    chosen.add(index)
    cells[index] = 1
  }

  return new Grid(surface, cells)
}

export interface PatternLoadResult {
  grid: Grid
  /** Translated cells that fell outside the surface and were dropped. */
  clipped: Cell[]
}

/**
 * Build a grid from offsets relative to an anchor.
 *
 * Cells that land outside the surface are clipped and reported, never
 * stored; loading itself does not fail on them.
 */
export function loadPattern(
  surface: Surface,
  anchor: Cell,
  offsets: Iterable<Cell>,
): PatternLoadResult {
  const cells = new Uint8Array(surface.width * surface.height)
  const clipped: Cell[] = []
  const [ax, ay] = anchor

  for (const [dx, dy] of offsets) {
    const cell: Cell = [ax + dx, ay + dy]
    if (!isInSurface(surface, cell)) {
      clipped.push(cell)
      continue
    }
    cells[cell[1] * surface.width + cell[0]] = 1
  }

  return { grid: new Grid(surface, cells), clipped }
}

/** Flip one in-surface cell. Throws OutOfBoundsError otherwise. */
export function toggle(grid: Grid, cell: Cell): Grid {
  const alive = grid.isAlive(cell)
  const cells = grid.snapshot()
  cells[cell[1] * grid.surface.width + cell[0]] = alive ? 0 : 1
  return new Grid(grid.surface, cells)
}

// ---------------------------------------------------------------------------
// Deterministic randomness
// ---------------------------------------------------------------------------

/** 32-bit LCG in [0, 1) for reproducible seeding. */
export function seededRandom(seed: number): RandomSource {
  let s = seed | 0
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) | 0
    return (s >>> 0) / 0x100000000
  }
}
