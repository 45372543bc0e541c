/**
 * Rule engine: B3/S23 on a bounded surface with sparse neighbor counting.
 *
 * Only live cells and their Moore neighborhoods are visited, so the cost of
 * a generation scales with the population rather than the surface area.
 *
 * Rules:
 *   1. A live cell with fewer than two live neighbours dies.
 *   2. A live cell with two or three live neighbours lives on.
 *   3. A live cell with more than three live neighbours dies.
 *   4. A dead cell with exactly three live neighbours is born, provided it
 *      lies inside the surface. Edges are hard boundaries, not a torus.
 */

import { Grid } from './grid.js'
import { isInSurface } from './surface.js'
import { type Cell, cellKey } from './types.js'

// ---------------------------------------------------------------------------
// Neighborhood
// ---------------------------------------------------------------------------

export const MOORE_OFFSETS: readonly Cell[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
]

/** The 8 neighbours of a cell. Some may lie outside any surface. */
export function neighbours(cell: Cell): Cell[] {
  const [x, y] = cell
  return MOORE_OFFSETS.map(([dx, dy]): Cell => [x + dx, y + dy])
}

// ---------------------------------------------------------------------------
// Counting
// ---------------------------------------------------------------------------

export interface CellCount {
  cell: Cell
  count: number
}

export interface NeighbourCounts {
  /** Live cell -> number of live neighbours. */
  live: Map<string, CellCount>
  /** Dead cell adjacent to life -> number of live neighbours. */
  dead: Map<string, CellCount>
}

/**
 * Count live neighbours for every live cell and every dead cell touching
 * one. Reads the grid only.
 */
export function countNeighbours(grid: Grid): NeighbourCounts {
  const live = new Map<string, CellCount>()
  const dead = new Map<string, CellCount>()

  const alive = grid.liveCells()
  for (const cell of alive) {
    live.set(cellKey(cell[0], cell[1]), { cell, count: 0 })
  }

  for (const cell of alive) {
    const self = live.get(cellKey(cell[0], cell[1]))
    if (!self) continue

    for (const n of neighbours(cell)) {
      if (grid.peek(n[0], n[1])) {
        self.count++
        continue
      }
      const key = cellKey(n[0], n[1])
      const candidate = dead.get(key)
      if (candidate) {
        candidate.count++
      } else {
        dead.set(key, { cell: n, count: 1 })
      }
    }
  }

  return { live, dead }
}

// ---------------------------------------------------------------------------
// Transition
// ---------------------------------------------------------------------------

/**
 * Compute the next generation.
 *
 * Total and deterministic: the input grid is never modified, and calling
 * this twice on the same grid yields equal results.
 */
export function advance(grid: Grid): Grid {
  const { width } = grid.surface
  const { live, dead } = countNeighbours(grid)
  const next = grid.snapshot()

  for (const { cell, count } of live.values()) {
    if (count < 2 || count > 3) {
      next[cell[1] * width + cell[0]] = 0
    }
  }

  for (const { cell, count } of dead.values()) {
    if (count === 3 && isInSurface(grid.surface, cell)) {
      next[cell[1] * width + cell[0]] = 1
    }
  }

  return new Grid(grid.surface, next)
}
