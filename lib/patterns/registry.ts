/**
 * Bundled seed patterns and where each one is anchored on the surface.
 */

import * as path from 'path'
import { fileURLToPath } from 'url'

import { loadPattern, type Grid } from '@/lib/life/grid.js'
import { centreCell } from '@/lib/life/surface.js'
import type { Cell, Surface } from '@/lib/life/types.js'
import { loadPatternFile } from './loader.js'
import type { Pattern } from './parser.js'

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export type PatternId =
  | 'gosper_glider_gun'
  | 'acorn'
  | 'switch_engine'
  | 'glider'
  | 'r_pentomino'
  | 'diehard'

export interface PatternEntry {
  id: PatternId
  /** Key that loads the pattern during setup. */
  key: string
  label: string
  file: string
  anchor: (surface: Surface) => Cell
}

/** Directory of the `.lif` files shipped with the package. */
export const DEFAULT_PATTERNS_DIR = fileURLToPath(new URL('../../patterns', import.meta.url))

export const PATTERNS: readonly PatternEntry[] = [
  {
    id: 'gosper_glider_gun',
    key: 'g',
    label: 'Glider gun',
    file: 'gosperglidergun_106.lif',
    anchor: () => [20, 6],
  },
  { id: 'acorn', key: 'a', label: 'Acorn', file: 'acorn_106.lif', anchor: centreCell },
  {
    id: 'switch_engine',
    key: 's',
    label: 'Switch engine',
    file: 'switchengine_106.lif',
    anchor: centreCell,
  },
  { id: 'glider', key: 'l', label: 'Glider', file: 'glider_106.lif', anchor: () => [3, 3] },
  {
    id: 'r_pentomino',
    key: 'p',
    label: 'R-pentomino',
    file: 'rpentomino_106.lif',
    anchor: centreCell,
  },
  { id: 'diehard', key: 'd', label: 'Diehard', file: 'diehard_106.lif', anchor: centreCell },
]

export function findPattern(id: string): PatternEntry | undefined {
  return PATTERNS.find((p) => p.id === id)
}

// ---------------------------------------------------------------------------
// Seeding
// ---------------------------------------------------------------------------

export interface SeededPattern {
  grid: Grid
  pattern: Pattern
  clipped: Cell[]
}

/**
 * Read a registered pattern and place it on a fresh grid.
 *
 * Errors from reading or parsing propagate; the caller keeps its previous
 * grid in that case.
 */
export function seedPattern(
  entry: PatternEntry,
  surface: Surface,
  patternsDir: string = DEFAULT_PATTERNS_DIR,
): SeededPattern {
  const pattern = loadPatternFile(path.join(patternsDir, entry.file))
  const { grid, clipped } = loadPattern(surface, entry.anchor(surface), pattern.offsets)
  if (clipped.length > 0) {
    console.warn(
      `[patterns] ${entry.label}: ${clipped.length} cells fall outside the ${surface.width}x${surface.height} surface and were dropped`,
    )
  }
  return { grid, pattern, clipped }
}
