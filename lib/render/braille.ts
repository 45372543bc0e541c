/**
 * Braille encoding of a grid for terminal output.
 *
 * Each terminal character covers a 2x4 block of cells:
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern. Only live cells are visited.
 */

import type { Grid } from '@/lib/life/grid.js'
import type { Cell } from '@/lib/life/types.js'

export const BRAILLE_BASE = 0x2800

const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

export interface BrailleFrame {
  /** One string per terminal row, each `columns` characters long. */
  lines: string[]
  columns: number
  /** Character position holding the cursor cell, if any. */
  cursor: { column: number; row: number } | null
}

/** Terminal size needed to show a surface: [columns, rows]. */
export function brailleSize(width: number, height: number): [number, number] {
  return [Math.ceil(width / 2), Math.ceil(height / 4)]
}

export function renderBraille(grid: Grid, cursor: Cell | null = null): BrailleFrame {
  const [columns, rows] = brailleSize(grid.surface.width, grid.surface.height)
  const codes = new Uint16Array(columns * rows).fill(BRAILLE_BASE)

  for (const [x, y] of grid.liveCells()) {
    codes[Math.floor(y / 4) * columns + Math.floor(x / 2)] |= DOT_BITS[x % 2][y % 4]
  }

  const lines: string[] = []
  for (let row = 0; row < rows; row++) {
    lines.push(String.fromCharCode(...codes.subarray(row * columns, (row + 1) * columns)))
  }

  return {
    lines,
    columns,
    cursor: cursor
      ? { column: Math.floor(cursor[0] / 2), row: Math.floor(cursor[1] / 4) }
      : null,
  }
}
