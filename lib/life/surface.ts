/**
 * Surface construction and the boundary predicate.
 */

import { SurfaceConfigError } from './errors.js'
import type { Cell, Surface, WindowGeometry } from './types.js'

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0
}

/**
 * Derive the cell surface from a pixel window.
 *
 * Throws SurfaceConfigError unless every dimension is a positive integer
 * and the cell size divides both window dimensions exactly.
 */
export function createSurface(geometry: WindowGeometry): Surface {
  const { width, height, cellSize } = geometry

  if (!isPositiveInteger(cellSize)) {
    throw new SurfaceConfigError(`Cell size must be a positive integer, got ${cellSize}`)
  }
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new SurfaceConfigError(
      `Window dimensions must be positive integers, got ${width}x${height}`,
    )
  }
  if (width % cellSize !== 0) {
    throw new SurfaceConfigError(
      `Window width ${width} must be a multiple of cell size ${cellSize}`,
    )
  }
  if (height % cellSize !== 0) {
    throw new SurfaceConfigError(
      `Window height ${height} must be a multiple of cell size ${cellSize}`,
    )
  }

  return { width: width / cellSize, height: height / cellSize }
}

/** True for integer cells inside `[0, width) x [0, height)`. */
export function isInSurface(surface: Surface, cell: Cell): boolean {
  const [x, y] = cell
  if (!Number.isInteger(x) || !Number.isInteger(y)) return false
  return x >= 0 && x < surface.width && y >= 0 && y < surface.height
}

/** Integer centre cell, rounding down like the pattern anchors expect. */
export function centreCell(surface: Surface): Cell {
  return [Math.floor(surface.width / 2), Math.floor(surface.height / 2)]
}
