import { describe, it, expect } from 'vitest'
import {
  advance,
  countNeighbours,
  createEmpty,
  loadPattern,
  neighbours,
  type Cell,
  type Grid,
  type Surface,
} from '@/lib/life'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function gridOf(surface: Surface, cells: Cell[]): Grid {
  return loadPattern(surface, [0, 0], cells).grid
}

function step(grid: Grid, generations: number): Grid {
  let current = grid
  for (let i = 0; i < generations; i++) current = advance(current)
  return current
}

const TEN: Surface = { width: 10, height: 10 }

// ---------------------------------------------------------------------------
// Neighborhood
// ---------------------------------------------------------------------------

describe('neighbours', () => {
  it('returns the eight surrounding cells', () => {
    expect(neighbours([0, 0])).toEqual([
      [-1, -1], [0, -1], [1, -1],
      [-1, 0], [1, 0],
      [-1, 1], [0, 1], [1, 1],
    ])
  })
})

describe('countNeighbours', () => {
  it('counts live neighbours of every live cell', () => {
    const { live } = countNeighbours(gridOf(TEN, [[4, 5], [5, 5], [6, 5]]))
    expect(live.get('4,5')?.count).toBe(1)
    expect(live.get('5,5')?.count).toBe(2)
    expect(live.get('6,5')?.count).toBe(1)
  })

  it('tracks dead candidates beyond the surface edge', () => {
    const { dead } = countNeighbours(gridOf(TEN, [[0, 4], [0, 5], [0, 6]]))
    expect(dead.get('-1,5')).toEqual({ cell: [-1, 5], count: 3 })
    expect(dead.get('1,5')?.count).toBe(3)
  })

  it('is empty for an empty grid', () => {
    const { live, dead } = countNeighbours(createEmpty(TEN))
    expect(live.size).toBe(0)
    expect(dead.size).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Transition
// ---------------------------------------------------------------------------

describe('advance', () => {
  it('keeps the grid size fixed', () => {
    const next = advance(gridOf(TEN, [[1, 1], [2, 1], [3, 1]]))
    expect(next.size).toBe(100)
    expect(next.surface).toEqual(TEN)
  })

  it('leaves an empty grid empty', () => {
    expect(advance(createEmpty(TEN)).population).toBe(0)
  })

  it('keeps a block unchanged', () => {
    const block = gridOf(TEN, [[1, 1], [2, 1], [1, 2], [2, 2]])
    expect(advance(block).equals(block)).toBe(true)
  })

  it('oscillates a blinker with period two', () => {
    const horizontal = gridOf(TEN, [[4, 5], [5, 5], [6, 5]])
    const vertical = advance(horizontal)
    expect(vertical.liveCells()).toEqual([[5, 4], [5, 5], [5, 6]])
    expect(advance(vertical).equals(horizontal)).toBe(true)
  })

  it('kills a lone cell', () => {
    expect(advance(gridOf(TEN, [[5, 5]])).population).toBe(0)
  })

  it('kills a cell with more than three neighbours', () => {
    const plus = gridOf(TEN, [[5, 4], [4, 5], [5, 5], [6, 5], [5, 6]])
    const next = advance(plus)
    expect(next.isAlive([5, 5])).toBe(false)
    expect(next.isAlive([4, 5])).toBe(true)
  })

  it('suppresses births past the left edge', () => {
    const next = advance(gridOf(TEN, [[0, 4], [0, 5], [0, 6]]))
    expect(next.liveCells()).toEqual([[0, 5], [1, 5]])
  })

  it('suppresses births past the right edge', () => {
    const next = advance(gridOf(TEN, [[9, 4], [9, 5], [9, 6]]))
    expect(next.liveCells()).toEqual([[8, 5], [9, 5]])
  })

  it('does not modify its input', () => {
    const grid = gridOf(TEN, [[4, 5], [5, 5], [6, 5]])
    advance(grid)
    expect(grid.liveCells()).toEqual([[4, 5], [5, 5], [6, 5]])
  })

  it('is deterministic', () => {
    const grid = gridOf(TEN, [[2, 1], [3, 2], [1, 3], [2, 3], [3, 3], [7, 7], [8, 7]])
    expect(advance(grid).equals(advance(grid))).toBe(true)
  })

  it('moves a glider one cell diagonally every four generations', () => {
    const surface = { width: 20, height: 20 }
    const glider: Cell[] = [[0, -1], [1, 0], [-1, 1], [0, 1], [1, 1]]
    const start = loadPattern(surface, [3, 3], glider).grid
    const expected = loadPattern(surface, [4, 4], glider).grid
    expect(step(start, 4).equals(expected)).toBe(true)
  })
})
