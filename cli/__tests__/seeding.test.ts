import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import * as os from 'os'
import * as path from 'path'

import { seedFromPattern, seedRandom } from '../lib/seeding'
import { seededRandom } from '@/lib/life/grid'
import { DEFAULT_PATTERNS_DIR, findPattern, type PatternEntry } from '@/lib/patterns/registry'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

const SURFACE = { width: 102, height: 56 }

function makeConfig(patternsDir: string = DEFAULT_PATTERNS_DIR) {
  return { surface: SURFACE, startFraction: 8, patternsDir }
}

function entry(id: string): PatternEntry {
  const found = findPattern(id)
  if (!found) throw new Error(`pattern ${id} not registered`)
  return found
}

let dir: string

beforeEach(() => {
  dir = mkdtempSync(path.join(os.tmpdir(), 'life-seeding-'))
  vi.spyOn(console, 'debug').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// seedRandom
// ---------------------------------------------------------------------------

describe('seedRandom', () => {
  it('fills an eighth of the surface', () => {
    const result = seedRandom(makeConfig(), seededRandom(1))
    expect(result).toMatchObject({ ok: true, label: 'random', message: 'Seeded 714 random cells' })
  })
})

// ---------------------------------------------------------------------------
// seedFromPattern
// ---------------------------------------------------------------------------

describe('seedFromPattern', () => {
  it('loads a bundled pattern under its file name', () => {
    const result = seedFromPattern(entry('acorn'), makeConfig())
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.label).toBe('Acorn')
    expect(result.message).toBe('Loaded Acorn')
    expect(result.grid.population).toBe(7)
  })

  it('reports cells dropped at the edge', () => {
    writeFileSync(path.join(dir, 'glider_106.lif'), '#N Wide\n0 0\n200 0\n')
    const result = seedFromPattern(entry('glider'), makeConfig(dir))
    expect(result).toMatchObject({
      ok: true,
      label: 'Wide',
      message: 'Loaded Wide (1 cells outside the surface dropped)',
    })
  })

  it('falls back to the registry label for unnamed files', () => {
    writeFileSync(path.join(dir, 'diehard_106.lif'), '0 0\n')
    const result = seedFromPattern(entry('diehard'), makeConfig(dir))
    expect(result).toMatchObject({ ok: true, label: 'Diehard', message: 'Loaded Diehard' })
  })

  it('turns a missing file into a failed result', () => {
    const result = seedFromPattern(entry('glider'), makeConfig(dir))
    expect(result).toEqual({
      ok: false,
      message: `Pattern file not found: ${path.join(dir, 'glider_106.lif')}`,
    })
  })

  it('turns an unreadable pattern path into a failed result', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const file = path.join(dir, 'glider_106.lif')
    mkdirSync(file)
    const result = seedFromPattern(entry('glider'), makeConfig(dir))
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.message.startsWith(`Cannot read pattern file ${file}: `)).toBe(true)
  })

  it('turns a malformed file into a failed result', () => {
    const file = path.join(dir, 'rpentomino_106.lif')
    writeFileSync(file, '0 0\n1\n')
    const result = seedFromPattern(entry('r_pentomino'), makeConfig(dir))
    expect(result).toEqual({
      ok: false,
      message: `${file}:2: expected two integers "dx dy", got "1"`,
    })
  })
})
