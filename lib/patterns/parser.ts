/**
 * Parser for the Life 1.06 pattern format.
 *
 * Each data line holds two whitespace-separated signed integers `dx dy`,
 * relative to an anchor chosen at load time. Lines beginning with `#` are
 * comments; `#N` names the pattern and `#C` / `#D` describe it. Blank lines
 * are skipped. There is no header and no cell count: the whole text is read.
 *
 * https://conwaylife.com/wiki/Life_1.06
 */

import { PatternParseError } from '@/lib/life/errors.js'
import type { Cell } from '@/lib/life/types.js'

export interface Pattern {
  name: string | null
  description: string[]
  offsets: Cell[]
}

const INTEGER = /^[+-]?\d+$/

/**
 * Parse a whole pattern text. Any malformed line fails the entire parse,
 * so a caller never sees a partially applied pattern.
 */
export function parseLife106(text: string, source?: string): Pattern {
  const pattern: Pattern = { name: null, description: [], offsets: [] }
  const lines = text.split('\n')

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, '')

    if (line.startsWith('#')) {
      readComment(line, pattern)
      continue
    }
    if (line.trim() === '') continue

    const fields = line.trim().split(/\s+/)
    if (fields.length !== 2 || !INTEGER.test(fields[0]) || !INTEGER.test(fields[1])) {
      throw new PatternParseError(`expected two integers "dx dy", got "${line.trim()}"`, i + 1, source)
    }
    pattern.offsets.push([Number(fields[0]), Number(fields[1])])
  }

  return pattern
}

function readComment(line: string, pattern: Pattern): void {
  const tag = line.slice(1, 2)
  const body = line.slice(2).trim()
  if (tag === 'N' && body) {
    pattern.name = body
  } else if ((tag === 'C' || tag === 'D') && body) {
    pattern.description.push(body)
  }
}
