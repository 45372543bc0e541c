/**
 * Reads pattern files from disk.
 */

import { readFileSync } from 'fs'

import { PatternNotFoundError, PatternReadError } from '@/lib/life/errors.js'
import { parseLife106, type Pattern } from './parser.js'

/**
 * Load and parse a Life 1.06 file.
 *
 * Throws PatternNotFoundError for a missing file, PatternReadError for any
 * other I/O failure and PatternParseError for malformed content.
 */
export function loadPatternFile(path: string): Pattern {
  let text: string
  try {
    text = readFileSync(path, 'utf-8')
  } catch (err) {
    const error = err as NodeJS.ErrnoException
    if (error.code === 'ENOENT') {
      throw new PatternNotFoundError(path)
    }
    console.error(`[patterns] Failed to read ${path}:`, error.message)
    throw new PatternReadError(path, error.message, error.code)
  }

  const pattern = parseLife106(text, path)
  console.debug(`[patterns] Loaded ${pattern.offsets.length} cells from ${path}`)
  return pattern
}
