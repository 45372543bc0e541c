/**
 * Error classes for the simulation core and its loaders.
 */

import type { Cell } from './types.js'

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Window or cell dimensions that cannot form a surface. Fatal at startup. */
export class SurfaceConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SurfaceConfigError'
  }
}

/** Unreadable or invalid configuration file. Fatal at startup. */
export class ConfigError extends Error {
  readonly path: string

  constructor(message: string, path: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = path
  }
}

// ---------------------------------------------------------------------------
// Grid access
// ---------------------------------------------------------------------------

export class OutOfBoundsError extends Error {
  readonly cell: Cell

  constructor(cell: Cell, width: number, height: number) {
    super(`Cell (${cell[0]}, ${cell[1]}) is out of bounds for a ${width}x${height} surface`)
    this.name = 'OutOfBoundsError'
    this.cell = cell
  }
}

// ---------------------------------------------------------------------------
// Pattern files
// ---------------------------------------------------------------------------

export class PatternParseError extends Error {
  /** 1-based line number of the offending line. */
  readonly line: number
  readonly source: string | undefined

  constructor(message: string, line: number, source?: string) {
    super(source ? `${source}:${line}: ${message}` : `line ${line}: ${message}`)
    this.name = 'PatternParseError'
    this.line = line
    this.source = source
  }
}

export class PatternNotFoundError extends Error {
  readonly path: string

  constructor(path: string) {
    super(`Pattern file not found: ${path}`)
    this.name = 'PatternNotFoundError'
    this.path = path
  }
}

/** Any other failure to read a pattern file (permissions, a directory, ...). */
export class PatternReadError extends Error {
  readonly path: string
  readonly code: string | undefined

  constructor(path: string, reason: string, code?: string) {
    super(`Cannot read pattern file ${path}: ${reason}`)
    this.name = 'PatternReadError'
    this.path = path
    this.code = code
  }
}
