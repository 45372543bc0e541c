/**
 * Chalk-based color mappers for terminal (Ink) rendering.
 *
 * All functions are curried: `liveCellColor()('⣿')` returns a red glyph.
 *
 * Requires chalk@5+ (ESM). No side effects on import.
 */

import chalk from 'chalk'

import { type ThemeMode, type ThemeTokens, THEME_TOKENS, detectThemeMode } from './tokens.js'

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Lazy-resolved mode so callers don't need to pass it everywhere. */
let _resolvedMode: ThemeMode | null = null

function mode(): ThemeMode {
  if (_resolvedMode === null) {
    _resolvedMode = detectThemeMode()
  }
  return _resolvedMode
}

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

export function liveCellColor(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].cell.live
  return (text: string) => chalk.hex(hex)(text)
}

/** Inverted badge style for the glyph under the setup cursor. */
export function cursorColor(): (text: string) => string {
  const { cursor, cursorText } = THEME_TOKENS[mode()].cell
  return (text: string) => chalk.bgHex(cursor).hex(cursorText)(text)
}

// ---------------------------------------------------------------------------
// Status colors
// ---------------------------------------------------------------------------

const STATUS_MAP: Record<string, (tokens: ThemeTokens) => string> = {
  success: (t) => t.status.success,
  error:   (t) => t.status.error,
  info:    (t) => t.status.info,
}

/** Hex color for a status, or the secondary text color if unrecognized. */
export function statusHex(status: string, themeMode: ThemeMode = mode()): string {
  const tokens = THEME_TOKENS[themeMode]
  const resolver = STATUS_MAP[status.toLowerCase()]
  return resolver ? resolver(tokens) : tokens.text.secondary
}

/** Return a chalk formatter for status-colored text. */
export function statusColor(status: string): (text: string) => string {
  const hex = statusHex(status)
  return (text: string) => chalk.hex(hex)(text)
}

// ---------------------------------------------------------------------------
// Chrome
// ---------------------------------------------------------------------------

export function titleColor(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].title
  return (text: string) => chalk.hex(hex)(text)
}

/** Status bar foreground (neutral gray, both modes). */
export function statusBarFg(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].statusBarFg
  return (text: string) => chalk.hex(hex)(text)
}
