/**
 * Design tokens for the terminal color scheme.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Type definitions
// ---------------------------------------------------------------------------

export type ThemeMode = 'dark' | 'light'

export interface ThemeTokens {
  readonly cell: {
    /** Live cells. */
    readonly live: string
    /** Glyph under the setup cursor (background). */
    readonly cursor: string
    /** Glyph under the setup cursor (foreground). */
    readonly cursorText: string
  }
  readonly text: {
    /** Fallback for unrecognized statuses. */
    readonly secondary: string
  }
  readonly status: {
    readonly success: string
    readonly error: string
    readonly info: string
  }
  readonly title: string
  readonly statusBarFg: string
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

const DARK_TOKENS: ThemeTokens = {
  cell: {
    live: '#ff0000',
    cursor: '#00ff00',
    cursorText: '#000000',
  },
  text: {
    secondary: '#a0a0a0',
  },
  status: {
    success: '#5faf5f',
    error: '#ff5f5f',
    info: '#5f87af',
  },
  title: '#00ff00',
  statusBarFg: '#727578',
}

const LIGHT_TOKENS: ThemeTokens = {
  cell: {
    live: '#d70000',
    cursor: '#009b00',
    cursorText: '#ffffff',
  },
  text: {
    secondary: '#505050',
  },
  status: {
    success: '#008700',
    error: '#d70000',
    info: '#005f87',
  },
  title: '#009b00',
  statusBarFg: '#727578',
}

/** Mode-resolved theme tokens. */
export const THEME_TOKENS: Record<ThemeMode, ThemeTokens> = {
  dark: DARK_TOKENS,
  light: LIGHT_TOKENS,
}

// ---------------------------------------------------------------------------
// Theme detection
// ---------------------------------------------------------------------------

/**
 * Detect the current theme mode from the APPEARANCE_MODE env var.
 * Defaults to dark.
 */
export function detectThemeMode(env: NodeJS.ProcessEnv = process.env): ThemeMode {
  const value = env.APPEARANCE_MODE?.trim().toLowerCase()
  if (value === 'light') return 'light'
  return 'dark'
}
