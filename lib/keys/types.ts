/**
 * Keyboard binding types for the terminal UI.
 */

/**
 * View context where a key binding is active
 */
export type ViewContext = 'global' | 'setup' | 'running'

/**
 * A single keyboard binding definition
 *
 * Bindings are pure data - they describe WHAT keys do WHERE, not HOW.
 * The action handlers are connected separately by the app.
 */
export interface KeyBinding {
  /** The key character or name ('q', 'upArrow', 'return', ' ', etc.) */
  key: string

  /** Requires Ctrl modifier */
  ctrl?: boolean

  /** Requires Shift modifier */
  shift?: boolean

  /** Requires Meta/Alt modifier */
  meta?: boolean

  /** Human-readable description for the footer */
  description: string

  /** Action identifier (e.g., 'quit', 'start', 'load_pattern:glider') */
  action: string

  /** Where this binding is active */
  context: ViewContext

  /** Don't show in footer */
  hidden?: boolean
}

/**
 * Ink's useInput key input structure
 * Used for mapping between Ink and our binding system
 */
export interface InkKeyInput {
  upArrow: boolean
  downArrow: boolean
  leftArrow: boolean
  rightArrow: boolean
  return: boolean
  escape: boolean
  tab: boolean
  backspace: boolean
  delete: boolean
  pageUp: boolean
  pageDown: boolean
}

/**
 * Modifier keys that can be pressed with a key
 */
export interface KeyModifiers {
  ctrl?: boolean
  shift?: boolean
  meta?: boolean
}
