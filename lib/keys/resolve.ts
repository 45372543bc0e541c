/**
 * Translate Ink's `useInput` arguments into binding-map terms.
 */

import { findBinding } from './bindings.js'
import type { InkKeyInput, KeyBinding, KeyModifiers, ViewContext } from './types.js'

/**
 * Derive the canonical key name that the binding map uses.
 *
 * Ink delivers special keys via boolean flags on the `key` object and
 * printable characters via the `input` string.
 */
export function resolveKeyName(input: string, key: InkKeyInput): string {
  if (key.upArrow) return 'upArrow'
  if (key.downArrow) return 'downArrow'
  if (key.leftArrow) return 'leftArrow'
  if (key.rightArrow) return 'rightArrow'
  if (key.return) return 'return'
  if (key.escape) return 'escape'
  if (key.tab) return 'tab'
  if (key.backspace) return 'backspace'
  if (key.delete) return 'delete'
  if (key.pageUp) return 'pageUp'
  if (key.pageDown) return 'pageDown'

  // Printable character (or space)
  return input
}

/**
 * Ink does not surface modifiers on printable keys. Ctrl chords arrive as
 * raw control codes and meta is unreliable in most terminals, so only
 * shift is inferred, from an uppercase letter.
 */
export function resolveModifiers(input: string): KeyModifiers {
  return {
    ctrl: false,
    shift: input.length === 1 && input >= 'A' && input <= 'Z',
    meta: false,
  }
}

/** The binding a key press triggers in a context, if any. */
export function resolveKeyPress(
  input: string,
  key: InkKeyInput,
  context: ViewContext,
): KeyBinding | undefined {
  const keyName = resolveKeyName(input, key)
  if (!keyName) return undefined
  return findBinding(keyName, resolveModifiers(input), context)
}
