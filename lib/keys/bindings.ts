/**
 * Complete keyboard binding map for the terminal UI
 *
 * Defines the shortcuts for:
 * - Global actions (available in both phases)
 * - Setup phase (editing the initial conditions)
 * - Running phase
 *
 * Pattern keys are generated from the pattern registry so the two cannot
 * drift apart.
 */

import { PATTERNS } from '@/lib/patterns/registry.js'
import type { KeyBinding, KeyModifiers, ViewContext } from './types.js'

export const LOAD_PATTERN_PREFIX = 'load_pattern:'

const PATTERN_BINDINGS: KeyBinding[] = PATTERNS.map((pattern) => ({
  key: pattern.key,
  description: pattern.label,
  action: `${LOAD_PATTERN_PREFIX}${pattern.id}`,
  context: 'setup' as const,
}))

/**
 * All keyboard bindings in the application
 */
export const BINDINGS: KeyBinding[] = [
  // ========================================================================
  // GLOBAL BINDINGS
  // ========================================================================
  {
    key: 'escape',
    description: 'Quit',
    action: 'quit',
    context: 'global',
  },
  {
    key: 'q',
    description: 'Quit',
    action: 'quit',
    context: 'global',
    hidden: true, // Same as Esc
  },

  // ========================================================================
  // SETUP BINDINGS
  // ========================================================================
  {
    key: 'return',
    description: 'Start',
    action: 'start',
    context: 'setup',
  },
  {
    key: ' ',
    description: 'Toggle cell',
    action: 'toggle_cell',
    context: 'setup',
  },
  {
    key: 'upArrow',
    description: 'Move cursor',
    action: 'cursor_up',
    context: 'setup',
  },
  {
    key: 'downArrow',
    description: 'Move cursor',
    action: 'cursor_down',
    context: 'setup',
    hidden: true,
  },
  {
    key: 'leftArrow',
    description: 'Move cursor',
    action: 'cursor_left',
    context: 'setup',
    hidden: true,
  },
  {
    key: 'rightArrow',
    description: 'Move cursor',
    action: 'cursor_right',
    context: 'setup',
    hidden: true,
  },
  {
    key: 'r',
    description: 'Random',
    action: 'seed_random',
    context: 'setup',
  },
  ...PATTERN_BINDINGS,
  {
    key: 'c',
    description: 'Clear',
    action: 'clear',
    context: 'setup',
  },

  // ========================================================================
  // RUNNING BINDINGS
  // ========================================================================
  {
    key: 'return',
    description: 'Reset',
    action: 'reset',
    context: 'running',
  },
]

/**
 * Bindings active in a context: its own plus the global ones
 */
export function getBindingsForContext(context: ViewContext): KeyBinding[] {
  return BINDINGS.filter(
    (binding) => binding.context === 'global' || binding.context === context
  )
}

/**
 * Find the binding for a key press in the given context
 */
export function findBinding(
  key: string,
  modifiers: KeyModifiers,
  context: ViewContext
): KeyBinding | undefined {
  const contextBindings = getBindingsForContext(context)

  return contextBindings.find((binding) => {
    // Key must match exactly
    if (binding.key !== key) return false

    // Check modifiers (undefined/false are equivalent)
    const ctrlMatch = (binding.ctrl ?? false) === (modifiers.ctrl ?? false)
    const shiftMatch = (binding.shift ?? false) === (modifiers.shift ?? false)
    const metaMatch = (binding.meta ?? false) === (modifiers.meta ?? false)

    return ctrlMatch && shiftMatch && metaMatch
  })
}

/**
 * Get footer hints for a specific context (non-hidden bindings only)
 */
export function getFooterHints(
  context: ViewContext
): Array<{ key: string; description: string }> {
  const contextBindings = getBindingsForContext(context)

  return contextBindings
    .filter((binding) => !binding.hidden)
    .map((binding) => {
      // Format key with modifiers for display
      let displayKey = binding.key
      if (binding.ctrl) displayKey = `Ctrl+${displayKey}`
      if (binding.shift) displayKey = `Shift+${displayKey}`
      if (binding.meta) displayKey = `Meta+${displayKey}`

      // Map special keys to readable names
      const keyMap: Record<string, string> = {
        upArrow: '↑↓←→',
        return: 'Enter',
        escape: 'Esc',
        ' ': 'Space',
      }
      displayKey = keyMap[displayKey] ?? displayKey

      return {
        key: displayKey,
        description: binding.description,
      }
    })
}
