import { describe, it, expect } from 'vitest'
import { findBinding, getBindingsForContext, getFooterHints } from '@/lib/keys/bindings'
import { resolveKeyName, resolveKeyPress } from '@/lib/keys/resolve'
import type { InkKeyInput } from '@/lib/keys/types'

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function makeKey(overrides: Partial<InkKeyInput> = {}): InkKeyInput {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    return: false,
    escape: false,
    tab: false,
    backspace: false,
    delete: false,
    pageUp: false,
    pageDown: false,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Binding table
// ---------------------------------------------------------------------------

describe('findBinding', () => {
  it('maps Enter to start during setup and reset while running', () => {
    expect(findBinding('return', {}, 'setup')?.action).toBe('start')
    expect(findBinding('return', {}, 'running')?.action).toBe('reset')
  })

  it('quits from either phase', () => {
    expect(findBinding('escape', {}, 'setup')?.action).toBe('quit')
    expect(findBinding('q', {}, 'running')?.action).toBe('quit')
  })

  it('loads patterns only during setup', () => {
    expect(findBinding('g', {}, 'setup')?.action).toBe('load_pattern:gosper_glider_gun')
    expect(findBinding('l', {}, 'setup')?.action).toBe('load_pattern:glider')
    expect(findBinding('g', {}, 'running')).toBeUndefined()
  })

  it('requires modifiers to match', () => {
    expect(findBinding('r', { shift: true }, 'setup')).toBeUndefined()
  })
})

describe('getBindingsForContext', () => {
  it('includes the global bindings', () => {
    const actions = getBindingsForContext('running').map((b) => b.action)
    expect(actions).toEqual(['quit', 'quit', 'reset'])
  })
})

describe('getFooterHints', () => {
  it('lists visible setup keys with readable names', () => {
    expect(getFooterHints('setup')).toEqual([
      { key: 'Esc', description: 'Quit' },
      { key: 'Enter', description: 'Start' },
      { key: 'Space', description: 'Toggle cell' },
      { key: '↑↓←→', description: 'Move cursor' },
      { key: 'r', description: 'Random' },
      { key: 'g', description: 'Glider gun' },
      { key: 'a', description: 'Acorn' },
      { key: 's', description: 'Switch engine' },
      { key: 'l', description: 'Glider' },
      { key: 'p', description: 'R-pentomino' },
      { key: 'd', description: 'Diehard' },
      { key: 'c', description: 'Clear' },
    ])
  })

  it('lists running keys', () => {
    expect(getFooterHints('running')).toEqual([
      { key: 'Esc', description: 'Quit' },
      { key: 'Enter', description: 'Reset' },
    ])
  })
})

// ---------------------------------------------------------------------------
// Ink input resolution
// ---------------------------------------------------------------------------

describe('resolveKeyName', () => {
  it('prefers special-key flags over the input string', () => {
    expect(resolveKeyName('', makeKey({ leftArrow: true }))).toBe('leftArrow')
    expect(resolveKeyName('\r', makeKey({ return: true }))).toBe('return')
  })

  it('passes printable characters through', () => {
    expect(resolveKeyName('a', makeKey())).toBe('a')
    expect(resolveKeyName(' ', makeKey())).toBe(' ')
  })
})

describe('resolveKeyPress', () => {
  it('resolves arrows to cursor moves during setup', () => {
    expect(resolveKeyPress('', makeKey({ downArrow: true }), 'setup')?.action).toBe('cursor_down')
    expect(resolveKeyPress('', makeKey({ downArrow: true }), 'running')).toBeUndefined()
  })

  it('resolves space to toggling the cursor cell', () => {
    expect(resolveKeyPress(' ', makeKey(), 'setup')?.action).toBe('toggle_cell')
  })

  it('treats an uppercase letter as shifted', () => {
    expect(resolveKeyPress('R', makeKey(), 'setup')).toBeUndefined()
  })

  it('ignores empty input without special keys', () => {
    expect(resolveKeyPress('', makeKey(), 'setup')).toBeUndefined()
  })
})
