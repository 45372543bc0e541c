/**
 * Startup configuration.
 *
 * Read once from ~/.life-tui/config.yml (or LIFE_TUI_CONFIG_PATH) and
 * fixed for the lifetime of the process. A missing file means defaults;
 * an unreadable or invalid one is fatal.
 */

import { readFileSync } from 'fs'
import * as os from 'os'
import * as path from 'path'
import { parse } from 'yaml'

import { ConfigError } from '@/lib/life/errors.js'
import { createSurface } from '@/lib/life/surface.js'
import type { Surface, WindowGeometry } from '@/lib/life/types.js'
import { DEFAULT_PATTERNS_DIR } from '@/lib/patterns/registry.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export interface LifeConfig {
  window: WindowGeometry
  surface: Surface
  /** Random seeding fills 1/startFraction of the surface. */
  startFraction: number
  /** Target generations per second. */
  fps: number
  /** Seed for reproducible random seeding, or null for Math.random. */
  seed: number | null
  patternsDir: string
}

export const DEFAULT_WINDOW: WindowGeometry = { width: 1020, height: 560, cellSize: 10 }
export const DEFAULT_START_FRACTION = 8
export const DEFAULT_FPS = 10

type RawConfig = Partial<Record<string, unknown>>

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

function expandHome(p: string): string {
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2))
  return p
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return expandHome(
    env.LIFE_TUI_CONFIG_PATH ?? path.join(os.homedir(), '.life-tui', 'config.yml'),
  )
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load, validate and resolve the configuration.
 *
 * Throws ConfigError for unreadable files, invalid YAML or mistyped
 * fields, and SurfaceConfigError when the window cannot be divided into
 * cells.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LifeConfig {
  const file = configPath(env)
  const data = readConfigFile(file)
  return resolveConfig(data, file, env)
}

function readConfigFile(file: string): RawConfig {
  let raw: string
  try {
    raw = readFileSync(file, 'utf-8')
  } catch (err) {
    const error = err as NodeJS.ErrnoException
    if (error.code === 'ENOENT') {
      console.debug(`[config] No config file at ${file}, using defaults`)
      return {}
    }
    console.error(`[config] Failed to read ${file}:`, error.message)
    throw new ConfigError(`Cannot read config file: ${error.message}`, file)
  }

  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Invalid YAML: ${message}`, file)
  }

  if (parsed === null || parsed === undefined) return {}
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('Config root must be a mapping', file)
  }
  return parsed as RawConfig
}

/** Validate already-parsed config data. Exposed for tests. */
export function resolveConfig(
  data: RawConfig,
  file: string,
  env: NodeJS.ProcessEnv = {},
): LifeConfig {
  const windowData = extractRecord(data, 'window', file) ?? {}
  const window: WindowGeometry = {
    width: extractNumber(windowData, 'width', file, 'window.width') ?? DEFAULT_WINDOW.width,
    height: extractNumber(windowData, 'height', file, 'window.height') ?? DEFAULT_WINDOW.height,
    cellSize: extractNumber(data, 'cellSize', file) ?? DEFAULT_WINDOW.cellSize,
  }
  const surface = createSurface(window)

  const startFraction = extractNumber(data, 'startFraction', file) ?? DEFAULT_START_FRACTION
  if (startFraction < 1) {
    throw new ConfigError(`startFraction must be >= 1, got ${startFraction}`, file)
  }

  const seed = extractNumber(data, 'seed', file) ?? null
  if (seed !== null && !Number.isInteger(seed)) {
    throw new ConfigError(`seed must be an integer, got ${seed}`, file)
  }

  const patternsDirValue = extractString(data, 'patternsDir', file)
  const patternsDir = patternsDirValue
    ? path.resolve(path.dirname(file), expandHome(patternsDirValue))
    : DEFAULT_PATTERNS_DIR

  return {
    window,
    surface,
    startFraction,
    fps: resolveFps(data, file, env),
    seed,
    patternsDir,
  }
}

function resolveFps(data: RawConfig, file: string, env: NodeJS.ProcessEnv): number {
  const override = env.LIFE_TUI_FPS
  if (override !== undefined && override !== '') {
    if (!/^\d+$/.test(override) || Number(override) < 1) {
      throw new ConfigError(`LIFE_TUI_FPS must be a positive integer, got "${override}"`, file)
    }
    return Number(override)
  }
  const fps = extractNumber(data, 'fps', file) ?? DEFAULT_FPS
  return Math.max(1, fps)
}

// ---------------------------------------------------------------------------
// Field extractors
// ---------------------------------------------------------------------------

function extractNumber(
  data: RawConfig,
  key: string,
  file: string,
  label: string = key,
): number | undefined {
  const value = data[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${label} must be a number, got ${JSON.stringify(value)}`, file)
  }
  return value
}

function extractString(data: RawConfig, key: string, file: string): string | undefined {
  const value = data[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string, got ${JSON.stringify(value)}`, file)
  }
  return value
}

function extractRecord(data: RawConfig, key: string, file: string): RawConfig | undefined {
  const value = data[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`${key} must be a mapping`, file)
  }
  return value as RawConfig
}
