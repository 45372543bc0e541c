/**
 * Public surface of the simulation core.
 */

export { Grid, createEmpty, createRandom, loadPattern, toggle, seededRandom } from './grid.js'
export type { PatternLoadResult } from './grid.js'
export { advance, countNeighbours, neighbours, MOORE_OFFSETS } from './rules.js'
export { createSurface, isInSurface, centreCell } from './surface.js'
export { Ticker } from './ticker.js'
export type { IntervalHandle, TickerOptions } from './ticker.js'
export {
  ConfigError,
  OutOfBoundsError,
  PatternNotFoundError,
  PatternParseError,
  PatternReadError,
  SurfaceConfigError,
} from './errors.js'
export type { Cell, RandomSource, Surface, WindowGeometry } from './types.js'
