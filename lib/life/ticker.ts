/**
 * Fixed-rate tick source for the simulation loop.
 *
 * Calls a handler once per period via setInterval (injectable for
 * testing). Handlers run synchronously, so one generation finishes before
 * the next tick can fire.
 *
 * No React, no DOM -- pure TypeScript.
 */

const DEFAULT_FPS = 10

export type IntervalHandle = ReturnType<typeof setInterval>

export interface TickerOptions {
  fps?: number
  setInterval?: (handler: () => void, ms: number) => IntervalHandle
  clearInterval?: (id: IntervalHandle) => void
}

export class Ticker {
  private _fps: number = DEFAULT_FPS
  private _timerId: IntervalHandle | null = null
  private _ticks: number = 0
  private _onTick: () => void

  private _setInterval: (handler: () => void, ms: number) => IntervalHandle
  private _clearInterval: (id: IntervalHandle) => void

  constructor(onTick: () => void, opts?: TickerOptions) {
    this._onTick = onTick
    this._fps = Math.max(1, opts?.fps ?? DEFAULT_FPS)
    this._setInterval = opts?.setInterval ?? globalThis.setInterval
    this._clearInterval = opts?.clearInterval ?? globalThis.clearInterval
  }

  /** Set the tick rate. Clamped to at least 1; restarts a running timer. */
  setFPS(fps: number): void {
    this._fps = Math.max(1, fps)
    if (this._timerId !== null) {
      this.stop()
      this.start()
    }
  }

  get fps(): number {
    return this._fps
  }

  /** Milliseconds between ticks. */
  get interval(): number {
    return Math.round(1000 / this._fps)
  }

  get isRunning(): boolean {
    return this._timerId !== null
  }

  /** Ticks fired since construction. */
  get ticks(): number {
    return this._ticks
  }

  /** Fire one tick now. Also what the timer calls. */
  tick(): void {
    this._ticks++
    this._onTick()
  }

  start(): void {
    if (this._timerId !== null) return
    this._timerId = this._setInterval(() => this.tick(), this.interval)
  }

  stop(): void {
    if (this._timerId !== null) {
      this._clearInterval(this._timerId)
      this._timerId = null
    }
  }
}
