import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Ticker, type IntervalHandle } from '@/lib/life/ticker'

// ---------------------------------------------------------------------------
// Timer spies over fake timers
// ---------------------------------------------------------------------------

function makeTimers() {
  return {
    setInterval: vi.fn((handler: () => void, ms: number) => setInterval(handler, ms)),
    clearInterval: vi.fn((id: IntervalHandle) => clearInterval(id)),
  }
}

describe('Ticker', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('derives the interval from fps', () => {
    expect(new Ticker(() => {}, { fps: 10 }).interval).toBe(100)
    expect(new Ticker(() => {}, { fps: 3 }).interval).toBe(333)
  })

  it('clamps fps to at least one', () => {
    const ticker = new Ticker(() => {}, { fps: 0 })
    expect(ticker.fps).toBe(1)
    ticker.setFPS(-5)
    expect(ticker.interval).toBe(1000)
  })

  it('schedules with the injected setInterval', () => {
    const timers = makeTimers()
    const ticker = new Ticker(() => {}, { fps: 20, ...timers })
    ticker.start()
    expect(timers.setInterval).toHaveBeenCalledWith(expect.any(Function), 50)
    expect(ticker.isRunning).toBe(true)
  })

  it('fires once per period', () => {
    const onTick = vi.fn()
    const ticker = new Ticker(onTick, { fps: 10, ...makeTimers() })
    ticker.start()
    vi.advanceTimersByTime(350)
    expect(onTick).toHaveBeenCalledTimes(3)
    expect(ticker.ticks).toBe(3)
  })

  it('does not start twice', () => {
    const timers = makeTimers()
    const ticker = new Ticker(() => {}, timers)
    ticker.start()
    ticker.start()
    expect(timers.setInterval).toHaveBeenCalledTimes(1)
  })

  it('stops through the injected clearInterval', () => {
    const timers = makeTimers()
    const onTick = vi.fn()
    const ticker = new Ticker(onTick, { fps: 10, ...timers })
    ticker.start()
    ticker.stop()
    vi.advanceTimersByTime(500)
    expect(timers.clearInterval).toHaveBeenCalledTimes(1)
    expect(onTick).not.toHaveBeenCalled()
    expect(ticker.isRunning).toBe(false)
  })

  it('restarts at the new rate when fps changes while running', () => {
    const timers = makeTimers()
    const ticker = new Ticker(() => {}, { fps: 10, ...timers })
    ticker.start()
    ticker.setFPS(4)
    expect(timers.clearInterval).toHaveBeenCalledTimes(1)
    expect(timers.setInterval).toHaveBeenLastCalledWith(expect.any(Function), 250)
  })

  it('only records the rate when stopped', () => {
    const timers = makeTimers()
    const ticker = new Ticker(() => {}, timers)
    ticker.setFPS(25)
    expect(ticker.interval).toBe(40)
    expect(timers.setInterval).not.toHaveBeenCalled()
  })

  it('fires manually via tick()', () => {
    const onTick = vi.fn()
    const ticker = new Ticker(onTick)
    ticker.tick()
    expect(onTick).toHaveBeenCalledTimes(1)
    expect(ticker.ticks).toBe(1)
  })
})
