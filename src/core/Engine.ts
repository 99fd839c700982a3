import { SafeConsole } from './SafeConsole.ts'

const logger = SafeConsole.scoped('engine')

/**
 * What the engine drives: fixed-rate updates and a render per loop pass
 */
export interface EngineTarget {
  update(): void
  render(alpha: number): void
}

/**
 * Source of loop callbacks. request() returns a function that cancels it.
 */
export interface FrameScheduler {
  now(): number
  request(callback: (time: number) => void): () => void
}

export interface EngineOptions {
  /** Milliseconds per update */
  tickRate?: number
  /** Accumulator cap in milliseconds */
  maxAccumulator?: number
  scheduler?: FrameScheduler
}

/**
 * Timer-driven scheduler for Node, about one callback per tick
 */
export function createTimerScheduler(interval: number = 1000 / 60): FrameScheduler {
  return {
    now: () => performance.now(),
    request(callback) {
      const handle = setTimeout(() => callback(performance.now()), interval)
      return () => clearTimeout(handle)
    },
  }
}

export class Engine {
  private target: EngineTarget
  private scheduler: FrameScheduler

  private lastTime = 0
  private running = false
  private cancelFrame: (() => void) | null = null
  private ticks = 0

  // Fixed timestep for game logic (60 Hz)
  private readonly TICK_RATE: number
  private readonly MAX_ACCUMULATOR: number
  private accumulator = 0

  constructor(target: EngineTarget, options: EngineOptions = {}) {
    this.target = target
    this.TICK_RATE = options.tickRate ?? 1000 / 60
    this.MAX_ACCUMULATOR = options.maxAccumulator ?? 200
    this.scheduler = options.scheduler ?? createTimerScheduler(this.TICK_RATE)
  }

  start(): void {
    if (this.running) return
    this.running = true
    this.lastTime = this.scheduler.now()
    this.cancelFrame = this.scheduler.request(this.loop)
  }

  stop(): void {
    this.running = false
    this.cancelFrame?.()
    this.cancelFrame = null
  }

  isRunning(): boolean {
    return this.running
  }

  /** Updates run since construction */
  getTickCount(): number {
    return this.ticks
  }

  /**
   * Feed elapsed wall time and run the updates it pays for, then render.
   * Returns how many updates ran. A failing update stops the engine and
   * the error propagates.
   */
  advance(elapsed: number): number {
    // Accumulate time for fixed timestep updates
    this.accumulator += elapsed

    // Cap accumulator to prevent spiral of death
    if (this.accumulator > this.MAX_ACCUMULATOR) {
      this.accumulator = this.MAX_ACCUMULATOR
    }

    let ran = 0
    try {
      while (this.accumulator >= this.TICK_RATE) {
        this.target.update()
        this.accumulator -= this.TICK_RATE
        this.ticks++
        ran++
      }

      // Render with interpolation factor
      this.target.render(this.accumulator / this.TICK_RATE)
    } catch (err) {
      logger.error('Tick failed, stopping:', err)
      this.stop()
      throw err
    }
    return ran
  }

  private loop = (currentTime: number): void => {
    if (!this.running) return

    const deltaTime = currentTime - this.lastTime
    this.lastTime = currentTime

    this.advance(deltaTime)

    if (this.running) {
      this.cancelFrame = this.scheduler.request(this.loop)
    }
  }
}
