import type { EffectSystem, SpriteView } from '../game/types.ts'
import type { SoundBoard } from '../game/SoundBoard.ts'
import { EXPLOSION, type SpriteSpec } from '../game/levels.ts'

/**
 * One animated explosion
 */
export interface Explosion {
  id: number
  x: number
  y: number
  /** Animation frame currently shown */
  frame: number
}

/** Animation length: a 221-frame sheet shown at every second frame */
export const EXPLOSION_FRAMES = 111

/**
 * Default effect factory. Each explosion plays the explosion cue once and
 * animates for a fixed number of frames.
 */
export class ExplosionSystem implements EffectSystem {
  private explosions: Explosion[] = []
  private nextId: number = 1
  private sound: SoundBoard | undefined
  private sprite: SpriteSpec
  private frames: number

  constructor(sound?: SoundBoard, sprite: SpriteSpec = EXPLOSION, frames: number = EXPLOSION_FRAMES) {
    if (!Number.isInteger(frames) || frames <= 0) {
      throw new Error(`Explosion length must be a positive number of frames, got ${frames}`)
    }
    this.sound = sound
    this.sprite = sprite
    this.frames = frames
  }

  explosion(x: number, y: number): void {
    this.explosions.push({ id: this.nextId++, x, y, frame: 0 })
    this.sound?.play('explosion')
  }

  /**
   * Step every animation; finished ones are dropped
   */
  advance(): void {
    for (const explosion of this.explosions) {
      explosion.frame++
    }
    this.explosions = this.explosions.filter(e => e.frame < this.frames)
  }

  getExplosions(): readonly Explosion[] {
    return this.explosions
  }

  getCount(): number {
    return this.explosions.length
  }

  clear(): void {
    this.explosions = []
  }

  getViews(): SpriteView[] {
    return this.explosions.map(e => ({
      id: e.id,
      kind: 'explosion',
      x: e.x,
      y: e.y,
      angle: 0,
      width: this.sprite.size.width,
      height: this.sprite.size.height,
      opacity: 255,
      skin: `${this.sprite.skin}:${e.frame}`,
    }))
  }

  /**
   * Fraction of the animation already played
   */
  getProgress(explosion: Explosion): number {
    return Math.min(1, explosion.frame / this.frames)
  }
}
