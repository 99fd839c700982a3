/**
 * Boundaries between the simulation core and its collaborators.
 * Implementations (drawing, audio devices, key events) live outside the core.
 */

import type { EntityKind } from '../entities/Entity.ts'
import type { Phase } from './LevelStateMachine.ts'

/**
 * Per-frame control snapshot. Raw key codes are translated upstream.
 */
export interface ControlIntent {
  turnLeft: boolean
  turnRight: boolean
  thrustForward: boolean
  thrustBackward: boolean
  firing: boolean
}

export const NO_INTENT: Readonly<ControlIntent> = Object.freeze({
  turnLeft: false,
  turnRight: false,
  thrustForward: false,
  thrustBackward: false,
  firing: false,
})

export type SoundCue =
  | 'music'
  | 'playerShot'
  | 'enemyShot'
  | 'explosion'
  | 'levelUp'
  | 'lifeLost'
  | 'win'
  | 'gameOver'

export interface PlayOptions {
  loop?: boolean
}

/**
 * Audio output. The core only triggers cues; it never reads playback state
 * to make game decisions.
 */
export interface AudioPlayer {
  play(cue: SoundCue, options?: PlayOptions): void
  stop(cue: SoundCue): void
  isPlaying(cue: SoundCue): boolean
}

/**
 * Visual/audio effect requests
 */
export interface EffectFactory {
  explosion(x: number, y: number): void
}

/**
 * Effect factory whose effects the world animates and shows
 */
export interface EffectSystem extends EffectFactory {
  advance(): void
  clear(): void
  getViews(): SpriteView[]
}

export type Outcome = 'won' | 'lost'

/**
 * Read-only sprite snapshot for the renderer
 */
export interface SpriteView {
  readonly id: number
  readonly kind: EntityKind | 'explosion'
  readonly x: number
  readonly y: number
  readonly angle: number
  readonly width: number
  readonly height: number
  readonly opacity: number
  readonly skin: string
}

export interface HudView {
  readonly score: number
  /** One-based level number */
  readonly level: number
  readonly lives: number
  readonly phase: Phase
  readonly outcome: Outcome | null
}

export interface WorldView {
  readonly frame: number
  readonly player: readonly SpriteView[]
  readonly asteroids: readonly SpriteView[]
  readonly enemies: readonly SpriteView[]
  readonly playerProjectiles: readonly SpriteView[]
  readonly enemyProjectiles: readonly SpriteView[]
  readonly explosions: readonly SpriteView[]
  readonly hud: HudView
}

/**
 * Anything that draws a world snapshot
 */
export interface Renderer {
  draw(view: WorldView, alpha: number): void
}
