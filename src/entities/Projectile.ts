import { createBody, clampByte, type EntityBase, type Size } from './Entity.ts'
import { displacement, hasLeftExtendedBounds, type ScreenSize } from '../math/Kinematics.ts'

export type ProjectileOwner = 'player' | 'enemy'

/** Age (frames) after which opacity drops by the full fade rate */
export const FADE_START_FRAME = 60

/** Frames before FADE_START_FRAME that use the gentler pre-fade */
export const PRE_FADE_FRAMES = 10

/** Projectiles at or below this opacity are retired */
export const VISIBILITY_FLOOR = 20

export const MAX_OPACITY = 255

/**
 * Laser projectile - fixed heading, fades out with age
 */
export interface Projectile extends EntityBase {
  readonly kind: 'projectile'
  readonly owner: ProjectileOwner
  readonly heading: number
  age: number
  readonly fadeRate: number
  opacity: number
}

export interface ProjectileConfig {
  owner: ProjectileOwner
  x: number
  y: number
  heading: number
  speed: number
  fadeRate: number
  size: Size
  skin: string
}

/**
 * Create a projectile. Fade rates outside [0, 255] are clamped.
 */
export function createProjectile(id: number, config: ProjectileConfig): Projectile {
  return {
    id,
    kind: 'projectile',
    alive: true,
    owner: config.owner,
    heading: config.heading,
    age: 0,
    fadeRate: clampByte(config.fadeRate),
    opacity: MAX_OPACITY,
    skin: config.skin,
    body: createBody(config.size, {
      x: config.x,
      y: config.y,
      angle: config.heading,
      speed: config.speed,
    }),
  }
}

/**
 * Opacity lost on the frame a projectile reaches `age`
 */
export function fadeAmount(age: number, fadeRate: number): number {
  if (age > FADE_START_FRAME) return fadeRate
  if (age > FADE_START_FRAME - PRE_FADE_FRAMES) return Math.floor(fadeRate / 3)
  return 0
}

/**
 * Advance one frame. Returns false once the projectile is too faint to keep
 * or has flown off the screen.
 */
export function advanceProjectile(projectile: Projectile, dt: number, screen: ScreenSize): boolean {
  projectile.age++

  const delta = displacement(projectile.heading, projectile.body.speed, dt)
  projectile.body.x += delta.x
  projectile.body.y += delta.y

  const faded = projectile.opacity - fadeAmount(projectile.age, projectile.fadeRate)
  projectile.opacity = Math.max(0, faded)

  if (faded <= VISIBILITY_FLOOR || hasLeftExtendedBounds(projectile.body, delta, screen)) {
    projectile.alive = false
  }

  return projectile.alive
}

/**
 * Anything projectiles can be fired into
 */
export interface ProjectileLauncher {
  launch(config: Omit<ProjectileConfig, 'owner'>): Projectile
}
