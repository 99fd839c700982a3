import { createBody, clampByte, type EntityBase, type Size, type Targeting } from './Entity.ts'
import type { ProjectileLauncher } from './Projectile.ts'
import { steer } from './Targeting.ts'
import { facingFromHeading } from '../math/Kinematics.ts'

/**
 * What a ship with zero or negative speed does when it reloads
 */
export type NonPositiveSpeedReload = 'floor' | 'disable'

/**
 * Enemy fire tuning shared by every level
 */
export interface EnemyFireConfig {
  /** Reload frames = reloadDistance / speed, so faster ships reload faster */
  reloadDistance: number
  /** Divisor floor so slow ships still fire */
  minReloadSpeed: number
  nonPositiveSpeed: NonPositiveSpeedReload
  projectileSpeedFactor: number
  minProjectileSpeed: number
  /** Degrees added to the ship's facing when firing */
  angleOffset: number
}

/**
 * Fire-control component. A null reloadTicks means firing is disabled.
 */
export interface FireControl {
  reloadTicks: number | null
  projectileSpeed: number
  fadeRate: number
  angleOffset: number
  projectileSize: Size
  projectileSkin: string
}

/**
 * Enemy ship - chases a target point, always faces where it is going,
 * and fires periodically along its facing
 */
export interface EnemyShip extends EntityBase, Targeting {
  readonly kind: 'enemy'
  fire: FireControl
}

export interface EnemyShipConfig {
  x: number
  y: number
  size: Size
  skin: string
  speed: number
  initialReload: number
  projectileFadeRate: number
  projectileSize: Size
  projectileSkin: string
  fire: EnemyFireConfig
}

/**
 * Reload frames after a shot, or null when the policy disables fire
 */
export function reloadAfterShot(speed: number, config: EnemyFireConfig): number | null {
  if (speed <= 0 && config.nonPositiveSpeed === 'disable') {
    return null
  }
  const effective = Math.max(speed, config.minReloadSpeed)
  return clampByte(Math.ceil(config.reloadDistance / effective))
}

export function enemyProjectileSpeed(speed: number, config: EnemyFireConfig): number {
  return Math.max(config.projectileSpeedFactor * speed, config.minProjectileSpeed)
}

export function createEnemyShip(id: number, config: EnemyShipConfig): EnemyShip {
  return {
    id,
    kind: 'enemy',
    alive: true,
    skin: config.skin,
    body: createBody(config.size, { x: config.x, y: config.y, speed: config.speed }),
    target: { x: config.x, y: config.y },
    fire: {
      // Extra frames so a freshly spawned ship does not fire from offscreen at once
      reloadTicks: clampByte(config.initialReload) + 10,
      projectileSpeed: enemyProjectileSpeed(config.speed, config.fire),
      fadeRate: clampByte(config.projectileFadeRate),
      angleOffset: config.fire.angleOffset,
      projectileSize: config.projectileSize,
      projectileSkin: config.projectileSkin,
    },
  }
}

export function disableFire(ship: EnemyShip): void {
  ship.fire.reloadTicks = null
}

export function isFireEnabled(ship: EnemyShip): boolean {
  return ship.fire.reloadTicks !== null
}

/**
 * Advance one frame: steer, face the direction of travel, then tick fire control.
 * Returns true if the ship fired.
 */
export function advanceEnemyShip(
  ship: EnemyShip,
  dt: number,
  launcher: ProjectileLauncher | undefined,
  config: EnemyFireConfig
): boolean {
  const heading = steer(ship, dt)
  ship.body.angle = facingFromHeading(heading)

  const fire = ship.fire
  if (fire.reloadTicks === null) return false

  fire.reloadTicks--
  if (fire.reloadTicks > 0) return false

  if (!launcher) {
    throw new Error(`Enemy ${ship.id} fired with no projectile manager attached`)
  }
  launcher.launch({
    x: ship.body.x,
    y: ship.body.y,
    heading: ship.body.angle + fire.angleOffset,
    speed: fire.projectileSpeed,
    fadeRate: fire.fadeRate,
    size: fire.projectileSize,
    skin: fire.projectileSkin,
  })
  fire.reloadTicks = reloadAfterShot(ship.body.speed, config)
  return true
}

/**
 * Slow down, stop, then back away from the current target
 */
export function retreat(ship: EnemyShip, deceleration: number, maxReverseSpeed: number): void {
  ship.body.speed = Math.max(ship.body.speed - deceleration, -maxReverseSpeed)
}
