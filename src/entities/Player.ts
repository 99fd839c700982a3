import { createBody, clampByte, type EntityBase, type Size } from './Entity.ts'
import type { ProjectileLauncher } from './Projectile.ts'
import type { ControlIntent } from '../game/types.ts'
import { turnAndMove, clampToExtendedBounds, type ScreenSize } from '../math/Kinematics.ts'

/**
 * Player ship - spins and thrusts under control intent, fires lasers
 */
export interface PlayerShip extends EntityBase {
  readonly kind: 'player'
  angleRate: number
  forwardRate: number
  reloadTime: number
  reloadTicks: number
  firing: boolean
  firingAngleBias: number
  projectileSpeed: number
  projectileFadeRate: number
  projectileSize: Size
  projectileSkin: string
}

export interface PlayerConfig {
  x: number
  y: number
  size: Size
  skin: string
  angleRate?: number
  forwardRate?: number
  reloadTime?: number
  firingAngleBias?: number
  projectileSpeed?: number
  projectileFadeRate?: number
  projectileSize: Size
  projectileSkin: string
}

export function createPlayerShip(id: number, config: PlayerConfig): PlayerShip {
  return {
    id,
    kind: 'player',
    alive: true,
    skin: config.skin,
    body: createBody(config.size, { x: config.x, y: config.y, shape: 'box' }),
    // Rates per second (about 6 per frame at 60 fps)
    angleRate: config.angleRate ?? 360,
    forwardRate: config.forwardRate ?? 360,
    reloadTime: clampByte(config.reloadTime ?? 10),
    reloadTicks: 0,
    firing: false,
    firingAngleBias: config.firingAngleBias ?? 0,
    projectileSpeed: config.projectileSpeed ?? 400,
    projectileFadeRate: clampByte(config.projectileFadeRate ?? 15),
    projectileSize: config.projectileSize,
    projectileSkin: config.projectileSkin,
  }
}

/**
 * Turn control intent into angular velocity, speed and trigger state.
 * Opposite intents cancel out.
 */
export function applyIntent(player: PlayerShip, intent: ControlIntent): void {
  const body = player.body
  body.angularVelocity = 0
  body.speed = 0

  if (intent.turnRight && !intent.turnLeft) body.angularVelocity = -player.angleRate
  if (intent.turnLeft && !intent.turnRight) body.angularVelocity = player.angleRate
  if (intent.thrustForward && !intent.thrustBackward) body.speed = player.forwardRate
  if (intent.thrustBackward && !intent.thrustForward) body.speed = -player.forwardRate

  player.firing = intent.firing
}

/**
 * Fire if the trigger is held and the gun has reloaded.
 * Releasing the trigger reloads immediately.
 */
export function updatePlayerFire(player: PlayerShip, launcher: ProjectileLauncher | undefined): boolean {
  if (!player.firing) {
    player.reloadTicks = 0
    return false
  }

  let fired = false
  if (player.reloadTicks <= 0) {
    if (!launcher) {
      throw new Error(`Player ${player.id} fired with no projectile manager attached`)
    }
    launcher.launch({
      x: player.body.x,
      y: player.body.y,
      heading: player.body.angle + player.firingAngleBias,
      speed: player.projectileSpeed,
      fadeRate: player.projectileFadeRate,
      size: player.projectileSize,
      skin: player.projectileSkin,
    })
    player.reloadTicks = player.reloadTime
    fired = true
  }

  player.reloadTicks--
  return fired
}

/**
 * Advance one frame: turn, move, clamp, then fire
 */
export function advancePlayer(
  player: PlayerShip,
  dt: number,
  screen: ScreenSize,
  launcher: ProjectileLauncher | undefined
): void {
  if (!player.alive) return

  turnAndMove(player.body, dt)
  clampToExtendedBounds(player.body, screen)
  updatePlayerFire(player, launcher)
}
