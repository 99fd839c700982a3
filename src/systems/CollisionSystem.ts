import type { Body, EntityBase } from '../entities/Entity.ts'
import type { World } from '../game/World.ts'

/**
 * Collision shape types
 */
export type CollisionShape =
  | { type: 'circle'; radius: number }
  | { type: 'box'; halfWidth: number; halfHeight: number }

/**
 * What one frame of collision resolution found
 */
export interface CollisionReport {
  playerHit: boolean
  asteroidsHit: number
  enemiesHit: number
}

/**
 * Circle vs circle collision
 */
export function circleVsCircle(
  x1: number, y1: number, r1: number,
  x2: number, y2: number, r2: number
): boolean {
  const dx = x2 - x1
  const dy = y2 - y1
  const distSq = dx * dx + dy * dy
  const radiusSum = r1 + r2
  return distSq < radiusSum * radiusSum
}

/**
 * Box vs box collision (AABB)
 */
export function boxVsBox(
  x1: number, y1: number, hw1: number, hh1: number,
  x2: number, y2: number, hw2: number, hh2: number
): boolean {
  return (
    Math.abs(x1 - x2) < hw1 + hw2 &&
    Math.abs(y1 - y2) < hh1 + hh2
  )
}

/**
 * Circle vs box collision
 */
export function circleVsBox(
  cx: number, cy: number, r: number,
  bx: number, by: number, hw: number, hh: number
): boolean {
  // Closest point on box to circle center
  const closestX = Math.max(bx - hw, Math.min(cx, bx + hw))
  const closestY = Math.max(by - hh, Math.min(cy, by + hh))

  const dx = cx - closestX
  const dy = cy - closestY

  return dx * dx + dy * dy < r * r
}

/**
 * Generic shape vs shape collision
 */
export function shapesCollide(
  x1: number, y1: number, shape1: CollisionShape,
  x2: number, y2: number, shape2: CollisionShape
): boolean {
  if (shape1.type === 'circle' && shape2.type === 'circle') {
    return circleVsCircle(x1, y1, shape1.radius, x2, y2, shape2.radius)
  }

  if (shape1.type === 'box' && shape2.type === 'box') {
    return boxVsBox(
      x1, y1, shape1.halfWidth, shape1.halfHeight,
      x2, y2, shape2.halfWidth, shape2.halfHeight
    )
  }

  if (shape1.type === 'circle' && shape2.type === 'box') {
    return circleVsBox(
      x1, y1, shape1.radius,
      x2, y2, shape2.halfWidth, shape2.halfHeight
    )
  }

  if (shape1.type === 'box' && shape2.type === 'circle') {
    return circleVsBox(
      x2, y2, shape2.radius,
      x1, y1, shape1.halfWidth, shape1.halfHeight
    )
  }

  return false
}

export function bodiesCollide(a: Body, b: Body): boolean {
  return shapesCollide(a.x, a.y, a.shape, b.x, b.y, b.shape)
}

/**
 * Live entities from `group` that overlap `entity`
 */
export function findHits<T extends EntityBase>(entity: EntityBase, group: Iterable<T>): T[] {
  const hits: T[] = []
  for (const other of group) {
    if (other.alive && bodiesCollide(entity.body, other.body)) {
      hits.push(other)
    }
  }
  return hits
}

/**
 * Check the live player against everything that can kill it.
 * Everything it touched is retired without scoring.
 */
export function resolvePlayerHits(world: World): boolean {
  const player = world.player
  if (!player.alive) return false

  const touched: EntityBase[] = [
    ...findHits(player, world.asteroids),
    ...findHits(player, world.enemyShots.store),
    ...findHits(player, world.enemies),
  ]
  if (touched.length === 0) return false

  player.alive = false
  world.effects.explosion(player.body.x, player.body.y)
  for (const entity of touched) {
    entity.alive = false
  }
  return true
}

/**
 * Check player lasers (newest first) against asteroids and enemy ships.
 * A laser that hits anything is retired; an entity hit by several lasers
 * counts once. Each destroyed entity leaves an explosion behind.
 */
export function resolveLaserHits(world: World): { asteroidsHit: number; enemiesHit: number } {
  const asteroidsHit = new Set<EntityBase>()
  const enemiesHit = new Set<EntityBase>()

  for (const laser of world.playerShots.store.aliveReversed()) {
    const asteroids = findHits(laser, world.asteroids)
    const enemies = findHits(laser, world.enemies)

    if (asteroids.length > 0 || enemies.length > 0) {
      laser.alive = false
      for (const a of asteroids) asteroidsHit.add(a)
      for (const e of enemies) enemiesHit.add(e)
    }
  }

  for (const entity of [...asteroidsHit, ...enemiesHit]) {
    entity.alive = false
    world.effects.explosion(entity.body.x, entity.body.y)
  }

  return { asteroidsHit: asteroidsHit.size, enemiesHit: enemiesHit.size }
}

/**
 * Resolve every collision for the frame, before anything moves
 */
export function resolveCollisions(world: World): CollisionReport {
  const playerHit = resolvePlayerHits(world)
  const { asteroidsHit, enemiesHit } = resolveLaserHits(world)
  return { playerHit, asteroidsHit, enemiesHit }
}
