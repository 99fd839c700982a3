import { createBody, type EntityBase, type Size, type Targeting } from './Entity.ts'
import { steer, hasArrived } from './Targeting.ts'

/**
 * Asteroid - drifts across the screen toward an offscreen target, spinning
 */
export interface Asteroid extends EntityBase, Targeting {
  readonly kind: 'asteroid'
  /** Degrees per frame */
  spin: number
}

export interface AsteroidConfig {
  x: number
  y: number
  size: Size
  skin: string
  speed?: number
  spin?: number
  target?: { x: number; y: number }
}

export function createAsteroid(id: number, config: AsteroidConfig): Asteroid {
  return {
    id,
    kind: 'asteroid',
    alive: true,
    skin: config.skin,
    body: createBody(config.size, { x: config.x, y: config.y, speed: config.speed ?? 0 }),
    target: config.target ? { ...config.target } : { x: 0, y: 0 },
    spin: config.spin ?? 0,
  }
}

/**
 * Advance one frame. An asteroid that lands exactly on its target has
 * crossed the screen and is retired.
 */
export function advanceAsteroid(asteroid: Asteroid, dt: number): boolean {
  steer(asteroid, dt)
  asteroid.body.angle += asteroid.spin

  if (hasArrived(asteroid)) {
    asteroid.alive = false
  }
  return asteroid.alive
}
