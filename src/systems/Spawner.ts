import type { SeededRandom } from '../math/SeededRandom.ts'
import type { Point, ScreenSize } from '../math/Kinematics.ts'
import { diagonalOf } from '../entities/Entity.ts'
import { createAsteroid, type Asteroid } from '../entities/Asteroid.ts'
import { createEnemyShip, type EnemyShip } from '../entities/EnemyShip.ts'
import type { World } from '../game/World.ts'

/**
 * Integer range as `[value]`, `[start, stop]` or `[start, stop, step]`,
 * half-open like a for loop bound
 */
export type ValueRange = readonly number[]

export interface NormalizedRange {
  start: number
  stop: number
  step: number
}

/**
 * Validate a range and fix a step that points away from `stop`
 */
export function normalizeRange(range: ValueRange): NormalizedRange {
  if (!Array.isArray(range) || range.length < 1 || range.length > 3) {
    throw new Error(`Range must hold 1 to 3 integers, got ${JSON.stringify(range)}`)
  }
  for (const value of range) {
    if (!Number.isInteger(value)) {
      throw new Error(`Range values must be integers, got ${JSON.stringify(range)}`)
    }
  }

  const [first = 0, second, third] = range
  if (second === undefined) {
    return { start: first, stop: first + 1, step: 1 }
  }

  const start = first
  const stop = second
  const direction = Math.sign(stop - start)
  let step = third ?? 1

  if (step === 0) {
    step = direction === 0 ? 1 : direction
  } else if (direction !== 0 && Math.sign(step) !== direction) {
    step = -step
  }

  return { start, stop, step }
}

/**
 * Uniformly pick one value the range would produce
 */
export function pickValueInRange(range: ValueRange, rng: SeededRandom): number {
  const { start, stop, step } = normalizeRange(range)
  if (start === stop) return start

  const count = Math.ceil((stop - start) / step)
  return start + step * rng.nextInt(count)
}

/**
 * A position far enough outside the screen that no part of a body with
 * this diagonal is visible, at any rotation
 */
export function spawnOffscreen(diagonal: number, screen: ScreenSize, rng: SeededRandom): Point {
  const { width: w, height: h } = screen
  const margin = Math.ceil(diagonal)

  const x = rng.nextIntBetween(-Math.floor(w / 2), Math.floor((3 * w) / 2))

  if (x >= -diagonal / 2 && x <= w + diagonal / 2) {
    // Horizontally visible, so push it above or below
    const offset = rng.nextIntBetween(margin, 5 * margin)
    const y = rng.nextBool() ? h + offset : -offset
    return { x, y }
  }

  return { x, y: rng.nextIntBetween(-margin, h + margin) }
}

function crossAxis(value: number, extent: number, margin: number, rng: SeededRandom): number {
  if (value < 0) return extent + margin
  if (value > extent) return -margin
  return rng.nextIntBetween(0, extent)
}

/**
 * A target on the opposite side of the screen, so an entity heading there
 * crosses the visible area and ends offscreen
 */
export function pickCrossScreenTarget(
  position: Point,
  diagonal: number,
  screen: ScreenSize,
  rng: SeededRandom
): Point {
  const margin = Math.ceil(diagonal)
  return {
    x: crossAxis(position.x, screen.width, margin, rng),
    y: crossAxis(position.y, screen.height, margin, rng),
  }
}

/**
 * Frame countdown for refilling a population.
 * A null interval never fires.
 */
export class SpawnCadence {
  private interval: number | null
  private countdown: number

  constructor(interval: number | null) {
    this.interval = interval
    this.countdown = interval ?? 0
  }

  /**
   * Count one frame. Returns true on the frame a spawn is due.
   */
  tick(): boolean {
    if (this.interval === null) return false

    this.countdown--
    if (this.countdown > 0) return false

    this.countdown = this.interval
    return true
  }

  reset(interval: number | null): void {
    this.interval = interval
    this.countdown = interval ?? 0
  }

  getCountdown(): number | null {
    return this.interval === null ? null : this.countdown
  }
}

/**
 * New asteroid offscreen, bound for the far side
 */
export function makeAsteroid(world: World): Asteroid {
  const { rng, level } = world
  const screen = world.config.screen

  const sprite = rng.pick(world.sprites.asteroids)
  if (!sprite) {
    throw new Error('No asteroid sprites configured')
  }
  const diagonal = diagonalOf(sprite.size)
  const position = spawnOffscreen(diagonal, screen, rng)
  const speed = pickValueInRange(level.asteroidSpeedRange, rng)
  const spin = pickValueInRange(world.config.asteroidSpin, rng)
  const target = pickCrossScreenTarget(position, diagonal, screen, rng)

  return createAsteroid(world.ids.next(), {
    ...position,
    size: sprite.size,
    skin: sprite.skin,
    speed,
    spin,
    target,
  })
}

/**
 * New enemy ship offscreen. It holds position until given a target.
 */
export function makeEnemyShip(world: World): EnemyShip {
  const { rng, level } = world
  const sprite = level.enemyShip

  const position = spawnOffscreen(diagonalOf(sprite.size), world.config.screen, rng)
  const speed = pickValueInRange(level.enemySpeedRange, rng)

  return createEnemyShip(world.ids.next(), {
    ...position,
    size: sprite.size,
    skin: sprite.skin,
    speed,
    initialReload: level.enemyInitialReload,
    projectileFadeRate: level.enemyProjectileFade,
    projectileSize: world.sprites.enemyLaser.size,
    projectileSkin: world.sprites.enemyLaser.skin,
    fire: world.config.enemyFire,
  })
}

/**
 * Starting populations for the world's current level
 */
export function spawnStartingPopulations(world: World): void {
  for (let i = 0; i < world.level.startingAsteroids; i++) {
    world.asteroids.add(makeAsteroid(world))
  }
  for (let i = 0; i < world.level.startingEnemies; i++) {
    world.enemies.add(makeEnemyShip(world))
  }
}

/**
 * Top up populations whose cadence is due this frame
 */
export function refillPopulations(world: World): { asteroids: number; enemies: number } {
  let asteroids = 0
  let enemies = 0

  if (world.asteroidCadence.tick()) {
    world.asteroids.add(makeAsteroid(world))
    asteroids++
  }
  if (world.enemyCadence.tick()) {
    world.enemies.add(makeEnemyShip(world))
    enemies++
  }

  return { asteroids, enemies }
}
