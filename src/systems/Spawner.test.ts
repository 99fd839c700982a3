import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  normalizeRange,
  pickValueInRange,
  spawnOffscreen,
  pickCrossScreenTarget,
  SpawnCadence,
  makeAsteroid,
  makeEnemyShip,
  refillPopulations,
} from './Spawner.ts'
import { SeededRandom } from '../math/SeededRandom.ts'
import { createWorld } from '../game/World.ts'
import { emptyLevel, emptyWorld } from '../test/helpers.ts'

const SCREEN = { width: 1400, height: 800 }

describe('Spawner', () => {
  describe('normalizeRange', () => {
    it('should expand a single value to itself', () => {
      expect(normalizeRange([5])).toEqual({ start: 5, stop: 6, step: 1 })
    })

    it('should default the step to 1', () => {
      expect(normalizeRange([0, 10])).toEqual({ start: 0, stop: 10, step: 1 })
    })

    it('should point a zero step toward stop', () => {
      expect(normalizeRange([0, 10, 0])).toEqual({ start: 0, stop: 10, step: 1 })
      expect(normalizeRange([10, 0, 0])).toEqual({ start: 10, stop: 0, step: -1 })
      expect(normalizeRange([5, 5, 0])).toEqual({ start: 5, stop: 5, step: 1 })
    })

    it('should flip a step pointing away from stop', () => {
      expect(normalizeRange([10, 0])).toEqual({ start: 10, stop: 0, step: -1 })
      expect(normalizeRange([10, 0, 3])).toEqual({ start: 10, stop: 0, step: -3 })
      expect(normalizeRange([0, 10, -2])).toEqual({ start: 0, stop: 10, step: 2 })
    })

    it('should reject bad arity and non-integers', () => {
      expect(() => normalizeRange([])).toThrow('1 to 3 integers')
      expect(() => normalizeRange([1, 2, 3, 4])).toThrow('1 to 3 integers')
      expect(() => normalizeRange([1.5])).toThrow('must be integers')
    })
  })

  describe('pickValueInRange', () => {
    it('should return start for an empty range', () => {
      expect(pickValueInRange([7, 7], new SeededRandom(1))).toBe(7)
    })

    it('should only produce values the range steps through', () => {
      const rng = new SeededRandom(99)
      const allowed = [-5, -3, -1, 1, 3, 5]
      for (let i = 0; i < 200; i++) {
        expect(allowed).toContain(pickValueInRange([-5, 6, 2], rng))
      }
    })

    it('should walk descending ranges', () => {
      const rng = new SeededRandom(3)
      for (let i = 0; i < 50; i++) {
        expect([10, 5]).toContain(pickValueInRange([10, 0, -5], rng))
      }
    })

    it('should stay inside [start, stop)', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: -500, max: 500 }),
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 1, max: 0x7fffffff }),
          (start, length, seed) => {
            const value = pickValueInRange([start, start + length], new SeededRandom(seed))
            return Number.isInteger(value) && value >= start && value < start + length
          }
        )
      )
    })
  })

  describe('spawnOffscreen', () => {
    it('should never place any part of the body on screen', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 0x7fffffff }),
          fc.double({ min: 1, max: 300, noNaN: true }),
          (seed, diagonal) => {
            const { x, y } = spawnOffscreen(diagonal, SCREEN, new SeededRandom(seed))
            const half = diagonal / 2
            return x < -half || x > SCREEN.width + half || y < -half || y > SCREEN.height + half
          }
        )
      )
    })

    it('should keep x within half a screen of either edge', () => {
      const rng = new SeededRandom(42)
      for (let i = 0; i < 200; i++) {
        const { x } = spawnOffscreen(50, SCREEN, rng)
        expect(x).toBeGreaterThanOrEqual(-700)
        expect(x).toBeLessThan(2100)
      }
    })
  })

  describe('pickCrossScreenTarget', () => {
    it('should aim past the opposite edge', () => {
      const rng = new SeededRandom(1)
      const target = pickCrossScreenTarget({ x: -50, y: 300 }, 40, SCREEN, rng)

      expect(target.x).toBe(1440)
      expect(target.y).toBeGreaterThanOrEqual(0)
      expect(target.y).toBeLessThan(800)
    })

    it('should flip both axes from a corner', () => {
      const target = pickCrossScreenTarget({ x: 1500, y: -10 }, 39.5, SCREEN, new SeededRandom(1))
      expect(target).toEqual({ x: -40, y: 840 })
    })
  })

  describe('SpawnCadence', () => {
    it('should fire exactly every interval frames', () => {
      const cadence = new SpawnCadence(3)
      const fired = Array.from({ length: 7 }, () => cadence.tick())
      expect(fired).toEqual([false, false, true, false, false, true, false])
    })

    it('should never fire without an interval', () => {
      const cadence = new SpawnCadence(null)
      for (let i = 0; i < 100; i++) {
        expect(cadence.tick()).toBe(false)
      }
      expect(cadence.getCountdown()).toBeNull()
    })

    it('should restart the countdown on reset', () => {
      const cadence = new SpawnCadence(3)
      cadence.tick()
      cadence.reset(2)
      expect(cadence.getCountdown()).toBe(2)
      expect(cadence.tick()).toBe(false)
      expect(cadence.tick()).toBe(true)
    })
  })

  describe('makeAsteroid', () => {
    it('should spawn offscreen heading for the far side', () => {
      const world = emptyWorld()
      for (let i = 0; i < 50; i++) {
        const asteroid = makeAsteroid(world)
        const { x, y, speed, diagonal } = asteroid.body
        const half = diagonal / 2

        expect(x < -half || x > 1400 + half || y < -half || y > 800 + half).toBe(true)
        expect(speed).toBeGreaterThanOrEqual(50)
        expect(speed).toBeLessThan(200)
        expect([-5, -3, -1, 1, 3, 5]).toContain(asteroid.spin)
        expect(asteroid.target).not.toEqual({ x, y })
      }
    })

    it('should be reproducible from the seed', () => {
      const a = makeAsteroid(emptyWorld())
      const b = makeAsteroid(emptyWorld())
      expect(b.body.x).toBe(a.body.x)
      expect(b.body.y).toBe(a.body.y)
      expect(b.target).toEqual(a.target)
      expect(b.skin).toBe(a.skin)
    })
  })

  describe('makeEnemyShip', () => {
    it('should wait offscreen on its own position', () => {
      const world = emptyWorld({ levels: [emptyLevel({ enemySpeedRange: [30, 80] })] })
      const ship = makeEnemyShip(world)

      expect(ship.target).toEqual({ x: ship.body.x, y: ship.body.y })
      expect(ship.body.speed).toBeGreaterThanOrEqual(30)
      expect(ship.body.speed).toBeLessThan(80)
      expect(ship.fire.reloadTicks).toBe(20)
      expect(ship.fire.projectileSkin).toBe('laserRed01')
    })
  })

  describe('spawnStartingPopulations', () => {
    it('should fill the first level with ten asteroids', () => {
      const world = createWorld()
      expect(world.asteroids.size).toBe(10)
      expect(world.enemies.size).toBe(0)
    })

    it('should fill the second level with ten enemy ships', () => {
      const world = createWorld({}, 1)
      expect(world.asteroids.size).toBe(0)
      expect(world.enemies.size).toBe(10)
    })
  })

  describe('refillPopulations', () => {
    it('should add one entity each time a cadence comes due', () => {
      const world = emptyWorld({
        levels: [emptyLevel({ asteroidSpawnInterval: 2, enemySpawnInterval: 3 })],
      })

      expect(refillPopulations(world)).toEqual({ asteroids: 0, enemies: 0 })
      expect(refillPopulations(world)).toEqual({ asteroids: 1, enemies: 0 })
      expect(refillPopulations(world)).toEqual({ asteroids: 0, enemies: 1 })
      expect(refillPopulations(world)).toEqual({ asteroids: 1, enemies: 0 })
      expect(world.asteroids.size).toBe(2)
      expect(world.enemies.size).toBe(1)
    })

    it('should do nothing for populations without a cadence', () => {
      const world = emptyWorld()
      for (let i = 0; i < 200; i++) refillPopulations(world)
      expect(world.asteroids.size).toBe(0)
      expect(world.enemies.size).toBe(0)
    })
  })
})
