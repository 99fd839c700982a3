import { describe, it, expect } from 'vitest'
import { createAsteroid, advanceAsteroid } from './Asteroid.ts'

describe('Asteroid', () => {
  describe('createAsteroid', () => {
    it('should collide as a circle', () => {
      const asteroid = createAsteroid(1, { x: 0, y: 0, size: { width: 28, height: 28 }, skin: 'meteorSmall1' })
      expect(asteroid.kind).toBe('asteroid')
      expect(asteroid.body.shape).toEqual({ type: 'circle', radius: 14 })
      expect(asteroid.spin).toBe(0)
    })

    it('should copy the target', () => {
      const target = { x: 5, y: 5 }
      const asteroid = createAsteroid(1, { x: 0, y: 0, size: { width: 10, height: 10 }, skin: 'm', target })
      target.x = 50
      expect(asteroid.target).toEqual({ x: 5, y: 5 })
    })
  })

  describe('advanceAsteroid', () => {
    it('should spin by its rate every frame', () => {
      const asteroid = createAsteroid(1, {
        x: 0, y: 0, size: { width: 10, height: 10 }, skin: 'm', speed: 1, spin: 3, target: { x: 100, y: 0 },
      })
      advanceAsteroid(asteroid, 1)
      advanceAsteroid(asteroid, 1)
      expect(asteroid.body.angle).toBe(6)
    })

    it('should retire on the frame it lands on its target', () => {
      const asteroid = createAsteroid(1, {
        x: 0, y: 0, size: { width: 10, height: 10 }, skin: 'm', speed: 1, target: { x: 10, y: 0 },
      })
      for (let i = 0; i < 9; i++) {
        expect(advanceAsteroid(asteroid, 1)).toBe(true)
      }
      expect(asteroid.body.x).toBe(9)

      expect(advanceAsteroid(asteroid, 1)).toBe(false)
      expect(asteroid.body.x).toBe(10)
      expect(asteroid.alive).toBe(false)
    })

    it('should not move at zero speed', () => {
      const asteroid = createAsteroid(1, {
        x: 0, y: 0, size: { width: 10, height: 10 }, skin: 'm', target: { x: 10, y: 0 },
      })
      advanceAsteroid(asteroid, 1)
      expect(asteroid.body.x).toBe(0)
      expect(asteroid.alive).toBe(true)
    })
  })
})
