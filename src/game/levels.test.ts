import { describe, it, expect } from 'vitest'
import { LEVELS, PLAYER_SHIPS, ASTEROIDS, validateLevels, getLevel, type LevelConfig } from './levels.ts'

function withLevel(index: number, overrides: Partial<LevelConfig>): LevelConfig[] {
  return LEVELS.map((level, i) => (i === index ? { ...level, ...overrides } : level))
}

describe('levels', () => {
  describe('LEVELS', () => {
    it('should have three levels with rising goals', () => {
      expect(LEVELS.map(l => l.pointGoal)).toEqual([100, 200, 300])
    })

    it('should give each level its own player ship', () => {
      expect(LEVELS.map(l => l.playerShip.skin)).toEqual(['playerShip1', 'playerShip2', 'playerShip3'])
    })

    it('should scale ships to half size', () => {
      expect(PLAYER_SHIPS[0]?.size).toEqual({ width: 49.5, height: 37.5 })
    })

    it('should offer ten asteroid sprites', () => {
      expect(ASTEROIDS).toHaveLength(10)
    })
  })

  describe('validateLevels', () => {
    it('should accept the built-in table', () => {
      expect(() => validateLevels(LEVELS, 2)).not.toThrow()
    })

    it('should reject a table shorter than the max level', () => {
      expect(() => validateLevels(LEVELS, 3)).toThrow('Level table has 3 entries, need 4')
    })

    it('should reject a non-positive goal', () => {
      expect(() => validateLevels(withLevel(1, { pointGoal: 0 }), 2)).toThrow('Level 1: pointGoal')
    })

    it('should reject a zero spawn interval', () => {
      expect(() => validateLevels(withLevel(0, { asteroidSpawnInterval: 0 }), 2)).toThrow('asteroidSpawnInterval')
    })

    it('should reject a malformed speed range', () => {
      expect(() => validateLevels(withLevel(2, { enemySpeedRange: [1, 2, 3, 4] }), 2)).toThrow('1 to 3 integers')
    })
  })

  describe('getLevel', () => {
    it('should throw on an unknown index', () => {
      expect(() => getLevel(LEVELS, 3)).toThrow('Unknown level index 3')
      expect(() => getLevel(LEVELS, -1)).toThrow('Unknown level index -1')
    })
  })
})
