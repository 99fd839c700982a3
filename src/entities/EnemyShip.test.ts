import { describe, it, expect } from 'vitest'
import {
  createEnemyShip,
  advanceEnemyShip,
  reloadAfterShot,
  enemyProjectileSpeed,
  disableFire,
  isFireEnabled,
  retreat,
  type EnemyFireConfig,
  type EnemyShipConfig,
} from './EnemyShip.ts'
import { DEFAULT_GAME_CONFIG } from '../game/config.ts'
import { RecordingLauncher } from '../test/helpers.ts'

const FIRE: EnemyFireConfig = DEFAULT_GAME_CONFIG.enemyFire

function enemy(overrides: Partial<EnemyShipConfig> = {}) {
  return createEnemyShip(7, {
    x: 0,
    y: 0,
    size: { width: 46, height: 42 },
    skin: 'enemyRed1',
    speed: 100,
    initialReload: 10,
    projectileFadeRate: 10,
    projectileSize: { width: 4, height: 27 },
    projectileSkin: 'laserRed01',
    fire: FIRE,
    ...overrides,
  })
}

describe('EnemyShip', () => {
  describe('reloadAfterShot', () => {
    it('should reload faster the faster the ship moves', () => {
      expect(reloadAfterShot(100, FIRE)).toBe(60)
      expect(reloadAfterShot(50, FIRE)).toBe(120)
    })

    it('should clamp slow ships to 255 frames', () => {
      expect(reloadAfterShot(10, FIRE)).toBe(255)
    })

    it('should floor the divisor for a stopped ship', () => {
      expect(reloadAfterShot(0, FIRE)).toBe(255)
      expect(reloadAfterShot(-40, FIRE)).toBe(255)
    })

    it('should disable fire for a stopped ship under the disable policy', () => {
      const config: EnemyFireConfig = { ...FIRE, nonPositiveSpeed: 'disable' }
      expect(reloadAfterShot(0, config)).toBeNull()
      expect(reloadAfterShot(10, config)).toBe(255)
    })

    it('should round up', () => {
      expect(reloadAfterShot(7000, { ...FIRE, minReloadSpeed: 1 })).toBe(1)
    })
  })

  describe('enemyProjectileSpeed', () => {
    it('should be three times the ship speed with a floor of 50', () => {
      expect(enemyProjectileSpeed(10, FIRE)).toBe(50)
      expect(enemyProjectileSpeed(100, FIRE)).toBe(300)
    })
  })

  describe('createEnemyShip', () => {
    it('should hold fire for ten frames past the initial reload', () => {
      expect(enemy().fire.reloadTicks).toBe(20)
    })

    it('should target its own position', () => {
      const ship = enemy({ x: 30, y: 40 })
      expect(ship.target).toEqual({ x: 30, y: 40 })
    })

    it('should derive projectile speed from ship speed', () => {
      expect(enemy({ speed: 100 }).fire.projectileSpeed).toBe(300)
    })
  })

  describe('advanceEnemyShip', () => {
    it('should face its direction of travel', () => {
      const ship = enemy()
      ship.target = { x: 100, y: 0 }
      advanceEnemyShip(ship, 1 / 60, new RecordingLauncher(), FIRE)
      expect(ship.body.angle).toBe(-90)
    })

    it('should fire on the 20th frame and then every 60 frames at speed 100', () => {
      const ship = enemy()
      const launcher = new RecordingLauncher()
      const shotFrames: number[] = []

      for (let frame = 1; frame <= 140; frame++) {
        if (advanceEnemyShip(ship, 1 / 60, launcher, FIRE)) shotFrames.push(frame)
      }

      expect(shotFrames).toEqual([20, 80, 140])
      expect(launcher.launched[0]?.body.speed).toBe(300)
      expect(launcher.launched[0]?.fadeRate).toBe(10)
      expect(launcher.launched[0]?.skin).toBe('laserRed01')
    })

    it('should fire along its facing plus the angle offset', () => {
      const ship = enemy({ fire: { ...FIRE, angleOffset: 15 }, initialReload: 0 })
      ship.target = { x: 1000, y: 0 }
      const launcher = new RecordingLauncher()
      for (let i = 0; i < 10; i++) {
        advanceEnemyShip(ship, 1 / 60, launcher, FIRE)
      }
      expect(launcher.launched[0]?.heading).toBe(-75)
    })

    it('should stop firing after a shot at zero speed under the disable policy', () => {
      const config: EnemyFireConfig = { ...FIRE, nonPositiveSpeed: 'disable' }
      const ship = enemy({ speed: 0, initialReload: 0, fire: config })
      const launcher = new RecordingLauncher()
      for (let i = 0; i < 10; i++) {
        advanceEnemyShip(ship, 1 / 60, launcher, config)
      }
      expect(launcher.launched).toHaveLength(1)
      expect(isFireEnabled(ship)).toBe(false)
    })

    it('should never fire once disabled', () => {
      const ship = enemy({ initialReload: 0 })
      const launcher = new RecordingLauncher()
      disableFire(ship)
      for (let i = 0; i < 300; i++) {
        expect(advanceEnemyShip(ship, 1 / 60, launcher, FIRE)).toBe(false)
      }
      expect(launcher.launched).toHaveLength(0)
    })

    it('should throw when due to fire with no launcher', () => {
      const ship = enemy({ initialReload: 0 })
      for (let i = 0; i < 9; i++) {
        advanceEnemyShip(ship, 1 / 60, undefined, FIRE)
      }
      expect(() => advanceEnemyShip(ship, 1 / 60, undefined, FIRE)).toThrow('no projectile manager')
    })
  })

  describe('retreat', () => {
    it('should slow down by the deceleration', () => {
      const ship = enemy({ speed: 100 })
      retreat(ship, 6, 150)
      expect(ship.body.speed).toBe(94)
    })

    it('should reverse up to the maximum', () => {
      const ship = enemy({ speed: 100 })
      for (let i = 0; i < 50; i++) {
        retreat(ship, 6, 150)
      }
      expect(ship.body.speed).toBe(-150)
    })
  })
})
