import type { EnemyFireConfig } from '../entities/EnemyShip.ts'
import type { ScreenSize } from '../math/Kinematics.ts'
import type { ValueRange } from '../systems/Spawner.ts'

export interface PlayerTuning {
  /** Degrees per second */
  angleRate: number
  /** Pixels per second */
  forwardRate: number
  /** Frames between shots while fire is held */
  reloadTime: number
  /** Degrees added to the ship's facing when firing */
  firingAngleBias: number
  projectileSpeed: number
}

export interface RetreatTuning {
  /** Frames into the dying phase before enemies start backing off */
  delayFrames: number
  /** Speed lost per frame */
  deceleration: number
  maxReverseSpeed: number
}

/**
 * Global tuning shared by every level
 */
export interface GameConfig {
  screen: ScreenSize
  fps: number
  seed: number
  /** Extra lives; a hit with none left ends the session */
  startingLives: number
  asteroidPoints: number
  enemyPoints: number
  levelUpDelay: number
  dyingDelay: number
  asteroidSpin: ValueRange
  player: PlayerTuning
  enemyFire: EnemyFireConfig
  retreat: RetreatTuning
}

export type GameConfigOverrides =
  Partial<Omit<GameConfig, 'screen' | 'player' | 'enemyFire' | 'retreat'>> & {
    screen?: Partial<ScreenSize>
    player?: Partial<PlayerTuning>
    enemyFire?: Partial<EnemyFireConfig>
    retreat?: Partial<RetreatTuning>
  }

export const DEFAULT_GAME_CONFIG: GameConfig = {
  screen: { width: 1400, height: 800 },
  fps: 60,
  seed: 12345,
  startingLives: 3,
  asteroidPoints: 5,
  enemyPoints: 15,
  levelUpDelay: 60,
  dyingDelay: 120,
  asteroidSpin: [-5, 6, 2],
  player: {
    angleRate: 360,
    forwardRate: 360,
    reloadTime: 10,
    firingAngleBias: 0,
    projectileSpeed: 400,
  },
  enemyFire: {
    reloadDistance: 6000,
    minReloadSpeed: 20,
    nonPositiveSpeed: 'floor',
    projectileSpeedFactor: 3,
    minProjectileSpeed: 50,
    angleOffset: 0,
  },
  retreat: {
    delayFrames: 30,
    deceleration: 6,
    maxReverseSpeed: 150,
  },
}

/**
 * Merge overrides into the defaults and check the result
 */
export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const config: GameConfig = {
    ...DEFAULT_GAME_CONFIG,
    ...overrides,
    screen: { ...DEFAULT_GAME_CONFIG.screen, ...overrides.screen },
    player: { ...DEFAULT_GAME_CONFIG.player, ...overrides.player },
    enemyFire: { ...DEFAULT_GAME_CONFIG.enemyFire, ...overrides.enemyFire },
    retreat: { ...DEFAULT_GAME_CONFIG.retreat, ...overrides.retreat },
  }
  validateGameConfig(config)
  return config
}

function requirePositive(name: string, value: number): void {
  if (!(value > 0)) {
    throw new Error(`${name} must be positive, got ${value}`)
  }
}

function requireFrameCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a whole number of frames, got ${value}`)
  }
}

export function validateGameConfig(config: GameConfig): void {
  requirePositive('screen.width', config.screen.width)
  requirePositive('screen.height', config.screen.height)
  requirePositive('fps', config.fps)
  requirePositive('enemyFire.reloadDistance', config.enemyFire.reloadDistance)
  requirePositive('enemyFire.minReloadSpeed', config.enemyFire.minReloadSpeed)
  requireFrameCount('startingLives', config.startingLives)
  requireFrameCount('levelUpDelay', config.levelUpDelay)
  requireFrameCount('dyingDelay', config.dyingDelay)
  requireFrameCount('retreat.delayFrames', config.retreat.delayFrames)
}

/**
 * Seconds per simulated frame
 */
export function frameTime(config: GameConfig): number {
  return 1 / config.fps
}
