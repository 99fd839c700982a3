import { scaleSize, type Size } from '../entities/Entity.ts'
import { normalizeRange, type ValueRange } from '../systems/Spawner.ts'

/**
 * A skin id plus the size it is drawn (and collides) at
 */
export interface SpriteSpec {
  readonly skin: string
  readonly size: Size
}

function sprite(skin: string, width: number, height: number, scale: number): SpriteSpec {
  return { skin, size: scaleSize({ width, height }, scale) }
}

// Ships and lasers are drawn at half their native size
const SHIP_SCALE = 0.5

export const PLAYER_SHIPS: readonly SpriteSpec[] = [
  sprite('playerShip1', 99, 75, SHIP_SCALE),
  sprite('playerShip2', 112, 75, SHIP_SCALE),
  sprite('playerShip3', 98, 75, SHIP_SCALE),
]

export const ENEMY_SHIPS: readonly SpriteSpec[] = [
  sprite('enemyRed1', 93, 84, SHIP_SCALE),
  sprite('enemyRed2', 104, 84, SHIP_SCALE),
]

export const PLAYER_LASER: SpriteSpec = sprite('laserBlue01', 9, 54, SHIP_SCALE)
export const ENEMY_LASER: SpriteSpec = sprite('laserRed01', 9, 54, SHIP_SCALE)

/** Four big, two medium, two small and two tiny meteors */
export const ASTEROIDS: readonly SpriteSpec[] = [
  sprite('meteorBig1', 101, 84, 1),
  sprite('meteorBig2', 120, 98, 1),
  sprite('meteorBig3', 89, 82, 1),
  sprite('meteorBig4', 98, 96, 1),
  sprite('meteorMed1', 43, 43, 1),
  sprite('meteorMed2', 45, 40, 1),
  sprite('meteorSmall1', 28, 28, 1),
  sprite('meteorSmall2', 29, 26, 1),
  sprite('meteorTiny1', 18, 18, 1),
  sprite('meteorTiny2', 16, 15, 1),
]

export const EXPLOSION: SpriteSpec = sprite('explosion', 256, 256, 1)

/**
 * Sprites shared by every level
 */
export interface SpriteCatalog {
  readonly asteroids: readonly SpriteSpec[]
  readonly playerLaser: SpriteSpec
  readonly enemyLaser: SpriteSpec
}

export const DEFAULT_SPRITES: SpriteCatalog = {
  asteroids: ASTEROIDS,
  playerLaser: PLAYER_LASER,
  enemyLaser: ENEMY_LASER,
}

/**
 * Per-level tuning. Populations with a null spawn interval are never refilled.
 */
export interface LevelConfig {
  readonly pointGoal: number
  readonly playerShip: SpriteSpec
  readonly playerProjectileFade: number
  readonly enemyShip: SpriteSpec
  readonly startingEnemies: number
  /** Frames between spawns */
  readonly enemySpawnInterval: number | null
  readonly enemySpeedRange: ValueRange
  readonly enemyProjectileFade: number
  readonly enemyInitialReload: number
  readonly startingAsteroids: number
  readonly asteroidSpawnInterval: number | null
  readonly asteroidSpeedRange: ValueRange
}

function pick<T>(list: readonly T[], index: number): T {
  const value = list[index]
  if (value === undefined) {
    throw new Error(`No sprite at index ${index}`)
  }
  return value
}

export const LEVELS: readonly LevelConfig[] = [
  {
    pointGoal: 100,
    playerShip: pick(PLAYER_SHIPS, 0),
    playerProjectileFade: 15,
    enemyShip: pick(ENEMY_SHIPS, 0),
    startingEnemies: 0,
    enemySpawnInterval: null,
    enemySpeedRange: [50, 100],
    enemyProjectileFade: 255,
    enemyInitialReload: 10,
    startingAsteroids: 10,
    asteroidSpawnInterval: 60,
    asteroidSpeedRange: [50, 200],
  },
  {
    pointGoal: 200,
    playerShip: pick(PLAYER_SHIPS, 1),
    playerProjectileFade: 15,
    enemyShip: pick(ENEMY_SHIPS, 0),
    startingEnemies: 10,
    enemySpawnInterval: 120,
    enemySpeedRange: [30, 80],
    enemyProjectileFade: 40,
    enemyInitialReload: 10,
    startingAsteroids: 0,
    asteroidSpawnInterval: null,
    asteroidSpeedRange: [50, 200],
  },
  {
    pointGoal: 300,
    playerShip: pick(PLAYER_SHIPS, 2),
    playerProjectileFade: 15,
    enemyShip: pick(ENEMY_SHIPS, 1),
    startingEnemies: 5,
    enemySpawnInterval: 120,
    enemySpeedRange: [80, 130],
    enemyProjectileFade: 40,
    enemyInitialReload: 10,
    startingAsteroids: 10,
    asteroidSpawnInterval: 60,
    asteroidSpeedRange: [100, 200],
  },
]

function checkCount(level: number, name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Level ${level}: ${name} must be a non-negative integer, got ${value}`)
  }
}

function checkInterval(level: number, name: string, value: number | null): void {
  if (value !== null && (!Number.isInteger(value) || value <= 0)) {
    throw new Error(`Level ${level}: ${name} must be a positive integer or null, got ${value}`)
  }
}

/**
 * Throw unless the table covers every level up to maxLevelIndex with
 * well-formed entries
 */
export function validateLevels(levels: readonly LevelConfig[], maxLevelIndex: number): void {
  if (!Number.isInteger(maxLevelIndex) || maxLevelIndex < 0) {
    throw new Error(`Max level index must be a non-negative integer, got ${maxLevelIndex}`)
  }
  if (levels.length < maxLevelIndex + 1) {
    throw new Error(`Level table has ${levels.length} entries, need ${maxLevelIndex + 1}`)
  }

  levels.forEach((level, i) => {
    if (!(level.pointGoal > 0)) {
      throw new Error(`Level ${i}: pointGoal must be positive, got ${level.pointGoal}`)
    }
    checkCount(i, 'startingEnemies', level.startingEnemies)
    checkCount(i, 'startingAsteroids', level.startingAsteroids)
    checkInterval(i, 'enemySpawnInterval', level.enemySpawnInterval)
    checkInterval(i, 'asteroidSpawnInterval', level.asteroidSpawnInterval)
    normalizeRange(level.enemySpeedRange)
    normalizeRange(level.asteroidSpeedRange)
  })
}

/**
 * Level config by index; an index outside the table is a contract violation
 */
export function getLevel(levels: readonly LevelConfig[], index: number): LevelConfig {
  const level = levels[index]
  if (level === undefined) {
    throw new Error(`Unknown level index ${index} (table has ${levels.length})`)
  }
  return level
}
