import { SeededRandom } from '../math/SeededRandom.ts'
import { createPlayerShip, type PlayerShip } from '../entities/Player.ts'
import type { Asteroid } from '../entities/Asteroid.ts'
import type { EnemyShip } from '../entities/EnemyShip.ts'
import { EntityStore, IdSequence } from '../systems/EntityStore.ts'
import { ProjectileManager } from '../systems/ProjectileManager.ts'
import { SpawnCadence, spawnStartingPopulations } from '../systems/Spawner.ts'
import { ExplosionSystem } from '../systems/ExplosionSystem.ts'
import { SoundBoard } from './SoundBoard.ts'
import { createGameConfig, frameTime, type GameConfig } from './config.ts'
import { LEVELS, DEFAULT_SPRITES, getLevel, type LevelConfig, type SpriteCatalog } from './levels.ts'
import type { EffectSystem } from './types.ts'

/**
 * Everything a frame reads or mutates. Subsystems receive the world
 * explicitly instead of reaching into each other.
 */
export interface World {
  readonly config: GameConfig
  readonly levels: readonly LevelConfig[]
  readonly sprites: SpriteCatalog
  /** Seconds per frame */
  readonly dt: number
  readonly rng: SeededRandom
  readonly ids: IdSequence
  readonly sound: SoundBoard
  readonly effects: EffectSystem
  levelIndex: number
  level: LevelConfig
  player: PlayerShip
  readonly asteroids: EntityStore<Asteroid>
  readonly enemies: EntityStore<EnemyShip>
  readonly playerShots: ProjectileManager
  readonly enemyShots: ProjectileManager
  readonly asteroidCadence: SpawnCadence
  readonly enemyCadence: SpawnCadence
}

export interface WorldOptions {
  config?: GameConfig
  levels?: readonly LevelConfig[]
  sprites?: SpriteCatalog
  rng?: SeededRandom
  sound?: SoundBoard
  effects?: EffectSystem
}

function makePlayer(ids: IdSequence, config: GameConfig, level: LevelConfig, sprites: SpriteCatalog): PlayerShip {
  return createPlayerShip(ids.next(), {
    x: Math.floor(config.screen.width / 2),
    y: Math.floor(config.screen.height / 2),
    size: level.playerShip.size,
    skin: level.playerShip.skin,
    ...config.player,
    projectileFadeRate: level.playerProjectileFade,
    projectileSize: sprites.playerLaser.size,
    projectileSkin: sprites.playerLaser.skin,
  })
}

/**
 * Build a world seeded for the given level
 */
export function createWorld(options: WorldOptions = {}, levelIndex: number = 0): World {
  const config = options.config ?? createGameConfig()
  const levels = options.levels ?? LEVELS
  const sprites = options.sprites ?? DEFAULT_SPRITES
  const sound = options.sound ?? new SoundBoard()
  const ids = new IdSequence()
  const level = getLevel(levels, levelIndex)

  const world: World = {
    config,
    levels,
    sprites,
    dt: frameTime(config),
    rng: options.rng ?? new SeededRandom(config.seed),
    ids,
    sound,
    effects: options.effects ?? new ExplosionSystem(sound),
    levelIndex,
    level,
    player: makePlayer(ids, config, level, sprites),
    asteroids: new EntityStore(),
    enemies: new EntityStore(),
    playerShots: new ProjectileManager('player', ids, sound),
    enemyShots: new ProjectileManager('enemy', ids, sound),
    asteroidCadence: new SpawnCadence(level.asteroidSpawnInterval),
    enemyCadence: new SpawnCadence(level.enemySpawnInterval),
  }

  spawnStartingPopulations(world)
  return world
}

/**
 * Throw away every entity and rebuild the given level's starting state.
 * Running explosions play out across the switch.
 * Ids keep counting so stale handles never match new entities.
 */
export function seedWorld(world: World, levelIndex: number): void {
  const level = getLevel(world.levels, levelIndex)

  world.asteroids.clear()
  world.enemies.clear()
  world.playerShots.clear()
  world.enemyShots.clear()

  world.levelIndex = levelIndex
  world.level = level
  world.player = makePlayer(world.ids, world.config, level, world.sprites)
  world.asteroidCadence.reset(level.asteroidSpawnInterval)
  world.enemyCadence.reset(level.enemySpawnInterval)

  spawnStartingPopulations(world)
}

/**
 * Retired entities are dropped at the end of every frame
 */
export function sweepWorld(world: World): void {
  world.asteroids.sweep()
  world.enemies.sweep()
  world.playerShots.sweep()
  world.enemyShots.sweep()
}
