/**
 * Deterministic frame-by-frame game simulation.
 *
 * Every frame runs the same fixed sequence:
 *   1. phase check (may reseed the world or end the session)
 *   2. collision resolution
 *   3. scoring
 *   4. control intent applied to the player
 *   5. population refill
 *   6. enemy retargeting, or silence and retreat while the player is dead
 *   7. advance every collection, then sweep retired entities
 *
 * Collisions are resolved against the positions drawn last frame, before
 * anything moves. All randomness comes from the world's seeded RNG.
 */

import { applyIntent, advancePlayer } from '../entities/Player.ts'
import { advanceAsteroid } from '../entities/Asteroid.ts'
import { advanceEnemyShip, disableFire, retreat } from '../entities/EnemyShip.ts'
import { setTarget } from '../entities/Targeting.ts'
import type { EntityBase } from '../entities/Entity.ts'
import { resolveCollisions, type CollisionReport } from '../systems/CollisionSystem.ts'
import { refillPopulations } from '../systems/Spawner.ts'
import { SafeConsole } from '../core/SafeConsole.ts'
import { createWorld, seedWorld, sweepWorld, type World, type WorldOptions } from './World.ts'
import { ScoreTracker } from './ScoreTracker.ts'
import { LevelStateMachine, type Phase, type PhaseStep } from './LevelStateMachine.ts'
import { validateLevels, LEVELS } from './levels.ts'
import { createGameConfig } from './config.ts'
import { NO_INTENT, type ControlIntent, type Outcome, type SpriteView, type WorldView } from './types.ts'

export interface SimulationOptions extends WorldOptions {
  /** Highest level index play can reach; defaults to the last table entry */
  maxLevelIndex?: number
}

/**
 * Summary of one tick, for callers that react to game events
 */
export interface TickResult {
  frame: number
  phase: Phase
  step: PhaseStep
  collisions: CollisionReport
  pointsGained: number
}

const logger = SafeConsole.scoped('sim')

const IDLE_COLLISIONS: CollisionReport = { playerHit: false, asteroidsHit: 0, enemiesHit: 0 }

function toSpriteView(entity: EntityBase, opacity: number = 255): SpriteView {
  return {
    id: entity.id,
    kind: entity.kind,
    x: entity.body.x,
    y: entity.body.y,
    angle: entity.body.angle,
    width: entity.body.width,
    height: entity.body.height,
    opacity,
    skin: entity.skin,
  }
}

export class Simulation {
  private world: World
  private score: ScoreTracker
  private phases: LevelStateMachine
  private maxLevelIndex: number
  private frame: number = 0
  private outcome: Outcome | null = null

  constructor(options: SimulationOptions = {}) {
    const config = options.config ?? createGameConfig()
    const levels = options.levels ?? LEVELS
    this.maxLevelIndex = options.maxLevelIndex ?? levels.length - 1
    validateLevels(levels, this.maxLevelIndex)

    this.world = createWorld({ ...options, config, levels }, 0)
    this.score = new ScoreTracker(config)
    this.phases = new LevelStateMachine(config)
    this.world.sound.startMusic()
  }

  // ==========================================================================
  // Main Tick
  // ==========================================================================

  /**
   * Advance one frame. Once the session has an outcome, ticks do nothing.
   */
  tick(intent: ControlIntent = NO_INTENT): TickResult | null {
    if (this.outcome !== null) return null

    this.frame++
    const world = this.world

    // 1. Phase check
    const step = this.phases.step({
      score: this.score.getScore(),
      pointGoal: world.level.pointGoal,
      playerAlive: world.player.alive,
      livesLeft: this.score.hasLivesLeft(),
      finalLevel: world.levelIndex >= this.maxLevelIndex,
    })
    this.applyPhaseStep(step)
    if (this.outcome !== null) {
      return { frame: this.frame, phase: this.phases.getPhase(), step, collisions: IDLE_COLLISIONS, pointsGained: 0 }
    }

    // 2. Collisions
    const collisions = resolveCollisions(world)

    // 3. Scoring; nothing counts once the player is down
    const pointsGained = this.phases.getPhase() === 'dying' ? 0 : this.score.addHits(collisions)

    // 4. Control intent
    if (world.player.alive) {
      applyIntent(world.player, intent)
    }

    // 5. Spawn
    refillPopulations(world)

    // 6. Retarget or retreat
    this.steerEnemies()

    // 7. Advance
    this.advanceAll()
    sweepWorld(world)

    return { frame: this.frame, phase: this.phases.getPhase(), step, collisions, pointsGained }
  }

  // ==========================================================================
  // Phase Handling
  // ==========================================================================

  private applyPhaseStep(step: PhaseStep): void {
    const world = this.world

    if (step.cue) {
      world.sound.playOnce(step.cue)
    }

    if (step.entered === 'dying') {
      world.playerShots.clear()
    }

    switch (step.resolution) {
      case null:
        return
      case 'nextLevel':
        logger.log(`Level ${world.levelIndex + 1} cleared at ${this.score.getScore()} points`)
        this.loadLevel(world.levelIndex + 1)
        return
      case 'restart':
        this.score.loseLife()
        logger.log(`Life lost, ${this.score.getLives()} left`)
        this.loadLevel(world.levelIndex)
        return
      case 'win':
        this.endSession('won')
        return
      case 'loss':
        this.endSession('lost')
        return
    }
  }

  private loadLevel(index: number): void {
    seedWorld(this.world, index)
    this.world.sound.startMusic()
  }

  private endSession(outcome: Outcome): void {
    this.outcome = outcome
    this.world.sound.stopMusic()
    logger.log(`Session ${outcome} with ${this.score.getScore()} points`)
  }

  // ==========================================================================
  // Enemy Steering
  // ==========================================================================

  private steerEnemies(): void {
    const world = this.world
    const player = world.player

    if (player.alive) {
      for (const enemy of world.enemies) {
        if (enemy.alive) setTarget(enemy, player.body)
      }
      return
    }

    const { delayFrames, deceleration, maxReverseSpeed } = world.config.retreat
    const retreating = this.phases.getPhase() === 'dying' && this.phases.getFramesInPhase() >= delayFrames
    for (const enemy of world.enemies) {
      if (!enemy.alive) continue
      // Ships spawned after the player died stay silent too
      disableFire(enemy)
      if (retreating) {
        retreat(enemy, deceleration, maxReverseSpeed)
      }
    }
  }

  private advanceAll(): void {
    const world = this.world
    const { dt } = world

    advancePlayer(world.player, dt, world.config.screen, world.playerShots)
    world.playerShots.advance(dt, world.config.screen)
    for (const asteroid of world.asteroids) {
      if (asteroid.alive) advanceAsteroid(asteroid, dt)
    }
    for (const enemy of world.enemies) {
      if (enemy.alive) advanceEnemyShip(enemy, dt, world.enemyShots, world.config.enemyFire)
    }
    world.enemyShots.advance(dt, world.config.screen)
    world.effects.advance()
  }

  // ==========================================================================
  // Session Control
  // ==========================================================================

  /**
   * Back to the first level with no points and full lives, from any phase
   */
  restart(): void {
    this.score.reset()
    this.phases.reset()
    this.outcome = null
    this.world.effects.clear()
    this.loadLevel(0)
    logger.log('Session restarted')
  }

  /**
   * Start a level directly with the points needed to reach it and full lives
   */
  jumpToLevel(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this.maxLevelIndex) {
      throw new Error(`Cannot jump to level ${index}; levels run 0 to ${this.maxLevelIndex}`)
    }
    const previous = this.world.levels[index - 1]
    this.score.setScore(previous ? previous.pointGoal : 0)
    this.score.resetLives()
    this.phases.reset()
    this.outcome = null
    this.world.effects.clear()
    this.loadLevel(index)
  }

  // ==========================================================================
  // State Access
  // ==========================================================================

  getState(): WorldView {
    const world = this.world
    const views = (entities: Iterable<EntityBase>): SpriteView[] => {
      const out: SpriteView[] = []
      for (const entity of entities) {
        if (entity.alive) out.push(toSpriteView(entity))
      }
      return out
    }
    const shotViews = (shots: World['playerShots']): SpriteView[] =>
      shots.store.alive().map(p => toSpriteView(p, p.opacity))

    return {
      frame: this.frame,
      player: world.player.alive ? [toSpriteView(world.player)] : [],
      asteroids: views(world.asteroids),
      enemies: views(world.enemies),
      playerProjectiles: shotViews(world.playerShots),
      enemyProjectiles: shotViews(world.enemyShots),
      explosions: world.effects.getViews(),
      hud: {
        score: this.score.getScore(),
        level: world.levelIndex + 1,
        lives: this.score.getLives(),
        phase: this.phases.getPhase(),
        outcome: this.outcome,
      },
    }
  }

  /**
   * Order-sensitive hash of entity positions, for comparing two runs
   */
  getChecksum(): number {
    let hash = this.frame
    const mix = (entity: EntityBase): void => {
      hash ^= entity.id
      hash ^= Math.round(entity.body.x * 1000)
      hash ^= Math.round(entity.body.y * 1000)
      hash = (hash * 31) >>> 0
    }
    if (this.world.player.alive) mix(this.world.player)
    for (const asteroid of this.world.asteroids) mix(asteroid)
    for (const enemy of this.world.enemies) mix(enemy)
    for (const shot of this.world.playerShots.store) mix(shot)
    for (const shot of this.world.enemyShots.store) mix(shot)
    return hash
  }

  getWorld(): World {
    return this.world
  }

  getFrame(): number {
    return this.frame
  }

  getPhase(): Phase {
    return this.phases.getPhase()
  }

  getFramesInPhase(): number {
    return this.phases.getFramesInPhase()
  }

  getScore(): number {
    return this.score.getScore()
  }

  getLives(): number {
    return this.score.getLives()
  }

  getLevelIndex(): number {
    return this.world.levelIndex
  }

  getOutcome(): Outcome | null {
    return this.outcome
  }

  isOver(): boolean {
    return this.outcome !== null
  }
}
