/**
 * Shared fixtures for unit tests
 */

import { createProjectile, type Projectile, type ProjectileConfig, type ProjectileLauncher } from '../entities/Projectile.ts'
import { LEVELS, getLevel, type LevelConfig } from '../game/levels.ts'
import type { AudioPlayer, PlayOptions, SoundCue } from '../game/types.ts'
import { createWorld, type World, type WorldOptions } from '../game/World.ts'
import { SoundBoard } from '../game/SoundBoard.ts'
import { createGameConfig } from '../game/config.ts'

/**
 * Launcher that keeps what it was asked to fire
 */
export class RecordingLauncher implements ProjectileLauncher {
  launched: Projectile[] = []
  private nextId = 1000

  launch(config: Omit<ProjectileConfig, 'owner'>): Projectile {
    const projectile = createProjectile(this.nextId++, { ...config, owner: 'enemy' })
    this.launched.push(projectile)
    return projectile
  }
}

/**
 * Audio player that logs cues. Cues in `sticky` report as still playing
 * once started.
 */
export class RecordingAudio implements AudioPlayer {
  played: Array<{ cue: SoundCue; loop: boolean }> = []
  stopped: SoundCue[] = []
  private playing: Set<SoundCue> = new Set()
  private sticky: Set<SoundCue>

  constructor(sticky: SoundCue[] = ['music']) {
    this.sticky = new Set(sticky)
  }

  play(cue: SoundCue, options: PlayOptions = {}): void {
    this.played.push({ cue, loop: options.loop ?? false })
    if (this.sticky.has(cue)) this.playing.add(cue)
  }

  stop(cue: SoundCue): void {
    this.stopped.push(cue)
    this.playing.delete(cue)
  }

  isPlaying(cue: SoundCue): boolean {
    return this.playing.has(cue)
  }

  count(cue: SoundCue): number {
    return this.played.filter(p => p.cue === cue).length
  }
}

/**
 * Level with no asteroids or enemies and no refills
 */
export function emptyLevel(overrides: Partial<LevelConfig> = {}): LevelConfig {
  return {
    ...getLevel(LEVELS, 0),
    startingAsteroids: 0,
    asteroidSpawnInterval: null,
    startingEnemies: 0,
    enemySpawnInterval: null,
    ...overrides,
  }
}

/**
 * Three empty levels with the usual point goals
 */
export function emptyLevels(): LevelConfig[] {
  return [
    emptyLevel({ pointGoal: 100 }),
    emptyLevel({ pointGoal: 200 }),
    emptyLevel({ pointGoal: 300 }),
  ]
}

/**
 * Empty world on the first of three empty levels
 */
export function emptyWorld(options: WorldOptions = {}): World {
  return createWorld({
    config: createGameConfig(),
    levels: emptyLevels(),
    sound: new SoundBoard(new RecordingAudio()),
    ...options,
  })
}
