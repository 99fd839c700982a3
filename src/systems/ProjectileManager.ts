import {
  createProjectile,
  advanceProjectile,
  type Projectile,
  type ProjectileConfig,
  type ProjectileLauncher,
  type ProjectileOwner,
} from '../entities/Projectile.ts'
import { EntityStore, type IdSequence } from './EntityStore.ts'
import type { SoundBoard } from '../game/SoundBoard.ts'
import type { SoundCue } from '../game/types.ts'
import type { ScreenSize } from '../math/Kinematics.ts'

/**
 * Owns one projectile pool (player lasers or enemy lasers).
 * Ships fire through launch(); the world advances and sweeps the pool.
 */
export class ProjectileManager implements ProjectileLauncher {
  readonly owner: ProjectileOwner
  readonly store: EntityStore<Projectile> = new EntityStore()
  private ids: IdSequence
  private sound: SoundBoard
  private shotCue: SoundCue
  private fired: number = 0

  constructor(owner: ProjectileOwner, ids: IdSequence, sound: SoundBoard) {
    this.owner = owner
    this.ids = ids
    this.sound = sound
    this.shotCue = owner === 'player' ? 'playerShot' : 'enemyShot'
  }

  launch(config: Omit<ProjectileConfig, 'owner'>): Projectile {
    const projectile = createProjectile(this.ids.next(), { ...config, owner: this.owner })
    this.store.add(projectile)
    this.fired++
    this.sound.play(this.shotCue)
    return projectile
  }

  /**
   * Move and fade every live projectile
   */
  advance(dt: number, screen: ScreenSize): void {
    for (const projectile of this.store) {
      if (projectile.alive) {
        advanceProjectile(projectile, dt, screen)
      }
    }
  }

  sweep(): number {
    return this.store.sweep()
  }

  clear(): void {
    this.store.clear()
  }

  /** Projectiles launched since creation */
  getFiredCount(): number {
    return this.fired
  }
}
