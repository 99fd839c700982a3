/**
 * HUD - text status line for headless runs
 *
 * Implements the Renderer port by printing score, level, lives and phase.
 * Sprites are summarized as counts; nothing is drawn.
 */

import type { HudView, Renderer, WorldView } from '../game/types.ts'

export interface HUDOptions {
  /** Print every n-th frame; phase changes always print */
  everyFrames?: number
  write?: (line: string) => void
}

const PHASE_LABELS: Record<HudView['phase'], string> = {
  playing: 'PLAYING',
  levelingUp: 'LEVEL UP',
  dying: 'SHIP DOWN',
}

export function formatHud(hud: HudView): string {
  const status = hud.outcome === 'won'
    ? 'YOU WIN'
    : hud.outcome === 'lost'
      ? 'GAME OVER'
      : PHASE_LABELS[hud.phase]
  return `Score: ${hud.score}  Level: ${hud.level}  Extra Lives: ${hud.lives}  [${status}]`
}

export function formatCounts(view: WorldView): string {
  return [
    `asteroids=${view.asteroids.length}`,
    `enemies=${view.enemies.length}`,
    `lasers=${view.playerProjectiles.length}/${view.enemyProjectiles.length}`,
    `explosions=${view.explosions.length}`,
  ].join(' ')
}

export class HUD implements Renderer {
  private everyFrames: number
  private write: (line: string) => void
  private lastFrame = -1
  private lastStatus = ''

  constructor(options: HUDOptions = {}) {
    this.everyFrames = options.everyFrames ?? 60
    this.write = options.write ?? (line => process.stdout.write(`${line}\n`))
  }

  draw(view: WorldView, _alpha: number): void {
    // Several renders can share one simulation frame
    if (view.frame === this.lastFrame) return
    this.lastFrame = view.frame

    const status = formatHud(view.hud)
    const due = view.frame % this.everyFrames === 0
    if (!due && status === this.lastStatus) return

    this.lastStatus = status
    this.write(`#${view.frame} ${status} ${formatCounts(view)}`)
  }
}
