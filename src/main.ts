/**
 * Headless entry point
 *
 * Runs one session with an autopilot that spins left and holds fire,
 * printing the HUD once a second until the session ends or the time
 * limit passes.
 *
 *   npm start -- [seconds] [seed]
 */

import { Engine } from './core/Engine.ts'
import { Input } from './core/Input.ts'
import { SafeConsole } from './core/SafeConsole.ts'
import { Game } from './game/Game.ts'
import { createGameConfig } from './game/config.ts'
import { HUD } from './ui/HUD.ts'

function parseNumberArg(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got "${value}"`)
  }
  return parsed
}

function main(): void {
  const seconds = parseNumberArg(process.argv[2], 30, 'seconds')
  const seed = parseNumberArg(process.argv[3], 12345, 'seed')

  const input = new Input()
  const game = new Game({
    input,
    renderer: new HUD(),
    config: createGameConfig({ seed }),
  })

  input.keyDown('ArrowLeft')
  input.keyDown('Space')

  let limit: ReturnType<typeof setTimeout> | null = null
  let done = false
  const finish = (): void => {
    if (done) return
    done = true
    engine.stop()
    if (limit) clearTimeout(limit)
    const sim = game.getSimulation()
    console.log(`Finished after ${sim.getFrame()} frames: ${game.getState()}, score ${sim.getScore()}`)
  }

  const engine = new Engine({
    update() {
      game.update()
      if (game.getState() === 'won' || game.getState() === 'lost') {
        finish()
      }
    },
    render(alpha) {
      game.render(alpha)
    },
  })

  limit = setTimeout(finish, seconds * 1000)
  engine.start()
  SafeConsole.info(`Autopilot running for ${seconds}s with seed ${seed}`)
}

main()
