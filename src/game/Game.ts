import type { Renderer } from './types.ts'
import type { Input } from '../core/Input.ts'
import { InputMapper, type SessionCommand } from '../core/InputMapper.ts'
import type { EngineTarget } from '../core/Engine.ts'
import { SafeConsole } from '../core/SafeConsole.ts'
import { Simulation, type SimulationOptions } from './Simulation.ts'

const logger = SafeConsole.scoped('game')

export type GameState = 'playing' | 'paused' | 'won' | 'lost'

export interface GameOptions extends SimulationOptions {
  input: Input
  renderer?: Renderer
  mapper?: InputMapper
}

/**
 * One play session: turns key state into intent and commands, ticks the
 * simulation while playing, and hands snapshots to the renderer
 */
export class Game implements EngineTarget {
  private input: Input
  private renderer: Renderer | null
  private mapper: InputMapper
  private simulation: Simulation
  private state: GameState = 'playing'

  constructor(options: GameOptions) {
    this.input = options.input
    this.renderer = options.renderer ?? null
    this.mapper = options.mapper ?? new InputMapper()
    this.simulation = new Simulation(options)
  }

  update(): void {
    for (const command of this.mapper.getCommands(this.input)) {
      this.handleCommand(command)
    }

    if (this.state === 'playing') {
      this.simulation.tick(this.mapper.getIntent(this.input))

      const outcome = this.simulation.getOutcome()
      if (outcome !== null) {
        this.state = outcome
        logger.info(`Game ${outcome}, final score ${this.simulation.getScore()}`)
      }
    }

    this.input.clearFrameState()
  }

  render(alpha: number): void {
    this.renderer?.draw(this.simulation.getState(), alpha)
  }

  private handleCommand(command: SessionCommand): void {
    switch (command.type) {
      case 'pause':
        if (this.state === 'playing') {
          this.state = 'paused'
        } else if (this.state === 'paused') {
          this.state = 'playing'
        }
        return
      case 'restart':
        this.simulation.restart()
        this.state = 'playing'
        return
      case 'jumpToLevel':
        this.simulation.jumpToLevel(command.level)
        this.state = 'playing'
        logger.log(`Jumped to level ${command.level + 1}`)
        return
    }
  }

  getState(): GameState {
    return this.state
  }

  getSimulation(): Simulation {
    return this.simulation
  }
}
