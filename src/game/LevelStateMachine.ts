import type { SoundCue } from './types.ts'

/**
 * Exactly one phase holds at a time; framesInPhase counts frames since entry
 */
export type Phase = 'playing' | 'levelingUp' | 'dying'

export type Resolution = 'nextLevel' | 'win' | 'restart' | 'loss'

export interface PhaseDelays {
  levelUpDelay: number
  dyingDelay: number
}

/**
 * What the state machine looks at once per frame
 */
export interface PhaseInput {
  score: number
  pointGoal: number
  playerAlive: boolean
  livesLeft: boolean
  finalLevel: boolean
}

export interface PhaseStep {
  phase: Phase
  /** Phase entered this frame, if any */
  entered: Phase | null
  /** One-shot cue for the entry frame */
  cue: SoundCue | null
  resolution: Resolution | null
}

/**
 * Delayed level/life transitions.
 *
 * From playing, reaching the point goal enters levelingUp, and otherwise a
 * dead player enters dying. The entry frame counts as frame 0 and the phase
 * resolves on the frame the counter reaches its delay, so a phase is held
 * for exactly `delay` frames.
 */
export class LevelStateMachine {
  private delays: PhaseDelays
  private phase: Phase = 'playing'
  private framesInPhase: number = 0

  constructor(delays: PhaseDelays) {
    this.delays = delays
  }

  getPhase(): Phase {
    return this.phase
  }

  getFramesInPhase(): number {
    return this.framesInPhase
  }

  /**
   * Run the phase check for one frame
   */
  step(input: PhaseInput): PhaseStep {
    if (this.phase === 'playing') {
      return this.checkEntry(input)
    }

    this.framesInPhase++
    if (this.framesInPhase < this.delayFor(this.phase)) {
      return { phase: this.phase, entered: null, cue: null, resolution: null }
    }
    return { phase: 'playing', entered: null, cue: null, resolution: this.resolve(input) }
  }

  reset(): void {
    this.phase = 'playing'
    this.framesInPhase = 0
  }

  private checkEntry(input: PhaseInput): PhaseStep {
    let cue: SoundCue
    if (input.score >= input.pointGoal) {
      this.enter('levelingUp')
      cue = input.finalLevel ? 'win' : 'levelUp'
    } else if (!input.playerAlive) {
      this.enter('dying')
      cue = input.livesLeft ? 'lifeLost' : 'gameOver'
    } else {
      return { phase: 'playing', entered: null, cue: null, resolution: null }
    }

    const entered = this.phase
    // A zero delay resolves on the entry frame itself
    const resolution = this.delayFor(entered) <= 0 ? this.resolve(input) : null
    return { phase: this.phase, entered, cue, resolution }
  }

  private enter(phase: Phase): void {
    this.phase = phase
    this.framesInPhase = 0
  }

  private resolve(input: PhaseInput): Resolution {
    const leaving = this.phase
    this.enter('playing')

    if (leaving === 'levelingUp') {
      return input.finalLevel ? 'win' : 'nextLevel'
    }
    return input.livesLeft ? 'restart' : 'loss'
  }

  private delayFor(phase: Phase): number {
    return phase === 'levelingUp' ? this.delays.levelUpDelay : this.delays.dyingDelay
  }
}
