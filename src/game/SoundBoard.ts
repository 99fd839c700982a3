import type { AudioPlayer, SoundCue } from './types.ts'
import { SafeConsole } from '../core/SafeConsole.ts'

const logger = SafeConsole.scoped('sound')

/**
 * Audio player that drops every cue (headless runs and tests)
 */
export class SilentAudio implements AudioPlayer {
  play(_cue: SoundCue): void {}
  stop(_cue: SoundCue): void {}
  isPlaying(_cue: SoundCue): boolean {
    return false
  }
}

/**
 * Cue trigger points used by the simulation
 */
export class SoundBoard {
  private audio: AudioPlayer

  constructor(audio: AudioPlayer = new SilentAudio()) {
    this.audio = audio
  }

  /**
   * Fire-and-forget cue (shots, explosions overlap freely)
   */
  play(cue: SoundCue): void {
    this.audio.play(cue)
  }

  /**
   * One-shot cue that must not restart while it is still playing
   */
  playOnce(cue: SoundCue): void {
    if (this.audio.isPlaying(cue)) {
      logger.debug(`Sound ${cue} already playing, not retriggered`)
      return
    }
    this.audio.play(cue)
  }

  /**
   * Restart the looping background track
   */
  startMusic(): void {
    if (this.audio.isPlaying('music')) {
      this.audio.stop('music')
    }
    this.audio.play('music', { loop: true })
  }

  stopMusic(): void {
    this.audio.stop('music')
  }
}
