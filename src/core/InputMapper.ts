import type { ControlIntent } from '../game/types.ts'

/**
 * Raw input source that provides key states
 */
export interface KeySource {
  isKeyDown(code: string): boolean
  /** True only on the frame the key went down */
  isKeyPressed(code: string): boolean
}

/**
 * A key pressed while any one of the listed modifiers is held.
 * An empty modifier list means the key alone.
 */
export interface KeyChord {
  code: string
  modifiers: string[]
}

export type SessionCommand =
  | { type: 'pause' }
  | { type: 'restart' }
  | { type: 'jumpToLevel'; level: number }

/**
 * Key bindings configuration
 */
export interface KeyBindings {
  turnLeft: string[]
  turnRight: string[]
  thrustForward: string[]
  thrustBackward: string[]
  fire: string[]
  pause: KeyChord[]
  restart: KeyChord[]
  /** Chord at index i jumps to level i */
  jumpToLevel: KeyChord[]
}

export const CTRL_OR_META = ['ControlLeft', 'ControlRight', 'MetaLeft', 'MetaRight']
export const META = ['MetaLeft', 'MetaRight']

/**
 * Arrows to steer, Space to fire
 */
export const DEFAULT_BINDINGS: KeyBindings = {
  turnLeft: ['ArrowLeft'],
  turnRight: ['ArrowRight'],
  thrustForward: ['ArrowUp'],
  thrustBackward: ['ArrowDown'],
  fire: ['Space'],
  pause: [{ code: 'KeyT', modifiers: CTRL_OR_META }],
  restart: [{ code: 'KeyR', modifiers: CTRL_OR_META }],
  jumpToLevel: [
    { code: 'Digit1', modifiers: META },
    { code: 'Digit2', modifiers: META },
    { code: 'Digit3', modifiers: META },
  ],
}

/**
 * InputMapper maps raw key state to control intent and session commands
 */
export class InputMapper {
  private bindings: KeyBindings

  constructor(options: { bindings?: KeyBindings } = {}) {
    this.bindings = options.bindings ?? DEFAULT_BINDINGS
  }

  /**
   * Held-key intent for this frame
   */
  getIntent(source: KeySource): ControlIntent {
    return {
      turnLeft: this.checkKeys(source, this.bindings.turnLeft),
      turnRight: this.checkKeys(source, this.bindings.turnRight),
      thrustForward: this.checkKeys(source, this.bindings.thrustForward),
      thrustBackward: this.checkKeys(source, this.bindings.thrustBackward),
      firing: this.checkKeys(source, this.bindings.fire),
    }
  }

  /**
   * Edge-triggered session commands for this frame
   */
  getCommands(source: KeySource): SessionCommand[] {
    const commands: SessionCommand[] = []

    if (this.bindings.pause.some(chord => this.checkChord(source, chord))) {
      commands.push({ type: 'pause' })
    }
    if (this.bindings.restart.some(chord => this.checkChord(source, chord))) {
      commands.push({ type: 'restart' })
    }
    this.bindings.jumpToLevel.forEach((chord, level) => {
      if (this.checkChord(source, chord)) {
        commands.push({ type: 'jumpToLevel', level })
      }
    })

    return commands
  }

  /**
   * Check if any key in a binding is held down
   */
  private checkKeys(source: KeySource, keys: string[]): boolean {
    return keys.some(key => source.isKeyDown(key))
  }

  private checkChord(source: KeySource, chord: KeyChord): boolean {
    if (!source.isKeyPressed(chord.code)) return false
    if (chord.modifiers.length === 0) return true
    return chord.modifiers.some(mod => source.isKeyDown(mod))
  }

  getBindings(): KeyBindings {
    return { ...this.bindings }
  }

  setBindings(bindings: KeyBindings): void {
    this.bindings = bindings
  }
}
