import type { KeySource } from './InputMapper.ts'

/**
 * Key state tracker. Whatever delivers key events (a terminal, a window
 * bridge, a scripted driver) calls keyDown/keyUp; the game reads held and
 * just-pressed state once per frame.
 */
export class Input implements KeySource {
  private keys: Set<string> = new Set()
  private keysPressed: Set<string> = new Set() // Just pressed this frame
  private keysReleased: Set<string> = new Set() // Just released this frame

  keyDown(code: string): void {
    if (!this.keys.has(code)) {
      this.keysPressed.add(code)
    }
    this.keys.add(code)
  }

  keyUp(code: string): void {
    if (this.keys.delete(code)) {
      this.keysReleased.add(code)
    }
  }

  /**
   * Drop every held key, as when focus is lost
   */
  releaseAll(): void {
    for (const code of this.keys) {
      this.keysReleased.add(code)
    }
    this.keys.clear()
  }

  // Call at end of each frame
  clearFrameState(): void {
    this.keysPressed.clear()
    this.keysReleased.clear()
  }

  isKeyDown(code: string): boolean {
    return this.keys.has(code)
  }

  isKeyPressed(code: string): boolean {
    return this.keysPressed.has(code)
  }

  isKeyReleased(code: string): boolean {
    return this.keysReleased.has(code)
  }
}
