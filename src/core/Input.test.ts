import { describe, it, expect, beforeEach } from 'vitest'
import { Input } from './Input.ts'

describe('Input', () => {
  let input: Input

  beforeEach(() => {
    input = new Input()
  })

  describe('keyDown', () => {
    it('should mark the key held and just pressed', () => {
      input.keyDown('Space')
      expect(input.isKeyDown('Space')).toBe(true)
      expect(input.isKeyPressed('Space')).toBe(true)
    })

    it('should not re-press a key on auto-repeat', () => {
      input.keyDown('Space')
      input.clearFrameState()
      input.keyDown('Space')
      expect(input.isKeyPressed('Space')).toBe(false)
      expect(input.isKeyDown('Space')).toBe(true)
    })
  })

  describe('keyUp', () => {
    it('should mark a held key released', () => {
      input.keyDown('ArrowLeft')
      input.keyUp('ArrowLeft')
      expect(input.isKeyDown('ArrowLeft')).toBe(false)
      expect(input.isKeyReleased('ArrowLeft')).toBe(true)
    })

    it('should ignore keys that were not held', () => {
      input.keyUp('ArrowLeft')
      expect(input.isKeyReleased('ArrowLeft')).toBe(false)
    })
  })

  describe('clearFrameState', () => {
    it('should forget edges but keep held keys', () => {
      input.keyDown('KeyR')
      input.clearFrameState()
      expect(input.isKeyPressed('KeyR')).toBe(false)
      expect(input.isKeyDown('KeyR')).toBe(true)
    })
  })

  describe('releaseAll', () => {
    it('should release every held key', () => {
      input.keyDown('ArrowUp')
      input.keyDown('Space')
      input.releaseAll()

      expect(input.isKeyDown('ArrowUp')).toBe(false)
      expect(input.isKeyReleased('Space')).toBe(true)
    })
  })
})
