import type { KinematicState, Point } from '../math/Kinematics.ts'
import type { CollisionShape } from '../systems/CollisionSystem.ts'

/**
 * Entity kinds. The tag lets the collision resolver and spawner dispatch
 * without knowing concrete behaviors.
 */
export type EntityKind = 'player' | 'asteroid' | 'enemy' | 'projectile'

/**
 * Width and height of an entity's visual extent
 */
export interface Size {
  width: number
  height: number
}

/**
 * Kinematics component shared by every entity
 */
export interface Body extends KinematicState, Size {
  shape: CollisionShape
}

/**
 * Fields every stored entity carries
 */
export interface EntityBase {
  readonly id: number
  readonly kind: EntityKind
  alive: boolean
  body: Body
  /** Renderer-facing skin id (sprite or texture name) */
  skin: string
}

/**
 * Target point component for entities that steer toward a point
 */
export interface Targeting {
  target: Point
}

export interface BodyOptions {
  x?: number
  y?: number
  angle?: number
  speed?: number
  shape?: 'circle' | 'box'
}

/**
 * Diagonal of a visual extent; the distance that hides a body offscreen at any angle
 */
export function diagonalOf(size: Size): number {
  return Math.hypot(size.width, size.height)
}

/**
 * Scale a sprite's native size
 */
export function scaleSize(size: Size, scale: number): Size {
  if (!(scale > 0)) {
    throw new Error(`Scale must be positive, got ${scale}`)
  }
  return { width: size.width * scale, height: size.height * scale }
}

/**
 * Create a body for an entity of the given size.
 * Non-positive sizes are programming errors.
 */
export function createBody(size: Size, options: BodyOptions = {}): Body {
  if (!(size.width > 0) || !(size.height > 0)) {
    throw new Error(`Entity size must be positive, got ${size.width}x${size.height}`)
  }

  const shape: CollisionShape = options.shape === 'box'
    ? { type: 'box', halfWidth: size.width / 2, halfHeight: size.height / 2 }
    : { type: 'circle', radius: (size.width + size.height) / 4 }

  return {
    x: options.x ?? 0,
    y: options.y ?? 0,
    angle: options.angle ?? 0,
    angularVelocity: 0,
    speed: options.speed ?? 0,
    width: size.width,
    height: size.height,
    diagonal: diagonalOf(size),
    shape,
  }
}

/**
 * Clamp an integer tuning value into [0, 255]
 */
export function clampByte(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.max(0, Math.min(255, value))
}
