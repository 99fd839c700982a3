/**
 * Kinematics model shared by every moving entity.
 *
 * Angles are in degrees with 0 pointing north (+y) and positive values
 * turning counter-clockwise. Headings returned by stepToward are radians
 * measured from the +x axis, as atan2 gives them.
 */

export interface Point {
  x: number
  y: number
}

/**
 * Mutable kinematic state of a body
 */
export interface KinematicState extends Point {
  angle: number
  angularVelocity: number  // degrees per second
  speed: number            // pixels per second
  diagonal: number
}

export interface ScreenSize {
  width: number
  height: number
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI
}

/**
 * Unit vector pointing the way a body at `angle` faces
 */
export function forwardVector(angle: number): Point {
  const rad = toRadians(angle)
  return { x: -Math.sin(rad), y: Math.cos(rad) }
}

/**
 * Position delta for moving `speed * dt` along `angle`
 */
export function displacement(angle: number, speed: number, dt: number): Point {
  const forward = forwardVector(angle)
  return { x: forward.x * speed * dt, y: forward.y * speed * dt }
}

/**
 * Display angle that makes a body face along a heading (radians from +x)
 */
export function facingFromHeading(heading: number): number {
  return toDegrees(heading) - 90
}

/**
 * Heading (radians from +x) that a body at `angle` faces
 */
export function headingFromFacing(angle: number): number {
  return toRadians(angle + 90)
}

/**
 * Rotate, then move along the new facing.
 */
export function turnAndMove(body: KinematicState, dt: number): void {
  body.angle += body.angularVelocity * dt
  const delta = displacement(body.angle, body.speed, dt)
  body.x += delta.x
  body.y += delta.y
}

/**
 * Hard clamp into the screen extended by half the body's diagonal.
 * The body may hide just offscreen but never drift farther.
 */
export function clampToExtendedBounds(body: KinematicState, screen: ScreenSize): void {
  const half = body.diagonal / 2
  if (body.x < -half) body.x = -half
  if (body.x > screen.width + half) body.x = screen.width + half
  if (body.y < -half) body.y = -half
  if (body.y > screen.height + half) body.y = screen.height + half
}

/**
 * True when the body is past the screen extended by half its diagonal on
 * some axis and its last step did not bring it back.
 */
export function hasLeftExtendedBounds(body: KinematicState, step: Point, screen: ScreenSize): boolean {
  const half = body.diagonal / 2
  if (body.x < -half && step.x <= 0) return true
  if (body.x > screen.width + half && step.x >= 0) return true
  if (body.y < -half && step.y <= 0) return true
  if (body.y > screen.height + half && step.y >= 0) return true
  return false
}

/**
 * Step toward a target point, snapping exactly onto it per axis once the
 * remaining distance fits inside one step. Returns the heading used.
 *
 * A body with non-positive speed backs away from the target and never snaps.
 */
export function stepToward(body: KinematicState, target: Point, dt: number): number {
  const dx = target.x - body.x
  const dy = target.y - body.y

  if (dx === 0 && dy === 0) {
    return headingFromFacing(body.angle)
  }

  const heading = Math.atan2(dy, dx)
  const stepX = Math.cos(heading) * body.speed * dt
  const stepY = Math.sin(heading) * body.speed * dt
  const approaching = body.speed > 0

  if (approaching && Math.abs(dx) <= Math.abs(stepX)) {
    body.x = target.x
  } else {
    body.x += stepX
  }

  if (approaching && Math.abs(dy) <= Math.abs(stepY)) {
    body.y = target.y
  } else {
    body.y += stepY
  }

  return heading
}

/**
 * True when the body sits exactly on the point
 */
export function isAt(body: Point, target: Point): boolean {
  return body.x === target.x && body.y === target.y
}
