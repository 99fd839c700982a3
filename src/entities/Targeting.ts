import type { Body, Targeting } from './Entity.ts'
import { stepToward, isAt, type Point } from '../math/Kinematics.ts'

/**
 * Steer a targeting entity one frame toward its target.
 * Returns the heading (radians from +x) it travelled along.
 */
export function steer(entity: { body: Body } & Targeting, dt: number): number {
  return stepToward(entity.body, entity.target, dt)
}

export function setTarget(entity: Targeting, point: Point): void {
  entity.target = { x: point.x, y: point.y }
}

export function hasArrived(entity: { body: Body } & Targeting): boolean {
  return isAt(entity.body, entity.target)
}
