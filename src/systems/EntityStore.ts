import type { EntityBase } from '../entities/Entity.ts'

/**
 * Monotonic id source shared by every store in a world
 */
export class IdSequence {
  private nextId: number = 1

  next(): number {
    return this.nextId++
  }

  peek(): number {
    return this.nextId
  }
}

/**
 * Entity collection keyed by id.
 *
 * Retiring only marks an entity dead; it stays in place (and in iteration
 * order) until sweep() runs at the end of the frame. Iteration follows
 * insertion order.
 */
export class EntityStore<T extends EntityBase> implements Iterable<T> {
  private entities: Map<number, T> = new Map()

  add(entity: T): T {
    if (this.entities.has(entity.id)) {
      throw new Error(`Entity ${entity.id} is already in the store`)
    }
    this.entities.set(entity.id, entity)
    return entity
  }

  get(id: number): T | undefined {
    return this.entities.get(id)
  }

  has(id: number): boolean {
    return this.entities.has(id)
  }

  /**
   * Mark an entity dead. Returns false if it was unknown or already retired.
   */
  retire(id: number): boolean {
    const entity = this.entities.get(id)
    if (!entity || !entity.alive) return false
    entity.alive = false
    return true
  }

  /**
   * Drop retired entities. Returns how many were removed.
   */
  sweep(): number {
    let removed = 0
    for (const [id, entity] of this.entities) {
      if (!entity.alive) {
        this.entities.delete(id)
        removed++
      }
    }
    return removed
  }

  clear(): void {
    this.entities.clear()
  }

  /** Stored entities, retired ones included until the next sweep */
  get size(): number {
    return this.entities.size
  }

  /** Number of entities still alive */
  countAlive(): number {
    let count = 0
    for (const entity of this.entities.values()) {
      if (entity.alive) count++
    }
    return count
  }

  /**
   * Snapshot of live entities in insertion order
   */
  alive(): T[] {
    return Array.from(this.entities.values()).filter(e => e.alive)
  }

  /**
   * Snapshot of live entities, newest first
   */
  aliveReversed(): T[] {
    return this.alive().reverse()
  }

  [Symbol.iterator](): Iterator<T> {
    return this.entities.values()
  }
}
