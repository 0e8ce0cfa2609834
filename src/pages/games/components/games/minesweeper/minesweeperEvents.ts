/**
 * Outbound event queue for the Minesweeper engine.
 *
 * The engine appends events in causal order; the caller drains them
 * first-in-first-out after every action.
 */

import type { GameEvent } from './minesweeperTypes'

export class GameEvents {
  private queue: GameEvent[] = []
  private head = 0

  add(event: GameEvent): void {
    this.queue.push(event)
  }

  /** Oldest undrained event, or undefined when empty. */
  next(): GameEvent | undefined {
    if (this.head >= this.queue.length) return undefined
    const event = this.queue[this.head++]
    if (this.head === this.queue.length) {
      this.queue = []
      this.head = 0
    }
    return event
  }

  /** Take every pending event, oldest first. */
  drain(): GameEvent[] {
    const pending = this.queue.slice(this.head)
    this.queue = []
    this.head = 0
    return pending
  }

  get size(): number {
    return this.queue.length - this.head
  }

  isEmpty(): boolean {
    return this.size === 0
  }
}
