import { describe, test, expect } from 'vitest'
import { GameEvents } from './minesweeperEvents'

describe('GameEvents', () => {
  test('starts empty', () => {
    const events = new GameEvents()
    expect(events.isEmpty()).toBe(true)
    expect(events.size).toBe(0)
    expect(events.next()).toBeUndefined()
  })

  test('hands events back oldest first', () => {
    const events = new GameEvents()
    events.add({ type: 'sweep-begin' })
    events.add({ type: 'reveal-tile', x: 1, y: 2, tile: { state: 3, modifier: 'none', swept: true } })
    events.add({ type: 'sweep-done' })

    expect(events.size).toBe(3)
    expect(events.next()?.type).toBe('sweep-begin')
    expect(events.next()?.type).toBe('reveal-tile')
    expect(events.size).toBe(1)
    expect(events.next()?.type).toBe('sweep-done')
    expect(events.next()).toBeUndefined()
  })

  test('accepts new events after being emptied', () => {
    const events = new GameEvents()
    events.add({ type: 'game-start' })
    events.next()
    events.add({ type: 'init-done' })
    expect(events.next()).toEqual({ type: 'init-done' })
  })

  test('drain returns what is left and empties the queue', () => {
    const events = new GameEvents()
    events.add({ type: 'game-start' })
    events.add({ type: 'init-done' })
    events.add({ type: 'flag-all-mines' })
    events.next()

    expect(events.drain()).toEqual([{ type: 'init-done' }, { type: 'flag-all-mines' }])
    expect(events.isEmpty()).toBe(true)
    expect(events.drain()).toEqual([])
  })
})
