/**
 * Tests for useGameTimer hook.
 *
 * Tests elapsed time derived from start/end timestamps and formatted output.
 */

import { describe, test, expect, beforeEach, vi, afterEach } from 'vitest'
import { renderHook, act } from '@testing-library/react'
import { useGameTimer, formatElapsed } from './useGameTimer'

interface TimerProps {
  startedAt: number | null
  endedAt: number | null
}

function renderTimer(initialProps: TimerProps) {
  return renderHook(({ startedAt, endedAt }: TimerProps) => useGameTimer(startedAt, endedAt), { initialProps })
}

describe('formatElapsed', () => {
  test('pads single-digit seconds', () => {
    expect(formatElapsed(9)).toBe('0:09')
  })

  test('shows minutes and seconds', () => {
    expect(formatElapsed(65)).toBe('1:05')
    expect(formatElapsed(600)).toBe('10:00')
  })
})

describe('useGameTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(10_000)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  test('shows 0:00 before the game starts', () => {
    const { result } = renderTimer({ startedAt: null, endedAt: null })
    expect(result.current.seconds).toBe(0)
    expect(result.current.formatted).toBe('0:00')
    expect(result.current.isRunning).toBe(false)
  })

  test('counts up once the game has started', () => {
    const { result, rerender } = renderTimer({ startedAt: null, endedAt: null })
    rerender({ startedAt: 10_000, endedAt: null })
    expect(result.current.isRunning).toBe(true)
    act(() => {
      vi.advanceTimersByTime(3000)
    })
    expect(result.current.seconds).toBe(3)
  })

  test('freezes at the end time', () => {
    const { result, rerender } = renderTimer({ startedAt: 10_000, endedAt: null })
    act(() => {
      vi.advanceTimersByTime(5000)
    })
    rerender({ startedAt: 10_000, endedAt: 75_000 })
    expect(result.current.isRunning).toBe(false)
    expect(result.current.formatted).toBe('1:05')
    act(() => {
      vi.advanceTimersByTime(10_000)
    })
    expect(result.current.seconds).toBe(65)
  })

  test('resets when a new game clears the start time', () => {
    const { result, rerender } = renderTimer({ startedAt: 10_000, endedAt: null })
    act(() => {
      vi.advanceTimersByTime(4000)
    })
    rerender({ startedAt: null, endedAt: null })
    expect(result.current.seconds).toBe(0)
    expect(result.current.isRunning).toBe(false)
  })
})
