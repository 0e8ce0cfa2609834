/**
 * Hook for a game timer driven by a game's start and end timestamps.
 *
 * Ticks once a second while the game is running so the display stays
 * current, and freezes once an end time is known.
 */

import { useState, useEffect } from 'react'

/** Format whole seconds as m:ss. */
export function formatElapsed(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60)
  const secs = totalSeconds % 60
  return `${minutes}:${secs.toString().padStart(2, '0')}`
}

export function useGameTimer(startedAt: number | null, endedAt: number | null) {
  const [now, setNow] = useState(() => Date.now())
  const isRunning = startedAt !== null && endedAt === null

  useEffect(() => {
    if (!isRunning) return
    setNow(Date.now())
    const interval = setInterval(() => setNow(Date.now()), 1000)
    return () => clearInterval(interval)
  }, [isRunning])

  const elapsedMs = startedAt === null ? 0 : Math.max(0, (endedAt ?? now) - startedAt)
  const seconds = Math.floor(elapsedMs / 1000)

  return { seconds, isRunning, formatted: formatElapsed(seconds) }
}
