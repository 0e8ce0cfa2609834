/**
 * Text command input — "x,y" sweeps, "fx,y" flags, "?x,y" questions, "q" quits.
 */

import { useState } from 'react'

interface MinesweeperCommandBarProps {
  onCommand: (line: string) => string | null
  disabled?: boolean
}

export function MinesweeperCommandBar({ onCommand, disabled = false }: MinesweeperCommandBarProps) {
  const [line, setLine] = useState('')
  const [error, setError] = useState<string | null>(null)

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault()
    const result = onCommand(line)
    setError(result)
    if (result === null) setLine('')
  }

  return (
    <form onSubmit={handleSubmit} className="mt-3 w-full max-w-xs">
      <input
        aria-label="Command"
        value={line}
        onChange={(e) => setLine(e.target.value)}
        placeholder="x,y  fx,y  ?x,y  q"
        disabled={disabled}
        className="w-full px-2 py-1 rounded bg-slate-700 text-white font-mono text-sm"
      />
      {error && (
        <p role="alert" className="text-red-400 text-xs mt-1">{error}</p>
      )}
    </form>
  )
}
