/**
 * Board settings form — width, height and mine count.
 */

import { useState } from 'react'
import { maxMines } from './minesweeperEngine'
import type { GameSettings } from './minesweeperTypes'

interface MinesweeperSettingsProps {
  value: GameSettings
  onApply: (settings: GameSettings) => void
}

const FIELDS: { key: keyof GameSettings; label: string }[] = [
  { key: 'width', label: 'Width' },
  { key: 'height', label: 'Height' },
  { key: 'mines', label: 'Mines' },
]

export function MinesweeperSettings({ value, onApply }: MinesweeperSettingsProps) {
  const [draft, setDraft] = useState<Record<keyof GameSettings, string>>({
    width: String(value.width),
    height: String(value.height),
    mines: String(value.mines),
  })

  const width = Number(draft.width)
  const height = Number(draft.height)

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault()
    onApply({ width, height, mines: Number(draft.mines) })
  }

  return (
    <form onSubmit={handleSubmit} className="flex items-end space-x-2 text-xs">
      {FIELDS.map(({ key, label }) => (
        <label key={key} className="flex flex-col text-slate-400">
          {label}
          <input
            type="number"
            min={key === 'mines' ? 0 : 1}
            value={draft[key]}
            onChange={(e) => setDraft(prev => ({ ...prev, [key]: e.target.value }))}
            className="w-16 px-2 py-1 rounded bg-slate-700 text-white"
          />
        </label>
      ))}
      <button
        type="submit"
        className="px-2.5 py-1 rounded text-xs font-medium bg-blue-600 text-white hover:bg-blue-500 transition-colors"
      >
        Start
      </button>
      {Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0 && (
        <span className="text-slate-500">max {maxMines(width, height)} mines</span>
      )}
    </form>
  )
}
