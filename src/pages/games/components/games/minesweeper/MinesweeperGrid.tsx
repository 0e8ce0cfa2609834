/**
 * Minesweeper grid — renders tile snapshots with colored numbers.
 *
 * Tiles arrive column-major (tiles[x][y]) and are laid out row by row.
 */

import { useRef } from 'react'
import { Flag, Bomb } from 'lucide-react'
import type { Tile } from './minesweeperTypes'

const NUMBER_COLORS: Record<number, string> = {
  1: 'text-blue-400',
  2: 'text-green-400',
  3: 'text-red-400',
  4: 'text-blue-700',
  5: 'text-red-800',
  6: 'text-cyan-400',
  7: 'text-slate-300',
  8: 'text-slate-500',
}

const LONG_PRESS_MS = 300

interface MinesweeperGridProps {
  tiles: Tile[][]
  onSweep: (x: number, y: number) => void
  onFlag: (x: number, y: number) => void
  gameOver: boolean
  explodedCell: [number, number] | null
}

function tileContent(tile: Tile, gameOver: boolean): React.ReactNode {
  if (tile.modifier === 'flagged') return <Flag className="w-3.5 h-3.5 text-red-400" />
  if (tile.modifier === 'unsure') return <span className="text-slate-300">?</span>
  if (!tile.swept && !(gameOver && tile.state === 'mine')) return null
  if (tile.state === 'mine') return <Bomb className="w-3.5 h-3.5 text-slate-200" />
  if (tile.state > 0) return <span className={NUMBER_COLORS[tile.state]}>{tile.state}</span>
  return null
}

export function MinesweeperGrid({ tiles, onSweep, onFlag, gameOver, explodedCell }: MinesweeperGridProps) {
  const width = tiles.length
  const height = tiles[0]?.length ?? 0
  const longPress = useRef<{ timer: ReturnType<typeof setTimeout> | null; fired: boolean }>({ timer: null, fired: false })

  const handleContextMenu = (e: React.MouseEvent, x: number, y: number) => {
    e.preventDefault()
    if (!gameOver) onFlag(x, y)
  }

  const handleTouchStart = (x: number, y: number) => {
    longPress.current.fired = false
    longPress.current.timer = setTimeout(() => {
      longPress.current.fired = true
      if (!gameOver) onFlag(x, y)
    }, LONG_PRESS_MS)
  }

  const handleTouchEnd = (x: number, y: number) => {
    if (longPress.current.timer) clearTimeout(longPress.current.timer)
    if (!longPress.current.fired && !gameOver) onSweep(x, y)
  }

  const rows = Array.from({ length: height }, (_, y) => y)
  const columns = Array.from({ length: width }, (_, x) => x)

  return (
    <div
      role="grid"
      className="inline-grid gap-0 border border-slate-600 rounded"
      style={{ gridTemplateColumns: `repeat(${width}, minmax(0, 1fr))` }}
    >
      {rows.map(y =>
        columns.map(x => {
          const tile = tiles[x][y]
          const isExploded = explodedCell?.[0] === x && explodedCell?.[1] === y
          const showMine = tile.state === 'mine' && (tile.swept || gameOver) && tile.modifier !== 'flagged'

          let className = 'w-7 h-7 sm:w-8 sm:h-8 flex items-center justify-center text-xs sm:text-sm font-bold border border-slate-700/50 transition-colors select-none '
          if (showMine) {
            className += isExploded ? 'bg-red-700' : 'bg-slate-700'
          } else if (tile.swept) {
            className += 'bg-slate-800'
          } else {
            className += 'bg-slate-600 hover:bg-slate-500 cursor-pointer'
          }

          return (
            <button
              key={`${x}-${y}`}
              aria-label={`Tile ${x + 1},${y + 1}`}
              data-swept={tile.swept}
              data-modifier={tile.modifier}
              className={className}
              onClick={() => !gameOver && tile.modifier === 'none' && onSweep(x, y)}
              onContextMenu={(e) => handleContextMenu(e, x, y)}
              onTouchStart={() => handleTouchStart(x, y)}
              onTouchEnd={(e) => { e.preventDefault(); handleTouchEnd(x, y) }}
              disabled={gameOver}
            >
              {tileContent(tile, gameOver)}
            </button>
          )
        })
      )}
    </div>
  )
}
