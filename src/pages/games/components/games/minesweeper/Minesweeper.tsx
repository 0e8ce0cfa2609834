/**
 * Minesweeper game — reveal tiles, flag every mine.
 *
 * Features: custom board size and mine count, first-sweep safety,
 * cascading reveal, flagging (right-click / long-press), typed
 * commands, timer, mine counter.
 */

import { useCallback } from 'react'
import { Bomb, SmilePlus } from 'lucide-react'
import { GameLayout } from '../../GameLayout'
import { GameOverModal } from '../../GameOverModal'
import { useGameTimer } from '../../../hooks/useGameTimer'
import { GAME_SETTINGS } from '../../../../../config/game'
import { useMinesweeper } from './useMinesweeper'
import { MinesweeperGrid } from './MinesweeperGrid'
import { MinesweeperSettings } from './MinesweeperSettings'
import { MinesweeperCommandBar } from './MinesweeperCommandBar'
import type { EngineOptions, GameSettings } from './minesweeperTypes'

interface MinesweeperProps extends EngineOptions {
  initialSettings?: GameSettings
}

export default function Minesweeper({ initialSettings = GAME_SETTINGS, random, now }: MinesweeperProps) {
  const game = useMinesweeper(initialSettings, { random, now })
  const timer = useGameTimer(game.startedAt, game.endedAt)
  const { newGame } = game

  const handleNewGame = useCallback(() => newGame(), [newGame])

  const outcome = game.status === 'victory' ? 'won' : game.status === 'game-over' ? 'lost' : null

  const controls = (
    <div className="flex flex-col space-y-2">
      <MinesweeperSettings
        key={`${game.settings.width}x${game.settings.height}x${game.settings.mines}`}
        value={game.settings}
        onApply={newGame}
      />
      {game.error && (
        <p role="alert" className="text-red-400 text-xs">{game.error}</p>
      )}
      {/* Status bar */}
      <div className="flex items-center justify-between text-sm">
        <div className="flex items-center space-x-1 text-red-400">
          <Bomb className="w-3.5 h-3.5" />
          <span aria-label="Mines remaining">{game.minesRemaining}</span>
        </div>
        <button
          onClick={handleNewGame}
          className="p-1 hover:bg-slate-700 rounded transition-colors"
          title="New Game"
        >
          <SmilePlus className="w-5 h-5 text-yellow-400" />
        </button>
      </div>
    </div>
  )

  return (
    <GameLayout title="Minesweeper" timer={timer.formatted} controls={controls}>
      <div className="relative flex flex-col items-center">
        <div className={game.settings.width > 16 ? 'overflow-x-auto max-w-full' : ''}>
          <MinesweeperGrid
            tiles={game.tiles}
            onSweep={game.sweep}
            onFlag={game.flag}
            gameOver={game.isOver}
            explodedCell={game.explodedCell}
          />
        </div>

        <MinesweeperCommandBar onCommand={game.runCommand} disabled={game.isOver || game.error !== null} />

        <p className="text-xs text-slate-500 mt-3 hidden sm:block">
          Left-click to reveal. Right-click to flag.
        </p>

        {outcome && (
          <GameOverModal
            status={outcome}
            message={outcome === 'won' ? `Cleared in ${timer.formatted}` : undefined}
            onPlayAgain={handleNewGame}
          />
        )}
      </div>
    </GameLayout>
  )
}
