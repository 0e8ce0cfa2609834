/**
 * Shared game over overlay — shown when a game is won or lost.
 */

import { Trophy, RotateCcw } from 'lucide-react'
import type { GameOutcome } from '../types'

interface GameOverModalProps {
  status: GameOutcome
  message?: string
  onPlayAgain: () => void
  playAgainText?: string
}

const STATUS_CONFIG: Record<GameOutcome, { title: string; color: string; icon?: boolean }> = {
  won: { title: 'You Win!', color: 'text-emerald-400', icon: true },
  lost: { title: 'Game Over', color: 'text-red-400' },
}

export function GameOverModal({ status, message, onPlayAgain, playAgainText }: GameOverModalProps) {
  const config = STATUS_CONFIG[status]

  return (
    <div role="dialog" className="absolute inset-0 bg-slate-900/80 flex items-center justify-center z-10 rounded-lg">
      <div className="bg-slate-800 border border-slate-600 rounded-xl p-6 text-center max-w-xs w-full mx-4">
        {config.icon && (
          <Trophy className="w-10 h-10 text-yellow-400 mx-auto mb-3" />
        )}

        <h2 className={`text-2xl font-bold mb-2 ${config.color}`}>
          {config.title}
        </h2>

        {message && (
          <p className="text-slate-400 text-sm mb-3">{message}</p>
        )}

        <button
          onClick={onPlayAgain}
          className="inline-flex items-center space-x-2 px-4 py-2 bg-blue-600 hover:bg-blue-500 text-white rounded-lg transition-colors text-sm font-medium"
        >
          <RotateCcw className="w-4 h-4" />
          <span>{playAgainText || 'Play Again'}</span>
        </button>
      </div>
    </div>
  )
}
