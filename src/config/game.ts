/**
 * Game Configuration
 *
 * Default board settings for new games.
 * Uses Vite environment variables or falls back to a 16x16 board with 40 mines.
 */

import { parseDimensions } from '../pages/games/components/games/minesweeper/minesweeperCommands'
import type { GameSettings } from '../pages/games/components/games/minesweeper/minesweeperTypes'

export const DEFAULT_SETTINGS: GameSettings = { width: 16, height: 16, mines: 40 }

export interface GameEnv {
  VITE_MINESWEEPER_DIMENSIONS?: string
  VITE_MINESWEEPER_MINES?: string
}

export function resolveGameSettings(env: GameEnv): GameSettings {
  let { width, height, mines } = DEFAULT_SETTINGS

  if (env.VITE_MINESWEEPER_DIMENSIONS) {
    const parsed = parseDimensions(env.VITE_MINESWEEPER_DIMENSIONS)
    if (parsed.ok) {
      [width, height] = parsed.data
    } else {
      console.warn(`Ignoring VITE_MINESWEEPER_DIMENSIONS="${env.VITE_MINESWEEPER_DIMENSIONS}": ${parsed.error}`)
    }
  }

  if (env.VITE_MINESWEEPER_MINES) {
    if (/^\d+$/.test(env.VITE_MINESWEEPER_MINES.trim())) {
      mines = parseInt(env.VITE_MINESWEEPER_MINES, 10)
    } else {
      console.warn(`Ignoring VITE_MINESWEEPER_MINES="${env.VITE_MINESWEEPER_MINES}": not a whole number`)
    }
  }

  return { width, height, mines }
}

export const GAME_SETTINGS = resolveGameSettings(import.meta.env)
