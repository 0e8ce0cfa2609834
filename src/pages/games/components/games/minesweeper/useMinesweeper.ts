/**
 * Hook that runs one Minesweeper engine per game and mirrors it in React state.
 *
 * After every action the engine's event queue is drained oldest-first and
 * each event is applied to the view. The board itself never leaves the
 * engine; the view only holds tile snapshots.
 */

import { useState, useCallback, useRef } from 'react'
import { createMinesweeper, type Minesweeper } from './minesweeperEngine'
import { parseCommand } from './minesweeperCommands'
import type { EngineOptions, GameEvent, GameSettings, GameState, Tile } from './minesweeperTypes'

export interface MinesweeperView {
  /** Column-major: tiles[x][y] */
  tiles: Tile[][]
  status: GameState
  flags: number
  explodedCell: [number, number] | null
  startedAt: number | null
  endedAt: number | null
}

interface Session {
  game: Minesweeper | null
  settings: GameSettings
  view: MinesweeperView
  error: string | null
}

function blankTiles(width: number, height: number): Tile[][] {
  return Array.from({ length: width }, () =>
    Array.from({ length: height }, (): Tile => ({ state: 0, modifier: 'none', swept: false }))
  )
}

function initialView(width: number, height: number): MinesweeperView {
  return {
    tiles: blankTiles(width, height),
    status: 'empty',
    flags: 0,
    explodedCell: null,
    startedAt: null,
    endedAt: null,
  }
}

/** Apply drained engine events to a view. Pure; returns a new view. */
export function applyEvents(view: MinesweeperView, events: GameEvent[]): MinesweeperView {
  let tiles = view.tiles.map(column => [...column])
  let { explodedCell } = view

  for (const event of events) {
    switch (event.type) {
      case 'reveal-tile':
      case 'flag-tile':
        tiles[event.x][event.y] = event.tile
        break
      case 'reveal-mine':
        explodedCell = [event.x, event.y]
        break
      case 'game-end':
        tiles = event.board.tiles
        break
      default:
        break
    }
  }

  return { ...view, tiles, explodedCell }
}

function openSession(settings: GameSettings, options: EngineOptions): Session {
  const result = createMinesweeper(settings, options)
  if (!result.ok) {
    console.error('Invalid Minesweeper settings:', result.error)
    return { game: null, settings, view: initialView(0, 0), error: result.error }
  }
  return { game: result.data, settings, view: initialView(settings.width, settings.height), error: null }
}

export function useMinesweeper(initialSettings: GameSettings, options: EngineOptions = {}) {
  const optionsRef = useRef(options)
  optionsRef.current = options

  const [session, setSession] = useState<Session>(() => openSession(initialSettings, options))
  const sessionRef = useRef(session)

  const commit = useCallback((next: Session) => {
    sessionRef.current = next
    setSession(next)
  }, [])

  const perform = useCallback((run: (game: Minesweeper) => void) => {
    const current = sessionRef.current
    const { game } = current
    if (!game) return

    run(game)
    const events = game.events.drain()
    if (events.length === 0) return

    commit({
      ...current,
      view: {
        ...applyEvents(current.view, events),
        status: game.state,
        flags: game.flags,
        startedAt: game.startedAt,
        endedAt: game.endedAt,
      },
    })
  }, [commit])

  const sweep = useCallback((x: number, y: number) => {
    perform(game => game.sweep(x, y))
  }, [perform])

  const flag = useCallback((x: number, y: number) => {
    perform(game => game.flag(x, y))
  }, [perform])

  const question = useCallback((x: number, y: number) => {
    perform(game => game.question(x, y))
  }, [perform])

  const newGame = useCallback((settings?: GameSettings) => {
    commit(openSession(settings ?? sessionRef.current.settings, optionsRef.current))
  }, [commit])

  /** Run a typed command. Returns an error message, or null on success. */
  const runCommand = useCallback((line: string): string | null => {
    const { width, height } = sessionRef.current.settings
    const parsed = parseCommand(line, width, height)
    if (!parsed.ok) return parsed.error

    const command = parsed.data
    switch (command.type) {
      case 'sweep':
        sweep(command.x, command.y)
        break
      case 'flag':
        flag(command.x, command.y)
        break
      case 'question':
        question(command.x, command.y)
        break
      case 'quit':
        newGame()
        break
    }
    return null
  }, [sweep, flag, question, newGame])

  const { settings, view, error } = session

  return {
    settings,
    error,
    ...view,
    minesRemaining: settings.mines - view.flags,
    isOver: view.status === 'game-over' || view.status === 'victory',
    sweep,
    flag,
    question,
    newGame,
    runCommand,
  }
}
