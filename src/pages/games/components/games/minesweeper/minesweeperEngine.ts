/**
 * Minesweeper game engine — pure logic, no React.
 *
 * Handles lazy first-touch mine generation, sweeping (with a breadth-first
 * cascade over empty tiles), flagging, and win/loss detection. Every change
 * is reported through the engine's event queue.
 */

import { GameBoard, SAFE_ZONE_SIZE } from './minesweeperBoard'
import { GameEvents } from './minesweeperEvents'
import type {
  BoardSnapshot,
  ConfigurationResult,
  EngineOptions,
  GameSettings,
  GameState,
  InvalidConfigurationReason,
  Tile,
} from './minesweeperTypes'

export const ALLOWED_TRANSITIONS: Record<GameState, readonly GameState[]> = {
  'empty': ['playing'],
  'playing': ['game-over', 'victory'],
  'game-over': [],
  'victory': [],
}

export function canTransition(from: GameState, to: GameState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to)
}

/** Longest side a board may have. */
export const MAX_DIMENSION = 100

/** Thrown when a Minesweeper is constructed directly from unchecked settings. */
export class InvalidConfigurationError extends Error {
  readonly reason: InvalidConfigurationReason

  constructor(reason: InvalidConfigurationReason, message: string) {
    super(message)
    this.name = 'InvalidConfigurationError'
    this.reason = reason
  }
}

/** Largest mine count a width x height board can hold. */
export function maxMines(width: number, height: number): number {
  return Math.max(0, width * height - SAFE_ZONE_SIZE)
}

/** Check board parameters before a game is built from them. */
export function validateSettings(settings: GameSettings): ConfigurationResult<GameSettings> {
  const { width, height, mines } = settings

  if (![width, height, mines].every(Number.isInteger) || width < 0 || height < 0 || mines < 0) {
    return {
      ok: false,
      error: 'Width, height and mines must be non-negative whole numbers',
      code: 'INVALID_CONFIGURATION',
      reason: 'not-an-integer',
    }
  }
  if (width === 0 || height === 0) {
    return {
      ok: false,
      error: "Can't make a game board with a zero length dimension",
      code: 'INVALID_CONFIGURATION',
      reason: 'zero-dimension',
    }
  }
  if (width > MAX_DIMENSION || height > MAX_DIMENSION) {
    return {
      ok: false,
      error: `Boards are limited to ${MAX_DIMENSION} tiles per side`,
      code: 'INVALID_CONFIGURATION',
      reason: 'too-large',
    }
  }
  if (mines > width * height - SAFE_ZONE_SIZE) {
    return {
      ok: false,
      error: `Not enough space for ${mines} mines (at most ${maxMines(width, height)} fit)`,
      code: 'INVALID_CONFIGURATION',
      reason: 'too-many-mines',
    }
  }
  return { ok: true, data: { width, height, mines } }
}

/** Build a game, or report why the settings can't hold one. */
export function createMinesweeper(
  settings: GameSettings,
  options: EngineOptions = {},
): ConfigurationResult<Minesweeper> {
  const result = validateSettings(settings)
  if (!result.ok) return result
  return { ok: true, data: new Minesweeper(result.data, options) }
}

export class Minesweeper {
  readonly events = new GameEvents()
  private readonly board: GameBoard
  private readonly random: () => number
  private readonly now: () => number
  private gameState: GameState = 'empty'
  private startTime: number | null = null
  private endTime: number | null = null

  /** Throws InvalidConfigurationError; createMinesweeper reports the same failures as a result. */
  constructor(settings: GameSettings, options: EngineOptions = {}) {
    const checked = validateSettings(settings)
    if (!checked.ok) throw new InvalidConfigurationError(checked.reason, checked.error)
    const { width, height, mines } = checked.data
    this.board = new GameBoard(width, height, mines)
    this.random = options.random ?? Math.random
    this.now = options.now ?? Date.now
  }

  get state(): GameState {
    return this.gameState
  }

  get width(): number {
    return this.board.width
  }

  get height(): number {
    return this.board.height
  }

  get mines(): number {
    return this.board.mines
  }

  get flags(): number {
    return this.board.flags
  }

  get minesRemaining(): number {
    return this.board.mines - this.board.flags
  }

  get startedAt(): number | null {
    return this.startTime
  }

  get endedAt(): number | null {
    return this.endTime
  }

  /** Milliseconds since the first sweep, frozen once the game ends. */
  elapsedMs(at: number = this.now()): number | null {
    if (this.startTime === null) return null
    return (this.endTime ?? at) - this.startTime
  }

  tileAt(x: number, y: number): Tile {
    return this.board.tileAt(x, y)
  }

  snapshot(): BoardSnapshot {
    return this.board.snapshot()
  }

  /** Reveal a tile. The first sweep of a game places the mines. */
  sweep(x: number, y: number): void {
    if (this.gameState === 'empty') {
      this.generate(x, y)
    }
    if (this.gameState !== 'playing') return

    const tile = this.board.tileAt(x, y)
    if (tile.modifier !== 'none' || tile.swept) return

    this.board.markSwept(x, y)
    this.events.add({ type: 'reveal-tile', x, y, tile: this.board.tileAt(x, y) })

    if (tile.state === 'mine') {
      this.events.add({ type: 'reveal-mine', x, y, tile: this.board.tileAt(x, y) })
      this.events.add({ type: 'game-end', board: this.board.snapshot() })
      this.finish('game-over')
      return
    }

    this.events.add({ type: 'sweep-begin' })
    this.cascade(x, y)
    this.events.add({ type: 'sweep-done' })
  }

  /** Toggle a flag on an unswept tile. */
  flag(x: number, y: number): void {
    if (this.gameState !== 'playing') return
    const tile = this.board.tileAt(x, y)
    if (tile.swept) return

    switch (tile.modifier) {
      case 'flagged':
        this.board.setModifier(x, y, 'none')
        this.events.add({ type: 'flag-tile', x, y, tile: this.board.tileAt(x, y) })
        break
      case 'none':
        this.board.setModifier(x, y, 'flagged')
        this.events.add({ type: 'flag-tile', x, y, tile: this.board.tileAt(x, y) })
        if (this.board.validFlags === this.board.mines) {
          this.events.add({ type: 'flag-all-mines' })
          this.finish('victory')
        }
        break
      case 'unsure':
        break
    }
  }

  /** Question marks are stored on tiles but have no engine behaviour yet. */
  question(_x: number, _y: number): void {}

  private transition(next: GameState): void {
    if (!canTransition(this.gameState, next)) {
      throw new Error(`Illegal game state transition: ${this.gameState} -> ${next}`)
    }
    this.gameState = next
  }

  private finish(next: 'game-over' | 'victory'): void {
    this.endTime = this.now()
    this.transition(next)
  }

  private generate(safeX: number, safeY: number): void {
    const { board } = this
    this.events.add({ type: 'game-start' })

    for (const [x, y] of board.safeZone(safeX, safeY)) {
      board.markSafe(x, y)
    }

    // Rejection sampling; the constructor guarantees room outside the safe zone
    let placed = 0
    while (placed < board.mines) {
      const x = Math.floor(this.random() * board.width)
      const y = Math.floor(this.random() * board.height)
      if (board.isMine(x, y) || board.isSafe(x, y)) continue
      board.placeMine(x, y)
      placed++
    }

    for (let x = 0; x < board.width; x++) {
      for (let y = 0; y < board.height; y++) {
        if (!board.isMine(x, y)) continue
        for (const [nx, ny] of board.neighbours(x, y)) {
          board.addAdjacentMine(nx, ny)
        }
      }
    }

    this.startTime = this.now()
    this.transition('playing')
    this.events.add({ type: 'init-done' })
  }

  /** Breadth-first reveal of the empty region around (x, y) and its border. */
  private cascade(x: number, y: number): void {
    const { board } = this
    const queue: [number, number][] = [[x, y]]

    for (let head = 0; head < queue.length; head++) {
      const [cx, cy] = queue[head]
      if (board.tileAt(cx, cy).state !== 0) continue

      for (const [nx, ny] of board.neighbours(cx, cy)) {
        if (board.tileAt(nx, ny).swept) continue
        board.markSwept(nx, ny)
        this.events.add({ type: 'reveal-tile', x: nx, y: ny, tile: board.tileAt(nx, ny) })
        queue.push([nx, ny])
      }
    }
  }
}
