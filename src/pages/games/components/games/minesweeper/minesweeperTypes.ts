/**
 * Shared types for the Minesweeper engine and its consumers.
 */

export type AdjacentCount = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8

/** 0 is an empty tile, 1-8 a numbered tile. */
export type TileState = AdjacentCount | 'mine'

export type TileModifier = 'none' | 'flagged' | 'unsure'

/** Player-visible snapshot of a tile, handed out by value. */
export interface Tile {
  state: TileState
  modifier: TileModifier
  swept: boolean
}

export interface BoardSnapshot {
  width: number
  height: number
  mines: number
  flags: number
  validFlags: number
  /** Column-major: tiles[x][y] */
  tiles: Tile[][]
}

export type GameState = 'empty' | 'playing' | 'game-over' | 'victory'

export interface GameSettings {
  width: number
  height: number
  mines: number
}

export interface EngineOptions {
  /** Uniform source in [0, 1), used once to place mines. */
  random?: () => number
  /** Epoch milliseconds. */
  now?: () => number
}

export type GameEvent =
  | { type: 'game-start' }
  | { type: 'init-done' }
  | { type: 'reveal-tile'; x: number; y: number; tile: Tile }
  | { type: 'reveal-mine'; x: number; y: number; tile: Tile }
  | { type: 'flag-tile'; x: number; y: number; tile: Tile }
  | { type: 'sweep-begin' }
  | { type: 'sweep-done' }
  | { type: 'flag-all-mines' }
  | { type: 'game-end'; board: BoardSnapshot }

export type InvalidConfigurationReason = 'zero-dimension' | 'not-an-integer' | 'too-large' | 'too-many-mines'

export type GameResult<T, C extends string = string> =
  | { ok: true; data: T }
  | { ok: false; error: string; code: C }

export type ConfigurationResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; code: 'INVALID_CONFIGURATION'; reason: InvalidConfigurationReason }
