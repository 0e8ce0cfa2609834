/**
 * Minesweeper board — tile storage and flag counters, no game rules.
 *
 * Tiles are stored column-major (tiles[x][y]). Each cell also carries a
 * private `safe` marker used only while mines are being placed.
 */

import type { AdjacentCount, BoardSnapshot, Tile, TileModifier, TileState } from './minesweeperTypes'

/** Neighbour offsets in scan order. */
const SCAN: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
]

/** Cells reserved around the first sweep. */
export const SAFE_ZONE_SIZE = 9

interface BoardCell {
  state: TileState
  modifier: TileModifier
  swept: boolean
  safe: boolean
}

const NEXT_COUNT: Record<AdjacentCount, AdjacentCount> = {
  0: 1, 1: 2, 2: 3, 3: 4, 4: 5, 5: 6, 6: 7, 7: 8, 8: 8,
}

/** One more adjacent mine, saturating at 8. */
export function incrementCount(count: AdjacentCount): AdjacentCount {
  return NEXT_COUNT[count]
}

function blankCell(): BoardCell {
  return { state: 0, modifier: 'none', swept: false, safe: false }
}

export class GameBoard {
  readonly width: number
  readonly height: number
  readonly mines: number
  private readonly tiles: BoardCell[][]
  private flagCount = 0
  private validFlagCount = 0

  constructor(width: number, height: number, mines: number) {
    this.width = width
    this.height = height
    this.mines = mines
    this.tiles = Array.from({ length: width }, () =>
      Array.from({ length: height }, blankCell)
    )
  }

  /** Tiles currently flagged. */
  get flags(): number {
    return this.flagCount
  }

  /** Flagged tiles that really are mines. */
  get validFlags(): number {
    return this.validFlagCount
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  tileAt(x: number, y: number): Tile {
    const { state, modifier, swept } = this.tiles[x][y]
    return { state, modifier, swept }
  }

  /** In-bounds neighbours of (x, y), in scan order. */
  neighbours(x: number, y: number): [number, number][] {
    const result: [number, number][] = []
    for (const [dx, dy] of SCAN) {
      const nx = x + dx
      const ny = y + dy
      if (this.inBounds(nx, ny)) result.push([nx, ny])
    }
    return result
  }

  /** The 3x3 block centred on (x, y), clipped to the board. */
  safeZone(x: number, y: number): [number, number][] {
    const zone: [number, number][] = []
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (this.inBounds(x + dx, y + dy)) zone.push([x + dx, y + dy])
      }
    }
    return zone
  }

  isMine(x: number, y: number): boolean {
    return this.tiles[x][y].state === 'mine'
  }

  isSafe(x: number, y: number): boolean {
    return this.tiles[x][y].safe
  }

  markSafe(x: number, y: number): void {
    this.tiles[x][y].safe = true
  }

  placeMine(x: number, y: number): void {
    this.tiles[x][y].state = 'mine'
  }

  /** Count one more adjacent mine on a non-mine tile. */
  addAdjacentMine(x: number, y: number): void {
    const cell = this.tiles[x][y]
    if (cell.state === 'mine') return
    cell.state = incrementCount(cell.state)
  }

  /** Reveal a tile. Any modifier it carried is dropped and counted off. */
  markSwept(x: number, y: number): void {
    this.setModifier(x, y, 'none')
    this.tiles[x][y].swept = true
  }

  /** Change a tile's modifier, keeping the flag counters in step. */
  setModifier(x: number, y: number, modifier: TileModifier): void {
    const cell = this.tiles[x][y]
    if (cell.modifier === modifier) return

    const delta = (modifier === 'flagged' ? 1 : 0) - (cell.modifier === 'flagged' ? 1 : 0)
    this.flagCount += delta
    if (cell.state === 'mine') this.validFlagCount += delta
    cell.modifier = modifier
  }

  snapshot(): BoardSnapshot {
    return {
      width: this.width,
      height: this.height,
      mines: this.mines,
      flags: this.flagCount,
      validFlags: this.validFlagCount,
      tiles: this.tiles.map((column, x) => column.map((_, y) => this.tileAt(x, y))),
    }
  }
}
