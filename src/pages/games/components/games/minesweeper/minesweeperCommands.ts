/**
 * Text command parsing for Minesweeper.
 *
 * Players type 1-based coordinates: "3,4" sweeps, "f3,4" flags,
 * "?3,4" marks a question, "q" quits. Results are 0-based.
 */

import type { GameResult } from './minesweeperTypes'

export type Command =
  | { type: 'sweep'; x: number; y: number }
  | { type: 'flag'; x: number; y: number }
  | { type: 'question'; x: number; y: number }
  | { type: 'quit' }

export type CommandErrorCode = 'INVALID_LOCATION' | 'UNKNOWN_COMMAND'

export type DimensionsErrorCode = 'INVALID_DIMENSIONS'

const PREFIXES: Record<string, 'sweep' | 'flag' | 'question'> = {
  s: 'sweep',
  f: 'flag',
  '?': 'question',
}

const POSITIVE_INT = /^\d+$/

function parsePositive(text: string): number | null {
  const trimmed = text.trim()
  if (!POSITIVE_INT.test(trimmed)) return null
  const value = parseInt(trimmed, 10)
  return value >= 1 ? value : null
}

export function parseCommand(
  line: string,
  width: number,
  height: number,
): GameResult<Command, CommandErrorCode> {
  const input = line.trim().toLowerCase()
  if (input === 'q' || input === 'quit') return { ok: true, data: { type: 'quit' } }
  if (input === '') return { ok: false, error: 'Enter a command', code: 'UNKNOWN_COMMAND' }

  let type: 'sweep' | 'flag' | 'question' = 'sweep'
  let rest = input
  const prefix = PREFIXES[input[0]]
  if (prefix) {
    type = prefix
    rest = input.slice(1)
  } else if (/^[a-z]/.test(input)) {
    return { ok: false, error: `Unknown command "${input[0]}"`, code: 'UNKNOWN_COMMAND' }
  }

  const parts = rest.split(',')
  if (parts.length !== 2) {
    return { ok: false, error: 'Invalid location', code: 'INVALID_LOCATION' }
  }
  const x = parsePositive(parts[0])
  const y = parsePositive(parts[1])
  if (x === null || y === null || x > width || y > height) {
    return { ok: false, error: 'Invalid location', code: 'INVALID_LOCATION' }
  }

  return { ok: true, data: { type, x: x - 1, y: y - 1 } }
}

/** Parse "WIDTHxHEIGHT", e.g. "30x16". */
export function parseDimensions(text: string): GameResult<[number, number], DimensionsErrorCode> {
  const parts = text.trim().toLowerCase().split('x')
  if (parts.length !== 2) {
    return { ok: false, error: 'Two dimensions separated by an `x` are required', code: 'INVALID_DIMENSIONS' }
  }
  const width = parsePositive(parts[0])
  const height = parsePositive(parts[1])
  if (width === null || height === null) {
    return { ok: false, error: 'Each dimension must be a positive number', code: 'INVALID_DIMENSIONS' }
  }
  return { ok: true, data: [width, height] }
}
