/**
 * Tests for Minesweeper text commands.
 */

import { describe, test, expect } from 'vitest'
import { parseCommand, parseDimensions } from './minesweeperCommands'

describe('parseCommand', () => {
  test('plain coordinates sweep, converted to 0-based', () => {
    expect(parseCommand('3,4', 9, 9)).toEqual({ ok: true, data: { type: 'sweep', x: 2, y: 3 } })
  })

  test('tolerates surrounding whitespace', () => {
    expect(parseCommand('  1 , 9 \n', 9, 9)).toEqual({ ok: true, data: { type: 'sweep', x: 0, y: 8 } })
  })

  test('f prefix flags', () => {
    expect(parseCommand('f2,5', 9, 9)).toEqual({ ok: true, data: { type: 'flag', x: 1, y: 4 } })
    expect(parseCommand('F2,5', 9, 9)).toEqual({ ok: true, data: { type: 'flag', x: 1, y: 4 } })
  })

  test('? prefix marks a question', () => {
    expect(parseCommand('?9,9', 9, 9)).toEqual({ ok: true, data: { type: 'question', x: 8, y: 8 } })
  })

  test('s prefix sweeps explicitly', () => {
    expect(parseCommand('s1,1', 9, 9)).toEqual({ ok: true, data: { type: 'sweep', x: 0, y: 0 } })
  })

  test('q quits', () => {
    expect(parseCommand('q', 9, 9)).toEqual({ ok: true, data: { type: 'quit' } })
    expect(parseCommand('QUIT', 9, 9)).toEqual({ ok: true, data: { type: 'quit' } })
  })

  test('rejects coordinates off the board', () => {
    expect(parseCommand('10,1', 9, 9)).toEqual({ ok: false, error: 'Invalid location', code: 'INVALID_LOCATION' })
    expect(parseCommand('1,10', 9, 9).ok).toBe(false)
    expect(parseCommand('0,1', 9, 9).ok).toBe(false)
  })

  test('rejects malformed coordinates', () => {
    expect(parseCommand('3', 9, 9).ok).toBe(false)
    expect(parseCommand('1,2,3', 9, 9).ok).toBe(false)
    expect(parseCommand('a,b', 9, 9)).toEqual({ ok: false, error: 'Unknown command "a"', code: 'UNKNOWN_COMMAND' })
    expect(parseCommand('1.5,2', 9, 9).ok).toBe(false)
  })

  test('rejects empty input', () => {
    expect(parseCommand('   ', 9, 9)).toEqual({ ok: false, error: 'Enter a command', code: 'UNKNOWN_COMMAND' })
  })
})

describe('parseDimensions', () => {
  test('parses WIDTHxHEIGHT', () => {
    expect(parseDimensions('30x16')).toEqual({ ok: true, data: [30, 16] })
    expect(parseDimensions(' 9X9 ')).toEqual({ ok: true, data: [9, 9] })
  })

  test('requires two parts', () => {
    expect(parseDimensions('16')).toEqual({
      ok: false,
      error: 'Two dimensions separated by an `x` are required',
      code: 'INVALID_DIMENSIONS',
    })
  })

  test('requires positive numbers', () => {
    expect(parseDimensions('0x5').ok).toBe(false)
    expect(parseDimensions('ax5').ok).toBe(false)
  })
})
