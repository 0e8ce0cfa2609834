import { describe, test, expect, vi, afterEach } from 'vitest'
import { resolveGameSettings, DEFAULT_SETTINGS } from './game'

describe('resolveGameSettings', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('falls back to the defaults', () => {
    expect(resolveGameSettings({})).toEqual(DEFAULT_SETTINGS)
  })

  test('reads dimensions and mine count', () => {
    expect(resolveGameSettings({
      VITE_MINESWEEPER_DIMENSIONS: '30x16',
      VITE_MINESWEEPER_MINES: '99',
    })).toEqual({ width: 30, height: 16, mines: 99 })
  })

  test('warns about and ignores malformed values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(resolveGameSettings({
      VITE_MINESWEEPER_DIMENSIONS: '30',
      VITE_MINESWEEPER_MINES: 'lots',
    })).toEqual(DEFAULT_SETTINGS)
    expect(warn).toHaveBeenCalledTimes(2)
    expect(warn).toHaveBeenCalledWith(
      'Ignoring VITE_MINESWEEPER_DIMENSIONS="30": Two dimensions separated by an `x` are required',
    )
  })
})
