/**
 * Shared types for game pages.
 */

export type GameOutcome = 'won' | 'lost'
