/**
 * Dice Utilities
 *
 * Dice sources and pip expansion. The engine never calls Math.random directly;
 * it asks the DiceSource handed to the sync thunk middleware.
 */

import type { DieValue } from './types'

/** Produces one die value per call */
export type DiceSource = () => DieValue

/**
 * Roll a single die (returns 1-6).
 */
export function rollDie(): DieValue {
  const faces: readonly DieValue[] = [1, 2, 3, 4, 5, 6]
  return faces[Math.floor(Math.random() * 6)]
}

/**
 * A source that replays fixed values in order, then repeats the last one.
 * Used for replays and tests.
 *
 * Once exhausted it only ever returns the last value, so a script must
 * resolve any opening it is used to roll: rollOpening rerolls equal dice
 * until they differ and never returns on a source stuck on one value.
 */
export function createScriptedDice(values: readonly DieValue[]): DiceSource {
  if (values.length === 0) {
    throw new Error('createScriptedDice: at least one value is required')
  }
  let next = 0
  return () => {
    const value = values[Math.min(next, values.length - 1)]
    next++
    return value
  }
}

/**
 * Expand two dice into the pips available for a turn.
 * Doubles give 4 moves of the same value, otherwise 2 moves.
 */
export function expandDice(die1: DieValue, die2: DieValue): DieValue[] {
  if (die1 === die2) {
    return [die1, die1, die1, die1]
  }
  return [die1, die2]
}
