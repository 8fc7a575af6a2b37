/**
 * Step Legality Checker
 *
 * Decides whether one single-die checker movement is legal and what it does
 * (enter, hit, bear off). Works on BoardCounts so the live engine and the
 * max-play search apply exactly the same rules.
 * Pure functions, no side effects, no dependencies on Redux.
 */

import type {
  BoardCounts,
  DieValue,
  LegalStepOption,
  LegalSteps,
  Player,
  StepPlan,
} from './types'
import { BAR, CHECKERS_PER_SIDE, OFF, isBoardPoint } from './types'
import { type Result, ok, err } from './result'

// =============================================================================
// Types
// =============================================================================

export type StepRejectionType =
  | 'bar_first'
  | 'bar_empty'
  | 'invalid_source'
  | 'no_checker'
  | 'blocked'
  | 'not_all_home'
  | 'bear_off_order'

export interface StepRejection {
  readonly type: StepRejectionType
  readonly message: string
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Get the direction a player's checkers move.
 * White moves from point 24 toward point 1 (decreasing).
 * Black moves from point 1 toward point 24 (increasing).
 */
export function getMoveDirection(player: Player): 1 | -1 {
  return player === 'white' ? -1 : 1
}

/**
 * Where a checker lands. Values outside 1-24 mean bearing off.
 * White enters at 25 - pip, Black at pip.
 */
export function destinationOf(player: Player, from: number, pip: DieValue): number {
  // A checker on the bar counts from just outside its entry board
  const start = from === BAR ? (player === 'white' ? OFF : BAR) : from
  return start + getMoveDirection(player) * pip
}

/** Home board: 1-6 for White, 19-24 for Black */
export function isHomePoint(player: Player, point: number): boolean {
  return player === 'white' ? point >= 1 && point <= 6 : point >= 19 && point <= 24
}

/**
 * Checkers a player has on a point.
 * Returns 0 if point is empty or occupied by opponent.
 */
export function countFor(board: BoardCounts, player: Player, point: number): number {
  if (!isBoardPoint(point)) return 0
  const value = board.points[point - 1]
  if (player === 'white') {
    return value > 0 ? value : 0
  }
  return value < 0 ? -value : 0
}

/**
 * Distance a checker on `point` still has to travel to be borne off.
 */
function pipsToBearOff(player: Player, point: number): number {
  return player === 'white' ? point : 25 - point
}

/**
 * All 15 checkers are in the home board or already off, none on the bar.
 */
export function allInHome(board: BoardCounts, player: Player): boolean {
  if (board.bar[player] > 0) {
    return false
  }
  let inHomeOrOff = board.borneOff[player]
  for (let point = 1; point <= 24; point++) {
    if (isHomePoint(player, point)) {
      inHomeOrOff += countFor(board, player, point)
    }
  }
  return inHomeOrOff === CHECKERS_PER_SIDE
}

/**
 * Whether the player has a checker farther from home than `from`.
 */
export function anyFurtherFromHome(board: BoardCounts, player: Player, from: number): boolean {
  if (player === 'white') {
    for (let point = from + 1; point <= 24; point++) {
      if (countFor(board, player, point) > 0) return true
    }
    return false
  }
  for (let point = 1; point < from; point++) {
    if (countFor(board, player, point) > 0) return true
  }
  return false
}

function reject(type: StepRejectionType, message: string): Result<never, StepRejection> {
  return err({ type, message })
}

// =============================================================================
// Core Rule Functions
// =============================================================================

/**
 * Check one step for legality and describe its effects.
 *
 * @param from - board point 1-24, or 0 to enter from the bar
 */
export function planStep({
  board,
  actor,
  from,
  pip,
}: {
  board: BoardCounts
  actor: Player
  from: number
  pip: DieValue
}): Result<StepPlan, StepRejection> {
  const onBar = board.bar[actor] > 0

  if (onBar && from !== BAR) {
    return reject('bar_first', 'must enter from bar first')
  }

  if (from === BAR) {
    if (!onBar) {
      return reject('bar_empty', 'bar empty')
    }
  } else {
    if (!isBoardPoint(from)) {
      return reject('invalid_source', `invalid source point ${String(from)}`)
    }
    if (countFor(board, actor, from) === 0) {
      return reject('no_checker', `no checker at ${String(from)}`)
    }
  }

  const to = destinationOf(actor, from, pip)

  if (isBoardPoint(to)) {
    const value = board.points[to - 1]
    const opposing = actor === 'white' ? Math.max(-value, 0) : Math.max(value, 0)
    if (opposing >= 2) {
      return reject('blocked', `destination ${String(to)} blocked`)
    }
    return ok({ from, to, pip, entered: from === BAR, hit: opposing === 1, borneOff: false })
  }

  if (!allInHome(board, actor)) {
    return reject('not_all_home', 'cannot bear off, not all checkers in home')
  }
  if (pipsToBearOff(actor, from) !== pip && anyFurtherFromHome(board, actor, from)) {
    return reject('bear_off_order', 'must use exact roll or bear off highest checker')
  }
  return ok({ from, to: OFF, pip, entered: false, hit: false, borneOff: true })
}

/**
 * Apply an accepted plan to a copy of the board.
 * Does not mutate the original board.
 */
export function applyPlanToBoard({
  board,
  actor,
  plan,
}: {
  board: BoardCounts
  actor: Player
  plan: StepPlan
}): BoardCounts {
  const sign = actor === 'white' ? 1 : -1
  const opponent: Player = actor === 'white' ? 'black' : 'white'
  const points = [...board.points]
  const bar = { ...board.bar }
  const borneOff = { ...board.borneOff }

  if (plan.entered) {
    bar[actor]--
  } else {
    points[plan.from - 1] -= sign
  }

  if (plan.borneOff) {
    borneOff[actor]++
  } else {
    if (plan.hit) {
      points[plan.to - 1] = 0
      bar[opponent]++
    }
    points[plan.to - 1] += sign
  }

  return { points, bar, borneOff }
}

/**
 * Origins the player may move from: the bar while it holds a checker,
 * otherwise every point with one of the player's checkers.
 */
export function getOrigins(board: BoardCounts, actor: Player): number[] {
  if (board.bar[actor] > 0) {
    return [BAR]
  }
  const origins: number[] = []
  for (let point = 1; point <= 24; point++) {
    if (countFor(board, actor, point) > 0) {
      origins.push(point)
    }
  }
  return origins
}

/**
 * Every legal single step for the given dice, grouped by origin.
 */
export function getLegalSteps({
  board,
  actor,
  dice,
}: {
  board: BoardCounts
  actor: Player
  dice: readonly DieValue[]
}): LegalSteps[] {
  const uniqueDice = [...new Set(dice)]
  const result: LegalSteps[] = []

  for (const from of getOrigins(board, actor)) {
    const options: LegalStepOption[] = []
    for (const pip of uniqueDice) {
      const plan = planStep({ board, actor, from, pip })
      if (plan.ok) {
        options.push({ to: plan.value.to, pip, wouldHit: plan.value.hit })
      }
    }
    if (options.length > 0) {
      result.push({ from, options })
    }
  }

  return result
}
