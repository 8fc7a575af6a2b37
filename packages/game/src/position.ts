/**
 * Position Model
 *
 * Owns the 30 checkers and the point stacks. Everything that relocates a
 * checker goes through the transfer primitives below; they detach the checker
 * from its current location and attach it at the new one in a single call, so
 * that every side keeps exactly 15 checkers and no point is ever shared.
 *
 * The functions mutate the position they are given. Inside the game slice
 * that position is an Immer draft.
 */

import type {
  BoardCounts,
  BoardSnapshot,
  CheckerId,
  Player,
  PointSnapshot,
  Position,
  Side,
} from './types'
import { BAR, CHECKERS_PER_SIDE, OFF, isBoardPoint } from './types'

// =============================================================================
// Layout
// =============================================================================

/** Starting points for each side's checkers, in id order */
const STARTING_LAYOUT: Record<Player, readonly number[]> = {
  white: [24, 24, 13, 13, 13, 13, 13, 8, 8, 8, 6, 6, 6, 6, 6],
  black: [1, 1, 12, 12, 12, 12, 12, 17, 17, 17, 19, 19, 19, 19, 19],
}

/** First checker id of a side */
function firstId(side: Player): CheckerId {
  return side === 'white' ? 0 : CHECKERS_PER_SIDE
}

/**
 * Build a position with no checkers placed yet; every checker starts
 * borne off so callers can lay out arbitrary positions with transfers.
 */
export function createClearedPosition(): Position {
  const checkers = [
    ...Array.from({ length: CHECKERS_PER_SIDE }, () => ({ side: 'white' as const, location: OFF })),
    ...Array.from({ length: CHECKERS_PER_SIDE }, () => ({ side: 'black' as const, location: OFF })),
  ]
  return {
    checkers,
    points: Array.from({ length: 24 }, (): CheckerId[] => []),
    bar: { white: 0, black: 0 },
    borneOff: { white: CHECKERS_PER_SIDE, black: CHECKERS_PER_SIDE },
  }
}

/**
 * Standard backgammon starting position.
 */
export function createStartingPosition(): Position {
  const position = createClearedPosition()
  for (const side of ['white', 'black'] as const) {
    STARTING_LAYOUT[side].forEach((point, i) => {
      transferToPoint(position, firstId(side) + i, point)
    })
  }
  return position
}

/**
 * Describe what is wrong with a signed-count board, or null if it is a
 * reachable layout (24 points, 15 checkers per side).
 */
export function describeBoardProblem(board: BoardCounts): string | null {
  if (board.points.length !== 24) {
    return `expected 24 points, got ${String(board.points.length)}`
  }
  for (const side of ['white', 'black'] as const) {
    const bar = board.bar[side]
    const off = board.borneOff[side]
    if (!Number.isInteger(bar) || !Number.isInteger(off)) {
      return `non-integer bar or off count for ${side}`
    }
    if (bar < 0 || off < 0) {
      return `negative bar or off count for ${side}`
    }
    let total = bar + off
    for (const value of board.points) {
      if (!Number.isInteger(value)) return `non-integer point value ${String(value)}`
      if (side === 'white' && value > 0) total += value
      if (side === 'black' && value < 0) total -= value
    }
    if (total !== CHECKERS_PER_SIDE) {
      return `${side} has ${String(total)} checkers, expected ${String(CHECKERS_PER_SIDE)}`
    }
  }
  return null
}

/**
 * Build a position from a signed-count board. Throws if the board is not a
 * valid layout.
 */
export function positionFromCounts(board: BoardCounts): Position {
  const problem = describeBoardProblem(board)
  if (problem !== null) {
    throw new Error(`positionFromCounts: ${problem}`)
  }
  const position = createClearedPosition()
  const next: Record<Player, CheckerId> = { white: firstId('white'), black: firstId('black') }
  const place = (side: Player, count: number, to: (id: CheckerId) => void): void => {
    for (let i = 0; i < count; i++) {
      to(next[side]++)
    }
  }
  board.points.forEach((value, index) => {
    const side: Player = value > 0 ? 'white' : 'black'
    place(side, Math.abs(value), id => { transferToPoint(position, id, index + 1) })
  })
  for (const side of ['white', 'black'] as const) {
    place(side, board.bar[side], id => { transferToBar(position, id) })
  }
  return position
}

// =============================================================================
// Queries
// =============================================================================

/** Total checkers on a point; 0 outside 1-24 */
export function pointCount(position: Position, point: number): number {
  if (!isBoardPoint(point)) return 0
  return position.points[point - 1].length
}

/** Owner of a point, 'none' if empty */
export function pointSide(position: Position, point: number): Side {
  if (!isBoardPoint(point)) return 'none'
  const stack = position.points[point - 1]
  if (stack.length === 0) return 'none'
  return position.checkers[stack[0]].side
}

/** Checkers a side has on a point (0 if empty or held by the other side) */
export function sidePointCount(position: Position, side: Player, point: number): number {
  return pointSide(position, point) === side ? pointCount(position, point) : 0
}

export function barCount(position: Position, side: Player): number {
  return position.bar[side]
}

export function offCount(position: Position, side: Player): number {
  return position.borneOff[side]
}

/** Checkers of a side across points, bar and off. Always 15. */
export function checkerTotal(position: Position, side: Player): number {
  let total = position.bar[side] + position.borneOff[side]
  for (let point = 1; point <= 24; point++) {
    total += sidePointCount(position, side, point)
  }
  return total
}

// =============================================================================
// Transfers
// =============================================================================

function detach(position: Position, id: CheckerId): void {
  const checker = position.checkers[id]
  const { location, side } = checker
  if (location === BAR) {
    position.bar[side]--
  } else if (location > 24) {
    position.borneOff[side]--
  } else {
    const stack = position.points[location - 1]
    const index = stack.indexOf(id)
    if (index === -1) {
      throw new Error(`Checker ${String(id)} is missing from point ${String(location)}`)
    }
    stack.splice(index, 1)
  }
}

/**
 * Move a checker onto a board point.
 * Throws if the point is held by the other side: a lone opposing checker
 * must be sent to the bar first.
 */
export function transferToPoint(position: Position, id: CheckerId, point: number): void {
  if (!isBoardPoint(point)) {
    throw new Error(`transferToPoint: ${String(point)} is not a board point`)
  }
  const checker = position.checkers[id]
  const owner = pointSide(position, point)
  if (owner !== 'none' && owner !== checker.side) {
    throw new Error(`transferToPoint: point ${String(point)} is held by ${owner}`)
  }
  detach(position, id)
  checker.location = point
  position.points[point - 1].push(id)
}

/** Send a checker to its side's bar */
export function transferToBar(position: Position, id: CheckerId): void {
  const checker = position.checkers[id]
  detach(position, id)
  checker.location = BAR
  position.bar[checker.side]++
}

/** Bear a checker off */
export function transferToOff(position: Position, id: CheckerId): void {
  const checker = position.checkers[id]
  detach(position, id)
  checker.location = OFF
  position.borneOff[checker.side]++
}

/**
 * Select the checker that leaves a point next (the top of the stack).
 * Returns null for an empty or off-board point. Relocate it with a transfer.
 */
export function popFromPoint(position: Position, point: number): CheckerId | null {
  if (!isBoardPoint(point)) return null
  const stack = position.points[point - 1]
  return stack.length > 0 ? stack[stack.length - 1] : null
}

/**
 * Select a checker of the given side waiting on the bar, or null.
 */
export function popFromBar(position: Position, side: Player): CheckerId | null {
  if (position.bar[side] === 0) return null
  const start = firstId(side)
  for (let id = start; id < start + CHECKERS_PER_SIDE; id++) {
    if (position.checkers[id].location === BAR) return id
  }
  return null
}

/**
 * Whether a specific checker sits on a point.
 */
export function isOnPoint(position: Position, point: number, id: CheckerId): boolean {
  return isBoardPoint(point) && position.points[point - 1].includes(id)
}

// =============================================================================
// Copies
// =============================================================================

/**
 * Plain signed-count copy of the position (positive white, negative black).
 */
export function toBoardCounts(position: Position): BoardCounts {
  const points: number[] = []
  for (let point = 1; point <= 24; point++) {
    const count = pointCount(position, point)
    points.push(pointSide(position, point) === 'black' ? -count : count)
  }
  return {
    points,
    bar: { white: position.bar.white, black: position.bar.black },
    borneOff: { white: position.borneOff.white, black: position.borneOff.black },
  }
}

/**
 * Snapshot for renderers and transports.
 */
export function getBoardSnapshot(position: Position, cubeValue: number): BoardSnapshot {
  const points: PointSnapshot[] = []
  for (let point = 1; point <= 24; point++) {
    points.push({ side: pointSide(position, point), count: pointCount(position, point) })
  }
  return {
    points,
    bar: { white: position.bar.white, black: position.bar.black },
    borneOff: { white: position.borneOff.white, black: position.borneOff.black },
    cube: cubeValue,
  }
}
