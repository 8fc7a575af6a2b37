/**
 * Max-Play Search
 *
 * Exhaustive backtracking over every ordering and subset of the dice. Each ply
 * tries every unused die from every legal origin on a copy of the board and
 * recurses. With at most four dice and 25 origins per ply the tree is small
 * enough to search on every commit.
 */

import type { BoardCounts, DieValue, Player } from './types'
import { applyPlanToBoard, getOrigins, planStep } from './rules'

function search(board: BoardCounts, actor: Player, dice: readonly DieValue[]): number {
  let best = 0
  const triedPips = new Set<DieValue>()

  for (let i = 0; i < dice.length; i++) {
    const pip = dice[i]
    // Same pip from the same board explores the same subtree
    if (triedPips.has(pip)) continue
    triedPips.add(pip)

    const rest = [...dice.slice(0, i), ...dice.slice(i + 1)]

    for (const from of getOrigins(board, actor)) {
      const plan = planStep({ board, actor, from, pip })
      if (!plan.ok) continue

      const next = applyPlanToBoard({ board, actor, plan: plan.value })
      const used = 1 + search(next, actor, rest)
      if (used > best) {
        best = used
        if (best === dice.length) {
          return best
        }
      }
    }
  }

  return best
}

/**
 * Largest number of dice any legal sequence can consume.
 */
export function maxPlayableDice({
  board,
  actor,
  dice,
}: {
  board: BoardCounts
  actor: Player
  dice: readonly DieValue[]
}): number {
  if (dice.length === 0) return 0
  return search(board, actor, dice)
}

/**
 * Whether at least one die can be played.
 */
export function hasLegalPlay(args: {
  board: BoardCounts
  actor: Player
  dice: readonly DieValue[]
}): boolean {
  return maxPlayableDice(args) > 0
}
