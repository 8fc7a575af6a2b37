/**
 * ASCII Board Renderer
 *
 * Renders board snapshots as ASCII text for display in text-only contexts.
 * Works only on the snapshot the engine hands out.
 */

import type { BoardSnapshot, Engine, LegalSteps, PointSnapshot } from '@bgrules/game'
import { OFF } from '@bgrules/game'

// =============================================================================
// Constants
// =============================================================================

const WHITE_CHECKER = 'O'
const BLACK_CHECKER = 'X'
const MAX_VISIBLE_CHECKERS = 5

// =============================================================================
// Helper Functions
// =============================================================================

function getCheckerChar(point: PointSnapshot): string {
  if (point.side === 'white') return WHITE_CHECKER
  if (point.side === 'black') return BLACK_CHECKER
  return ' '
}

function formatPointNumber(n: number): string {
  return n.toString().padStart(2, ' ')
}

function formatOverflowCount(count: number): string {
  // Keep single character width to maintain board alignment
  if (count >= 10) return '+'
  return count.toString()
}

function formatCheckerStack(point: PointSnapshot, row: number): string {
  if (row === MAX_VISIBLE_CHECKERS - 1 && point.count > MAX_VISIBLE_CHECKERS) {
    return formatOverflowCount(point.count)
  }
  if (row < point.count) {
    return getCheckerChar(point)
  }
  return ' '
}

function formatBarStack(count: number, checker: string, row: number): string {
  if (row === MAX_VISIBLE_CHECKERS - 1 && count > MAX_VISIBLE_CHECKERS) {
    return formatOverflowCount(count)
  }
  return row < count ? checker : ' '
}

function formatLocation(location: number): string {
  if (location === 0) return 'bar'
  if (location === OFF) return 'off'
  return String(location)
}

// =============================================================================
// Main Renderer
// =============================================================================

export function renderAsciiBoard({ snapshot }: { snapshot: BoardSnapshot }): string {
  const lines: string[] = []
  const at = (point: number): PointSnapshot => snapshot.points[point - 1]

  // Top point numbers (13-24)
  const topPointNumbers = Array.from({ length: 12 }, (_, i) => formatPointNumber(13 + i))
  lines.push(`    ${topPointNumbers.slice(0, 6).join(' ')}   BAR   ${topPointNumbers.slice(6).join(' ')}`)

  lines.push('   +' + '-'.repeat(17) + '+-----+' + '-'.repeat(17) + '+')

  // Top half: points 13-24, stacks growing down; black's bar checkers
  for (let row = 0; row < MAX_VISIBLE_CHECKERS; row++) {
    const leftQuadrant: string[] = []
    const rightQuadrant: string[] = []

    for (let point = 13; point <= 18; point++) {
      leftQuadrant.push(formatCheckerStack(at(point), row))
    }
    for (let point = 19; point <= 24; point++) {
      rightQuadrant.push(formatCheckerStack(at(point), row))
    }

    const barChar = formatBarStack(snapshot.bar.black, BLACK_CHECKER, row)
    lines.push(`   | ${leftQuadrant.join('  ')} | ${barChar} | ${rightQuadrant.join('  ')} |`)
  }

  lines.push('   |' + '-'.repeat(17) + '+-----+' + '-'.repeat(17) + '|')

  // Bottom half: points 12-1, stacks growing up; white's bar checkers
  for (let row = MAX_VISIBLE_CHECKERS - 1; row >= 0; row--) {
    const leftQuadrant: string[] = []
    const rightQuadrant: string[] = []

    for (let point = 12; point >= 7; point--) {
      leftQuadrant.push(formatCheckerStack(at(point), row))
    }
    for (let point = 6; point >= 1; point--) {
      rightQuadrant.push(formatCheckerStack(at(point), row))
    }

    const barChar = formatBarStack(snapshot.bar.white, WHITE_CHECKER, row)
    lines.push(`   | ${leftQuadrant.join('  ')} | ${barChar} | ${rightQuadrant.join('  ')} |`)
  }

  lines.push('   +' + '-'.repeat(17) + '+-----+' + '-'.repeat(17) + '+')

  // Bottom point numbers (12-1)
  const bottomPointNumbers = Array.from({ length: 12 }, (_, i) => formatPointNumber(12 - i))
  lines.push(`    ${bottomPointNumbers.slice(0, 6).join(' ')}   BAR   ${bottomPointNumbers.slice(6).join(' ')}`)

  lines.push('')
  lines.push(
    `   Borne off: White: ${String(snapshot.borneOff.white)}  Black: ${String(snapshot.borneOff.black)}  Cube: ${String(snapshot.cube)}`
  )

  return lines.join('\n')
}

/**
 * Render a summary of the engine's turn state
 */
export function renderGameSummary({ engine }: { engine: Engine }): string {
  const lines: string[] = []

  lines.push(`Turn ${String(engine.turnNumber())}`)
  lines.push(`Side to move: ${engine.sideToMove()}`)
  lines.push(`Phase: ${engine.phase()}`)

  const dice = engine.diceRemaining()
  if (dice.length > 0) {
    lines.push(`Dice remaining: ${dice.join(', ')}`)
  }

  const steps = engine.stepsThisTurn()
  if (steps.length > 0) {
    const stepsStr = steps
      .map(s => `${formatLocation(s.from)}->${formatLocation(s.to)}${s.hit ? '*' : ''}`)
      .join(', ')
    lines.push(`Steps this turn: ${stepsStr}`)
  }

  const holder = engine.cubeHolder()
  lines.push(`Cube: ${String(engine.cubeValue())} (${holder === 'none' ? 'centered' : holder})`)

  const result = engine.result()
  if (result) {
    lines.push(`Game over! ${result.winner} wins at cube ${String(result.finalCube)} (cube dropped)`)
  }

  return lines.join('\n')
}

/**
 * Render the full game state (board + summary)
 */
export function renderFullGameState({ engine }: { engine: Engine }): string {
  return renderAsciiBoard({ snapshot: engine.getState() }) + '\n\n' + renderGameSummary({ engine })
}

/**
 * Render legal steps in a readable format
 */
export function renderLegalSteps({ steps }: { steps: readonly LegalSteps[] }): string {
  if (steps.length === 0) {
    return 'No legal steps available.'
  }

  const lines: string[] = ['Legal steps:']

  for (const origin of steps) {
    for (const option of origin.options) {
      const hitIndicator = option.wouldHit ? ' (hit!)' : ''
      lines.push(
        `  ${formatLocation(origin.from)} -> ${formatLocation(option.to)} using ${String(option.pip)}${hitIndicator}`
      )
    }
  }

  return lines.join('\n')
}
