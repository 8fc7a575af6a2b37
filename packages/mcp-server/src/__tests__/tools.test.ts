import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { MatchListOutputSchema, MatchResponseOutputSchema } from '../schemas'
import { createTestHandlers, textOf } from './testUtils'

const matchResponse = z.object(MatchResponseOutputSchema)
const matchList = z.object(MatchListOutputSchema)

function firstLine(result: Parameters<typeof textOf>[0]): string {
  return textOf(result).split('\n')[0]
}

/** Match `alpha` in turn 1, white to play 5-3 */
function openedMatch() {
  const setup = createTestHandlers()
  setup.handlers.createMatch({ matchId: 'alpha' })
  setup.handlers.setOpeningDice({ matchId: 'alpha', white: 5, black: 3 })
  return setup
}

describe('createMatch', () => {
  it('starts a game with default rules', () => {
    const { handlers, ctx } = createTestHandlers()

    const result = handlers.createMatch({ matchId: 'alpha' })

    expect(result.isError).toBeUndefined()
    expect(firstLine(result)).toBe('Match alpha started (opening doubles: reroll, cap 0). Roll the opening.')
    const { match, legalSteps } = matchResponse.parse(result.structuredContent)
    expect(match.phase).toBe('opening_roll')
    expect(match.version).toBe(1)
    expect(legalSteps).toBeUndefined()
    expect(ctx.lines).toEqual([
      '2026-01-01T00:00:00.000Z | CreateMatch | - | create: alpha',
      '2026-01-01T00:00:00.000Z | Command | alpha:none | Match alpha started (opening doubles: reroll, cap 0). Roll the opening.',
    ])
  })

  it('applies opening rules', () => {
    const { handlers } = createTestHandlers()

    const result = handlers.createMatch({
      matchId: 'alpha',
      openingDoublePolicy: 'auto_double',
      maxOpeningAutoDoubles: 2,
    })

    expect(firstLine(result)).toBe('Match alpha started (opening doubles: auto_double, cap 2). Roll the opening.')
  })

  it('rejects a negative auto-double cap', () => {
    const { handlers } = createTestHandlers()

    const result = handlers.createMatch({ matchId: 'alpha', maxOpeningAutoDoubles: -1 })

    expect(result.isError).toBe(true)
  })
})

describe('opening', () => {
  it('rolls the opening with the match dice source', () => {
    const { handlers } = createTestHandlers([5, 3])
    handlers.createMatch({ matchId: 'alpha' })

    const result = handlers.rollOpening({ matchId: 'alpha' })

    expect(firstLine(result)).toBe('Opening: white 5, black 3. White moves first with 5-3.')
    const { match, legalSteps } = matchResponse.parse(result.structuredContent)
    expect(match.phase).toBe('moving')
    expect(match.sideToMove).toBe('white')
    expect(match.dice).toEqual([5, 3])
    expect(legalSteps).toEqual(
      expect.arrayContaining([
        { from: 8, options: expect.arrayContaining([{ to: 3, pip: 5, wouldHit: false }]) },
      ])
    )
  })

  it('reports an opening double and stays in the opening', () => {
    const { handlers } = createTestHandlers()
    handlers.createMatch({ matchId: 'alpha' })

    const result = handlers.setOpeningDice({ matchId: 'alpha', white: 4, black: 4 })

    expect(firstLine(result)).toBe('Opening: white 4, black 4. Double; throw again.')
    expect(matchResponse.parse(result.structuredContent).match.phase).toBe('opening_roll')
  })

  it('names black when black wins the opening', () => {
    const { handlers } = createTestHandlers()
    handlers.createMatch({ matchId: 'alpha' })

    const result = handlers.setOpeningDice({ matchId: 'alpha', white: 2, black: 6 })

    expect(firstLine(result)).toBe('Opening: white 2, black 6. Black moves first with 6-2.')
  })
})

describe('moving', () => {
  it('applies and undoes a step', () => {
    const { handlers, ctx } = openedMatch()

    const moved = handlers.applyStep({ matchId: 'alpha', from: 8, pip: 5 })
    expect(firstLine(moved)).toBe('Moved 8->3 with 5.')
    expect(ctx.lines.at(-1)).toBe('2026-01-01T00:00:00.000Z | Move | alpha:white | Moved 8->3 with 5.')

    const undone = handlers.undoStep({ matchId: 'alpha' })
    expect(firstLine(undone)).toBe('Undid 8->3 (5).')
    expect(matchResponse.parse(undone.structuredContent).match.dice).toEqual([5, 3])
  })

  it('commits a full turn and passes the dice', () => {
    const { handlers } = openedMatch()
    handlers.applyStep({ matchId: 'alpha', from: 8, pip: 5 })
    handlers.applyStep({ matchId: 'alpha', from: 6, pip: 3 })

    const result = handlers.commitTurn({ matchId: 'alpha' })

    expect(firstLine(result)).toBe('White committed 2 step(s). Black to roll.')
    const { match } = matchResponse.parse(result.structuredContent)
    expect(match.phase).toBe('awaiting_roll')
    expect(match.sideToMove).toBe('black')
    expect(match.turnNumber).toBe(2)
    expect(match.board.points[2]).toEqual({ side: 'white', count: 2 })
  })

  it('rejects an unavailable pip as a rule violation', () => {
    const { handlers, ctx } = openedMatch()
    const versionBefore = ctx.registry.get('alpha')?.version

    const result = handlers.applyStep({ matchId: 'alpha', from: 8, pip: 4 })

    expect(result.isError).toBe(true)
    expect(textOf(result)).toBe('Error: applyStep: pip 4 not available')
    expect(ctx.lines.at(-1)).toBe(
      '2026-01-01T00:00:00.000Z | Command | alpha:white | rejected: applyStep: pip 4 not available'
    )
    expect(ctx.registry.get('alpha')?.version).toBe(versionBefore)
  })

  it('rejects a commit that leaves dice unplayed', () => {
    const { handlers } = openedMatch()
    handlers.applyStep({ matchId: 'alpha', from: 8, pip: 5 })

    const result = handlers.commitTurn({ matchId: 'alpha' })

    expect(textOf(result)).toBe('Error: commitTurn: must use maximum number of dice (2, played 1)')
  })

  it('logs protocol errors as errors', () => {
    const { handlers, ctx } = createTestHandlers()

    const result = handlers.rollDice({ matchId: 'beta' })

    expect(textOf(result)).toBe('Error: rollDice: no game started')
    expect(ctx.lines.at(-1)).toBe('2026-01-01T00:00:00.000Z | Error | beta:none | rollDice: no game started')
  })

  it('sets dice for the side to move', () => {
    const { handlers } = openedMatch()
    handlers.applyStep({ matchId: 'alpha', from: 8, pip: 5 })
    handlers.applyStep({ matchId: 'alpha', from: 6, pip: 3 })
    handlers.commitTurn({ matchId: 'alpha' })

    const result = handlers.setDice({ matchId: 'alpha', die1: 2, die2: 2 })

    expect(firstLine(result)).toBe('Black rolled 2-2.')
    expect(matchResponse.parse(result.structuredContent).match.dice).toEqual([2, 2, 2, 2])
  })
})

describe('cube', () => {
  function blackToRoll() {
    const setup = openedMatch()
    setup.handlers.applyStep({ matchId: 'alpha', from: 8, pip: 5 })
    setup.handlers.applyStep({ matchId: 'alpha', from: 6, pip: 3 })
    setup.handlers.commitTurn({ matchId: 'alpha' })
    return setup
  }

  it('offers and takes', () => {
    const { handlers } = blackToRoll()

    const offered = handlers.offerCube({ matchId: 'alpha' })
    expect(firstLine(offered)).toBe('Black offers the cube at 2.')
    expect(matchResponse.parse(offered.structuredContent).match.phase).toBe('cube_offered')

    const taken = handlers.takeCube({ matchId: 'alpha' })
    expect(firstLine(taken)).toBe('Cube taken at 2; white holds it.')
    expect(matchResponse.parse(taken.structuredContent).match.cube).toEqual({ value: 2, holder: 'white' })
  })

  it('offers and drops', () => {
    const { handlers } = blackToRoll()
    handlers.offerCube({ matchId: 'alpha' })

    const dropped = handlers.dropCube({ matchId: 'alpha' })

    expect(firstLine(dropped)).toBe('Cube dropped. Black wins at 1.')
    const { match } = matchResponse.parse(dropped.structuredContent)
    expect(match.phase).toBe('game_over')
    expect(match.result).toEqual({ winner: 'black', finalCube: 1, resigned: true })
  })

  it('rejects a take with no offer', () => {
    const { handlers } = blackToRoll()

    const result = handlers.takeCube({ matchId: 'alpha' })

    expect(textOf(result)).toBe('Error: takeCube: no offer pending')
  })
})

describe('queries', () => {
  it('lists legal steps as text', () => {
    const { handlers } = createTestHandlers()
    handlers.createMatch({ matchId: 'alpha' })
    handlers.setOpeningDice({ matchId: 'alpha', white: 2, black: 1 })

    const result = handlers.legalSteps({ matchId: 'alpha' })

    const lines = textOf(result).split('\n')
    expect(lines[0]).toBe('Legal steps:')
    expect(lines).toContain('  6 -> 5 using 1')
    expect(lines).toContain('  13 -> 11 using 2')
  })

  it('reports no legal steps before the game starts', () => {
    const { handlers } = createTestHandlers()

    const result = handlers.legalSteps({ matchId: 'alpha' })

    expect(textOf(result)).toBe('No legal steps available.')
    expect(matchResponse.parse(result.structuredContent).legalSteps).toEqual([])
  })

  it('snapshots without changing the version', () => {
    const { handlers } = createTestHandlers()
    handlers.createMatch({ matchId: 'alpha' })

    const result = handlers.snapshot({ matchId: 'alpha' })

    expect(matchResponse.parse(result.structuredContent).match.version).toBe(1)
  })

  it('lists matches', () => {
    const { handlers } = createTestHandlers()
    expect(textOf(handlers.listMatches())).toBe('No matches.')

    handlers.createMatch({ matchId: 'alpha' })
    handlers.snapshot({ matchId: 'beta' })

    const result = handlers.listMatches()
    expect(textOf(result)).toBe('alpha v1 opening_roll\nbeta v0 not_started')
    expect(matchList.parse(result.structuredContent).matches).toEqual([
      { matchId: 'alpha', version: 1, phase: 'opening_roll', createdAt: '2026-01-01T00:00:00.000Z' },
      { matchId: 'beta', version: 0, phase: 'not_started', createdAt: '2026-01-01T00:00:00.000Z' },
    ])
  })
})
