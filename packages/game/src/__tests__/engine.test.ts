/**
 * Turn state machine tests
 *
 * Drives the engine facade through openings, steps, undo and commit, and
 * checks the Result of every command along with the resulting state.
 */

import { describe, it, expect } from 'vitest'
import type { Engine } from '../engine'
import {
  createBoardWithCheckers,
  createEngineAt,
  createOpenedEngine,
  createTestEngine,
  expectErr,
  expectOk,
  startingBoard,
} from './testUtils'

/** Sum of a side's checkers across points, bar and off in the snapshot */
function totalFor(engine: Engine, side: 'white' | 'black'): number {
  const snapshot = engine.getState()
  const onPoints = snapshot.points
    .filter(p => p.side === side)
    .reduce((sum, p) => sum + p.count, 0)
  return onPoints + snapshot.bar[side] + snapshot.borneOff[side]
}

// =============================================================================
// Start & Opening
// =============================================================================

describe('startGame', () => {
  it('should enter the opening roll with a centered cube', () => {
    const engine = createTestEngine()

    expect(engine.phase()).toBe('not_started')
    const result = expectOk(engine.startGame())

    expect(result.rules).toEqual({ openingDoublePolicy: 'reroll', maxOpeningAutoDoubles: 0 })
    expect(engine.phase()).toBe('opening_roll')
    expect(engine.sideToMove()).toBe('none')
    expect(engine.cubeValue()).toBe(1)
    expect(engine.cubeHolder()).toBe('none')
    expect(engine.getState().points[5]).toEqual({ side: 'white', count: 5 })
  })

  it('should reject a negative auto-double cap', () => {
    const engine = createTestEngine()

    const error = expectErr(
      engine.startGame({ openingDoublePolicy: 'auto_double', maxOpeningAutoDoubles: -1 })
    )

    expect(error.kind).toBe('protocol')
    expect(error.type).toBe('invalid_rules')
    expect(engine.phase()).toBe('not_started')
  })

  it('should reset a game in progress', () => {
    const engine = createOpenedEngine(3, 1)
    expectOk(engine.applyStep(8, 3))

    expectOk(engine.startGame())

    expect(engine.phase()).toBe('opening_roll')
    expect(engine.countAt(8)).toEqual({ side: 'white', count: 3 })
    expect(engine.stepsThisTurn()).toEqual([])
  })
})

describe('opening roll', () => {
  it('should give the first turn to the higher die with both dice', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    const opening = expectOk(engine.setOpeningDice(5, 3))

    expect(opening.firstPlayer).toBe('white')
    expect(engine.phase()).toBe('moving')
    expect(engine.sideToMove()).toBe('white')
    expect(engine.diceRemaining()).toEqual([5, 3])
    expect(engine.turnNumber()).toBe(1)
  })

  it('should order the dice higher first when black wins the opening', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    expectOk(engine.setOpeningDice(2, 6))

    expect(engine.sideToMove()).toBe('black')
    expect(engine.diceRemaining()).toEqual([6, 2])
  })

  it('should leave the cube alone on a double under the reroll policy', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    const opening = expectOk(engine.setOpeningDice(4, 4))

    expect(opening.firstPlayer).toBeNull()
    expect(opening.autoDoublesApplied).toBe(0)
    expect(engine.phase()).toBe('opening_roll')
    expect(engine.cubeValue()).toBe(1)
  })

  it('should double the cube for each opening double without a cap', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame({ openingDoublePolicy: 'auto_double', maxOpeningAutoDoubles: 0 }))

    expectOk(engine.setOpeningDice(1, 1))
    expectOk(engine.setOpeningDice(2, 2))
    expectOk(engine.setOpeningDice(3, 3))

    expect(engine.cubeValue()).toBe(8)
    expect(engine.cubeHolder()).toBe('none')
    expect(engine.openingAutoDoubles()).toBe(3)
    expect(engine.phase()).toBe('opening_roll')
  })

  it('should stop auto-doubling at the cap', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame({ openingDoublePolicy: 'auto_double', maxOpeningAutoDoubles: 1 }))

    expectOk(engine.setOpeningDice(2, 2))
    const second = expectOk(engine.setOpeningDice(2, 2))
    expectOk(engine.setOpeningDice(6, 1))

    expect(second.autoDoublesApplied).toBe(0)
    expect(engine.cubeValue()).toBe(2)
    expect(engine.openingAutoDoubles()).toBe(1)
    expect(engine.sideToMove()).toBe('white')
  })

  it('should roll until the opening resolves and report auto-doubles', () => {
    const engine = createTestEngine([3, 3, 2, 2, 6, 1])
    expectOk(engine.startGame({ openingDoublePolicy: 'auto_double', maxOpeningAutoDoubles: 0 }))

    const opening = expectOk(engine.rollOpening())

    expect(opening).toEqual({
      whiteDie: 6,
      blackDie: 1,
      firstPlayer: 'white',
      dice: [6, 1],
      autoDoublesApplied: 2,
    })
    expect(engine.cubeValue()).toBe(4)
    expect(engine.phase()).toBe('moving')
  })

  it('should reroll internally without touching the cube under the reroll policy', () => {
    const engine = createTestEngine([4, 4, 2, 5])
    expectOk(engine.startGame())

    const opening = expectOk(engine.rollOpening())

    expect(opening.whiteDie).toBe(2)
    expect(opening.blackDie).toBe(5)
    expect(opening.firstPlayer).toBe('black')
    expect(engine.cubeValue()).toBe(1)
  })

  it('should resolve the opening with the default test script', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    const opening = expectOk(engine.rollOpening())

    expect(opening.firstPlayer).toBe('white')
    expect(opening.dice).toEqual([2, 1])
  })

  it('should reject dice outside 1-6', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    const error = expectErr(engine.setOpeningDice(0, 3))

    expect(error).toEqual({
      kind: 'protocol',
      type: 'invalid_dice',
      message: 'setOpeningDice: dice out of range (0, 3)',
    })
    expect(engine.lastError()).toBe('setOpeningDice: dice out of range (0, 3)')
  })

  it('should refuse opening dice before a game is started', () => {
    const engine = createTestEngine()

    const error = expectErr(engine.setOpeningDice(5, 3))

    expect(error.type).toBe('no_game')
    expect(error.message).toBe('setOpeningDice: no game started')
  })

  it('should refuse turn dice during the opening', () => {
    const engine = createTestEngine()
    expectOk(engine.startGame())

    const error = expectErr(engine.rollDice())

    expect(error).toEqual({
      kind: 'protocol',
      type: 'wrong_phase',
      message: 'rollDice: not in awaiting_roll phase',
    })
  })
})

// =============================================================================
// Steps
// =============================================================================

describe('applyStep', () => {
  it('should move a checker and consume the pip', () => {
    const engine = createOpenedEngine(3, 1)

    const applied = expectOk(engine.applyStep(8, 3))

    expect(applied.step).toEqual({ from: 8, to: 5, pip: 3, entered: false, hit: false, borneOff: false })
    expect(applied.remaining).toEqual([1])
    expect(engine.diceRemaining()).toEqual([1])
    expect(engine.countAt(8)).toEqual({ side: 'white', count: 2 })
    expect(engine.countAt(5)).toEqual({ side: 'white', count: 1 })
  })

  it('should reject a pip that is not among the dice', () => {
    const engine = createOpenedEngine(3, 1)

    const error = expectErr(engine.applyStep(8, 5))

    expect(error).toEqual({
      kind: 'rule',
      type: 'pip_not_available',
      message: 'applyStep: pip 5 not available',
    })
    expect(engine.diceRemaining()).toEqual([3, 1])
  })

  it('should reject a blocked destination and leave the position unchanged', () => {
    const engine = createOpenedEngine(3, 1)
    const before = engine.getState()

    const error = expectErr(engine.applyStep(13, 1))

    expect(error.kind).toBe('rule')
    expect(error.message).toBe('applyStep: destination 12 blocked')
    expect(engine.lastError()).toBe('applyStep: destination 12 blocked')
    expect(engine.getState()).toEqual(before)
  })

  it('should clear lastError after a successful command', () => {
    const engine = createOpenedEngine(3, 1)
    expectErr(engine.applyStep(13, 1))

    expectOk(engine.applyStep(13, 3))

    expect(engine.lastError()).toBe('')
  })

  it('should refuse steps outside the moving phase', () => {
    const engine = createEngineAt(startingBoard(), 'white')

    const error = expectErr(engine.applyStep(24, 1))

    expect(error).toEqual({
      kind: 'protocol',
      type: 'wrong_phase',
      message: 'applyStep: not in moving phase',
    })
  })

  it('should enforce entering from the bar first', () => {
    const board = createBoardWithCheckers({
      white: [{ bar: true, count: 1 }, { point: 6, count: 14 }],
      black: [{ point: 1, count: 15 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(4, 2))

    expect(expectErr(engine.applyStep(6, 2)).message).toBe('applyStep: must enter from bar first')

    const entered = expectOk(engine.applyStep(0, 4))
    expect(entered.step.to).toBe(21)
    expect(engine.countBar('white')).toBe(0)
  })

  it('should send a hit checker to the bar', () => {
    const board = createBoardWithCheckers({
      white: [{ point: 10, count: 1 }, { point: 6, count: 14 }],
      black: [{ point: 7, count: 1 }, { point: 24, count: 14 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(3, 2))

    const applied = expectOk(engine.applyStep(10, 3))

    expect(applied.step.hit).toBe(true)
    expect(engine.countBar('black')).toBe(1)
    expect(engine.countAt(7)).toEqual({ side: 'white', count: 1 })
    expect(totalFor(engine, 'black')).toBe(15)
  })

  it('should bear off a checker', () => {
    const board = createBoardWithCheckers({
      white: [{ point: 2, count: 1 }],
      black: [{ point: 24, count: 1 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(2, 1))

    expectOk(engine.applyStep(2, 2))

    expect(engine.countOff('white')).toBe(15)
    // Bearing off the last checker does not end the game
    expect(engine.phase()).toBe('moving')
  })
})

// =============================================================================
// Undo
// =============================================================================

describe('undoStep', () => {
  it('should restore position, dice and steps exactly', () => {
    const engine = createOpenedEngine(3, 1)
    const before = engine.getState()

    expectOk(engine.applyStep(6, 1))
    const undone = expectOk(engine.undoStep())

    expect(undone.undone.from).toBe(6)
    expect(engine.getState()).toEqual(before)
    expect(engine.diceRemaining()).toEqual([3, 1])
    expect(engine.stepsThisTurn()).toEqual([])
  })

  it('should undo steps in last-in first-out order', () => {
    const engine = createOpenedEngine(3, 1)

    expectOk(engine.applyStep(8, 3))
    expectOk(engine.applyStep(6, 1))
    expectOk(engine.undoStep())

    expect(engine.diceRemaining()).toEqual([1])
    expect(engine.countAt(6)).toEqual({ side: 'white', count: 5 })
    expect(engine.countAt(5)).toEqual({ side: 'white', count: 1 })
  })

  it('should return a hit checker to its point', () => {
    const board = createBoardWithCheckers({
      white: [{ point: 10, count: 1 }, { point: 6, count: 14 }],
      black: [{ point: 7, count: 1 }, { point: 24, count: 14 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(3, 2))
    const hitChecker = engine.store.getState().game.position.points[6][0]

    expectOk(engine.applyStep(10, 3))
    expectOk(engine.undoStep())

    expect(engine.countAt(7)).toEqual({ side: 'black', count: 1 })
    expect(engine.countAt(10)).toEqual({ side: 'white', count: 1 })
    expect(engine.countBar('black')).toBe(0)
    expect(engine.store.getState().game.position.points[6]).toEqual([hitChecker])
  })

  it('should undo an entry back onto the bar', () => {
    const board = createBoardWithCheckers({
      white: [{ bar: true, count: 1 }, { point: 6, count: 14 }],
      black: [{ point: 1, count: 15 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(4, 2))

    expectOk(engine.applyStep(0, 2))
    expectOk(engine.undoStep())

    expect(engine.countBar('white')).toBe(1)
    expect(engine.countAt(23)).toEqual({ side: 'none', count: 0 })
    expect(engine.diceRemaining()).toEqual([4, 2])
  })

  it('should restore every legal first step of the opening', () => {
    const engine = createOpenedEngine(6, 5)
    const before = engine.getState()
    const options = engine.legalSteps().flatMap(s => s.options.map(o => ({ from: s.from, pip: o.pip })))

    expect(options).toHaveLength(5)
    for (const { from, pip } of options) {
      expectOk(engine.applyStep(from, pip))
      expectOk(engine.undoStep())
      expect(engine.getState()).toEqual(before)
      expect(engine.diceRemaining()).toEqual([6, 5])
      expect(engine.stepsThisTurn()).toHaveLength(0)
    }
  })

  it('should report nothing to undo', () => {
    const engine = createOpenedEngine(3, 1)

    expect(expectErr(engine.undoStep())).toEqual({
      kind: 'rule',
      type: 'nothing_to_undo',
      message: 'undoStep: nothing to undo',
    })
  })
})

// =============================================================================
// Commit
// =============================================================================

describe('commitTurn', () => {
  it('should archive the turn and pass the roll', () => {
    const engine = createOpenedEngine(3, 1)
    expectOk(engine.applyStep(8, 3))
    expectOk(engine.applyStep(6, 1))

    const committed = expectOk(engine.commitTurn())

    expect(committed).toEqual({ player: 'white', nextToMove: 'black', stepsUsed: 2, maxPlayable: 2 })
    expect(engine.phase()).toBe('awaiting_roll')
    expect(engine.needsRoll()).toBe(true)
    expect(engine.sideToMove()).toBe('black')
    expect(engine.turnNumber()).toBe(2)
    expect(engine.diceRemaining()).toEqual([])
    expect(engine.countAt(5)).toEqual({ side: 'white', count: 2 })
    expect(engine.history()).toEqual([
      {
        player: 'white',
        dice: [3, 1],
        steps: [
          { from: 8, to: 5, pip: 3, entered: false, hit: false, borneOff: false },
          { from: 6, to: 5, pip: 1, entered: false, hit: false, borneOff: false },
        ],
      },
    ])
  })

  it('should require a move when one exists', () => {
    const engine = createOpenedEngine(3, 1)

    expect(expectErr(engine.commitTurn())).toEqual({
      kind: 'rule',
      type: 'legal_move_exists',
      message: 'commitTurn: at least one legal move exists, it must be played',
    })
    expect(engine.phase()).toBe('moving')
  })

  it('should require the maximum number of dice', () => {
    const engine = createOpenedEngine(3, 1)
    expectOk(engine.applyStep(8, 3))

    const error = expectErr(engine.commitTurn())

    expect(error.type).toBe('must_use_maximum')
    expect(error.message).toBe('commitTurn: must use maximum number of dice (2, played 1)')
  })

  it('should allow an empty turn when nothing can be played', () => {
    const board = createBoardWithCheckers({
      white: [{ bar: true, count: 1 }, { point: 6, count: 14 }],
      black: [
        { point: 19, count: 2 },
        { point: 20, count: 2 },
        { point: 21, count: 2 },
        { point: 22, count: 2 },
        { point: 23, count: 2 },
        { point: 24, count: 2 },
        { point: 1, count: 3 },
      ],
    })
    const engine = createEngineAt(board, 'white')

    const rolled = expectOk(engine.setDice(4, 2))
    expect(rolled.canMove).toBe(false)
    expect(engine.hasAnyLegalStep()).toBe(false)
    expect(engine.phase()).toBe('moving')

    const committed = expectOk(engine.commitTurn())
    expect(committed.maxPlayable).toBe(0)
    expect(engine.sideToMove()).toBe('black')
    expect(engine.history()[0].steps).toEqual([])
  })

  describe('when only one die can be played', () => {
    // The runner on 13 lands on the block at 2 whichever die it uses second
    const eitherDie = createBoardWithCheckers({
      white: [{ point: 13, count: 1 }, { point: 1, count: 14 }],
      black: [{ point: 2, count: 2 }],
    })

    it('should require the higher die', () => {
      const engine = createEngineAt(eitherDie, 'white')
      expectOk(engine.setDice(5, 6))
      expectOk(engine.applyStep(13, 5))

      expect(expectErr(engine.commitTurn())).toEqual({
        kind: 'rule',
        type: 'must_play_higher',
        message: 'commitTurn: only one die playable; must use the higher die (6)',
      })
    })

    it('should accept the higher die', () => {
      const engine = createEngineAt(eitherDie, 'white')
      expectOk(engine.setDice(5, 6))
      expectOk(engine.applyStep(13, 6))

      const committed = expectOk(engine.commitTurn())
      expect(committed.maxPlayable).toBe(1)
    })

    it('should accept the lower die when the higher one cannot move', () => {
      const board = createBoardWithCheckers({
        white: [{ point: 13, count: 1 }, { point: 1, count: 14 }],
        black: [{ point: 7, count: 2 }, { point: 2, count: 2 }],
      })
      const engine = createEngineAt(board, 'white')
      expectOk(engine.setDice(6, 5))
      expectOk(engine.applyStep(13, 5))

      expect(engine.hasAnyLegalStep()).toBe(false)
      expectOk(engine.commitTurn())
    })
  })

  it('should refuse to commit outside the moving phase', () => {
    const engine = createEngineAt(startingBoard(), 'black')

    expect(expectErr(engine.commitTurn()).type).toBe('wrong_phase')
  })
})

// =============================================================================
// Dice
// =============================================================================

describe('turn dice', () => {
  it('should expand doubles to four pips', () => {
    const engine = createEngineAt(startingBoard(), 'black')

    const rolled = expectOk(engine.setDice(2, 2))

    expect(rolled.dice).toEqual([2, 2, 2, 2])
    expect(rolled.canMove).toBe(true)
    expect(engine.diceRemaining()).toEqual([2, 2, 2, 2])
  })

  it('should roll with the injected dice source', () => {
    const engine = createTestEngine([4, 2, 5, 3])
    expectOk(engine.startGame())
    expectOk(engine.rollOpening())
    expectOk(engine.applyStep(8, 4))
    expectOk(engine.applyStep(6, 2))
    expectOk(engine.commitTurn())

    const rolled = expectOk(engine.rollDice())

    expect(rolled).toEqual({ die1: 5, die2: 3, actor: 'black', dice: [5, 3], canMove: true })
    expect(engine.phase()).toBe('moving')
  })

  it('should reject turn dice outside 1-6', () => {
    const engine = createEngineAt(startingBoard(), 'white')

    expect(expectErr(engine.setDice(7, 1)).message).toBe('setDice: dice out of range (7, 1)')
    expect(engine.phase()).toBe('awaiting_roll')
  })
})

// =============================================================================
// Invariants
// =============================================================================

describe('invariants', () => {
  it('should conserve checkers and keep points single-sided through play', () => {
    const engine = createTestEngine([5, 2, 6, 4, 3, 3, 1, 5, 6, 6, 2, 4])
    expectOk(engine.startGame())
    expectOk(engine.rollOpening())

    for (let turn = 0; turn < 5; turn++) {
      if (engine.phase() === 'awaiting_roll') {
        expectOk(engine.rollDice())
      }
      for (;;) {
        const [first] = engine.legalSteps()
        if (first === undefined) break
        expectOk(engine.applyStep(first.from, first.options[0].pip))

        expect(totalFor(engine, 'white')).toBe(15)
        expect(totalFor(engine, 'black')).toBe(15)
        for (const point of engine.getState().points) {
          expect(point.side === 'none').toBe(point.count === 0)
        }
      }
      if (!engine.commitTurn().ok) break
    }
  })

  it('should report legal steps only while moving', () => {
    const engine = createEngineAt(startingBoard(), 'white')

    expect(engine.legalSteps()).toEqual([])
    expect(engine.hasAnyLegalStep()).toBe(false)

    expectOk(engine.setDice(6, 5))
    expect(engine.hasAnyLegalStep()).toBe(true)
    expect(engine.legalSteps().map(s => s.from)).toEqual([8, 13, 24])
  })
})

// =============================================================================
// loadPosition
// =============================================================================

describe('loadPosition', () => {
  it('should reject a board without 15 checkers a side', () => {
    const engine = createTestEngine()
    const board = { ...startingBoard(), borneOff: { white: 1, black: 0 } }

    expect(expectErr(engine.loadPosition(board, 'white'))).toEqual({
      kind: 'protocol',
      type: 'invalid_position',
      message: 'loadPosition: white has 16 checkers, expected 15',
    })
    expect(engine.phase()).toBe('not_started')
  })

  it('should reject fractional bar and off counts', () => {
    const engine = createTestEngine()
    const start = startingBoard()
    const points = [...start.points]
    points[5] = 4
    const board = { points, bar: { white: 0.5, black: 0 }, borneOff: { white: 0.5, black: 0 } }

    expect(expectErr(engine.loadPosition(board, 'white'))).toEqual({
      kind: 'protocol',
      type: 'invalid_position',
      message: 'loadPosition: non-integer bar or off count for white',
    })
    expect(engine.phase()).toBe('not_started')
    expect(engine.countBar('white')).toBe(0)
  })

  it('should hand the roll to the given side', () => {
    const engine = createEngineAt(startingBoard(), 'black')

    expect(engine.phase()).toBe('awaiting_roll')
    expect(engine.sideToMove()).toBe('black')
    expect(engine.turnNumber()).toBe(1)
    expect(engine.cubeValue()).toBe(1)
  })
})

// =============================================================================
// hasAnyLegalStep
// =============================================================================

describe('hasAnyLegalStep', () => {
  it('should be false before the dice are rolled', () => {
    const engine = createEngineAt(startingBoard(), 'white')

    expect(engine.phase()).toBe('awaiting_roll')
    expect(engine.hasAnyLegalStep()).toBe(false)

    expectOk(engine.setDice(2, 1))
    expect(engine.hasAnyLegalStep()).toBe(true)
  })

  it('should follow the live board rather than the turn start', () => {
    // 13-7 is blocked; after 13-8 the 6 would land on the block at 2
    const board = createBoardWithCheckers({
      white: [{ point: 13, count: 1 }, { point: 1, count: 14 }],
      black: [{ point: 7, count: 2 }, { point: 2, count: 2 }],
    })
    const engine = createEngineAt(board, 'white')
    expectOk(engine.setDice(6, 5))
    expect(engine.hasAnyLegalStep()).toBe(true)

    expectOk(engine.applyStep(13, 5))
    expect(engine.diceRemaining()).toEqual([6])
    expect(engine.hasAnyLegalStep()).toBe(false)

    expectOk(engine.undoStep())
    expect(engine.hasAnyLegalStep()).toBe(true)
  })

  it('should be false once every die is used', () => {
    const engine = createEngineAt(startingBoard(), 'white')
    expectOk(engine.setDice(6, 5))
    expectOk(engine.applyStep(13, 6))
    expectOk(engine.applyStep(13, 5))

    expect(engine.phase()).toBe('moving')
    expect(engine.diceRemaining()).toEqual([])
    expect(engine.hasAnyLegalStep()).toBe(false)
  })

  it('should be false after the game ends', () => {
    const engine = createEngineAt(startingBoard(), 'white')
    expectOk(engine.offerCube())
    expect(engine.cubeOfferedBy()).toBe('white')
    expectOk(engine.dropCube())

    expect(engine.isGameOver()).toBe(true)
    expect(engine.cubeOfferedBy()).toBeNull()
    expect(engine.hasAnyLegalStep()).toBe(false)
  })
})
