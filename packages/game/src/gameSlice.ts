/**
 * Game Slice
 *
 * Redux slice for the rules engine. All transitions arrive as sync thunk
 * actions: the extraReducers apply a transition only when the operation's
 * result is ok, and record the message of a failed one in `lastError`.
 */

import { createSlice, createSelector, type Draft } from '@reduxjs/toolkit'
import type {
  BoardCounts,
  BoardSnapshot,
  CheckerId,
  CubeState,
  DieValue,
  GamePhase,
  GameResult,
  GameState,
  LegalSteps,
  Player,
  Side,
  StepRecord,
  Turn,
} from './types'
import { DEFAULT_RULES } from './types'
import type { EngineError, Result } from './result'
import {
  createStartingPosition,
  getBoardSnapshot,
  popFromBar,
  popFromPoint,
  positionFromCounts,
  toBoardCounts,
  transferToBar,
  transferToOff,
  transferToPoint,
} from './position'
import { getLegalSteps } from './rules'
import {
  performStartGame,
  performLoadPosition,
  performRollOpening,
  performSetOpeningDice,
  performRollDice,
  performSetDice,
  performApplyStep,
  performUndoStep,
  performCommitTurn,
  performOfferCube,
  performTakeCube,
  performDropCube,
  type RootState,
  type OpeningResult,
  type TurnDiceResult,
} from './operations'

export type { RootState }

const CENTERED_CUBE: CubeState = { value: 1, holder: 'none' }

function createInitialState(): GameState {
  return {
    position: createStartingPosition(),
    rules: DEFAULT_RULES,
    phase: 'not_started',
    actor: 'none',
    dice: [],
    steps: [],
    turnStart: null,
    cube: CENTERED_CUBE,
    cubeOfferedBy: null,
    openingAutoDoubles: 0,
    result: null,
    turnNumber: 0,
    history: [],
    lastError: '',
  }
}

const initialState: GameState = createInitialState()

/** Set lastError from an operation's outcome */
function recordOutcome(state: Draft<GameState>, result: Result<unknown, EngineError> | undefined): void {
  if (!result) return
  state.lastError = result.ok ? '' : result.error.message
}

/** Enter the moving phase for `actor` with the given pips */
function beginTurn(state: Draft<GameState>, actor: Player, dice: readonly DieValue[]): void {
  state.actor = actor
  state.dice = [...dice]
  state.steps = []
  state.phase = 'moving'
  state.turnStart = { board: toBoardCounts(state.position), actor, dice: [...dice] }
}

function applyOpening(state: Draft<GameState>, opening: OpeningResult): void {
  if (opening.autoDoublesApplied > 0) {
    state.openingAutoDoubles += opening.autoDoublesApplied
    state.cube = {
      value: state.cube.value * 2 ** opening.autoDoublesApplied,
      holder: 'none',
    }
  }
  if (opening.firstPlayer !== null) {
    state.turnNumber = 1
    beginTurn(state, opening.firstPlayer, opening.dice)
  }
}

function applyTurnDice(state: Draft<GameState>, rolled: TurnDiceResult): void {
  beginTurn(state, rolled.actor, rolled.dice)
}

export const gameSlice = createSlice({
  name: 'game',
  initialState,
  reducers: {
    /** Reset to initial state */
    resetGame() {
      return createInitialState()
    },
  },
  extraReducers: builder => {
    builder.addMatcher(performStartGame.match, (state, action) => {
      const result = action.meta.result
      if (result?.ok) {
        const fresh: GameState = {
          ...createInitialState(),
          rules: result.value.rules,
          phase: 'opening_roll',
        }
        return fresh
      }
      recordOutcome(state, result)
      return undefined
    })

    builder.addMatcher(performLoadPosition.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        const { board, actor } = result.value
        state.position = positionFromCounts(board)
        state.actor = actor
        state.phase = 'awaiting_roll'
        state.dice = []
        state.steps = []
        state.turnStart = null
        state.cube = CENTERED_CUBE
        state.cubeOfferedBy = null
        state.openingAutoDoubles = 0
        state.result = null
        state.turnNumber = 1
        state.history = []
      }
    })

    builder.addMatcher(performRollOpening.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        applyOpening(state, result.value)
      }
    })

    builder.addMatcher(performSetOpeningDice.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        applyOpening(state, result.value)
      }
    })

    builder.addMatcher(performRollDice.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        applyTurnDice(state, result.value)
      }
    })

    builder.addMatcher(performSetDice.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        applyTurnDice(state, result.value)
      }
    })

    builder.addMatcher(performApplyStep.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (!result?.ok || state.actor === 'none') return

      const { step, dieIndex } = result.value
      const position = state.position

      const checker = step.entered ? popFromBar(position, state.actor) : popFromPoint(position, step.from)
      if (checker === null) {
        throw new Error(`applyStep: no ${state.actor} checker at ${String(step.from)}`)
      }

      let hitChecker: CheckerId | null = null
      if (step.hit) {
        hitChecker = popFromPoint(position, step.to)
        if (hitChecker !== null) {
          transferToBar(position, hitChecker)
        }
      }

      if (step.borneOff) {
        transferToOff(position, checker)
      } else {
        transferToPoint(position, checker, step.to)
      }

      const record: StepRecord = { ...step, checker, hitChecker, dieIndex }
      state.steps.push(record)
      state.dice.splice(dieIndex, 1)
    })

    builder.addMatcher(performUndoStep.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (!result?.ok) return

      const { undone } = result.value
      const position = state.position
      state.steps.pop()

      // The mover leaves `to` before a hit checker can return to it
      if (undone.entered) {
        transferToBar(position, undone.checker)
      } else {
        transferToPoint(position, undone.checker, undone.from)
      }
      if (undone.hitChecker !== null) {
        transferToPoint(position, undone.hitChecker, undone.to)
      }

      state.dice.splice(undone.dieIndex, 0, undone.pip)
    })

    builder.addMatcher(performCommitTurn.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (!result?.ok) return

      const turn: Turn = {
        player: result.value.player,
        dice: state.turnStart ? [...state.turnStart.dice] : [],
        steps: state.steps.map(({ from, to, pip, entered, hit, borneOff }) => ({
          from,
          to,
          pip,
          entered,
          hit,
          borneOff,
        })),
      }
      state.history.push(turn)

      state.actor = result.value.nextToMove
      state.phase = 'awaiting_roll'
      state.dice = []
      state.steps = []
      state.turnStart = null
      state.turnNumber++
    })

    builder.addMatcher(performOfferCube.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        state.phase = 'cube_offered'
        state.cubeOfferedBy = result.value.offeredBy
      }
    })

    builder.addMatcher(performTakeCube.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        state.cube = { value: result.value.cubeValue, holder: result.value.holder }
        state.cubeOfferedBy = null
        state.phase = 'awaiting_roll'
      }
    })

    builder.addMatcher(performDropCube.match, (state, action) => {
      const result = action.meta.result
      recordOutcome(state, result)
      if (result?.ok) {
        state.result = {
          winner: result.value.winner,
          finalCube: result.value.finalCube,
          resigned: true,
        }
        state.cubeOfferedBy = null
        state.phase = 'game_over'
      }
    })
  },
})

export const { resetGame } = gameSlice.actions

// =============================================================================
// Selectors
// =============================================================================

export const selectGameState = (state: RootState): GameState => state.game
export const selectPhase = (state: RootState): GamePhase => state.game.phase
export const selectActor = (state: RootState): Side => state.game.actor
export const selectDice = (state: RootState): readonly DieValue[] => state.game.dice
export const selectSteps = (state: RootState): readonly StepRecord[] => state.game.steps
export const selectCube = (state: RootState): CubeState => state.game.cube
export const selectCubeOfferedBy = (state: RootState): Player | null =>
  state.game.cubeOfferedBy
export const selectResult = (state: RootState): GameResult | null => state.game.result
export const selectTurnNumber = (state: RootState): number => state.game.turnNumber
export const selectHistory = (state: RootState): readonly Turn[] => state.game.history
export const selectLastError = (state: RootState): string => state.game.lastError
export const selectOpeningAutoDoubles = (state: RootState): number =>
  state.game.openingAutoDoubles
export const selectIsGameOver = (state: RootState): boolean =>
  state.game.phase === 'game_over'
export const selectNeedsRoll = (state: RootState): boolean =>
  state.game.phase === 'awaiting_roll'

export const selectBoardCounts = createSelector(
  [(state: RootState) => state.game.position],
  (position): BoardCounts => toBoardCounts(position)
)

export const selectBoardSnapshot = createSelector(
  [(state: RootState) => state.game.position, (state: RootState) => state.game.cube.value],
  (position, cubeValue): BoardSnapshot => getBoardSnapshot(position, cubeValue)
)

export const selectLegalSteps = createSelector(
  [selectBoardCounts, selectActor, selectDice, selectPhase],
  (board, actor, dice, phase): readonly LegalSteps[] => {
    if (phase !== 'moving' || actor === 'none' || dice.length === 0) {
      return []
    }
    return getLegalSteps({ board, actor, dice })
  }
)

export default gameSlice.reducer
