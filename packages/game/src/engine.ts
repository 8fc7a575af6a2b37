/**
 * Engine
 *
 * In-process facade over one game: a Redux store wired with the game reducer
 * and the sync thunk middleware. Commands return the operation's Result;
 * queries read the store.
 */

import { configureStore } from '@reduxjs/toolkit'
import type {
  BoardCounts,
  BoardSnapshot,
  DieValue,
  GamePhase,
  GameResult,
  LegalSteps,
  Player,
  PointSnapshot,
  Rules,
  Side,
  StepRecord,
  Turn,
} from './types'
import { resultOf, type SyncThunkActionCreator } from './syncThunk'
import { createSyncThunkMiddleware, type GameThunkExtra } from './syncThunkMiddleware'
import { type DiceSource, rollDie } from './dice'
import { barCount, offCount, pointCount, pointSide } from './position'
import { hasLegalPlay } from './oracle'
import gameReducer, {
  selectActor,
  selectBoardCounts,
  selectBoardSnapshot,
  selectCube,
  selectCubeOfferedBy,
  selectDice,
  selectHistory,
  selectIsGameOver,
  selectLastError,
  selectLegalSteps,
  selectNeedsRoll,
  selectOpeningAutoDoubles,
  selectPhase,
  selectResult,
  selectSteps,
  selectTurnNumber,
} from './gameSlice'
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
} from './operations'

export interface EngineOptions {
  /** Dice source for rollOpening and rollDice (defaults to Math.random) */
  readonly rollDie?: DiceSource
}

/**
 * Create a store holding one game.
 */
export function createGameStore(extra: GameThunkExtra) {
  return configureStore({
    reducer: { game: gameReducer },
    middleware: getDefaultMiddleware =>
      getDefaultMiddleware({
        // Sync thunk actions carry their payload creator in meta
        serializableCheck: {
          ignoredActionPaths: ['meta.payloadCreator'],
        },
      }).concat(createSyncThunkMiddleware(extra)),
  })
}

export type GameStore = ReturnType<typeof createGameStore>

/**
 * Create an engine for one game. The game starts in `not_started`.
 */
export function createEngine(options: EngineOptions = {}) {
  const store = createGameStore({ rollDie: options.rollDie ?? rollDie })
  const game = () => store.getState().game

  function run<TReturn, TArg>(
    creator: SyncThunkActionCreator<RootState, GameThunkExtra, TReturn, TArg>,
    arg: TArg
  ): TReturn {
    const action = creator(arg)
    store.dispatch(action)
    return resultOf(action)
  }

  return {
    store,

    // -------------------------------------------------------------------------
    // Commands
    // -------------------------------------------------------------------------

    startGame: (rules?: Partial<Rules>) => run(performStartGame, rules),
    loadPosition: (board: BoardCounts, actor: Player) =>
      run(performLoadPosition, { board, actor }),
    rollOpening: () => run(performRollOpening, undefined),
    setOpeningDice: (white: number, black: number) =>
      run(performSetOpeningDice, { white, black }),
    rollDice: () => run(performRollDice, undefined),
    setDice: (die1: number, die2: number) => run(performSetDice, { die1, die2 }),
    applyStep: (from: number, pip: number) => run(performApplyStep, { from, pip }),
    undoStep: () => run(performUndoStep, undefined),
    commitTurn: () => run(performCommitTurn, undefined),
    offerCube: () => run(performOfferCube, undefined),
    takeCube: () => run(performTakeCube, undefined),
    dropCube: () => run(performDropCube, undefined),

    // -------------------------------------------------------------------------
    // Queries
    // -------------------------------------------------------------------------

    /** Whether the side to move can play at least one of the remaining dice */
    hasAnyLegalStep: (): boolean => {
      const { phase, actor, dice } = game()
      if (phase !== 'moving' || actor === 'none') return false
      return hasLegalPlay({ board: selectBoardCounts(store.getState()), actor, dice })
    },
    lastError: (): string => selectLastError(store.getState()),
    phase: (): GamePhase => selectPhase(store.getState()),
    sideToMove: (): Side => selectActor(store.getState()),
    needsRoll: (): boolean => selectNeedsRoll(store.getState()),
    isGameOver: (): boolean => selectIsGameOver(store.getState()),
    diceRemaining: (): readonly DieValue[] => selectDice(store.getState()),
    cubeValue: (): number => selectCube(store.getState()).value,
    cubeHolder: (): Side => selectCube(store.getState()).holder,
    /** Side whose double is awaiting an answer, or null */
    cubeOfferedBy: (): Player | null => selectCubeOfferedBy(store.getState()),
    openingAutoDoubles: (): number => selectOpeningAutoDoubles(store.getState()),
    result: (): GameResult | null => selectResult(store.getState()),
    rules: (): Rules => game().rules,
    getState: (): BoardSnapshot => selectBoardSnapshot(store.getState()),
    countAt: (point: number): PointSnapshot => ({
      side: pointSide(game().position, point),
      count: pointCount(game().position, point),
    }),
    countBar: (side: Player): number => barCount(game().position, side),
    countOff: (side: Player): number => offCount(game().position, side),
    legalSteps: (): readonly LegalSteps[] => selectLegalSteps(store.getState()),
    stepsThisTurn: (): readonly StepRecord[] => selectSteps(store.getState()),
    turnNumber: (): number => selectTurnNumber(store.getState()),
    history: (): readonly Turn[] => selectHistory(store.getState()),
  }
}

export type Engine = ReturnType<typeof createEngine>
