/**
 * Game Operations
 *
 * The turn state machine and cube protocol, implemented as sync thunks.
 * Each operation validates against the current state and returns a typed
 * Result; the game slice applies the transition only for ok results.
 */

import type {
  BoardCounts,
  DieValue,
  GamePhase,
  GameState,
  Player,
  Rules,
  StepPlan,
  StepRecord,
} from './types'
import { DEFAULT_RULES, getOpponent, isValidDieValue } from './types'
import { buildCreateSyncThunk, type SyncThunkAction } from './syncThunk'
import type { GameThunkExtra } from './syncThunkMiddleware'
import {
  type EngineError,
  type ProtocolError,
  type Result,
  mapError,
  ok,
  protocolError,
  ruleViolation,
} from './result'
import { planStep } from './rules'
import { hasLegalPlay, maxPlayableDice } from './oracle'
import { expandDice } from './dice'
import { describeBoardProblem, toBoardCounts } from './position'

/** State shape for operations - matches the expected store shape */
export type RootState = { game: GameState }

// =============================================================================
// Result Types
// =============================================================================

export interface StartGameResult {
  readonly rules: Rules
}

export interface OpeningResult {
  readonly whiteDie: DieValue
  readonly blackDie: DieValue
  /** Higher roller, or null when the throw was a double */
  readonly firstPlayer: Player | null
  /** Dice for the first turn, higher first (empty when unresolved) */
  readonly dice: readonly DieValue[]
  /** Opening auto-doubles applied by this call */
  readonly autoDoublesApplied: number
}

export interface TurnDiceResult {
  readonly die1: DieValue
  readonly die2: DieValue
  readonly actor: Player
  readonly dice: readonly DieValue[]
  /** Whether any step can be played with this roll */
  readonly canMove: boolean
}

export interface ApplyStepResult {
  readonly step: StepPlan
  readonly dieIndex: number
  readonly remaining: readonly DieValue[]
}

export interface UndoStepResult {
  readonly undone: StepRecord
}

export interface CommitTurnResult {
  readonly player: Player
  readonly nextToMove: Player
  readonly stepsUsed: number
  readonly maxPlayable: number
}

export interface OfferCubeResult {
  readonly offeredBy: Player
  readonly proposedValue: number
}

export interface TakeCubeResult {
  readonly cubeValue: number
  readonly holder: Player
}

export interface DropCubeResult {
  readonly winner: Player
  readonly finalCube: number
}

export interface LoadPositionResult {
  readonly board: BoardCounts
  readonly actor: Player
}

// =============================================================================
// Input Types
// =============================================================================

export interface OpeningDiceInput {
  readonly white: number
  readonly black: number
}

export interface SetDiceInput {
  readonly die1: number
  readonly die2: number
}

export interface ApplyStepInput {
  readonly from: number
  readonly pip: number
}

export interface LoadPositionInput {
  readonly board: BoardCounts
  readonly actor: Player
}

// =============================================================================
// Helpers
// =============================================================================

const createSyncThunk = buildCreateSyncThunk<RootState, GameThunkExtra>()

/**
 * Protocol check shared by all phase-bound operations.
 */
function guardPhase(
  state: GameState,
  expected: GamePhase,
  operation: string
): Result<never, ProtocolError> | null {
  if (state.phase === 'not_started') {
    return protocolError('no_game', `${operation}: no game started`)
  }
  if (state.phase === 'game_over') {
    return protocolError('game_over', `${operation}: game over`)
  }
  if (state.phase !== expected) {
    return protocolError('wrong_phase', `${operation}: not in ${expected} phase`)
  }
  return null
}

/** Player whose turn it is, or null before the opening resolves */
function currentPlayer(state: GameState): Player | null {
  return state.actor === 'none' ? null : state.actor
}

/**
 * Resolve one opening throw: the higher die moves first with both dice.
 * On a double, auto_double doubles the cube while under the cap.
 */
function resolveOpeningThrow(
  rules: Rules,
  autoDoublesSoFar: number,
  white: DieValue,
  black: DieValue
): { firstPlayer: Player | null; autoDoubled: boolean } {
  if (white !== black) {
    return { firstPlayer: white > black ? 'white' : 'black', autoDoubled: false }
  }
  const underCap =
    rules.maxOpeningAutoDoubles === 0 || autoDoublesSoFar < rules.maxOpeningAutoDoubles
  return {
    firstPlayer: null,
    autoDoubled: rules.openingDoublePolicy === 'auto_double' && underCap,
  }
}

function openingDice(white: DieValue, black: DieValue): DieValue[] {
  if (white === black) return []
  return white > black ? [white, black] : [black, white]
}

function turnDice(state: GameState, die1: DieValue, die2: DieValue): Result<TurnDiceResult, EngineError> {
  const actor = currentPlayer(state)
  if (actor === null) {
    return protocolError('wrong_phase', 'rollDice: no side to move')
  }
  const dice = expandDice(die1, die2)
  const canMove = hasLegalPlay({ board: toBoardCounts(state.position), actor, dice })
  return ok({ die1, die2, actor, dice, canMove })
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Reset to the starting position with a centered cube and enter the
 * opening roll.
 */
export const performStartGame = createSyncThunk<
  Result<StartGameResult, EngineError>,
  Partial<Rules> | void
>('game/performStartGame', options => {
  const rules: Rules = { ...DEFAULT_RULES, ...(options || {}) }

  if (rules.openingDoublePolicy !== 'reroll' && rules.openingDoublePolicy !== 'auto_double') {
    return protocolError('invalid_rules', `startGame: unknown opening double policy ${String(rules.openingDoublePolicy)}`)
  }
  if (!Number.isInteger(rules.maxOpeningAutoDoubles) || rules.maxOpeningAutoDoubles < 0) {
    return protocolError(
      'invalid_rules',
      `startGame: maxOpeningAutoDoubles must be a non-negative integer, got ${String(rules.maxOpeningAutoDoubles)}`
    )
  }

  return ok({ rules })
})

/**
 * Place checkers from a signed-count board and hand the roll to `actor`.
 * Used for replays and tests; the cube is centered and turn state cleared.
 */
export const performLoadPosition = createSyncThunk<
  Result<LoadPositionResult, EngineError>,
  LoadPositionInput
>('game/performLoadPosition', ({ board, actor }) => {
  const problem = describeBoardProblem(board)
  if (problem !== null) {
    return protocolError('invalid_position', `loadPosition: ${problem}`)
  }
  return ok({ board, actor })
})

// =============================================================================
// Opening
// =============================================================================

/**
 * Roll one die per side until the throw resolves.
 * Reports the resolving throw and how many auto-doubles were applied.
 */
export const performRollOpening = createSyncThunk<Result<OpeningResult, EngineError>>(
  'game/performRollOpening',
  (_arg, { getState, extra }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'opening_roll', 'rollOpening')
    if (phaseError) return phaseError

    let applied = 0
    let white = extra.rollDie()
    let black = extra.rollDie()

    while (white === black) {
      const outcome = resolveOpeningThrow(state.rules, state.openingAutoDoubles + applied, white, black)
      if (outcome.autoDoubled) applied++
      white = extra.rollDie()
      black = extra.rollDie()
    }

    const { firstPlayer } = resolveOpeningThrow(state.rules, state.openingAutoDoubles + applied, white, black)

    return ok({
      whiteDie: white,
      blackDie: black,
      firstPlayer,
      dice: openingDice(white, black),
      autoDoublesApplied: applied,
    })
  }
)

/**
 * Supply one opening throw. A double leaves the phase unchanged (after the
 * configured auto-double, if any) and the caller throws again.
 */
export const performSetOpeningDice = createSyncThunk<
  Result<OpeningResult, EngineError>,
  OpeningDiceInput
>('game/performSetOpeningDice', ({ white, black }, { getState }) => {
  const state = getState().game
  const phaseError = guardPhase(state, 'opening_roll', 'setOpeningDice')
  if (phaseError) return phaseError

  if (!isValidDieValue(white) || !isValidDieValue(black)) {
    return protocolError('invalid_dice', `setOpeningDice: dice out of range (${String(white)}, ${String(black)})`)
  }

  const outcome = resolveOpeningThrow(state.rules, state.openingAutoDoubles, white, black)

  return ok({
    whiteDie: white,
    blackDie: black,
    firstPlayer: outcome.firstPlayer,
    dice: openingDice(white, black),
    autoDoublesApplied: outcome.autoDoubled ? 1 : 0,
  })
})

// =============================================================================
// Turn & Dice
// =============================================================================

/**
 * Roll two dice for the side to move.
 */
export const performRollDice = createSyncThunk<Result<TurnDiceResult, EngineError>>(
  'game/performRollDice',
  (_arg, { getState, extra }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'awaiting_roll', 'rollDice')
    if (phaseError) return phaseError

    return turnDice(state, extra.rollDie(), extra.rollDie())
  }
)

/**
 * Supply two dice for the side to move.
 */
export const performSetDice = createSyncThunk<Result<TurnDiceResult, EngineError>, SetDiceInput>(
  'game/performSetDice',
  ({ die1, die2 }, { getState }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'awaiting_roll', 'setDice')
    if (phaseError) return phaseError

    if (!isValidDieValue(die1) || !isValidDieValue(die2)) {
      return protocolError('invalid_dice', `setDice: dice out of range (${String(die1)}, ${String(die2)})`)
    }

    return turnDice(state, die1, die2)
  }
)

/**
 * Move one checker with one die.
 * Global obligations (maximum dice, higher die) are checked at commit.
 */
export const performApplyStep = createSyncThunk<Result<ApplyStepResult, EngineError>, ApplyStepInput>(
  'game/performApplyStep',
  ({ from, pip }, { getState }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'moving', 'applyStep')
    if (phaseError) return phaseError

    const actor = currentPlayer(state)
    if (actor === null) {
      return protocolError('wrong_phase', 'applyStep: no side to move')
    }

    if (state.dice.length === 0) {
      return ruleViolation('no_dice', 'applyStep: no dice remaining')
    }

    const dieIndex = state.dice.findIndex(d => d === pip)
    if (!isValidDieValue(pip) || dieIndex === -1) {
      return ruleViolation('pip_not_available', `applyStep: pip ${String(pip)} not available`)
    }

    const planned = mapError(
      planStep({ board: toBoardCounts(state.position), actor, from, pip }),
      (rejection): EngineError => ({
        kind: 'rule',
        type: 'illegal_step',
        message: `applyStep: ${rejection.message}`,
      })
    )
    if (!planned.ok) return planned

    return ok({
      step: planned.value,
      dieIndex,
      remaining: state.dice.filter((_, i) => i !== dieIndex),
    })
  }
)

/**
 * Take back the most recent step of this turn.
 */
export const performUndoStep = createSyncThunk<Result<UndoStepResult, EngineError>>(
  'game/performUndoStep',
  (_arg, { getState }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'moving', 'undoStep')
    if (phaseError) return phaseError

    const undone = state.steps.at(-1)
    if (undone === undefined) {
      return ruleViolation('nothing_to_undo', 'undoStep: nothing to undo')
    }

    return ok({ undone })
  }
)

/**
 * Finish the turn. The steps played must use as many dice as any legal
 * sequence from the turn-start position could.
 *
 * When only one die can be used and the dice differ, the higher die is
 * required only if it is playable on its own from the turn start. This is
 * narrower than requiring the higher die whenever a single die is playable:
 * a turn where only the lower die moves can always be committed.
 */
export const performCommitTurn = createSyncThunk<Result<CommitTurnResult, EngineError>>(
  'game/performCommitTurn',
  (_arg, { getState }) => {
    const state = getState().game
    const phaseError = guardPhase(state, 'moving', 'commitTurn')
    if (phaseError) return phaseError

    const snapshot = state.turnStart
    if (snapshot === null) {
      return protocolError('wrong_phase', 'commitTurn: no turn in progress')
    }

    const maxPlayable = maxPlayableDice(snapshot)
    const stepsUsed = state.steps.length

    if (stepsUsed === 0 && maxPlayable > 0) {
      return ruleViolation('legal_move_exists', 'commitTurn: at least one legal move exists, it must be played')
    }

    if (stepsUsed < maxPlayable) {
      return ruleViolation(
        'must_use_maximum',
        `commitTurn: must use maximum number of dice (${String(maxPlayable)}, played ${String(stepsUsed)})`
      )
    }

    const [first, second] = snapshot.dice
    if (maxPlayable === 1 && snapshot.dice.length === 2 && first !== second) {
      const higher = first > second ? first : second
      const higherPlayable = hasLegalPlay({ board: snapshot.board, actor: snapshot.actor, dice: [higher] })
      if (higherPlayable && state.steps[0].pip !== higher) {
        return ruleViolation(
          'must_play_higher',
          `commitTurn: only one die playable; must use the higher die (${String(higher)})`
        )
      }
    }

    return ok({
      player: snapshot.actor,
      nextToMove: getOpponent(snapshot.actor),
      stepsUsed,
      maxPlayable,
    })
  }
)

// =============================================================================
// Doubling Cube
// =============================================================================

/**
 * Offer the cube before rolling. Only the side to move may offer, and only
 * while the cube is centered or held by that side.
 */
export const performOfferCube = createSyncThunk<Result<OfferCubeResult, EngineError>>(
  'game/performOfferCube',
  (_arg, { getState }) => {
    const state = getState().game

    if (state.phase === 'not_started') {
      return protocolError('no_game', 'offerCube: no game started')
    }
    if (state.phase === 'game_over') {
      return protocolError('game_over', 'offerCube: game over')
    }
    if (state.phase === 'cube_offered') {
      return ruleViolation('cannot_offer', 'offerCube: offer already pending')
    }

    const actor = currentPlayer(state)
    if (state.phase !== 'awaiting_roll' || actor === null) {
      return ruleViolation('cannot_offer', 'offerCube: only before rolling')
    }
    if (state.cube.holder !== 'none' && state.cube.holder !== actor) {
      return ruleViolation('cannot_offer', 'offerCube: you do not own the cube')
    }

    return ok({ offeredBy: actor, proposedValue: state.cube.value * 2 })
  }
)

function pendingOffer(
  state: GameState,
  operation: string
): Result<Player, EngineError> {
  if (state.phase === 'not_started') {
    return protocolError('no_game', `${operation}: no game started`)
  }
  if (state.phase === 'game_over') {
    return protocolError('game_over', `${operation}: game over`)
  }
  if (state.phase !== 'cube_offered' || state.cubeOfferedBy === null) {
    return ruleViolation('no_offer_pending', `${operation}: no offer pending`)
  }
  return ok(state.cubeOfferedBy)
}

/**
 * Accept a pending offer: the cube doubles and passes to the taker.
 * The offerer is still to roll.
 */
export const performTakeCube = createSyncThunk<Result<TakeCubeResult, EngineError>>(
  'game/performTakeCube',
  (_arg, { getState }) => {
    const state = getState().game
    const offer = pendingOffer(state, 'takeCube')
    if (!offer.ok) return offer

    return ok({ cubeValue: state.cube.value * 2, holder: getOpponent(offer.value) })
  }
)

/**
 * Decline a pending offer: the offerer wins at the cube value in play when
 * the offer was made.
 */
export const performDropCube = createSyncThunk<Result<DropCubeResult, EngineError>>(
  'game/performDropCube',
  (_arg, { getState }) => {
    const state = getState().game
    const offer = pendingOffer(state, 'dropCube')
    if (!offer.ok) return offer

    return ok({ winner: offer.value, finalCube: state.cube.value })
  }
)

// =============================================================================
// Action Type Helpers (for extraReducers)
// =============================================================================

type GameThunkAction<TReturn, TArg = void> = SyncThunkAction<RootState, GameThunkExtra, TReturn, TArg>

export type StartGameAction = GameThunkAction<Result<StartGameResult, EngineError>, Partial<Rules> | void>
export type LoadPositionAction = GameThunkAction<Result<LoadPositionResult, EngineError>, LoadPositionInput>
export type RollOpeningAction = GameThunkAction<Result<OpeningResult, EngineError>>
export type SetOpeningDiceAction = GameThunkAction<Result<OpeningResult, EngineError>, OpeningDiceInput>
export type RollDiceAction = GameThunkAction<Result<TurnDiceResult, EngineError>>
export type SetDiceAction = GameThunkAction<Result<TurnDiceResult, EngineError>, SetDiceInput>
export type ApplyStepAction = GameThunkAction<Result<ApplyStepResult, EngineError>, ApplyStepInput>
export type UndoStepAction = GameThunkAction<Result<UndoStepResult, EngineError>>
export type CommitTurnAction = GameThunkAction<Result<CommitTurnResult, EngineError>>
export type OfferCubeAction = GameThunkAction<Result<OfferCubeResult, EngineError>>
export type TakeCubeAction = GameThunkAction<Result<TakeCubeResult, EngineError>>
export type DropCubeAction = GameThunkAction<Result<DropCubeResult, EngineError>>
