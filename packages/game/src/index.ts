// =============================================================================
// Types
// =============================================================================

export * from './types'

// =============================================================================
// Result Type
// =============================================================================

export {
  type Result,
  type EngineError,
  type ProtocolError,
  type ProtocolErrorType,
  type RuleViolation,
  type RuleViolationType,
  ok,
  err,
  isOk,
  isErr,
  mapError,
  unwrap,
  unwrapOr,
  protocolError,
  ruleViolation,
} from './result'

// =============================================================================
// Dice Utilities
// =============================================================================

export { type DiceSource, rollDie, createScriptedDice, expandDice } from './dice'

// =============================================================================
// Sync Thunk Infrastructure
// =============================================================================

export {
  buildCreateSyncThunk,
  isSyncThunkAction,
  resultOf,
  type SyncThunkAPI,
  type PayloadCreator,
  type SyncThunkMeta,
  type SyncThunkAction,
  type SyncThunkActionCreator,
  type CreateSyncThunk,
} from './syncThunk'

export {
  createSyncThunkMiddleware,
  type GameThunkExtra,
} from './syncThunkMiddleware'

// =============================================================================
// Position Model
// =============================================================================

export {
  createClearedPosition,
  createStartingPosition,
  describeBoardProblem,
  positionFromCounts,
  pointCount,
  pointSide,
  sidePointCount,
  barCount,
  offCount,
  checkerTotal,
  transferToPoint,
  transferToBar,
  transferToOff,
  popFromPoint,
  popFromBar,
  isOnPoint,
  toBoardCounts,
  getBoardSnapshot,
} from './position'

// =============================================================================
// Step Legality & Max-Play Search
// =============================================================================

export {
  type StepRejection,
  type StepRejectionType,
  getMoveDirection,
  destinationOf,
  isHomePoint,
  allInHome,
  planStep,
  applyPlanToBoard,
  getOrigins,
  getLegalSteps,
} from './rules'

export { maxPlayableDice, hasLegalPlay } from './oracle'

// =============================================================================
// Game Slice
// =============================================================================

export {
  gameSlice,
  default as gameReducer,
  resetGame,
  selectGameState,
  selectPhase,
  selectActor,
  selectDice,
  selectSteps,
  selectCube,
  selectCubeOfferedBy,
  selectResult,
  selectTurnNumber,
  selectHistory,
  selectLastError,
  selectOpeningAutoDoubles,
  selectIsGameOver,
  selectNeedsRoll,
  selectBoardCounts,
  selectBoardSnapshot,
  selectLegalSteps,
  type RootState,
} from './gameSlice'

// =============================================================================
// Operations (sync thunks)
// =============================================================================

export {
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
  // Result types
  type StartGameResult,
  type OpeningResult,
  type TurnDiceResult,
  type ApplyStepResult,
  type UndoStepResult,
  type CommitTurnResult,
  type OfferCubeResult,
  type TakeCubeResult,
  type DropCubeResult,
  type LoadPositionResult,
  // Input types
  type OpeningDiceInput,
  type SetDiceInput,
  type ApplyStepInput,
  type LoadPositionInput,
  // Action types
  type StartGameAction,
  type LoadPositionAction,
  type RollOpeningAction,
  type SetOpeningDiceAction,
  type RollDiceAction,
  type SetDiceAction,
  type ApplyStepAction,
  type UndoStepAction,
  type CommitTurnAction,
  type OfferCubeAction,
  type TakeCubeAction,
  type DropCubeAction,
} from './operations'

// =============================================================================
// Engine
// =============================================================================

export { createEngine, createGameStore, type Engine, type EngineOptions, type GameStore } from './engine'
