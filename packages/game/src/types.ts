/**
 * Backgammon Engine Type Definitions
 *
 * Design principles:
 * - Serializable: All state is JSON-compatible so it can live in a Redux store
 * - Checkers have identity: a flat array of 30 checkers, points hold ids into it
 * - Copies are cheap: search and snapshots use plain signed-count boards
 */

// =============================================================================
// Primitives
// =============================================================================

/** Player colors */
export type Player = 'white' | 'black'

/** Owner of a point, cube or turn; 'none' when empty / centered / undecided */
export type Side = Player | 'none'

/**
 * Get the opponent of a player.
 */
export function getOpponent(player: Player): Player {
  return player === 'white' ? 'black' : 'white'
}

/** Valid die values (1-6) */
export type DieValue = 1 | 2 | 3 | 4 | 5 | 6

/**
 * Type guard to check if a number is a valid die value (1-6).
 */
export function isValidDieValue(n: number): n is DieValue {
  return Number.isInteger(n) && n >= 1 && n <= 6
}

/**
 * Type guard to check if a number is a board point (1-24).
 */
export function isBoardPoint(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 24
}

// =============================================================================
// Locations
// =============================================================================

/** Location of a checker on the bar; also the `from` value for bar entry */
export const BAR = 0

/** Canonical location of a borne-off checker (anything above 24 is off) */
export const OFF = 25

/** Total checkers per player */
export const CHECKERS_PER_SIDE = 15

/** Index into the position's checker array (0-14 white, 15-29 black) */
export type CheckerId = number

/**
 * A single checker.
 * location: 0 = bar, 1-24 = board point, 25 = borne off
 */
export interface Checker {
  readonly side: Player
  location: number
}

/**
 * Checker counts for bar and borne-off areas
 */
export interface CheckerCounts {
  white: number
  black: number
}

// =============================================================================
// Position
// =============================================================================

/**
 * The authoritative position.
 *
 * Mutable on purpose: it is only ever changed inside slice reducers (on Immer
 * drafts) through the transfer primitives in position.ts.
 */
export interface Position {
  /** 30 checkers; ids are indices */
  checkers: Checker[]

  /** Index 0 = point 1. Each entry lists the ids stacked on that point. */
  points: CheckerId[][]

  /** Checkers on the bar (hit but not re-entered) */
  bar: CheckerCounts

  /** Checkers that have been borne off */
  borneOff: CheckerCounts
}

/**
 * Plain value copy of a position, used by the legality checker and the
 * max-play search.
 *
 * Points array:
 * - Index 0 = Point 1, Index 23 = Point 24
 * - Positive values = white checkers
 * - Negative values = black checkers
 * - Zero = empty point
 */
export interface BoardCounts {
  readonly points: readonly number[]
  readonly bar: Readonly<CheckerCounts>
  readonly borneOff: Readonly<CheckerCounts>
}

/** One point in a board snapshot */
export interface PointSnapshot {
  readonly side: Side
  readonly count: number
}

/**
 * Read-only board snapshot handed to renderers and transports.
 * This is the only view of the position that leaves the engine.
 */
export interface BoardSnapshot {
  /** 24 entries, index 0 = point 1 */
  readonly points: readonly PointSnapshot[]
  readonly bar: Readonly<CheckerCounts>
  readonly borneOff: Readonly<CheckerCounts>
  readonly cube: number
}

// =============================================================================
// Steps
// =============================================================================

/**
 * A single-die checker movement the legality checker has accepted.
 * `to` is 1-24 on the board or 25 when bearing off.
 */
export interface StepPlan {
  readonly from: number
  readonly to: number
  readonly pip: DieValue
  readonly entered: boolean
  readonly hit: boolean
  readonly borneOff: boolean
}

/**
 * An applied step, kept on the turn's undo stack.
 */
export interface StepRecord extends StepPlan {
  /** The checker that moved */
  readonly checker: CheckerId
  /** The opposing checker sent to the bar, if any */
  readonly hitChecker: CheckerId | null
  /** Slot the pip occupied in the remaining dice */
  readonly dieIndex: number
}

/**
 * Legal destinations from one origin, for UI and tool listings
 */
export interface LegalStepOption {
  readonly to: number
  readonly pip: DieValue
  readonly wouldHit: boolean
}

export interface LegalSteps {
  /** Origin point, or 0 for the bar */
  readonly from: number
  readonly options: readonly LegalStepOption[]
}

// =============================================================================
// Rules / Cube
// =============================================================================

/** What happens when the opening throw is a double */
export type OpeningDoublePolicy = 'reroll' | 'auto_double'

/**
 * Game rule options that affect the opening.
 */
export interface Rules {
  readonly openingDoublePolicy: OpeningDoublePolicy
  /** Cap on opening auto-doubles; 0 = unlimited */
  readonly maxOpeningAutoDoubles: number
}

export const DEFAULT_RULES: Rules = {
  openingDoublePolicy: 'reroll',
  maxOpeningAutoDoubles: 0,
}

/** Doubling cube; holder is 'none' while centered */
export interface CubeState {
  readonly value: number
  readonly holder: Side
}

// =============================================================================
// Game State
// =============================================================================

/**
 * Game phases representing the state machine
 *
 * Flow:
 * not_started -> opening_roll -> moving -> awaiting_roll <-> moving
 * awaiting_roll <-> cube_offered -> game_over (cube dropped)
 */
export type GamePhase =
  | 'not_started'
  | 'opening_roll'
  | 'awaiting_roll'
  | 'moving'
  | 'cube_offered'
  | 'game_over'

/**
 * Result of a finished game. Games only finish by a dropped cube.
 */
export interface GameResult {
  readonly winner: Player
  readonly finalCube: number
  readonly resigned: boolean
}

/**
 * Frozen copy of the turn's starting point, read by the max-play search at
 * commit time.
 */
export interface TurnSnapshot {
  readonly board: BoardCounts
  readonly actor: Player
  readonly dice: readonly DieValue[]
}

/**
 * A committed turn (one player's full sequence of steps)
 */
export interface Turn {
  readonly player: Player
  readonly dice: readonly DieValue[]
  readonly steps: readonly StepPlan[]
}

/**
 * Complete game state, stored in Redux.
 */
export interface GameState {
  /** Authoritative checker placement */
  readonly position: Position

  /** Opening rules chosen at startGame */
  readonly rules: Rules

  /** Current game phase */
  readonly phase: GamePhase

  /** Whose turn it is ('none' until the opening roll resolves) */
  readonly actor: Side

  /** Pip values still available this turn */
  readonly dice: readonly DieValue[]

  /** Steps applied this turn, most recent last */
  readonly steps: readonly StepRecord[]

  /** Turn-start copy for commit validation (null outside a turn) */
  readonly turnStart: TurnSnapshot | null

  readonly cube: CubeState

  /** Offerer while a cube offer is pending */
  readonly cubeOfferedBy: Player | null

  /** Opening auto-doubles applied so far */
  readonly openingAutoDoubles: number

  /** Final result (null until game_over) */
  readonly result: GameResult | null

  /** Number of the turn being played; 0 before the opening resolves */
  readonly turnNumber: number

  /** All committed turns */
  readonly history: readonly Turn[]

  /** Message of the most recent failed operation ('' after a success) */
  readonly lastError: string
}
