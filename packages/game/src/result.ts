/**
 * Result Type - Functional error handling
 *
 * Every engine operation returns a Result. Failures are split into two kinds:
 * - protocol: the caller used the state machine out of contract
 * - rule: an expected, recoverable rule violation with a readable reason
 */

/**
 * Result type for operations that can fail.
 * Discriminated union that's either { ok: true, value: T } or { ok: false, error: E }
 */
export type Result<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

/**
 * Create a successful result containing a value.
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

/**
 * Create a failed result containing an error.
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * Type guard to check if a result is successful.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

/**
 * Type guard to check if a result is an error.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/**
 * Map over a failed result's error.
 * If the result is successful, returns the value unchanged.
 */
export function mapError<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> {
  if (!result.ok) {
    return err(fn(result.error))
  }
  return result
}

/**
 * Unwrap a result, throwing an error if it's a failure.
 * Use sparingly - prefer pattern matching on the result.
 */
export function unwrap<T, E extends { readonly message: string }>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value
  }
  throw new Error(`Attempted to unwrap an error result: ${result.error.message}`)
}

/**
 * Get the value from a result or return a default value if it's an error.
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  if (result.ok) {
    return result.value
  }
  return defaultValue
}

// =============================================================================
// Engine Errors
// =============================================================================

export type ProtocolErrorType =
  | 'no_game'
  | 'wrong_phase'
  | 'invalid_dice'
  | 'invalid_rules'
  | 'invalid_position'
  | 'game_over'

/** Caller misuse of the state machine contract */
export interface ProtocolError {
  readonly kind: 'protocol'
  readonly type: ProtocolErrorType
  readonly message: string
}

export type RuleViolationType =
  | 'illegal_step'
  | 'pip_not_available'
  | 'no_dice'
  | 'legal_move_exists'
  | 'must_use_maximum'
  | 'must_play_higher'
  | 'nothing_to_undo'
  | 'cannot_offer'
  | 'no_offer_pending'

/** Expected rule violation; nothing was changed */
export interface RuleViolation {
  readonly kind: 'rule'
  readonly type: RuleViolationType
  readonly message: string
}

export type EngineError = ProtocolError | RuleViolation

export function protocolError(type: ProtocolErrorType, message: string): Result<never, ProtocolError> {
  return err({ kind: 'protocol', type, message })
}

export function ruleViolation(type: RuleViolationType, message: string): Result<never, RuleViolation> {
  return err({ kind: 'rule', type, message })
}
