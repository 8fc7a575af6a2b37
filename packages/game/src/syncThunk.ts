/**
 * Sync Thunks
 *
 * An operation is dispatched as a plain action that carries its payload
 * creator in `meta`. The middleware runs the creator against the current
 * state and stores the returned Result in `meta.result`; extra reducers then
 * apply the transition only when that result is ok.
 */

import type { PayloadAction } from '@reduxjs/toolkit'

// =============================================================================
// Types
// =============================================================================

/** What a payload creator may read: current state and the store's extra argument */
export interface SyncThunkAPI<TState, TExtra> {
  getState: () => TState
  extra: TExtra
}

export type PayloadCreator<TState, TExtra, TReturn, TArg> = (
  arg: TArg,
  thunkAPI: SyncThunkAPI<TState, TExtra>
) => TReturn

/** `result` is filled in by the middleware before reducers run */
export interface SyncThunkMeta<TState, TExtra, TReturn, TArg> {
  payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  result?: TReturn
}

/** Plain action whose payload is the operation's argument */
export type SyncThunkAction<TState, TExtra, TReturn, TArg = void> = PayloadAction<
  TArg,
  string,
  SyncThunkMeta<TState, TExtra, TReturn, TArg>
>

export function isSyncThunkAction(
  action: unknown
): action is SyncThunkAction<unknown, unknown, unknown, unknown> {
  if (typeof action !== 'object' || action === null) return false
  if (!('type' in action) || !('meta' in action)) return false
  const { meta } = action
  return (
    typeof meta === 'object' &&
    meta !== null &&
    'payloadCreator' in meta &&
    typeof meta.payloadCreator === 'function'
  )
}

/**
 * Action creator with the `.type` and `.match` that builder matchers expect.
 */
export interface SyncThunkActionCreator<TState, TExtra, TReturn, TArg = void> {
  (arg: TArg): SyncThunkAction<TState, TExtra, TReturn, TArg>
  type: string
  match: (action: unknown) => action is SyncThunkAction<TState, TExtra, TReturn, TArg>
}

export interface CreateSyncThunk<TState, TExtra> {
  <TReturn, TArg = void>(
    typePrefix: string,
    payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  ): SyncThunkActionCreator<TState, TExtra, TReturn, TArg>
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a factory for sync thunks over one state shape and extra argument.
 *
 * ```ts
 * const createSyncThunk = buildCreateSyncThunk<RootState, GameThunkExtra>()
 *
 * export const performUndoStep = createSyncThunk<Result<UndoStepResult, EngineError>>(
 *   'game/performUndoStep',
 *   (_arg, { getState }) => {
 *     const last = getState().game.steps.at(-1)
 *     return last ? ok({ undone: last }) : ruleViolation('nothing_to_undo', '...')
 *   }
 * )
 * ```
 */
export function buildCreateSyncThunk<TState, TExtra = undefined>(): CreateSyncThunk<TState, TExtra> {
  return function createSyncThunk<TReturn, TArg = void>(
    type: string,
    payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  ): SyncThunkActionCreator<TState, TExtra, TReturn, TArg> {
    const create = (arg: TArg): SyncThunkAction<TState, TExtra, TReturn, TArg> => ({
      type,
      payload: arg,
      meta: { payloadCreator },
    })

    // Same type and same creator; a stray action reusing the type string does not match
    const match = (action: unknown): action is SyncThunkAction<TState, TExtra, TReturn, TArg> =>
      isSyncThunkAction(action) && action.type === type && action.meta.payloadCreator === payloadCreator

    return Object.assign(create, { type, match })
  }
}

/**
 * Result stored by the middleware. Throws if the action never passed
 * through it.
 */
export function resultOf<TState, TExtra, TReturn, TArg>(
  action: SyncThunkAction<TState, TExtra, TReturn, TArg>
): TReturn {
  const { result } = action.meta
  if (result === undefined) {
    throw new Error(`${action.type}: sync thunk middleware did not run`)
  }
  return result
}
