/**
 * Sync Thunk Middleware
 *
 * Runs the payload creator of every sync thunk action against the state
 * before the action reaches the reducers, and leaves the returned value in
 * `meta.result`. Other actions pass through untouched.
 */

import type { Middleware } from '@reduxjs/toolkit'
import { isSyncThunkAction } from './syncThunk'
import type { DiceSource } from './dice'

/**
 * Extra argument handed to game payload creators.
 */
export interface GameThunkExtra {
  /** Source for internally rolled dice */
  readonly rollDie: DiceSource
}

export function createSyncThunkMiddleware<TExtra>(extra: TExtra): Middleware {
  return ({ getState }) =>
    next =>
    (action: unknown) => {
      if (isSyncThunkAction(action) && action.meta.result === undefined) {
        action.meta.result = action.meta.payloadCreator(action.payload, { getState, extra })
      }
      return next(action)
    }
}
