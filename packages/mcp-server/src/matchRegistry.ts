/**
 * Match Registry
 *
 * Keeps one engine per match id for the lifetime of the process. A match is
 * created on first use and its version bumps after every successful command,
 * so clients can tell whether their view is stale.
 */

import { createEngine, type Engine, type EngineOptions } from '@bgrules/game'
import type { Logger } from './logger'

export interface MatchEntry {
  readonly id: string
  readonly engine: Engine
  readonly createdAt: string
  version: number
}

export interface MatchRegistry {
  /** Existing match, or a new one in `not_started` */
  getOrCreate(id: string): MatchEntry
  get(id: string): MatchEntry | undefined
  list(): readonly MatchEntry[]
  /** Record a successful mutation; returns the new version */
  bump(id: string): number
}

export interface MatchRegistryOptions {
  readonly logger: Logger
  /** Engine options for every new match */
  readonly engine?: EngineOptions
  readonly clock?: () => Date
}

export function createMatchRegistry({
  logger,
  engine: engineOptions = {},
  clock = () => new Date(),
}: MatchRegistryOptions): MatchRegistry {
  const matches = new Map<string, MatchEntry>()

  const get = (id: string): MatchEntry | undefined => matches.get(id)

  return {
    get,

    getOrCreate: id => {
      const existing = matches.get(id)
      if (existing) return existing

      const entry: MatchEntry = {
        id,
        engine: createEngine(engineOptions),
        createdAt: clock().toISOString(),
        version: 0,
      }
      matches.set(id, entry)
      logger.info('CreateMatch', '-', `create: ${id}`)
      return entry
    },

    list: () => [...matches.values()],

    bump: id => {
      const entry = matches.get(id)
      if (!entry) {
        throw new Error(`bump: match not found: ${id}`)
      }
      entry.version++
      return entry.version
    },
  }
}
