/**
 * Tool Handlers
 *
 * One handler per MCP tool. Handlers only translate between tool arguments,
 * engine commands and responses; every rule lives in the engine. Each
 * successful command bumps the match version and is logged.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { Engine, EngineError, OpeningDoublePolicy, Player, Result, Rules } from '@bgrules/game'
import { OFF } from '@bgrules/game'
import type { LogEventType, Logger } from './logger'
import type { MatchEntry, MatchRegistry } from './matchRegistry'
import type { MatchSnapshot, MatchSummary } from './schemas'
import { renderFullGameState, renderLegalSteps } from './asciiBoard'

// =============================================================================
// Types
// =============================================================================

export interface ToolContext {
  readonly registry: MatchRegistry
  readonly logger: Logger
}

export interface MatchArgs {
  readonly matchId: string
}

export interface CreateMatchArgs extends MatchArgs {
  readonly openingDoublePolicy?: OpeningDoublePolicy
  readonly maxOpeningAutoDoubles?: number
}

export interface OpeningDiceArgs extends MatchArgs {
  readonly white: number
  readonly black: number
}

export interface SetDiceArgs extends MatchArgs {
  readonly die1: number
  readonly die2: number
}

export interface ApplyStepArgs extends MatchArgs {
  readonly from: number
  readonly pip: number
}

// =============================================================================
// Helpers
// =============================================================================

function errorResponse(message: string): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  }
}

function capitalize(player: Player): string {
  return player.charAt(0).toUpperCase() + player.slice(1)
}

function formatLocation(location: number): string {
  if (location === 0) return 'bar'
  if (location === OFF) return 'off'
  return String(location)
}

/** Actor label for log lines: match id and side to move */
function whoFor(entry: MatchEntry): string {
  return `${entry.id}:${entry.engine.sideToMove()}`
}

/**
 * Plain snapshot of a match for structuredContent.
 */
export function toMatchSnapshot(entry: MatchEntry): MatchSnapshot {
  const { engine } = entry
  const board = engine.getState()
  return {
    matchId: entry.id,
    version: entry.version,
    phase: engine.phase(),
    sideToMove: engine.sideToMove(),
    turnNumber: engine.turnNumber(),
    dice: [...engine.diceRemaining()],
    cube: { value: engine.cubeValue(), holder: engine.cubeHolder() },
    board: {
      points: board.points.map(p => ({ side: p.side, count: p.count })),
      bar: { ...board.bar },
      borneOff: { ...board.borneOff },
      cube: board.cube,
    },
    result: engine.result(),
    lastError: engine.lastError(),
  }
}

function legalStepsOf(engine: Engine) {
  return engine.legalSteps().map(s => ({
    from: s.from,
    options: s.options.map(o => ({ to: o.to, pip: o.pip, wouldHit: o.wouldHit })),
  }))
}

/**
 * Response with both text content and structured content. Legal steps are
 * included while the side to move has dice to play.
 */
function matchResponse(entry: MatchEntry, text: string): CallToolResult {
  const moving = entry.engine.phase() === 'moving'
  return {
    content: [{ type: 'text', text }],
    structuredContent: {
      match: toMatchSnapshot(entry),
      ...(moving ? { legalSteps: legalStepsOf(entry.engine) } : {}),
    },
  }
}

/**
 * Run one engine command against a match. Failures come back as isError
 * responses carrying the engine's message; protocol errors are logged as
 * errors, rule violations as rejected commands.
 */
function runCommand<T>(
  { registry, logger }: ToolContext,
  matchId: string,
  exec: (engine: Engine) => Result<T, EngineError>,
  describe: (value: T) => string,
  eventType: LogEventType = 'Command'
): CallToolResult {
  const entry = registry.getOrCreate(matchId)
  const who = whoFor(entry)
  const result = exec(entry.engine)

  if (!result.ok) {
    if (result.error.kind === 'protocol') {
      logger.error(who, result.error.message)
    } else {
      logger.info('Command', who, `rejected: ${result.error.message}`)
    }
    return errorResponse(result.error.message)
  }

  registry.bump(matchId)
  const summary = describe(result.value)
  logger.info(eventType, who, summary)

  return matchResponse(entry, `${summary}\n\n${renderFullGameState({ engine: entry.engine })}`)
}

// =============================================================================
// Handlers
// =============================================================================

export function createToolHandlers(ctx: ToolContext) {
  return {
    createMatch: ({ matchId, openingDoublePolicy, maxOpeningAutoDoubles }: CreateMatchArgs) => {
      const rules: Partial<Rules> = {
        ...(openingDoublePolicy !== undefined ? { openingDoublePolicy } : {}),
        ...(maxOpeningAutoDoubles !== undefined ? { maxOpeningAutoDoubles } : {}),
      }
      return runCommand(
        ctx,
        matchId,
        engine => engine.startGame(rules),
        ({ rules: applied }) =>
          `Match ${matchId} started (opening doubles: ${applied.openingDoublePolicy}, cap ${String(applied.maxOpeningAutoDoubles)}). Roll the opening.`
      )
    },

    snapshot: ({ matchId }: MatchArgs): CallToolResult => {
      const entry = ctx.registry.getOrCreate(matchId)
      return matchResponse(entry, renderFullGameState({ engine: entry.engine }))
    },

    rollOpening: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.rollOpening(),
        opening => {
          const doubles =
            opening.autoDoublesApplied > 0 ? ` Cube auto-doubled ${String(opening.autoDoublesApplied)}x.` : ''
          const first = opening.firstPlayer === null ? 'nobody' : capitalize(opening.firstPlayer)
          return `Opening: white ${String(opening.whiteDie)}, black ${String(opening.blackDie)}.${doubles} ${first} moves first with ${opening.dice.join('-')}.`
        }
      ),

    setOpeningDice: ({ matchId, white, black }: OpeningDiceArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.setOpeningDice(white, black),
        opening => {
          if (opening.firstPlayer === null) {
            const doubled = opening.autoDoublesApplied > 0 ? ' Cube auto-doubled.' : ''
            return `Opening: white ${String(white)}, black ${String(black)}. Double; throw again.${doubled}`
          }
          return `Opening: white ${String(white)}, black ${String(black)}. ${capitalize(opening.firstPlayer)} moves first with ${opening.dice.join('-')}.`
        }
      ),

    rollDice: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.rollDice(),
        rolled =>
          `${capitalize(rolled.actor)} rolled ${String(rolled.die1)}-${String(rolled.die2)}.${rolled.canMove ? '' : ' No legal steps; commit the turn.'}`
      ),

    setDice: ({ matchId, die1, die2 }: SetDiceArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.setDice(die1, die2),
        rolled =>
          `${capitalize(rolled.actor)} rolled ${String(rolled.die1)}-${String(rolled.die2)}.${rolled.canMove ? '' : ' No legal steps; commit the turn.'}`
      ),

    applyStep: ({ matchId, from, pip }: ApplyStepArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.applyStep(from, pip),
        ({ step }) =>
          `Moved ${formatLocation(step.from)}->${formatLocation(step.to)}${step.hit ? '*' : ''} with ${String(step.pip)}.`,
        'Move'
      ),

    undoStep: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.undoStep(),
        ({ undone }) =>
          `Undid ${formatLocation(undone.from)}->${formatLocation(undone.to)} (${String(undone.pip)}).`,
        'Move'
      ),

    commitTurn: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.commitTurn(),
        committed =>
          `${capitalize(committed.player)} committed ${String(committed.stepsUsed)} step(s). ${capitalize(committed.nextToMove)} to roll.`
      ),

    offerCube: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.offerCube(),
        offer => `${capitalize(offer.offeredBy)} offers the cube at ${String(offer.proposedValue)}.`
      ),

    takeCube: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.takeCube(),
        taken => `Cube taken at ${String(taken.cubeValue)}; ${taken.holder} holds it.`
      ),

    dropCube: ({ matchId }: MatchArgs) =>
      runCommand(
        ctx,
        matchId,
        engine => engine.dropCube(),
        dropped => `Cube dropped. ${capitalize(dropped.winner)} wins at ${String(dropped.finalCube)}.`
      ),

    legalSteps: ({ matchId }: MatchArgs): CallToolResult => {
      const entry = ctx.registry.getOrCreate(matchId)
      return {
        content: [{ type: 'text', text: renderLegalSteps({ steps: entry.engine.legalSteps() }) }],
        structuredContent: {
          match: toMatchSnapshot(entry),
          legalSteps: legalStepsOf(entry.engine),
        },
      }
    },

    listMatches: (): CallToolResult => {
      const matches: MatchSummary[] = ctx.registry.list().map(entry => ({
        matchId: entry.id,
        version: entry.version,
        phase: entry.engine.phase(),
        createdAt: entry.createdAt,
      }))
      const text =
        matches.length === 0
          ? 'No matches.'
          : matches.map(m => `${m.matchId} v${String(m.version)} ${m.phase}`).join('\n')
      return {
        content: [{ type: 'text', text }],
        structuredContent: { matches },
      }
    },
  }
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>
