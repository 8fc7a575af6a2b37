/**
 * MCP Server Module
 *
 * Exports for the rules engine MCP server.
 */

export { createServer, SERVER_NAME, SERVER_VERSION } from './server'
export { createToolHandlers, toMatchSnapshot } from './tools'
export type {
  ToolContext,
  ToolHandlers,
  MatchArgs,
  CreateMatchArgs,
  OpeningDiceArgs,
  SetDiceArgs,
  ApplyStepArgs,
} from './tools'
export { createMatchRegistry } from './matchRegistry'
export type { MatchEntry, MatchRegistry, MatchRegistryOptions } from './matchRegistry'
export { createLogger, formatLogLine } from './logger'
export type { LogEvent, LogEventType, Logger } from './logger'
export {
  renderAsciiBoard,
  renderFullGameState,
  renderGameSummary,
  renderLegalSteps,
} from './asciiBoard'
export type { MatchSnapshot, MatchSummary } from './schemas'
