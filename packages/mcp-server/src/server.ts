/**
 * Rules Engine MCP Server
 *
 * Registers one tool per engine command. Every tool addresses a match by id;
 * the registry creates the match the first time an id is seen.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import {
  ApplyStepInputSchema,
  CreateMatchInputSchema,
  MatchInputSchema,
  MatchListOutputSchema,
  MatchResponseOutputSchema,
  OpeningDiceInputSchema,
  SetDiceInputSchema,
} from './schemas'
import { createToolHandlers, type ToolContext } from './tools'

export const SERVER_NAME = 'bgrules'
export const SERVER_VERSION = '1.0.0'

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  })
  const handlers = createToolHandlers(ctx)

  // ===========================================================================
  // Match lifecycle
  // ===========================================================================

  server.registerTool(
    'bg_create_match',
    {
      description:
        'Start a new game in a match (creating the match if needed). Resets the board, cube and history. Remember: point numbers are from white\'s perspective (white moves 24→1, black moves 1→24).',
      inputSchema: CreateMatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.createMatch(args)
  )

  server.registerTool(
    'bg_snapshot',
    {
      description: 'Get the current board, turn state and cube of a match.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.snapshot(args)
  )

  server.registerTool(
    'bg_list_matches',
    {
      description: 'List every match held by this server with its version and phase.',
      outputSchema: MatchListOutputSchema,
    },
    () => handlers.listMatches()
  )

  // ===========================================================================
  // Dice
  // ===========================================================================

  server.registerTool(
    'bg_roll_opening',
    {
      description:
        'Roll the opening throw: one die each, higher die moves first using both dice. Opening doubles follow the match rules (reroll or auto-double the cube).',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.rollOpening(args)
  )

  server.registerTool(
    'bg_set_opening_dice',
    {
      description: 'Set the opening throw explicitly instead of rolling.',
      inputSchema: OpeningDiceInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.setOpeningDice(args)
  )

  server.registerTool(
    'bg_roll_dice',
    {
      description: 'Roll the dice for the side to move. Doubles give four steps.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.rollDice(args)
  )

  server.registerTool(
    'bg_set_dice',
    {
      description: 'Set the dice for the side to move explicitly instead of rolling.',
      inputSchema: SetDiceInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.setDice(args)
  )

  // ===========================================================================
  // Moving
  // ===========================================================================

  server.registerTool(
    'bg_apply_step',
    {
      description:
        'Move one checker by one die. Use from=0 to enter from the bar. Steps can be undone until the turn is committed.',
      inputSchema: ApplyStepInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.applyStep(args)
  )

  server.registerTool(
    'bg_undo_step',
    {
      description: 'Undo the last step of the current turn, restoring any hit checker.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.undoStep(args)
  )

  server.registerTool(
    'bg_commit_turn',
    {
      description:
        'Finish the turn. Rejected if the steps played do not use as many dice as possible, or skip the higher die when only one die can be played.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.commitTurn(args)
  )

  server.registerTool(
    'bg_legal_steps',
    {
      description: 'List the single steps the side to move can play with the remaining dice.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.legalSteps(args)
  )

  // ===========================================================================
  // Cube
  // ===========================================================================

  server.registerTool(
    'bg_offer_cube',
    {
      description: 'Offer a double before rolling. Only the cube owner (or either side while centered) may offer.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.offerCube(args)
  )

  server.registerTool(
    'bg_take_cube',
    {
      description: 'Accept the pending double. The cube value doubles and the taker owns it.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.takeCube(args)
  )

  server.registerTool(
    'bg_drop_cube',
    {
      description: 'Refuse the pending double. The offering side wins at the current cube value.',
      inputSchema: MatchInputSchema,
      outputSchema: MatchResponseOutputSchema,
    },
    args => handlers.dropCube(args)
  )

  return server
}
