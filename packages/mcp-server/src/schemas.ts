/**
 * Zod schemas for MCP tool input and output validation.
 *
 * Output schemas define the shape of structuredContent returned by tool
 * handlers. The MCP SDK validates structuredContent against them, so every
 * field returned in structuredContent MUST be declared here.
 */

import { z } from 'zod'

// =============================================================================
// Building Blocks
// =============================================================================

export const PlayerSchema = z.enum(['white', 'black'])

export const SideSchema = z.enum(['white', 'black', 'none'])

export const DieValueSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
])

/** 1-24 on the board, 0 for the bar, 25 for off */
export const LocationSchema = z.number().int().min(0).max(25)

export const CheckerCountsSchema = z.object({
  white: z.number().int().min(0),
  black: z.number().int().min(0),
})

export const PointSnapshotSchema = z.object({
  side: SideSchema,
  count: z.number().int().min(0).max(15),
})

export const BoardSnapshotSchema = z.object({
  points: z.array(PointSnapshotSchema).length(24),
  bar: CheckerCountsSchema,
  borneOff: CheckerCountsSchema,
  cube: z.number().int().min(1),
})

export const GamePhaseSchema = z.enum([
  'not_started',
  'opening_roll',
  'awaiting_roll',
  'moving',
  'cube_offered',
  'game_over',
])

export const CubeSchema = z.object({
  value: z.number().int().min(1),
  holder: SideSchema,
})

export const GameResultSchema = z.object({
  winner: PlayerSchema,
  finalCube: z.number().int().min(1),
  resigned: z.boolean(),
})

export const LegalStepsSchema = z.object({
  from: LocationSchema,
  options: z.array(
    z.object({
      to: LocationSchema,
      pip: DieValueSchema,
      wouldHit: z.boolean(),
    })
  ),
})

export const MatchSnapshotSchema = z.object({
  matchId: z.string(),
  version: z.number().int().min(0),
  phase: GamePhaseSchema,
  sideToMove: SideSchema,
  turnNumber: z.number().int().min(0),
  dice: z.array(DieValueSchema).max(4),
  cube: CubeSchema,
  board: BoardSnapshotSchema,
  result: GameResultSchema.nullable(),
  lastError: z.string(),
})

export const MatchSummarySchema = z.object({
  matchId: z.string(),
  version: z.number().int().min(0),
  phase: GamePhaseSchema,
  createdAt: z.string(),
})

// =============================================================================
// Output Schemas
// =============================================================================

/** Output schema shape for tools that return a match snapshot */
export const MatchResponseOutputSchema = {
  match: MatchSnapshotSchema,
  legalSteps: z.array(LegalStepsSchema).optional(),
}

/** Output schema shape for bg_list_matches */
export const MatchListOutputSchema = {
  matches: z.array(MatchSummarySchema),
}

// =============================================================================
// Input Schemas
// =============================================================================

export const MatchIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Match id; a match is created the first time an id is used')

export const MatchInputSchema = {
  matchId: MatchIdSchema,
}

export const CreateMatchInputSchema = {
  matchId: MatchIdSchema,
  openingDoublePolicy: z
    .enum(['reroll', 'auto_double'])
    .optional()
    .describe("What an opening double does: 'reroll' or 'auto_double' (doubles the cube)"),
  maxOpeningAutoDoubles: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Cap on opening auto-doubles; 0 = unlimited'),
}

export const OpeningDiceInputSchema = {
  matchId: MatchIdSchema,
  white: z.number().int().describe("White's opening die (1-6)"),
  black: z.number().int().describe("Black's opening die (1-6)"),
}

export const SetDiceInputSchema = {
  matchId: MatchIdSchema,
  die1: z.number().int().describe('First die (1-6)'),
  die2: z.number().int().describe('Second die (1-6)'),
}

export const ApplyStepInputSchema = {
  matchId: MatchIdSchema,
  from: z.number().int().describe('Point to move from (1-24), or 0 to enter from the bar'),
  pip: z.number().int().describe('Die value to use'),
}

// =============================================================================
// Types
// =============================================================================

export type MatchSnapshot = z.infer<typeof MatchSnapshotSchema>
export type MatchSummary = z.infer<typeof MatchSummarySchema>
