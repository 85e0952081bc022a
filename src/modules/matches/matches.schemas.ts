import { z } from 'zod';

/**
 * Zod schemas for result submission and confirmation
 */

export const matchIdSchema = z.number().int().positive('Match ID must be a positive integer');

export const actorIdSchema = z.string().min(1, 'Actor ID is required');

const goals = z
  .number({ invalid_type_error: 'Score must be a number' })
  .int('Scores must be non-negative integers')
  .min(0, 'Scores must be non-negative integers');

/** Score as reported by a manager or imposed by the organizer */
export const scoreInputSchema = z
  .object({
    homeScore: goals,
    awayScore: goals,
    extraTime: z.boolean().default(false),
    penalties: z.boolean().default(false),
    penaltyWinner: z.enum(['HOME', 'AWAY']).nullable().default(null),
  })
  .strict();

export type ScoreInput = z.input<typeof scoreInputSchema>;
