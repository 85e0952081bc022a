import { z } from 'zod';

/**
 * Zod schemas for roster operations
 */

export const playerNameSchema = z
  .string({ required_error: 'Player name is required' })
  .transform((name) => name.trim().replace(/\s+/g, ' '))
  .pipe(
    z
      .string()
      .min(1, 'Player name cannot be blank')
      .max(100, 'Player name cannot exceed 100 characters')
  );

export const rosterChangeSchema = z.object({
  teamId: z.number().int().positive('Team ID must be a positive integer'),
  actorId: z.string().min(1, 'Actor ID is required'),
  playerName: playerNameSchema,
});

export type RosterChangeInput = z.infer<typeof rosterChangeSchema>;
