import { z } from 'zod';
import { DEFAULT_TOURNAMENT_RULES, type TournamentRules } from '../../domain';
import { ValidationException } from '../../utils/exceptions';

/**
 * Zod schemas for tournament configuration
 */

const tieBreakerEnum = z.enum(['HEAD_TO_HEAD', 'MOST_WINS']);

const points = z.number().int().min(0, 'Points cannot be negative');
const intervalDays = z.number().int().min(0, 'Interval cannot be negative').max(60);

/** Rules document stored per tournament; missing keys take the defaults */
export const tournamentRulesSchema = z
  .object({
    pointsForWin: points.default(DEFAULT_TOURNAMENT_RULES.pointsForWin),
    pointsForDraw: points.default(DEFAULT_TOURNAMENT_RULES.pointsForDraw),
    pointsForLoss: points.default(DEFAULT_TOURNAMENT_RULES.pointsForLoss),
    tieBreakers: z
      .array(tieBreakerEnum)
      .max(2)
      .refine((list) => new Set(list).size === list.length, {
        message: 'Tie-breakers must not repeat',
      })
      .default([...DEFAULT_TOURNAMENT_RULES.tieBreakers]),
    selfConfirmOnSubmit: z.boolean().default(DEFAULT_TOURNAMENT_RULES.selfConfirmOnSubmit),
    penaltiesRequireLevelScore: z
      .boolean()
      .default(DEFAULT_TOURNAMENT_RULES.penaltiesRequireLevelScore),
    knockoutRoundIntervalDays: intervalDays.default(
      DEFAULT_TOURNAMENT_RULES.knockoutRoundIntervalDays
    ),
    groupMatchIntervalDays: intervalDays.default(DEFAULT_TOURNAMENT_RULES.groupMatchIntervalDays),
  })
  .refine((rules) => rules.pointsForWin >= rules.pointsForDraw && rules.pointsForDraw >= rules.pointsForLoss, {
    message: 'Points must satisfy win >= draw >= loss',
  });

/**
 * Parse a stored rules document. A null document means all defaults.
 */
export function parseTournamentRules(raw: unknown): TournamentRules {
  const result = tournamentRulesSchema.safeParse(raw ?? {});
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'Invalid tournament rules';
    throw new ValidationException(`Invalid tournament rules: ${message}`);
  }
  return result.data;
}
