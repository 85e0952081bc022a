/**
 * Knockout Seeding Domain Logic
 *
 * Orders group qualifiers into seeds and pairs the first round using
 * standard bracket positions, so seed s meets seed n + 1 - s and the top
 * seeds can only meet late. No async I/O, no database access.
 */

import type { GroupQualifier } from '../standings/table';
import { groupLabel } from '../tournament/types';

export interface SeededTeam {
  teamId: number;
  seed: number;
  groupNumber: number;
  /** e.g. "A1" for the winner of group A */
  seedLabel: string;
}

/** A first-round slot pair; null marks a bye */
export type FirstRoundPair = [SeededTeam | null, SeededTeam | null];

/**
 * Place-major seeding: all group winners (A1, B1, ...), then all runners-up
 * (A2, B2, ...), and so on.
 */
export function orderQualifiers(qualifiers: GroupQualifier[]): SeededTeam[] {
  return [...qualifiers]
    .sort((a, b) => (a.place !== b.place ? a.place - b.place : a.groupNumber - b.groupNumber))
    .map((q, index) => ({
      teamId: q.teamId,
      seed: index + 1,
      groupNumber: q.groupNumber,
      seedLabel: `${groupLabel(q.groupNumber)}${q.place}`,
    }));
}

/**
 * Smallest power of two holding `teamCount` teams (at least 2).
 */
export function bracketSize(teamCount: number): number {
  let size = 2;
  while (size < teamCount) {
    size *= 2;
  }
  return size;
}

/**
 * Seed numbers in bracket slot order, e.g. size 8 -> [1, 8, 4, 5, 2, 7, 3, 6].
 */
export function standardSeedOrder(size: number): number[] {
  let order = [1, 2];
  while (order.length < size) {
    const newSize = order.length * 2;
    order = order.flatMap((seed) => [seed, newSize + 1 - seed]);
  }
  return order;
}

function isValidPair([home, away]: FirstRoundPair): boolean {
  return home === null || away === null || home.groupNumber !== away.groupNumber;
}

/**
 * Pair the first round. Seeds beyond the number of teams are byes.
 * A pairing of two teams from the same group swaps its second entry with the
 * nearest pairing (lower index first on equal distance) where the swap makes
 * both pairings valid; if none exists the pairing stays as seeded.
 */
export function pairFirstRound(seeded: SeededTeam[]): FirstRoundPair[] {
  const size = bracketSize(seeded.length);
  const bySeed = new Map(seeded.map((team) => [team.seed, team]));
  const order = standardSeedOrder(size);

  const pairs: FirstRoundPair[] = [];
  for (let i = 0; i < order.length; i += 2) {
    pairs.push([bySeed.get(order[i]) ?? null, bySeed.get(order[i + 1]) ?? null]);
  }

  for (let i = 0; i < pairs.length; i++) {
    if (isValidPair(pairs[i])) continue;

    for (let distance = 1; distance < pairs.length; distance++) {
      const candidates = [i - distance, i + distance].filter((j) => j >= 0 && j < pairs.length);
      const j = candidates.find((index) => {
        if (pairs[index][1] === null) return false;
        const swappedI: FirstRoundPair = [pairs[i][0], pairs[index][1]];
        const swappedJ: FirstRoundPair = [pairs[index][0], pairs[i][1]];
        return isValidPair(swappedI) && isValidPair(swappedJ);
      });

      if (j !== undefined) {
        const away = pairs[i][1];
        pairs[i] = [pairs[i][0], pairs[j][1]];
        pairs[j] = [pairs[j][0], away];
        break;
      }
    }
  }

  return pairs;
}
