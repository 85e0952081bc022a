/**
 * Group Draw and Fixture Scheduling
 *
 * Random group draw and single round-robin fixtures (circle method).
 * The random source is injected for testability.
 * No async I/O, no database access.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type RandomSource = () => number;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Fisher-Yates shuffle returning a new array.
 */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export interface GroupAssignment {
  teamId: number;
  groupNumber: number;
}

/**
 * Shuffle teams and deal them into consecutive groups of `teamsPerGroup`.
 */
export function drawGroups(
  teamIds: number[],
  teamsPerGroup: number,
  random: RandomSource
): GroupAssignment[] {
  return shuffle(teamIds, random).map((teamId, index) => ({
    teamId,
    groupNumber: Math.floor(index / teamsPerGroup) + 1,
  }));
}

export interface Fixture {
  /** 0-based matchday */
  round: number;
  homeTeamId: number;
  awayTeamId: number;
}

/**
 * Single round robin: every pair of teams meets exactly once.
 * With an odd team count one team rests each matchday.
 */
export function roundRobinFixtures(teamIds: number[]): Fixture[] {
  const slots: Array<number | null> = [...teamIds];
  if (slots.length % 2 === 1) {
    slots.push(null);
  }

  const fixtures: Fixture[] = [];
  const rounds = slots.length - 1;
  const half = slots.length / 2;

  for (let round = 0; round < rounds; round++) {
    for (let i = 0; i < half; i++) {
      const a = slots[i];
      const b = slots[slots.length - 1 - i];
      if (a === null || b === null) continue;

      // Alternate the fixed team's venue between matchdays
      const swap = i === 0 && round % 2 === 1;
      fixtures.push({
        round,
        homeTeamId: swap ? b : a,
        awayTeamId: swap ? a : b,
      });
    }

    // Rotate every slot except the first
    const last = slots.pop();
    if (last !== undefined) {
      slots.splice(1, 0, last);
    }
  }

  return fixtures;
}
