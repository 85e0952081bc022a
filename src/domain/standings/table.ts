/**
 * Group Table Domain Logic
 *
 * Folds confirmed group results into a ranked table. The table is a pure
 * function of the confirmed-match set: the same matches always produce the
 * same rows in the same order. No async I/O, no database access.
 */

import type { TieBreaker, TournamentRules } from '../tournament/rules';

/**
 * Minimal confirmed match data needed for the table.
 * Domain does not import from modules; callers map from their Match type.
 */
export interface ConfirmedGroupMatch {
  id: number;
  scheduledAt: Date;
  homeTeamId: number;
  awayTeamId: number;
  homeScore: number;
  awayScore: number;
}

export interface GroupTableRow {
  teamId: number;
  rank: number;
  played: number;
  won: number;
  drawn: number;
  lost: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifference: number;
  points: number;
}

export type PointsRules = Pick<TournamentRules, 'pointsForWin' | 'pointsForDraw' | 'pointsForLoss'>;

export type RankingRules = PointsRules & Pick<TournamentRules, 'tieBreakers'>;

function emptyRow(teamId: number): GroupTableRow {
  return {
    teamId,
    rank: 0,
    played: 0,
    won: 0,
    drawn: 0,
    lost: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    goalDifference: 0,
    points: 0,
  };
}

function applyResult(row: GroupTableRow, scored: number, conceded: number, rules: PointsRules): void {
  row.played += 1;
  row.goalsFor += scored;
  row.goalsAgainst += conceded;
  row.goalDifference = row.goalsFor - row.goalsAgainst;

  if (scored > conceded) {
    row.won += 1;
    row.points += rules.pointsForWin;
  } else if (scored === conceded) {
    row.drawn += 1;
    row.points += rules.pointsForDraw;
  } else {
    row.lost += 1;
    row.points += rules.pointsForLoss;
  }
}

/**
 * Sort matches into scheduling order (date, then id).
 */
export function inSchedulingOrder<T extends { id: number; scheduledAt: Date }>(matches: T[]): T[] {
  return [...matches].sort((a, b) => {
    const byDate = a.scheduledAt.getTime() - b.scheduledAt.getTime();
    return byDate !== 0 ? byDate : a.id - b.id;
  });
}

type SortKey = number[];

function compareKeysDesc(a: SortKey, b: SortKey): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const diff = (b[i] ?? 0) - (a[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Order rows by key (descending) and split them into runs of equal keys.
 */
function partitionBy(rows: GroupTableRow[], keyOf: (row: GroupTableRow) => SortKey): GroupTableRow[][] {
  const keyed = rows
    .map((row) => ({ row, key: keyOf(row) }))
    .sort((a, b) => compareKeysDesc(a.key, b.key));

  const clusters: GroupTableRow[][] = [];
  let previous: SortKey | null = null;
  for (const { row, key } of keyed) {
    if (previous !== null && compareKeysDesc(previous, key) === 0) {
      clusters[clusters.length - 1].push(row);
    } else {
      clusters.push([row]);
    }
    previous = key;
  }
  return clusters;
}

function headToHeadKey(
  teamId: number,
  opponentId: number,
  matches: ConfirmedGroupMatch[],
  rules: PointsRules
): SortKey {
  const row = emptyRow(teamId);
  for (const match of matches) {
    if (match.homeTeamId === teamId && match.awayTeamId === opponentId) {
      applyResult(row, match.homeScore, match.awayScore, rules);
    } else if (match.awayTeamId === teamId && match.homeTeamId === opponentId) {
      applyResult(row, match.awayScore, match.homeScore, rules);
    }
  }
  return [row.points, row.goalDifference];
}

/**
 * Key for a tie-breaker, or null when it does not apply to this cluster.
 */
function tieBreakerKey(
  breaker: TieBreaker,
  cluster: GroupTableRow[],
  matches: ConfirmedGroupMatch[],
  rules: PointsRules
): ((row: GroupTableRow) => SortKey) | null {
  switch (breaker) {
    case 'HEAD_TO_HEAD': {
      if (cluster.length !== 2) return null;
      const [first, second] = cluster;
      return (row) =>
        headToHeadKey(
          row.teamId,
          row.teamId === first.teamId ? second.teamId : first.teamId,
          matches,
          rules
        );
    }
    case 'MOST_WINS':
      return (row) => [row.won];
  }
}

function rankCluster(
  cluster: GroupTableRow[],
  breakers: TieBreaker[],
  matches: ConfirmedGroupMatch[],
  rules: PointsRules
): GroupTableRow[] {
  if (cluster.length <= 1) return cluster;

  const [breaker, ...rest] = breakers;
  if (breaker === undefined) {
    // Deterministic fallback
    return [...cluster].sort((a, b) => a.teamId - b.teamId);
  }

  const keyOf = tieBreakerKey(breaker, cluster, matches, rules);
  if (keyOf === null) {
    return rankCluster(cluster, rest, matches, rules);
  }
  return partitionBy(cluster, keyOf).flatMap((sub) => rankCluster(sub, rest, matches, rules));
}

/**
 * Compute the ranked table for one group.
 *
 * Order: points DESC > goal difference DESC > goals for DESC > configured
 * tie-breakers > team id ASC. Ranks are 1..n with no shared places.
 *
 * @param teamIds - Teams drawn into the group (teams without results get a zero row)
 * @param matches - CONFIRMED matches of the group
 */
export function computeGroupTable(
  teamIds: number[],
  matches: ConfirmedGroupMatch[],
  rules: RankingRules
): GroupTableRow[] {
  const rows = new Map<number, GroupTableRow>();
  const rowFor = (teamId: number): GroupTableRow => {
    let row = rows.get(teamId);
    if (!row) {
      row = emptyRow(teamId);
      rows.set(teamId, row);
    }
    return row;
  };

  for (const teamId of teamIds) {
    rowFor(teamId);
  }

  const ordered = inSchedulingOrder(matches);
  for (const match of ordered) {
    applyResult(rowFor(match.homeTeamId), match.homeScore, match.awayScore, rules);
    applyResult(rowFor(match.awayTeamId), match.awayScore, match.homeScore, rules);
  }

  const ranked = partitionBy([...rows.values()], (row) => [
    row.points,
    row.goalDifference,
    row.goalsFor,
  ]).flatMap((cluster) => rankCluster(cluster, rules.tieBreakers, ordered, rules));

  return ranked.map((row, index) => ({ ...row, rank: index + 1 }));
}

export interface GroupQualifier {
  teamId: number;
  groupNumber: number;
  /** Finishing place within the group (1-based) */
  place: number;
}

/**
 * Top `qualifiersPerGroup` of every group, by rank.
 */
export function selectQualifiers(
  tables: Map<number, GroupTableRow[]>,
  qualifiersPerGroup: number
): GroupQualifier[] {
  const qualifiers: GroupQualifier[] = [];
  for (const [groupNumber, rows] of tables) {
    const byRank = [...rows].sort((a, b) => a.rank - b.rank);
    byRank.slice(0, qualifiersPerGroup).forEach((row, index) => {
      qualifiers.push({ teamId: row.teamId, groupNumber, place: index + 1 });
    });
  }
  return qualifiers;
}
