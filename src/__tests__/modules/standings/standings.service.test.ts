jest.mock('../../../shared/transaction-runner', () =>
  jest.requireActual('../../helpers/in-memory-transaction-runner')
);

import { memoryDb } from '../../helpers/in-memory-db';
import { createTestEngine, keepOrder, seedTournament } from '../../helpers/test-engine';
import { matchBetween } from '../../helpers/fixtures';
import type { Team } from '../../../modules/teams/teams.model';
import { IncompleteBracketException, NotFoundException } from '../../../utils/exceptions';

describe('StandingsService', () => {
  let tournamentId: number;
  let teams: Team[];
  let testEngine: ReturnType<typeof createTestEngine>;

  beforeEach(async () => {
    memoryDb.reset();
    const seeded = seedTournament(memoryDb);
    tournamentId = seeded.tournament.id;
    teams = seeded.teams;
    testEngine = createTestEngine(memoryDb, keepOrder);
    await testEngine.engine.startGroupStage(tournamentId, 'organizer-1');
  });

  it('rejects groups the tournament does not have', async () => {
    await expect(testEngine.engine.getStandings(tournamentId, 3)).rejects.toThrow(
      new NotFoundException(`Tournament ${tournamentId} has no group 3`)
    );
  });

  it('withholds qualifiers until every group match is confirmed', async () => {
    const attempt = testEngine.engine.getQualifiedTeams(tournamentId);

    await expect(attempt).rejects.toBeInstanceOf(IncompleteBracketException);
    await expect(attempt).rejects.toThrow('Group stage is not complete: 12 match(es) still awaiting confirmation');
  });

  it('recomputes a group table in a transaction of its own', async () => {
    const match = matchBetween(memoryDb, teams[1].id, teams[2].id);
    const stored = memoryDb.tables.matches.find((m) => m.id === match.id);
    if (stored) stored.status = 'CONFIRMED';
    memoryDb.tables.results.push({
      matchId: match.id,
      homeScore: 0,
      awayScore: 2,
      extraTime: false,
      penalties: false,
      penaltyWinner: null,
      submittedBySide: 'HOME',
      submittedBy: 'manager-2',
      homeConfirmed: true,
      awayConfirmed: true,
    });

    const table = await testEngine.services.standingsService.recomputeGroup(tournamentId, 1);

    expect(table.map((row) => row.teamId)).toEqual([teams[2].id, teams[0].id, teams[3].id, teams[1].id]);
    expect(await testEngine.engine.getStandings(tournamentId, 1)).toEqual(
      table.map((row) => ({ ...row, tournamentId, groupNumber: 1 }))
    );
  });
});
