import { addDays, drawGroups, roundRobinFixtures } from '../tournament/schedule';
import { groupLabel, isMatchStage, knockoutStageForRound, oppositeSide } from '../tournament/types';
import {
  MAX_ROSTER_SIZE,
  MIN_ROSTER_SIZE,
  canAddPlayer,
  getRegistrationStatus,
  isRegistrationComplete,
} from '../roster/registration';

describe('roundRobinFixtures', () => {
  it('pairs four teams over three matchdays', () => {
    const fixtures = roundRobinFixtures([1, 2, 3, 4]);
    expect(fixtures.map((f) => [f.round, f.homeTeamId, f.awayTeamId])).toEqual([
      [0, 1, 4],
      [0, 2, 3],
      [1, 3, 1],
      [1, 4, 2],
      [2, 1, 2],
      [2, 3, 4],
    ]);
  });

  it('rests one team per matchday with an odd count', () => {
    const fixtures = roundRobinFixtures([1, 2, 3, 4, 5]);
    const pairs = fixtures.map((f) => [f.homeTeamId, f.awayTeamId].sort((a, b) => a - b).join('-'));

    expect(fixtures).toHaveLength(10);
    expect(new Set(pairs).size).toBe(10);
    expect(new Set(fixtures.map((f) => f.round)).size).toBe(5);
  });
});

describe('drawGroups', () => {
  it('deals shuffled teams into consecutive groups', () => {
    const keepOrder = () => 0.999999;
    expect(drawGroups([5, 6, 7, 8], 2, keepOrder)).toEqual([
      { teamId: 5, groupNumber: 1 },
      { teamId: 6, groupNumber: 1 },
      { teamId: 7, groupNumber: 2 },
      { teamId: 8, groupNumber: 2 },
    ]);
  });

  it('puts every team in exactly one group', () => {
    const draw = drawGroups([1, 2, 3, 4, 5, 6, 7, 8], 4, Math.random);
    expect(draw.map((a) => a.teamId).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(draw.filter((a) => a.groupNumber === 1)).toHaveLength(4);
    expect(draw.filter((a) => a.groupNumber === 2)).toHaveLength(4);
  });
});

describe('tournament vocabulary', () => {
  it('names knockout rounds', () => {
    expect(knockoutStageForRound(2)).toBe('FINAL');
    expect(knockoutStageForRound(4)).toBe('SEMIFINAL');
    expect(knockoutStageForRound(8)).toBe('QUARTERFINAL');
    expect(knockoutStageForRound(16)).toBe('ROUND_OF_16');
  });

  it('recognises match stages', () => {
    expect(isMatchStage('ROUND_OF_32')).toBe(true);
    expect(isMatchStage('ROUND_OF_')).toBe(false);
  });

  it('labels groups with letters', () => {
    expect(groupLabel(1)).toBe('A');
    expect(groupLabel(26)).toBe('Z');
    expect(groupLabel(27)).toBe('G27');
  });

  it('flips sides and adds days', () => {
    expect(oppositeSide('HOME')).toBe('AWAY');
    expect(addDays(new Date('2026-05-01T18:00:00Z'), 3)).toEqual(new Date('2026-05-04T18:00:00Z'));
  });
});

describe('registration', () => {
  it('is complete between the roster limits', () => {
    expect(MIN_ROSTER_SIZE).toBe(8);
    expect(MAX_ROSTER_SIZE).toBe(14);
    expect(getRegistrationStatus(7)).toBe('INCOMPLETE');
    expect(isRegistrationComplete(8)).toBe(true);
    expect(isRegistrationComplete(14)).toBe(true);
    expect(getRegistrationStatus(15)).toBe('OVER_LIMIT');
  });

  it('stops adding players at the maximum', () => {
    expect(canAddPlayer(13)).toBe(true);
    expect(canAddPlayer(14)).toBe(false);
  });
});
