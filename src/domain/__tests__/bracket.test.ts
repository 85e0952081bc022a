import type { GroupQualifier } from '../standings/table';
import { bracketSize, orderQualifiers, pairFirstRound, standardSeedOrder } from '../bracket/seeding';
import {
  advanceNode,
  buildBracket,
  championOf,
  stageForNode,
  validateBracket,
  type BracketNodeData,
} from '../bracket/tree';

function qualifiersFor(groups: number, perGroup: number): GroupQualifier[] {
  const qualifiers: GroupQualifier[] = [];
  for (let group = 1; group <= groups; group++) {
    for (let place = 1; place <= perGroup; place++) {
      qualifiers.push({ teamId: group * 10 + place, groupNumber: group, place });
    }
  }
  return qualifiers;
}

function advanced(nodes: BracketNodeData[], index: number, winner: number): BracketNodeData[] {
  const result = advanceNode(nodes, index, winner);
  if (!result.ok) throw new Error(result.error.message);
  return result.change.nodes;
}

describe('seeding', () => {
  it('lays seeds out in standard bracket order', () => {
    expect(standardSeedOrder(2)).toEqual([1, 2]);
    expect(standardSeedOrder(4)).toEqual([1, 4, 2, 3]);
    expect(standardSeedOrder(8)).toEqual([1, 8, 4, 5, 2, 7, 3, 6]);
  });

  it('rounds the bracket up to a power of two', () => {
    expect(bracketSize(1)).toBe(2);
    expect(bracketSize(4)).toBe(4);
    expect(bracketSize(6)).toBe(8);
  });

  it('seeds group winners before runners-up', () => {
    const seeded = orderQualifiers([...qualifiersFor(2, 2)].reverse());
    expect(seeded.map((team) => [team.seed, team.seedLabel, team.teamId])).toEqual([
      [1, 'A1', 11],
      [2, 'B1', 21],
      [3, 'A2', 12],
      [4, 'B2', 22],
    ]);
  });

  it('pairs winners against runners-up of other groups', () => {
    const pairs = pairFirstRound(orderQualifiers(qualifiersFor(2, 2)));
    expect(pairs.map(([home, away]) => [home?.seedLabel, away?.seedLabel])).toEqual([
      ['A1', 'B2'],
      ['B1', 'A2'],
    ]);
  });

  it('swaps a same-group pairing with the nearest pairing and leaves byes alone', () => {
    const pairs = pairFirstRound(orderQualifiers(qualifiersFor(3, 2)));
    expect(pairs.map(([home, away]) => [home?.teamId ?? null, away?.teamId ?? null])).toEqual([
      [11, null],
      [12, 32],
      [21, null],
      [31, 22],
    ]);
  });

  it('keeps a same-group pairing when no swap can fix it', () => {
    const pairs = pairFirstRound(orderQualifiers(qualifiersFor(1, 2)));
    expect(pairs.map(([home, away]) => [home?.seedLabel, away?.seedLabel])).toEqual([['A1', 'A2']]);
  });
});

describe('bracket tree', () => {
  // Six qualifiers in an eight-slot bracket: A1 and B1 get byes
  const built = buildBracket(pairFirstRound(orderQualifiers(qualifiersFor(3, 2))));

  it('builds a valid arena with the final last', () => {
    expect(built.nodes).toHaveLength(15);
    expect(validateBracket(built.nodes)).toEqual([]);
    expect(built.nodes[14].left).toBe(12);
    expect(built.nodes[14].right).toBe(13);
    expect(built.changed).toEqual(Array.from({ length: 15 }, (_, i) => i));
  });

  it('advances teams with a bye by walkover', () => {
    expect(built.nodes[8]).toMatchObject({ state: 'DECIDED', teamId: 11 });
    expect(built.nodes[10]).toMatchObject({ state: 'DECIDED', teamId: 21 });
    expect(built.readied).toEqual([9, 11]);
    expect(built.nodes[12].state).toBe('PENDING');
  });

  it('names stages from the number of teams in the round', () => {
    expect(stageForNode(built.nodes[9], 8)).toBe('QUARTERFINAL');
    expect(stageForNode(built.nodes[12], 8)).toBe('SEMIFINAL');
    expect(stageForNode(built.nodes[14], 8)).toBe('FINAL');
  });

  it('readies the parent once both children are decided', () => {
    const result = advanceNode(built.nodes, 9, 12);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.change.changed).toEqual([9, 12]);
    expect(result.change.readied).toEqual([12]);
    expect(result.change.nodes[12].state).toBe('READY');
    expect(built.nodes[9].state).toBe('READY');
  });

  it('rejects winners that did not play and nodes that are not ready', () => {
    const stranger = advanceNode(built.nodes, 9, 99);
    expect(stranger.ok ? null : stranger.error.code).toBe('WINNER_NOT_IN_MATCH');

    const pending = advanceNode(built.nodes, 12, 11);
    expect(pending.ok ? null : pending.error.code).toBe('NODE_NOT_READY');

    const unknown = advanceNode(built.nodes, 42, 11);
    expect(unknown.ok ? null : unknown.error.code).toBe('UNKNOWN_NODE');
  });

  it('crowns the winner of the final', () => {
    let nodes = advanced(built.nodes, 9, 12);
    nodes = advanced(nodes, 11, 22);
    nodes = advanced(nodes, 12, 11);
    nodes = advanced(nodes, 13, 21);
    expect(championOf(nodes)).toBeNull();
    expect(nodes[14].state).toBe('READY');

    nodes = advanced(nodes, 14, 21);
    expect(championOf(nodes)).toBe(21);
    expect(validateBracket(nodes)).toEqual([]);
  });

  it('reports structural violations', () => {
    const broken = built.nodes.map((node) => (node.index === 3 ? { ...node, state: 'PENDING' as const } : node));
    expect(validateBracket(broken)).toEqual(['Leaf 3 must be DECIDED']);
  });

  it('rejects a team seeded into two sibling slots', () => {
    const doubled = built.nodes.map((node) => (node.index === 3 ? { ...node, teamId: 12 } : node));
    expect(validateBracket(doubled)).toEqual(['Team 12 occupies leaves 2 and 3']);
  });

  it('rejects a team seeded into two slots anywhere in the bracket', () => {
    const doubled = built.nodes.map((node) => (node.index === 7 ? { ...node, teamId: 11 } : node));
    expect(validateBracket(doubled)).toEqual(['Team 11 occupies leaves 0 and 7']);
  });
});
