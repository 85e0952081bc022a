/**
 * Knockout Bracket Domain Logic
 *
 * The bracket is an arena of nodes addressed by index: first-round slots
 * (leaves) first, then each round in order, the final (root) last. Every
 * internal node has two children and one parent, except the root.
 *
 *   PENDING  - waiting for one or both children
 *   READY    - both teams known; its match is scheduled
 *   DECIDED  - winner known (leaves are DECIDED from the start; a leaf
 *              without a team is a bye)
 *
 * Functions return updated copies and the indices they changed.
 * No async I/O, no database access.
 */

import type { KnockoutStage } from '../tournament/types';
import { knockoutStageForRound } from '../tournament/types';
import type { FirstRoundPair } from './seeding';

export type BracketNodeState = 'PENDING' | 'READY' | 'DECIDED';

export interface BracketNodeData {
  index: number;
  /** 0 for first-round slots, 1 for the first round of matches, ... */
  round: number;
  position: number;
  state: BracketNodeState;
  teamId: number | null;
  seedLabel: string | null;
  sourceGroup: number | null;
  left: number | null;
  right: number | null;
  parent: number | null;
  matchId: number | null;
}

export interface BracketChange {
  nodes: BracketNodeData[];
  /** Indices of nodes whose state or team changed */
  changed: number[];
  /** Nodes that just became READY and need a match */
  readied: number[];
}

export type BracketErrorCode = 'NODE_NOT_READY' | 'WINNER_NOT_IN_MATCH' | 'UNKNOWN_NODE';

export interface BracketError {
  code: BracketErrorCode;
  message: string;
}

export function isLeaf(node: BracketNodeData): boolean {
  return node.left === null && node.right === null;
}

export function rootIndex(nodes: BracketNodeData[]): number {
  return nodes.length - 1;
}

/**
 * Number of rounds with matches for a bracket of `leafCount` slots.
 */
export function roundCount(leafCount: number): number {
  return Math.round(Math.log2(leafCount));
}

/**
 * Stage of the match played at an internal node.
 */
export function stageForNode(node: BracketNodeData, leafCount: number): KnockoutStage {
  const teamsInRound = leafCount / 2 ** (node.round - 1);
  return knockoutStageForRound(teamsInRound);
}

/**
 * Teams meeting at a node: [home, away] = [left child, right child].
 */
export function nodeTeams(nodes: BracketNodeData[], index: number): [number | null, number | null] {
  const node = nodes[index];
  const left = node.left === null ? null : nodes[node.left].teamId;
  const right = node.right === null ? null : nodes[node.right].teamId;
  return [left, right];
}

/**
 * Resolve nodes whose children are both decided: two teams make the node
 * READY, a team facing a bye advances by walkover. Runs in index order so a
 * walkover propagates upward in the same pass.
 */
export function settleBracket(nodes: BracketNodeData[]): BracketChange {
  const next = nodes.map((node) => ({ ...node }));
  const changed: number[] = [];
  const readied: number[] = [];

  for (const node of next) {
    if (node.state !== 'PENDING' || node.left === null || node.right === null) continue;

    const left = next[node.left];
    const right = next[node.right];
    if (left.state !== 'DECIDED' || right.state !== 'DECIDED') continue;

    if (left.teamId !== null && right.teamId !== null) {
      node.state = 'READY';
      readied.push(node.index);
    } else {
      node.state = 'DECIDED';
      node.teamId = left.teamId ?? right.teamId;
    }
    changed.push(node.index);
  }

  return { nodes: next, changed, readied };
}

/**
 * Build the full tree from the first-round pairs and settle byes.
 */
export function buildBracket(pairs: FirstRoundPair[]): BracketChange {
  const leafCount = pairs.length * 2;
  const nodes: BracketNodeData[] = [];

  pairs.forEach((pair, pairIndex) => {
    pair.forEach((team, slot) => {
      const position = pairIndex * 2 + slot;
      nodes.push({
        index: position,
        round: 0,
        position,
        state: 'DECIDED',
        teamId: team?.teamId ?? null,
        seedLabel: team?.seedLabel ?? null,
        sourceGroup: team?.groupNumber ?? null,
        left: null,
        right: null,
        parent: null,
        matchId: null,
      });
    });
  });

  let previousStart = 0;
  let previousCount = leafCount;
  for (let round = 1; previousCount > 1; round++) {
    const count = previousCount / 2;
    const start = nodes.length;
    for (let position = 0; position < count; position++) {
      const index = start + position;
      const left = previousStart + position * 2;
      const right = left + 1;
      nodes[left].parent = index;
      nodes[right].parent = index;
      nodes.push({
        index,
        round,
        position,
        state: 'PENDING',
        teamId: null,
        seedLabel: null,
        sourceGroup: null,
        left,
        right,
        parent: null,
        matchId: null,
      });
    }
    previousStart = start;
    previousCount = count;
  }

  const settled = settleBracket(nodes);
  return { nodes: settled.nodes, changed: nodes.map((node) => node.index), readied: settled.readied };
}

/**
 * Record the winner of a READY node and settle its ancestors.
 */
export function advanceNode(
  nodes: BracketNodeData[],
  index: number,
  winnerTeamId: number
): { ok: true; change: BracketChange } | { ok: false; error: BracketError } {
  const node = nodes[index];
  if (node === undefined) {
    return { ok: false, error: { code: 'UNKNOWN_NODE', message: `Bracket node ${index} does not exist` } };
  }
  if (node.state !== 'READY') {
    return {
      ok: false,
      error: { code: 'NODE_NOT_READY', message: `Bracket node ${index} is ${node.state}, not READY` },
    };
  }
  if (!nodeTeams(nodes, index).includes(winnerTeamId)) {
    return {
      ok: false,
      error: {
        code: 'WINNER_NOT_IN_MATCH',
        message: `Team ${winnerTeamId} did not play at bracket node ${index}`,
      },
    };
  }

  const decided = nodes.map((n) => (n.index === index ? { ...n, state: 'DECIDED' as const, teamId: winnerTeamId } : n));
  const settled = settleBracket(decided);
  return {
    ok: true,
    change: { nodes: settled.nodes, changed: [index, ...settled.changed], readied: settled.readied },
  };
}

/**
 * Champion once the root is decided, otherwise null.
 */
export function championOf(nodes: BracketNodeData[]): number | null {
  const root = nodes[rootIndex(nodes)];
  return root !== undefined && root.state === 'DECIDED' ? root.teamId : null;
}

/**
 * Structural invariants of a bracket arena.
 *
 * @returns Array of violations (empty if valid)
 */
export function validateBracket(nodes: BracketNodeData[]): string[] {
  const errors: string[] = [];
  const leafCount = nodes.filter(isLeaf).length;

  if (leafCount < 2 || (leafCount & (leafCount - 1)) !== 0) {
    errors.push(`Leaf count must be a power of two, got ${leafCount}`);
  }
  if (nodes.length !== leafCount * 2 - 1) {
    errors.push(`Expected ${leafCount * 2 - 1} nodes for ${leafCount} slots, got ${nodes.length}`);
  }

  // A team is seeded into at most one slot
  const leafOfTeam = new Map<number, number>();

  nodes.forEach((node, i) => {
    if (node.index !== i) {
      errors.push(`Node at position ${i} has index ${node.index}`);
      return;
    }
    if (node.parent === null && i !== rootIndex(nodes)) {
      errors.push(`Node ${i} has no parent`);
    }
    if (isLeaf(node)) {
      if (node.state !== 'DECIDED') errors.push(`Leaf ${i} must be DECIDED`);
      if (node.teamId !== null) {
        const seen = leafOfTeam.get(node.teamId);
        if (seen !== undefined) errors.push(`Team ${node.teamId} occupies leaves ${seen} and ${i}`);
        else leafOfTeam.set(node.teamId, i);
      }
      return;
    }
    if (node.left === null || node.right === null) {
      errors.push(`Node ${i} must have two children`);
      return;
    }
    for (const child of [node.left, node.right]) {
      if (nodes[child]?.parent !== i) {
        errors.push(`Child ${child} of node ${i} does not point back to it`);
      }
    }

    const teams = nodeTeams(nodes, i);
    if (node.state === 'READY' && (teams[0] === null || teams[1] === null)) {
      errors.push(`Node ${i} is READY without two teams`);
    }
    if (node.state === 'DECIDED' && node.teamId !== null && !teams.includes(node.teamId)) {
      errors.push(`Node ${i} winner ${node.teamId} did not play there`);
    }
  });

  return errors;
}
