import {
  isLeaf,
  stageForNode,
  type BracketNodeData,
  type BracketNodeState,
  type KnockoutStage,
} from '../../domain';

export interface BracketNodeRow {
  tournament_id: number;
  node_index: number;
  round: number;
  position: number;
  state: BracketNodeState;
  team_id: number | null;
  seed_label: string | null;
  source_group: number | null;
  left_child: number | null;
  right_child: number | null;
  parent_index: number | null;
  match_id: number | null;
}

export interface BracketNodeView extends BracketNodeData {
  /** Stage of the match played at this node; null for first-round slots */
  stage: KnockoutStage | null;
}

export interface Bracket {
  tournamentId: number;
  /** Number of first-round slots (a power of two) */
  size: number;
  championTeamId: number | null;
  nodes: BracketNodeView[];
}

export function bracketNodeFromDatabase(row: BracketNodeRow): BracketNodeData {
  return {
    index: row.node_index,
    round: row.round,
    position: row.position,
    state: row.state,
    teamId: row.team_id,
    seedLabel: row.seed_label,
    sourceGroup: row.source_group,
    left: row.left_child,
    right: row.right_child,
    parent: row.parent_index,
    matchId: row.match_id,
  };
}

export function toBracketView(
  tournamentId: number,
  nodes: BracketNodeData[],
  championTeamId: number | null
): Bracket {
  const size = nodes.filter(isLeaf).length;
  return {
    tournamentId,
    size,
    championTeamId,
    nodes: nodes.map((node) => ({
      ...node,
      stage: isLeaf(node) ? null : stageForNode(node, size),
    })),
  };
}
