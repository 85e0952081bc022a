import { PoolClient } from 'pg';
import { BracketRepository } from './bracket.repository';
import { Bracket, toBracketView } from './bracket.model';
import type { MatchesRepository } from '../matches/matches.repository';
import type { TournamentsRepository } from '../tournaments/tournaments.repository';
import type { StandingsService } from '../standings/standings.service';
import type { Tournament } from '../tournaments/tournaments.model';
import {
  addDays,
  advanceNode,
  buildBracket,
  championOf,
  isLeaf,
  knockoutStageForRound,
  nodeTeams,
  orderQualifiers,
  pairFirstRound,
  stageForNode,
  validateBracket,
  type BracketNodeData,
} from '../../domain';
import { EventTypes, tryGetEventBus } from '../../shared/events';
import {
  InvalidStateException,
  TournamentErrors,
  ValidationException,
} from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

export class BracketService {
  constructor(
    private readonly bracketRepo: BracketRepository,
    private readonly matchesRepo: MatchesRepository,
    private readonly tournamentsRepo: TournamentsRepository,
    private readonly standingsService: StandingsService
  ) {}

  async getBracket(tournamentId: number): Promise<Bracket> {
    const tournament = await this.tournamentsRepo.findById(tournamentId);
    if (!tournament) throw TournamentErrors.notFound(tournamentId);

    const nodes = await this.bracketRepo.findByTournament(tournamentId);
    if (nodes.length === 0) throw TournamentErrors.bracketNotGenerated(tournamentId);
    return toBracketView(tournamentId, nodes, championOf(nodes));
  }

  /**
   * Seed the bracket from the final group tables and schedule every
   * first-round match. Returns the existing bracket if one was generated.
   * Fails with IncompleteBracketException while group matches are unconfirmed.
   *
   * Caller must hold the BRACKET lock for the tournament.
   */
  async generate(client: PoolClient, tournament: Tournament): Promise<Bracket> {
    const existing = await this.bracketRepo.findByTournament(tournament.id, client);
    if (existing.length > 0) {
      return toBracketView(tournament.id, existing, championOf(existing));
    }

    const qualifiers = await this.standingsService.getQualifiedTeams(tournament.id, client);
    if (qualifiers.length < 2) {
      throw new ValidationException('A knockout bracket needs at least two qualified teams');
    }

    const seeded = orderQualifiers(qualifiers);
    const built = buildBracket(pairFirstRound(seeded));
    const violations = validateBracket(built.nodes);
    if (violations.length > 0) {
      throw new InvalidStateException(`Cannot seed tournament ${tournament.id}: ${violations.join('; ')}`);
    }
    const nodes = await this.scheduleMatches(client, tournament, built.nodes, built.readied);
    await this.bracketRepo.insertNodes(tournament.id, nodes, client);

    const size = nodes.filter(isLeaf).length;
    tryGetEventBus()?.publish({
      type: EventTypes.BRACKET_GENERATED,
      tournamentId: tournament.id,
      payload: {
        tournamentId: tournament.id,
        nodeCount: nodes.length,
        firstRoundStage: knockoutStageForRound(size),
      },
    });
    logger.info(`Bracket generated for tournament ${tournament.id}`, {
      qualifiers: seeded.map((team) => team.seedLabel).join(','),
      size,
      firstRoundMatches: built.readied.length,
    });

    return toBracketView(tournament.id, nodes, championOf(nodes));
  }

  /**
   * Record the winner of a confirmed knockout match and schedule whatever
   * became playable.
   *
   * Caller must hold the BRACKET lock for the tournament.
   */
  async advance(
    client: PoolClient,
    tournament: Tournament,
    nodeIndex: number,
    winnerTeamId: number
  ): Promise<Bracket> {
    const nodes = await this.bracketRepo.findByTournament(tournament.id, client);
    if (nodes.length === 0) throw TournamentErrors.bracketNotGenerated(tournament.id);

    const outcome = advanceNode(nodes, nodeIndex, winnerTeamId);
    if (!outcome.ok) {
      throw new InvalidStateException(outcome.error.message);
    }

    const { changed, readied } = outcome.change;
    const next = await this.scheduleMatches(client, tournament, outcome.change.nodes, readied);
    const touched = new Set([...changed, ...readied]);
    await this.bracketRepo.updateNodes(
      tournament.id,
      next.filter((node) => touched.has(node.index)),
      client
    );

    const parentIndex = next[nodeIndex].parent;
    const nextMatchId = parentIndex === null ? null : next[parentIndex].matchId;
    tryGetEventBus()?.publish({
      type: EventTypes.BRACKET_ADVANCED,
      tournamentId: tournament.id,
      payload: { tournamentId: tournament.id, nodeIndex, winnerTeamId, nextMatchId },
    });

    return toBracketView(tournament.id, next, championOf(next));
  }

  /**
   * Create the match of every newly READY node, one round interval after the
   * later of its feeder matches.
   */
  private async scheduleMatches(
    client: PoolClient,
    tournament: Tournament,
    nodes: BracketNodeData[],
    readied: number[]
  ): Promise<BracketNodeData[]> {
    const next = nodes.map((node) => ({ ...node }));
    const size = next.filter(isLeaf).length;
    // Nodes without feeder matches open the knockout stage after everything scheduled so far
    let openingAfter: Date | null = null;

    for (const index of readied) {
      const node = next[index];
      const [homeTeamId, awayTeamId] = nodeTeams(next, index);
      if (homeTeamId === null || awayTeamId === null) {
        throw new InvalidStateException(`Bracket node ${index} is READY without two teams`);
      }

      const feederMatchIds = [node.left, node.right]
        .map((child) => (child === null ? null : next[child].matchId))
        .filter((matchId): matchId is number => matchId !== null);
      let after: Date;
      if (feederMatchIds.length > 0) {
        after =
          (await this.matchesRepo.latestScheduledAt(tournament.id, feederMatchIds, client)) ??
          tournament.startsAt;
      } else {
        if (openingAfter === null) {
          openingAfter =
            (await this.matchesRepo.latestScheduledAt(tournament.id, [], client)) ?? tournament.startsAt;
        }
        after = openingAfter;
      }

      const match = await this.matchesRepo.create(
        {
          tournamentId: tournament.id,
          stage: stageForNode(node, size),
          groupNumber: null,
          bracketNode: index,
          scheduledAt: addDays(after, tournament.rules.knockoutRoundIntervalDays),
          homeTeamId,
          awayTeamId,
        },
        client
      );
      node.matchId = match.id;
    }

    return next;
  }
}
