import { DomainEvent, DomainEventSubscriber, EventPayloads, EventTypes } from './domain-event-bus';
import type { TeamsRepository } from '../../modules/teams/teams.repository';
import { logger } from '../../config/logger.config';

export type NotificationKind =
  | 'CONFIRMATION_REQUIRED'
  | 'MATCH_CONFIRMED'
  | 'RESULT_DISPUTED'
  | 'TOURNAMENT_COMPLETED';

export interface TournamentNotification {
  kind: NotificationKind;
  /** Users to notify; empty for administrative queues */
  recipientIds: string[];
  tournamentId: number | null;
  data: Record<string, string>;
}

/**
 * Delivery channel supplied by the embedding application (email, push, admin queue).
 */
export interface NotificationSink {
  deliver(notification: TournamentNotification): Promise<void>;
}

/**
 * NotificationEventSubscriber translates domain events into notifications for
 * the collaborator to fan out. Every notification is also written to the log.
 */
export class NotificationEventSubscriber implements DomainEventSubscriber {
  constructor(
    private readonly teamsRepo: TeamsRepository,
    private readonly sink: NotificationSink | null = null
  ) {}

  async handle(event: DomainEvent): Promise<void> {
    try {
      switch (event.type) {
        case EventTypes.RESULT_SUBMITTED:
          await this.handleResultSubmitted(event.payload);
          break;
        case EventTypes.MATCH_CONFIRMED:
          await this.handleMatchConfirmed(event.payload);
          break;
        case EventTypes.RESULT_DISPUTED:
          await this.send({
            kind: 'RESULT_DISPUTED',
            recipientIds: [],
            tournamentId: event.tournamentId ?? null,
            data: {
              matchId: String(event.payload.matchId),
              disputerId: event.payload.disputerId,
            },
          });
          break;
        case EventTypes.TOURNAMENT_COMPLETED:
          await this.send({
            kind: 'TOURNAMENT_COMPLETED',
            recipientIds: [],
            tournamentId: event.payload.tournamentId,
            data: { championTeamId: String(event.payload.championTeamId) },
          });
          break;
        default:
          // Not all events need notifications
          break;
      }
    } catch (error) {
      logger.error(`NotificationEventSubscriber error for ${event.type}: ${error}`);
    }
  }

  private async handleResultSubmitted(payload: EventPayloads['result:submitted']): Promise<void> {
    if (payload.awaitingTeamId === null) return;

    const team = await this.teamsRepo.findById(payload.awaitingTeamId);
    if (!team) return;

    await this.send({
      kind: 'CONFIRMATION_REQUIRED',
      recipientIds: [team.managerId],
      tournamentId: payload.tournamentId,
      data: {
        matchId: String(payload.matchId),
        team: team.name,
        score: `${payload.homeScore}-${payload.awayScore}`,
      },
    });
  }

  private async handleMatchConfirmed(payload: EventPayloads['match:confirmed']): Promise<void> {
    const managers = await this.teamsRepo.findManagersForMatch(payload.matchId);

    await this.send({
      kind: 'MATCH_CONFIRMED',
      recipientIds: managers,
      tournamentId: payload.tournamentId,
      data: {
        matchId: String(payload.matchId),
        score: `${payload.homeScore}-${payload.awayScore}`,
        confirmedAt: payload.timestamp.toISOString(),
      },
    });
  }

  private async send(notification: TournamentNotification): Promise<void> {
    logger.info(`Tournament notification: ${notification.kind}`, {
      tournamentId: notification.tournamentId,
      recipients: notification.recipientIds.length,
      ...notification.data,
    });

    if (this.sink) {
      await this.sink.deliver(notification);
    }
  }
}
