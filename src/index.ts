export { bootstrap, type BootstrapOptions } from './bootstrap';
export { TournamentEngine, type TournamentEngineDeps } from './engine';
export * from './domain';
export * from './utils/exceptions';
export {
  DomainEventBus,
  EventTypes,
  NotificationEventSubscriber,
  type DomainEvent,
  type DomainEventSubscriber,
  type EventPayloads,
  type EventType,
  type NotificationSink,
} from './shared/events';
export type { TournamentNotification, NotificationKind } from './shared/events/notification-event-subscriber';
export type { Tournament } from './modules/tournaments/tournaments.model';
export type { Team, TeamWithRoster } from './modules/teams/teams.model';
export type { Match, MatchResult, MatchWithResult } from './modules/matches/matches.model';
export type { ScoreInput } from './modules/matches/matches.schemas';
export type { StandingsRow } from './modules/standings/standings.model';
export type { Bracket, BracketNodeView } from './modules/bracket/bracket.model';
export { runMigrations } from './db/migrate';
