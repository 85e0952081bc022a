import { Pool } from 'pg';
import { getEnv } from './config/env.config';
import { container, KEYS } from './container';
import { createPool } from './db/pool';
import { configureLockDefaults, type LockOptions } from './shared/locks';
import {
  DomainEventBus,
  NotificationEventSubscriber,
  type NotificationSink,
} from './shared/events';
import type { RandomSource } from './domain';

// Repositories
import { TournamentsRepository } from './modules/tournaments/tournaments.repository';
import { TeamsRepository } from './modules/teams/teams.repository';
import { MatchesRepository } from './modules/matches/matches.repository';
import { StandingsRepository } from './modules/standings/standings.repository';
import { BracketRepository } from './modules/bracket/bracket.repository';

// Services
import { TeamsService } from './modules/teams/teams.service';
import { MatchesService } from './modules/matches/matches.service';
import { StandingsService } from './modules/standings/standings.service';
import { BracketService } from './modules/bracket/bracket.service';
import { ProgressionService } from './modules/progression/progression.service';
import { TournamentsService } from './modules/tournaments/tournaments.service';

import { TournamentEngine } from './engine';

export interface BootstrapOptions {
  /** Defaults to a pool built from DATABASE_URL */
  pool?: Pool;
  /** Where notifications go besides the log */
  notificationSink?: NotificationSink;
  /** Random source for the group draw */
  random?: RandomSource;
  lockOptions?: LockOptions;
}

function lockOptionsFromEnv(): LockOptions {
  const env = getEnv();
  return {
    timeoutMs: env.LOCK_TIMEOUT_MS,
    slowThresholdMs: env.SLOW_LOCK_THRESHOLD_MS,
  };
}

/**
 * Register every repository and service and return the engine facade.
 */
export function bootstrap(options: BootstrapOptions = {}): TournamentEngine {
  container.reset();

  // Database
  const pool = options.pool ?? createPool();
  container.register(KEYS.POOL, () => pool);

  const lockOptions: LockOptions = options.lockOptions ?? lockOptionsFromEnv();
  configureLockDefaults(lockOptions);
  container.register(KEYS.LOCK_OPTIONS, () => lockOptions);

  // Repositories
  container.register(KEYS.TOURNAMENTS_REPO, () => new TournamentsRepository(container.resolve(KEYS.POOL)));
  container.register(KEYS.TEAMS_REPO, () => new TeamsRepository(container.resolve(KEYS.POOL)));
  container.register(KEYS.MATCHES_REPO, () => new MatchesRepository(container.resolve(KEYS.POOL)));
  container.register(KEYS.STANDINGS_REPO, () => new StandingsRepository(container.resolve(KEYS.POOL)));
  container.register(KEYS.BRACKET_REPO, () => new BracketRepository(container.resolve(KEYS.POOL)));

  // Events
  container.register(KEYS.DOMAIN_EVENT_BUS, () => {
    const eventBus = new DomainEventBus();
    eventBus.subscribe(
      new NotificationEventSubscriber(
        container.resolve(KEYS.TEAMS_REPO),
        options.notificationSink ?? null
      )
    );
    return eventBus;
  });

  // Services
  container.register(
    KEYS.TEAMS_SERVICE,
    () =>
      new TeamsService(
        container.resolve(KEYS.POOL),
        container.resolve(KEYS.TEAMS_REPO),
        container.resolve(KEYS.TOURNAMENTS_REPO)
      )
  );
  container.register(KEYS.MATCHES_SERVICE, () => new MatchesService(container.resolve(KEYS.MATCHES_REPO)));
  container.register(
    KEYS.STANDINGS_SERVICE,
    () =>
      new StandingsService(
        container.resolve(KEYS.POOL),
        container.resolve(KEYS.STANDINGS_REPO),
        container.resolve(KEYS.MATCHES_REPO),
        container.resolve(KEYS.TEAMS_REPO),
        container.resolve(KEYS.TOURNAMENTS_REPO)
      )
  );
  container.register(
    KEYS.BRACKET_SERVICE,
    () =>
      new BracketService(
        container.resolve(KEYS.BRACKET_REPO),
        container.resolve(KEYS.MATCHES_REPO),
        container.resolve(KEYS.TOURNAMENTS_REPO),
        container.resolve(KEYS.STANDINGS_SERVICE)
      )
  );
  container.register(
    KEYS.PROGRESSION_SERVICE,
    () =>
      new ProgressionService(
        container.resolve(KEYS.POOL),
        container.resolve(KEYS.TOURNAMENTS_REPO),
        container.resolve(KEYS.MATCHES_REPO),
        container.resolve(KEYS.STANDINGS_SERVICE),
        container.resolve(KEYS.BRACKET_SERVICE)
      )
  );
  container.register(
    KEYS.TOURNAMENTS_SERVICE,
    () =>
      new TournamentsService(
        container.resolve(KEYS.POOL),
        container.resolve(KEYS.TOURNAMENTS_REPO),
        container.resolve(KEYS.TEAMS_REPO),
        container.resolve(KEYS.MATCHES_REPO),
        container.resolve(KEYS.STANDINGS_REPO),
        options.random
      )
  );

  // Resolve eagerly so transactions find the bus
  container.resolve(KEYS.DOMAIN_EVENT_BUS);

  return TournamentEngine.fromContainer();
}
