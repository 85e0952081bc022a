import type { Pool } from 'pg';
import type { DomainEventBus } from './shared/events/domain-event-bus';
import type { LockOptions } from './shared/locks';
import type { TournamentsRepository } from './modules/tournaments/tournaments.repository';
import type { TeamsRepository } from './modules/teams/teams.repository';
import type { MatchesRepository } from './modules/matches/matches.repository';
import type { StandingsRepository } from './modules/standings/standings.repository';
import type { BracketRepository } from './modules/bracket/bracket.repository';
import type { TeamsService } from './modules/teams/teams.service';
import type { MatchesService } from './modules/matches/matches.service';
import type { StandingsService } from './modules/standings/standings.service';
import type { BracketService } from './modules/bracket/bracket.service';
import type { ProgressionService } from './modules/progression/progression.service';
import type { TournamentsService } from './modules/tournaments/tournaments.service';

export const KEYS = {
  // Database
  POOL: 'pool',
  LOCK_OPTIONS: 'lockOptions',

  // Events
  DOMAIN_EVENT_BUS: 'domainEventBus',

  // Repositories
  TOURNAMENTS_REPO: 'tournamentsRepo',
  TEAMS_REPO: 'teamsRepo',
  MATCHES_REPO: 'matchesRepo',
  STANDINGS_REPO: 'standingsRepo',
  BRACKET_REPO: 'bracketRepo',

  // Services
  TEAMS_SERVICE: 'teamsService',
  MATCHES_SERVICE: 'matchesService',
  STANDINGS_SERVICE: 'standingsService',
  BRACKET_SERVICE: 'bracketService',
  PROGRESSION_SERVICE: 'progressionService',
  TOURNAMENTS_SERVICE: 'tournamentsService',
} as const;

/**
 * Type of the instance registered under each key.
 */
export interface ServiceMap {
  pool: Pool;
  lockOptions: LockOptions;
  domainEventBus: DomainEventBus;
  tournamentsRepo: TournamentsRepository;
  teamsRepo: TeamsRepository;
  matchesRepo: MatchesRepository;
  standingsRepo: StandingsRepository;
  bracketRepo: BracketRepository;
  teamsService: TeamsService;
  matchesService: MatchesService;
  standingsService: StandingsService;
  bracketService: BracketService;
  progressionService: ProgressionService;
  tournamentsService: TournamentsService;
}

export type ServiceKey = keyof ServiceMap;

interface Slot<T> {
  factory?: () => T;
  instance?: T;
}

type Registry = { [K in ServiceKey]: Slot<ServiceMap[K]> };

function emptyRegistry(): Registry {
  return {
    pool: {},
    lockOptions: {},
    domainEventBus: {},
    tournamentsRepo: {},
    teamsRepo: {},
    matchesRepo: {},
    standingsRepo: {},
    bracketRepo: {},
    teamsService: {},
    matchesService: {},
    standingsService: {},
    bracketService: {},
    progressionService: {},
    tournamentsService: {},
  };
}

class Container {
  private slots: Registry = emptyRegistry();

  register<K extends ServiceKey>(key: K, factory: () => ServiceMap[K]): void {
    const slot: Slot<ServiceMap[K]> = this.slots[key];
    slot.factory = factory;
  }

  resolve<K extends ServiceKey>(key: K): ServiceMap[K] {
    const slot: Slot<ServiceMap[K]> = this.slots[key];
    // Return cached instance if exists
    if (slot.instance !== undefined) {
      return slot.instance;
    }

    if (!slot.factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = slot.factory();
    slot.instance = instance;
    return instance;
  }

  /**
   * Resolve if registered, otherwise null (used where tests run without bootstrap).
   */
  tryResolve<K extends ServiceKey>(key: K): ServiceMap[K] | null {
    const slot: Slot<ServiceMap[K]> = this.slots[key];
    if (slot.instance === undefined && !slot.factory) {
      return null;
    }
    return this.resolve(key);
  }

  // For testing: clear all instances
  clearInstances(): void {
    for (const slot of Object.values(this.slots)) {
      slot.instance = undefined;
    }
  }

  // For testing: drop factories as well
  reset(): void {
    this.slots = emptyRegistry();
  }

  // For testing: override with mock
  override<K extends ServiceKey>(key: K, instance: ServiceMap[K]): void {
    const slot: Slot<ServiceMap[K]> = this.slots[key];
    slot.instance = instance;
  }
}

export const container = new Container();
