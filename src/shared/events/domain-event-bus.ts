import { AsyncLocalStorage } from 'node:async_hooks';
import { logger } from '../../config/logger.config';
import type { KnockoutStage, MatchSide, TournamentStatus } from '../../domain';

/**
 * Event type constants for type-safe event publishing.
 */
export const EventTypes = {
  // Result confirmation
  RESULT_SUBMITTED: 'result:submitted',
  RESULT_DISPUTED: 'result:disputed',
  MATCH_CONFIRMED: 'match:confirmed',
  MATCH_REOPENED: 'match:reopened',

  // Derived state
  STANDINGS_UPDATED: 'standings:updated',
  BRACKET_GENERATED: 'bracket:generated',
  BRACKET_ADVANCED: 'bracket:advanced',

  // Tournament lifecycle
  TOURNAMENT_STAGE_CHANGED: 'tournament:stage_changed',
  TOURNAMENT_COMPLETED: 'tournament:completed',

  // Team registry
  ROSTER_UPDATED: 'roster:updated',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Payload carried by each event type.
 */
export interface EventPayloads {
  'result:submitted': {
    matchId: number;
    tournamentId: number;
    submittedBy: string;
    submittedBySide: MatchSide;
    /** Team whose manager still has to confirm, null once both sides are in */
    awaitingTeamId: number | null;
    homeScore: number;
    awayScore: number;
  };
  'result:disputed': {
    matchId: number;
    disputerId: string;
  };
  'match:confirmed': {
    matchId: number;
    tournamentId: number;
    homeScore: number;
    awayScore: number;
    timestamp: Date;
  };
  'match:reopened': {
    matchId: number;
    tournamentId: number;
    reopenedBy: string;
  };
  'standings:updated': {
    tournamentId: number;
    groupNumber: number;
  };
  'bracket:generated': {
    tournamentId: number;
    nodeCount: number;
    firstRoundStage: KnockoutStage;
  };
  'bracket:advanced': {
    tournamentId: number;
    nodeIndex: number;
    winnerTeamId: number;
    nextMatchId: number | null;
  };
  'tournament:stage_changed': {
    tournamentId: number;
    from: TournamentStatus;
    to: TournamentStatus;
  };
  'tournament:completed': {
    tournamentId: number;
    championTeamId: number;
  };
  'roster:updated': {
    teamId: number;
    rosterSize: number;
    registrationComplete: boolean;
  };
}

interface DomainEventOf<K extends EventType> {
  /** Event type identifier (e.g., 'match:confirmed') */
  type: K;
  /** Tournament ID for routing (optional) */
  tournamentId?: number;
  /** User ID for user-specific routing (optional) */
  userId?: string;
  /** Event payload data */
  payload: EventPayloads[K];
  /** Timestamp when event was created */
  timestamp: Date;
}

/**
 * Represents a domain event that can be published and subscribed to.
 * Events are decoupled from transport (notifications, admin queues, etc.).
 */
export type DomainEvent = { [K in EventType]: DomainEventOf<K> }[EventType];

export type DomainEventInput = { [K in EventType]: Omit<DomainEventOf<K>, 'timestamp'> }[EventType];

/**
 * Subscriber interface for handling domain events.
 */
export interface DomainEventSubscriber {
  handle(event: DomainEvent): void | Promise<void>;
}

/**
 * Transaction context for event queuing.
 * Tracks pending events per async context using AsyncLocalStorage.
 */
interface TransactionContext {
  pendingEvents: DomainEvent[];
}

/**
 * DomainEventBus provides a decoupled way to publish events from domain logic.
 *
 * Key features:
 * - Transaction awareness: events published inside a transaction are queued
 *   and dispatched only after commit, and discarded on rollback
 * - AsyncLocalStorage scopes the queue to one async context, so concurrent
 *   operations never see each other's pending events
 * - Multiple subscribers: notifications, logging, admin queues
 *
 * Usage (typically handled by transaction-runner.ts):
 * ```typescript
 * await eventBus.runInTransaction(async () => {
 *   await client.query('BEGIN');
 *   eventBus.publish({ type: EventTypes.MATCH_CONFIRMED, tournamentId, payload });
 *   await client.query('COMMIT');
 *   eventBus.commitTransaction();
 * });
 * ```
 */
export class DomainEventBus {
  private subscribers: DomainEventSubscriber[] = [];

  private asyncStorage = new AsyncLocalStorage<TransactionContext>();

  /**
   * Register a subscriber to receive all published events.
   */
  subscribe(subscriber: DomainEventSubscriber): void {
    this.subscribers.push(subscriber);
  }

  /**
   * Unsubscribe a previously registered subscriber.
   */
  unsubscribe(subscriber: DomainEventSubscriber): void {
    const index = this.subscribers.indexOf(subscriber);
    if (index !== -1) {
      this.subscribers.splice(index, 1);
    }
  }

  /**
   * Publish an event. If in a transaction, queues until commit.
   * Otherwise, dispatches immediately.
   */
  publish(event: DomainEventInput): void {
    const fullEvent: DomainEvent = {
      ...event,
      timestamp: new Date(),
    };

    const currentTx = this.asyncStorage.getStore();
    if (currentTx) {
      currentTx.pendingEvents.push(fullEvent);
    } else {
      this.dispatch(fullEvent);
    }
  }

  /**
   * Commit the current transaction, dispatching all queued events.
   */
  commitTransaction(): void {
    const tx = this.asyncStorage.getStore();
    if (!tx) {
      logger.warn('commitTransaction called without active transaction');
      return;
    }

    const events = [...tx.pendingEvents];
    tx.pendingEvents = [];

    for (const event of events) {
      this.dispatch(event);
    }
  }

  /**
   * Rollback the current transaction, discarding all queued events.
   */
  rollbackTransaction(): void {
    const tx = this.asyncStorage.getStore();
    if (!tx) {
      logger.warn('rollbackTransaction called without active transaction');
      return;
    }
    tx.pendingEvents = [];
  }

  /**
   * Check if currently in a transaction.
   */
  isInTransaction(): boolean {
    return this.asyncStorage.getStore() !== undefined;
  }

  /**
   * Get the number of pending events in the current transaction.
   */
  getPendingEventCount(): number {
    const tx = this.asyncStorage.getStore();
    return tx?.pendingEvents.length ?? 0;
  }

  /**
   * Run a function within a transaction context.
   *
   * @param fn - Async function to execute within transaction context
   * @returns Result of the callback function
   */
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const context: TransactionContext = { pendingEvents: [] };
    return this.asyncStorage.run(context, fn);
  }

  private dispatch(event: DomainEvent): void {
    for (const subscriber of this.subscribers) {
      try {
        const result = subscriber.handle(event);
        // Handle async subscribers without blocking
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logger.error(`Event subscriber error for ${event.type}: ${error}`);
          });
        }
      } catch (error) {
        logger.error(`Event subscriber sync error for ${event.type}: ${error}`);
      }
    }
  }
}
