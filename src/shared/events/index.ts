export {
  DomainEventBus,
  EventTypes,
  type DomainEvent,
  type DomainEventInput,
  type DomainEventSubscriber,
  type EventPayloads,
  type EventType,
} from './domain-event-bus';

export { NotificationEventSubscriber, type NotificationSink } from './notification-event-subscriber';

import { container, KEYS } from '../../container';
import type { DomainEventBus } from './domain-event-bus';

/**
 * Safely get the domain event bus, returning null if not registered.
 * This is useful for code that may run in test environments where
 * the event bus is not bootstrapped.
 */
export function tryGetEventBus(): DomainEventBus | null {
  return container.tryResolve(KEYS.DOMAIN_EVENT_BUS);
}
