import type { Logger } from 'pino';
import { DomainEvent } from '../types/inventory.types';
import { INVENTORY_EVENTS_EXCHANGE, publishEvent } from '../messaging/client';
import { createChildLogger } from '../utils/logger';

/**
 * Sink for audit events. Storage and querying of the events belong to the
 * consumer; the engine only emits.
 */
export interface EventPublisher {
     publish(event: DomainEvent): Promise<void>;
}

export class LogEventPublisher implements EventPublisher {
     private readonly log = createChildLogger({ component: 'events' });

     async publish(event: DomainEvent): Promise<void> {
          this.log.debug({ event }, event.type);
     }
}

export class AmqpEventPublisher implements EventPublisher {
     async publish(event: DomainEvent): Promise<void> {
          await publishEvent(INVENTORY_EVENTS_EXCHANGE, `inventory.${event.type}`, {
               type: event.type,
               actor: event.actor,
               occurredAt: event.occurredAt,
               ...event.payload,
          });
     }
}

export function createEventPublisher(): EventPublisher {
     const publisherType = process.env.EVENT_PUBLISHER || 'log';

     if (publisherType === 'amqp') {
          return new AmqpEventPublisher();
     }

     return new LogEventPublisher();
}

/**
 * Publishes events of an operation that already committed. A failed publish
 * is logged; it never turns the committed operation into a failure.
 */
export async function emitAll(
     publisher: EventPublisher,
     events: DomainEvent[],
     log: Logger
): Promise<void> {
     for (const event of events) {
          try {
               await publisher.publish(event);
          } catch (err) {
               log.error({ err, eventType: event.type }, 'Failed to publish domain event');
          }
     }
}

export function domainEvent(
     type: DomainEvent['type'],
     actor: string,
     payload: Record<string, unknown>
): DomainEvent {
     return { type, actor, payload, occurredAt: new Date().toISOString() };
}
