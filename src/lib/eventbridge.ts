/**
 * EventBridge publish helper for domain events.
 */

import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { v4 as uuidv4 } from 'uuid';
import type { DomainEvent, DomainEventData, DomainEventType } from '../types/events';

export const EVENT_SOURCE = 'program.registrations';

const client = new EventBridgeClient({});

export function buildDomainEvent(eventType: DomainEventType, data: DomainEventData): DomainEvent {
  return {
    eventId: uuidv4(),
    eventType,
    source: EVENT_SOURCE,
    timestamp: new Date().toISOString(),
    version: '1',
    data,
  };
}

export async function publishEvent(event: DomainEvent, eventBusName: string): Promise<void> {
  const result = await client.send(
    new PutEventsCommand({
      Entries: [
        {
          Source: event.source,
          DetailType: event.eventType,
          Detail: JSON.stringify(event),
          EventBusName: eventBusName,
        },
      ],
    })
  );
  if (result.FailedEntryCount) {
    throw new Error(`EventBridge rejected ${event.eventType}: ${result.Entries?.[0]?.ErrorMessage ?? 'unknown error'}`);
  }
}
