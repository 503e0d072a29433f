/**
 * Domain event envelope and payload types.
 */

import type { GatewayName, PaymentActivityStatus, PaymentType } from './tables';

export type DomainEventType =
  | 'payment.initiated'
  | 'payment.succeeded'
  | 'payment.failed'
  | 'participant_id.allocated';

export interface DomainEventData {
  registrationId: string;
  reference?: string;
  paymentType?: PaymentType;
  gateway?: GatewayName;
  amountCents?: number;
  currency?: string;
  fullyPaid?: boolean;
  participantId?: string;
  [key: string]: unknown;
}

export interface DomainEvent {
  eventId: string;
  eventType: DomainEventType;
  source: string;
  timestamp: string;
  version: string;
  data: DomainEventData;
}

export function activityStatusToDomainEventType(status: PaymentActivityStatus): DomainEventType {
  const map: Record<PaymentActivityStatus, DomainEventType> = {
    initiated: 'payment.initiated',
    success: 'payment.succeeded',
    failed: 'payment.failed',
  };
  return map[status];
}
