/**
 * Payment reference taxonomy: ASPIR-REG-, ASPIR-COURSE- and ASPIR-FULL- prefixes
 * carry the registration id plus an optional per-attempt suffix.
 */

import { v4 as uuidv4 } from 'uuid';
import type { PaymentType } from '../../types/tables';

export const REFERENCE_PREFIXES: Record<PaymentType, string> = {
  registration_fee: 'ASPIR-REG-',
  course_fee: 'ASPIR-COURSE-',
  full_payment: 'ASPIR-FULL-',
};

const PAYMENT_TYPES: readonly PaymentType[] = ['registration_fee', 'course_fee', 'full_payment'];

const REGISTRATION_ID_LENGTH = 36;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type PaymentIntent =
  | {
      kind: PaymentType;
      reference: string;
      registrationId: string;
      attemptSuffix?: string;
    }
  | {
      kind: 'legacy';
      reference: string;
    };

/**
 * Classify a reference by prefix. A prefixed reference whose id segment is not a
 * UUID is treated as legacy so it still gets a stored-reference lookup.
 */
export function parsePaymentReference(reference: string): PaymentIntent {
  const trimmed = reference.trim();
  for (const kind of PAYMENT_TYPES) {
    const prefix = REFERENCE_PREFIXES[kind];
    if (!trimmed.startsWith(prefix)) continue;
    const rest = trimmed.slice(prefix.length);
    const registrationId = rest.slice(0, REGISTRATION_ID_LENGTH);
    if (!UUID_PATTERN.test(registrationId)) break;
    const tail = rest.slice(REGISTRATION_ID_LENGTH);
    if (tail === '') return { kind, reference: trimmed, registrationId: registrationId.toLowerCase() };
    if (!tail.startsWith('-') || tail.length === 1) break;
    return {
      kind,
      reference: trimmed,
      registrationId: registrationId.toLowerCase(),
      attemptSuffix: tail.slice(1),
    };
  }
  return { kind: 'legacy', reference: trimmed };
}

export function newAttemptSuffix(): string {
  return uuidv4().replaceAll('-', '').slice(0, 8);
}

export function buildPaymentReference(
  kind: PaymentType,
  registrationId: string,
  attemptSuffix: string | null = newAttemptSuffix()
): string {
  const base = `${REFERENCE_PREFIXES[kind]}${registrationId}`;
  return attemptSuffix ? `${base}-${attemptSuffix}` : base;
}

export function isPaymentType(value: unknown): value is PaymentType {
  return PAYMENT_TYPES.some((t) => t === value);
}

/**
 * The prefix decides; a legacy reference falls back to the charge metadata and then
 * to full_payment so a complete payment is never under-counted.
 */
export function resolvePaymentType(intent: PaymentIntent, metadataPaymentType?: unknown): PaymentType {
  if (intent.kind !== 'legacy') return intent.kind;
  return isPaymentType(metadataPaymentType) ? metadataPaymentType : 'full_payment';
}
