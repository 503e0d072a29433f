/**
 * Reference -> Registration resolution. Strategies run in order; the first hit wins.
 */

import { ReferenceResolutionError } from '../../lib/errors';
import type { RegistrationStore } from '../../ports/registrationStore';
import type { RegistrationRecord } from '../../types/tables';
import { parsePaymentReference, type PaymentIntent } from './references';

export type ResolverStrategy = (
  intent: PaymentIntent,
  store: RegistrationStore
) => Promise<RegistrationRecord | null>;

export const byEmbeddedRegistrationId: ResolverStrategy = async (intent, store) =>
  intent.kind === 'legacy' ? null : store.getRegistration(intent.registrationId);

export const bySquadReference: ResolverStrategy = async (intent, store) =>
  store.findByGatewayReference('squad', intent.reference);

export const byPaystackReference: ResolverStrategy = async (intent, store) =>
  store.findByGatewayReference('paystack', intent.reference);

export const DEFAULT_STRATEGIES: readonly ResolverStrategy[] = [
  byEmbeddedRegistrationId,
  bySquadReference,
  byPaystackReference,
];

export interface ResolvedReference {
  intent: PaymentIntent;
  registration: RegistrationRecord;
}

export async function resolveRegistration(
  reference: string,
  store: RegistrationStore,
  strategies: readonly ResolverStrategy[] = DEFAULT_STRATEGIES
): Promise<ResolvedReference> {
  const intent = parsePaymentReference(reference);
  for (const strategy of strategies) {
    const registration = await strategy(intent, store);
    if (registration) return { intent, registration };
  }
  throw new ReferenceResolutionError(intent.reference);
}
