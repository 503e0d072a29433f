/**
 * Payment state reconciler: applies a gateway-reported outcome to a registration.
 *
 * The registration update, the transaction record, the activity row and (when the
 * payment completes the registration) the participant-ID claim are committed as one
 * DynamoDB transaction. A reference that already has a transaction is reported as
 * already_reconciled with no state change and no notifications. Notifications and
 * the domain event run after the commit; their failures are logged, never raised.
 */

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, RegistrationNotFoundError, ValidationError, errorMessage } from '../../lib/errors';
import type { ExchangeRateSource } from '../../ports/exchangeRate';
import type { GatewayPaymentEvent, PaymentGatewayPort } from '../../ports/paymentGateway';
import { toPaymentEvent } from '../../ports/paymentGateway';
import type { ParticipantClaim, RegistrationStore } from '../../ports/registrationStore';
import type { DomainEvent } from '../../types/events';
import { activityStatusToDomainEventType } from '../../types/events';
import type {
  GatewayName,
  PaymentActivityRecord,
  PaymentType,
  RegistrationRecord,
  TransactionRecord,
} from '../../types/tables';
import { METADATA_SK, activitySk, registrationPk, transactionPk } from '../../types/tables';
import { buildDomainEvent } from '../../lib/eventbridge';
import { selectParticipantEmail, type PaymentNotifier } from '../notifications/notifier';
import type { ParticipantEmailKind } from '../notifications/templates';
import { planParticipantClaim } from '../participants/allocator';
import { resolvePaymentType } from '../references/references';
import { resolveRegistration } from '../references/resolver';
import { LEDGER_CURRENCY, formatUsd, parseMetadataRate, subunitToUsdCents } from './amounts';
import { applyPaymentOutcome, isFullyPaid } from './transitions';

export interface ReconcilerDeps {
  store: RegistrationStore;
  exchangeRate: ExchangeRateSource;
  notifier: PaymentNotifier;
  /** Domain event sink; omitted when no event bus is configured. */
  publish?: (event: DomainEvent) => Promise<void>;
  maxRetries: number;
}

export type ReconcileStatus = 'reconciled' | 'already_reconciled';

export interface ReconcileResult {
  status: ReconcileStatus;
  outcome: GatewayPaymentEvent['outcome'];
  registrationId: string;
  reference: string;
  paymentType: PaymentType;
  amountCents: number;
  fullyPaid: boolean;
  participantId?: string;
  participantEmail?: ParticipantEmailKind;
}

/** Rate used to bring the charge into USD: the one quoted at initiation, else the current one. */
async function chargeRate(event: GatewayPaymentEvent, source: ExchangeRateSource): Promise<number> {
  if (event.currency.toUpperCase() === LEDGER_CURRENCY) return 1;
  return parseMetadataRate(event.metadata.exchange_rate) ?? (await source.getUsdToLocalRate());
}

async function runSideEffect(label: string, registrationId: string, effect: () => Promise<void>): Promise<boolean> {
  try {
    await effect();
    return true;
  } catch (err) {
    console.error(JSON.stringify({ level: 'ERROR', message: `${label} failed`, registrationId, error: errorMessage(err) }));
    return false;
  }
}

export async function reconcilePaymentEvent(event: GatewayPaymentEvent, deps: ReconcilerDeps): Promise<ReconcileResult> {
  const { store } = deps;
  const { intent, registration: resolved } = await resolveRegistration(event.reference, store);
  const reference = intent.reference;
  const paymentType = resolvePaymentType(intent, event.metadata.payment_type);
  const base = { outcome: event.outcome, registrationId: resolved.registrationId, reference, paymentType };

  if (event.outcome === 'success' && (await store.hasTransaction(reference))) {
    return { ...base, status: 'already_reconciled', amountCents: 0, fullyPaid: isFullyPaid(resolved), participantId: resolved.participantId };
  }

  const amountCents = subunitToUsdCents(event.amountSubunit, event.currency, await chargeRate(event, deps.exchangeRate));

  let registration: RegistrationRecord = resolved;
  let committed: { registration: RegistrationRecord; claim?: ParticipantClaim; activity: PaymentActivityRecord } | null = null;
  for (let attempt = 0; attempt < deps.maxRetries && !committed; attempt++) {
    if (attempt > 0) {
      const reloaded = await store.getRegistration(registration.registrationId);
      if (!reloaded) throw new RegistrationNotFoundError(registration.registrationId);
      registration = reloaded;
    }
    const next = applyPaymentOutcome(registration, paymentType, event.outcome);
    const claim =
      event.outcome === 'success' && isFullyPaid(next) && registration.cohortCode && !registration.participantId
        ? await planParticipantClaim(store, registration.cohortCode)
        : undefined;

    const now = new Date().toISOString();
    const transaction: TransactionRecord | undefined =
      event.outcome === 'success'
        ? {
            PK: transactionPk(reference),
            SK: METADATA_SK,
            reference,
            registrationId: registration.registrationId,
            amountCents,
            currency: LEDGER_CURRENCY,
            paidAt: event.paidAt || now,
            channel: event.channel,
            gateway: event.gateway,
            rawPayload: event.rawPayload,
            createdAt: now,
          }
        : undefined;
    const activity: PaymentActivityRecord = {
      PK: registrationPk(registration.registrationId),
      SK: activitySk(now, uuidv4()),
      registrationId: registration.registrationId,
      reference,
      status: event.outcome,
      paymentType,
      amountCents,
      currency: LEDGER_CURRENCY,
      gateway: event.gateway,
      message: event.outcome === 'success' ? `${formatUsd(amountCents)} received` : 'Gateway reported the payment as failed',
      createdAt: now,
    };

    const outcome = await store.commitPaymentOutcome({
      registration,
      registrationFeePaid: next.registrationFeePaid,
      courseFeePaid: next.courseFeePaid,
      status: next.status,
      transaction,
      activity,
      participantClaim: claim,
    });
    if (outcome === 'duplicate_transaction') {
      return { ...base, status: 'already_reconciled', amountCents: 0, fullyPaid: isFullyPaid(registration), participantId: registration.participantId };
    }
    if (outcome === 'committed') {
      committed = {
        registration: { ...registration, ...next, participantId: claim?.participantId ?? registration.participantId },
        claim,
        activity,
      };
    }
  }
  if (!committed) throw new ConflictError(`Registration ${registration.registrationId} kept changing; reconciliation of ${reference} gave up`);

  const updated = committed.registration;
  const fullyPaid = isFullyPaid(updated);
  console.info(JSON.stringify({
    level: 'INFO',
    message: 'Payment reconciled',
    registrationId: updated.registrationId,
    reference,
    outcome: event.outcome,
    paymentType,
    amountCents,
    status: updated.status,
    participantId: committed.claim?.participantId,
  }));

  const result: ReconcileResult = { ...base, status: 'reconciled', amountCents, fullyPaid, participantId: updated.participantId };

  if (event.outcome === 'success') {
    const kind = selectParticipantEmail(paymentType, fullyPaid);
    if (await runSideEffect('Participant email', updated.registrationId, () => deps.notifier.sendParticipantEmail(kind, updated))) {
      result.participantEmail = kind;
    }
    await runSideEffect('Staff notification', updated.registrationId, () =>
      deps.notifier.notifyStaff(updated, { reference, amountCents, fullyPaid, paymentType })
    );
  }

  const publish = deps.publish;
  if (publish) {
    const domainEvent = buildDomainEvent(activityStatusToDomainEventType(committed.activity.status), {
      registrationId: updated.registrationId,
      reference,
      paymentType,
      gateway: event.gateway,
      amountCents,
      currency: LEDGER_CURRENCY,
      fullyPaid,
      participantId: updated.participantId,
    });
    await runSideEffect('Domain event publish', updated.registrationId, () => publish(domainEvent));
  }

  return result;
}

export interface ManualReconcileDeps extends ReconcilerDeps {
  gateways: Record<GatewayName, PaymentGatewayPort>;
}

export interface ManualReconcileResult {
  status: ReconcileStatus;
  message: string;
  registrationId: string;
}

/**
 * Staff-triggered reconciliation of a payment the webhook missed: verify with the
 * gateway, then apply through reconcilePaymentEvent. Nothing changes unless the
 * gateway reports success.
 */
export async function reconcileManually(
  input: { reference: string; gateway?: GatewayName },
  deps: ManualReconcileDeps
): Promise<ManualReconcileResult> {
  const reference = input.reference.trim();
  if (!reference) throw new ValidationError('reference is required');
  const { registration } = await resolveRegistration(reference, deps.store);
  const gatewayName = input.gateway ?? (registration.paystackReference === reference ? 'paystack' : 'squad');

  if (await deps.store.hasTransaction(reference)) {
    return { status: 'already_reconciled', message: `Payment ${reference} was already reconciled.`, registrationId: registration.registrationId };
  }

  const verified = await deps.gateways[gatewayName].verifyTransaction(reference);
  const event = verified.status === 'success' ? toPaymentEvent(gatewayName, { ...verified, reference }) : null;
  if (!event) {
    throw new ConflictError(`${gatewayName} reports payment ${reference} as "${verified.status || 'unknown'}"; no changes were made.`);
  }

  const result = await reconcilePaymentEvent(event, deps);
  if (result.status === 'already_reconciled') {
    return { status: result.status, message: `Payment ${reference} was already reconciled.`, registrationId: result.registrationId };
  }
  const scope = result.fullyPaid ? 'registration is fully paid' : 'registration is partially paid';
  const idNote = result.participantId ? ` Participant ID: ${result.participantId}.` : '';
  return {
    status: 'reconciled',
    message: `Reconciled ${reference}: ${formatUsd(result.amountCents)} applied as ${result.paymentType}; ${scope}.${idNote}`,
    registrationId: result.registrationId,
  };
}
