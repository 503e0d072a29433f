/**
 * Payment initiation: register an applicant and start a hosted checkout, or start a
 * checkout for the fee still outstanding on an existing registration.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  ConflictError,
  GatewayError,
  RegistrationNotFoundError,
  ServiceUnavailableError,
  ValidationError,
  errorMessage,
} from '../../lib/errors';
import type { CatalogStore } from '../../ports/catalogStore';
import type { ExchangeRateSource } from '../../ports/exchangeRate';
import type { PaymentGatewayPort } from '../../ports/paymentGateway';
import type { RegistrationStore } from '../../ports/registrationStore';
import type { AgeGroup, GatewayName, PaymentType, RegistrationRecord } from '../../types/tables';
import { METADATA_SK, activitySk, registrationPk } from '../../types/tables';
import { enrollmentTypeForCohort, resolvePricing } from '../pricing/pricing';
import { buildPaymentReference } from '../references/references';
import type { ProgramSettings } from '../settings/settings';
import { LEDGER_CURRENCY, usdCentsToSubunit } from './amounts';

export const GENERIC_INITIATION_ERROR = 'Payment could not be started, please try again';

const GROUP1_MAX_AGE = 15;
const SET_REFERENCE_ATTEMPTS = 3;

export const registrationFormSchema = z.object({
  fullName: z.string().trim().min(2).max(200),
  email: z.string().trim().email().max(254),
  phone: z.string().trim().min(5).max(30),
  country: z.string().trim().min(1).max(100),
  age: z.coerce.number().int().min(10, 'Age must be between 10 and 22 years.').max(22, 'Age must be between 10 and 22 years.'),
  group: z.enum(['G1', 'G2']).optional(),
  cohortCode: z.string().trim().min(1, 'Please select a cohort.'),
  guardianName: z.string().trim().min(1, 'Guardian name is required.'),
  guardianPhone: z.string().trim().min(5, 'Guardian phone is required.'),
  referralSource: z.string().trim().max(200).optional(),
  paymentOption: z.enum(['full', 'partial']).default('partial'),
  gateway: z.enum(['squad', 'paystack']).default('squad'),
  // Honeypot: hidden on the form, filled in only by bots.
  website: z.string().max(0, 'Spam detected.').optional(),
});

export type RegistrationForm = z.infer<typeof registrationFormSchema>;

export const payRemainingFeeSchema = z.object({
  feeType: z.enum(['registration_fee', 'course_fee']),
  gateway: z.enum(['squad', 'paystack']).optional(),
});

export interface InitiationDeps {
  store: RegistrationStore;
  catalog: CatalogStore;
  gateways: Record<GatewayName, PaymentGatewayPort>;
  exchangeRate: ExchangeRateSource;
  settings: ProgramSettings;
  localCurrency: string;
}

export interface StartedPayment {
  registrationId: string;
  reference: string;
  checkoutUrl: string;
  paymentType: PaymentType;
  gateway: GatewayName;
  amountUsdCents: number;
  amountSubunit: number;
  currency: string;
  exchangeRate: number;
}

export function groupForAge(age: number): AgeGroup {
  return age <= GROUP1_MAX_AGE ? 'G1' : 'G2';
}

function assertOpen(settings: ProgramSettings): void {
  if (settings.maintenanceMode) throw new ServiceUnavailableError(settings.maintenanceMessage);
}

export async function initializePayment(input: unknown, deps: InitiationDeps): Promise<StartedPayment> {
  assertOpen(deps.settings);
  const parsed = registrationFormSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError('Form validation failed', parsed.error.flatten().fieldErrors);
  const form = parsed.data;

  const cohort = await deps.catalog.getCohort(form.cohortCode);
  if (!cohort || !cohort.isActive) throw new ValidationError('Please select a cohort.', { cohortCode: ['Unknown or inactive cohort'] });
  const pricing = await resolvePricing(deps.catalog, enrollmentTypeForCohort(cohort));

  const now = new Date().toISOString();
  const registrationId = uuidv4();
  const registration: RegistrationRecord = {
    PK: registrationPk(registrationId),
    SK: METADATA_SK,
    registrationId,
    fullName: form.fullName,
    email: form.email,
    emailKey: form.email.toLowerCase(),
    phone: form.phone,
    country: form.country,
    age: form.age,
    group: form.group ?? groupForAge(form.age),
    cohortCode: cohort.code.toUpperCase(),
    dimensionCode: cohort.dimensionCode,
    enrollmentType: pricing.enrollmentType,
    guardianName: form.guardianName,
    guardianPhone: form.guardianPhone,
    referralSource: form.referralSource || undefined,
    amount: pricing.total,
    currency: LEDGER_CURRENCY,
    registrationFeeAmount: pricing.registrationFee,
    courseFeeAmount: pricing.courseFee,
    registrationFeePaid: false,
    courseFeePaid: false,
    status: 'PENDING',
    version: 0,
    createdAt: now,
    updatedAt: now,
  };
  await deps.store.createRegistration(registration);
  console.info(JSON.stringify({ level: 'INFO', message: 'Registration created', registrationId, cohortCode: registration.cohortCode }));

  const full = form.paymentOption === 'full';
  return startPayment(
    registration,
    full ? 'full_payment' : 'registration_fee',
    full ? pricing.total : pricing.registrationFee,
    form.gateway,
    deps
  );
}

export async function payRemainingFee(registrationId: string, input: unknown, deps: InitiationDeps): Promise<StartedPayment> {
  assertOpen(deps.settings);
  const parsed = payRemainingFeeSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError('feeType must be registration_fee or course_fee', parsed.error.flatten().fieldErrors);
  const { feeType } = parsed.data;

  const registration = await deps.store.getRegistration(registrationId);
  if (!registration) throw new RegistrationNotFoundError(registrationId);
  if (feeType === 'registration_fee' && registration.registrationFeePaid) {
    throw new ValidationError('Registration fee has already been paid');
  }
  if (feeType === 'course_fee') {
    if (registration.courseFeePaid) throw new ValidationError('Course fee has already been paid');
    if (!registration.registrationFeePaid) throw new ValidationError('Registration fee must be paid before the course fee');
  }
  const gateway = parsed.data.gateway ?? (registration.paystackReference && !registration.squadReference ? 'paystack' : 'squad');
  const amount = feeType === 'registration_fee' ? registration.registrationFeeAmount : registration.courseFeeAmount;
  return startPayment(registration, feeType, amount, gateway, deps);
}

async function recordGatewayReference(
  store: RegistrationStore,
  registration: RegistrationRecord,
  gateway: GatewayName,
  reference: string
): Promise<void> {
  let current = registration;
  for (let attempt = 0; attempt < SET_REFERENCE_ATTEMPTS; attempt++) {
    if (await store.setGatewayReference(current, gateway, reference)) return;
    const reloaded = await store.getRegistration(registration.registrationId);
    if (!reloaded) throw new RegistrationNotFoundError(registration.registrationId);
    current = reloaded;
  }
  throw new ConflictError('Registration is being updated, please try again');
}

async function startPayment(
  registration: RegistrationRecord,
  paymentType: PaymentType,
  amountUsdCents: number,
  gatewayName: GatewayName,
  deps: InitiationDeps
): Promise<StartedPayment> {
  const gateway = deps.gateways[gatewayName];
  const rate = await deps.exchangeRate.getUsdToLocalRate();
  const currency = deps.localCurrency;
  const amountSubunit = usdCentsToSubunit(amountUsdCents, currency, rate);
  const reference = buildPaymentReference(paymentType, registration.registrationId);

  await recordGatewayReference(deps.store, registration, gatewayName, reference);

  let checkoutUrl: string;
  try {
    const initiated = await gateway.initiatePayment({
      reference,
      email: registration.email,
      customerName: registration.fullName,
      amountSubunit,
      currency,
      callbackUrl: `${deps.settings.siteUrl}/success/?reference=${encodeURIComponent(reference)}`,
      metadata: {
        registration_id: registration.registrationId,
        student_name: registration.fullName,
        cohort: registration.cohortCode ?? 'N/A',
        group: registration.group,
        dimension: registration.dimensionCode ?? 'N/A',
        enrollment_type: registration.enrollmentType,
        payment_type: paymentType,
        original_amount_usd: (amountUsdCents / 100).toFixed(2),
        registration_fee: (registration.registrationFeeAmount / 100).toFixed(2),
        course_fee: (registration.courseFeeAmount / 100).toFixed(2),
        total_amount: (registration.amount / 100).toFixed(2),
        exchange_rate: String(rate),
      },
    });
    checkoutUrl = initiated.checkoutUrl;
  } catch (err) {
    console.error(JSON.stringify({ level: 'ERROR', message: 'Payment initiation failed', gateway: gatewayName, reference, error: errorMessage(err) }));
    throw new GatewayError(GENERIC_INITIATION_ERROR);
  }

  const now = new Date().toISOString();
  await deps.store.appendActivity({
    PK: registrationPk(registration.registrationId),
    SK: activitySk(now, uuidv4()),
    registrationId: registration.registrationId,
    reference,
    status: 'initiated',
    paymentType,
    amountCents: amountUsdCents,
    currency: LEDGER_CURRENCY,
    gateway: gatewayName,
    createdAt: now,
  });

  return {
    registrationId: registration.registrationId,
    reference,
    checkoutUrl,
    paymentType,
    gateway: gatewayName,
    amountUsdCents,
    amountSubunit,
    currency,
    exchangeRate: rate,
  };
}
