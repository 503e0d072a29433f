/**
 * DynamoDB record types for all tables.
 */

export type RegistrationStatus = 'PENDING' | 'PAID' | 'FAILED';

export type EnrollmentType = 'NEW' | 'RETURNING';

export type AgeGroup = 'G1' | 'G2';

export type PaymentType = 'registration_fee' | 'course_fee' | 'full_payment';

export type PaymentActivityStatus = 'initiated' | 'success' | 'failed';

export type GatewayName = 'squad' | 'paystack';

export interface RegistrationRecord {
  PK: string; // REGISTRATION#<registrationId>
  SK: string; // METADATA
  registrationId: string;
  fullName: string;
  email: string;
  emailKey: string; // lower-cased email, indexed
  phone: string;
  country: string;
  age: number;
  group: AgeGroup;
  cohortCode?: string;
  dimensionCode?: string;
  enrollmentType: EnrollmentType;
  guardianName?: string;
  guardianPhone?: string;
  referralSource?: string;
  // cents
  amount: number;
  currency: string;
  registrationFeeAmount: number;
  courseFeeAmount: number;
  registrationFeePaid: boolean;
  courseFeePaid: boolean;
  status: RegistrationStatus;
  participantId?: string;
  squadReference?: string;
  paystackReference?: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface TransactionRecord {
  PK: string; // TRANSACTION#<reference>
  SK: string; // METADATA
  reference: string;
  registrationId: string;
  amountCents: number;
  currency: string;
  paidAt: string;
  channel?: string;
  gateway: GatewayName;
  rawPayload: Record<string, unknown>;
  createdAt: string;
}

export interface PaymentActivityRecord {
  PK: string; // REGISTRATION#<registrationId>
  SK: string; // ACTIVITY#<timestamp>#<activityId>
  registrationId: string;
  reference: string;
  status: PaymentActivityStatus;
  paymentType: PaymentType;
  amountCents: number;
  currency: string;
  gateway: GatewayName;
  message?: string;
  createdAt: string;
}

export interface ParticipantClaimRecord {
  PK: string; // PARTICIPANT_SEQ#<cohortCode>
  SK: string; // SEQ#<sequence> zero-padded
  participantId: string;
  registrationId: string;
  sequence: number;
  createdAt: string;
}

export interface CohortRecord {
  PK: string; // COHORT#<code>
  SK: string; // METADATA
  code: string;
  name: string;
  isActive: boolean;
  isNewIntake?: boolean;
  dimensionCode?: string;
  startDate?: string;
  endDate?: string;
}

export interface PricingRecord {
  PK: string; // PRICING#<enrollmentType>
  SK: string; // METADATA
  enrollmentType: EnrollmentType;
  registrationFee: number;
  courseFee: number;
  currency: string;
  isActive: boolean;
}

export interface ProgramSettingsRecord {
  PK: string; // SETTINGS#PROGRAM
  SK: string; // METADATA
  siteName?: string;
  maintenanceMode?: boolean;
  maintenanceMessage?: string;
  staffNotificationEmails?: string[];
  supportEmail?: string;
  siteUrl?: string;
  updatedAt?: string;
}

export const METADATA_SK = 'METADATA';

export function registrationPk(registrationId: string): string {
  return `REGISTRATION#${registrationId}`;
}

export function transactionPk(reference: string): string {
  return `TRANSACTION#${reference}`;
}

export function activitySk(timestamp: string, activityId: string): string {
  return `ACTIVITY#${timestamp}#${activityId}`;
}

export function participantClaimPk(cohortCode: string): string {
  return `PARTICIPANT_SEQ#${cohortCode.toUpperCase()}`;
}

export function participantClaimSk(sequence: number): string {
  return `SEQ#${String(sequence).padStart(8, '0')}`;
}

export function cohortPk(code: string): string {
  return `COHORT#${code.toUpperCase()}`;
}

export function pricingPk(enrollmentType: EnrollmentType): string {
  return `PRICING#${enrollmentType}`;
}

export const PROGRAM_SETTINGS_PK = 'SETTINGS#PROGRAM';
