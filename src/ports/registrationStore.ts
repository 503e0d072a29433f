/**
 * Registration store port. Registrations, participant-ID claims, transactions and
 * payment activity live behind one port because reconciliation writes them atomically.
 */

import type {
  GatewayName,
  ParticipantClaimRecord,
  PaymentActivityRecord,
  RegistrationRecord,
  RegistrationStatus,
  TransactionRecord,
} from '../types/tables';

export interface ParticipantClaim {
  cohortCode: string;
  sequence: number;
  participantId: string;
}

export interface PaymentOutcomeCommit {
  /** Registration as loaded; its version guards the update. */
  registration: RegistrationRecord;
  registrationFeePaid: boolean;
  courseFeePaid: boolean;
  status: RegistrationStatus;
  /** Present for successful outcomes; written only if no transaction has this reference. */
  transaction?: TransactionRecord;
  activity: PaymentActivityRecord;
  participantClaim?: ParticipantClaim;
}

export type CommitOutcome = 'committed' | 'duplicate_transaction' | 'conflict';

export interface AssignParticipantIdParams {
  /** Registration as loaded; its version guards the update. */
  registration: RegistrationRecord;
  participantId: string;
  /** Null when the ID cannot be canonicalized and is stored as given. */
  claim: { cohortCode: string; sequence: number } | null;
  /** Allocation never overwrites an existing ID; normalization and import do. */
  requireUnassigned: boolean;
  cohortCode?: string;
  releaseClaim?: { cohortCode: string; sequence: number };
}

export interface RegistrationStore {
  getRegistration(registrationId: string): Promise<RegistrationRecord | null>;
  findByGatewayReference(gateway: GatewayName, reference: string): Promise<RegistrationRecord | null>;
  /** Most recent registration for the email, case-insensitive. */
  findLatestByEmail(email: string): Promise<RegistrationRecord | null>;
  listRegistrations(): Promise<RegistrationRecord[]>;
  createRegistration(record: RegistrationRecord): Promise<void>;
  /** Returns false when the version check fails. */
  setGatewayReference(registration: RegistrationRecord, gateway: GatewayName, reference: string): Promise<boolean>;
  hasTransaction(reference: string): Promise<boolean>;
  commitPaymentOutcome(commit: PaymentOutcomeCommit): Promise<CommitOutcome>;
  appendActivity(activity: PaymentActivityRecord): Promise<void>;
  /** Participant IDs stored on registrations that start with the prefix, claimed or not. */
  listParticipantIdsWithPrefix(prefix: string): Promise<string[]>;
  /** Highest claimed sequence for the cohort, 0 when none. Strongly consistent. */
  getMaxParticipantSequence(cohortCode: string): Promise<number>;
  getParticipantClaim(cohortCode: string, sequence: number): Promise<ParticipantClaimRecord | null>;
  assignParticipantId(params: AssignParticipantIdParams): Promise<'committed' | 'conflict'>;
}
