/**
 * DynamoDB implementation of the RegistrationStore port.
 *
 * Registrations and participant-ID claims share the registrations table; claims live
 * under PARTICIPANT_SEQ#<cohort> so a descending consistent query yields the highest
 * sequence. Multi-record writes go through TransactWriteItems so the version check,
 * the transaction uniqueness check and the claim condition succeed or fail together.
 */

import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { TransactWriteCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { docClient, getItem, putItem, queryItems, scanAll, transactionCancellationCodes } from '../lib/dynamodb';
import type {
  AssignParticipantIdParams,
  CommitOutcome,
  PaymentOutcomeCommit,
  RegistrationStore,
} from '../ports/registrationStore';
import type {
  GatewayName,
  ParticipantClaimRecord,
  PaymentActivityRecord,
  RegistrationRecord,
  TransactionRecord,
} from '../types/tables';
import { METADATA_SK, participantClaimPk, participantClaimSk, registrationPk, transactionPk } from '../types/tables';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

export interface DynamoRegistrationStoreConfig {
  registrationsTableName: string;
  transactionsTableName: string;
  paymentActivityTableName: string;
}

export const GATEWAY_REFERENCE_INDEX: Record<GatewayName, { indexName: string; attribute: string }> = {
  squad: { indexName: 'bySquadReference', attribute: 'squadReference' },
  paystack: { indexName: 'byPaystackReference', attribute: 'paystackReference' },
};

export const EMAIL_INDEX = 'byEmail';

function registrationKey(registrationId: string): Record<string, string> {
  return { PK: registrationPk(registrationId), SK: METADATA_SK };
}

function sameClaim(a: { cohortCode: string; sequence: number }, b: { cohortCode: string; sequence: number }): boolean {
  return a.sequence === b.sequence && a.cohortCode.toUpperCase() === b.cohortCode.toUpperCase();
}

function latestFirst(a: RegistrationRecord, b: RegistrationRecord): number {
  return b.createdAt.localeCompare(a.createdAt);
}

export class DynamoRegistrationStore implements RegistrationStore {
  constructor(private readonly config: DynamoRegistrationStoreConfig) {}

  async getRegistration(registrationId: string): Promise<RegistrationRecord | null> {
    return getItem<RegistrationRecord>(this.config.registrationsTableName, registrationKey(registrationId), {
      consistentRead: true,
    });
  }

  async findByGatewayReference(gateway: GatewayName, reference: string): Promise<RegistrationRecord | null> {
    const { indexName, attribute } = GATEWAY_REFERENCE_INDEX[gateway];
    const { items } = await queryItems<RegistrationRecord>(
      this.config.registrationsTableName,
      '#ref = :ref',
      { ':ref': reference },
      { indexName, attrNames: { '#ref': attribute } }
    );
    if (items.length === 0) return null;
    // The index is eventually consistent; re-read the winner from the base table.
    const [latest] = [...items].sort(latestFirst);
    return this.getRegistration(latest.registrationId);
  }

  async findLatestByEmail(email: string): Promise<RegistrationRecord | null> {
    const { items } = await queryItems<RegistrationRecord>(
      this.config.registrationsTableName,
      'emailKey = :email',
      { ':email': email.trim().toLowerCase() },
      { indexName: EMAIL_INDEX, scanIndexForward: false, limit: 1 }
    );
    return items[0] ?? null;
  }

  async listRegistrations(): Promise<RegistrationRecord[]> {
    return scanAll<RegistrationRecord>(this.config.registrationsTableName, {
      expression: 'SK = :sk AND begins_with(PK, :prefix)',
      attrValues: { ':sk': METADATA_SK, ':prefix': 'REGISTRATION#' },
    });
  }

  async createRegistration(record: RegistrationRecord): Promise<void> {
    await putItem(this.config.registrationsTableName, { ...record }, 'attribute_not_exists(PK)');
  }

  async setGatewayReference(registration: RegistrationRecord, gateway: GatewayName, reference: string): Promise<boolean> {
    const { attribute } = GATEWAY_REFERENCE_INDEX[gateway];
    try {
      await docClient.send(
        new UpdateCommand({
          TableName: this.config.registrationsTableName,
          Key: registrationKey(registration.registrationId),
          UpdateExpression: 'SET #ref = :ref, updatedAt = :now, #version = :next',
          ConditionExpression: '#version = :expected',
          ExpressionAttributeNames: { '#ref': attribute, '#version': 'version' },
          ExpressionAttributeValues: {
            ':ref': reference,
            ':now': new Date().toISOString(),
            ':next': registration.version + 1,
            ':expected': registration.version,
          },
        })
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) return false;
      throw err;
    }
  }

  async hasTransaction(reference: string): Promise<boolean> {
    const item = await getItem<TransactionRecord>(
      this.config.transactionsTableName,
      { PK: transactionPk(reference), SK: METADATA_SK },
      { consistentRead: true }
    );
    return item !== null;
  }

  async commitPaymentOutcome(commit: PaymentOutcomeCommit): Promise<CommitOutcome> {
    const { registration, participantClaim } = commit;
    const now = new Date().toISOString();
    const names: Record<string, string> = { '#version': 'version', '#status': 'status' };
    const values: Record<string, unknown> = {
      ':regPaid': commit.registrationFeePaid,
      ':coursePaid': commit.courseFeePaid,
      ':status': commit.status,
      ':now': now,
      ':next': registration.version + 1,
      ':expected': registration.version,
    };
    let update = 'SET registrationFeePaid = :regPaid, courseFeePaid = :coursePaid, #status = :status, updatedAt = :now, #version = :next';
    let condition = '#version = :expected';
    if (participantClaim) {
      update += ', participantId = :pid';
      condition += ' AND attribute_not_exists(participantId)';
      values[':pid'] = participantClaim.participantId;
    }

    const items: TransactItem[] = [
      {
        Update: {
          TableName: this.config.registrationsTableName,
          Key: registrationKey(registration.registrationId),
          UpdateExpression: update,
          ConditionExpression: condition,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
        },
      },
    ];
    let transactionIndex = -1;
    if (commit.transaction) {
      transactionIndex = items.length;
      items.push({
        Put: {
          TableName: this.config.transactionsTableName,
          Item: { ...commit.transaction },
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      });
    }
    items.push({ Put: { TableName: this.config.paymentActivityTableName, Item: { ...commit.activity } } });
    if (participantClaim) {
      items.push({
        Put: {
          TableName: this.config.registrationsTableName,
          Item: this.claimRecord(participantClaim.cohortCode, participantClaim.sequence, participantClaim.participantId, registration.registrationId, now),
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      });
    }

    try {
      await docClient.send(new TransactWriteCommand({ TransactItems: items }));
      return 'committed';
    } catch (err) {
      const codes = transactionCancellationCodes(err);
      if (!codes) throw err;
      if (transactionIndex >= 0 && codes[transactionIndex] === 'ConditionalCheckFailed') return 'duplicate_transaction';
      if (codes.some((c) => c === 'ConditionalCheckFailed' || c === 'TransactionConflict')) return 'conflict';
      throw err;
    }
  }

  async appendActivity(activity: PaymentActivityRecord): Promise<void> {
    await putItem(this.config.paymentActivityTableName, { ...activity });
  }

  async listParticipantIdsWithPrefix(prefix: string): Promise<string[]> {
    const items = await scanAll<Pick<RegistrationRecord, 'participantId'>>(
      this.config.registrationsTableName,
      {
        expression: 'SK = :sk AND begins_with(participantId, :prefix)',
        attrValues: { ':sk': METADATA_SK, ':prefix': prefix },
        projection: 'participantId',
      },
      { consistentRead: true }
    );
    return items.flatMap((item) => (item.participantId ? [item.participantId] : []));
  }

  async getMaxParticipantSequence(cohortCode: string): Promise<number> {
    const { items } = await queryItems<ParticipantClaimRecord>(
      this.config.registrationsTableName,
      'PK = :pk',
      { ':pk': participantClaimPk(cohortCode) },
      { scanIndexForward: false, limit: 1, consistentRead: true }
    );
    return items[0]?.sequence ?? 0;
  }

  async getParticipantClaim(cohortCode: string, sequence: number): Promise<ParticipantClaimRecord | null> {
    return getItem<ParticipantClaimRecord>(
      this.config.registrationsTableName,
      { PK: participantClaimPk(cohortCode), SK: participantClaimSk(sequence) },
      { consistentRead: true }
    );
  }

  async assignParticipantId(params: AssignParticipantIdParams): Promise<'committed' | 'conflict'> {
    const { registration, participantId, claim, releaseClaim } = params;
    const now = new Date().toISOString();
    const names: Record<string, string> = { '#version': 'version' };
    const values: Record<string, unknown> = {
      ':pid': participantId,
      ':now': now,
      ':next': registration.version + 1,
      ':expected': registration.version,
    };
    let update = 'SET participantId = :pid, updatedAt = :now, #version = :next';
    let condition = '#version = :expected';
    if (params.requireUnassigned) condition += ' AND attribute_not_exists(participantId)';
    if (params.cohortCode) {
      update += ', cohortCode = :cohort';
      values[':cohort'] = params.cohortCode.toUpperCase();
    }

    const items: TransactItem[] = [
      {
        Update: {
          TableName: this.config.registrationsTableName,
          Key: registrationKey(registration.registrationId),
          UpdateExpression: update,
          ConditionExpression: condition,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
        },
      },
    ];
    if (claim) {
      items.push({
        Put: {
          TableName: this.config.registrationsTableName,
          Item: this.claimRecord(claim.cohortCode, claim.sequence, participantId, registration.registrationId, now),
          ConditionExpression: 'attribute_not_exists(PK) OR registrationId = :rid',
          ExpressionAttributeValues: { ':rid': registration.registrationId },
        },
      });
    }
    if (releaseClaim && !(claim && sameClaim(claim, releaseClaim))) {
      items.push({
        Delete: {
          TableName: this.config.registrationsTableName,
          Key: { PK: participantClaimPk(releaseClaim.cohortCode), SK: participantClaimSk(releaseClaim.sequence) },
          ConditionExpression: 'attribute_not_exists(PK) OR registrationId = :rid',
          ExpressionAttributeValues: { ':rid': registration.registrationId },
        },
      });
    }

    try {
      await docClient.send(new TransactWriteCommand({ TransactItems: items }));
      return 'committed';
    } catch (err) {
      const codes = transactionCancellationCodes(err);
      if (codes?.some((c) => c === 'ConditionalCheckFailed' || c === 'TransactionConflict')) return 'conflict';
      throw err;
    }
  }

  private claimRecord(
    cohortCode: string,
    sequence: number,
    participantId: string,
    registrationId: string,
    createdAt: string
  ): Record<string, unknown> {
    const record: ParticipantClaimRecord = {
      PK: participantClaimPk(cohortCode),
      SK: participantClaimSk(sequence),
      participantId,
      registrationId,
      sequence,
      createdAt,
    };
    return { ...record };
  }
}
