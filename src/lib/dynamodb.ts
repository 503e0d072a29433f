/**
 * DynamoDB Document Client singleton and typed helpers.
 */

import { DynamoDBClient, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand, QueryCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';

const defaultClient = new DynamoDBClient({
  ...(process.env.AWS_REGION && { region: process.env.AWS_REGION }),
});

export const docClient = DynamoDBDocumentClient.from(defaultClient, {
  marshallOptions: { convertEmptyValues: false, removeUndefinedValues: true },
});

export async function getItem<T>(
  tableName: string,
  key: Record<string, unknown>,
  options?: { consistentRead?: boolean }
): Promise<T | null> {
  const result = await docClient.send(
    new GetCommand({ TableName: tableName, Key: key, ConsistentRead: options?.consistentRead })
  );
  return (result.Item as T) ?? null;
}

export async function putItem(
  tableName: string,
  item: Record<string, unknown>,
  condition?: string,
  attrNames?: Record<string, string>,
  attrValues?: Record<string, unknown>
): Promise<void> {
  await docClient.send(
    new PutCommand({
      TableName: tableName,
      Item: item,
      ...(condition && {
        ConditionExpression: condition,
        ExpressionAttributeNames: attrNames,
        ExpressionAttributeValues: attrValues,
      }),
    })
  );
}

export interface QueryOptions {
  indexName?: string;
  scanIndexForward?: boolean;
  limit?: number;
  consistentRead?: boolean;
  attrNames?: Record<string, string>;
  exclusiveStartKey?: Record<string, unknown>;
}

export async function queryItems<T>(
  tableName: string,
  keyCondition: string,
  attrValues: Record<string, unknown>,
  options?: QueryOptions
): Promise<{ items: T[]; lastEvaluatedKey?: Record<string, unknown> }> {
  const result = await docClient.send(
    new QueryCommand({
      TableName: tableName,
      KeyConditionExpression: keyCondition,
      ExpressionAttributeValues: attrValues,
      ExpressionAttributeNames: options?.attrNames,
      IndexName: options?.indexName,
      ScanIndexForward: options?.scanIndexForward,
      Limit: options?.limit,
      ConsistentRead: options?.consistentRead,
      ExclusiveStartKey: options?.exclusiveStartKey,
    })
  );
  return {
    items: (result.Items as T[]) ?? [],
    lastEvaluatedKey: result.LastEvaluatedKey,
  };
}

/** Scan every page of a table, optionally filtered. */
export async function scanAll<T>(
  tableName: string,
  filter?: {
    expression: string;
    attrNames?: Record<string, string>;
    attrValues: Record<string, unknown>;
    projection?: string;
  },
  options?: { consistentRead?: boolean }
): Promise<T[]> {
  const items: T[] = [];
  let exclusiveStartKey: Record<string, unknown> | undefined;
  do {
    const result = await docClient.send(
      new ScanCommand({
        TableName: tableName,
        ExclusiveStartKey: exclusiveStartKey,
        ConsistentRead: options?.consistentRead,
        ...(filter && {
          FilterExpression: filter.expression,
          ExpressionAttributeNames: filter.attrNames,
          ExpressionAttributeValues: filter.attrValues,
          ProjectionExpression: filter.projection,
        }),
      })
    );
    items.push(...((result.Items as T[]) ?? []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);
  return items;
}

/**
 * Per-item cancellation codes of a cancelled TransactWriteItems, in request order
 * ('None' for items that did not fail). Null when the error is not a cancellation.
 */
export function transactionCancellationCodes(err: unknown): string[] | null {
  if (!(err instanceof TransactionCanceledException)) return null;
  return (err.CancellationReasons ?? []).map((r) => r.Code ?? 'None');
}
