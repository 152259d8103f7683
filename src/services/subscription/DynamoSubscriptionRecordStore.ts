/**
 * DynamoDB-backed subscription record store.
 *
 * One item per user: pk = USER#<userId>, sk = SUBSCRIPTION. Items are validated
 * on read; a record that fails the schema is reported rather than returned.
 */

import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
} from '@aws-sdk/lib-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { Logger } from '../core/Logger';
import { SubscriptionRecord, SubscriptionRecordSchema } from '../../types/SubscriptionTypes';
import type { ISubscriptionRecordStore } from './ISubscriptionRecordStore';

export interface DynamoSubscriptionRecordStoreConfig {
  tableName: string;
  region?: string;
}

export const SUBSCRIPTION_SK = 'SUBSCRIPTION';

function userPk(userId: string): string {
  return `USER#${userId}`;
}

export class DynamoSubscriptionRecordStore implements ISubscriptionRecordStore {
  private dynamoClient: DynamoDBDocumentClient;
  private logger: Logger;
  private tableName: string;

  constructor(logger: Logger, config: DynamoSubscriptionRecordStoreConfig) {
    this.logger = logger;
    this.tableName = config.tableName;
    const client = new DynamoDBClient(config.region ? { region: config.region } : {});
    this.dynamoClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: { removeUndefinedValues: true },
    });
  }

  async load(userId: string): Promise<SubscriptionRecord | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: userPk(userId), sk: SUBSCRIPTION_SK },
      })
    );
    if (!result.Item) return null;

    const { pk, sk, ...item } = result.Item;
    const parsed = SubscriptionRecordSchema.safeParse(item);
    if (!parsed.success) {
      this.logger.error('Stored subscription record is invalid', {
        userId,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      throw new Error(`Corrupt subscription record for user ${userId}`);
    }
    return parsed.data;
  }

  async save(userId: string, record: SubscriptionRecord): Promise<void> {
    await this.dynamoClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...record, pk: userPk(userId), sk: SUBSCRIPTION_SK },
      })
    );
    this.logger.debug('Subscription record saved', { userId, tier: record.tier, status: record.status });
  }

  async delete(userId: string): Promise<boolean> {
    const result = await this.dynamoClient.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { pk: userPk(userId), sk: SUBSCRIPTION_SK },
        ReturnValues: 'ALL_OLD',
      })
    );
    return result.Attributes !== undefined;
  }
}
