/**
 * src/modules/users/dal/dynamo-user-store.ts
 *
 * WHY:
 * - DynamoDB implementation of UserStore: one table, partition key `email`.
 * - Uses the document client so items are plain JS objects (no AttributeValue plumbing).
 *
 * RULES:
 * - No AppError.
 * - One SDK call per operation, except scan() which follows LastEvaluatedKey
 *   until the table is exhausted (unbounded; fine for small tables only).
 * - No retries here beyond the SDK's own.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  type GetCommandOutput,
  type ScanCommandInput,
  type ScanCommandOutput,
} from '@aws-sdk/lib-dynamodb';

import type { User } from '../user.types';
import { marshalUser, unmarshalUser } from './user-item';
import { UserStoreError, type PutCondition, type PutOptions, type UserStore } from './user-store';

const CONDITION_EXPRESSIONS: Record<Exclude<PutCondition, 'none'>, string> = {
  absent: 'attribute_not_exists(email)',
  present: 'attribute_exists(email)',
};

export type DynamoUserStoreOptions = {
  region: string;
  tableName: string;
  endpoint?: string;
};

export class DynamoUserStore implements UserStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tableName: string,
  ) {}

  static create(opts: DynamoUserStoreOptions): DynamoUserStore {
    const base = new DynamoDBClient({
      region: opts.region,
      ...(opts.endpoint ? { endpoint: opts.endpoint } : {}),
    });

    return new DynamoUserStore(DynamoDBDocumentClient.from(base), opts.tableName);
  }

  async get(email: string): Promise<User | undefined> {
    let result: GetCommandOutput;
    try {
      result = await this.client.send(
        new GetCommand({ TableName: this.tableName, Key: { email } }),
      );
    } catch (err) {
      throw new UserStoreError('fetch', 'GetItem failed', { cause: err });
    }

    if (!result.Item) return undefined;
    return unmarshalUser(result.Item);
  }

  async scan(): Promise<User[]> {
    const users: User[] = [];
    let startKey: ScanCommandInput['ExclusiveStartKey'];

    do {
      let page: ScanCommandOutput;
      try {
        page = await this.client.send(
          new ScanCommand({ TableName: this.tableName, ExclusiveStartKey: startKey }),
        );
      } catch (err) {
        throw new UserStoreError('fetch', 'Scan failed', { cause: err });
      }

      for (const item of page.Items ?? []) {
        users.push(unmarshalUser(item));
      }
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    return users;
  }

  async put(user: User, opts: PutOptions = {}): Promise<void> {
    const item = marshalUser(user);
    const condition = opts.condition ?? 'none';

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ...(condition === 'none'
            ? {}
            : { ConditionExpression: CONDITION_EXPRESSIONS[condition] }),
        }),
      );
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        throw new UserStoreError('condition', `PutItem condition failed (${condition})`, {
          cause: err,
        });
      }
      throw new UserStoreError('put', 'PutItem failed', { cause: err });
    }
  }

  async delete(email: string): Promise<void> {
    try {
      await this.client.send(new DeleteCommand({ TableName: this.tableName, Key: { email } }));
    } catch (err) {
      throw new UserStoreError('delete', 'DeleteItem failed', { cause: err });
    }
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
