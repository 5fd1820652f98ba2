import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  BatchWriteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand
} from '@aws-sdk/lib-dynamodb';
import type { BatchWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { QuestionViewSchema, type LookupCache, type QuestionView } from '@question-rotation/core';

const BATCH_WRITE_LIMIT = 25;
const MAX_BATCH_ATTEMPTS = 5;

const CachedViewItemSchema = z.object({
  view: QuestionViewSchema,
  expiresAt: z.number()
});

type WriteRequest = NonNullable<BatchWriteCommandInput['RequestItems']>[string][number];

export interface DynamoLookupCacheOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
  now?: () => Date;
}

/**
 * Region to current-question entries in the control table. DynamoDB deletes expired items
 * lazily, so reads compare `expiresAt` themselves rather than trusting the TTL sweep.
 */
export class DynamoLookupCache implements LookupCache {
  private readonly tableName: string;
  private readonly client: DynamoDBDocumentClient;
  private readonly now: () => Date;

  constructor(options: DynamoLookupCacheOptions) {
    if (!options.tableName) {
      throw new Error('CONTROL_TABLE_NAME must be provided for DynamoLookupCache');
    }
    this.tableName = options.tableName;
    this.client = options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
    this.now = options.now ?? (() => new Date());
  }

  async get(regionId: string): Promise<QuestionView | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: cacheKey(regionId)
      })
    );

    if (!result.Item) {
      return null;
    }

    const parsed = CachedViewItemSchema.safeParse(result.Item);
    if (!parsed.success) {
      return null;
    }

    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    if (parsed.data.expiresAt <= nowSeconds) {
      return null;
    }

    return parsed.data.view;
  }

  async put(view: QuestionView, ttlSeconds: number): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: this.toItem(view, ttlSeconds)
      })
    );
  }

  async putMany(views: QuestionView[], ttlSeconds: number): Promise<void> {
    for (let offset = 0; offset < views.length; offset += BATCH_WRITE_LIMIT) {
      let requests: WriteRequest[] = views
        .slice(offset, offset + BATCH_WRITE_LIMIT)
        .map(view => ({ PutRequest: { Item: this.toItem(view, ttlSeconds) } }));

      for (let attempt = 1; requests.length > 0; attempt += 1) {
        if (attempt > MAX_BATCH_ATTEMPTS) {
          throw new Error(
            `Unable to write ${requests.length} cache entries after ${MAX_BATCH_ATTEMPTS} attempts`
          );
        }
        const result = await this.client.send(
          new BatchWriteCommand({ RequestItems: { [this.tableName]: requests } })
        );
        requests = result.UnprocessedItems?.[this.tableName] ?? [];
      }
    }
  }

  private toItem(view: QuestionView, ttlSeconds: number): Record<string, unknown> {
    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    // never outlive the cycle the view belongs to
    const cycleEndSeconds = Math.floor(Date.parse(view.cycleEndsAt) / 1000);
    return {
      ...cacheKey(view.regionId),
      view,
      expiresAt: Math.min(nowSeconds + Math.max(1, Math.floor(ttlSeconds)), cycleEndSeconds)
    };
  }
}

function cacheKey(regionId: string): { pk: string; sk: string } {
  return { pk: `LOOKUP#${regionId}`, sk: 'CURRENT' };
}
