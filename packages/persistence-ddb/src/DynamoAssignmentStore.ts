import {
  ConditionalCheckFailedException,
  DescribeTableCommand,
  DynamoDBClient,
  TransactionCanceledException
} from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  TransactWriteCommand
} from '@aws-sdk/lib-dynamodb';
import type { QueryCommandInput, TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import {
  QuestionAlreadyExistsError,
  RotationCapacityError,
  RotationConflictError,
  RotationIntegrityError,
  type ActiveAssignment,
  type Assignment,
  type AssignmentStore,
  type CatalogWriter,
  type Cycle,
  type Question,
  type Region,
  type RotationCommit
} from '@question-rotation/core';

/** DynamoDB rejects transactions with more items than this. */
export const MAX_TRANSACT_ITEMS = 100;
const BATCH_GET_LIMIT = 100;
const MAX_BATCH_ATTEMPTS = 5;

const REGION_PK = 'REGION';
const QUESTION_PK = 'QUESTION';
const CYCLE_PK = 'CYCLE';
const ACTIVE_POINTER_KEY = { pk: 'CYCLE#ACTIVE', sk: 'POINTER' } as const;

export const cycleSortKey = (cycleId: number): string => cycleId.toString().padStart(12, '0');
const eligibilityPk = (regionId: string): string => `ELIGIBLE#${regionId}`;
const assignmentPk = (regionId: string): string => `ASSIGNMENT#${regionId}`;

const RegionItemSchema = z.object({ regionId: z.string(), name: z.string() });
const QuestionItemSchema = z.object({ questionId: z.string(), content: z.string() });
const EligibilityItemSchema = z.object({ questionId: z.string() });
const PointerItemSchema = z.object({
  cycleId: z.number().int().positive(),
  startTime: z.string(),
  endTime: z.string()
});
const AssignmentItemSchema = z.object({
  cycleId: z.number().int().positive(),
  regionId: z.string(),
  questionId: z.string(),
  content: z.string()
});

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

export interface DynamoAssignmentStoreOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
}

export class DynamoAssignmentStore implements AssignmentStore, CatalogWriter {
  private readonly tableName: string;
  private readonly client: DynamoDBDocumentClient;

  constructor(options: DynamoAssignmentStoreOptions) {
    if (!options.tableName) {
      throw new Error('TABLE_NAME must be provided');
    }

    this.tableName = options.tableName;
    this.client = options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  async getActiveCycle(): Promise<Cycle | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: ACTIVE_POINTER_KEY,
        ConsistentRead: true
      })
    );

    if (!result.Item) {
      return null;
    }

    const pointer = PointerItemSchema.parse(result.Item);
    return {
      cycleId: pointer.cycleId,
      startTime: new Date(pointer.startTime),
      endTime: new Date(pointer.endTime),
      active: true
    };
  }

  async listRegions(): Promise<Region[]> {
    const items = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': REGION_PK },
      ConsistentRead: true
    });
    return items.map(item => RegionItemSchema.parse(item));
  }

  async regionExists(regionId: string): Promise<boolean> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: REGION_PK, sk: regionId },
        ConsistentRead: true
      })
    );
    return Boolean(result.Item);
  }

  async listEligibleQuestions(regionId: string): Promise<Question[]> {
    const eligibility = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': eligibilityPk(regionId) },
      ConsistentRead: true
    });
    const questionIds = eligibility.map(item => EligibilityItemSchema.parse(item).questionId);
    return this.getQuestions(questionIds);
  }

  async getAssignmentHistory(regionId: string): Promise<string[]> {
    const items = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': assignmentPk(regionId) },
      ScanIndexForward: true,
      ConsistentRead: true
    });
    return items.map(item => AssignmentItemSchema.parse(item).questionId);
  }

  async getActiveAssignment(regionId: string): Promise<ActiveAssignment | null> {
    const cycle = await this.getActiveCycle();
    if (!cycle) {
      return null;
    }

    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: assignmentPk(regionId), sk: cycleSortKey(cycle.cycleId) },
        ConsistentRead: true
      })
    );

    if (!result.Item) {
      return null;
    }

    const assignment: Assignment = AssignmentItemSchema.parse(result.Item);
    return { cycle, assignment };
  }

  async commitRotation(commit: RotationCommit): Promise<void> {
    const { cycle, assignments, expectedActiveCycleId } = commit;
    const pointer = {
      cycleId: cycle.cycleId,
      startTime: cycle.startTime.toISOString(),
      endTime: cycle.endTime.toISOString()
    };

    const items: TransactItem[] = [];

    if (expectedActiveCycleId === null) {
      items.push({
        Put: {
          TableName: this.tableName,
          Item: { ...ACTIVE_POINTER_KEY, ...pointer },
          ConditionExpression: 'attribute_not_exists(pk)'
        }
      });
    } else {
      items.push({
        Update: {
          TableName: this.tableName,
          Key: ACTIVE_POINTER_KEY,
          UpdateExpression: 'SET #cycleId = :next, #startTime = :start, #endTime = :end',
          ConditionExpression: '#cycleId = :expected',
          ExpressionAttributeNames: {
            '#cycleId': 'cycleId',
            '#startTime': 'startTime',
            '#endTime': 'endTime'
          },
          ExpressionAttributeValues: {
            ':next': pointer.cycleId,
            ':start': pointer.startTime,
            ':end': pointer.endTime,
            ':expected': expectedActiveCycleId
          }
        }
      });
      items.push({
        Update: {
          TableName: this.tableName,
          Key: { pk: CYCLE_PK, sk: cycleSortKey(expectedActiveCycleId) },
          UpdateExpression: 'SET #active = :inactive',
          ConditionExpression: '#active = :active',
          ExpressionAttributeNames: { '#active': 'active' },
          ExpressionAttributeValues: { ':inactive': false, ':active': true }
        }
      });
    }

    items.push({
      Put: {
        TableName: this.tableName,
        Item: { pk: CYCLE_PK, sk: cycleSortKey(cycle.cycleId), ...pointer, active: true },
        ConditionExpression: 'attribute_not_exists(pk)'
      }
    });

    for (const assignment of assignments) {
      items.push({
        Put: {
          TableName: this.tableName,
          Item: {
            pk: assignmentPk(assignment.regionId),
            sk: cycleSortKey(assignment.cycleId),
            cycleId: assignment.cycleId,
            regionId: assignment.regionId,
            questionId: assignment.questionId,
            content: assignment.content
          },
          ConditionExpression: 'attribute_not_exists(pk)'
        }
      });
    }

    if (items.length > MAX_TRANSACT_ITEMS) {
      throw new RotationCapacityError(items.length, MAX_TRANSACT_ITEMS);
    }

    try {
      await this.client.send(new TransactWriteCommand({ TransactItems: items }));
    } catch (error) {
      if (!(error instanceof TransactionCanceledException)) {
        throw error;
      }
      const failed = (error.CancellationReasons ?? []).flatMap((reason, index) =>
        reason.Code === 'ConditionalCheckFailed' ? [index] : []
      );
      if (failed.length === 0) {
        throw error;
      }
      // Only the pointer swap and the deactivation guard another rotation can trip.
      const guardCount = expectedActiveCycleId === null ? 1 : 2;
      if (failed.some(index => index < guardCount)) {
        throw new RotationConflictError(expectedActiveCycleId, { cause: error });
      }
      throw new RotationIntegrityError(
        cycle.cycleId,
        failed.map(index => transactItemKey(items[index])),
        { cause: error }
      );
    }
  }

  async putRegion(region: Region): Promise<void> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { pk: REGION_PK, sk: region.regionId, regionId: region.regionId, name: region.name },
          ConditionExpression: 'attribute_not_exists(pk) OR #name = :name',
          ExpressionAttributeNames: { '#name': 'name' },
          ExpressionAttributeValues: { ':name': region.name }
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new Error(`Region ${region.regionId} already exists with a different name`, {
          cause: error
        });
      }
      throw error;
    }
  }

  async putQuestion(question: Question): Promise<void> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: QUESTION_PK,
            sk: question.questionId,
            questionId: question.questionId,
            content: question.content
          },
          ConditionExpression: 'attribute_not_exists(pk)'
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new QuestionAlreadyExistsError(question.questionId);
      }
      throw error;
    }
  }

  async addEligibility(regionId: string, questionId: string): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { pk: eligibilityPk(regionId), sk: questionId, regionId, questionId }
      })
    );
  }

  async canConnect(): Promise<boolean> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
      return true;
    } catch (error) {
      return false;
    }
  }

  private async getQuestions(questionIds: string[]): Promise<Question[]> {
    const unique = Array.from(new Set(questionIds));
    const found: Question[] = [];

    for (let offset = 0; offset < unique.length; offset += BATCH_GET_LIMIT) {
      let keys: Record<string, unknown>[] = unique
        .slice(offset, offset + BATCH_GET_LIMIT)
        .map(questionId => ({ pk: QUESTION_PK, sk: questionId }));

      for (let attempt = 1; keys.length > 0; attempt += 1) {
        if (attempt > MAX_BATCH_ATTEMPTS) {
          throw new Error(`Unable to read ${keys.length} questions after ${MAX_BATCH_ATTEMPTS} attempts`);
        }
        const result = await this.client.send(
          new BatchGetCommand({
            RequestItems: { [this.tableName]: { Keys: keys, ConsistentRead: true } }
          })
        );
        for (const item of result.Responses?.[this.tableName] ?? []) {
          found.push(QuestionItemSchema.parse(item));
        }
        keys = result.UnprocessedKeys?.[this.tableName]?.Keys ?? [];
      }
    }

    return found;
  }

  private async queryAll(input: QueryCommandInput): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const page = await this.client.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      );
      items.push(...(page.Items ?? []));
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }
}

function transactItemKey(item: TransactItem | undefined): string {
  const key: Record<string, unknown> = item?.Put?.Item ?? item?.Update?.Key ?? {};
  return `${String(key.pk)}/${String(key.sk)}`;
}
