import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { ConfigMissingError, parseDurationMs, type ConfigSource } from '@question-rotation/core';

export interface DynamoParameterStoreOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
}

export class DynamoParameterStore implements ConfigSource {
  private readonly tableName: string;
  private readonly client: DynamoDBDocumentClient;

  constructor(options: DynamoParameterStoreOptions) {
    if (!options.tableName) {
      throw new Error('CONTROL_TABLE_NAME must be provided for DynamoParameterStore');
    }
    this.tableName = options.tableName;
    this.client = options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  async getDuration(key: string): Promise<number> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: 'CONFIG', sk: key },
        ConsistentRead: true
      })
    );

    const raw: unknown = result.Item?.value;
    if (raw === undefined || raw === null) {
      throw new ConfigMissingError(key);
    }

    const durationMs = parseDurationMs(raw);
    if (durationMs === undefined) {
      throw new ConfigMissingError(key, `${JSON.stringify(raw)} is not a positive duration`);
    }
    return durationMs;
  }

  async putParameter(key: string, value: string | number): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { pk: 'CONFIG', sk: key, value }
      })
    );
  }
}
