import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
  DeleteCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export type DynamoItem = Record<string, unknown>;

export interface ConditionalUpdate {
  /** Attribute values to SET; `null` values are REMOVEd instead. */
  set: Record<string, unknown>;
  /** Attribute name and value that must match for the write to apply. */
  condition: { attribute: string; equals: unknown };
  /** Numeric attribute that must be absent or lower than `value`. */
  below?: { attribute: string; value: number };
}

export interface ScanFilter {
  expression: string;
  names?: Record<string, string>;
  values: Record<string, unknown>;
}

function isConditionalCheckFailure(error: unknown): boolean {
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

@Injectable()
export class DynamoDbService implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const dynamoConfig = this.configService.getOrThrow('dynamodb', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = dynamoConfig.tableName;
    this.logger = logger.forContext(DynamoDbService.name);
  }

  /**
   * Insert a new item keyed by `keyAttribute`.
   * Returns false when an item with the same key already exists.
   */
  async putIfAbsent(item: DynamoItem, keyAttribute: string): Promise<boolean> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: 'attribute_not_exists(#key)',
          ExpressionAttributeNames: { '#key': keyAttribute },
        }),
      );
      return true;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        return false;
      }
      throw error;
    }
  }

  async getItem(key: DynamoItem): Promise<DynamoItem | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: key,
        ConsistentRead: true,
      }),
    );

    return result.Item ?? null;
  }

  /**
   * Compare-and-set update. Applies `set` only if the item exists and the
   * condition attribute currently holds the expected value.
   * Returns the updated item, or null when the condition did not hold.
   */
  async updateIf(key: DynamoItem, update: ConditionalUpdate): Promise<DynamoItem | null> {
    const names: Record<string, string> = { '#cond': update.condition.attribute };
    const values: Record<string, unknown> = { ':expected': update.condition.equals };
    const setClauses: string[] = [];
    const removeClauses: string[] = [];

    Object.entries(update.set).forEach(([attribute, value], index) => {
      const nameToken = `#a${index}`;
      names[nameToken] = attribute;
      if (value === null) {
        removeClauses.push(nameToken);
      } else {
        const valueToken = `:v${index}`;
        values[valueToken] = value;
        setClauses.push(`${nameToken} = ${valueToken}`);
      }
    });

    const keyAttribute = Object.keys(key)[0];
    names['#key'] = keyAttribute;

    let conditionExpression = 'attribute_exists(#key) AND #cond = :expected';
    if (update.below) {
      names['#below'] = update.below.attribute;
      values[':below'] = update.below.value;
      conditionExpression += ' AND (attribute_not_exists(#below) OR #below < :below)';
    }

    const updateExpression = [
      setClauses.length > 0 ? `SET ${setClauses.join(', ')}` : '',
      removeClauses.length > 0 ? `REMOVE ${removeClauses.join(', ')}` : '',
    ]
      .filter((clause) => clause.length > 0)
      .join(' ');

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: key,
          UpdateExpression: updateExpression,
          ConditionExpression: conditionExpression,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        }),
      );
      return result.Attributes ?? null;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        this.logger.debug({ key, condition: update.condition }, 'Conditional update rejected');
        return null;
      }
      throw error;
    }
  }

  /**
   * Scan with a filter, following pagination until `limit` matches are
   * collected or the table is exhausted.
   */
  async scan(filter: ScanFilter, limit: number): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DynamoItem | undefined;

    do {
      const result = await this.docClient.send(
        new ScanCommand({
          TableName: this.tableName,
          FilterExpression: filter.expression,
          ExpressionAttributeNames: filter.names,
          ExpressionAttributeValues: filter.values,
          ExclusiveStartKey: exclusiveStartKey,
          ConsistentRead: true,
        }),
      );

      items.push(...(result.Items ?? []));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey && items.length < limit);

    return items.slice(0, limit);
  }

  /**
   * Returns true when an item was deleted.
   */
  async deleteItem(key: DynamoItem): Promise<boolean> {
    const result = await this.docClient.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: key,
        ReturnValues: 'ALL_OLD',
      }),
    );

    return result.Attributes !== undefined;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
