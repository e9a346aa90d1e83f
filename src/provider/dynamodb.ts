/**
 * TableService backed by the DynamoDB low-level client.
 *
 * Values go through the SDK's typed AttributeValue shape rather than the
 * document client, so number precision and set types survive unchanged.
 */

import {
  BatchWriteItemCommand,
  CreateTableCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  ListTablesCommand,
  ScanCommand,
  waitUntilTableExists,
  waitUntilTableNotExists,
} from '@aws-sdk/client-dynamodb';
import type {
  AttributeDefinition,
  AttributeValue,
  CreateTableCommandInput,
  DynamoDBClient,
  KeySchemaElement,
  Projection,
  ScanCommandInput,
  TableDescription,
  WriteRequest as SdkWriteRequest,
} from '@aws-sdk/client-dynamodb';
import { fromAttributeMap, toAttributeMap } from '../codec/index.js';
import { mapAwsError, OperationCancelledError, TableNotFoundError, ValidationError } from '../error/index.js';
import { toFilterExpression } from '../filter/index.js';
import { throwIfAborted } from '../resilience/index.js';
import type {
  BatchWriteOutcome,
  IndexProjection,
  KeyAttribute,
  KeySchema,
  Page,
  ScanPageRequest,
  SecondaryIndex,
  TableDefinition,
  TableDescriptor,
  WriteRequest,
} from '../types/index.js';
import { DYNAMODB_LIMITS } from './types.js';
import type { ProviderCapabilities, ProviderLimits, TableService, TableWaitState } from './types.js';

/**
 * Continuation token: the LastEvaluatedKey of the previous page
 */
export type DynamoDBToken = Record<string, AttributeValue>;

export interface DynamoDBTableServiceOptions {
  /** Upper bound on table state waits, in seconds */
  maxWaitSeconds?: number;
  /** Strongly consistent scans (double read cost) */
  consistentRead?: boolean;
}

export class DynamoDBTableService implements TableService<DynamoDBToken> {
  readonly limits: ProviderLimits = DYNAMODB_LIMITS;
  readonly capabilities: ProviderCapabilities = { filterPushdown: true };

  private readonly client: DynamoDBClient;
  private readonly maxWaitSeconds: number;
  private readonly consistentRead: boolean;

  constructor(client: DynamoDBClient, options: DynamoDBTableServiceOptions = {}) {
    this.client = client;
    this.maxWaitSeconds = options.maxWaitSeconds ?? 600;
    this.consistentRead = options.consistentRead ?? false;
  }

  async describeTable(tableName: string): Promise<TableDescriptor | undefined> {
    try {
      const output = await this.client.send(new DescribeTableCommand({ TableName: tableName }));
      return output.Table ? toTableDescriptor(output.Table) : undefined;
    } catch (error) {
      const mapped = mapAwsError(error, { tableName });
      if (mapped instanceof TableNotFoundError) {
        return undefined;
      }
      throw mapped;
    }
  }

  async *listTables(): AsyncIterable<string> {
    let exclusiveStartTableName: string | undefined;
    do {
      const output = await this.send(
        () => this.client.send(new ListTablesCommand({ ExclusiveStartTableName: exclusiveStartTableName })),
        undefined
      );
      for (const name of output.TableNames ?? []) {
        yield name;
      }
      exclusiveStartTableName = output.LastEvaluatedTableName;
    } while (exclusiveStartTableName);
  }

  async scanPage(request: ScanPageRequest<DynamoDBToken>): Promise<Page<DynamoDBToken>> {
    const input: ScanCommandInput = {
      TableName: request.tableName,
      Limit: request.limit,
      ExclusiveStartKey: request.token,
      ConsistentRead: this.consistentRead || undefined,
      ReturnConsumedCapacity: 'TOTAL',
    };

    if (request.segment && request.segment.total > 1) {
      input.Segment = request.segment.index;
      input.TotalSegments = request.segment.total;
    }

    const names: Record<string, string> = {};
    if (request.filter) {
      const expression = toFilterExpression(request.filter);
      input.FilterExpression = expression.expression;
      Object.assign(names, expression.names);
      if (Object.keys(expression.values).length > 0) {
        input.ExpressionAttributeValues = expression.values;
      }
    }
    if (request.projection && request.projection.length > 0) {
      input.ProjectionExpression = request.projection
        .map((attribute, index) => {
          names[`#proj${index}`] = attribute;
          return `#proj${index}`;
        })
        .join(', ');
    }
    if (Object.keys(names).length > 0) {
      input.ExpressionAttributeNames = names;
    }

    const output = await this.send(() => this.client.send(new ScanCommand(input)), request.tableName);
    return {
      items: (output.Items ?? []).map(fromAttributeMap),
      scannedCount: output.ScannedCount ?? 0,
      token: output.LastEvaluatedKey,
      consumedCapacity: output.ConsumedCapacity?.CapacityUnits,
    };
  }

  async batchWrite(tableName: string, requests: WriteRequest[]): Promise<BatchWriteOutcome> {
    const output = await this.send(
      () =>
        this.client.send(
          new BatchWriteItemCommand({
            RequestItems: { [tableName]: requests.map(toSdkWriteRequest) },
            ReturnConsumedCapacity: 'TOTAL',
          })
        ),
      tableName
    );
    const unprocessed = output.UnprocessedItems?.[tableName] ?? [];
    return {
      unprocessed: unprocessed.map(fromSdkWriteRequest),
      consumedCapacity: output.ConsumedCapacity?.reduce(
        (total, capacity) => total + (capacity.CapacityUnits ?? 0),
        0
      ),
    };
  }

  async createTable(definition: TableDefinition): Promise<void> {
    await this.send(() => this.client.send(new CreateTableCommand(toCreateTableInput(definition))), definition.name);
  }

  async deleteTable(tableName: string): Promise<void> {
    await this.send(() => this.client.send(new DeleteTableCommand({ TableName: tableName })), tableName);
  }

  async waitForTable(tableName: string, state: TableWaitState, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const waiter = state === 'ACTIVE' ? waitUntilTableExists : waitUntilTableNotExists;
    try {
      await waiter(
        { client: this.client, maxWaitTime: this.maxWaitSeconds, abortSignal: signal },
        { TableName: tableName }
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError();
      }
      throw mapAwsError(error, { tableName });
    }
  }

  private async send<T>(operation: () => Promise<T>, tableName: string | undefined): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw mapAwsError(error, { tableName });
    }
  }
}

// ============================================================================
// Write request conversion
// ============================================================================

function toSdkWriteRequest(request: WriteRequest): SdkWriteRequest {
  return request.type === 'put'
    ? { PutRequest: { Item: toAttributeMap(request.item) } }
    : { DeleteRequest: { Key: toAttributeMap(request.key) } };
}

function fromSdkWriteRequest(request: SdkWriteRequest): WriteRequest {
  if (request.PutRequest?.Item) {
    return { type: 'put', item: fromAttributeMap(request.PutRequest.Item) };
  }
  if (request.DeleteRequest?.Key) {
    return { type: 'delete', key: fromAttributeMap(request.DeleteRequest.Key) };
  }
  throw new ValidationError('Unprocessed write request has neither PutRequest nor DeleteRequest');
}

// ============================================================================
// Table description conversion
// ============================================================================

export function toTableDescriptor(table: TableDescription): TableDescriptor {
  const attributeDefinitions = (table.AttributeDefinitions ?? []).map(toKeyAttribute);
  const name = table.TableName ?? '';
  const billingMode = table.BillingModeSummary?.BillingMode ?? 'PROVISIONED';
  const throughputOf = (read?: number, write?: number) =>
    billingMode === 'PROVISIONED'
      ? { readCapacityUnits: read ?? 0, writeCapacityUnits: write ?? 0 }
      : undefined;

  return {
    name,
    keySchema: toKeySchema(table.KeySchema ?? [], attributeDefinitions, name),
    attributeDefinitions,
    billingMode,
    throughput: throughputOf(
      table.ProvisionedThroughput?.ReadCapacityUnits,
      table.ProvisionedThroughput?.WriteCapacityUnits
    ),
    localSecondaryIndexes: (table.LocalSecondaryIndexes ?? []).map((index) => ({
      name: index.IndexName ?? '',
      keySchema: toKeySchema(index.KeySchema ?? [], attributeDefinitions, name),
      projection: toIndexProjection(index.Projection),
    })),
    globalSecondaryIndexes: (table.GlobalSecondaryIndexes ?? []).map((index) => ({
      name: index.IndexName ?? '',
      keySchema: toKeySchema(index.KeySchema ?? [], attributeDefinitions, name),
      projection: toIndexProjection(index.Projection),
      throughput: throughputOf(
        index.ProvisionedThroughput?.ReadCapacityUnits,
        index.ProvisionedThroughput?.WriteCapacityUnits
      ),
    })),
    stream: table.StreamSpecification
      ? {
          enabled: table.StreamSpecification.StreamEnabled ?? false,
          viewType: table.StreamSpecification.StreamViewType,
        }
      : undefined,
    status: table.TableStatus ?? 'UNKNOWN',
    itemCount: table.ItemCount ?? 0,
    sizeBytes: table.TableSizeBytes ?? 0,
    createdAt: table.CreationDateTime,
    arn: table.TableArn,
  };
}

function toKeyAttribute(definition: AttributeDefinition): KeyAttribute {
  const type = definition.AttributeType;
  if (!definition.AttributeName || !type) {
    throw new ValidationError('Attribute definition is missing its name or type');
  }
  return { name: definition.AttributeName, type };
}

function toKeySchema(elements: KeySchemaElement[], definitions: KeyAttribute[], tableName: string): KeySchema {
  const attributeFor = (keyType: 'HASH' | 'RANGE'): KeyAttribute | undefined => {
    const element = elements.find((candidate) => candidate.KeyType === keyType);
    if (!element) {
      return undefined;
    }
    const definition = definitions.find((candidate) => candidate.name === element.AttributeName);
    if (!definition) {
      throw new ValidationError(`Key attribute ${element.AttributeName ?? ''} of ${tableName} has no definition`);
    }
    return definition;
  };

  const partitionKey = attributeFor('HASH');
  if (!partitionKey) {
    throw new ValidationError(`Table ${tableName} has no partition key`);
  }
  const sortKey = attributeFor('RANGE');
  return sortKey ? { partitionKey, sortKey } : { partitionKey };
}

function toIndexProjection(projection: Projection | undefined): IndexProjection {
  return {
    type: projection?.ProjectionType ?? 'ALL',
    nonKeyAttributes: projection?.NonKeyAttributes,
  };
}

// ============================================================================
// Table creation
// ============================================================================

function toSdkKeySchema(schema: KeySchema): KeySchemaElement[] {
  const elements: KeySchemaElement[] = [{ AttributeName: schema.partitionKey.name, KeyType: 'HASH' }];
  if (schema.sortKey) {
    elements.push({ AttributeName: schema.sortKey.name, KeyType: 'RANGE' });
  }
  return elements;
}

function toSdkProjection(projection: IndexProjection): Projection {
  return {
    ProjectionType: projection.type,
    NonKeyAttributes: projection.type === 'INCLUDE' ? projection.nonKeyAttributes : undefined,
  };
}

export function toCreateTableInput(definition: TableDefinition): CreateTableCommandInput {
  const provisioned = definition.billingMode === 'PROVISIONED';
  const throughputOf = (index?: SecondaryIndex) => {
    const throughput = index ? index.throughput : definition.throughput;
    return provisioned
      ? {
          ReadCapacityUnits: Math.max(1, throughput?.readCapacityUnits ?? 1),
          WriteCapacityUnits: Math.max(1, throughput?.writeCapacityUnits ?? 1),
        }
      : undefined;
  };

  const input: CreateTableCommandInput = {
    TableName: definition.name,
    KeySchema: toSdkKeySchema(definition.keySchema),
    AttributeDefinitions: definition.attributeDefinitions.map((attribute) => ({
      AttributeName: attribute.name,
      AttributeType: attribute.type,
    })),
    BillingMode: definition.billingMode,
    ProvisionedThroughput: throughputOf(),
  };

  if (definition.localSecondaryIndexes.length > 0) {
    input.LocalSecondaryIndexes = definition.localSecondaryIndexes.map((index) => ({
      IndexName: index.name,
      KeySchema: toSdkKeySchema(index.keySchema),
      Projection: toSdkProjection(index.projection),
    }));
  }
  if (definition.globalSecondaryIndexes.length > 0) {
    input.GlobalSecondaryIndexes = definition.globalSecondaryIndexes.map((index) => ({
      IndexName: index.name,
      KeySchema: toSdkKeySchema(index.keySchema),
      Projection: toSdkProjection(index.projection),
      ProvisionedThroughput: throughputOf(index),
    }));
  }
  if (definition.stream?.enabled) {
    input.StreamSpecification = { StreamEnabled: true, StreamViewType: definition.stream.viewType };
  }

  return input;
}
