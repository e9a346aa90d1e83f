/**
 * Table metadata types.
 */

import type { ScalarType } from './value.js';

export interface KeyAttribute {
  name: string;
  type: ScalarType;
}

/**
 * Primary key of a table: a partition key and an optional sort key.
 */
export interface KeySchema {
  partitionKey: KeyAttribute;
  sortKey?: KeyAttribute;
}

export type BillingMode = 'PROVISIONED' | 'PAY_PER_REQUEST';

export interface Throughput {
  readCapacityUnits: number;
  writeCapacityUnits: number;
}

export interface IndexProjection {
  type: 'ALL' | 'KEYS_ONLY' | 'INCLUDE';
  nonKeyAttributes?: string[];
}

export interface SecondaryIndex {
  name: string;
  keySchema: KeySchema;
  projection: IndexProjection;
  /** Only set on global indexes of provisioned tables */
  throughput?: Throughput;
}

export interface StreamSpecification {
  enabled: boolean;
  viewType?: 'KEYS_ONLY' | 'NEW_IMAGE' | 'OLD_IMAGE' | 'NEW_AND_OLD_IMAGES';
}

/**
 * Everything needed to create a table.
 */
export interface TableDefinition {
  name: string;
  keySchema: KeySchema;
  /** Every attribute referenced by the table key or an index key */
  attributeDefinitions: KeyAttribute[];
  billingMode: BillingMode;
  throughput?: Throughput;
  localSecondaryIndexes: SecondaryIndex[];
  globalSecondaryIndexes: SecondaryIndex[];
  stream?: StreamSpecification;
}

/**
 * Table definition plus the read-only state reported by the service.
 */
export interface TableDescriptor extends TableDefinition {
  status: string;
  /** Approximate; refreshed by the service roughly every six hours */
  itemCount: number;
  sizeBytes: number;
  createdAt?: Date;
  arn?: string;
}

export interface TableSummary {
  name: string;
  status: string;
  itemCount: number;
  sizeBytes: number;
}

/**
 * Key attribute names in schema order.
 */
export function keyAttributeNames(schema: KeySchema): string[] {
  return schema.sortKey ? [schema.partitionKey.name, schema.sortKey.name] : [schema.partitionKey.name];
}

/**
 * Looks up the declared scalar type of each key attribute.
 */
export function keyTypeHints(schema: KeySchema): Record<string, ScalarType> {
  const hints: Record<string, ScalarType> = { [schema.partitionKey.name]: schema.partitionKey.type };
  if (schema.sortKey) {
    hints[schema.sortKey.name] = schema.sortKey.type;
  }
  return hints;
}

/**
 * Two key schemas match when names and types of both key parts agree.
 */
export function sameKeySchema(a: KeySchema, b: KeySchema): boolean {
  const sameAttribute = (x?: KeyAttribute, y?: KeyAttribute): boolean =>
    x === undefined || y === undefined ? x === y : x.name === y.name && x.type === y.type;
  return sameAttribute(a.partitionKey, b.partitionKey) && sameAttribute(a.sortKey, b.sortKey);
}

/**
 * Extracts the creatable definition from a described table, optionally under a new name.
 */
export function toTableDefinition(descriptor: TableDescriptor, name: string = descriptor.name): TableDefinition {
  return {
    name,
    keySchema: descriptor.keySchema,
    attributeDefinitions: descriptor.attributeDefinitions,
    billingMode: descriptor.billingMode,
    throughput: descriptor.throughput,
    localSecondaryIndexes: descriptor.localSecondaryIndexes,
    globalSecondaryIndexes: descriptor.globalSecondaryIndexes,
    stream: descriptor.stream,
  };
}
