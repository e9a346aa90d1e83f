export type { Value, ValueType, ValueOf, ScalarType } from './value.js';
export { Values, isSetValue } from './value.js';

export type { Item, Key } from './item.js';

export type {
  KeyAttribute,
  KeySchema,
  BillingMode,
  Throughput,
  IndexProjection,
  SecondaryIndex,
  StreamSpecification,
  TableDefinition,
  TableDescriptor,
  TableSummary,
} from './table.js';
export { keyAttributeNames, keyTypeHints, sameKeySchema, toTableDefinition } from './table.js';

export type { Filter, FilterKind } from './filter.js';

export type { ScanSegment, ScanPageRequest, Page } from './page.js';

export type {
  WriteMode,
  WriteRequest,
  BatchWriteOutcome,
  FailureReason,
  RecordFailure,
  WriteSummary,
} from './batch.js';
