/**
 * Observability: logging, metrics and progress accounting
 */

export { ConsoleLogger, NoopLogger, logOperation, logError, logRetry } from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';

export { InMemoryMetricsCollector, NoopMetricsCollector, TransferMetricNames } from './metrics.js';
export type { MetricsCollector, MetricsSnapshot, HistogramSummary } from './metrics.js';

export { TransferProgress } from './progress.js';
export type {
  CapacityKind,
  CapacityUsage,
  ProgressSnapshot,
  ProgressListener,
  TransferProgressOptions,
} from './progress.js';
