/**
 * Metrics Module
 *
 * Prometheus exposition parsing into a typed snapshot.
 */

export type {
  MetricsSnapshot,
  RepositoryTiming,
  SnapshotField,
  Accumulation,
  MetricFamily,
  RepositoryTimingKind,
} from './types.js';

export {
  parseExposition,
  createEmptySnapshot,
  parseSampleValue,
  parseLabels,
  tokenizeSample,
  type Sample,
} from './parser.js';

export { METRIC_FAMILIES } from './families.js';
