/**
 * Metrics Types
 *
 * Aggregated diagnostic state for one scrape of the Prometheus endpoint.
 */

// =============================================================================
// Repository Timing
// =============================================================================

/**
 * Per (repository, method) aggregate of Spring Data invocation timings.
 *
 * Built from the `sum`, `count` and `max` samples that share a label set.
 */
export interface RepositoryTiming {
  /** Repository interface name (`repository` label) */
  repository: string;

  /** Repository method name (`method` label) */
  method: string;

  /** Sum of all `sum` samples, in seconds */
  totalTimeSeconds: number;

  /** Sum of all `count` samples */
  invocations: number;

  /** totalTimeSeconds / invocations, or 0 without invocations */
  avgTimeSeconds: number;

  /** Largest `max` sample seen, in seconds */
  maxTimeSeconds: number;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Aggregated metrics for one scrape cycle.
 *
 * Every field starts at zero; a metric family missing from the exposition
 * text simply leaves its field at zero.
 */
export interface MetricsSnapshot {
  /** System CPU utilization fraction (last sample wins) */
  systemCpuUsage: number;

  /** JVM memory used in bytes, summed over every memory pool */
  jvmMemoryUsedBytes: number;

  /** HTTP server request count, summed over every endpoint */
  httpRequestCount: number;

  /** Largest HTTP server max latency, in seconds */
  httpMaxLatencySeconds: number;

  /** Number of GC pauses */
  gcPauseCount: number;

  /** Total time spent in GC pauses, in seconds */
  gcPauseSeconds: number;

  /** Active pool connections (last sample wins) */
  dbConnectionsActive: number;

  /** Threads waiting for a pool connection (last sample wins) */
  dbConnectionsPending: number;

  /** Connection acquisition timeouts, summed */
  dbConnectionTimeouts: number;

  /** Threads in BLOCKED state (last sample wins) */
  blockedThreads: number;

  /** ERROR-level log events, summed */
  errorLogEvents: number;

  /** Repository timings, sorted by total time descending */
  repositoryTimings: RepositoryTiming[];
}

/**
 * Scalar (numeric) snapshot fields.
 */
export type SnapshotField = Exclude<keyof MetricsSnapshot, 'repositoryTimings'>;

/**
 * How repeated samples of a family fold into one field.
 * - `sum`: additive counter
 * - `last`: gauge, the last sample in file order wins
 * - `max`: running maximum
 */
export type Accumulation = 'sum' | 'last' | 'max';

/**
 * One entry of the metric family table.
 */
export interface MetricFamily {
  /** Target snapshot field */
  field: SnapshotField;

  /** Predicate over the sample name token (labels included) */
  matches: (name: string) => boolean;

  /** Accumulation rule */
  accumulation: Accumulation;
}

/**
 * The three sample kinds of the repository timing family.
 */
export type RepositoryTimingKind = 'sum' | 'count' | 'max';
