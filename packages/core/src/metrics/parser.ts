/**
 * Exposition Parser
 *
 * Turns Prometheus exposition text (as served by `/actuator/prometheus`) into
 * a {@link MetricsSnapshot}.
 *
 * The text is untrusted: a line that cannot be split into a name and a
 * numeric value is skipped and parsing continues.
 */

import { METRIC_FAMILIES } from './families.js';
import type {
  MetricFamily,
  MetricsSnapshot,
  RepositoryTiming,
  RepositoryTimingKind,
} from './types.js';

// =============================================================================
// Tokenizing
// =============================================================================

const REPOSITORY_TIMING_PATTERN =
  /^spring_data_repository_invocations_seconds_(sum|count|max)\{(.*)\}$/;

const FLOAT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const UNKNOWN_LABEL = 'unknown';

/**
 * A sample line split into its name token (labels included) and value.
 */
export interface Sample {
  name: string;
  value: number;
}

/**
 * Parse a sample value token.
 *
 * Accepts float literals and `+Inf` / `-Inf`. `NaN` and anything else
 * returns null.
 */
export function parseSampleValue(token: string): number | null {
  const lowered = token.toLowerCase();
  if (lowered === '+inf' || lowered === 'inf') return Number.POSITIVE_INFINITY;
  if (lowered === '-inf') return Number.NEGATIVE_INFINITY;
  if (!FLOAT_PATTERN.test(token)) return null;
  return Number(token);
}

/**
 * Split a data line into name and value.
 *
 * The name is the first whitespace-separated token and the value is always
 * the last one. Returns null for comments, blank lines and malformed lines.
 */
export function tokenizeSample(line: string): Sample | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  const parts = trimmed.split(/\s+/);
  if (parts.length < 2) {
    return null;
  }

  const value = parseSampleValue(parts[parts.length - 1]);
  if (value === null) {
    return null;
  }

  return { name: parts[0], value };
}

/**
 * Parse a label block (`key="value",key2="value2"`) into a record.
 * Pairs without `=` are ignored.
 */
export function parseLabels(block: string): Record<string, string> {
  const labels: Record<string, string> = {};

  for (const pair of block.split(',')) {
    const separator = pair.indexOf('=');
    if (separator < 0) continue;

    const key = pair.slice(0, separator).trim();
    if (!key) continue;

    labels[key] = unquote(pair.slice(separator + 1).trim());
  }

  return labels;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

// =============================================================================
// Accumulation
// =============================================================================

/**
 * Create a snapshot with every field at its zero default.
 */
export function createEmptySnapshot(): MetricsSnapshot {
  return {
    systemCpuUsage: 0,
    jvmMemoryUsedBytes: 0,
    httpRequestCount: 0,
    httpMaxLatencySeconds: 0,
    gcPauseCount: 0,
    gcPauseSeconds: 0,
    dbConnectionsActive: 0,
    dbConnectionsPending: 0,
    dbConnectionTimeouts: 0,
    blockedThreads: 0,
    errorLogEvents: 0,
    repositoryTimings: [],
  };
}

function applyFamily(snapshot: MetricsSnapshot, family: MetricFamily, value: number): void {
  const current = snapshot[family.field];

  switch (family.accumulation) {
    case 'sum':
      snapshot[family.field] = current + value;
      break;
    case 'last':
      snapshot[family.field] = value;
      break;
    case 'max':
      snapshot[family.field] = Math.max(current, value);
      break;
  }
}

/**
 * Accumulates repository timing samples keyed by (repository, method).
 * Insertion order of the map is first-seen order.
 */
class RepositoryTimingAccumulator {
  private readonly timings = new Map<string, RepositoryTiming>();

  add(kind: RepositoryTimingKind, labelBlock: string, value: number): void {
    const labels = parseLabels(labelBlock);
    const repository = labels['repository'] ?? UNKNOWN_LABEL;
    const method = labels['method'] ?? UNKNOWN_LABEL;
    const key = `${repository}\u0000${method}`;

    let timing = this.timings.get(key);
    if (!timing) {
      timing = {
        repository,
        method,
        totalTimeSeconds: 0,
        invocations: 0,
        avgTimeSeconds: 0,
        maxTimeSeconds: 0,
      };
      this.timings.set(key, timing);
    }

    switch (kind) {
      case 'sum':
        timing.totalTimeSeconds += value;
        break;
      case 'count':
        timing.invocations += value;
        break;
      case 'max':
        timing.maxTimeSeconds = Math.max(timing.maxTimeSeconds, value);
        break;
    }
  }

  /**
   * Compute averages and sort by total time descending. Array#sort is
   * stable, so ties keep first-seen order.
   */
  finalize(): RepositoryTiming[] {
    const timings = [...this.timings.values()].map((timing) => ({
      ...timing,
      avgTimeSeconds: timing.invocations > 0 ? timing.totalTimeSeconds / timing.invocations : 0,
    }));

    return timings.sort((a, b) => b.totalTimeSeconds - a.totalTimeSeconds);
  }
}

function isRepositoryTimingKind(kind: string): kind is RepositoryTimingKind {
  return kind === 'sum' || kind === 'count' || kind === 'max';
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse Prometheus exposition text into a snapshot.
 *
 * Never throws. Unrecognized metric names are ignored; text without any
 * recognized line yields {@link createEmptySnapshot}.
 *
 * @example
 * ```typescript
 * const snapshot = parseExposition(
 *   'jvm_gc_pause_seconds_sum{action="end of minor GC",} 1.5\n'
 * );
 * snapshot.gcPauseSeconds; // 1.5
 * ```
 */
export function parseExposition(text: string): MetricsSnapshot {
  const snapshot = createEmptySnapshot();
  const repositoryTimings = new RepositoryTimingAccumulator();

  for (const line of text.split('\n')) {
    const sample = tokenizeSample(line);
    if (!sample) continue;

    const repositoryMatch = REPOSITORY_TIMING_PATTERN.exec(sample.name);
    if (repositoryMatch) {
      const [, kind, labelBlock] = repositoryMatch;
      if (isRepositoryTimingKind(kind)) {
        repositoryTimings.add(kind, labelBlock, sample.value);
      }
      continue;
    }

    const family = METRIC_FAMILIES.find((candidate) => candidate.matches(sample.name));
    if (family) {
      applyFamily(snapshot, family, sample.value);
    }
  }

  snapshot.repositoryTimings = repositoryTimings.finalize();
  return snapshot;
}
