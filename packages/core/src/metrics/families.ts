/**
 * Metric Families
 *
 * Table of recognized Micrometer metric families. Evaluated in order; the
 * first matching family takes the sample.
 */

import type { MetricFamily } from './types.js';

function contains(...fragments: string[]): (name: string) => boolean {
  return (name) => fragments.every((fragment) => name.includes(fragment));
}

export const METRIC_FAMILIES: readonly MetricFamily[] = [
  {
    field: 'systemCpuUsage',
    matches: contains('system_cpu_usage'),
    accumulation: 'last',
  },
  {
    field: 'jvmMemoryUsedBytes',
    matches: contains('jvm_memory_used_bytes'),
    accumulation: 'sum',
  },
  {
    field: 'httpRequestCount',
    matches: contains('http_server_requests_seconds_count'),
    accumulation: 'sum',
  },
  {
    field: 'httpMaxLatencySeconds',
    matches: contains('http_server_requests_seconds_max'),
    accumulation: 'max',
  },
  {
    field: 'gcPauseCount',
    matches: contains('jvm_gc_pause_seconds_count'),
    accumulation: 'sum',
  },
  {
    field: 'gcPauseSeconds',
    matches: contains('jvm_gc_pause_seconds_sum'),
    accumulation: 'sum',
  },
  {
    field: 'dbConnectionsActive',
    matches: contains('hikaricp_connections_active'),
    accumulation: 'last',
  },
  {
    field: 'dbConnectionsPending',
    matches: contains('hikaricp_connections_pending'),
    accumulation: 'last',
  },
  {
    field: 'dbConnectionTimeouts',
    matches: contains('hikaricp_connections_timeout'),
    accumulation: 'sum',
  },
  {
    field: 'blockedThreads',
    matches: contains('jvm_threads_states', 'state="blocked"'),
    accumulation: 'last',
  },
  {
    field: 'errorLogEvents',
    matches: contains('logback_events_total', 'level="error"'),
    accumulation: 'sum',
  },
];
