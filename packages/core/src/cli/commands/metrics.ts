/**
 * Metrics Command
 *
 * Prints the parsed metrics snapshot.
 */

import type { Command } from 'commander';

import { parseExposition } from '../../metrics/parser.js';
import type { MetricsSnapshot } from '../../metrics/types.js';
import {
  addCommonOptions,
  createCommandContext,
  errorMessage,
  type CommonOptions,
} from '../utils/context.js';
import * as output from '../utils/output.js';

interface MetricsOptions extends CommonOptions {
  json?: boolean;
}

/**
 * Register the metrics command.
 */
export function registerMetricsCommand(program: Command): void {
  addCommonOptions(
    program
      .command('metrics')
      .description('Print the metrics snapshot parsed from the Prometheus endpoint')
      .option('--json', 'Output as JSON')
  ).action(async (options: MetricsOptions) => {
    await metricsCommand(options);
  });
}

/**
 * Snapshot scalars as display rows.
 */
export function snapshotRows(snapshot: MetricsSnapshot): Array<{ metric: string; value: string }> {
  return [
    { metric: 'System CPU usage', value: output.formatPercent(snapshot.systemCpuUsage) },
    { metric: 'JVM memory used', value: output.formatMegabytes(snapshot.jvmMemoryUsedBytes) },
    { metric: 'HTTP requests', value: String(snapshot.httpRequestCount) },
    { metric: 'HTTP max latency', value: output.formatSeconds(snapshot.httpMaxLatencySeconds) },
    { metric: 'GC pauses', value: String(snapshot.gcPauseCount) },
    { metric: 'GC pause time', value: output.formatSeconds(snapshot.gcPauseSeconds, 4) },
    { metric: 'DB connections active', value: String(snapshot.dbConnectionsActive) },
    { metric: 'DB connections pending', value: String(snapshot.dbConnectionsPending) },
    { metric: 'DB connection timeouts', value: String(snapshot.dbConnectionTimeouts) },
    { metric: 'Blocked threads', value: String(snapshot.blockedThreads) },
    { metric: 'Error log events', value: String(snapshot.errorLogEvents) },
  ];
}

async function metricsCommand(options: MetricsOptions): Promise<void> {
  try {
    const { source, log } = await createCommandContext(options);
    log?.(`[${source.name}] Collecting metrics from ${source.baseUrl}`);

    const result = await source.fetchMetrics();
    if (result.status === 'unavailable') {
      output.exitWithError(`Metrics unavailable: ${result.reason}`);
    }
    if (result.status === 'empty') {
      output.exitWithError('Metrics endpoint is not exposed');
    }

    const snapshot = parseExposition(result.data);

    if (options.json) {
      output.json(snapshot);
      return;
    }

    output.header(`Metrics: ${source.baseUrl}`);
    output.table(snapshotRows(snapshot));

    if (snapshot.repositoryTimings.length > 0) {
      output.header('Repository timings');
      output.table(
        snapshot.repositoryTimings.map((timing) => ({
          repository: timing.repository,
          method: timing.method,
          total: output.formatSeconds(timing.totalTimeSeconds),
          avg: output.formatSeconds(timing.avgTimeSeconds, 4),
          max: output.formatSeconds(timing.maxTimeSeconds),
          calls: timing.invocations,
        }))
      );
    }
  } catch (error) {
    output.exitWithError(errorMessage(error));
  }
}
