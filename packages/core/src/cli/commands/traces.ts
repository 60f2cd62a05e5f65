/**
 * Traces Command
 *
 * Prints recent HTTP traces from the trace / exchanges endpoint.
 */

import type { Command } from 'commander';

import { normalizeTraces } from '../../traces/normalizer.js';
import {
  addCommonOptions,
  createCommandContext,
  errorMessage,
  type CommonOptions,
} from '../utils/context.js';
import * as output from '../utils/output.js';

interface TracesOptions extends CommonOptions {
  json?: boolean;
  slow?: boolean;
}

/**
 * Register the traces command.
 */
export function registerTracesCommand(program: Command): void {
  addCommonOptions(
    program
      .command('traces')
      .description('Print recent HTTP traces')
      .option('--slow', 'Only traces above the slow-request threshold')
      .option('--json', 'Output as JSON')
  ).action(async (options: TracesOptions) => {
    await tracesCommand(options);
  });
}

async function tracesCommand(options: TracesOptions): Promise<void> {
  try {
    const { config, source, log } = await createCommandContext(options);
    log?.(`[${source.name}] Collecting HTTP traces from ${source.baseUrl}`);

    const result = await source.fetchTraces();
    if (result.status === 'unavailable') {
      output.exitWithError(`HTTP traces unavailable: ${result.reason}`);
    }
    if (result.status === 'empty') {
      output.warning('No HTTP trace endpoint is exposed (httptrace, http-trace, httpexchanges)');
      return;
    }

    const slowTraceMs = config.enrichment.slowTraceMs;
    const records = normalizeTraces(result.data).filter(
      (record) => !options.slow || record.elapsedMs > slowTraceMs
    );

    if (options.json) {
      output.json(records);
      return;
    }

    if (records.length === 0) {
      output.info(options.slow ? `No traces above ${slowTraceMs} ms` : 'No traces recorded');
      return;
    }

    output.header(`HTTP traces: ${source.baseUrl}`);
    output.table(
      records.map((record) => ({
        method: record.method,
        uri: output.truncate(record.uri, 60),
        status: record.status ?? '-',
        elapsed: output.formatDuration(record.elapsedMs),
        timestamp: record.timestamp,
      }))
    );
  } catch (error) {
    output.exitWithError(errorMessage(error));
  }
}
