/**
 * Threads Command
 *
 * Prints BLOCKED threads and their top application frames.
 */

import type { Command } from 'commander';

import { formatStackFrame, normalizeThreadDump, significantFrames } from '../../threads/extractor.js';
import {
  addCommonOptions,
  createCommandContext,
  errorMessage,
  type CommonOptions,
} from '../utils/context.js';
import * as output from '../utils/output.js';

interface ThreadsOptions extends CommonOptions {
  json?: boolean;
}

/**
 * Register the threads command.
 */
export function registerThreadsCommand(program: Command): void {
  addCommonOptions(
    program
      .command('threads')
      .description('Print blocked threads from the thread dump')
      .option('--json', 'Output as JSON')
  ).action(async (options: ThreadsOptions) => {
    await threadsCommand(options);
  });
}

async function threadsCommand(options: ThreadsOptions): Promise<void> {
  try {
    const { source, log } = await createCommandContext(options);
    log?.(`[${source.name}] Collecting thread dump from ${source.baseUrl}`);

    const result = await source.fetchThreadDump();
    if (result.status === 'unavailable') {
      output.exitWithError(`Thread dump unavailable: ${result.reason}`);
    }
    if (result.status === 'empty') {
      output.warning('Thread dump endpoint is not exposed');
      return;
    }

    const blocked = normalizeThreadDump(result.data);

    if (options.json) {
      output.json(
        blocked.map((thread) => ({ ...thread, significantFrames: significantFrames(thread) }))
      );
      return;
    }

    if (blocked.length === 0) {
      output.success('No blocked threads');
      return;
    }

    output.header(`Blocked threads: ${blocked.length}`);
    output.table(
      blocked.map((thread) => ({
        thread: thread.name,
        id: thread.id ?? '-',
        frames: significantFrames(thread).map(formatStackFrame).join(' | ') || '(platform frames only)',
      }))
    );
  } catch (error) {
    output.exitWithError(errorMessage(error));
  }
}
