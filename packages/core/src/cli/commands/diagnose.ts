/**
 * Diagnose Command
 *
 * Runs one diagnostic cycle and prints the report.
 */

import type { Command } from 'commander';

import { ConsoleReporter } from '../../reporters/console.js';
import { selectTextGenerator } from '../../runner/generator.js';
import { runDiagnosticCycle } from '../../runner/runner.js';
import type { ConfigOverrides } from '../../config/types.js';
import {
  addCommonOptions,
  createCommandContext,
  errorMessage,
  parseProvider,
  type CommonOptions,
} from '../utils/context.js';
import * as output from '../utils/output.js';

/**
 * Diagnose command options.
 */
interface DiagnoseOptions extends CommonOptions {
  json?: boolean;
  provider?: ConfigOverrides['provider'];
  model?: string;
  /** false when --no-enrich is given */
  enrich: boolean;
}

/**
 * Register the diagnose command.
 */
export function registerDiagnoseCommand(program: Command): void {
  addCommonOptions(
    program
      .command('diagnose')
      .description('Collect metrics, evaluate diagnostic rules and print the analysis')
      .option('--json', 'Output the structured report as JSON')
      .option('-p, --provider <name>', 'Text generation provider (auto, none, gemini, openai, anthropic)', parseProvider)
      .option('-m, --model <name>', 'Model for the text generation provider')
      .option('--no-enrich', 'Skip thread dump and HTTP trace correlation')
  ).action(async (options: DiagnoseOptions) => {
    await diagnoseCommand(options);
  });
}

/**
 * Execute the diagnose command.
 */
async function diagnoseCommand(options: DiagnoseOptions): Promise<void> {
  try {
    const { config, source, log } = await createCommandContext(options, {
      ...(options.provider ? { provider: options.provider } : {}),
      ...(options.model ? { model: options.model } : {}),
      ...(options.enrich === false ? { enrich: false } : {}),
    });

    const { generator, skippedReason } = selectTextGenerator(config.generation);
    if (generator && log) {
      log(`Text generation: ${generator.provider} (${generator.model})`);
    }

    const result = await runDiagnosticCycle(source, {
      thresholds: config.thresholds,
      enrich: config.enrichment.enabled,
      enrichment: {
        traceSampleSize: config.enrichment.traceSampleSize,
        slowTraceMs: config.enrichment.slowTraceMs,
      },
      ...(generator ? { generator } : {}),
      ...(skippedReason ? { skippedReason } : {}),
      ...(log ? { log } : {}),
    });

    if (result.status === 'unavailable') {
      output.exitWithError(result.message);
    }

    if (options.json) {
      output.json(result.report);
      return;
    }

    new ConsoleReporter({ colors: !process.env['NO_COLOR'] }).report(result.report, source.baseUrl);
  } catch (error) {
    output.exitWithError(errorMessage(error));
  }
}
