/**
 * CLI Module
 *
 * Command-line interface for actuator-sentinel.
 */

import { Command } from 'commander';

import {
  registerDiagnoseCommand,
  registerMetricsCommand,
  registerTracesCommand,
  registerThreadsCommand,
} from './commands/index.js';

// Re-export for convenience
export * from './commands/index.js';
export * as output from './utils/output.js';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
  const program = new Command();

  program
    .name('actuator-sentinel')
    .description('Performance diagnosis from Spring actuator management endpoints')
    .version('0.1.0');

  // Register commands
  registerDiagnoseCommand(program);
  registerMetricsCommand(program);
  registerTracesCommand(program);
  registerThreadsCommand(program);

  return program;
}

/**
 * Run the CLI.
 */
export async function runCli(argv?: string[]): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
