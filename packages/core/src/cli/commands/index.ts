/**
 * CLI Commands
 *
 * Register all CLI commands.
 */

export { registerDiagnoseCommand } from './diagnose.js';
export { registerMetricsCommand, snapshotRows } from './metrics.js';
export { registerTracesCommand } from './traces.js';
export { registerThreadsCommand } from './threads.js';
