/**
 * Runner Module
 *
 * Diagnostic cycle execution.
 */

// Types
export type {
  DiagnosticCycleOptions,
  DiagnosticCycleResult,
  GeneratorSelection,
} from './types.js';

// Runner
export { runDiagnosticCycle } from './runner.js';

// Generator selection
export { selectTextGenerator } from './generator.js';
