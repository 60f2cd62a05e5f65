/**
 * @actuator-sentinel/core
 *
 * Performance diagnosis for Spring applications from their actuator
 * management endpoints.
 *
 * @example
 * ```typescript
 * // sentinel.config.ts
 * import { defineConfig } from '@actuator-sentinel/core';
 *
 * export default defineConfig({
 *   target: { baseUrl: '$MANAGEMENT_URL' },
 *   thresholds: { gcPauseSeconds: 2 },
 * });
 * ```
 *
 * Then run:
 * ```bash
 * npx actuator-sentinel diagnose
 * npx actuator-sentinel metrics --json
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Configuration
// =============================================================================

export {
  defineConfig,
  loadConfig,
  loadConfigFile,
  findConfigFile,
  hasConfigFile,
  resolveConfig,
  validateConfig,
  resolveEnvVar,
  resolveEnvVarOptional,
} from './config/index.js';

export type {
  SentinelConfig,
  TargetConfig,
  EnrichmentConfig,
  GenerationConfig,
  ResolvedConfig,
  ConfigOverrides,
} from './config/index.js';

// =============================================================================
// Metrics
// =============================================================================

export { parseExposition, createEmptySnapshot, METRIC_FAMILIES } from './metrics/index.js';

export type { MetricsSnapshot, RepositoryTiming } from './metrics/index.js';

// =============================================================================
// Traces & Threads
// =============================================================================

export { normalizeTraces, formatTraceRecord } from './traces/index.js';

export type { TraceRecord } from './traces/index.js';

export { normalizeThreadDump, significantFrames, formatStackFrame } from './threads/index.js';

export type { ThreadDumpEntry, StackFrame } from './threads/index.js';

// =============================================================================
// Sources
// =============================================================================

export { createActuatorSource } from './sources/index.js';

export type { ManagementSource, SourceResult, ActuatorSourceConfig } from './sources/index.js';

// =============================================================================
// Diagnostics
// =============================================================================

export {
  evaluateRules,
  enrichFindings,
  renderFinding,
  RULE_IDS,
  NO_FINDINGS_MESSAGE,
} from './diagnostics/index.js';

export type { Finding, RuleThresholds, EnrichmentOptions } from './diagnostics/index.js';

// =============================================================================
// Reports
// =============================================================================

export { composeReport, generateReport, ConsoleReporter } from './reporters/index.js';

export type { StructuredReport, ReportGenerationOptions } from './reporters/index.js';

// =============================================================================
// Runner
// =============================================================================

export { runDiagnosticCycle, selectTextGenerator } from './runner/index.js';

export type { DiagnosticCycleOptions, DiagnosticCycleResult } from './runner/index.js';

// =============================================================================
// CLI
// =============================================================================

export { createCli, runCli } from './cli/index.js';
