/**
 * Runner Types
 *
 * Types for a single diagnostic cycle.
 */

import type { TextGenerator } from '@actuator-sentinel/text-generation';

import type { EnrichmentOptions, Finding, RuleThresholds } from '../diagnostics/types.js';
import type { MetricsSnapshot } from '../metrics/types.js';
import type { StructuredReport } from '../reporters/types.js';

/**
 * Options for {@link runDiagnosticCycle}.
 */
export interface DiagnosticCycleOptions {
  /** Rule threshold overrides */
  thresholds?: Partial<RuleThresholds>;

  /** Correlate findings with thread dumps and traces (default: true) */
  enrich?: boolean;

  /** Trace sampling settings for enrichment */
  enrichment?: Partial<Omit<EnrichmentOptions, 'log'>>;

  /** Text generator for the report; omit for a manual report */
  generator?: TextGenerator;

  /** Why no generator is available, recorded on the report */
  skippedReason?: string;

  /** Receives progress messages */
  log?: (message: string) => void;
}

/**
 * Outcome of one diagnostic cycle.
 * - `unavailable`: metrics could not be collected; `message` is one line
 * - `ok`: snapshot, findings (enriched unless disabled) and report
 */
export type DiagnosticCycleResult =
  | { status: 'unavailable'; message: string }
  | {
      status: 'ok';
      snapshot: MetricsSnapshot;
      findings: Finding[];
      report: StructuredReport;
    };

/**
 * Generator chosen from the generation config.
 */
export interface GeneratorSelection {
  generator?: TextGenerator;
  skippedReason?: string;
}
