/**
 * Diagnostics Types
 *
 * Findings produced by the rule engine and the evidence appended to them by
 * the correlation enricher.
 */

import type { MetricsSnapshot } from '../metrics/types.js';

// =============================================================================
// Findings
// =============================================================================

/**
 * Stable rule identities.
 */
export const RULE_IDS = {
  memoryPressure: 'memory-pressure',
  dataAccessBottleneck: 'data-access-bottleneck',
  threadContention: 'thread-contention',
  noFindings: 'no-findings',
  blockedThreadEvidence: 'blocked-thread-evidence',
  slowTraceEvidence: 'slow-trace-evidence',
} as const;

export type RuleId = (typeof RULE_IDS)[keyof typeof RULE_IDS];

/**
 * Kind of finding.
 * - 'diagnosis': a rule fired
 * - 'info': nothing fired (fallback message)
 * - 'evidence': secondary data attached by enrichment
 */
export type FindingKind = 'diagnosis' | 'info' | 'evidence';

/**
 * One diagnostic statement.
 *
 * Findings carry no severity; their order is the order rules are evaluated
 * in, followed by evidence in the order it was attached.
 */
export interface Finding {
  /** Rule that produced the finding */
  ruleId: RuleId;

  kind: FindingKind;

  /** Short heading, empty for the fallback message */
  title: string;

  /** What the signals indicate */
  diagnosis: string;

  /** Recommended action */
  recommendation?: string;

  /** Supporting lines (e.g. the most expensive repository methods) */
  details: string[];

  /** Evidence block attached by enrichment */
  evidence?: string;
}

// =============================================================================
// Rules
// =============================================================================

/**
 * Thresholds used by the rule engine.
 */
export interface RuleThresholds {
  /** Cumulative GC pause, in seconds (default: 1.0) */
  gcPauseSeconds: number;

  /** Blocked-thread gauge (default: 5) */
  blockedThreads: number;

  /** Repository timings listed in the data-access finding (default: 5) */
  topRepositoryTimings: number;
}

/**
 * One rule of the engine. Rules are independent and every applicable rule
 * fires.
 */
export interface DiagnosticRule {
  id: RuleId;
  applies(snapshot: MetricsSnapshot, thresholds: RuleThresholds): boolean;
  build(snapshot: MetricsSnapshot, thresholds: RuleThresholds): Finding;
}

// =============================================================================
// Enrichment
// =============================================================================

/**
 * Options for the correlation enricher.
 */
export interface EnrichmentOptions {
  /** Traces inspected, from the start of the list (default: 10) */
  traceSampleSize: number;

  /** Elapsed time above which a trace is slow, in ms (default: 500) */
  slowTraceMs: number;

  /** Receives progress and skip messages */
  log?: (message: string) => void;
}
