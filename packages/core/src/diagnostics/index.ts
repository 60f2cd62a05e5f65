/**
 * Diagnostics Module
 *
 * Rule engine and correlation enricher.
 *
 * - evaluateRules: ordered threshold rules over a metrics snapshot
 * - enrichFindings: blocked-thread and slow-request evidence
 * - renderFinding: markdown rendering of one finding
 */

export type {
  Finding,
  FindingKind,
  RuleId,
  RuleThresholds,
  DiagnosticRule,
  EnrichmentOptions,
} from './types.js';

export { RULE_IDS } from './types.js';

export {
  evaluateRules,
  renderFinding,
  formatRepositoryTiming,
  DIAGNOSTIC_RULES,
  DEFAULT_RULE_THRESHOLDS,
  NO_FINDINGS_MESSAGE,
} from './rules.js';

export { enrichFindings } from './enricher.js';
