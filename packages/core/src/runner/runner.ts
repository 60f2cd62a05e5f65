/**
 * Diagnostic Runner
 *
 * One pull cycle: collect metrics, parse, evaluate rules, enrich, report.
 */

import { enrichFindings } from '../diagnostics/enricher.js';
import { evaluateRules } from '../diagnostics/rules.js';
import { parseExposition } from '../metrics/parser.js';
import { generateReport } from '../reporters/structured.js';
import type { ManagementSource } from '../sources/types.js';

import type { DiagnosticCycleOptions, DiagnosticCycleResult } from './types.js';

/**
 * Run a single diagnostic cycle against a management source.
 *
 * Metrics are required; when they cannot be collected the cycle stops with
 * a one-line message. Missing traces or thread dumps only reduce the
 * evidence attached to the findings.
 *
 * @example
 * ```typescript
 * const source = createActuatorSource({ baseUrl: 'http://localhost:8088' });
 * const result = await runDiagnosticCycle(source, { enrich: true });
 * if (result.status === 'ok') {
 *   console.log(result.report.content);
 * }
 * ```
 */
export async function runDiagnosticCycle(
  source: ManagementSource,
  options: DiagnosticCycleOptions = {}
): Promise<DiagnosticCycleResult> {
  const log = options.log ?? (() => {});

  log(`[${source.name}] Collecting metrics from ${source.baseUrl}`);
  const metrics = await source.fetchMetrics();

  if (metrics.status !== 'ok') {
    const reason =
      metrics.status === 'unavailable' ? metrics.reason : 'endpoint de métricas não exposto';
    return {
      status: 'unavailable',
      message: `Não foi possível coletar as métricas do Prometheus em ${source.baseUrl}: ${reason}`,
    };
  }

  const snapshot = parseExposition(metrics.data);
  const findings = evaluateRules(snapshot, options.thresholds);
  log(`Rule engine produced ${findings.length} finding(s)`);

  const enriched =
    options.enrich === false
      ? findings
      : await enrichFindings(findings, snapshot, source, { ...options.enrichment, log });

  const report = await generateReport(snapshot, enriched, {
    ...(options.generator ? { generator: options.generator } : {}),
    ...(options.skippedReason ? { skippedReason: options.skippedReason } : {}),
  });

  return { status: 'ok', snapshot, findings: enriched, report };
}
