/**
 * Correlation Enricher
 *
 * Attaches secondary evidence to the rule engine's findings:
 * - blocked-thread frames from the thread dump, when thread contention fired
 * - slow requests from the HTTP trace endpoint, whenever a source is present
 *
 * Each pass appends at most one evidence finding at the end. A pass whose
 * source is empty or unavailable, or that finds nothing worth showing, adds
 * nothing. Earlier findings are never removed or reordered.
 */

import {
  DEFAULT_SLOW_TRACE_THRESHOLD_MS,
  DEFAULT_TRACE_SAMPLE_SIZE,
} from '../constants.js';
import type { MetricsSnapshot } from '../metrics/types.js';
import type { ManagementSource } from '../sources/types.js';
import { formatStackFrame, normalizeThreadDump, significantFrames } from '../threads/index.js';
import { formatTraceRecord, normalizeTraces } from '../traces/index.js';

import { RULE_IDS, type EnrichmentOptions, type Finding } from './types.js';

// =============================================================================
// Thread Dump Evidence
// =============================================================================

async function collectBlockedThreadEvidence(
  snapshot: MetricsSnapshot,
  source: ManagementSource,
  log: (message: string) => void
): Promise<Finding | null> {
  const result = await source.fetchThreadDump();

  if (result.status === 'unavailable') {
    log(`Thread dump unavailable, skipping blocked-thread evidence: ${result.reason}`);
    return null;
  }
  if (result.status === 'empty') {
    log('Thread dump endpoint not exposed, skipping blocked-thread evidence');
    return null;
  }

  const lines: string[] = [];
  for (const thread of normalizeThreadDump(result.data)) {
    const frames = significantFrames(thread);
    if (frames.length === 0) continue;
    lines.push(`Thread "${thread.name}" bloqueada em: ${frames.map(formatStackFrame).join(' | ')}`);
  }

  if (lines.length === 0) {
    log('No blocked thread with application frames in the thread dump');
    return null;
  }

  return {
    ruleId: RULE_IDS.blockedThreadEvidence,
    kind: 'evidence',
    title: 'Evidências de Threads Bloqueadas',
    diagnosis:
      `As métricas indicam ${Math.trunc(snapshot.blockedThreads)} threads bloqueadas. ` +
      'Frames de aplicação no topo das pilhas capturadas:',
    details: [],
    evidence: lines.join('\n'),
  };
}

// =============================================================================
// HTTP Trace Evidence
// =============================================================================

async function collectSlowTraceEvidence(
  source: ManagementSource,
  options: EnrichmentOptions,
  log: (message: string) => void
): Promise<Finding | null> {
  const result = await source.fetchTraces();

  if (result.status === 'unavailable') {
    log(`HTTP traces unavailable, skipping slow-request evidence: ${result.reason}`);
    return null;
  }
  if (result.status === 'empty') {
    log('HTTP trace endpoint not exposed, skipping slow-request evidence');
    return null;
  }

  const slow = normalizeTraces(result.data)
    .slice(0, options.traceSampleSize)
    .filter((record) => record.elapsedMs > options.slowTraceMs);

  if (slow.length === 0) {
    return null;
  }

  return {
    ruleId: RULE_IDS.slowTraceEvidence,
    kind: 'evidence',
    title: 'Requisições HTTP Lentas',
    diagnosis: `Requisições recentes acima de ${options.slowTraceMs} ms:`,
    details: [],
    evidence: slow.map(formatTraceRecord).join('\n'),
  };
}

// =============================================================================
// Enricher
// =============================================================================

/**
 * Append correlated evidence to a list of findings.
 *
 * Without a source the findings are returned unchanged (as a new array).
 *
 * @example
 * ```typescript
 * const findings = evaluateRules(snapshot);
 * const enriched = await enrichFindings(findings, snapshot, source);
 * ```
 */
export async function enrichFindings(
  findings: readonly Finding[],
  snapshot: MetricsSnapshot,
  source: ManagementSource | undefined,
  options: Partial<EnrichmentOptions> = {}
): Promise<Finding[]> {
  const enriched = [...findings];
  if (!source) {
    return enriched;
  }

  const resolved: EnrichmentOptions = {
    traceSampleSize: options.traceSampleSize ?? DEFAULT_TRACE_SAMPLE_SIZE,
    slowTraceMs: options.slowTraceMs ?? DEFAULT_SLOW_TRACE_THRESHOLD_MS,
    log: options.log,
  };
  const log = resolved.log ?? (() => {});

  const contention = findings.some((finding) => finding.ruleId === RULE_IDS.threadContention);
  if (contention) {
    log(`[${source.name}] Collecting thread dump from ${source.baseUrl}`);
    const threadEvidence = await collectBlockedThreadEvidence(snapshot, source, log);
    if (threadEvidence) {
      enriched.push(threadEvidence);
    }
  }

  log(`[${source.name}] Collecting HTTP traces from ${source.baseUrl}`);
  const traceEvidence = await collectSlowTraceEvidence(source, resolved, log);
  if (traceEvidence) {
    enriched.push(traceEvidence);
  }

  return enriched;
}
