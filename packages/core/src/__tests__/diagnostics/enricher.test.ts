/**
 * Correlation Enricher Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { enrichFindings } from '../../diagnostics/enricher.js';
import { evaluateRules } from '../../diagnostics/rules.js';
import { RULE_IDS } from '../../diagnostics/types.js';
import { createEmptySnapshot } from '../../metrics/parser.js';
import type { MetricsSnapshot } from '../../metrics/types.js';
import type { ManagementSource, SourceResult } from '../../sources/types.js';

// =============================================================================
// Test Helpers
// =============================================================================

function createFakeSource(
  overrides: {
    traces?: SourceResult<unknown>;
    threadDump?: SourceResult<unknown>;
  } = {}
) {
  return {
    name: 'fake',
    baseUrl: 'http://app.test',
    fetchMetrics: vi.fn(async (): Promise<SourceResult<string>> => ({ status: 'ok', data: '' })),
    fetchTraces: vi.fn(async (): Promise<SourceResult<unknown>> => overrides.traces ?? { status: 'empty' }),
    fetchThreadDump: vi.fn(
      async (): Promise<SourceResult<unknown>> => overrides.threadDump ?? { status: 'empty' }
    ),
  } satisfies ManagementSource;
}

function traces(...timeTaken: number[]): SourceResult<unknown> {
  return {
    status: 'ok',
    data: {
      traces: timeTaken.map((ms, index) => ({
        request: { method: 'GET', uri: `/r${index}` },
        response: { status: 200 },
        timeTaken: ms,
      })),
    },
  };
}

const contended: MetricsSnapshot = { ...createEmptySnapshot(), blockedThreads: 8 };

const threadDump: SourceResult<unknown> = {
  status: 'ok',
  data: {
    threads: [
      {
        threadName: 'http-nio-8080-exec-3',
        threadId: 44,
        threadState: 'BLOCKED',
        stackTrace: [
          { className: 'java.lang.Object', methodName: 'wait', lineNumber: -1 },
          { className: 'com.acme.InventoryService', methodName: 'reserve', lineNumber: 57 },
          { className: 'com.acme.OrderController', methodName: 'create', lineNumber: 23 },
        ],
      },
      {
        threadName: 'scheduler-1',
        threadId: 45,
        threadState: 'BLOCKED',
        stackTrace: [{ className: 'java.lang.Thread', methodName: 'sleep', lineNumber: 10 }],
      },
    ],
  },
};

// =============================================================================
// Enrichment
// =============================================================================

describe('enrichFindings', () => {
  it('should return a copy of the findings without a source', async () => {
    const findings = evaluateRules(createEmptySnapshot());

    const enriched = await enrichFindings(findings, createEmptySnapshot(), undefined);

    expect(enriched).toEqual(findings);
    expect(enriched).not.toBe(findings);
  });

  it('should attach slow traces above 500 ms', async () => {
    const source = createFakeSource({ traces: traces(600, 100, 500) });
    const findings = evaluateRules(createEmptySnapshot());

    const enriched = await enrichFindings(findings, createEmptySnapshot(), source);

    expect(enriched).toHaveLength(2);
    expect(enriched[0]).toEqual(findings[0]);
    expect(enriched[1]).toMatchObject({
      ruleId: RULE_IDS.slowTraceEvidence,
      kind: 'evidence',
      title: 'Requisições HTTP Lentas',
      diagnosis: 'Requisições recentes acima de 500 ms:',
      evidence: 'GET /r0 -> 200 600ms',
    });
  });

  it('should add nothing when every trace is fast', async () => {
    const source = createFakeSource({ traces: traces(100) });
    const findings = evaluateRules(createEmptySnapshot());

    const enriched = await enrichFindings(findings, createEmptySnapshot(), source);

    expect(enriched).toEqual(findings);
  });

  it('should only inspect the first sampled traces', async () => {
    const source = createFakeSource({ traces: traces(10, 20, 900) });

    const enriched = await enrichFindings([], createEmptySnapshot(), source, { traceSampleSize: 2 });

    expect(enriched).toEqual([]);
  });

  it('should not fetch the thread dump without a contention finding', async () => {
    const source = createFakeSource({ threadDump });

    await enrichFindings(evaluateRules(createEmptySnapshot()), createEmptySnapshot(), source);

    expect(source.fetchThreadDump).not.toHaveBeenCalled();
    expect(source.fetchTraces).toHaveBeenCalledTimes(1);
  });

  it('should attach blocked-thread frames when contention fired', async () => {
    const source = createFakeSource({ threadDump });
    const findings = evaluateRules(contended);

    const enriched = await enrichFindings(findings, contended, source);

    expect(enriched.map((f) => f.ruleId)).toEqual([
      RULE_IDS.threadContention,
      RULE_IDS.blockedThreadEvidence,
    ]);
    expect(enriched[1].diagnosis).toBe(
      'As métricas indicam 8 threads bloqueadas. Frames de aplicação no topo das pilhas capturadas:'
    );
    expect(enriched[1].evidence).toBe(
      'Thread "http-nio-8080-exec-3" bloqueada em: com.acme.InventoryService.reserve:57 | com.acme.OrderController.create:23'
    );
  });

  it('should append thread evidence before trace evidence', async () => {
    const source = createFakeSource({ threadDump, traces: traces(700) });

    const enriched = await enrichFindings(evaluateRules(contended), contended, source);

    expect(enriched.map((f) => f.ruleId)).toEqual([
      RULE_IDS.threadContention,
      RULE_IDS.blockedThreadEvidence,
      RULE_IDS.slowTraceEvidence,
    ]);
  });

  it('should skip passes whose source is unavailable and log why', async () => {
    const log = vi.fn();
    const source = createFakeSource({
      threadDump: { status: 'unavailable', reason: 'connection refused' },
      traces: { status: 'unavailable', reason: 'timed out' },
    });
    const findings = evaluateRules(contended);

    const enriched = await enrichFindings(findings, contended, source, { log });

    expect(enriched).toEqual(findings);
    expect(log).toHaveBeenCalledWith(
      'Thread dump unavailable, skipping blocked-thread evidence: connection refused'
    );
    expect(log).toHaveBeenCalledWith('HTTP traces unavailable, skipping slow-request evidence: timed out');
  });
});
