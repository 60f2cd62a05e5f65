/**
 * Diagnostic Rule Engine
 *
 * Ordered threshold rules over a {@link MetricsSnapshot}. Every applicable
 * rule fires; when none does, a single informational finding is emitted.
 * Evaluation is pure: the same snapshot always yields the same findings.
 */

import {
  DEFAULT_BLOCKED_THREADS_THRESHOLD,
  DEFAULT_GC_PAUSE_THRESHOLD_SECONDS,
  DEFAULT_TOP_REPOSITORY_TIMINGS,
} from '../constants.js';
import type { MetricsSnapshot, RepositoryTiming } from '../metrics/types.js';

import { RULE_IDS, type DiagnosticRule, type Finding, type RuleThresholds } from './types.js';

export const DEFAULT_RULE_THRESHOLDS: RuleThresholds = {
  gcPauseSeconds: DEFAULT_GC_PAUSE_THRESHOLD_SECONDS,
  blockedThreads: DEFAULT_BLOCKED_THREADS_THRESHOLD,
  topRepositoryTimings: DEFAULT_TOP_REPOSITORY_TIMINGS,
};

export const NO_FINDINGS_MESSAGE =
  'Nenhum padrão de problema crítico foi detectado pelas heurísticas automáticas. ' +
  'O sistema parece operar dentro dos parâmetros normais.';

/**
 * Render a repository timing as
 * `repository.method total=Xs avg=Ys max=Zs calls=N`.
 */
export function formatRepositoryTiming(timing: RepositoryTiming): string {
  return (
    `${timing.repository}.${timing.method}` +
    ` total=${timing.totalTimeSeconds.toFixed(3)}s` +
    ` avg=${timing.avgTimeSeconds.toFixed(4)}s` +
    ` max=${timing.maxTimeSeconds.toFixed(3)}s` +
    ` calls=${Math.round(timing.invocations)}`
  );
}

// =============================================================================
// Rules
// =============================================================================

const memoryPressureRule: DiagnosticRule = {
  id: RULE_IDS.memoryPressure,

  applies: (snapshot, thresholds) => snapshot.gcPauseSeconds > thresholds.gcPauseSeconds,

  build: () => ({
    ruleId: RULE_IDS.memoryPressure,
    kind: 'diagnosis',
    title: 'Diagnóstico de Pressão de Memória',
    diagnosis:
      'A aplicação está gastando tempo excessivo em pausas de Garbage Collection. ' +
      'Isso é um forte indicativo de consumo ineficiente de memória ou memory leak.',
    recommendation:
      'Investigue a criação de objetos pesados (como `new ModelMapper()`) dentro de loops. ' +
      'Verifique se coleções estáticas (`static List/Map`) estão crescendo indefinidamente.',
    details: [],
  }),
};

// Pool exhaustion and repository cost share one finding.
const dataAccessBottleneckRule: DiagnosticRule = {
  id: RULE_IDS.dataAccessBottleneck,

  applies: (snapshot) =>
    snapshot.dbConnectionsPending > 0 || snapshot.repositoryTimings.length > 0,

  build: (snapshot, thresholds) => {
    const sentences: string[] = [];
    if (snapshot.dbConnectionsPending > 0) {
      sentences.push(
        'O pool de conexões com o banco está esgotado! ' +
          `Existem ${Math.trunc(snapshot.dbConnectionsPending)} requisições esperando por uma conexão para executar queries.`
      );
    }
    if (snapshot.repositoryTimings.length > 0) {
      sentences.push('Os métodos de repositório abaixo concentram o maior tempo de acesso a dados:');
    }

    return {
      ruleId: RULE_IDS.dataAccessBottleneck,
      kind: 'diagnosis',
      title: 'Diagnóstico de Gargalo no Acesso ao Banco de Dados',
      diagnosis: sentences.join(' '),
      recommendation:
        'Audite métodos com a anotação `@Transactional` para garantir que o escopo da transação seja o menor possível. ' +
        'Verifique se as consultas mais custosas usam índices adequados e procure por consultas que possam estar causando problemas de `N+1`.',
      details: snapshot.repositoryTimings
        .slice(0, thresholds.topRepositoryTimings)
        .map(formatRepositoryTiming),
    };
  },
};

const threadContentionRule: DiagnosticRule = {
  id: RULE_IDS.threadContention,

  applies: (snapshot, thresholds) => snapshot.blockedThreads > thresholds.blockedThreads,

  build: () => ({
    ruleId: RULE_IDS.threadContention,
    kind: 'diagnosis',
    title: 'Diagnóstico de Contenção de Threads',
    diagnosis:
      "Um número significativo de threads está no estado 'blocked', " +
      'indicando que elas estão competindo por recursos compartilhados (locks).',
    recommendation:
      'Investigue seções do código que utilizam `synchronized` ou `ReentrantLock`. ' +
      'Considere usar estruturas de dados do pacote `java.util.concurrent` (ex: `ConcurrentHashMap`) para reduzir a contenção.',
    details: [],
  }),
};

/**
 * Rules in evaluation order.
 */
export const DIAGNOSTIC_RULES: readonly DiagnosticRule[] = [
  memoryPressureRule,
  dataAccessBottleneckRule,
  threadContentionRule,
];

function noFindings(): Finding {
  return {
    ruleId: RULE_IDS.noFindings,
    kind: 'info',
    title: '',
    diagnosis: NO_FINDINGS_MESSAGE,
    details: [],
  };
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Evaluate every rule against a snapshot.
 *
 * @example
 * ```typescript
 * const findings = evaluateRules(parseExposition(text));
 * findings.map((f) => f.ruleId); // ['memory-pressure']
 * ```
 */
export function evaluateRules(
  snapshot: MetricsSnapshot,
  thresholds: Partial<RuleThresholds> = {}
): Finding[] {
  const resolved: RuleThresholds = {
    gcPauseSeconds: thresholds.gcPauseSeconds ?? DEFAULT_RULE_THRESHOLDS.gcPauseSeconds,
    blockedThreads: thresholds.blockedThreads ?? DEFAULT_RULE_THRESHOLDS.blockedThreads,
    topRepositoryTimings:
      thresholds.topRepositoryTimings ?? DEFAULT_RULE_THRESHOLDS.topRepositoryTimings,
  };

  const findings = DIAGNOSTIC_RULES.filter((rule) => rule.applies(snapshot, resolved)).map(
    (rule) => rule.build(snapshot, resolved)
  );

  return findings.length > 0 ? findings : [noFindings()];
}

/**
 * Render a finding as markdown text.
 */
export function renderFinding(finding: Finding): string {
  const lines: string[] = [];

  lines.push(finding.title ? `**${finding.title}:** ${finding.diagnosis}` : finding.diagnosis);

  for (const detail of finding.details) {
    lines.push(`- ${detail}`);
  }

  if (finding.recommendation) {
    lines.push(`*Sugestão de Boas Práticas:* ${finding.recommendation}`);
  }

  if (finding.evidence) {
    lines.push(finding.evidence);
  }

  return lines.join('\n');
}
