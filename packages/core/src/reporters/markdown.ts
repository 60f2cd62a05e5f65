/**
 * Markdown Report Composer
 *
 * Renders a snapshot and its findings into the diagnosis prompt: header,
 * analysis instructions, metrics summary and findings.
 */

import { renderFinding } from '../diagnostics/rules.js';
import type { Finding } from '../diagnostics/types.js';
import type { MetricsSnapshot } from '../metrics/types.js';

const REPORT_TITLE = '## Análise de Performance';

const ANALYSIS_INSTRUCTIONS =
  'Você é um engenheiro de software sênior especialista em performance de aplicações Java/Spring. ' +
  'Com base nas métricas de produção e nos diagnósticos automáticos a seguir, forneça uma análise técnica ' +
  'detalhada da causa raiz dos problemas e sugira refatorações de código específicas que um desenvolvedor ' +
  'deveria aplicar para resolver os gargalos.';

export const NO_METRICS_MESSAGE =
  `${REPORT_TITLE}\n\nNão foi possível gerar a análise pois não há métricas disponíveis.`;

const BYTES_PER_MB = 1024 * 1024;

/**
 * Fixed-order metrics summary lines.
 */
export function formatMetricsSummary(snapshot: MetricsSnapshot): string[] {
  return [
    '**Métricas de Diagnóstico:**',
    `- Uso de CPU do Sistema: **${(snapshot.systemCpuUsage * 100).toFixed(2)}%**`,
    `- Memória JVM Utilizada: **${(snapshot.jvmMemoryUsedBytes / BYTES_PER_MB).toFixed(2)} MB**`,
    `- Tempo Total em Pausas de GC: **${snapshot.gcPauseSeconds.toFixed(4)} segundos**`,
    `- Threads Aguardando Conexão com DB: **${Math.trunc(snapshot.dbConnectionsPending)}**`,
    `- Threads Bloqueadas: **${Math.trunc(snapshot.blockedThreads)}**`,
  ];
}

/**
 * Compose the report text.
 *
 * Returns {@link NO_METRICS_MESSAGE} when there is no snapshot.
 */
export function composeReport(
  snapshot: MetricsSnapshot | null,
  findings: readonly Finding[]
): string {
  if (!snapshot) {
    return NO_METRICS_MESSAGE;
  }

  const lines: string[] = [];

  lines.push(REPORT_TITLE);
  lines.push('');
  lines.push(ANALYSIS_INSTRUCTIONS);
  lines.push('');
  lines.push(...formatMetricsSummary(snapshot));
  lines.push('');
  lines.push('**Diagnósticos Automáticos (Heurísticas):**');
  lines.push(findings.map(renderFinding).join('\n\n'));

  return lines.join('\n');
}
