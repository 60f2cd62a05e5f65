/**
 * Structured Report
 *
 * Optionally hands the composed prompt to a text generator. Any generator
 * failure falls back to the prompt itself; this function does not throw.
 */

import { PROVIDER_LABELS, type TextGenerator } from '@actuator-sentinel/text-generation';

import type { Finding } from '../diagnostics/types.js';
import type { MetricsSnapshot } from '../metrics/types.js';

import { composeReport } from './markdown.js';
import type { ReportGenerationOptions, StructuredReport } from './types.js';

/**
 * Tag prepended to generated content.
 */
export function providerTag(generator: TextGenerator): string {
  return `> Análise gerada por ${PROVIDER_LABELS[generator.provider]} (${generator.model})`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the structured report for a snapshot and its findings.
 *
 * @example
 * ```typescript
 * const report = await generateReport(snapshot, findings, { generator });
 * if (report.mode === 'manual' && report.error) {
 *   output.warning(`Text generation failed: ${report.error}`);
 * }
 * ```
 */
export async function generateReport(
  snapshot: MetricsSnapshot | null,
  findings: readonly Finding[],
  options: ReportGenerationOptions = {}
): Promise<StructuredReport> {
  const prompt = composeReport(snapshot, findings);
  const { generator, skippedReason } = options;

  if (!snapshot || !generator) {
    return {
      mode: 'manual',
      content: prompt,
      ...(skippedReason ? { error: skippedReason } : {}),
    };
  }

  try {
    const response = await generator.generate(prompt);
    return {
      mode: 'ai',
      provider: generator.provider,
      content: `${providerTag(generator)}\n\n${response}`,
    };
  } catch (error) {
    return {
      mode: 'manual',
      provider: generator.provider,
      content: prompt,
      error: describeError(error),
    };
  }
}
