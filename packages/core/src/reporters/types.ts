/**
 * Reporter Types
 *
 * Report shapes produced from a snapshot and its findings.
 */

import type { ProviderName, TextGenerator } from '@actuator-sentinel/text-generation';

/**
 * How the report content was produced.
 * - 'manual': the locally rendered prompt
 * - 'ai': a text-generation provider's answer
 */
export type ReportMode = 'manual' | 'ai';

/**
 * Structured variant of the diagnostic report.
 */
export interface StructuredReport {
  mode: ReportMode;

  /** Provider that was called (present when one was attempted) */
  provider?: ProviderName;

  /** Report text (markdown) */
  content: string;

  /** Why generation was skipped or failed */
  error?: string;
}

/**
 * Options for {@link generateReport}.
 */
export interface ReportGenerationOptions {
  /** Text generator to hand the prompt to; omit for a manual report */
  generator?: TextGenerator;

  /** Reason no generator is available, recorded as the report error */
  skippedReason?: string;
}

/**
 * Console reporter options.
 */
export interface ConsoleReporterOptions {
  /** Use colors (default: true) */
  colors?: boolean;
  /** Output stream (default: process.stdout) */
  stream?: NodeJS.WritableStream;
}
