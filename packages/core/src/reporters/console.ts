/**
 * Console Reporter
 *
 * Colored terminal output for diagnostic reports.
 */

import { PROVIDER_LABELS } from '@actuator-sentinel/text-generation';

import { color, rule, type ColorName } from '../cli/utils/output.js';

import type { ConsoleReporterOptions, StructuredReport } from './types.js';

/**
 * Writes a {@link StructuredReport} to a stream.
 */
export class ConsoleReporter {
  private readonly useColors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleReporterOptions = {}) {
    this.useColors = options.colors ?? true;
    this.stream = options.stream ?? process.stdout;
  }

  /**
   * Print the report with a one-line origin header.
   */
  report(report: StructuredReport, target: string): void {
    const origin =
      report.mode === 'ai' && report.provider
        ? `gerado por ${PROVIDER_LABELS[report.provider]}`
        : 'diagnóstico local';

    this.writeLine(this.style('bold', `Alvo: ${target}`));
    this.writeLine(this.style('dim', `Modo: ${report.mode} (${origin})`));
    this.writeLine(this.style('dim', rule()));
    this.writeLine(report.content);

    if (report.error) {
      this.writeLine('');
      this.writeLine(this.style('yellow', `⚠ ${report.error}`));
    }
  }

  private style(name: ColorName, text: string): string {
    return color(name, text, this.useColors);
  }

  private writeLine(text: string): void {
    this.stream.write(text + '\n');
  }
}

/**
 * Create a console reporter.
 */
export function createConsoleReporter(options?: ConsoleReporterOptions): ConsoleReporter {
  return new ConsoleReporter(options);
}
