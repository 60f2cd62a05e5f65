/**
 * Reporters Module
 *
 * Report composition and output.
 */

// Types
export type {
  ReportMode,
  StructuredReport,
  ReportGenerationOptions,
  ConsoleReporterOptions,
} from './types.js';

// Markdown composer
export { composeReport, formatMetricsSummary, NO_METRICS_MESSAGE } from './markdown.js';

// Structured report
export { generateReport, providerTag } from './structured.js';

// Console Reporter
export { ConsoleReporter, createConsoleReporter } from './console.js';
