/**
 * Traces Module
 *
 * HTTP trace payload normalization.
 */

export type { TraceRecord } from './types.js';

export {
  normalizeTraces,
  extractTraceEntries,
  parseIsoDuration,
  formatTraceRecord,
} from './normalizer.js';
