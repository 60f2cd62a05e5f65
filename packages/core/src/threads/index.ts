/**
 * Threads Module
 *
 * Thread dump normalization and blocked-thread frame selection.
 */

export type { StackFrame, ThreadDumpEntry } from './types.js';

export {
  normalizeThreadDump,
  significantFrames,
  isPlatformFrame,
  formatStackFrame,
} from './extractor.js';
