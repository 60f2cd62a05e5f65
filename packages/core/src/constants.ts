/**
 * Constants
 *
 * Centralized defaults for actuator-sentinel.
 */

// =============================================================================
// Target Defaults
// =============================================================================

/** Default management base URL (actuator on the management port) */
export const DEFAULT_TARGET_URL = 'http://localhost:8088';

/** Default timeout for each management endpoint request in milliseconds */
export const DEFAULT_FETCH_TIMEOUT_MS = 5000;

/** Prometheus exposition endpoint */
export const DEFAULT_METRICS_PATH = '/actuator/prometheus';

/** HTTP trace endpoints, tried in order (404 moves on to the next) */
export const DEFAULT_TRACE_PATHS = [
  '/actuator/httptrace',
  '/actuator/http-trace',
  '/actuator/httpexchanges',
] as const;

/** Thread dump endpoint */
export const DEFAULT_THREAD_DUMP_PATH = '/actuator/threaddump';

// =============================================================================
// Rule Thresholds
// =============================================================================

/** Cumulative GC pause (seconds) above which memory pressure is reported */
export const DEFAULT_GC_PAUSE_THRESHOLD_SECONDS = 1.0;

/** Blocked-thread gauge above which thread contention is reported */
export const DEFAULT_BLOCKED_THREADS_THRESHOLD = 5;

/** Number of repository timings listed in the data-access finding */
export const DEFAULT_TOP_REPOSITORY_TIMINGS = 5;

// =============================================================================
// Enrichment Defaults
// =============================================================================

/** Traces considered for slow-request evidence (taken from the start of the list) */
export const DEFAULT_TRACE_SAMPLE_SIZE = 10;

/** Elapsed time (ms) above which a trace counts as slow */
export const DEFAULT_SLOW_TRACE_THRESHOLD_MS = 500;

/** Stack frames inspected per blocked thread */
export const MAX_INSPECTED_FRAMES = 6;

/** Application frames reported per blocked thread */
export const MAX_SIGNIFICANT_FRAMES = 2;

/** Class-name prefixes treated as platform frames */
export const PLATFORM_PACKAGE_PREFIXES = [
  'java.',
  'javax.',
  'jdk.',
  'sun.',
  'com.sun.',
  'kotlin.',
] as const;

// =============================================================================
// Text Generation Defaults
// =============================================================================

/** Environment variables read for provider credentials when the config names none */
export const DEFAULT_CREDENTIAL_ENV_VARS = {
  gemini: '$GEMINI_API_KEY',
  openai: '$OPENAI_API_KEY',
  anthropic: '$ANTHROPIC_API_KEY',
} as const;
