/**
 * Management Source Types
 *
 * Contract for whatever serves the metrics, trace and thread-dump payloads.
 * Any backend (a live actuator, a recorded capture, a test stub) can
 * implement ManagementSource.
 */

// =============================================================================
// Results
// =============================================================================

/**
 * Outcome of one fetch.
 * - `ok`: the endpoint answered with a usable body
 * - `empty`: the endpoint is not exposed (404)
 * - `unavailable`: connection error, timeout, unexpected status or bad body
 */
export type SourceResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'empty' }
  | { status: 'unavailable'; reason: string };

// =============================================================================
// Source Interface
// =============================================================================

/**
 * A source of management endpoint payloads.
 *
 * @example
 * ```typescript
 * const source: ManagementSource = {
 *   name: 'recorded',
 *   baseUrl: 'file://captures/2024-05-01',
 *   fetchMetrics: async () => ({ status: 'ok', data: exposition }),
 *   fetchTraces: async () => ({ status: 'empty' }),
 *   fetchThreadDump: async () => ({ status: 'empty' }),
 * };
 * ```
 */
export interface ManagementSource {
  /** Name used in log output */
  readonly name: string;

  /** Base URL of the management endpoints */
  readonly baseUrl: string;

  /** Raw Prometheus exposition text */
  fetchMetrics(): Promise<SourceResult<string>>;

  /** Raw HTTP trace JSON */
  fetchTraces(): Promise<SourceResult<unknown>>;

  /** Raw thread dump JSON */
  fetchThreadDump(): Promise<SourceResult<unknown>>;
}

// =============================================================================
// Actuator Configuration
// =============================================================================

/**
 * Endpoint paths relative to the base URL.
 */
export interface EndpointPaths {
  metrics: string;
  /** Tried in order until one is not a 404 */
  traces: string[];
  threadDump: string;
}

/**
 * Configuration for the actuator-backed source.
 */
export interface ActuatorSourceConfig {
  /** Management base URL (e.g. `http://localhost:8088`) */
  baseUrl: string;

  /** Per-request timeout in milliseconds (default: 5000) */
  timeout?: number;

  /** Endpoint path overrides */
  paths?: Partial<EndpointPaths>;
}
