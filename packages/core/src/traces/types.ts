/**
 * HTTP Trace Types
 *
 * Normalized view of the entries served by `/actuator/httptrace` (Spring Boot 2)
 * and `/actuator/httpexchanges` (Spring Boot 3).
 */

/**
 * One recorded HTTP exchange.
 */
export interface TraceRecord {
  /** HTTP method, `-` when the entry does not carry one */
  method: string;

  /** Request URI, `-` when the entry does not carry one */
  uri: string;

  /** Response status, null when absent */
  status: number | null;

  /** Time taken to serve the request, in milliseconds */
  elapsedMs: number;

  /** Timestamp as reported by the application */
  timestamp?: string;
}
