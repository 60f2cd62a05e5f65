/**
 * Actuator Source
 *
 * Fetches management payloads from a Spring Boot actuator over HTTP.
 * Each call is bounded by a timeout and never retried; failures come back
 * as `unavailable` results instead of exceptions.
 */

import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_METRICS_PATH,
  DEFAULT_THREAD_DUMP_PATH,
  DEFAULT_TRACE_PATHS,
} from '../constants.js';

import type {
  ActuatorSourceConfig,
  EndpointPaths,
  ManagementSource,
  SourceResult,
} from './types.js';

// =============================================================================
// HTTP
// =============================================================================

/**
 * Describe a fetch failure, including the underlying cause when Node's
 * fetch wraps it (`fetch failed` → `connect ECONNREFUSED ...`).
 */
export function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

/**
 * Fetch `url` and hand the response to `read` while the timeout is still
 * armed, so a stalled body aborts the same way a stalled connection does.
 */
async function request<T>(
  url: string,
  timeout: number,
  accept: string,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const res = await fetch(url, {
      headers: { Accept: accept },
      signal: controller.signal,
    });
    return await read(res);
  } catch (error) {
    if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      throw new Error(`Request to ${url} timed out after ${timeout}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

function unavailable(reason: string): SourceResult<never> {
  return { status: 'unavailable', reason };
}

function responded(url: string, res: Response): SourceResult<never> {
  return unavailable(`${url} responded ${res.status} ${res.statusText}`.trim());
}

async function readJson(res: Response, url: string): Promise<SourceResult<unknown>> {
  const body = await res.text();
  try {
    const data: unknown = JSON.parse(body);
    return { status: 'ok', data };
  } catch {
    return unavailable(`Response from ${url} is not valid JSON`);
  }
}

// =============================================================================
// Source
// =============================================================================

/**
 * Create a ManagementSource backed by actuator endpoints.
 *
 * @example
 * ```typescript
 * const source = createActuatorSource({ baseUrl: 'http://localhost:8088' });
 * const metrics = await source.fetchMetrics();
 * if (metrics.status === 'ok') {
 *   const snapshot = parseExposition(metrics.data);
 * }
 * ```
 */
export function createActuatorSource(config: ActuatorSourceConfig): ManagementSource {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const timeout = config.timeout ?? DEFAULT_FETCH_TIMEOUT_MS;
  const paths: EndpointPaths = {
    metrics: config.paths?.metrics ?? DEFAULT_METRICS_PATH,
    traces: config.paths?.traces ?? [...DEFAULT_TRACE_PATHS],
    threadDump: config.paths?.threadDump ?? DEFAULT_THREAD_DUMP_PATH,
  };

  return {
    name: 'actuator',
    baseUrl,

    async fetchMetrics(): Promise<SourceResult<string>> {
      const url = `${baseUrl}${paths.metrics}`;
      try {
        return await request<SourceResult<string>>(url, timeout, 'text/plain', async (res) => {
          if (!res.ok) {
            return responded(url, res);
          }
          return { status: 'ok', data: await res.text() };
        });
      } catch (error) {
        return unavailable(describeFetchError(error));
      }
    },

    async fetchTraces(): Promise<SourceResult<unknown>> {
      for (const path of paths.traces) {
        const url = `${baseUrl}${path}`;
        let result: SourceResult<unknown> | undefined;
        try {
          result = await request<SourceResult<unknown> | undefined>(
            url,
            timeout,
            'application/json',
            async (res) => {
              // Not exposed under this name; try the next one
              if (res.status === 404) return undefined;

              if (!res.ok) {
                return responded(url, res);
              }
              return readJson(res, url);
            }
          );
        } catch (error) {
          return unavailable(describeFetchError(error));
        }

        if (result) return result;
      }

      return { status: 'empty' };
    },

    async fetchThreadDump(): Promise<SourceResult<unknown>> {
      const url = `${baseUrl}${paths.threadDump}`;
      try {
        return await request<SourceResult<unknown>>(url, timeout, 'application/json', async (res) => {
          if (res.status === 404) {
            return { status: 'empty' };
          }
          if (!res.ok) {
            return responded(url, res);
          }
          return readJson(res, url);
        });
      } catch (error) {
        return unavailable(describeFetchError(error));
      }
    },
  };
}
