/**
 * Trace Sampler
 *
 * Normalizes HTTP trace payloads into {@link TraceRecord}s. The payload may be
 * a bare list or an object wrapping the list under `traces`, `exchanges`,
 * `content`, `items` or `values`. Any other shape yields an empty list.
 */

import { z } from 'zod';

import type { TraceRecord } from './types.js';

// =============================================================================
// Payload Shapes
// =============================================================================

const WRAPPED_LIST_KEYS = ['exchanges', 'content', 'items', 'values'] as const;

const traceEntrySchema = z
  .object({
    timestamp: z.string().optional(),
    request: z
      .object({
        method: z.string().optional(),
        uri: z.string().optional(),
      })
      .optional(),
    response: z
      .object({
        status: z.number().optional(),
      })
      .optional(),
    timeTaken: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

type TraceEntry = z.infer<typeof traceEntrySchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the raw entry list out of a trace payload.
 */
export function extractTraceEntries(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }

  if (!isRecord(payload)) {
    return [];
  }

  if ('traces' in payload) {
    const traces = payload['traces'];
    return Array.isArray(traces) ? traces : [];
  }

  for (const key of WRAPPED_LIST_KEYS) {
    const candidate = payload[key];
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }

  return [];
}

// =============================================================================
// Durations
// =============================================================================

const ISO_DURATION_PATTERN =
  /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * Convert an ISO-8601 duration (`PT0.6S`, `PT1M2S`, `P1DT2H`) to milliseconds.
 */
export function parseIsoDuration(value: string): number | null {
  const match = ISO_DURATION_PATTERN.exec(value);
  if (!match || value === 'P' || value.endsWith('T')) {
    return null;
  }

  const [, days, hours, minutes, seconds] = match.map((part) => (part ? Number(part) : 0));
  return (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000;
}

function toElapsedMs(timeTaken: TraceEntry['timeTaken']): number {
  if (typeof timeTaken === 'number') {
    return timeTaken;
  }
  if (typeof timeTaken === 'string') {
    const numeric = Number(timeTaken);
    if (timeTaken.trim() !== '' && Number.isFinite(numeric)) {
      return numeric;
    }
    return parseIsoDuration(timeTaken) ?? 0;
  }
  return 0;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize a trace payload. Entries that are not trace-shaped objects are
 * dropped.
 */
export function normalizeTraces(payload: unknown): TraceRecord[] {
  const records: TraceRecord[] = [];

  for (const entry of extractTraceEntries(payload)) {
    const parsed = traceEntrySchema.safeParse(entry);
    if (!parsed.success) continue;

    const { request, response, timeTaken, timestamp } = parsed.data;
    records.push({
      method: request?.method ?? '-',
      uri: request?.uri ?? '-',
      status: response?.status ?? null,
      elapsedMs: toElapsedMs(timeTaken),
      ...(timestamp !== undefined ? { timestamp } : {}),
    });
  }

  return records;
}

/**
 * Render a record as `METHOD URI -> STATUS Nms`.
 */
export function formatTraceRecord(record: TraceRecord): string {
  return `${record.method} ${record.uri} -> ${record.status ?? '-'} ${Math.round(record.elapsedMs)}ms`;
}
