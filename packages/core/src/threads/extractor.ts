/**
 * Thread-State Extractor
 *
 * Reduces a thread dump to its BLOCKED threads and picks the application
 * frames worth showing for each.
 */

import { z } from 'zod';

import {
  MAX_INSPECTED_FRAMES,
  MAX_SIGNIFICANT_FRAMES,
  PLATFORM_PACKAGE_PREFIXES,
} from '../constants.js';

import type { StackFrame, ThreadDumpEntry } from './types.js';

const BLOCKED_STATE = 'BLOCKED';

const stackFrameSchema = z.object({
  className: z.string(),
  methodName: z.string(),
  lineNumber: z.number().nullable().optional(),
});

const threadSchema = z.object({
  threadName: z.string().optional(),
  threadId: z.number().optional(),
  threadState: z.string(),
  stackTrace: z.array(z.unknown()).default([]),
});

const threadDumpSchema = z.object({
  threads: z.array(z.unknown()),
});

function toFrames(rawFrames: unknown[]): StackFrame[] {
  const frames: StackFrame[] = [];
  rawFrames.forEach((raw, depth) => {
    const parsed = stackFrameSchema.safeParse(raw);
    if (!parsed.success) return;
    frames.push({
      className: parsed.data.className,
      methodName: parsed.data.methodName,
      lineNumber: parsed.data.lineNumber ?? null,
      depth,
    });
  });
  return frames;
}

/**
 * Normalize a thread dump payload, keeping BLOCKED threads only.
 *
 * Payloads without a `threads` list, and thread entries without a state,
 * contribute nothing.
 */
export function normalizeThreadDump(payload: unknown): ThreadDumpEntry[] {
  const dump = threadDumpSchema.safeParse(payload);
  if (!dump.success) {
    return [];
  }

  const entries: ThreadDumpEntry[] = [];
  for (const rawThread of dump.data.threads) {
    const thread = threadSchema.safeParse(rawThread);
    if (!thread.success || thread.data.threadState !== BLOCKED_STATE) continue;

    const { threadName, threadId, threadState, stackTrace } = thread.data;
    entries.push({
      name: threadName ?? (threadId !== undefined ? `thread-${threadId}` : 'unknown'),
      id: threadId ?? null,
      state: threadState,
      frames: toFrames(stackTrace),
    });
  }

  return entries;
}

/**
 * Whether a frame belongs to the JDK or another runtime namespace.
 */
export function isPlatformFrame(frame: StackFrame): boolean {
  return PLATFORM_PACKAGE_PREFIXES.some((prefix) => frame.className.startsWith(prefix));
}

/**
 * Pick up to two application frames from the top six frames of a thread.
 * The window is measured on the raw stack trace, so a malformed frame
 * still occupies its slot.
 */
export function significantFrames(entry: ThreadDumpEntry): StackFrame[] {
  const selected: StackFrame[] = [];

  for (const frame of entry.frames) {
    if (frame.depth >= MAX_INSPECTED_FRAMES) break;
    if (isPlatformFrame(frame)) continue;
    selected.push(frame);
    if (selected.length === MAX_SIGNIFICANT_FRAMES) break;
  }

  return selected;
}

/**
 * Render a frame as `com.acme.Service.method:42`.
 */
export function formatStackFrame(frame: StackFrame): string {
  const location = `${frame.className}.${frame.methodName}`;
  return frame.lineNumber !== null && frame.lineNumber >= 0
    ? `${location}:${frame.lineNumber}`
    : location;
}
