/**
 * Thread-State Extractor Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatStackFrame,
  isPlatformFrame,
  normalizeThreadDump,
  significantFrames,
} from '../../threads/extractor.js';
import type { StackFrame, ThreadDumpEntry } from '../../threads/types.js';

function frame(className: string, methodName = 'run', lineNumber: number | null = 10): StackFrame {
  return { className, methodName, lineNumber, depth: 0 };
}

/** Frames are numbered by their position in the list. */
function blocked(frames: StackFrame[]): ThreadDumpEntry {
  return {
    name: 'http-nio-8080-exec-1',
    id: 31,
    state: 'BLOCKED',
    frames: frames.map((entry, depth) => ({ ...entry, depth })),
  };
}

// =============================================================================
// normalizeThreadDump
// =============================================================================

describe('normalizeThreadDump', () => {
  it('should keep only BLOCKED threads', () => {
    const entries = normalizeThreadDump({
      threads: [
        {
          threadName: 'http-nio-8080-exec-1',
          threadId: 31,
          threadState: 'BLOCKED',
          stackTrace: [{ className: 'com.acme.OrderService', methodName: 'reserve', lineNumber: 88 }],
        },
        { threadName: 'main', threadId: 1, threadState: 'RUNNABLE', stackTrace: [] },
        { threadName: 'pool-1', threadId: 2, threadState: 'WAITING', stackTrace: [] },
      ],
    });

    expect(entries).toEqual([
      {
        name: 'http-nio-8080-exec-1',
        id: 31,
        state: 'BLOCKED',
        frames: [
          { className: 'com.acme.OrderService', methodName: 'reserve', lineNumber: 88, depth: 0 },
        ],
      },
    ]);
  });

  it('should name threads by id when the name is missing', () => {
    const entries = normalizeThreadDump({ threads: [{ threadId: 9, threadState: 'BLOCKED' }] });

    expect(entries).toEqual([{ name: 'thread-9', id: 9, state: 'BLOCKED', frames: [] }]);
  });

  it('should skip malformed frames', () => {
    const entries = normalizeThreadDump({
      threads: [
        {
          threadName: 'worker',
          threadState: 'BLOCKED',
          stackTrace: ['not a frame', { className: 'com.acme.Cache', methodName: 'get' }],
        },
      ],
    });

    expect(entries[0].frames).toEqual([
      { className: 'com.acme.Cache', methodName: 'get', lineNumber: null, depth: 1 },
    ]);
  });

  it('should return nothing for payloads without a threads list', () => {
    expect(normalizeThreadDump({})).toEqual([]);
    expect(normalizeThreadDump('dump')).toEqual([]);
  });
});

// =============================================================================
// Frames
// =============================================================================

describe('isPlatformFrame', () => {
  it('should recognize runtime namespaces', () => {
    expect(isPlatformFrame(frame('java.lang.Thread'))).toBe(true);
    expect(isPlatformFrame(frame('jdk.internal.misc.Unsafe'))).toBe(true);
    expect(isPlatformFrame(frame('kotlin.coroutines.Continuation'))).toBe(true);
    expect(isPlatformFrame(frame('com.acme.OrderService'))).toBe(false);
  });
});

describe('significantFrames', () => {
  it('should return the first two application frames', () => {
    const frames = significantFrames(
      blocked([
        frame('java.lang.Object', 'wait'),
        frame('com.acme.OrderService', 'reserve', 88),
        frame('sun.misc.Unsafe', 'park'),
        frame('com.acme.OrderController', 'create', 41),
        frame('com.acme.Filter', 'doFilter', 12),
      ])
    );

    expect(frames.map(formatStackFrame)).toEqual([
      'com.acme.OrderService.reserve:88',
      'com.acme.OrderController.create:41',
    ]);
  });

  it('should only inspect the top six frames', () => {
    const frames = significantFrames(
      blocked([
        frame('java.a'),
        frame('java.b'),
        frame('java.c'),
        frame('java.d'),
        frame('java.e'),
        frame('java.f'),
        frame('com.acme.Deep'),
      ])
    );

    expect(frames).toEqual([]);
  });

  it('should count malformed frames toward the six-frame window', () => {
    const [entry] = normalizeThreadDump({
      threads: [
        {
          threadName: 'http-nio-8080-exec-4',
          threadState: 'BLOCKED',
          stackTrace: [
            { className: 'java.lang.Object', methodName: 'wait' },
            { methodName: 'missingClass' },
            { className: 'java.a', methodName: 'run' },
            { className: 'java.b', methodName: 'run' },
            { className: 'java.c', methodName: 'run' },
            { className: 'java.d', methodName: 'run' },
            { className: 'com.acme.Deep', methodName: 'run', lineNumber: 7 },
          ],
        },
      ],
    });

    expect(entry.frames).toHaveLength(6);
    expect(significantFrames(entry)).toEqual([]);
  });

  it('should keep application frames inside the window after a malformed one', () => {
    const [entry] = normalizeThreadDump({
      threads: [
        {
          threadName: 'http-nio-8080-exec-5',
          threadState: 'BLOCKED',
          stackTrace: [
            'corrupt',
            { className: 'com.acme.LedgerService', methodName: 'post', lineNumber: 19 },
          ],
        },
      ],
    });

    expect(significantFrames(entry).map(formatStackFrame)).toEqual([
      'com.acme.LedgerService.post:19',
    ]);
  });
});

describe('formatStackFrame', () => {
  it('should omit unknown and negative line numbers', () => {
    expect(formatStackFrame(frame('com.acme.A', 'run', null))).toBe('com.acme.A.run');
    expect(formatStackFrame(frame('com.acme.A', 'run', -2))).toBe('com.acme.A.run');
  });
});
