/**
 * Threads Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';

const calls = vi.hoisted(() => {
  const json: unknown[] = [];
  const table: unknown[] = [];
  const warning: string[] = [];
  const exitWithError: string[] = [];
  return { json, table, warning, exitWithError };
});

vi.mock('../../../cli/utils/output.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../cli/utils/output.js')>();
  return {
    ...actual,
    header: () => {},
    info: () => {},
    success: () => {},
    json: (data: unknown) => {
      calls.json.push(data);
    },
    table: (rows: unknown) => {
      calls.table.push(rows);
    },
    warning: (message: string) => {
      calls.warning.push(message);
    },
    exitWithError: (message: string) => {
      calls.exitWithError.push(message);
      throw new Error(`exit: ${message}`);
    },
  };
});

import { registerThreadsCommand } from '../../../cli/commands/threads.js';

// =============================================================================
// Test Helpers
// =============================================================================

const TARGET = 'http://app.test';

const mockFetch = vi.fn();

function route(responses: Record<string, unknown>): void {
  mockFetch.mockImplementation(async (url: string) => {
    return responses[url] ?? { ok: false, status: 404, statusText: 'Not Found' };
  });
}

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, statusText: 'OK', text: () => Promise.resolve(JSON.stringify(body)) };
}

let program: Command;

async function run(...args: string[]): Promise<void> {
  await program.parseAsync([...args, '--target', TARGET], { from: 'user' });
}

beforeEach(() => {
  calls.json.length = 0;
  calls.table.length = 0;
  calls.warning.length = 0;
  calls.exitWithError.length = 0;
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);

  program = new Command();
  program.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  registerThreadsCommand(program);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('threads command', () => {
  it('should list blocked threads with their application frames', async () => {
    route({
      [`${TARGET}/actuator/threaddump`]: jsonResponse({
        threads: [
          {
            threadName: 'http-nio-8080-exec-7',
            threadId: 52,
            threadState: 'BLOCKED',
            stackTrace: [
              { className: 'java.lang.Object', methodName: 'wait', lineNumber: -1 },
              { className: 'com.acme.LedgerService', methodName: 'post', lineNumber: 19 },
            ],
          },
          { threadName: 'main', threadId: 1, threadState: 'RUNNABLE', stackTrace: [] },
        ],
      }),
    });

    await run('threads');

    expect(calls.table).toEqual([
      [{ thread: 'http-nio-8080-exec-7', id: 52, frames: 'com.acme.LedgerService.post:19' }],
    ]);
  });

  it('should print significant frames alongside each thread as JSON', async () => {
    route({
      [`${TARGET}/actuator/threaddump`]: jsonResponse({
        threads: [
          {
            threadName: 'http-nio-8080-exec-2',
            threadId: 12,
            threadState: 'BLOCKED',
            stackTrace: [
              { className: 'java.lang.Object', methodName: 'wait', lineNumber: -1 },
              { className: 'com.acme.StockService', methodName: 'reserve', lineNumber: 33 },
            ],
          },
        ],
      }),
    });

    await run('threads', '--json');

    const javaFrame = { className: 'java.lang.Object', methodName: 'wait', lineNumber: -1, depth: 0 };
    const appFrame = { className: 'com.acme.StockService', methodName: 'reserve', lineNumber: 33, depth: 1 };
    expect(calls.json).toEqual([
      [
        {
          name: 'http-nio-8080-exec-2',
          id: 12,
          state: 'BLOCKED',
          frames: [javaFrame, appFrame],
          significantFrames: [appFrame],
        },
      ],
    ]);
  });

  it('should warn when the thread dump is not exposed', async () => {
    route({});

    await run('threads');

    expect(calls.warning).toEqual(['Thread dump endpoint is not exposed']);
  });
});
