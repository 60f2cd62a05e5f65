/**
 * Traces Command Tests
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

import { registerTracesCommand } from '../../../cli/commands/traces.js';

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

function textResponse(body: string) {
  return { ok: true, status: 200, statusText: 'OK', text: () => Promise.resolve(body) };
}

function jsonResponse(body: unknown) {
  return textResponse(JSON.stringify(body));
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
  registerTracesCommand(program);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('traces command', () => {
  const exchanges = {
    exchanges: [
      { request: { method: 'GET', uri: '/orders' }, response: { status: 200 }, timeTaken: 'PT0.9S' },
      { request: { method: 'GET', uri: '/health' }, response: { status: 200 }, timeTaken: 'PT0.01S' },
    ],
  };

  it('should filter slow traces', async () => {
    route({ [`${TARGET}/actuator/httpexchanges`]: jsonResponse(exchanges) });

    await run('traces', '--slow', '--json');

    expect(calls.json).toEqual([[{ method: 'GET', uri: '/orders', status: 200, elapsedMs: 900 }]]);
  });

  it('should warn when no trace endpoint is exposed', async () => {
    route({});

    await run('traces');

    expect(calls.warning).toEqual([
      'No HTTP trace endpoint is exposed (httptrace, http-trace, httpexchanges)',
    ]);
  });
});
