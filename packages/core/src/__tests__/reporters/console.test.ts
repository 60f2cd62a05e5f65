/**
 * Console Reporter Tests
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { ConsoleReporter } from '../../reporters/console.js';

function createCapture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('ConsoleReporter', () => {
  it('should print origin header and content without colors', () => {
    const capture = createCapture();
    const reporter = new ConsoleReporter({ colors: false, stream: capture.stream });

    reporter.report({ mode: 'ai', provider: 'gemini', content: 'Relatório' }, 'http://app.test');

    expect(capture.text()).toBe(
      ['Alvo: http://app.test', 'Modo: ai (gerado por Gemini)', '─'.repeat(60), 'Relatório', ''].join('\n')
    );
  });

  it('should print the generation error after a manual report', () => {
    const capture = createCapture();
    const reporter = new ConsoleReporter({ colors: false, stream: capture.stream });

    reporter.report({ mode: 'manual', content: 'Prompt', error: 'No API key configured for OpenAI' }, 'http://app.test');

    expect(capture.text().split('\n').slice(1)).toEqual([
      'Modo: manual (diagnóstico local)',
      '─'.repeat(60),
      'Prompt',
      '',
      '⚠ No API key configured for OpenAI',
      '',
    ]);
  });

  it('should wrap the header in ANSI codes when colors are on', () => {
    const capture = createCapture();
    const reporter = new ConsoleReporter({ stream: capture.stream });

    reporter.report({ mode: 'manual', content: 'Prompt' }, 'http://app.test');

    expect(capture.text().split('\n')[0]).toBe('\x1b[1mAlvo: http://app.test\x1b[0m');
  });
});
