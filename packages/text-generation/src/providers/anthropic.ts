/**
 * Anthropic text generator.
 */

import { createAnthropic } from '@ai-sdk/anthropic';

import { generateWithModel } from '../generate.js';
import type { TextGenerator, TextGeneratorOptions } from '../types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

/**
 * Create an Anthropic-backed text generator.
 */
export function createAnthropicGenerator(options: TextGeneratorOptions): TextGenerator {
  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const anthropic = createAnthropic({ apiKey: options.apiKey, baseURL: options.baseUrl });

  return {
    provider: 'anthropic',
    model,

    generate(prompt: string): Promise<string> {
      return generateWithModel(anthropic(model), prompt, {
        label: 'Anthropic',
        timeout: options.timeout,
        maxOutputTokens: options.maxOutputTokens,
      });
    },
  };
}
