/**
 * OpenAI text generator.
 */

import { createOpenAI } from '@ai-sdk/openai';

import { generateWithModel } from '../generate.js';
import type { TextGenerator, TextGeneratorOptions } from '../types.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * Create an OpenAI-backed text generator.
 */
export function createOpenAIGenerator(options: TextGeneratorOptions): TextGenerator {
  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const openai = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });

  return {
    provider: 'openai',
    model,

    generate(prompt: string): Promise<string> {
      return generateWithModel(openai(model), prompt, {
        label: 'OpenAI',
        timeout: options.timeout,
        maxOutputTokens: options.maxOutputTokens,
      });
    },
  };
}
