/**
 * Google Gemini text generator.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';

import { generateWithModel } from '../generate.js';
import type { TextGenerator, TextGeneratorOptions } from '../types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';

/**
 * Create a Gemini-backed text generator.
 */
export function createGeminiGenerator(options: TextGeneratorOptions): TextGenerator {
  const model = options.model ?? DEFAULT_GEMINI_MODEL;
  const google = createGoogleGenerativeAI({ apiKey: options.apiKey, baseURL: options.baseUrl });

  return {
    provider: 'gemini',
    model,

    generate(prompt: string): Promise<string> {
      return generateWithModel(google(model), prompt, {
        label: 'Gemini',
        timeout: options.timeout,
        maxOutputTokens: options.maxOutputTokens,
      });
    },
  };
}
