/**
 * @actuator-sentinel/text-generation
 *
 * Text-generation providers that turn a rendered diagnosis prompt into a
 * written analysis.
 *
 * @example
 * ```typescript
 * import {
 *   createTextGenerator,
 *   resolveProviderSelection,
 * } from '@actuator-sentinel/text-generation';
 *
 * const selection = resolveProviderSelection({
 *   provider: 'auto',
 *   credentials: { openai: process.env.OPENAI_API_KEY },
 * });
 *
 * if (selection.status === 'selected') {
 *   const generator = createTextGenerator(selection.provider, { apiKey: selection.apiKey });
 *   console.log(await generator.generate(prompt));
 * }
 * ```
 */

// Registry
export {
  createTextGenerator,
  resolveProviderSelection,
  isProviderName,
  PROVIDER_LABELS,
} from './registry.js';

// Providers
export {
  createGeminiGenerator,
  createOpenAIGenerator,
  createAnthropicGenerator,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_ANTHROPIC_MODEL,
} from './providers/index.js';

export { DEFAULT_GENERATION_TIMEOUT_MS, DEFAULT_MAX_OUTPUT_TOKENS } from './generate.js';

// Types
export { PROVIDER_NAMES } from './types.js';
export type {
  ProviderName,
  ProviderPreference,
  ProviderCredentials,
  ProviderSelection,
  TextGenerator,
  TextGeneratorOptions,
} from './types.js';
