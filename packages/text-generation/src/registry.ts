/**
 * Provider registry and selection.
 */

import {
  createAnthropicGenerator,
  createGeminiGenerator,
  createOpenAIGenerator,
} from './providers/index.js';
import {
  PROVIDER_NAMES,
  type ProviderCredentials,
  type ProviderName,
  type ProviderPreference,
  type ProviderSelection,
  type TextGenerator,
  type TextGeneratorOptions,
} from './types.js';

const FACTORIES: Record<ProviderName, (options: TextGeneratorOptions) => TextGenerator> = {
  gemini: createGeminiGenerator,
  openai: createOpenAIGenerator,
  anthropic: createAnthropicGenerator,
};

/**
 * Display names used when tagging generated content.
 */
export const PROVIDER_LABELS: Record<ProviderName, string> = {
  gemini: 'Gemini',
  openai: 'OpenAI',
  anthropic: 'Anthropic',
};

/**
 * Type guard for provider names coming from flags or config files.
 */
export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * Create a text generator for a provider.
 *
 * @example
 * ```typescript
 * const generator = createTextGenerator('openai', { apiKey: 'test-key' });
 * const answer = await generator.generate('Explain this GC pause profile');
 * ```
 */
export function createTextGenerator(
  provider: ProviderName,
  options: TextGeneratorOptions
): TextGenerator {
  return FACTORIES[provider](options);
}

/**
 * Decide which provider to call.
 *
 * An explicit provider is used only when its credential is present. `auto`
 * picks the first provider (gemini, openai, anthropic) that has one.
 */
export function resolveProviderSelection(input: {
  provider?: ProviderPreference;
  credentials: ProviderCredentials;
}): ProviderSelection {
  const preference = input.provider ?? 'auto';

  if (preference === 'none') {
    return { status: 'disabled' };
  }

  if (preference === 'auto') {
    for (const name of PROVIDER_NAMES) {
      const apiKey = input.credentials[name];
      if (apiKey) {
        return { status: 'selected', provider: name, apiKey };
      }
    }
    return { status: 'missing-credential', provider: null };
  }

  const apiKey = input.credentials[preference];
  if (!apiKey) {
    return { status: 'missing-credential', provider: preference };
  }
  return { status: 'selected', provider: preference, apiKey };
}
