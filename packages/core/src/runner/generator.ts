/**
 * Text generator selection from resolved configuration.
 */

import {
  createTextGenerator,
  PROVIDER_LABELS,
  resolveProviderSelection,
} from '@actuator-sentinel/text-generation';

import type { ResolvedGenerationConfig } from '../config/types.js';

import type { GeneratorSelection } from './types.js';

/**
 * Build the text generator the config asks for.
 *
 * A missing credential is not an error: the report falls back to the
 * local prompt and `skippedReason` says why.
 */
export function selectTextGenerator(generation: ResolvedGenerationConfig): GeneratorSelection {
  const selection = resolveProviderSelection({
    provider: generation.provider,
    credentials: generation.credentials,
  });

  switch (selection.status) {
    case 'disabled':
      return {};
    case 'missing-credential':
      return {
        skippedReason: selection.provider
          ? `No API key configured for ${PROVIDER_LABELS[selection.provider]}`
          : 'No text-generation API key configured (set GEMINI_API_KEY, OPENAI_API_KEY or ANTHROPIC_API_KEY)',
      };
    case 'selected':
      return {
        generator: createTextGenerator(selection.provider, {
          apiKey: selection.apiKey,
          timeout: generation.timeout,
          ...(generation.model ? { model: generation.model } : {}),
        }),
      };
  }
}
