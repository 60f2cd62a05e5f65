/**
 * Shared `generateText` call used by every provider client.
 */

import { generateText, type LanguageModel } from 'ai';

export const DEFAULT_GENERATION_TIMEOUT_MS = 30000;

export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;

interface GenerateOptions {
  /** Provider label used in error messages */
  label: string;
  timeout?: number;
  maxOutputTokens?: number;
}

/**
 * Send a single user prompt to `model` and return the generated text.
 *
 * @throws {Error} On provider errors, on timeout, and when no text comes back.
 */
export async function generateWithModel(
  model: LanguageModel,
  prompt: string,
  options: GenerateOptions
): Promise<string> {
  const timeout = options.timeout ?? DEFAULT_GENERATION_TIMEOUT_MS;
  const abortSignal = AbortSignal.timeout(timeout);

  let text: string;
  try {
    const result = await generateText({
      model,
      prompt,
      maxOutputTokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      abortSignal,
    });
    text = result.text;
  } catch (error) {
    if (abortSignal.aborted) {
      throw new Error(`${options.label} request timed out after ${timeout}ms`, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${options.label} request failed: ${reason}`, { cause: error });
  }

  if (!text.trim()) {
    throw new Error(`${options.label} returned no text`);
  }
  return text;
}
