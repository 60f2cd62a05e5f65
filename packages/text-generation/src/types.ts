/**
 * Core types for text-generation providers.
 */

/**
 * Supported provider identifiers.
 */
export const PROVIDER_NAMES = ['gemini', 'openai', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Provider preference as written in configuration.
 * - `auto`: use the first provider with a credential
 * - `none`: never call a provider
 */
export type ProviderPreference = ProviderName | 'auto' | 'none';

/**
 * API keys by provider. Missing entries mean "not configured".
 */
export type ProviderCredentials = Partial<Record<ProviderName, string>>;

/**
 * Options shared by every provider client.
 */
export interface TextGeneratorOptions {
  /** API key for the provider */
  apiKey: string;
  /** Model identifier (defaults per provider) */
  model?: string;
  /** Override the provider's API base URL, version path included (for proxies) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Upper bound on generated tokens (default: 2048) */
  maxOutputTokens?: number;
}

/**
 * A text-generation collaborator: takes a fully rendered prompt and returns
 * the provider's answer unmodified.
 */
export interface TextGenerator {
  readonly provider: ProviderName;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

/**
 * Outcome of resolving which provider to use.
 */
export type ProviderSelection =
  | { status: 'selected'; provider: ProviderName; apiKey: string }
  | { status: 'disabled' }
  | { status: 'missing-credential'; provider: ProviderName | null };
