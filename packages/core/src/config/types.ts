/**
 * Configuration Types
 *
 * Defines the shape of sentinel.config.{ts,js,mjs,yaml,yml} files.
 */

import type {
  ProviderCredentials,
  ProviderName,
  ProviderPreference,
} from '@actuator-sentinel/text-generation';

import type { RuleThresholds } from '../diagnostics/types.js';
import type { EndpointPaths } from '../sources/types.js';

// =============================================================================
// Target Configuration
// =============================================================================

/**
 * The application whose management endpoints are polled.
 */
export interface TargetConfig {
  /** Management base URL (supports $ENV_VAR syntax, default: http://localhost:8088) */
  baseUrl?: string;

  /** Per-request timeout in milliseconds (default: 5000) */
  timeout?: number;

  /** Endpoint path overrides */
  paths?: Partial<EndpointPaths>;
}

// =============================================================================
// Enrichment Configuration
// =============================================================================

export interface EnrichmentConfig {
  /** Set to false to skip thread-dump and trace correlation */
  enabled?: boolean;

  /** Traces inspected from the start of the list (default: 10) */
  traceSampleSize?: number;

  /** Elapsed time above which a trace is slow, in ms (default: 500) */
  slowTraceMs?: number;
}

// =============================================================================
// Text Generation Configuration
// =============================================================================

/**
 * Text-generation provider settings.
 */
export interface GenerationConfig {
  /** Provider to call; 'auto' picks the first one with a key (default: 'auto') */
  provider?: ProviderPreference;

  /** Model override for the selected provider */
  model?: string;

  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;

  /**
   * API keys per provider. Values support $ENV_VAR syntax; an unset variable
   * leaves the provider without a credential.
   * Defaults to $GEMINI_API_KEY, $OPENAI_API_KEY and $ANTHROPIC_API_KEY.
   */
  apiKeys?: Partial<Record<ProviderName, string>>;
}

// =============================================================================
// Main Configuration
// =============================================================================

/**
 * sentinel.config file contents. Every section is optional.
 */
export interface SentinelConfig {
  target?: TargetConfig;
  thresholds?: Partial<RuleThresholds>;
  enrichment?: EnrichmentConfig;
  generation?: GenerationConfig;
}

// =============================================================================
// Resolved Configuration
// =============================================================================

export interface ResolvedTargetConfig {
  baseUrl: string;
  timeout: number;
  paths?: Partial<EndpointPaths>;
}

export interface ResolvedEnrichmentConfig {
  enabled: boolean;
  traceSampleSize: number;
  slowTraceMs: number;
}

export interface ResolvedGenerationConfig {
  provider: ProviderPreference;
  model?: string;
  timeout: number;
  credentials: ProviderCredentials;
}

/**
 * Configuration with defaults applied and environment variables resolved.
 */
export interface ResolvedConfig {
  target: ResolvedTargetConfig;
  thresholds: RuleThresholds;
  enrichment: ResolvedEnrichmentConfig;
  generation: ResolvedGenerationConfig;
}

/**
 * Values given on the command line; they win over the config file.
 */
export interface ConfigOverrides {
  target?: string;
  timeout?: number;
  provider?: ProviderPreference;
  model?: string;
  enrich?: boolean;
}
