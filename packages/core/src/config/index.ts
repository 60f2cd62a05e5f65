/**
 * Config Module
 *
 * Configuration system for @actuator-sentinel/core.
 */

export type {
  SentinelConfig,
  TargetConfig,
  EnrichmentConfig,
  GenerationConfig,
  ResolvedConfig,
  ResolvedTargetConfig,
  ResolvedEnrichmentConfig,
  ResolvedGenerationConfig,
  ConfigOverrides,
} from './types.js';

export { defineConfig } from './define-config.js';

export { sentinelConfigSchema, providerPreferenceSchema, validateConfig } from './schema.js';

export { resolveEnvVar, resolveEnvVarOptional, resolveConfig } from './resolver.js';

export { findConfigFile, loadConfigFile, loadConfig, hasConfigFile } from './loader.js';
