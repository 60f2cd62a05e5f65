/**
 * Config Resolver
 *
 * Applies defaults, command-line overrides and $VAR references to a
 * validated config.
 */

import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  PROVIDER_NAMES,
  type ProviderCredentials,
} from '@actuator-sentinel/text-generation';

import {
  DEFAULT_BLOCKED_THREADS_THRESHOLD,
  DEFAULT_CREDENTIAL_ENV_VARS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_GC_PAUSE_THRESHOLD_SECONDS,
  DEFAULT_SLOW_TRACE_THRESHOLD_MS,
  DEFAULT_TARGET_URL,
  DEFAULT_TOP_REPOSITORY_TIMINGS,
  DEFAULT_TRACE_SAMPLE_SIZE,
} from '../constants.js';
import type {
  ConfigOverrides,
  GenerationConfig,
  ResolvedConfig,
  ResolvedGenerationConfig,
  SentinelConfig,
} from './types.js';

/**
 * Resolve a string value that may contain a $ENV_VAR reference.
 *
 * @example
 * resolveEnvVar('$MANAGEMENT_URL')  // Returns process.env.MANAGEMENT_URL
 * resolveEnvVar('http://localhost:8088')  // Returns as-is
 */
export function resolveEnvVar(value: string): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const envName = value.slice(1);
  const envValue = process.env[envName];

  if (envValue === undefined) {
    throw new Error(`Environment variable ${envName} is not set (referenced as ${value})`);
  }

  return envValue;
}

/**
 * Resolve a string value, returning undefined if the env var is not set or empty.
 */
export function resolveEnvVarOptional(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!value.startsWith('$')) {
    return value;
  }

  const envName = value.slice(1);
  return process.env[envName] || undefined;
}

function resolveCredentials(generation?: GenerationConfig): ProviderCredentials {
  const credentials: ProviderCredentials = {};
  for (const name of PROVIDER_NAMES) {
    const reference = generation?.apiKeys?.[name] ?? DEFAULT_CREDENTIAL_ENV_VARS[name];
    const apiKey = resolveEnvVarOptional(reference);
    if (apiKey) {
      credentials[name] = apiKey;
    }
  }
  return credentials;
}

function resolveGeneration(
  generation: GenerationConfig | undefined,
  overrides: ConfigOverrides
): ResolvedGenerationConfig {
  const model = overrides.model ?? generation?.model;
  return {
    provider: overrides.provider ?? generation?.provider ?? 'auto',
    ...(model ? { model } : {}),
    timeout: generation?.timeout ?? DEFAULT_GENERATION_TIMEOUT_MS,
    credentials: resolveCredentials(generation),
  };
}

/**
 * Resolve a validated config into its runtime form.
 *
 * Command-line overrides take precedence over file values, which take
 * precedence over defaults.
 */
export function resolveConfig(
  config: SentinelConfig,
  overrides: ConfigOverrides = {}
): ResolvedConfig {
  const baseUrl = overrides.target ?? resolveEnvVar(config.target?.baseUrl ?? DEFAULT_TARGET_URL);

  return {
    target: {
      baseUrl,
      timeout: overrides.timeout ?? config.target?.timeout ?? DEFAULT_FETCH_TIMEOUT_MS,
      ...(config.target?.paths ? { paths: config.target.paths } : {}),
    },
    thresholds: {
      gcPauseSeconds: config.thresholds?.gcPauseSeconds ?? DEFAULT_GC_PAUSE_THRESHOLD_SECONDS,
      blockedThreads: config.thresholds?.blockedThreads ?? DEFAULT_BLOCKED_THREADS_THRESHOLD,
      topRepositoryTimings:
        config.thresholds?.topRepositoryTimings ?? DEFAULT_TOP_REPOSITORY_TIMINGS,
    },
    enrichment: {
      enabled: overrides.enrich ?? config.enrichment?.enabled ?? true,
      traceSampleSize: config.enrichment?.traceSampleSize ?? DEFAULT_TRACE_SAMPLE_SIZE,
      slowTraceMs: config.enrichment?.slowTraceMs ?? DEFAULT_SLOW_TRACE_THRESHOLD_MS,
    },
    generation: resolveGeneration(config.generation, overrides),
  };
}
