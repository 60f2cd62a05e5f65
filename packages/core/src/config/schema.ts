/**
 * Config Schema
 *
 * zod schema used to validate config files before resolution.
 */

import { PROVIDER_NAMES, type ProviderPreference } from '@actuator-sentinel/text-generation';
import { z } from 'zod';

import type { SentinelConfig } from './types.js';

const positiveInt = z.number().int().positive();

export const providerPreferenceSchema: z.ZodType<ProviderPreference> = z.union([
  z.literal('auto'),
  z.literal('none'),
  z.enum(PROVIDER_NAMES),
]);

const pathsSchema = z
  .object({
    metrics: z.string().startsWith('/'),
    traces: z.array(z.string().startsWith('/')).min(1),
    threadDump: z.string().startsWith('/'),
  })
  .partial()
  .strict();

export const sentinelConfigSchema: z.ZodType<SentinelConfig> = z
  .object({
    target: z
      .object({
        baseUrl: z.string().min(1).optional(),
        timeout: positiveInt.optional(),
        paths: pathsSchema.optional(),
      })
      .strict()
      .optional(),
    thresholds: z
      .object({
        gcPauseSeconds: z.number().nonnegative(),
        blockedThreads: z.number().nonnegative(),
        topRepositoryTimings: positiveInt,
      })
      .partial()
      .strict()
      .optional(),
    enrichment: z
      .object({
        enabled: z.boolean(),
        traceSampleSize: positiveInt,
        slowTraceMs: z.number().nonnegative(),
      })
      .partial()
      .strict()
      .optional(),
    generation: z
      .object({
        provider: providerPreferenceSchema.optional(),
        model: z.string().min(1).optional(),
        timeout: positiveInt.optional(),
        apiKeys: z
          .object({
            gemini: z.string(),
            openai: z.string(),
            anthropic: z.string(),
          })
          .partial()
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `"${path}": ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate raw config file contents.
 *
 * @throws Error naming every invalid field
 */
export function validateConfig(value: unknown, source = 'config'): SentinelConfig {
  const result = sentinelConfigSchema.safeParse(value ?? {});
  if (!result.success) {
    throw new Error(`Config error in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}
