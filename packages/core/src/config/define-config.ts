/**
 * Define Config Helper
 *
 * Provides type-safe configuration for sentinel.config.ts files.
 */

import type { SentinelConfig } from './types.js';

/**
 * Define an actuator-sentinel configuration with full type safety.
 *
 * @example
 * ```typescript
 * // sentinel.config.ts
 * import { defineConfig } from '@actuator-sentinel/core';
 *
 * export default defineConfig({
 *   target: {
 *     baseUrl: '$MANAGEMENT_URL',
 *     timeout: 3000,
 *   },
 *   thresholds: { blockedThreads: 10 },
 *   generation: { provider: 'openai', model: 'gpt-4o-mini' },
 * });
 * ```
 */
export function defineConfig(config: SentinelConfig): SentinelConfig {
  return config;
}
