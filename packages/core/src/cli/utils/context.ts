/**
 * Shared command setup: common options, config loading and source creation.
 */

import { InvalidArgumentError, type Command } from 'commander';

import { loadConfig } from '../../config/loader.js';
import { providerPreferenceSchema } from '../../config/schema.js';
import type { ConfigOverrides, ResolvedConfig } from '../../config/types.js';
import { DEFAULT_TARGET_URL } from '../../constants.js';
import { createActuatorSource } from '../../sources/actuator.js';
import type { ManagementSource } from '../../sources/types.js';

import * as output from './output.js';

/**
 * Options every command accepts.
 */
export interface CommonOptions {
  target?: string;
  config?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface CommandContext {
  config: ResolvedConfig;
  source: ManagementSource;
  log?: (message: string) => void;
}

/**
 * commander parser for positive integer flags.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * commander parser for --provider.
 */
export function parseProvider(value: string): NonNullable<ConfigOverrides['provider']> {
  const result = providerPreferenceSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('Must be one of: auto, none, gemini, openai, anthropic.');
  }
  return result.data;
}

/**
 * Attach --target, --config, --timeout and --verbose to a command.
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('-t, --target <url>', `Management base URL (default: ${DEFAULT_TARGET_URL})`)
    .option('-c, --config <path>', 'Path to config file')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInt)
    .option('-v, --verbose', 'Verbose output');
}

/**
 * Load config (flags win) and build the actuator source.
 */
export async function createCommandContext(
  options: CommonOptions,
  overrides: Omit<ConfigOverrides, 'target' | 'timeout'> = {}
): Promise<CommandContext> {
  const config = await loadConfig(options.config, {
    ...overrides,
    ...(options.target ? { target: options.target } : {}),
    ...(options.timeout ? { timeout: options.timeout } : {}),
  });

  const source = createActuatorSource({
    baseUrl: config.target.baseUrl,
    timeout: config.target.timeout,
    ...(config.target.paths ? { paths: config.target.paths } : {}),
  });

  const log = options.verbose ? (message: string) => output.dim(message) : undefined;
  if (log) {
    log(`Target: ${source.baseUrl} (timeout ${config.target.timeout}ms)`);
  }

  return { config, source, ...(log ? { log } : {}) };
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
