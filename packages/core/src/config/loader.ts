/**
 * Config Loader
 *
 * Discovers and loads sentinel.config files. A missing config file is not an
 * error: every setting has a default.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { parse as parseYaml } from 'yaml';

import { resolveConfig } from './resolver.js';
import { validateConfig } from './schema.js';
import type { ConfigOverrides, ResolvedConfig, SentinelConfig } from './types.js';

/**
 * Config file names to search for (in order of priority).
 */
const CONFIG_FILE_NAMES = [
  'sentinel.config.ts',
  'sentinel.config.js',
  'sentinel.config.mjs',
  'sentinel.config.yaml',
  'sentinel.config.yml',
];

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Find the config file by searching from cwd up to root.
 */
export function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir ?? process.cwd();

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      return null;
    }
    currentDir = parentDir;
  }
}

async function importDefaultExport(absolutePath: string): Promise<unknown> {
  // Use dynamic import with file URL for ESM compatibility
  const loaded: unknown = await import(pathToFileURL(absolutePath).href);

  if (typeof loaded !== 'object' || loaded === null || !('default' in loaded)) {
    throw new Error(`Config file must have a default export: ${absolutePath}`);
  }
  return loaded.default;
}

/**
 * Load a config file and return the validated (unresolved) config.
 */
export async function loadConfigFile(configPath: string): Promise<SentinelConfig> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = YAML_EXTENSIONS.has(extname(absolutePath))
      ? parseYaml(readFileSync(absolutePath, 'utf-8'))
      : await importDefaultExport(absolutePath);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load config file ${absolutePath}: ${error.message}`);
    }
    throw error;
  }

  return validateConfig(raw, absolutePath);
}

/**
 * Load and resolve the config.
 *
 * @param configPath - Optional path to config file. If not provided, searches from cwd.
 * @param overrides - Command-line values that win over the file
 */
export async function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {}
): Promise<ResolvedConfig> {
  const path = configPath ?? findConfigFile();
  const config = path ? await loadConfigFile(path) : {};
  return resolveConfig(config, overrides);
}

/**
 * Check if a config file exists in the current directory tree.
 */
export function hasConfigFile(startDir?: string): boolean {
  return findConfigFile(startDir) !== null;
}
