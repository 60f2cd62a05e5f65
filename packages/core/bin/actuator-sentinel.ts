#!/usr/bin/env tsx
/**
 * actuator-sentinel CLI
 *
 * Entry point for the actuator-sentinel command-line interface.
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { config } from 'dotenv';

import { runCli } from '../src/cli/index.js';
import { findConfigFile } from '../src/config/loader.js';

/**
 * Env file names to search for (in order of priority).
 */
const ENV_FILE_NAMES = ['.env', '.env.local'];

/**
 * Search up the directory tree for an env file.
 */
function findEnvFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    for (const fileName of ENV_FILE_NAMES) {
      const envPath = join(currentDir, fileName);
      if (existsSync(envPath)) {
        return envPath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load .env file with the following priority:
 * 1. Config directory (where sentinel.config.* lives)
 * 2. Search up from current directory
 * 3. Current working directory (default dotenv behavior)
 */
function loadEnvFile(): void {
  const configPath = findConfigFile();
  if (configPath) {
    const configDir = dirname(configPath);
    for (const fileName of ENV_FILE_NAMES) {
      const configEnvPath = join(configDir, fileName);
      if (existsSync(configEnvPath)) {
        config({ path: configEnvPath });
        return;
      }
    }
  }

  const foundEnvPath = findEnvFile(process.cwd());
  if (foundEnvPath) {
    config({ path: foundEnvPath });
    return;
  }

  config();
}

loadEnvFile();
await runCli();
