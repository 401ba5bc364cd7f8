/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root, then from the process environment.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isEnvironment, type Environment } from '@n8nkit/logger';

export const DEFAULT_BASE_URL = 'http://localhost:5678';

export interface N8nkitConfig {
  apiKey?: string;
  baseUrl: string;
  environment: Environment;
}

/** Overrides from command-line flags */
export interface ConfigOverrides {
  apiKey?: string;
  apiUrl?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
export function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      try {
        return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
      } catch (error) {
        throw new ConfigError(
          `Could not read ${envPath}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load configuration
 *
 * Priority (highest to lowest):
 * 1. Command-line flags
 * 2. Process environment variables
 * 3. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): N8nkitConfig {
  const values: Record<string, string | undefined> = { ...findEnvFile(cwd) };

  for (const key of ['N8N_API_KEY', 'N8N_BASE_URL', 'N8NKIT_ENV']) {
    if (env[key]) {
      values[key] = env[key];
    }
  }

  const environment = values.N8NKIT_ENV;
  if (environment !== undefined && environment !== '' && !isEnvironment(environment)) {
    throw new ConfigError(
      `N8NKIT_ENV must be one of test, development, production (got '${environment}')`,
    );
  }

  return {
    apiKey: overrides.apiKey || values.N8N_API_KEY || undefined,
    baseUrl: overrides.apiUrl || values.N8N_BASE_URL || DEFAULT_BASE_URL,
    environment: isEnvironment(environment) ? environment : 'development',
  };
}

export function requireApiKey(config: N8nkitConfig): string {
  if (!config.apiKey) {
    throw new ConfigError(
      'N8N_API_KEY is required. Set it in the environment, a .env file, or pass --api-key.',
    );
  }
  return config.apiKey;
}
