import { createLogger, type Logger } from '@n8nkit/logger';
import { N8nClient } from '@n8nkit/sdk';
import { loadConfig, requireApiKey, type ConfigOverrides, type N8nkitConfig } from './config.js';

export interface Runtime {
  config: N8nkitConfig;
  logger: Logger;
  client: N8nClient;
}

/** Config, logger and API client for commands that talk to n8n */
export function createRuntime(overrides: ConfigOverrides = {}, cwd: string = process.cwd()): Runtime {
  const config = loadConfig(cwd, overrides);
  const apiKey = requireApiKey(config);
  const logger = createLogger({ environment: config.environment }).child({ service: 'n8nkit' });
  const client = new N8nClient({ baseUrl: config.baseUrl, apiKey, logger });
  return { config, logger, client };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
