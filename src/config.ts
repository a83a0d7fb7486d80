import type { MigrationConfig } from './types/platform.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_API_URL = 'https://api.smith.langchain.com';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MigrationConfig {
  const config: MigrationConfig = {
    source: {
      apiKey: env.LANGSMITH_OLD_API_KEY || '',
      apiUrl: env.LANGSMITH_OLD_API_URL || DEFAULT_API_URL,
    },
    destination: {
      apiKey: env.LANGSMITH_NEW_API_KEY || '',
      apiUrl: env.LANGSMITH_NEW_API_URL || DEFAULT_API_URL,
    },
  };

  if (!config.source.apiKey || !config.destination.apiKey) {
    throw new ConfigurationError(
      'Missing required environment variables LANGSMITH_OLD_API_KEY and LANGSMITH_NEW_API_KEY. Please check README for setup instructions.'
    );
  }

  return config;
}
