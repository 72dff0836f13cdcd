import { loadConfig, type AppConfig } from '../../../../shared/config/index.js';

export const SERVICE_NAME = 'temperature-gateway';

/**
 * Read the service configuration. Called from main() so that a bad
 * environment variable is reported through the startup error path.
 */
export function loadServiceConfig(): AppConfig {
  return loadConfig(SERVICE_NAME);
}
