import path from 'node:path';
import { DEFAULT_CONFIG, EnvironmentKeys, OverlayEnvironment } from '../types.js';

export const DEFAULT_ENVIRONMENT_KEYS: EnvironmentKeys = {
  dataDirKey: DEFAULT_CONFIG.data_dir_key,
  configPathKey: DEFAULT_CONFIG.config_path_key,
};

export function publishEnvironment(dataDir: string, configPaths: readonly string[]): OverlayEnvironment {
  return Object.freeze({
    dataDir,
    configPaths: Object.freeze([...configPaths]),
  });
}

/**
 * Render the published state as environment variables for a child process.
 * The config path list is joined with the platform delimiter and may be empty.
 */
export function toEnvironmentVariables(
  environment: OverlayEnvironment,
  keys: EnvironmentKeys = DEFAULT_ENVIRONMENT_KEYS,
  delimiter: string = path.delimiter
): Record<string, string> {
  return {
    [keys.dataDirKey]: environment.dataDir,
    [keys.configPathKey]: environment.configPaths.join(delimiter),
  };
}
