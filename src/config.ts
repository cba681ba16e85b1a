import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { OverlayError, describeError } from './errors.js';
import { DEFAULT_CONFIG, StrataConfig, StrataConfigSchema } from './types.js';

export const CONFIG_FILE_NAME = 'strata.yaml';

/**
 * Environment variables that override file settings, by setting name
 */
const ENV_OVERRIDES: ReadonlyArray<[keyof StrataConfig, string]> = [
  ['app_id', 'STRATA_APP_ID'],
  ['marker', 'STRATA_MARKER'],
  ['data_suffix', 'STRATA_DATA_SUFFIX'],
  ['config_suffix', 'STRATA_CONFIG_SUFFIX'],
  ['data_dir_key', 'STRATA_DATA_DIR_KEY'],
  ['config_path_key', 'STRATA_CONFIG_PATH_KEY'],
  ['data_home', 'STRATA_DATA_HOME'],
];

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, typically from CLI flags */
  overrides?: Partial<StrataConfig>;
}

export interface LoadedConfig {
  config: StrataConfig;
  /** File the settings were read from, or null when only defaults/env applied */
  source: string | null;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(err => `  - ${err.path.join('.') || '(root)'}: ${err.message}`)
    .join('\n');
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    raw = parseYaml(content);
  } catch (error) {
    throw new OverlayError(
      'CONFIG_INVALID',
      `Failed to load ${filePath}: ${describeError(error)}`
    );
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return {};
  }
  const parsed = z.record(z.unknown()).safeParse(raw);
  if (!parsed.success) {
    throw new OverlayError('CONFIG_INVALID', `${filePath} must contain a mapping of settings`);
  }
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<Record<keyof StrataConfig, string>> {
  const values: Partial<Record<keyof StrataConfig, string>> = {};
  for (const [key, variable] of ENV_OVERRIDES) {
    const value = env[variable]?.trim();
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

function definedOverrides(values: Partial<StrataConfig>): Partial<Record<keyof StrataConfig, string>> {
  const defined: Partial<Record<keyof StrataConfig, string>> = {};
  for (const [key] of ENV_OVERRIDES) {
    const value = values[key];
    if (value !== undefined) {
      defined[key] = value;
    }
  }
  return defined;
}

/**
 * Load settings. Precedence, lowest first:
 * defaults < strata.yaml < STRATA_* variables < overrides.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  let source: string | null = null;

  if (options.configPath) {
    source = path.resolve(options.cwd, options.configPath);
    if (!(await fileExists(source))) {
      throw new OverlayError('CONFIG_INVALID', `Config file not found: ${source}`);
    }
  } else {
    const candidate = path.join(options.cwd, CONFIG_FILE_NAME);
    if (await fileExists(candidate)) {
      source = candidate;
    }
  }

  const fileValues = source ? await readConfigFile(source) : {};

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileValues,
    ...envOverrides(env),
    ...definedOverrides(options.overrides ?? {}),
  };

  const result = StrataConfigSchema.strict().safeParse(merged);
  if (!result.success) {
    throw new OverlayError(
      'CONFIG_INVALID',
      `Configuration validation failed${source ? ` (${source})` : ''}:\n${formatZodError(result.error)}`
    );
  }

  return { config: result.data, source };
}
