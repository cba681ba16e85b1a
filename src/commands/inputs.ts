import path from 'node:path';
import { loadConfig } from '../config.js';
import { OverlayError } from '../errors.js';
import { Logger } from '../logger.js';
import { probeInterpreter } from '../layers/probe.js';
import { resolveLayers } from '../layers/resolver.js';
import { overlayParentDir } from '../overlay/paths.js';
import { EnvironmentKeys, LayerPlan, StrataConfig } from '../types.js';

/**
 * Options shared by every command that resolves layers
 */
export interface LayerInputOptions {
  searchPath?: string[];
  prefix?: string;
  python?: string;
  config?: string;
  marker?: string;
  dataSuffix?: string;
  configSuffix?: string;
  dataHome?: string;
}

export interface ResolvedInputs {
  config: StrataConfig;
  plan: LayerPlan;
  parentDir: string;
  keys: EnvironmentKeys;
}

export interface InputContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  probe?: typeof probeInterpreter;
}

function splitPathList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(path.delimiter).filter(Boolean);
}

/**
 * Collect the search path and the canonical prefix.
 *
 * Search path: --search-path, else STRATA_SEARCH_PATH, else the probe.
 * Prefix: --prefix, else STRATA_PREFIX, else the probe.
 */
export async function collectSearchInputs(
  options: LayerInputOptions,
  context: InputContext
): Promise<{ searchPaths: string[]; prefix: string }> {
  let searchPaths = options.searchPath && options.searchPath.length > 0
    ? options.searchPath
    : splitPathList(context.env.STRATA_SEARCH_PATH);
  let prefix = options.prefix ?? context.env.STRATA_PREFIX?.trim();

  const needsProbe = searchPaths.length === 0 || !prefix;
  if (needsProbe && options.python) {
    const probe = context.probe ?? probeInterpreter;
    context.logger.debug(`Probing interpreter ${options.python}`);
    const result = await probe(options.python);
    if (searchPaths.length === 0) searchPaths = result.path;
    if (!prefix) prefix = result.prefix;
  }

  if (!prefix) {
    throw new OverlayError(
      'CONFIG_INVALID',
      'No installation prefix given',
      'Use --prefix, set STRATA_PREFIX, or pass --python <interpreter>'
    );
  }

  return { searchPaths, prefix: path.resolve(context.cwd, prefix) };
}

export async function resolveInputs(
  options: LayerInputOptions,
  context: InputContext
): Promise<ResolvedInputs> {
  const { config, source } = await loadConfig({
    cwd: context.cwd,
    configPath: options.config,
    env: context.env,
    overrides: {
      marker: options.marker,
      data_suffix: options.dataSuffix,
      config_suffix: options.configSuffix,
      data_home: options.dataHome,
    },
  });
  if (source) {
    context.logger.debug(`Loaded settings from ${source}`);
  }

  const { searchPaths, prefix } = await collectSearchInputs(options, context);
  context.logger.debug(`Prefix: ${prefix}`);
  context.logger.debug(`Search path entries: ${searchPaths.length}`);

  const plan = await resolveLayers(
    searchPaths.map(entry => path.resolve(context.cwd, entry)),
    prefix,
    {
      marker: config.marker,
      dataSuffix: config.data_suffix,
      configSuffix: config.config_suffix,
    }
  );

  return {
    config,
    plan,
    parentDir: overlayParentDir(
      config.app_id,
      config.data_home ? path.resolve(context.cwd, config.data_home) : undefined
    ),
    keys: { dataDirKey: config.data_dir_key, configPathKey: config.config_path_key },
  };
}
