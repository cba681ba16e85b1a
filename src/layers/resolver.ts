import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Layer, LayerOptions, LayerPlan } from '../types.js';

/**
 * Number of levels between a marker entry and its environment root,
 * e.g. `<env>/lib/python3.12/site-packages` -> `<env>`.
 */
const ENVIRONMENT_DEPTH = 3;

async function isDirectory(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Map one search path entry to its layer, or null when the entry
 * is not an isolated environment's package directory.
 */
export function layerForEntry(entry: string, options: LayerOptions): Layer | null {
  if (!entry) {
    return null;
  }

  const absolute = path.resolve(entry);
  if (path.basename(absolute) !== options.marker) {
    return null;
  }

  let searchRoot = absolute;
  for (let i = 0; i < ENVIRONMENT_DEPTH; i++) {
    searchRoot = path.dirname(searchRoot);
  }

  return {
    searchRoot,
    dataPath: path.join(searchRoot, options.dataSuffix),
    configPath: path.join(searchRoot, options.configSuffix),
  };
}

/**
 * Derive the ordered data layers and the config path list from a search path.
 *
 * Config paths are recorded for every marker entry, whether or not they exist.
 * Data paths are kept only when they exist, differ from the canonical data
 * path and were not already listed.
 *
 * @param searchPaths - Library search path entries, in the host's order
 * @param prefix - Canonical installation root of the host
 */
export async function resolveLayers(
  searchPaths: readonly string[],
  prefix: string,
  options: LayerOptions
): Promise<LayerPlan> {
  const canonicalDataPath = path.resolve(prefix, options.dataSuffix);
  const dataPaths: string[] = [canonicalDataPath];
  const configPaths: string[] = [];

  for (const entry of searchPaths) {
    const layer = layerForEntry(entry, options);
    if (!layer) {
      continue;
    }

    configPaths.push(layer.configPath);

    if (dataPaths.includes(layer.dataPath)) {
      continue;
    }
    if (!(await isDirectory(layer.dataPath))) {
      continue;
    }

    dataPaths.push(layer.dataPath);
  }

  return {
    canonicalDataPath,
    dataPaths,
    configPaths,
  };
}

/**
 * Order in which the builder walks the layers of a plan.
 *
 * The builder keeps the first file written at each path, so walking the
 * discovered environments first (in encounter order) and the canonical
 * data path last gives: first-discovered environment > later environments
 * > canonical root.
 */
export function mergeOrder(plan: LayerPlan): string[] {
  const [canonical, ...discovered] = plan.dataPaths;
  return canonical === undefined ? [...discovered] : [...discovered, canonical];
}
