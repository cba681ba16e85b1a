import path from 'node:path';
import { loadConfig } from '../config.js';
import { PruneResult, pruneOrphanedOverlays } from '../overlay/janitor.js';
import { overlayParentDir } from '../overlay/paths.js';
import { InputContext } from './inputs.js';

export interface PruneCommandOptions {
  config?: string;
  dataHome?: string;
}

/**
 * Handle the prune command: remove overlays whose owning process is gone
 */
export async function handlePruneCommand(
  options: PruneCommandOptions,
  context: InputContext,
  isAlive?: (pid: number) => boolean
): Promise<PruneResult> {
  const { config } = await loadConfig({
    cwd: context.cwd,
    configPath: options.config,
    env: context.env,
    overrides: { data_home: options.dataHome },
  });
  const parentDir = overlayParentDir(
    config.app_id,
    config.data_home ? path.resolve(context.cwd, config.data_home) : undefined
  );

  const result = await pruneOrphanedOverlays(parentDir, isAlive);

  for (const dir of result.removed) {
    context.logger.info(`Removed orphaned overlay ${dir}`);
  }
  for (const dir of result.kept) {
    context.logger.debug(`Kept active overlay ${dir}`);
  }
  if (result.removed.length === 0) {
    context.logger.info(`No orphaned overlays under ${parentDir}`);
  }

  return result;
}
