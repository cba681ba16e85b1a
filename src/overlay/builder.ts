import { promises as fs, Dirent } from 'node:fs';
import path from 'node:path';
import { OverlayError, describeError, errnoCode } from '../errors.js';
import { BuildReport, LayerReport, ProjectionOutcome } from '../types.js';

export interface BuildHooks {
  onProjection?: (outcome: ProjectionOutcome, layer: string) => void;
  /** Stops the walk before its next read or link once aborted */
  signal?: AbortSignal;
}

/**
 * Hard-link one file into the overlay.
 *
 * An existing destination is a normal outcome (`skipped`), not a failure:
 * the file already there came from a layer that was walked earlier. Only the
 * link step is allowed to find something in place; a parent directory that
 * cannot be created (say, a file from an earlier layer sits at its path) is
 * a PROJECTION_FAILED error.
 *
 * @throws OverlayError with code PROJECTION_FAILED for any other I/O failure
 */
export async function projectFile(
  source: string,
  destination: string,
  signal?: AbortSignal
): Promise<ProjectionOutcome> {
  const parent = path.dirname(destination);
  try {
    await fs.mkdir(parent, { recursive: true });
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    throw projectionFailed(`Failed to create ${parent} for ${source}`, error);
  }

  try {
    signal?.throwIfAborted();
    await fs.link(source, destination);
    return { kind: 'linked', source, destination };
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    if (errnoCode(error) === 'EEXIST') {
      return { kind: 'skipped', reason: 'exists', source, destination };
    }
    throw projectionFailed(`Failed to link ${source} -> ${destination}`, error);
  }
}

function projectionFailed(message: string, error: unknown): OverlayError {
  return new OverlayError(
    'PROJECTION_FAILED',
    `${message}: ${describeError(error)}`,
    errnoCode(error) === 'EXDEV'
      ? 'Layers and the overlay parent directory must live on the same filesystem'
      : undefined,
    { cause: error }
  );
}

async function readLayerDirectory(directory: string, isRoot: boolean): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    // A layer that does not exist contributes nothing
    if (isRoot && errnoCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

async function walkLayer(
  layer: string,
  destination: string,
  report: BuildReport,
  hooks: BuildHooks
): Promise<LayerReport> {
  const layerReport: LayerReport = { layer, linked: 0, skipped: 0, ignored: 0 };
  const pending: string[] = [layer];

  while (pending.length > 0) {
    const directory = pending.shift();
    if (directory === undefined) break;

    hooks.signal?.throwIfAborted();
    const entries = await readLayerDirectory(directory, directory === layer);
    const subdirectories: string[] = [];

    for (const entry of entries) {
      hooks.signal?.throwIfAborted();
      const source = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        subdirectories.push(source);
        continue;
      }
      if (!entry.isFile()) {
        layerReport.ignored++;
        continue;
      }

      const relativePath = path.relative(layer, source);
      const outcome = await projectFile(source, path.join(destination, relativePath), hooks.signal);
      hooks.onProjection?.(outcome, layer);

      if (outcome.kind === 'linked') {
        layerReport.linked++;
      } else {
        layerReport.skipped++;
        report.collisions.push({ relativePath, layer });
      }
    }

    // Depth-first, in name order
    pending.unshift(...subdirectories);
  }

  return layerReport;
}

/**
 * Project the file-level union of `layers` into `destination`.
 *
 * Layers are walked in the given order and the first file written at a
 * relative path is kept, so earlier layers take precedence over later ones.
 * Only regular files are linked; directories are created as files need them.
 */
export async function buildOverlay(
  layers: readonly string[],
  destination: string,
  hooks: BuildHooks = {}
): Promise<BuildReport> {
  const report: BuildReport = {
    destination,
    layers: [],
    linked: 0,
    skipped: 0,
    ignored: 0,
    collisions: [],
  };

  for (const layer of layers) {
    const layerReport = await walkLayer(layer, destination, report, hooks);
    report.layers.push(layerReport);
    report.linked += layerReport.linked;
    report.skipped += layerReport.skipped;
    report.ignored += layerReport.ignored;
  }

  return report;
}
