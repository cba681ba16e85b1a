import { promises as fs, Dirent } from 'node:fs';
import path from 'node:path';
import { errnoCode } from '../errors.js';
import { OVERLAY_DIR_PREFIX } from './lifecycle.js';

const OVERLAY_DIR_PATTERN = new RegExp(`^${OVERLAY_DIR_PREFIX}(\\d+)-[0-9a-f-]+$`);

/**
 * Janitor result for one scan of the overlay parent directory
 */
export interface PruneResult {
  removed: string[];
  /** Overlays whose owning process is still alive */
  kept: string[];
}

/**
 * Check if a process is alive using signal 0
 * @returns true if process is alive, false otherwise
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence without killing
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) !== 'ESRCH';
  }
}

export function ownerPid(dirName: string): number | null {
  const match = dirName.match(OVERLAY_DIR_PATTERN);
  if (!match || !match[1]) {
    return null;
  }
  return parseInt(match[1], 10);
}

/**
 * Remove overlays left behind by processes that died without cleaning up
 * (kill -9, power loss). Entries that are not overlay directories are left
 * untouched, as are overlays of live processes.
 *
 * @param parentDir - Directory overlays are allocated in
 * @param isAlive - Liveness check, replaceable in tests
 */
export async function pruneOrphanedOverlays(
  parentDir: string,
  isAlive: (pid: number) => boolean = isProcessAlive
): Promise<PruneResult> {
  const result: PruneResult = { removed: [], kept: [] };

  let entries: Dirent[];
  try {
    entries = await fs.readdir(parentDir, { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return result;
    }
    throw error;
  }

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;

    const pid = ownerPid(entry.name);
    if (pid === null) continue;

    const dir = path.join(parentDir, entry.name);
    if (pid !== process.pid && !isAlive(pid)) {
      await fs.rm(dir, { recursive: true, force: true });
      result.removed.push(dir);
    } else {
      result.kept.push(dir);
    }
  }

  return result;
}
