/**
 * Test fixture helpers: build isolated environment trees on disk.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

export const TEST_LAYER_OPTIONS = {
  marker: 'site-packages',
  dataSuffix: path.join('share', 'app'),
  configSuffix: path.join('etc', 'app'),
};

export async function makeTempDir(label: string): Promise<string> {
  const dir = path.join(os.tmpdir(), `strata-${label}-${uuidv4()}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function removeTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Write files below `root`. Keys are relative paths, values file contents.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
}

/**
 * Create an environment root with a package directory and, optionally,
 * data files under share/app.
 *
 * @returns The environment's site-packages search path entry
 */
export async function createEnvironment(
  envRoot: string,
  dataFiles?: Record<string, string>
): Promise<string> {
  const sitePackages = path.join(envRoot, 'lib', 'python3.12', 'site-packages');
  await fs.mkdir(sitePackages, { recursive: true });
  if (dataFiles) {
    await fs.mkdir(path.join(envRoot, 'share', 'app'), { recursive: true });
    await writeTree(path.join(envRoot, 'share', 'app'), dataFiles);
  }
  return sitePackages;
}

/**
 * List every regular file below `root` as sorted relative paths.
 */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        files.push(path.relative(root, full));
      }
    }
  }

  await walk(root);
  return files.sort();
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}
