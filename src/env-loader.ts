import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { describeError } from './errors.js';

/**
 * Find the project root directory by searching upward for a .git directory
 * @param startDir - Directory to start searching from
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  const root = path.parse(current).root;

  while (current !== root) {
    if (existsSync(path.join(current, '.git'))) {
      return current;
    }
    current = path.dirname(current);
  }

  return null;
}

/**
 * Load .env files in cascading order: working directory > project root > process.env
 *
 * Uses dotenv with override: false, so variables already set (by the shell
 * or by an earlier file) keep their value.
 *
 * @returns Array of successfully loaded .env file paths
 */
export function loadEnvFiles(
  cwd: string,
  warn: (message: string) => void = (message) => console.warn(`[WARN] ${message}`)
): string[] {
  const loadedFiles: string[] = [];
  const envFilePaths: string[] = [path.join(cwd, '.env')];

  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    const rootEnv = path.join(projectRoot, '.env');
    if (!envFilePaths.includes(rootEnv)) {
      envFilePaths.push(rootEnv);
    }
  }

  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath, override: false, quiet: true });
    if (result.error) {
      warn(`Failed to load ${envPath}: ${describeError(result.error)}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
