/**
 * Utility to load .env file from project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find project root by looking for .env file
 * Starts from the given path and goes up
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    const envPath = join(current, '.env');
    if (existsSync(envPath)) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load the nearest .env above `startDir` (this package by default), so every
 * entry point reads the same file. Variables already set win over the file.
 *
 * @returns the path of the loaded file, or null when falling back to cwd
 */
export function loadEnvFromRoot(
  startDir: string = dirname(fileURLToPath(import.meta.url))
): string | null {
  const projectRoot = findProjectRoot(startDir);

  if (projectRoot) {
    const envPath = join(projectRoot, '.env');
    dotenv.config({ path: envPath });
    return envPath;
  }

  // Fallback: try current working directory
  dotenv.config();
  return null;
}
