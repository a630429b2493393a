/**
 * Load the `.env` file closest to the working directory
 */

import dotenv from 'dotenv';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Walk up from `startPath` until a directory containing `.env` is found
 */
export function findEnvFile(startPath: string): string | null {
  let current = resolve(startPath);

  for (;;) {
    const envPath = join(current, '.env');
    if (existsSync(envPath)) {
      return envPath;
    }
    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load environment variables from the nearest `.env`
 *
 * Variables already set in the process environment win.
 *
 * @returns Path of the loaded file, or null when none was found
 */
export function loadEnvFromRoot(startPath: string = process.cwd()): string | null {
  const envPath = findEnvFile(startPath);
  if (envPath) {
    dotenv.config({ path: envPath });
  }
  return envPath;
}
