import dotenv from 'dotenv';
import { resolve } from 'path';
import { existsSync } from 'fs';

let envLoaded = false;

/**
 * Load `.env` then `.env.local` from the working directory, once per process.
 * Values already exported in the shell win over both files.
 */
export function ensureEnvLoaded(cwd: string = process.cwd()): void {
  if (envLoaded) return;

  const cwdEnvLocal = resolve(cwd, '.env.local');
  const cwdEnv = resolve(cwd, '.env');

  // dotenv never overrides, so the more specific file goes first
  if (existsSync(cwdEnvLocal)) {
    dotenv.config({ path: cwdEnvLocal });
  }
  if (existsSync(cwdEnv)) {
    dotenv.config({ path: cwdEnv });
  }

  envLoaded = true;
}

/**
 * Utility to read an environment variable using multiple fallbacks.
 */
export function getEnv(keys: string[], env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value) {
      return value;
    }
  }
  return undefined;
}
