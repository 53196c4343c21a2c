import { existsSync } from 'node:fs';
import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';

let loaded = false;

/**
 * Loads `.env.local` then `.env` from ENV_FILE and the working directory.
 * Variables already present in the environment win.
 */
export function loadLocalEnv(): string[] {
  if (loaded) return [];
  loaded = true;

  const candidates = new Set(
    [
      process.env.ENV_FILE,
      path.resolve(process.cwd(), '.env.local'),
      path.resolve(process.cwd(), '.env'),
    ].filter((value): value is string => typeof value === 'string' && value.length > 0)
  );

  const loadedFiles: string[] = [];
  for (const filePath of candidates) {
    if (!existsSync(filePath)) continue;
    dotenvConfig({ path: filePath, override: false });
    loadedFiles.push(filePath);
  }
  return loadedFiles;
}

export const loadedEnvFiles: string[] = loadLocalEnv();
