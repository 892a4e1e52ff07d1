import { config as loadDotenv } from 'dotenv';
import { resolve } from 'node:path';

/**
 * Loads `.env` and, outside production, `.env.local` from `rootDir` into `process.env`.
 * Later files win. Returns the files that were actually read.
 */
export const loadEnvFiles = (rootDir: string = process.cwd()): string[] => {
  const candidates = [resolve(rootDir, '.env')];
  if ((process.env.NODE_ENV ?? 'development') !== 'production') {
    candidates.push(resolve(rootDir, '.env.local'));
  }

  const loaded: string[] = [];
  for (const path of candidates) {
    const result = loadDotenv({ path, override: true });
    if (!result.error) {
      loaded.push(path);
    }
  }
  return loaded;
};
