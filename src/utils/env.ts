import path from 'node:path';
import dotenv from 'dotenv';
import { reloadConfig } from '../config.js';

const DEFAULT_ENV_PATH = path.resolve('.env');

/**
 * Load FFMPEG_* overrides from a dotenv file. A missing file is not an error.
 * The cached decoder config is dropped so the new values take effect.
 */
export function loadEnvironment(envPath: string = DEFAULT_ENV_PATH): string {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  const error: NodeJS.ErrnoException | undefined = result.error;
  if (error && error.code !== 'ENOENT') {
    throw error;
  }
  reloadConfig();
  return resolved;
}
