import { z } from 'zod';
import { logger } from './logger.js';
import type { DecoderConfig } from './types.js';

export const DEFAULT_CHUNK_DURATION_SEC = 1200;
export const DEFAULT_TIMEOUT_MS = 300_000;
export const DEFAULT_READ_BUFFER_BYTES = 1024 * 1024;
export const DEFAULT_MAX_DIAGNOSTIC_BYTES = 64 * 1024;

// Invalid values fall back to the default instead of failing the caller.
const positiveInt = (envKey: string, fallback: number) =>
  z.coerce
    .number()
    .int()
    .positive()
    .catch((ctx) => {
      const raw: unknown = ctx.input;
      if (raw !== undefined && raw !== '') {
        logger.warn({ event: 'config_value_ignored', envKey, value: raw, fallback });
      }
      return fallback;
    });

const configSchema = z.object({
  FFMPEG_PATH: z.string().trim().min(1).nullable().catch(null),
  FFMPEG_STREAM_CHUNK_DURATION_SEC: positiveInt('FFMPEG_STREAM_CHUNK_DURATION_SEC', DEFAULT_CHUNK_DURATION_SEC),
  FFMPEG_TIMEOUT_MS: positiveInt('FFMPEG_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
  FFMPEG_READ_BUFFER_BYTES: positiveInt('FFMPEG_READ_BUFFER_BYTES', DEFAULT_READ_BUFFER_BYTES),
  FFMPEG_MAX_DIAGNOSTIC_BYTES: positiveInt('FFMPEG_MAX_DIAGNOSTIC_BYTES', DEFAULT_MAX_DIAGNOSTIC_BYTES),
});

let cachedConfig: Readonly<DecoderConfig> | null = null;

/**
 * Resolve decoder defaults from the environment once; later calls reuse the
 * cached value until {@link reloadConfig} is called.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<DecoderConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = configSchema.parse(env);
  cachedConfig = Object.freeze({
    ffmpegPath: parsed.FFMPEG_PATH,
    chunkDurationSec: parsed.FFMPEG_STREAM_CHUNK_DURATION_SEC,
    timeoutMs: parsed.FFMPEG_TIMEOUT_MS,
    readBufferBytes: parsed.FFMPEG_READ_BUFFER_BYTES,
    maxDiagnosticBytes: parsed.FFMPEG_MAX_DIAGNOSTIC_BYTES,
  });
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
