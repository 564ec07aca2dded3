import { z } from 'zod';
import { InvalidParameterError } from '../errors.js';
import { logger } from '../logger.js';
import { TARGET_CHANNELS, TARGET_SAMPLE_RATE } from '../types.js';
import type { CorrectableParameter, DecodeRequest, ParameterCorrection } from '../types.js';

export interface RawDecodeParameters {
  filePath: unknown;
  startMs?: unknown;
  durationMs?: unknown;
  chunkDurationSec?: unknown;
  timeoutMs?: unknown;
}

export interface ParameterDefaults {
  chunkDurationSec: number;
  /** Replaces a non-positive timeoutMs. */
  timeoutMs: number;
  /** Used when timeoutMs is absent; null means no deadline. */
  timeoutWhenAbsent: number | null;
}

export interface ValidatedDecodeParameters {
  request: DecodeRequest;
  chunkDurationSec: number;
  corrections: readonly ParameterCorrection[];
}

const filePathSchema = z.string().refine((value) => value.trim().length > 0);
const optionalIntSchema = z.number().int().nullish();

const describeValue = (value: unknown): string => {
  if (value === null) return 'null';
  if (typeof value === 'number') return Number.isFinite(value) ? `number ${value}` : String(value);
  return typeof value;
};

function parseOptionalInt(parameter: CorrectableParameter, value: unknown): number | null {
  const parsed = optionalIntSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidParameterError(
      parameter,
      'type',
      `${parameter} must be an integer or null, got: ${describeValue(value)}`
    );
  }
  return parsed.data ?? null;
}

/**
 * Normalize raw decode parameters. Type errors and an unusable file path are
 * fatal; out-of-range numbers are replaced and reported in `corrections`.
 */
export function validateDecodeParameters(
  raw: RawDecodeParameters,
  defaults: ParameterDefaults
): ValidatedDecodeParameters {
  const path = filePathSchema.safeParse(raw.filePath);
  if (!path.success) {
    throw new InvalidParameterError(
      'filePath',
      'value',
      `filePath must be a non-empty string, got: ${typeof raw.filePath === 'string' ? JSON.stringify(raw.filePath) : describeValue(raw.filePath)}`
    );
  }

  let startMs = parseOptionalInt('startMs', raw.startMs);
  let durationMs = parseOptionalInt('durationMs', raw.durationMs);
  let chunkDurationSec = parseOptionalInt('chunkDurationSec', raw.chunkDurationSec);
  let timeoutMs = parseOptionalInt('timeoutMs', raw.timeoutMs);

  const corrections: ParameterCorrection[] = [];
  const correct = (parameter: CorrectableParameter, received: number, applied: number | null) => {
    corrections.push({ parameter, received, applied });
    logger.warn({ event: 'decode_parameter_corrected', parameter, received, applied });
  };

  if (startMs !== null && startMs < 0) {
    correct('startMs', startMs, null);
    startMs = null;
  }
  if (durationMs !== null && durationMs <= 0) {
    correct('durationMs', durationMs, null);
    durationMs = null;
  }
  if (chunkDurationSec === null) {
    chunkDurationSec = defaults.chunkDurationSec;
  } else if (chunkDurationSec <= 0) {
    correct('chunkDurationSec', chunkDurationSec, defaults.chunkDurationSec);
    chunkDurationSec = defaults.chunkDurationSec;
  }
  if (timeoutMs === null) {
    timeoutMs = defaults.timeoutWhenAbsent;
  } else if (timeoutMs <= 0) {
    correct('timeoutMs', timeoutMs, defaults.timeoutMs);
    timeoutMs = defaults.timeoutMs;
  }

  if (startMs !== null && durationMs === null) {
    logger.debug({ event: 'decode_reads_to_end', startMs });
  }

  const request: DecodeRequest = Object.freeze({
    filePath: path.data,
    startMs,
    durationMs,
    sampleRate: TARGET_SAMPLE_RATE,
    channels: TARGET_CHANNELS,
    timeoutMs,
  });

  return { request, chunkDurationSec, corrections };
}
