import {
  AudioFileNotFoundError,
  AudioPermissionError,
  ProcessingError,
  UnsupportedFormatError,
} from '../errors.js';
import type { FfmpegAudioError, FfmpegAudioErrorDetail } from '../errors.js';

export type DiagnosticKind = 'FILE_NOT_FOUND' | 'PERMISSION_DENIED' | 'UNSUPPORTED_FORMAT';

export interface DiagnosticSignature {
  kind: DiagnosticKind;
  patterns: readonly RegExp[];
}

/** Checked in order; the first kind with a matching pattern wins. */
export const DIAGNOSTIC_SIGNATURES: readonly DiagnosticSignature[] = [
  {
    kind: 'FILE_NOT_FOUND',
    patterns: [/no such file or directory/i, /does not exist/i],
  },
  {
    kind: 'PERMISSION_DENIED',
    patterns: [/permission denied/i, /operation not permitted/i],
  },
  {
    kind: 'UNSUPPORTED_FORMAT',
    patterns: [
      /invalid data found when processing input/i,
      /moov atom not found/i,
      /unsupported codec/i,
      /could not find codec parameters/i,
      /decoder \(codec [^)]*\) not found/i,
      /does not contain any stream/i,
      /unknown format/i,
    ],
  },
];

const ERROR_FACTORIES: Record<DiagnosticKind, (filePath: string, detail: FfmpegAudioErrorDetail) => FfmpegAudioError> = {
  FILE_NOT_FOUND: (filePath, detail) => new AudioFileNotFoundError(filePath, detail),
  PERMISSION_DENIED: (filePath, detail) => new AudioPermissionError(filePath, detail),
  UNSUPPORTED_FORMAT: (filePath, detail) => new UnsupportedFormatError(filePath, detail),
};

export function matchDiagnostics(stderr: string): DiagnosticKind | null {
  for (const signature of DIAGNOSTIC_SIGNATURES) {
    if (signature.patterns.some((pattern) => pattern.test(stderr))) {
      return signature.kind;
    }
  }
  return null;
}

export interface DecoderFailureContext {
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  stderr: string;
  filePath: string;
}

/**
 * Map an ffmpeg exit status and its stderr to an error, or null on success.
 * A clean exit still fails when stderr carries a known failure signature.
 */
export function classifyDecoderFailure(context: DecoderFailureContext): FfmpegAudioError | null {
  const { exitCode, stderr, filePath } = context;
  const signal = context.signal ?? null;
  const detail: FfmpegAudioErrorDetail = { filePath, exitCode, signal, stderr };

  const kind = matchDiagnostics(stderr);
  if (kind) {
    return ERROR_FACTORIES[kind](filePath, detail);
  }
  if (exitCode === 0 && signal === null) {
    return null;
  }

  const reason = signal ? `was terminated by ${signal}` : `failed with return code ${exitCode ?? 'unknown'}`;
  return new ProcessingError(`ffmpeg process ${reason}`, detail);
}
