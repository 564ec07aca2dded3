export type FfmpegAudioErrorCode =
  | 'TOOL_NOT_FOUND'
  | 'INVALID_PARAMETER'
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'UNSUPPORTED_FORMAT'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'PROCESSING_FAILED';

export interface FfmpegAudioErrorDetail {
  filePath?: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stderr?: string;
  cause?: unknown;
}

/**
 * Base class for every failure surfaced by the reader and the streamer.
 * `stderr` holds the decoder diagnostics captured up to the failure.
 */
export class FfmpegAudioError extends Error {
  code: FfmpegAudioErrorCode;
  filePath?: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stderr?: string;

  constructor(code: FfmpegAudioErrorCode, message: string, detail: FfmpegAudioErrorDetail = {}) {
    super(message, detail.cause === undefined ? undefined : { cause: detail.cause });
    this.name = 'FfmpegAudioError';
    this.code = code;
    this.filePath = detail.filePath;
    this.exitCode = detail.exitCode;
    this.signal = detail.signal;
    this.stderr = detail.stderr;
  }
}

export class ToolNotFoundError extends FfmpegAudioError {
  command: string;

  constructor(command: string, reason: string, cause?: unknown) {
    super('TOOL_NOT_FOUND', `ffmpeg not available (${command}): ${reason}`, { cause });
    this.name = 'ToolNotFoundError';
    this.command = command;
  }
}

export class InvalidParameterError extends FfmpegAudioError {
  parameter: string;
  reason: 'type' | 'value';

  constructor(parameter: string, reason: 'type' | 'value', message: string) {
    super('INVALID_PARAMETER', message);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.reason = reason;
  }
}

export class AudioFileNotFoundError extends FfmpegAudioError {
  constructor(filePath: string, detail: FfmpegAudioErrorDetail = {}) {
    super('FILE_NOT_FOUND', `Audio file not found: ${filePath}`, { ...detail, filePath });
    this.name = 'AudioFileNotFoundError';
  }
}

export class AudioPermissionError extends FfmpegAudioError {
  constructor(filePath: string, detail: FfmpegAudioErrorDetail = {}) {
    super('PERMISSION_DENIED', `Permission denied accessing file: ${filePath}`, { ...detail, filePath });
    this.name = 'AudioPermissionError';
  }
}

export class UnsupportedFormatError extends FfmpegAudioError {
  constructor(filePath: string, detail: FfmpegAudioErrorDetail = {}) {
    super('UNSUPPORTED_FORMAT', `Unsupported or invalid audio format: ${filePath}`, { ...detail, filePath });
    this.name = 'UnsupportedFormatError';
  }
}

export class DecodeTimeoutError extends FfmpegAudioError {
  timeoutMs: number;

  constructor(filePath: string, timeoutMs: number, detail: FfmpegAudioErrorDetail = {}) {
    super('TIMEOUT', `ffmpeg timed out after ${timeoutMs}ms while processing ${filePath}`, {
      ...detail,
      filePath,
    });
    this.name = 'DecodeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class DecodeAbortedError extends FfmpegAudioError {
  constructor(filePath: string, detail: FfmpegAudioErrorDetail = {}) {
    super('ABORTED', `Decoding aborted: ${filePath}`, { ...detail, filePath });
    this.name = 'DecodeAbortedError';
  }
}

export class ProcessingError extends FfmpegAudioError {
  constructor(message: string, detail: FfmpegAudioErrorDetail = {}) {
    super('PROCESSING_FAILED', message, detail);
    this.name = 'ProcessingError';
  }
}

export function isFfmpegAudioError(error: unknown): error is FfmpegAudioError {
  return error instanceof FfmpegAudioError;
}
