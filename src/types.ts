export const TARGET_SAMPLE_RATE = 16000;
export const TARGET_CHANNELS = 1;
/** f32le: one IEEE-754 single per mono frame. */
export const BYTES_PER_SAMPLE = 4;

/** 16 kHz mono float32 samples within [-1, 1]. */
export type SampleBuffer = Float32Array;

export interface DecoderConfig {
  /** FFMPEG_PATH; null selects the binary bundled by @ffmpeg-installer/ffmpeg. */
  ffmpegPath: string | null;
  chunkDurationSec: number;
  timeoutMs: number;
  readBufferBytes: number;
  maxDiagnosticBytes: number;
}

export interface DecodeRequest {
  readonly filePath: string;
  /** null or 0 means the beginning of the file. */
  readonly startMs: number | null;
  /** null means read to the end of the file. */
  readonly durationMs: number | null;
  readonly sampleRate: typeof TARGET_SAMPLE_RATE;
  readonly channels: typeof TARGET_CHANNELS;
  /** null disables the wall-clock deadline. */
  readonly timeoutMs: number | null;
}

export interface OutputEncoding {
  format: 'f32le';
  bytesPerSample: typeof BYTES_PER_SAMPLE;
  sampleRate: number;
  channels: number;
}

export interface DecodeInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly output: Readonly<OutputEncoding>;
}

export type CorrectableParameter = 'startMs' | 'durationMs' | 'chunkDurationSec' | 'timeoutMs';

export interface ParameterCorrection {
  parameter: CorrectableParameter;
  received: number;
  applied: number | null;
}

export interface ReadAudioOptions {
  startMs?: number | null;
  durationMs?: number | null;
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface StreamAudioOptions {
  startMs?: number | null;
  durationMs?: number | null;
  chunkDurationSec?: number | null;
  /** Overall deadline for the whole iteration; no deadline unless given. */
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface DecoderExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}
