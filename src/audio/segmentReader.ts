import { loadConfig } from '../config.js';
import type { ReadAudioOptions, SampleBuffer } from '../types.js';
import { buildDecodeInvocation } from './invocation.js';
import { validateDecodeParameters } from './parameters.js';
import { concatSamples, decodeFloat32Frames, EMPTY_BYTES } from './sampleDecoder.js';
import { runDecoder } from './supervisor.js';
import { ensureDecoderAvailable } from './toolProbe.js';

/**
 * Decode `[startMs, startMs + durationMs)` of any ffmpeg-readable file into a
 * single 16 kHz mono float32 buffer.
 *
 * - Both bounds absent: the whole file.
 * - `durationMs` absent: from `startMs` to the end of the file.
 * - A start at or past the end of the file yields an empty buffer.
 *
 * The process runs under `timeoutMs` (defaults to FFMPEG_TIMEOUT_MS). Output
 * decoded before a failure is discarded.
 */
export async function readAudio(filePath: string, options: ReadAudioOptions = {}): Promise<SampleBuffer> {
  const config = loadConfig();
  const { request } = validateDecodeParameters(
    {
      filePath,
      startMs: options.startMs,
      durationMs: options.durationMs,
      timeoutMs: options.timeoutMs,
    },
    {
      chunkDurationSec: config.chunkDurationSec,
      timeoutMs: config.timeoutMs,
      timeoutWhenAbsent: config.timeoutMs,
    }
  );

  const ffmpegPath = await ensureDecoderAvailable(config.ffmpegPath);
  const invocation = buildDecodeInvocation(request, { ffmpegPath });
  const decoder = runDecoder(invocation, {
    filePath: request.filePath,
    timeoutMs: request.timeoutMs,
    signal: options.signal,
    maxDiagnosticBytes: config.maxDiagnosticBytes,
  });

  try {
    const parts: SampleBuffer[] = [];
    let carry = EMPTY_BYTES;
    for (;;) {
      const bytes = await decoder.read(config.readBufferBytes);
      if (bytes.length === 0) break;
      const decoded = decodeFloat32Frames(bytes, carry);
      carry = decoded.carry;
      if (decoded.samples.length > 0) parts.push(decoded.samples);
    }
    await decoder.finish();
    return concatSamples(parts);
  } finally {
    await decoder.close();
  }
}
