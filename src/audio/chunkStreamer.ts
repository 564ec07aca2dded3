import { loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { BYTES_PER_SAMPLE, TARGET_SAMPLE_RATE } from '../types.js';
import type { SampleBuffer, StreamAudioOptions } from '../types.js';
import { buildDecodeInvocation } from './invocation.js';
import { validateDecodeParameters } from './parameters.js';
import { decodeFloat32Frames, EMPTY_BYTES } from './sampleDecoder.js';
import { runDecoder } from './supervisor.js';
import { ensureDecoderAvailable } from './toolProbe.js';

interface DecodeState {
  carry: Buffer;
  samplesEmitted: number;
  /** null when reading to the end of the file. */
  remainingSamples: number | null;
}

export const samplesForDuration = (durationMs: number): number =>
  Math.round((durationMs * TARGET_SAMPLE_RATE) / 1000);

/**
 * Lazily decode a file into chunks of about `chunkDurationSec` seconds
 * (the last one may be shorter).
 *
 * ffmpeg is spawned on the first pull and each call owns its own process,
 * which is killed and reaped when iteration completes, throws, or the caller
 * stops early. With `durationMs`, no bytes past the requested span are read.
 */
export async function* streamAudio(
  filePath: string,
  options: StreamAudioOptions = {}
): AsyncGenerator<SampleBuffer, void, undefined> {
  const config = loadConfig();
  const { request, chunkDurationSec } = validateDecodeParameters(
    {
      filePath,
      startMs: options.startMs,
      durationMs: options.durationMs,
      chunkDurationSec: options.chunkDurationSec,
      timeoutMs: options.timeoutMs,
    },
    {
      chunkDurationSec: config.chunkDurationSec,
      timeoutMs: config.timeoutMs,
      timeoutWhenAbsent: null,
    }
  );

  const ffmpegPath = await ensureDecoderAvailable(config.ffmpegPath);
  const invocation = buildDecodeInvocation(request, { ffmpegPath });
  const bytesPerChunk = chunkDurationSec * TARGET_SAMPLE_RATE * BYTES_PER_SAMPLE;
  const state: DecodeState = {
    carry: EMPTY_BYTES,
    samplesEmitted: 0,
    remainingSamples: request.durationMs === null ? null : samplesForDuration(request.durationMs),
  };

  const decoder = runDecoder(invocation, {
    filePath: request.filePath,
    timeoutMs: request.timeoutMs,
    signal: options.signal,
    maxDiagnosticBytes: config.maxDiagnosticBytes,
  });

  try {
    let budgetReached = false;
    for (;;) {
      let wanted = bytesPerChunk;
      if (state.remainingSamples !== null) {
        if (state.remainingSamples <= 0) {
          budgetReached = true;
          break;
        }
        wanted = Math.min(wanted, state.remainingSamples * BYTES_PER_SAMPLE - state.carry.length);
      }

      const bytes = await decoder.read(wanted);
      if (bytes.length === 0) break;

      const decoded = decodeFloat32Frames(bytes, state.carry);
      state.carry = decoded.carry;
      if (decoded.samples.length === 0) continue;

      state.samplesEmitted += decoded.samples.length;
      if (state.remainingSamples !== null) {
        state.remainingSamples -= decoded.samples.length;
      }
      yield decoded.samples;
    }

    // Past the budget ffmpeg may still be writing; settle() reports a failure without draining it.
    if (budgetReached) {
      await decoder.settle();
    } else {
      await decoder.finish();
    }
    logger.debug({
      event: 'decoder_stream_finished',
      pid: decoder.pid,
      samplesEmitted: state.samplesEmitted,
      budgetReached,
      discardedBytes: state.carry.length,
    });
  } finally {
    await decoder.close();
  }
}
