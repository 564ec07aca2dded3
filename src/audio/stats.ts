import { TARGET_SAMPLE_RATE } from '../types.js';
import type { SampleBuffer } from '../types.js';

export interface SampleSummary {
  sampleCount: number;
  durationMs: number;
  peak: number;
  rms: number;
  /** Samples outside [-1, 1]; ffmpeg's float output is not clipped. */
  outOfRange: number;
}

export function summarizeSamples(samples: SampleBuffer, sampleRate = TARGET_SAMPLE_RATE): SampleSummary {
  let peak = 0;
  let sumSquares = 0;
  let outOfRange = 0;
  for (let i = 0; i < samples.length; i++) {
    const value = samples[i];
    const abs = Math.abs(value);
    if (abs > peak) peak = abs;
    if (abs > 1) outOfRange += 1;
    sumSquares += value * value;
  }
  return {
    sampleCount: samples.length,
    durationMs: (samples.length / sampleRate) * 1000,
    peak,
    rms: samples.length > 0 ? Math.sqrt(sumSquares / samples.length) : 0,
    outOfRange,
  };
}
