import { BYTES_PER_SAMPLE } from '../types.js';
import type { SampleBuffer } from '../types.js';

export const EMPTY_BYTES: Buffer = Buffer.alloc(0);

export interface DecodedFrames {
  samples: SampleBuffer;
  /** Trailing 0-3 bytes of an incomplete frame, to prepend to the next chunk. */
  carry: Buffer;
}

/**
 * Reinterpret little-endian f32 frames as samples. Values are copied as-is:
 * no scaling, no clamping.
 */
export function decodeFloat32Frames(chunk: Buffer, carry: Buffer = EMPTY_BYTES): DecodedFrames {
  const bytes = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
  const frames = Math.floor(bytes.length / BYTES_PER_SAMPLE);
  const wholeBytes = frames * BYTES_PER_SAMPLE;

  const samples = new Float32Array(frames);
  // DataView keeps the read little-endian on any host and tolerates unaligned byteOffset.
  const view = new DataView(bytes.buffer, bytes.byteOffset, wholeBytes);
  for (let i = 0; i < frames; i++) {
    samples[i] = view.getFloat32(i * BYTES_PER_SAMPLE, true);
  }

  const rest = bytes.length - wholeBytes;
  return {
    samples,
    carry: rest > 0 ? Buffer.from(bytes.subarray(wholeBytes)) : EMPTY_BYTES,
  };
}

export function concatSamples(parts: readonly SampleBuffer[]): SampleBuffer {
  if (parts.length === 1) return parts[0];
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Float32Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
