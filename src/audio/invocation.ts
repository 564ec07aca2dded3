import { BYTES_PER_SAMPLE } from '../types.js';
import type { DecodeInvocation, DecodeRequest } from '../types.js';

/** Milliseconds to the shortest decimal seconds string ffmpeg accepts (1500 -> "1.5"). */
export function formatSeconds(ms: number): string {
  return String(ms / 1000);
}

/**
 * Filter graph for the decoded audio. Resampling and downmixing can push
 * samples past full scale, so the hard clip to [-1, 1] runs last.
 */
export function buildOutputFilter(request: Pick<DecodeRequest, 'sampleRate' | 'channels'>): string {
  const layout = request.channels === 1 ? 'mono' : `${request.channels}c`;
  return [
    `aresample=${request.sampleRate}`,
    `aformat=sample_fmts=flt:channel_layouts=${layout}`,
    'asoftclip=type=hard',
  ].join(',');
}

/**
 * Build the ffmpeg command line for a request. Pure: nothing is spawned and
 * the input path is not touched.
 *
 * Seek and duration are input options so ffmpeg seeks in the demuxer; the
 * output is headerless f32le on stdout and only errors reach stderr.
 */
export function buildDecodeInvocation(
  request: DecodeRequest,
  options: { ffmpegPath: string }
): DecodeInvocation {
  const args = ['-nostdin', '-hide_banner', '-v', 'error'];

  if (request.startMs !== null && request.startMs > 0) {
    args.push('-ss', formatSeconds(request.startMs));
  }
  if (request.durationMs !== null) {
    args.push('-t', formatSeconds(request.durationMs));
  }

  args.push(
    '-i',
    request.filePath,
    '-vn',
    '-sn',
    '-dn',
    '-af',
    buildOutputFilter(request),
    '-ac',
    String(request.channels),
    '-ar',
    String(request.sampleRate),
    '-f',
    'f32le',
    'pipe:1'
  );

  return Object.freeze({
    command: options.ffmpegPath,
    args: Object.freeze(args),
    output: Object.freeze({
      format: 'f32le' as const,
      bytesPerSample: BYTES_PER_SAMPLE,
      sampleRate: request.sampleRate,
      channels: request.channels,
    }),
  });
}
