import process from 'node:process';
import { loadEnvironment } from '../src/utils/env.js';
import { streamAudio } from '../src/audio/chunkStreamer.js';
import { summarizeSamples } from '../src/audio/stats.js';
import { isFfmpegAudioError } from '../src/errors.js';
import { logger } from '../src/logger.js';
import { TARGET_SAMPLE_RATE } from '../src/types.js';

type CliOptions = {
  filePath: string;
  startMs?: number;
  durationMs?: number;
  chunkDurationSec?: number;
  envPath?: string;
};

function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = [];
  const options: Partial<CliOptions> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case '--start':
        options.startMs = Number(next);
        i += 1;
        break;
      case '--duration':
        options.durationMs = Number(next);
        i += 1;
        break;
      case '--chunk':
        options.chunkDurationSec = Number(next);
        i += 1;
        break;
      case '--env':
        options.envPath = next;
        i += 1;
        break;
      default:
        positional.push(arg);
    }
  }
  if (positional.length !== 1) {
    throw new Error('usage: audio-stats <file> [--start ms] [--duration ms] [--chunk sec] [--env path]');
  }
  return { ...options, filePath: positional[0] };
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  loadEnvironment(options.envPath);

  let index = 0;
  let total = 0;
  for await (const chunk of streamAudio(options.filePath, options)) {
    const summary = summarizeSamples(chunk);
    total += summary.sampleCount;
    logger.info({ event: 'audio_chunk', index, ...summary });
    index += 1;
  }
  logger.info({ event: 'audio_done', chunks: index, samples: total, durationMs: (total / TARGET_SAMPLE_RATE) * 1000 });
}

main().catch((err: unknown) => {
  if (isFfmpegAudioError(err)) {
    logger.error({ event: 'audio_failed', code: err.code, message: err.message, stderr: err.stderr });
  } else {
    logger.error({ event: 'audio_failed', message: err instanceof Error ? err.message : String(err) });
  }
  process.exitCode = 1;
});
