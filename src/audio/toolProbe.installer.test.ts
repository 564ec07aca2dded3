import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { reloadConfig } from '../config.js';
import { ToolNotFoundError } from '../errors.js';
import * as entry from '../index.js';
import { fakeFfmpeg } from '../testing/fakeFfmpeg.js';
import { readAudio } from './segmentReader.js';
import { ensureDecoderAvailable, resetDecoderProbeCache } from './toolProbe.js';

vi.mock('node:child_process', async () => {
  const { fakeFfmpeg: fake } = await import('../testing/fakeFfmpeg.js');
  return { spawn: fake.spawn };
});

// The installer throws a plain string when its platform binary is not installed.
vi.mock('@ffmpeg-installer/ffmpeg', () => {
  throw 'Could not find ffmpeg executable, tried "/app/node_modules/@ffmpeg-installer/linux-x64/ffmpeg"';
});

describe('bundled ffmpeg unavailable', () => {
  beforeEach(() => {
    fakeFfmpeg.reset();
    fakeFfmpeg.addFile('/media/clip.wav', { durationMs: 500 });
    resetDecoderProbeCache();
    reloadConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    reloadConfig();
  });

  it('still loads the package entry point', () => {
    expect(typeof entry.readAudio).toBe('function');
    expect(typeof entry.streamAudio).toBe('function');
  });

  it('maps the installer failure to ToolNotFoundError', async () => {
    const err = await ensureDecoderAvailable(null).catch((error: unknown) => error);

    expect(err).toBeInstanceOf(ToolNotFoundError);
    expect(err).toMatchObject({ code: 'TOOL_NOT_FOUND', command: '@ffmpeg-installer/ffmpeg' });
    expect(fakeFfmpeg.calls).toHaveLength(0);
  });

  it('raises ToolNotFoundError from readAudio when FFMPEG_PATH is unset', async () => {
    vi.stubEnv('FFMPEG_PATH', '');

    await expect(readAudio('/media/clip.wav')).rejects.toBeInstanceOf(ToolNotFoundError);
  });

  it('uses FFMPEG_PATH without loading the installer', async () => {
    vi.stubEnv('FFMPEG_PATH', '/usr/bin/ffmpeg');

    const samples = await readAudio('/media/clip.wav');

    expect(samples.length).toBe(8000);
    expect(fakeFfmpeg.lastDecode?.command).toBe('/usr/bin/ffmpeg');
  });
});
