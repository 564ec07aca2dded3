import { vi } from 'vitest';

// Keep pino quiet and skip the pretty transport during Vitest runs.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

vi.mock('@ffmpeg-installer/ffmpeg', () => ({
  default: { path: '/opt/ffmpeg/bin/ffmpeg', version: 'test', url: 'https://ffmpeg.org' },
  path: '/opt/ffmpeg/bin/ffmpeg',
}));
