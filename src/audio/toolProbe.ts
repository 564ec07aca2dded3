import { spawn } from 'node:child_process';
import { ToolNotFoundError } from '../errors.js';
import { logger } from '../logger.js';

const PROBE_TIMEOUT_MS = 10_000;
export const BUNDLED_FFMPEG = '@ffmpeg-installer/ffmpeg';

// One probe per executable for the lifetime of the process; failures are cached too.
const probes = new Map<string, Promise<string>>();

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * The configured executable, or the bundled one. The installer package throws
 * at import time when its platform binary is missing, so it is only loaded
 * when no path is configured.
 */
export async function resolveDecoderCommand(configuredPath: string | null): Promise<string> {
  if (configuredPath) {
    return configuredPath;
  }
  try {
    const installer = await import('@ffmpeg-installer/ffmpeg');
    return installer.default.path;
  } catch (err) {
    throw new ToolNotFoundError(BUNDLED_FFMPEG, describeError(err), err);
  }
}

function probeDecoder(ffmpegPath: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const proc = spawn(ffmpegPath, ['-version'], { stdio: ['ignore', 'ignore', 'ignore'] });
    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
      reject(new ToolNotFoundError(ffmpegPath, `no response to -version within ${PROBE_TIMEOUT_MS}ms`));
    }, PROBE_TIMEOUT_MS);
    timer.unref?.();

    proc.once('error', (err) => {
      clearTimeout(timer);
      reject(new ToolNotFoundError(ffmpegPath, err.message, err));
    });
    proc.once('close', (exitCode) => {
      clearTimeout(timer);
      if (exitCode === 0) {
        resolve();
      } else {
        reject(new ToolNotFoundError(ffmpegPath, `exited with code ${exitCode ?? 'unknown'}`));
      }
    });
  });
}

/** Resolve and probe the decoder executable; resolves with the command to spawn. */
export function ensureDecoderAvailable(configuredPath: string | null): Promise<string> {
  const key = configuredPath ?? BUNDLED_FFMPEG;
  let probe = probes.get(key);
  if (!probe) {
    probe = resolveDecoderCommand(configuredPath)
      .then(async (command) => {
        await probeDecoder(command);
        return command;
      })
      .catch((err: unknown) => {
        logger.warn({ event: 'decoder_probe_failed', ffmpegPath: key, message: describeError(err) });
        throw err;
      });
    probes.set(key, probe);
  }
  return probe;
}

export function resetDecoderProbeCache(): void {
  probes.clear();
}
