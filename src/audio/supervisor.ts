import { spawn } from 'node:child_process';
import type { ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_MAX_DIAGNOSTIC_BYTES } from '../config.js';
import {
  DecodeAbortedError,
  DecodeTimeoutError,
  FfmpegAudioError,
  ProcessingError,
  ToolNotFoundError,
} from '../errors.js';
import { logger } from '../logger.js';
import type { DecodeInvocation, DecoderExit } from '../types.js';
import { classifyDecoderFailure, matchDiagnostics } from './errorClassifier.js';
import { EMPTY_BYTES } from './sampleDecoder.js';

const CLOSE_WAIT_MS = 1_000;
const SETTLE_GRACE_MS = 500;

type DecoderChild = ChildProcessByStdio<null, Readable, Readable>;

export interface RunDecoderOptions {
  filePath: string;
  /** Wall-clock deadline measured from spawn; null or absent disables it. */
  timeoutMs?: number | null;
  signal?: AbortSignal;
  maxDiagnosticBytes?: number;
}

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * One running ffmpeg. stdout is pulled on demand so the pipe applies
 * backpressure; stderr is always drained into a bounded buffer.
 */
export class DecoderProcess {
  readonly invocation: DecodeInvocation;
  #child: DecoderChild;
  #filePath: string;
  #timeoutMs: number | null;
  #maxDiagnosticBytes: number;
  #timer: AbortSignal | null;
  #deadline: AbortSignal | null;
  #output: AsyncIterator<Buffer>;
  #parts: Buffer[] = [];
  #buffered = 0;
  #ended = false;
  #stderr = '';
  #stderrBytes = 0;
  #stderrTruncated = false;
  #exit: Promise<DecoderExit>;
  #settled: Promise<unknown>;
  #failure: FfmpegAudioError | null = null;
  #interrupted: Promise<never>;
  #rejectInterrupted: (error: FfmpegAudioError) => void;
  #closing: Promise<void> | null = null;

  constructor(child: DecoderChild, invocation: DecodeInvocation, options: RunDecoderOptions) {
    this.invocation = invocation;
    this.#child = child;
    this.#filePath = options.filePath;
    this.#timeoutMs = options.timeoutMs ?? null;
    this.#maxDiagnosticBytes = options.maxDiagnosticBytes ?? DEFAULT_MAX_DIAGNOSTIC_BYTES;

    let rejectInterrupted: (error: FfmpegAudioError) => void = () => undefined;
    this.#interrupted = new Promise<never>((_resolve, reject) => {
      rejectInterrupted = reject;
    });
    // Observed through Promise.race only; keep an idle rejection from going unhandled.
    this.#interrupted.catch(() => undefined);
    this.#rejectInterrupted = rejectInterrupted;

    this.#exit = new Promise<DecoderExit>((resolve) => {
      child.once('close', (exitCode, signal) => resolve({ exitCode, signal }));
    });

    const exited = new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
    });
    const diagnosticsDrained = new Promise<void>((resolve) => {
      child.stderr.once('close', () => resolve());
    });
    this.#settled = Promise.all([exited, diagnosticsDrained]);

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT' || err.code === 'EACCES') {
        this.#fail(new ToolNotFoundError(invocation.command, err.message, err));
        return;
      }
      this.#fail(
        new ProcessingError(`ffmpeg process error: ${err.message}`, {
          filePath: this.#filePath,
          stderr: this.#stderr,
          cause: err,
        })
      );
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (text: string) => this.#appendDiagnostics(text));

    this.#output = child.stdout[Symbol.asyncIterator]();

    this.#timer =
      this.#timeoutMs !== null && this.#timeoutMs > 0 ? AbortSignal.timeout(this.#timeoutMs) : null;
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (this.#timer) signals.push(this.#timer);
    this.#deadline = signals.length > 0 ? AbortSignal.any(signals) : null;
    if (this.#deadline?.aborted) {
      this.#onDeadline();
    } else {
      this.#deadline?.addEventListener('abort', this.#onDeadline, { once: true });
    }
  }

  get pid(): number | undefined {
    return this.#child.pid;
  }

  /** Diagnostics captured so far: the head of stderr, up to `maxDiagnosticBytes` UTF-8 bytes, then `…` if cut. */
  get stderr(): string {
    return this.#stderr;
  }

  get closed(): boolean {
    return this.#closing !== null;
  }

  /**
   * Resolve with up to `maxBytes` bytes, waiting until that many are buffered
   * or stdout ends. An empty buffer means end of stream.
   */
  async read(maxBytes: number): Promise<Buffer> {
    if (this.#closing) {
      throw new ProcessingError('ffmpeg process already closed', { filePath: this.#filePath });
    }
    if (this.#failure) throw this.#failure;

    while (this.#buffered < maxBytes && !this.#ended) {
      const next = await this.#next();
      if (next.done) {
        this.#ended = true;
        break;
      }
      if (next.value.length > 0) {
        this.#parts.push(next.value);
        this.#buffered += next.value.length;
      }
    }

    if (this.#failure) throw this.#failure;
    return this.#take(maxBytes);
  }

  /**
   * Wait for exit once stdout is exhausted and throw the classified error when
   * the exit code or diagnostics report a failure.
   */
  async finish(): Promise<DecoderExit> {
    let status: DecoderExit;
    try {
      status = await Promise.race([this.#exit, this.#interrupted]);
    } catch (err) {
      throw this.#failure ?? err;
    }
    if (this.#failure) throw this.#failure;

    this.#raise(classifyDecoderFailure({ ...status, stderr: this.#stderr, filePath: this.#filePath }));
    return status;
  }

  /**
   * For callers that stop reading before stdout ends. Waits briefly for ffmpeg
   * to exit on its own, then throws if its exit status or the diagnostics
   * captured so far report a failure. A process still running without a
   * failure signature is left for `close()`.
   */
  async settle(graceMs = SETTLE_GRACE_MS): Promise<void> {
    try {
      await Promise.race([this.#settled, this.#interrupted, delay(graceMs, undefined, { ref: false })]);
    } catch (err) {
      throw this.#failure ?? err;
    }
    if (this.#failure) throw this.#failure;

    if (!this.#hasExited() && matchDiagnostics(this.#stderr) === null) {
      return;
    }
    this.#raise(
      classifyDecoderFailure({
        exitCode: this.#child.exitCode,
        signal: this.#child.signalCode,
        stderr: this.#stderr,
        filePath: this.#filePath,
      })
    );
  }

  /** Idempotent; kills the process if still running and releases both pipes. Never throws. */
  close(): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#shutdown();
    }
    return this.#closing;
  }

  async #shutdown(): Promise<void> {
    this.#deadline?.removeEventListener('abort', this.#onDeadline);
    try {
      this.#kill();
      this.#child.stdout.destroy();
      this.#child.stderr.destroy();
      if (this.#child.pid !== undefined) {
        await Promise.race([this.#exit, delay(CLOSE_WAIT_MS, undefined, { ref: false })]);
      }
    } catch (err) {
      logger.debug({ event: 'decoder_cleanup_failed', pid: this.pid, message: describeError(err) });
    }
  }

  #onDeadline = (): void => {
    const timedOut = this.#timer?.aborted === true;
    if (timedOut && this.#hasExited()) {
      // Output already complete; the rest is draining the pipe.
      return;
    }

    const error = timedOut
      ? new DecodeTimeoutError(this.#filePath, this.#timeoutMs ?? 0, { stderr: this.#stderr })
      : new DecodeAbortedError(this.#filePath, { stderr: this.#stderr });
    logger.warn({
      event: timedOut ? 'decoder_timeout' : 'decoder_aborted',
      pid: this.pid,
      filePath: this.#filePath,
      timeoutMs: this.#timeoutMs,
    });
    this.#fail(error);
    this.#kill();
  };

  async #next(): Promise<IteratorResult<Buffer>> {
    try {
      return await Promise.race([this.#output.next(), this.#interrupted]);
    } catch (err) {
      if (this.#failure) throw this.#failure;
      throw new ProcessingError(`failed reading ffmpeg output: ${describeError(err)}`, {
        filePath: this.#filePath,
        stderr: this.#stderr,
        cause: err,
      });
    }
  }

  #take(maxBytes: number): Buffer {
    if (this.#buffered === 0) return EMPTY_BYTES;
    const all = this.#parts.length === 1 ? this.#parts[0] : Buffer.concat(this.#parts, this.#buffered);
    const out = all.length > maxBytes ? all.subarray(0, maxBytes) : all;
    const rest = all.subarray(out.length);
    this.#parts = rest.length > 0 ? [rest] : [];
    this.#buffered = rest.length;
    return out;
  }

  #appendDiagnostics(text: string): void {
    if (this.#stderrTruncated) return;
    const bytes = Buffer.from(text, 'utf8');
    const room = this.#maxDiagnosticBytes - this.#stderrBytes;
    if (bytes.length <= room) {
      this.#stderr += text;
      this.#stderrBytes += bytes.length;
      return;
    }
    // StringDecoder holds back a multi-byte character cut at the boundary.
    this.#stderr += `${new StringDecoder('utf8').write(bytes.subarray(0, room))}…`;
    this.#stderrTruncated = true;
  }

  #raise(error: FfmpegAudioError | null): void {
    if (!error) return;
    logger.debug({
      event: 'decoder_failed',
      pid: this.pid,
      filePath: this.#filePath,
      code: error.code,
      exitCode: error.exitCode,
      signal: error.signal,
    });
    throw error;
  }

  #fail(error: FfmpegAudioError): void {
    if (this.#failure) return;
    this.#failure = error;
    this.#rejectInterrupted(error);
  }

  #hasExited(): boolean {
    return this.#child.exitCode !== null || this.#child.signalCode !== null;
  }

  #kill(): void {
    if (this.#hasExited() || this.#child.pid === undefined) return;
    this.#child.kill('SIGKILL');
  }
}

/** Spawn ffmpeg for an invocation. stdin is closed; stdout carries samples, stderr diagnostics. */
export function runDecoder(invocation: DecodeInvocation, options: RunDecoderOptions): DecoderProcess {
  if (options.signal?.aborted) {
    throw new DecodeAbortedError(options.filePath, { cause: options.signal.reason });
  }

  let child: DecoderChild;
  try {
    child = spawn(invocation.command, invocation.args, { stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    throw new ProcessingError(`failed to spawn ffmpeg: ${describeError(err)}`, {
      filePath: options.filePath,
      cause: err,
    });
  }

  logger.debug({
    event: 'decoder_spawned',
    pid: child.pid,
    command: invocation.command,
    args: invocation.args,
    timeoutMs: options.timeoutMs ?? null,
  });
  return new DecoderProcess(child, invocation, options);
}
