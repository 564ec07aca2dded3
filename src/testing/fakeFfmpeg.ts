import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

/** A media file the fake decoder knows about; output is synthesized per request. */
export interface FakeMediaFile {
  durationMs: number;
  sourceSampleRate?: number;
  sourceChannels?: number;
  sample?: (index: number, sampleRate: number) => number;
}

export type FakeDecoderMode =
  | { kind: 'decode' }
  /** Never writes and never exits on its own. */
  | { kind: 'stall'; stderr?: string }
  /** Writes `samples` frames (if any), then `stderr`, then exits with `exitCode`. */
  | { kind: 'fail'; exitCode: number; stderr: string; samples?: number };

export interface FakeSpawnCall {
  command: string;
  args: string[];
  process: FakeChildProcess;
}

export const sineSample = (index: number, sampleRate: number): number =>
  0.5 * Math.sin((2 * Math.PI * 440 * index) / sampleRate);

const optionValue = (args: readonly string[], flag: string): string | undefined => {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
};

export class FakeChildProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  pid: number | undefined;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly killSignals: NodeJS.Signals[] = [];

  constructor(pid: number | undefined) {
    super();
    this.pid = pid;
  }

  get running(): boolean {
    return this.pid !== undefined && this.exitCode === null && this.signalCode === null;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    if (!this.running) return false;
    this.signalCode = signal;
    this.#terminate(null, signal);
    return true;
  }

  exit(code: number): void {
    if (!this.running) return;
    this.exitCode = code;
    this.#terminate(code, null);
  }

  #terminate(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.stdout.writableEnded) this.stdout.end();
    if (!this.stderr.writableEnded) this.stderr.end();
    setImmediate(() => {
      this.emit('exit', code, signal);
      this.emit('close', code, signal);
    });
  }
}

/**
 * Stand-in for `child_process.spawn` that behaves like ffmpeg for the flags the
 * invocation builder emits: `-ss`, `-t`, `-i`, `-ar`, `-f f32le pipe:1`.
 */
export class FakeFfmpeg {
  readonly files = new Map<string, FakeMediaFile>();
  readonly calls: FakeSpawnCall[] = [];
  mode: FakeDecoderMode = { kind: 'decode' };
  /** Executable absent: every spawn fails with ENOENT. */
  missing = false;
  versionExitCode = 0;
  /** When false, ignore `-t` and emit to the end of the file. */
  honorDuration = true;
  /** stdout write size; odd on purpose so frames straddle writes. */
  writeBytes = 4093;
  #nextPid = 4000;

  reset(): void {
    this.files.clear();
    this.calls.length = 0;
    this.mode = { kind: 'decode' };
    this.missing = false;
    this.versionExitCode = 0;
    this.honorDuration = true;
    this.writeBytes = 4093;
  }

  addFile(filePath: string, file: FakeMediaFile): void {
    this.files.set(filePath, file);
  }

  get decodeCalls(): FakeSpawnCall[] {
    return this.calls.filter((call) => !call.args.includes('-version'));
  }

  get probeCalls(): FakeSpawnCall[] {
    return this.calls.filter((call) => call.args.includes('-version'));
  }

  get lastDecode(): FakeSpawnCall | undefined {
    const calls = this.decodeCalls;
    return calls[calls.length - 1];
  }

  spawn = (command: string, args: readonly string[]): FakeChildProcess => {
    const proc = new FakeChildProcess(this.missing ? undefined : this.#nextPid++);
    this.calls.push({ command, args: [...args], process: proc });

    if (this.missing) {
      setImmediate(() => {
        const err = Object.assign(new Error(`spawn ${command} ENOENT`), {
          code: 'ENOENT',
          errno: -2,
          syscall: `spawn ${command}`,
          path: command,
        });
        proc.emit('error', err);
        proc.stdout.end();
        proc.stderr.end();
        proc.emit('close', -2, null);
      });
      return proc;
    }

    if (args.includes('-version')) {
      setImmediate(() => proc.exit(this.versionExitCode));
      return proc;
    }

    const mode = this.mode;
    setImmediate(() => this.#run(proc, args, mode));
    return proc;
  };

  #render(args: readonly string[], limit?: number): Buffer | null {
    const input = optionValue(args, '-i');
    const file = input === undefined ? undefined : this.files.get(input);
    if (!file) return null;

    const rate = Number(optionValue(args, '-ar') ?? file.sourceSampleRate ?? 44100);
    const seekSec = Number(optionValue(args, '-ss') ?? 0);
    const durationArg = optionValue(args, '-t');
    const total = Math.round((file.durationMs * rate) / 1000);
    const start = Math.round(seekSec * rate);

    let count = total - start;
    if (durationArg !== undefined && this.honorDuration) {
      count = Math.min(count, Math.round(Number(durationArg) * rate));
    }
    if (limit !== undefined) count = Math.min(count, limit);
    count = Math.max(0, count);

    const sample = file.sample ?? sineSample;
    const bytes = Buffer.alloc(count * 4);
    for (let i = 0; i < count; i++) {
      bytes.writeFloatLE(sample(start + i, rate), i * 4);
    }
    return bytes;
  }

  #run(proc: FakeChildProcess, args: readonly string[], mode: FakeDecoderMode): void {
    if (!proc.running) return;

    if (mode.kind === 'stall') {
      if (mode.stderr) proc.stderr.write(mode.stderr);
      return;
    }

    if (mode.kind === 'fail') {
      const bytes = mode.samples ? this.#render(args, mode.samples) : null;
      this.#write(proc, bytes ?? Buffer.alloc(0), () => {
        proc.stderr.write(mode.stderr);
        proc.exit(mode.exitCode);
      });
      return;
    }

    const input = optionValue(args, '-i') ?? '';
    const bytes = this.#render(args);
    if (!bytes) {
      proc.stderr.write(`${input}: No such file or directory\n`);
      proc.exit(1);
      return;
    }
    this.#write(proc, bytes, () => proc.exit(0));
  }

  #write(proc: FakeChildProcess, bytes: Buffer, done: () => void): void {
    let offset = 0;
    const step = () => {
      if (!proc.running) return;
      if (offset >= bytes.length) {
        done();
        return;
      }
      const end = Math.min(bytes.length, offset + this.writeBytes);
      proc.stdout.write(bytes.subarray(offset, end));
      offset = end;
      setImmediate(step);
    };
    step();
  }
}

export const fakeFfmpeg = new FakeFfmpeg();
