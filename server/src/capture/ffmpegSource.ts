import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { CaptureOpenError, errorMessage } from '../lib/errors.js';
import { logger, type Logger } from '../lib/logger.js';
import { RawFrameReader } from './rawFrameReader.js';
import type { CaptureSource, RawImage } from './types.js';

export type FfmpegInputKind = 'camera' | 'screen';

export interface FfmpegSourceOptions {
  kind: FfmpegInputKind;
  width: number;
  height: number;
  fps: number;
  device?: string;
  ffmpegPath?: string;
  platform?: NodeJS.Platform;
  acquireTimeoutMs?: number;
  logger?: Logger;
}

const STDERR_TAIL = 2048;

/** Builds the ffmpeg argument list for the platform's capture backend. */
export function buildFfmpegArgs(options: FfmpegSourceOptions): string[] {
  const platform = options.platform ?? process.platform;
  const rate = String(options.fps);
  const input = inputArgs(options.kind, platform, options.device);

  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-nostdin',
    '-f',
    input.format,
    '-framerate',
    rate,
    '-i',
    input.target,
    '-vf',
    `scale=${options.width}:${options.height}`,
    '-pix_fmt',
    'rgba',
    '-f',
    'rawvideo',
    'pipe:1',
  ];
}

function inputArgs(
  kind: FfmpegInputKind,
  platform: NodeJS.Platform,
  device: string | undefined,
): { format: string; target: string } {
  switch (platform) {
    case 'linux':
      return kind === 'camera'
        ? { format: 'v4l2', target: device ?? '/dev/video0' }
        : { format: 'x11grab', target: device ?? ':0.0' };
    case 'darwin':
      return { format: 'avfoundation', target: device ?? (kind === 'camera' ? '0' : '1') };
    case 'win32':
      if (kind === 'screen') {
        return { format: 'gdigrab', target: device ?? 'desktop' };
      }
      if (!device) {
        throw new CaptureOpenError('CAPTURE_DEVICE must name a DirectShow camera on Windows');
      }
      return { format: 'dshow', target: `video=${device}` };
    default:
      throw new CaptureOpenError(`Capture is not supported on platform ${platform}`);
  }
}

/**
 * Camera or screen capture through an ffmpeg child process writing raw RGBA
 * frames to stdout. Only the newest frame is kept between acquisitions.
 */
export class FfmpegCaptureSource implements CaptureSource {
  readonly name: string;
  private readonly reader: RawFrameReader;
  private readonly acquireTimeoutMs: number;
  private readonly log: Logger;
  private child?: ChildProcessWithoutNullStreams;
  private exited = false;
  private stderrTail = '';
  private waiters = new Set<() => void>();

  constructor(private readonly options: FfmpegSourceOptions) {
    this.name = `ffmpeg-${options.kind}`;
    this.reader = new RawFrameReader(options.width * options.height * 4);
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 5000;
    this.log = (options.logger ?? logger).child({ component: 'ffmpeg', kind: options.kind });
  }

  async open(): Promise<void> {
    const args = buildFfmpegArgs(this.options);
    const command = this.options.ffmpegPath ?? 'ffmpeg';
    this.log.info({ command, args }, 'ffmpeg_starting');

    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    this.child = child;
    this.exited = false;

    child.stdout.on('data', (chunk: Buffer) => {
      if (this.reader.push(chunk) > 0) this.wake();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(-STDERR_TAIL);
    });
    child.on('error', (error) => {
      this.log.error({ err: error }, 'ffmpeg_error');
    });
    child.on('exit', (code, signal) => {
      this.exited = true;
      this.log.warn({ code, signal, stderr: this.stderrTail.trim() }, 'ffmpeg_exited');
      this.wake();
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });
      await this.waitForFrame();
    } catch (error) {
      await this.close();
      throw new CaptureOpenError(
        `Unable to start ${this.name}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async acquire(): Promise<RawImage> {
    await this.waitForFrame();
    const data = this.reader.take();
    if (!data) {
      throw new Error(`${this.name} produced no frame`);
    }
    return { data, width: this.options.width, height: this.options.height, channels: 4 };
  }

  async close(): Promise<void> {
    const child = this.child;
    this.child = undefined;
    if (!child || this.exited || child.pid === undefined) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        child.kill('SIGKILL');
      }, 2000);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      child.kill('SIGTERM');
    });
  }

  private waitForFrame(): Promise<void> {
    if (this.reader.hasFrame) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const done = (error?: Error) => {
        clearTimeout(timer);
        this.waiters.delete(onWake);
        if (error) reject(error);
        else resolve();
      };
      const onWake = () => {
        if (this.reader.hasFrame) done();
        else if (this.exited) done(new Error(this.exitMessage()));
      };
      const timer = setTimeout(() => {
        done(new Error(`${this.name} timed out after ${this.acquireTimeoutMs}ms`));
      }, this.acquireTimeoutMs);

      if (this.exited) {
        done(new Error(this.exitMessage()));
        return;
      }
      this.waiters.add(onWake);
    });
  }

  private wake(): void {
    Array.from(this.waiters).forEach((waiter) => waiter());
  }

  private exitMessage(): string {
    const detail = this.stderrTail.trim();
    return detail ? `ffmpeg exited: ${detail}` : 'ffmpeg exited';
  }
}
