import { pino } from 'pino';
import type { CaptureSource, Encoder, RawImage } from './capture/types.js';
import { StreamError } from './lib/errors.js';
import type { Frame } from './stream/frameSlot.js';
import type { FrameTransport } from './types.js';

export const silentLogger = pino({ level: 'silent' });

export function makeFrame(version: number, payload = `frame-${version}`): Frame {
  return Object.freeze({ payload: Buffer.from(payload), version, publishedAt: version });
}

/** Lets pending promise chains (such as a flush routine) run to completion. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000,
  label = 'condition',
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for ${label}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export class FakeTransport implements FrameTransport {
  readonly sent: Buffer[] = [];
  closedWith?: { code?: number; reason?: string };
  terminated = false;
  failWhen?: (payload: Buffer) => boolean;
  private gate?: Promise<void>;
  private openGate?: () => void;

  constructor(readonly remoteAddress = '127.0.0.1') {}

  /** Blocks every send until {@link release} is called. */
  hold(): void {
    if (this.gate) return;
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    const open = this.openGate;
    this.gate = undefined;
    this.openGate = undefined;
    open?.();
  }

  async send(payload: Buffer): Promise<void> {
    while (this.gate) {
      await this.gate;
    }
    if (this.closedWith || this.terminated) {
      throw new StreamError('TRANSPORT_CLOSED');
    }
    if (this.failWhen?.(payload)) {
      throw new Error('socket write failed');
    }
    this.sent.push(payload);
  }

  close(code?: number, reason?: string): void {
    this.closedWith ??= { code, reason };
  }

  /** Fails sends blocked by {@link hold} as a dropped socket would. */
  terminate(): void {
    this.terminated = true;
    this.release();
  }

  sentText(): string[] {
    return this.sent.map((payload) => payload.toString());
  }
}

export class FakeCaptureSource implements CaptureSource {
  readonly name = 'fake';
  opened = 0;
  closed = 0;
  acquired = 0;
  openError?: Error;
  failAcquire = false;

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened += 1;
  }

  async acquire(): Promise<RawImage> {
    if (this.failAcquire) {
      throw new Error('camera read failed');
    }
    this.acquired += 1;
    return { data: Buffer.from([this.acquired]), width: 1, height: 1, channels: 3 };
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

/** Encodes a raw image as the text `jpeg:<first byte>:q<quality>`. */
export class FakeEncoder implements Encoder {
  readonly mime = 'image/jpeg';
  failNext = 0;

  async encode(image: RawImage, quality: number): Promise<Buffer> {
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error('encode failed');
    }
    return Buffer.from(`jpeg:${image.data[0]}:q${quality}`);
  }
}
