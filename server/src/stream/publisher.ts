import { setTimeout as sleep } from 'node:timers/promises';
import type { CaptureSource, Encoder } from '../capture/types.js';
import { CaptureOpenError, PublisherFailureError, errorMessage } from '../lib/errors.js';
import { logger, type Logger } from '../lib/logger.js';
import type { PublisherState, PublisherStats } from '../types.js';
import type { FrameSlot } from './frameSlot.js';

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 150;

export interface PublisherOptions {
  source: CaptureSource;
  encoder: Encoder;
  slot: FrameSlot;
  fps: number;
  quality: number;
  /** Consecutive failed cycles tolerated before giving up; 0 never gives up. */
  maxConsecutiveFailures?: number;
  logger?: Logger;
}

export type PublisherFatalListener = (error: PublisherFailureError) => void;

/**
 * Producer loop: acquire, encode, publish, then wait for the next tick.
 * A failed cycle is skipped and the previous frame stays current.
 */
export class Publisher {
  private readonly source: CaptureSource;
  private readonly encoder: Encoder;
  private readonly slot: FrameSlot;
  private readonly intervalMs: number;
  private readonly quality: number;
  private readonly maxConsecutiveFailures: number;
  private readonly log: Logger;
  private readonly fatalListeners = new Set<PublisherFatalListener>();
  private currentState: PublisherState = 'idle';
  private abort?: AbortController;
  private loopDone?: Promise<void>;
  private published = 0;
  private failedCycles = 0;
  private consecutiveFailures = 0;
  private lastError?: unknown;

  constructor(options: PublisherOptions) {
    if (!(options.fps > 0)) {
      throw new RangeError(`fps must be positive, got ${options.fps}`);
    }
    this.source = options.source;
    this.encoder = options.encoder;
    this.slot = options.slot;
    this.intervalMs = 1000 / options.fps;
    this.quality = options.quality;
    this.maxConsecutiveFailures =
      options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.log = (options.logger ?? logger).child({
      component: 'publisher',
      source: options.source.name,
    });
  }

  async start(): Promise<void> {
    if (this.currentState === 'running' || this.currentState === 'stopping') return;

    try {
      await this.source.open();
    } catch (error) {
      this.currentState = 'failed';
      this.lastError = error;
      throw error instanceof CaptureOpenError
        ? error
        : new CaptureOpenError(
            `Unable to open capture source ${this.source.name}: ${errorMessage(error)}`,
            { cause: error },
          );
    }

    this.consecutiveFailures = 0;
    this.currentState = 'running';
    this.abort = new AbortController();
    this.loopDone = this.loop(this.abort.signal);
    this.log.info({ intervalMs: Math.round(this.intervalMs) }, 'publisher_started');
  }

  async stop(): Promise<void> {
    if (this.currentState !== 'running') {
      await this.loopDone;
      return;
    }
    this.currentState = 'stopping';
    this.abort?.abort();
    await this.loopDone;
    await this.closeSource();
    this.currentState = 'stopped';
    this.log.info({ published: this.published }, 'publisher_stopped');
  }

  /** One acquire/encode/publish step. Returns whether a frame was published. */
  async runCycle(): Promise<boolean> {
    try {
      const image = await this.source.acquire();
      const payload = await this.encoder.encode(image, this.quality);
      this.slot.publish(payload);
      this.published += 1;
      this.consecutiveFailures = 0;
      return true;
    } catch (error) {
      this.failedCycles += 1;
      this.consecutiveFailures += 1;
      this.lastError = error;
      this.log.warn(
        { err: error, consecutiveFailures: this.consecutiveFailures },
        'capture_cycle_failed',
      );
      return false;
    }
  }

  onFatal(listener: PublisherFatalListener): () => void {
    this.fatalListeners.add(listener);
    return () => {
      this.fatalListeners.delete(listener);
    };
  }

  get state(): PublisherState {
    return this.currentState;
  }

  stats(): PublisherStats {
    return {
      state: this.currentState,
      published: this.published,
      failedCycles: this.failedCycles,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError === undefined ? undefined : errorMessage(this.lastError),
    };
  }

  private async loop(signal: AbortSignal): Promise<void> {
    let nextTick = Date.now();
    while (!signal.aborted) {
      await this.runCycle();

      if (
        this.maxConsecutiveFailures > 0 &&
        this.consecutiveFailures >= this.maxConsecutiveFailures
      ) {
        await this.fail();
        return;
      }

      nextTick += this.intervalMs;
      let delay = nextTick - Date.now();
      if (delay <= 0) {
        nextTick = Date.now();
        delay = 0;
      }

      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }

  private async fail(): Promise<void> {
    this.currentState = 'failed';
    const error = new PublisherFailureError(this.consecutiveFailures, { cause: this.lastError });
    this.log.error({ err: error }, 'publisher_failed');
    await this.closeSource();

    for (const listener of Array.from(this.fatalListeners)) {
      try {
        listener(error);
      } catch (listenerError) {
        this.log.error({ err: listenerError }, 'publisher_fatal_listener_failed');
      }
    }
  }

  private async closeSource(): Promise<void> {
    try {
      await this.source.close();
    } catch (error) {
      this.log.warn({ err: error }, 'capture_close_failed');
    }
  }
}
