import { logger, type Logger } from '../lib/logger.js';
import type { FrameSlot } from './frameSlot.js';
import type { SessionRegistry } from './sessionRegistry.js';

export type BroadcastState = 'idle' | 'fanning_out';

export interface BroadcastLoopOptions {
  slot: FrameSlot;
  registry: SessionRegistry;
  /** Fallback polling interval; 0 relies on publish notifications alone. */
  pollIntervalMs?: number;
  logger?: Logger;
}

/**
 * Fans each new slot version out to every registered session. Which frames a
 * session actually sends is decided by the session itself.
 */
export class BroadcastLoop {
  private readonly slot: FrameSlot;
  private readonly registry: SessionRegistry;
  private readonly pollIntervalMs: number;
  private readonly log: Logger;
  private lastVersion = 0;
  private currentState: BroadcastState = 'idle';
  private timer?: NodeJS.Timeout;
  private unsubscribe?: () => void;

  constructor(options: BroadcastLoopOptions) {
    this.slot = options.slot;
    this.registry = options.registry;
    this.pollIntervalMs = options.pollIntervalMs ?? 0;
    this.log = (options.logger ?? logger).child({ component: 'broadcast' });
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.slot.subscribe(() => this.scan());
    if (this.pollIntervalMs > 0) {
      this.timer = setInterval(() => this.scan(), this.pollIntervalMs);
      this.timer.unref();
    }
    this.scan();
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Returns the number of sessions that accepted the frame. */
  scan(): number {
    if (this.currentState === 'fanning_out') return 0;

    const frame = this.slot.read();
    if (frame.version <= this.lastVersion) return 0;

    this.currentState = 'fanning_out';
    let accepted = 0;
    try {
      for (const session of this.registry.snapshot()) {
        try {
          if (session.offer(frame)) accepted += 1;
        } catch (error) {
          this.log.error({ err: error, sessionId: session.id }, 'offer_failed');
        }
      }
      this.lastVersion = frame.version;
    } finally {
      this.currentState = 'idle';
    }
    return accepted;
  }

  get state(): BroadcastState {
    return this.currentState;
  }

  get lastBroadcastVersion(): number {
    return this.lastVersion;
  }

  get running(): boolean {
    return this.unsubscribe !== undefined;
  }
}
