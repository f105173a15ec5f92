import { v4 as uuid } from 'uuid';
import { logger, type Logger } from '../lib/logger.js';
import type {
  FrameTransport,
  SessionCloseReason,
  SessionInfo,
  ViewerHeartbeat,
  ViewerMeta,
} from '../types.js';
import { BoundedQueue } from './boundedQueue.js';
import type { Frame } from './frameSlot.js';

export const DEFAULT_QUEUE_CAPACITY = 4;

const CLOSE_CODES: Record<SessionCloseReason, { code: number; reason: string }> = {
  disconnected: { code: 1000, reason: 'Disconnected' },
  send_failed: { code: 1011, reason: 'Send failed' },
  heartbeat_timeout: { code: 1001, reason: 'Heartbeat timeout' },
  kicked: { code: 4001, reason: 'Disconnected by operator' },
  shutdown: { code: 1001, reason: 'Server shutting down' },
};

export type SessionCloseListener = (session: ViewerSession, reason: SessionCloseReason) => void;

export interface ViewerSessionOptions {
  transport: FrameTransport;
  id?: string;
  capacity?: number;
  meta?: ViewerMeta;
  logger?: Logger;
  now?: () => number;
}

/**
 * One connected consumer. Frames offered to the session wait in a bounded
 * drop-oldest queue until the session's flush routine writes them to the
 * transport, so a slow connection only ever holds back itself.
 */
export class ViewerSession {
  readonly id: string;
  readonly connectedAt: number;
  readonly meta: ViewerMeta;

  private readonly transport: FrameTransport;
  private readonly queue: BoundedQueue<Frame>;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastSent = 0;
  private lastQueued = 0;
  private framesSent = 0;
  private bytesSent = 0;
  private lastHeartbeat: number;
  private heartbeat: ViewerHeartbeat = {};
  private reason?: SessionCloseReason;
  private closeListeners = new Set<SessionCloseListener>();
  private flushing?: Promise<void>;
  private sending = false;

  constructor(options: ViewerSessionOptions) {
    this.id = options.id ?? uuid();
    this.transport = options.transport;
    this.queue = new BoundedQueue<Frame>(options.capacity ?? DEFAULT_QUEUE_CAPACITY);
    this.meta = { remoteAddress: options.transport.remoteAddress, ...options.meta };
    this.now = options.now ?? Date.now;
    this.connectedAt = this.now();
    this.lastHeartbeat = this.connectedAt;
    this.log = (options.logger ?? logger).child({ component: 'viewer', sessionId: this.id });
  }

  /**
   * Queues a frame for delivery unless it is not newer than what the session
   * already sent or queued. Returns whether the frame was accepted.
   */
  offer(frame: Frame): boolean {
    if (this.reason) return false;
    if (frame.version <= this.lastSent || frame.version <= this.lastQueued) {
      return false;
    }
    this.lastQueued = frame.version;
    const evicted = this.queue.push(frame);
    if (evicted) {
      this.log.debug({ version: evicted.version, dropped: this.queue.dropped }, 'frame_dropped');
    }
    return true;
  }

  start(): void {
    if (this.flushing || this.reason) return;
    this.flushing = this.flush();
  }

  close(reason: SessionCloseReason): boolean {
    if (this.reason) return false;
    this.reason = reason;
    this.queue.close();

    const { code, reason: text } = CLOSE_CODES[reason];
    try {
      this.transport.close(code, text);
      // The close frame queues behind a stalled write, so cut the link.
      if (this.sending) this.transport.terminate();
    } catch (error) {
      this.log.warn({ err: error }, 'transport_close_failed');
    }

    this.log.info(
      { reason, framesSent: this.framesSent, framesDropped: this.queue.dropped },
      'viewer_session_closed',
    );

    const listeners = Array.from(this.closeListeners);
    this.closeListeners.clear();
    listeners.forEach((listener) => listener(this, reason));
    return true;
  }

  /** Listener runs once, immediately if the session is already closed. */
  onClose(listener: SessionCloseListener): () => void {
    if (this.reason) {
      listener(this, this.reason);
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** Resolves once the flush routine has exited. */
  async closed(): Promise<void> {
    await this.flushing;
  }

  markHeartbeat(data: ViewerHeartbeat = {}): void {
    this.lastHeartbeat = this.now();
    this.heartbeat = { ...this.heartbeat, ...data };
  }

  get isClosed(): boolean {
    return this.reason !== undefined;
  }

  get closeReason(): SessionCloseReason | undefined {
    return this.reason;
  }

  get lastSentVersion(): number {
    return this.lastSent;
  }

  get isFlushing(): boolean {
    return this.flushing !== undefined && !this.reason;
  }

  queuedVersions(): number[] {
    return this.queue.toArray().map((frame) => frame.version);
  }

  info(): SessionInfo {
    return {
      id: this.id,
      remoteAddress: this.meta.remoteAddress,
      userAgent: this.meta.userAgent,
      connectedAt: this.connectedAt,
      lastHeartbeat: this.lastHeartbeat,
      lastSentVersion: this.lastSent,
      queueDepth: this.queue.size,
      framesSent: this.framesSent,
      bytesSent: this.bytesSent,
      framesDropped: this.queue.dropped,
      viewerFps: this.heartbeat.fps,
      viewerLatency: this.heartbeat.latency,
    };
  }

  private async flush(): Promise<void> {
    for (;;) {
      const frame = await this.queue.take();
      if (!frame || this.reason) return;
      if (frame.version <= this.lastSent) continue;

      this.sending = true;
      try {
        await this.transport.send(frame.payload);
      } catch (error) {
        this.sending = false;
        if (!this.reason) {
          this.log.warn({ err: error, version: frame.version }, 'viewer_send_failed');
          this.close('send_failed');
        }
        return;
      }
      this.sending = false;

      this.lastSent = frame.version;
      this.framesSent += 1;
      this.bytesSent += frame.payload.byteLength;
    }
  }
}
