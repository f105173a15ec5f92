import { logger, type Logger } from '../lib/logger.js';
import type {
  FrameTransport,
  PublisherStats,
  SessionCloseReason,
  SessionInfo,
  ViewerMeta,
} from '../types.js';
import { BroadcastLoop } from './broadcastLoop.js';
import { FrameSlot, type Frame } from './frameSlot.js';
import type { Publisher } from './publisher.js';
import { SessionRegistry } from './sessionRegistry.js';
import { ThroughputMeter, type ThroughputSnapshot } from './throughput.js';
import { DEFAULT_QUEUE_CAPACITY, ViewerSession } from './viewerSession.js';

export interface FrameRelayOptions {
  queueCapacity?: number;
  maxViewers?: number;
  pollIntervalMs?: number;
  slot?: FrameSlot;
  /** Built lazily so it can publish into this relay's slot. */
  createPublisher?: (slot: FrameSlot) => Publisher;
  logger?: Logger;
}

export interface RelayStats {
  version: number;
  hasFrame: boolean;
  frameBytes: number;
  lastPublishedAt?: number;
  published: ThroughputSnapshot;
  viewers: number;
  publisher?: PublisherStats;
}

/**
 * One stream: the slot the producer publishes into, the viewers reading from
 * it, and the loop fanning new frames out between them.
 */
export class FrameRelay {
  readonly slot: FrameSlot;
  readonly registry: SessionRegistry;
  readonly broadcast: BroadcastLoop;
  readonly publisher?: Publisher;

  private readonly queueCapacity: number;
  private readonly meter = new ThroughputMeter();
  private readonly log: Logger;
  private readonly unsubscribeMeter: () => void;
  private shuttingDown?: Promise<void>;

  constructor(options: FrameRelayOptions = {}) {
    this.log = (options.logger ?? logger).child({ component: 'relay' });
    this.queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.slot = options.slot ?? new FrameSlot();
    this.registry = new SessionRegistry({ maxSessions: options.maxViewers });
    this.broadcast = new BroadcastLoop({
      slot: this.slot,
      registry: this.registry,
      pollIntervalMs: options.pollIntervalMs,
      logger: options.logger,
    });
    this.publisher = options.createPublisher?.(this.slot);
    this.unsubscribeMeter = this.slot.subscribe((frame) => {
      this.meter.record(frame.payload.byteLength, frame.publishedAt);
    });
  }

  /** Starts fan-out, then the publisher; a capture open failure propagates. */
  async start(): Promise<void> {
    this.broadcast.start();
    await this.publisher?.start();
    this.log.info({ publisher: this.publisher !== undefined }, 'relay_started');
  }

  connectViewer(transport: FrameTransport, meta: ViewerMeta = {}): ViewerSession {
    const session = new ViewerSession({
      transport,
      meta,
      capacity: this.queueCapacity,
      logger: this.log,
    });
    this.registry.add(session);
    session.start();

    const current = this.slot.read();
    if (current.version > 0) {
      session.offer(current);
    }

    this.log.info(
      { sessionId: session.id, remoteAddress: session.meta.remoteAddress, viewers: this.registry.size },
      'viewer_connected',
    );
    return session;
  }

  disconnectViewer(id: string, reason: SessionCloseReason = 'disconnected'): boolean {
    const session = this.registry.get(id);
    if (!session) return false;
    session.close(reason);
    return true;
  }

  publish(payload: Uint8Array): Frame {
    return this.slot.publish(payload);
  }

  viewers(): SessionInfo[] {
    return this.registry.infos();
  }

  stats(now: number = Date.now()): RelayStats {
    const frame = this.slot.read();
    return {
      version: frame.version,
      hasFrame: this.slot.hasFrame,
      frameBytes: frame.payload.byteLength,
      lastPublishedAt: this.slot.hasFrame ? frame.publishedAt : undefined,
      published: this.meter.snapshot(now),
      viewers: this.registry.size,
      publisher: this.publisher?.stats(),
    };
  }

  /**
   * Stops the publisher first so the capture device is released, then
   * fan-out, then every viewer session. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.shuttingDown ??= this.runShutdown();
    return this.shuttingDown;
  }

  private async runShutdown(): Promise<void> {
    this.log.info({ viewers: this.registry.size }, 'relay_shutting_down');
    await this.publisher?.stop();
    this.broadcast.stop();
    this.unsubscribeMeter();
    const sessions = this.registry.closeAll('shutdown');
    await Promise.all(sessions.map((session) => session.closed()));
    this.log.info({ closedViewers: sessions.length }, 'relay_stopped');
  }
}
