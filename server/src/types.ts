export type SessionCloseReason =
  | 'disconnected'
  | 'send_failed'
  | 'heartbeat_timeout'
  | 'kicked'
  | 'shutdown';

/** Message-oriented, full-duplex connection to one remote peer. */
export interface FrameTransport {
  readonly remoteAddress?: string;
  /** Resolves once the payload has been handed to the network. */
  send(payload: Buffer): Promise<void>;
  close(code?: number, reason?: string): void;
  /** Drops the connection at once, failing any send still in flight. */
  terminate(): void;
}

export interface ViewerMeta {
  remoteAddress?: string;
  userAgent?: string;
}

export interface ViewerHeartbeat {
  fps?: number;
  latency?: number;
}

export interface SessionInfo {
  id: string;
  remoteAddress?: string;
  userAgent?: string;
  connectedAt: number;
  lastHeartbeat: number;
  lastSentVersion: number;
  queueDepth: number;
  framesSent: number;
  bytesSent: number;
  framesDropped: number;
  viewerFps?: number;
  viewerLatency?: number;
}

export type PublisherState = 'idle' | 'running' | 'stopping' | 'stopped' | 'failed';

export interface PublisherStats {
  state: PublisherState;
  published: number;
  failedCycles: number;
  consecutiveFailures: number;
  lastError?: string;
}
