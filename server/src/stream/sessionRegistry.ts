import { StreamError } from '../lib/errors.js';
import type { SessionCloseReason, SessionInfo } from '../types.js';
import type { ViewerSession } from './viewerSession.js';

export interface SessionRegistryOptions {
  maxSessions?: number;
}

export class SessionRegistry {
  private sessions = new Map<string, ViewerSession>();
  private unsubscribers = new Map<string, () => void>();
  private readonly maxSessions: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.maxSessions = options.maxSessions ?? Number.POSITIVE_INFINITY;
  }

  add(session: ViewerSession): void {
    if (session.isClosed) {
      throw new StreamError('SESSION_CLOSED');
    }
    if (this.sessions.has(session.id)) {
      throw new StreamError('SESSION_EXISTS');
    }
    if (this.sessions.size >= this.maxSessions) {
      throw new StreamError('SESSION_FULL');
    }

    this.sessions.set(session.id, session);
    this.unsubscribers.set(
      session.id,
      session.onClose((closed) => {
        this.remove(closed);
      }),
    );
  }

  /** Removing an unknown or already removed session is a no-op. */
  remove(target: string | ViewerSession): boolean {
    const id = typeof target === 'string' ? target : target.id;
    const session = this.sessions.get(id);
    if (!session || (typeof target !== 'string' && session !== target)) {
      return false;
    }
    this.sessions.delete(id);
    this.unsubscribers.get(id)?.();
    this.unsubscribers.delete(id);
    return true;
  }

  get(id: string): ViewerSession | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /** Copy of the live set; safe to iterate while sessions come and go. */
  snapshot(): ViewerSession[] {
    return Array.from(this.sessions.values());
  }

  closeAll(reason: SessionCloseReason): ViewerSession[] {
    const sessions = this.snapshot();
    sessions.forEach((session) => session.close(reason));
    return sessions;
  }

  infos(): SessionInfo[] {
    return this.snapshot().map((session) => session.info());
  }

  get size(): number {
    return this.sessions.size;
  }
}
